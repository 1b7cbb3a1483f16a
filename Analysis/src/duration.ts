// Duration text <-> minutes.
// "1시간 8분" -> 68, "29분" -> 29, "2.5분" -> 2.5 (float) / 2 (integer)

export type Precision = "integer" | "float";

export interface DurationUnits {
    hour: string;
    minute: string;
}

export interface DurationOptions {
    precision?: Precision;
    units?: DurationUnits;
}

// what the directions service returns with language=ko
export const KOREAN_UNITS: DurationUnits = { hour: "시간", minute: "분" };

function escapeRegExp(s: string) {
    return s.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/**
 * Parses a duration text into minutes. Each clause is optional and may sit
 * anywhere in the text; a text with neither clause is worth 0 minutes.
 */
export function parseDuration(text: string | null | undefined, options: DurationOptions = {}): number {
    if (!text) return 0;
    const units = options.units ?? KOREAN_UNITS;

    const h = new RegExp(`(\\d+)\\s*${escapeRegExp(units.hour)}`).exec(text);
    // exponent is accepted so anything formatDuration prints reads back
    const m = new RegExp(`(\\d+(?:\\.\\d+)?(?:[eE][-+]?\\d+)?)\\s*${escapeRegExp(units.minute)}`).exec(text);

    const hours = h ? Number(h[1]) : 0;
    const minutes = m ? Number(m[1]) : 0;
    const total = hours * 60 + minutes;

    return options.precision === "float" ? total : Math.trunc(total);
}

/**
 * Formats minutes back into duration text. Always yields at least one clause,
 * so 0 becomes "0분" rather than an empty string.
 */
export function formatDuration(minutes: number, options: DurationOptions = {}): string {
    const units = options.units ?? KOREAN_UNITS;
    const value = options.precision === "float" ? minutes : Math.trunc(minutes);

    const h = Math.floor(value / 60);
    const m = value % 60;

    if (h > 0 && m > 0) return `${h}${units.hour} ${m}${units.minute}`;
    if (h > 0) return `${h}${units.hour}`;
    return `${m}${units.minute}`;
}
