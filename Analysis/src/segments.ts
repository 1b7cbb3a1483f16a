import { formatDuration, parseDuration, type DurationOptions } from "./duration.js";

export const ROUTE_ARROW = " -> ";

// written in place of an empty descending half
export const NOT_AVAILABLE = "N/A";

export type Segment = {
    mode: string;            // "walking", "bus", "subway", ... verbatim
    minutes: number;
    durationText: string;    // what was inside the parentheses, untouched
};

export type Route = Segment[];

const ARROW_RE = /\s*->\s*/;
const SEGMENT_RE = /^([\p{L}\p{N}_]+)\((.+)\)$/u;

function tokens(text: string) {
    return text.split(ARROW_RE).map(t => t.trim()).filter(Boolean);
}

/**
 * Tokenizes "mode(duration) -> mode(duration) -> ..." into segments.
 * Tokens that are not shaped like mode(duration) are skipped with a warning;
 * the rest of the route is still returned.
 */
export function parseRoute(text: string | null | undefined, options: DurationOptions = {}): Route {
    if (!text) return [];

    const route: Route = [];
    for (const token of tokens(text)) {
        const m = SEGMENT_RE.exec(token);
        if (!m) {
            console.warn(`Could not parse segment: ${token}`);
            continue;
        }
        route.push({
            mode: m[1],
            minutes: parseDuration(m[2], options),
            durationText: m[2],
        });
    }
    return route;
}

// modes only, durations ignored
export function extractModes(text: string | null | undefined): string[] {
    return parseRoute(text).map(s => s.mode);
}

export function serializeRoute(route: Route, options: DurationOptions = {}): string {
    return route.map(s => `${s.mode}(${formatDuration(s.minutes, options)})`).join(ROUTE_ARROW);
}

export function totalMinutes(route: Route): number {
    return route.reduce((sum, s) => sum + s.minutes, 0);
}
