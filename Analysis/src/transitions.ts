import { extractModes, NOT_AVAILABLE } from "./segments.js";
import type { RouteHalves } from "./split.js";

export type HalfType = "Ascending" | "Descending";

export type TransitionCounts = Map<string, number>;

export type TransitionRow = {
    Transition: string;      // "walking -> subway"
    Count: number;
    Type: HalfType;
};

export const TRANSITION_COLUMNS = ["Transition", "Count", "Type"] as const;

/**
 * Adjacent mode pairs of one route half, in order. Durations are ignored,
 * and missing text or the "N/A" placeholder gives no pairs.
 */
export function transitionsOf(text: string | null | undefined): string[] {
    if (!text || text.trim() === NOT_AVAILABLE) return [];

    const modes = extractModes(text);
    const out: string[] = [];
    for (let i = 0; i < modes.length - 1; i++) {
        out.push(`${modes[i]} -> ${modes[i + 1]}`);
    }
    return out;
}

export function countTransitions(routes: Iterable<string | null | undefined>): TransitionCounts {
    const counts: TransitionCounts = new Map();
    for (const route of routes) {
        for (const t of transitionsOf(route)) {
            counts.set(t, (counts.get(t) ?? 0) + 1);
        }
    }
    return counts;
}

// sums partial counts, e.g. one per batch of rows
export function mergeTransitionCounts(...parts: TransitionCounts[]): TransitionCounts {
    const merged: TransitionCounts = new Map();
    for (const part of parts) {
        for (const [t, n] of part) {
            merged.set(t, (merged.get(t) ?? 0) + n);
        }
    }
    return merged;
}

function toRows(counts: TransitionCounts, type: HalfType): TransitionRow[] {
    // Array.prototype.sort is stable: equal counts keep first-seen order
    return Array.from(counts, ([Transition, Count]) => ({ Transition, Count, Type: type }))
        .sort((a, b) => b.Count - a.Count);
}

/**
 * Flat frequency table: the ascending block, then the descending block,
 * each sorted by count, highest first.
 */
export function buildTransitionTable(counts: RouteHalves<TransitionCounts>): TransitionRow[] {
    return [
        ...toRows(counts.ascending, "Ascending"),
        ...toRows(counts.descending, "Descending"),
    ];
}
