import { formatDuration } from "./duration.js";
import { NOT_AVAILABLE, parseRoute, serializeRoute, totalMinutes, type Route } from "./segments.js";

export const MIDPOINT_EPSILON = 1e-9;

const FLOAT = { precision: "float" } as const;

export interface RouteHalves<T> {
    ascending: T;
    descending: T;
}

/**
 * Cuts a route at half of its total duration. The segment that straddles
 * the midpoint is split in two pieces of the same mode; a descending piece
 * of zero length is not emitted.
 */
export function splitSegments(route: Route): RouteHalves<Route> {
    const half = totalMinutes(route) / 2;

    const ascending: Route = [];
    const descending: Route = [];
    let elapsed = 0;
    let halfReached = false;

    for (const seg of route) {
        if (halfReached) {
            descending.push(seg);
            continue;
        }

        const end = elapsed + seg.minutes;
        if (Math.abs(end - half) < MIDPOINT_EPSILON) {
            ascending.push(seg);
            elapsed = end;
            halfReached = true;
        } else if (end < half) {
            ascending.push(seg);
            elapsed = end;
        } else {
            const remain = half - elapsed;
            if (remain < 0) {
                // drifted past the midpoint already
                descending.push(seg);
            } else {
                const rest = seg.minutes - remain;
                ascending.push({ ...seg, minutes: remain, durationText: formatDuration(remain, FLOAT) });
                if (rest > 0) {
                    descending.push({ ...seg, minutes: rest, durationText: formatDuration(rest, FLOAT) });
                }
            }
            halfReached = true;
        }
    }

    return { ascending, descending };
}

export function splitRoute(text: string | null | undefined): RouteHalves<string> {
    const { ascending, descending } = splitSegments(parseRoute(text, FLOAT));

    return {
        ascending: serializeRoute(ascending, FLOAT),
        descending: descending.length ? serializeRoute(descending, FLOAT) : NOT_AVAILABLE,
    };
}
