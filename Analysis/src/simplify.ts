import { formatDuration } from "./duration.js";
import { parseRoute, ROUTE_ARROW, type Route, type Segment } from "./segments.js";

const WALKING = "walking";

type Accumulator =
    | { kind: "none" }
    | { kind: "mode"; mode: string; total: number };

/**
 * Merges runs of the same mode and folds interior walking into the mode
 * being accumulated. Walking is kept as its own segment only at the very
 * start or end of the trip, with its original duration text.
 *
 * Interior walking met while nothing is accumulating (e.g. right after the
 * leading walk) is dropped, time included. Historical outputs were produced
 * that way, so it stays.
 */
export function simplifySegments(route: Route): Route {
    const out: Route = [];
    let acc: Accumulator = { kind: "none" };

    const flush = () => {
        if (acc.kind === "mode") {
            out.push({
                mode: acc.mode,
                minutes: acc.total,
                durationText: formatDuration(acc.total),
            });
        }
        acc = { kind: "none" };
    };

    route.forEach((seg: Segment, i) => {
        if (seg.mode === WALKING) {
            if (i === 0 || i === route.length - 1) {
                flush();
                out.push(seg);
            } else if (acc.kind === "mode") {
                acc.total += seg.minutes;
            }
            return;
        }

        if (acc.kind === "mode" && acc.mode === seg.mode) {
            acc.total += seg.minutes;
        } else {
            flush();
            acc = { kind: "mode", mode: seg.mode, total: seg.minutes };
        }
    });
    flush();

    return out;
}

export function simplifyRoute(text: string | null | undefined): string {
    return simplifySegments(parseRoute(text))
        .map(s => `${s.mode}(${s.durationText})`)
        .join(ROUTE_ARROW);
}
