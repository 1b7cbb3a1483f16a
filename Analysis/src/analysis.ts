import { simplifyRoute } from "./simplify.js";
import { splitRoute, type RouteHalves } from "./split.js";
import { buildTransitionTable, countTransitions, type TransitionRow } from "./transitions.js";

export interface TripAnalysis extends RouteHalves<string> {
    totalTrip: string;
}

// One row of the pipeline: simplify the raw route, then cut it in half.
export function analyzeTrip(optimizedRoute: string | null | undefined): TripAnalysis {
    const totalTrip = simplifyRoute(optimizedRoute);
    return { totalTrip, ...splitRoute(totalTrip) };
}

export function summarizeTransitions(trips: Iterable<RouteHalves<string | null | undefined>>): TransitionRow[] {
    const ascending: (string | null | undefined)[] = [];
    const descending: (string | null | undefined)[] = [];
    for (const trip of trips) {
        ascending.push(trip.ascending);
        descending.push(trip.descending);
    }

    return buildTransitionTable({
        ascending: countTransitions(ascending),
        descending: countTransitions(descending),
    });
}
