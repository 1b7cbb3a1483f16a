import { ROUTE_ARROW } from "./segments.js";

// The subset of a Directions API leg step the route string is built from.
export type DirectionsStep = {
    travel_mode?: string;    // "WALKING" | "TRANSIT" | ...
    duration?: { text?: string; value?: number };
    transit_details?: {
        line?: {
            vehicle?: { type?: string };  // "SUBWAY", "BUS", "HEAVY_RAIL", ...
        };
    };
};

/**
 * Builds the "walking(5분) -> subway(10분)" string for a leg's steps.
 * Transit steps are named after their vehicle type, lower-cased, or
 * "transit" when the response carries none. Other travel modes are left out.
 */
export function formatDirectionsRoute(steps: DirectionsStep[]): string {
    const parts: string[] = [];

    for (const step of steps) {
        const duration = step.duration?.text ?? "";
        if (step.travel_mode === "WALKING") {
            parts.push(`walking(${duration})`);
        } else if (step.travel_mode === "TRANSIT") {
            const type = step.transit_details?.line?.vehicle?.type;
            parts.push(`${type ? type.toLowerCase() : "transit"}(${duration})`);
        }
    }

    return parts.join(ROUTE_ARROW);
}

const EARTH_RADIUS_KM = 6371;

// great-circle distance between origin and destination, for distance_km
export function haversineKm(lat1: number, lon1: number, lat2: number, lon2: number, radiusKm = EARTH_RADIUS_KM) {
    const rad = (d: number) => (d * Math.PI) / 180;
    const dLat = rad(lat2 - lat1);
    const dLon = rad(lon2 - lon1);
    const a = Math.sin(dLat / 2) ** 2 + Math.cos(rad(lat1)) * Math.cos(rad(lat2)) * Math.sin(dLon / 2) ** 2;
    return radiusKm * 2 * Math.atan2(Math.sqrt(a), Math.sqrt(1 - a));
}
