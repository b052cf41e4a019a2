import type { Coordinate } from "@/types";

export const EARTH_RADIUS_METERS = 6371000;

/** Haversine distance in meters between two [lng, lat] points. */
export function distanceMeters(a: Coordinate, b: Coordinate): number {
	const [lng1, lat1] = a;
	const [lng2, lat2] = b;
	const dLat = ((lat2 - lat1) * Math.PI) / 180;
	const dLng = ((lng2 - lng1) * Math.PI) / 180;
	const x =
		Math.sin(dLat / 2) ** 2 +
		Math.cos((lat1 * Math.PI) / 180) *
			Math.cos((lat2 * Math.PI) / 180) *
			Math.sin(dLng / 2) ** 2;
	return 2 * EARTH_RADIUS_METERS * Math.atan2(Math.sqrt(x), Math.sqrt(1 - x));
}

/** Running distance from the first vertex to each vertex; same length as the input. */
export function cumulativeDistances(coords: readonly Coordinate[]): number[] {
	const out: number[] = [];
	let total = 0;
	for (let i = 0; i < coords.length; i++) {
		if (i > 0) total += distanceMeters(coords[i - 1], coords[i]);
		out.push(total);
	}
	return out;
}
