import { SAMPLING_INTERVAL_METERS } from "@/constants";
import type { Coordinate, Polyline, RoutePoint } from "@/types";
import { cumulativeDistances } from "./distance";
import { RouteWeatherError } from "./errors";

function assertPolyline(polyline: Polyline): void {
	if (polyline.length < 2) {
		throw new RouteWeatherError("InvalidInput", `Route needs at least 2 points, got ${polyline.length}`);
	}
	for (const [lng, lat] of polyline) {
		if (!Number.isFinite(lng) || !Number.isFinite(lat)) {
			throw new RouteWeatherError("InvalidInput", `Route contains an invalid coordinate (${lng}, ${lat})`);
		}
	}
}

/**
 * Linear blend of two [lng, lat] points. This is a flat approximation, fine for the short
 * segments routing engines return but not geodesically exact over long ones.
 */
function interpolate(a: Coordinate, b: Coordinate, ratio: number): Coordinate {
	return [a[0] + (b[0] - a[0]) * ratio, a[1] + (b[1] - a[1]) * ratio];
}

/** Length of the polyline in meters, summed from haversine segment lengths. */
export function polylineLengthMeters(polyline: Polyline): number {
	assertPolyline(polyline);
	const cumulative = cumulativeDistances(polyline);
	return cumulative[cumulative.length - 1];
}

/**
 * Points every `intervalMeters` along the polyline. The first vertex always comes first and the
 * last vertex always comes last, so the final gap can be shorter than the interval. A route
 * shorter than one interval yields exactly its two ends.
 */
export function sampleRoute(polyline: Polyline, intervalMeters: number = SAMPLING_INTERVAL_METERS): RoutePoint[] {
	assertPolyline(polyline);
	if (!Number.isFinite(intervalMeters) || intervalMeters <= 0) {
		throw new RouteWeatherError("InvalidInput", `Sampling interval must be a positive distance, got ${intervalMeters}`);
	}

	const cumulative = cumulativeDistances(polyline);
	const total = cumulative[cumulative.length - 1];
	const points: RoutePoint[] = [{ coords: polyline[0], distanceMeters: 0 }];

	// Targets only grow, so the segment cursor never moves back.
	let segment = 0;
	for (let k = 1; k * intervalMeters < total; k++) {
		const target = k * intervalMeters;
		while (cumulative[segment + 1] < target) segment++;
		const before = cumulative[segment];
		const ratio = (target - before) / (cumulative[segment + 1] - before);
		points.push({
			coords: interpolate(polyline[segment], polyline[segment + 1], ratio),
			distanceMeters: target,
		});
	}

	points.push({ coords: polyline[polyline.length - 1], distanceMeters: total });
	return points;
}
