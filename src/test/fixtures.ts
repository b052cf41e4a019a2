import { vi } from "vitest";
import { EARTH_RADIUS_METERS } from "@/lib/distance";
import { RouteWeatherError } from "@/lib/errors";
import type { RouteWeatherDeps } from "@/lib/routeWeather";
import type { Coordinate, CurrentWeather, GeocodedPlace } from "@/types";

/** Degrees of arc along the equator (or a meridian) that span `meters`. */
export function deg(meters: number): number {
	return (meters / EARTH_RADIUS_METERS) * (180 / Math.PI);
}

export const PLACES: Record<string, GeocodedPlace> = {
	A: { name: "A", coords: [0, 0] },
	B: { name: "B", coords: [deg(100000), 0] },
};

export function jsonResponse(body: unknown, init: ResponseInit = {}): Response {
	return new Response(JSON.stringify(body), {
		status: 200,
		headers: { "Content-Type": "application/json" },
		...init,
	});
}

/** Straight-line collaborators over PLACES; weather is clear unless overridden. */
export function fakeServices(
	fetchCurrent: (coords: Coordinate, signal?: AbortSignal) => Promise<CurrentWeather> = async () => ({
		conditionName: "Clear",
		description: "clear sky",
		temperatureF: 70,
	})
) {
	const geocode = vi.fn(async (text: string) => {
		const place = PLACES[text];
		if (!place) throw new RouteWeatherError("NotFound", `Could not find location: ${text}`);
		return place;
	});
	const route = vi.fn(async (from: Coordinate, to: Coordinate) => ({
		polyline: [from, to],
		totalDistanceMeters: 100000,
		durationSeconds: 3600,
	}));
	const weatherFetch = vi.fn(fetchCurrent);
	const services: RouteWeatherDeps = {
		geocoder: { geocode },
		router: { route },
		weather: { simulated: false, fetchCurrent: weatherFetch },
	};
	return { services, geocode, route, fetchCurrent: weatherFetch };
}
