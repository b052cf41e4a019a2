/**
 * OSRM (Open Source Routing Machine) driving routes.
 * Defaults to the public demo server: https://router.project-osrm.org
 * No API key required. For production consider self-hosting or rate limits.
 */

import type { AppConfig } from "@/config";
import { RouteWeatherError } from "@/lib/errors";
import { finiteNumber, isRecord, nonEmptyString } from "@/lib/guards";
import { polylineLengthMeters } from "@/lib/sampleRoute";
import type { Coordinate, RouteResult, Router } from "@/types";
import { fetchJson } from "./http";

/** Build coordinate string for OSRM: lng,lat;lng,lat;... */
function toCoordString(coords: readonly Coordinate[]): string {
	return coords.map(([lng, lat]) => `${lng},${lat}`).join(";");
}

/** GeoJSON LineString coordinates from an OSRM route; drops anything that is not [lng, lat]. */
function getGeometryFromRoute(route: Record<string, unknown>): Coordinate[] {
	const geometry = route.geometry;
	if (!isRecord(geometry) || !Array.isArray(geometry.coordinates)) return [];
	const coords: Coordinate[] = [];
	for (const c of geometry.coordinates) {
		if (!Array.isArray(c)) continue;
		const lng = finiteNumber(c[0]);
		const lat = finiteNumber(c[1]);
		if (lng !== undefined && lat !== undefined) coords.push([lng, lat]);
	}
	return coords;
}

/** First route of an OSRM `route` response. Throws NoRoute when OSRM found none. */
export function parseOsrmRoute(data: unknown): RouteResult {
	if (!isRecord(data)) throw new RouteWeatherError("DecodeError", "Unreadable routing response");
	if (data.code !== "Ok") {
		throw new RouteWeatherError("NoRoute", nonEmptyString(data.message) ?? "No route found");
	}
	const route: unknown = Array.isArray(data.routes) ? data.routes[0] : undefined;
	if (!isRecord(route)) throw new RouteWeatherError("NoRoute", "No route found");

	const polyline = getGeometryFromRoute(route);
	if (polyline.length < 2) throw new RouteWeatherError("NoRoute", "No route found");

	const durationSeconds = finiteNumber(route.duration);
	return {
		polyline,
		totalDistanceMeters: finiteNumber(route.distance) ?? polylineLengthMeters(polyline),
		...(durationSeconds !== undefined ? { durationSeconds } : {}),
	};
}

export function createOsrmRouter(config: Pick<AppConfig, "osrmUrl" | "requestTimeoutMs">): Router {
	return {
		async route(from, to, signal) {
			const url = `${config.osrmUrl}/route/v1/driving/${toCoordString([from, to])}?geometries=geojson&overview=full`;
			const res = await fetchJson(url, { timeoutMs: config.requestTimeoutMs, signal });
			// OSRM answers "NoRoute" and friends with a 400 and a JSON body; only a bodiless error is opaque.
			if (!res.ok && !isRecord(res.data)) {
				throw new RouteWeatherError("ServerError", `Routing failed: ${res.statusText || res.status}`, {
					status: res.status,
				});
			}
			return parseOsrmRoute(res.data);
		},
	};
}
