/**
 * Geocode free-text place names via OpenStreetMap Nominatim.
 * No API key required. Usage policy: https://operations.osmfoundation.org/policies/nominatim/
 */

import type { AppConfig } from "@/config";
import { USER_AGENT } from "@/constants";
import { RouteWeatherError } from "@/lib/errors";
import { finiteNumber, isRecord, nonEmptyString } from "@/lib/guards";
import type { GeocodedPlace, Geocoder } from "@/types";
import { fetchJson } from "./http";

/** First hit of a Nominatim search, or null when the payload has no usable result. */
export function parseNominatimResult(data: unknown, query: string): GeocodedPlace | null {
	if (!Array.isArray(data)) return null;
	const first: unknown = data[0];
	if (!isRecord(first)) return null;
	const lat = finiteNumber(first.lat);
	const lon = finiteNumber(first.lon);
	if (lat === undefined || lon === undefined) return null;
	const displayName = nonEmptyString(first.display_name);
	const name = nonEmptyString(first.name) ?? displayName?.split(",")[0]?.trim() ?? query;
	return {
		name,
		coords: [lon, lat],
		...(displayName ? { address: displayName } : {}),
	};
}

export function createNominatimGeocoder(config: Pick<AppConfig, "nominatimUrl" | "requestTimeoutMs">): Geocoder {
	return {
		async geocode(text, signal) {
			const q = text.trim();
			if (!q) throw new RouteWeatherError("InvalidInput", "Location is empty");

			const params = new URLSearchParams({ q, format: "json", limit: "1" });
			const res = await fetchJson(`${config.nominatimUrl}?${params}`, {
				timeoutMs: config.requestTimeoutMs,
				signal,
				headers: { "User-Agent": USER_AGENT },
			});
			if (!res.ok) {
				throw new RouteWeatherError("ServerError", `Search failed: ${res.statusText || res.status}`, {
					status: res.status,
				});
			}

			const place = parseNominatimResult(res.data, q);
			if (!place) throw new RouteWeatherError("NotFound", `Could not find location: ${q}`);
			return place;
		},
	};
}
