/**
 * Current conditions from OpenWeather One Call 3.0.
 * Without a usable key the fetcher serves simulated weather so the app stays demoable.
 */

import { type AppConfig, isUsableApiKey } from "@/config";
import { SIMULATED_CONDITIONS, SIMULATED_TEMPERATURE_RANGE_F } from "@/constants";
import { RouteWeatherError } from "@/lib/errors";
import { finiteNumber, isRecord } from "@/lib/guards";
import type { Coordinate, CurrentWeather, WeatherFetcher } from "@/types";
import { fetchJson } from "./http";

export type RandomSource = () => number;

/** "heavy intensity rain" -> "Heavy Intensity Rain" */
function capitalizeWords(text: string): string {
	return text.replace(/\b\p{L}/gu, (c) => c.toUpperCase());
}

/** Reads `current.temp` and the first `current.weather` entry. */
export function parseOneCallCurrent(data: unknown): CurrentWeather {
	const current = isRecord(data) ? data.current : undefined;
	if (!isRecord(current)) throw new RouteWeatherError("DecodeError", "Weather response has no current conditions");
	const temperatureF = finiteNumber(current.temp);
	if (temperatureF === undefined) throw new RouteWeatherError("DecodeError", "Weather response has no temperature");
	if (!Array.isArray(current.weather)) throw new RouteWeatherError("DecodeError", "Weather response has no conditions");

	const first: unknown = current.weather[0];
	const condition: Record<string, unknown> = isRecord(first) ? first : {};
	return {
		conditionName: typeof condition.main === "string" && condition.main ? condition.main : "Unknown",
		description: typeof condition.description === "string" ? capitalizeWords(condition.description) : "",
		temperatureF,
	};
}

export function simulateWeather(random: RandomSource = Math.random): CurrentWeather {
	const pick = SIMULATED_CONDITIONS[Math.min(Math.floor(random() * SIMULATED_CONDITIONS.length), SIMULATED_CONDITIONS.length - 1)];
	const { min, max } = SIMULATED_TEMPERATURE_RANGE_F;
	return {
		conditionName: pick.conditionName,
		description: capitalizeWords(pick.description),
		temperatureF: min + Math.min(Math.floor(random() * (max - min + 1)), max - min),
	};
}

function statusError(status: number, statusText: string): RouteWeatherError {
	if (status === 401) return new RouteWeatherError("Unauthorized", "Check your OpenWeather API key", { status });
	if (status === 429) return new RouteWeatherError("RateLimited", "Weather rate limit reached", { status });
	return new RouteWeatherError("ServerError", `Weather service error ${status}${statusText ? ` ${statusText}` : ""}`, {
		status,
	});
}

export function createWeatherFetcher(
	config: Pick<AppConfig, "weatherApiKey" | "openWeatherUrl" | "requestTimeoutMs">,
	random: RandomSource = Math.random
): WeatherFetcher {
	const apiKey = config.weatherApiKey;
	if (!apiKey || !isUsableApiKey(apiKey)) {
		return {
			simulated: true,
			async fetchCurrent() {
				return simulateWeather(random);
			},
		};
	}

	return {
		simulated: false,
		async fetchCurrent([lon, lat]: Coordinate, signal?: AbortSignal) {
			const params = new URLSearchParams({
				lat: String(lat),
				lon: String(lon),
				exclude: "minutely,hourly,daily,alerts",
				units: "imperial",
				appid: apiKey,
			});
			const res = await fetchJson(`${config.openWeatherUrl}?${params}`, {
				timeoutMs: config.requestTimeoutMs,
				signal,
			});
			if (!res.ok) throw statusError(res.status, res.statusText);
			return parseOneCallCurrent(res.data);
		},
	};
}
