import { SAMPLING_INTERVAL_METERS } from "@/constants";
import type { Geocoder, RoutePoint, RouteWeatherResult, Router, WeatherFetcher, WeatherPoint } from "@/types";
import { RouteWeatherError, throwIfAborted, toRouteWeatherError } from "./errors";
import { classifyHazard } from "./hazard";
import { sampleRoute } from "./sampleRoute";

export interface RouteWeatherRequest {
	start: string;
	end: string;
}

export interface RouteWeatherDeps {
	geocoder: Geocoder;
	router: Router;
	weather: WeatherFetcher;
}

export interface RouteWeatherOptions {
	intervalMeters?: number;
	/** Aborting rejects the whole request with kind "Aborted". */
	signal?: AbortSignal;
}

export interface RouteWeatherSummary {
	points: number;
	hazards: number;
	errors: number;
}

function pointLabel(index: number): string {
	return `Point ${index + 1}`;
}

/** Marker for a point whose weather lookup failed; always flagged as a hazard. */
function degradedPoint(sample: RoutePoint, index: number, error: RouteWeatherError): WeatherPoint {
	let conditionSummary: string;
	let hazardMessage: string;
	switch (error.kind) {
		case "Unauthorized":
			conditionSummary = "API Key Invalid";
			hazardMessage = "Check your OpenWeather API key";
			break;
		case "RateLimited":
		case "ServerError":
			conditionSummary = `API Error ${error.status ?? ""}`.trim();
			hazardMessage = "Failed to fetch weather";
			break;
		case "Timeout":
			conditionSummary = "Weather timed out";
			hazardMessage = error.message;
			break;
		case "DecodeError":
			conditionSummary = "Error fetching weather";
			hazardMessage = `Unreadable weather data: ${error.message}`;
			break;
		default:
			conditionSummary = "Error fetching weather";
			hazardMessage = `Network error: ${error.message}`;
	}
	return {
		coords: sample.coords,
		label: pointLabel(index),
		distanceMeters: sample.distanceMeters,
		conditionSummary,
		temperatureF: null,
		isHazard: true,
		hazardMessage,
		errorKind: error.kind,
	};
}

async function fetchWeatherPoint(
	sample: RoutePoint,
	index: number,
	weather: WeatherFetcher,
	signal?: AbortSignal
): Promise<WeatherPoint> {
	try {
		const current = await weather.fetchCurrent(sample.coords, signal);
		const hazard = classifyHazard(current.conditionName, current.description);
		console.debug(`[weather] ${pointLabel(index)}: ${current.conditionName}, ${Math.trunc(current.temperatureF)}°F`);
		return {
			coords: sample.coords,
			label: pointLabel(index),
			distanceMeters: sample.distanceMeters,
			conditionSummary: `${current.conditionName} • ${Math.trunc(current.temperatureF)}°F`,
			temperatureF: current.temperatureF,
			isHazard: hazard.isHazard,
			hazardMessage: hazard.message,
			errorKind: null,
		};
	} catch (e) {
		const error = toRouteWeatherError(e);
		if (error.kind === "Aborted") throw error;
		console.warn(`[weather] ${pointLabel(index)} degraded (${error.kind}): ${error.message}`);
		return degradedPoint(sample, index, error);
	}
}

/**
 * Geocode both ends, route between them, sample the route and fetch weather for every sample.
 * Geocoding and routing failures reject the whole request; a failed weather lookup only turns
 * its own point into an error marker. Weather lookups run concurrently but results keep sample
 * order. Nothing is retried.
 */
export async function findRouteAndWeather(
	request: RouteWeatherRequest,
	deps: RouteWeatherDeps,
	{ intervalMeters = SAMPLING_INTERVAL_METERS, signal }: RouteWeatherOptions = {}
): Promise<RouteWeatherResult> {
	const startText = request.start.trim();
	const endText = request.end.trim();
	if (!startText || !endText) {
		throw new RouteWeatherError("InvalidInput", "Please enter both locations");
	}

	try {
		throwIfAborted(signal);
		const start = await deps.geocoder.geocode(startText, signal);
		throwIfAborted(signal);
		const end = await deps.geocoder.geocode(endText, signal);
		throwIfAborted(signal);
		const route = await deps.router.route(start.coords, end.coords, signal);
		throwIfAborted(signal);
		console.debug(`[route] ${start.name} → ${end.name}: ${route.totalDistanceMeters} m, ${route.polyline.length} vertices`);

		const samples = sampleRoute(route.polyline, intervalMeters);
		const weatherPoints = await Promise.all(
			samples.map((sample, index) => fetchWeatherPoint(sample, index, deps.weather, signal))
		);
		throwIfAborted(signal);

		return { start, end, route, samples, weatherPoints, simulated: deps.weather.simulated };
	} catch (e) {
		throw toRouteWeatherError(e);
	}
}

export function summarizeResult(result: RouteWeatherResult): RouteWeatherSummary {
	return {
		points: result.weatherPoints.length,
		hazards: result.weatherPoints.filter((p) => p.isHazard).length,
		errors: result.weatherPoints.filter((p) => p.errorKind !== null).length,
	};
}
