// @vitest-environment node
import { beforeEach, describe, expect, it, vi } from "vitest";
import { PLACES, deg, fakeServices } from "@/test/fixtures";
import type { Coordinate } from "@/types";
import { RouteWeatherError } from "./errors";
import { findRouteAndWeather, summarizeResult } from "./routeWeather";

function delay(ms: number): Promise<void> {
	return new Promise((resolve) => setTimeout(resolve, ms));
}

beforeEach(() => {
	vi.spyOn(console, "debug").mockImplementation(() => {});
	vi.spyOn(console, "warn").mockImplementation(() => {});
});

describe("findRouteAndWeather", () => {
	it("geocodes, routes, samples and classifies every point", async () => {
		const { services, geocode, route, fetchCurrent } = fakeServices(async ([lng]) =>
			lng > deg(50000) && lng < deg(99000)
				? { conditionName: "Thunderstorm", description: "thunderstorm with rain", temperatureF: 64.6 }
				: { conditionName: "Clear", description: "clear sky", temperatureF: 70.9 }
		);

		const result = await findRouteAndWeather({ start: " A ", end: "B" }, services);

		expect(geocode.mock.calls.map((c) => c[0])).toEqual(["A", "B"]);
		expect(route).toHaveBeenCalledTimes(1);
		expect(fetchCurrent).toHaveBeenCalledTimes(4);
		expect(result.start).toBe(PLACES.A);
		expect(result.end).toBe(PLACES.B);
		expect(result.simulated).toBe(false);
		expect(result.weatherPoints.map((p) => p.label)).toEqual(["Point 1", "Point 2", "Point 3", "Point 4"]);
		expect(result.weatherPoints[0].coords).toBe(PLACES.A.coords);
		expect(result.weatherPoints[3].coords).toBe(PLACES.B.coords);
		expect(result.weatherPoints[0]).toMatchObject({
			conditionSummary: "Clear • 70°F",
			temperatureF: 70.9,
			isHazard: false,
			hazardMessage: null,
			errorKind: null,
		});
		expect(result.weatherPoints[2]).toMatchObject({
			distanceMeters: 96000,
			conditionSummary: "Thunderstorm • 64°F",
			isHazard: true,
			hazardMessage: "Hazard: Thunderstorm",
			errorKind: null,
		});
		expect(result.weatherPoints.filter((p) => p.isHazard)).toHaveLength(1);
	});

	it("honours a custom sampling interval", async () => {
		const { services } = fakeServices();
		const result = await findRouteAndWeather({ start: "A", end: "B" }, services, { intervalMeters: 30000 });
		expect(result.samples.map((s) => Math.round(s.distanceMeters))).toEqual([0, 30000, 60000, 90000, 100000]);
	});

	it("rejects empty locations before calling any service", async () => {
		const { services, geocode } = fakeServices();
		await expect(findRouteAndWeather({ start: "A", end: "   " }, services)).rejects.toMatchObject({
			kind: "InvalidInput",
			message: "Please enter both locations",
		});
		expect(geocode).not.toHaveBeenCalled();
	});

	it("fails the whole request when the start cannot be geocoded", async () => {
		const { services, route, fetchCurrent } = fakeServices();
		await expect(findRouteAndWeather({ start: "Nowhere", end: "B" }, services)).rejects.toMatchObject({
			kind: "NotFound",
			message: "Could not find location: Nowhere",
		});
		expect(route).not.toHaveBeenCalled();
		expect(fetchCurrent).not.toHaveBeenCalled();
	});

	it("fails the whole request when no route is found", async () => {
		const { services, route, fetchCurrent } = fakeServices();
		route.mockRejectedValueOnce(new RouteWeatherError("NoRoute", "No route found"));
		await expect(findRouteAndWeather({ start: "A", end: "B" }, services)).rejects.toMatchObject({ kind: "NoRoute" });
		expect(fetchCurrent).not.toHaveBeenCalled();
	});

	it("degrades a single failed weather lookup and keeps the others", async () => {
		let calls = 0;
		const { services } = fakeServices(async () => {
			calls++;
			if (calls === 2) throw new RouteWeatherError("ServerError", "Weather service error 503", { status: 503 });
			return { conditionName: "Clouds", description: "broken clouds", temperatureF: 58 };
		});

		const result = await findRouteAndWeather({ start: "A", end: "B" }, services);
		const failed = result.weatherPoints.filter((p) => p.errorKind !== null);

		expect(result.weatherPoints).toHaveLength(4);
		expect(failed).toHaveLength(1);
		expect(result.weatherPoints[1]).toMatchObject({
			label: "Point 2",
			conditionSummary: "API Error 503",
			temperatureF: null,
			isHazard: true,
			hazardMessage: "Failed to fetch weather",
			errorKind: "ServerError",
		});
		for (const i of [0, 2, 3]) {
			expect(result.weatherPoints[i]).toMatchObject({ conditionSummary: "Clouds • 58°F", errorKind: null });
		}
		expect(summarizeResult(result)).toEqual({ points: 4, hazards: 1, errors: 1 });
	});

	it("names the failure on degraded points", async () => {
		const failures = [
			new RouteWeatherError("Unauthorized", "Check your OpenWeather API key", { status: 401 }),
			new RouteWeatherError("Timeout", "Request timed out after 10000 ms"),
			new TypeError("socket hang up"),
			new RouteWeatherError("DecodeError", "Weather response has no temperature"),
		];
		let calls = 0;
		const { services } = fakeServices(async () => {
			throw failures[calls++];
		});

		const result = await findRouteAndWeather({ start: "A", end: "B" }, services);

		expect(result.weatherPoints.map((p) => [p.conditionSummary, p.hazardMessage, p.errorKind])).toEqual([
			["API Key Invalid", "Check your OpenWeather API key", "Unauthorized"],
			["Weather timed out", "Request timed out after 10000 ms", "Timeout"],
			["Error fetching weather", "Network error: socket hang up", "NetworkError"],
			["Error fetching weather", "Unreadable weather data: Weather response has no temperature", "DecodeError"],
		]);
	});

	it("keeps sample order when lookups finish out of order", async () => {
		const { services } = fakeServices(async ([lng]: Coordinate) => {
			const index = Math.round(lng / deg(48000));
			await delay((4 - index) * 5);
			return { conditionName: "Clear", description: "clear sky", temperatureF: 60 + index };
		});

		const result = await findRouteAndWeather({ start: "A", end: "B" }, services);

		expect(result.weatherPoints.map((p) => p.conditionSummary)).toEqual([
			"Clear • 60°F",
			"Clear • 61°F",
			"Clear • 62°F",
			"Clear • 62°F",
		]);
	});

	it("rejects with Aborted when the signal is already aborted", async () => {
		const { services, geocode } = fakeServices();
		const controller = new AbortController();
		controller.abort();
		await expect(
			findRouteAndWeather({ start: "A", end: "B" }, services, { signal: controller.signal })
		).rejects.toMatchObject({ kind: "Aborted" });
		expect(geocode).not.toHaveBeenCalled();
	});

	it("rejects with Aborted when cancelled during the weather stage", async () => {
		const controller = new AbortController();
		const { services } = fakeServices(
			(_coords, signal) =>
				new Promise((_resolve, reject) => {
					signal?.addEventListener("abort", () => reject(new RouteWeatherError("Aborted", "Request cancelled")));
				})
		);

		const pending = findRouteAndWeather({ start: "A", end: "B" }, services, { signal: controller.signal });
		await delay(0);
		controller.abort();

		await expect(pending).rejects.toMatchObject({ kind: "Aborted" });
	});

	it("reports simulated weather", async () => {
		const { services } = fakeServices();
		const result = await findRouteAndWeather(
			{ start: "A", end: "B" },
			{ ...services, weather: { ...services.weather, simulated: true } }
		);
		expect(result.simulated).toBe(true);
	});
});
