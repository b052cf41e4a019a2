import { act, renderHook } from "@testing-library/react";
import { beforeEach, describe, expect, it, vi } from "vitest";
import { RouteWeatherError } from "@/lib/errors";
import { fakeServices } from "@/test/fixtures";
import { useRouteWeather } from "./useRouteWeather";

beforeEach(() => {
	vi.spyOn(console, "debug").mockImplementation(() => {});
	vi.spyOn(console, "warn").mockImplementation(() => {});
});

/** Services whose geocoder never answers "Slow" until the request is aborted. */
function withSlowStart() {
	const fake = fakeServices();
	const geocode = vi.fn((text: string, signal?: AbortSignal) => {
		if (text !== "Slow") return fake.geocode(text);
		return new Promise<never>((_resolve, reject) => {
			signal?.addEventListener("abort", () => reject(new RouteWeatherError("Aborted", "Request cancelled")));
		});
	});
	return { ...fake.services, geocoder: { geocode } };
}

describe("useRouteWeather", () => {
	it("starts idle and resolves to a result", async () => {
		const { services } = fakeServices();
		const { result } = renderHook(() => useRouteWeather(services));
		expect(result.current.status).toBe("idle");

		await act(async () => {
			await result.current.run({ start: "A", end: "B" });
		});

		expect(result.current.status).toBe("success");
		expect(result.current.result?.weatherPoints).toHaveLength(4);
		expect(result.current.error).toBeNull();
	});

	it("exposes the error message when the request fails", async () => {
		const { services } = fakeServices();
		const { result } = renderHook(() => useRouteWeather(services));

		await act(async () => {
			await result.current.run({ start: "Nowhere", end: "B" });
		});

		expect(result.current.status).toBe("error");
		expect(result.current.error).toBe("Could not find location: Nowhere");
	});

	it("supersedes an in-flight request", async () => {
		const services = withSlowStart();
		const { result } = renderHook(() => useRouteWeather(services));

		let first: Promise<void> = Promise.resolve();
		act(() => {
			first = result.current.run({ start: "Slow", end: "B" });
		});
		expect(result.current.status).toBe("loading");

		await act(async () => {
			await result.current.run({ start: "A", end: "B" });
		});
		await act(async () => {
			await first;
		});

		expect(result.current.status).toBe("success");
		expect(result.current.result?.start.name).toBe("A");
	});

	it("returns to idle when cancelled", async () => {
		const services = withSlowStart();
		const { result } = renderHook(() => useRouteWeather(services));

		let pending: Promise<void> = Promise.resolve();
		act(() => {
			pending = result.current.run({ start: "Slow", end: "B" });
		});
		act(() => {
			result.current.cancel();
		});
		await act(async () => {
			await pending;
		});

		expect(result.current.status).toBe("idle");
		expect(result.current.result).toBeNull();
	});
});
