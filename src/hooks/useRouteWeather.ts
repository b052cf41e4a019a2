import { useCallback, useEffect, useRef, useState } from "react";
import { toRouteWeatherError } from "@/lib/errors";
import { findRouteAndWeather, type RouteWeatherDeps, type RouteWeatherRequest } from "@/lib/routeWeather";
import type { RouteWeatherResult } from "@/types";

export type RouteWeatherState =
	| { status: "idle"; result: null; error: null }
	| { status: "loading"; result: null; error: null }
	| { status: "success"; result: RouteWeatherResult; error: null }
	| { status: "error"; result: null; error: string };

const IDLE: RouteWeatherState = { status: "idle", result: null, error: null };

/**
 * Runs route-weather lookups. Starting a new lookup aborts the one in flight, and results of
 * superseded lookups are dropped.
 */
export function useRouteWeather(deps: RouteWeatherDeps, intervalMeters?: number) {
	const [state, setState] = useState<RouteWeatherState>(IDLE);
	const controllerRef = useRef<AbortController | null>(null);

	useEffect(() => () => controllerRef.current?.abort(), []);

	const run = useCallback(
		async (request: RouteWeatherRequest) => {
			controllerRef.current?.abort();
			const controller = new AbortController();
			controllerRef.current = controller;
			setState({ status: "loading", result: null, error: null });
			try {
				const result = await findRouteAndWeather(request, deps, { intervalMeters, signal: controller.signal });
				if (controller.signal.aborted) return;
				setState({ status: "success", result, error: null });
			} catch (e) {
				if (controller.signal.aborted) return;
				setState({ status: "error", result: null, error: toRouteWeatherError(e).message });
			} finally {
				if (controllerRef.current === controller) controllerRef.current = null;
			}
		},
		[deps, intervalMeters]
	);

	const cancel = useCallback(() => {
		controllerRef.current?.abort();
		controllerRef.current = null;
		setState(IDLE);
	}, []);

	return { ...state, run, cancel };
}
