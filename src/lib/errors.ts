/** Failures of the weather stage. These degrade a single point instead of the request. */
export type WeatherErrorKind =
	| "Unauthorized"
	| "RateLimited"
	| "ServerError"
	| "NetworkError"
	| "DecodeError"
	| "Timeout";

export type RouteWeatherErrorKind = "InvalidInput" | "NotFound" | "NoRoute" | "Aborted" | WeatherErrorKind;

export class RouteWeatherError extends Error {
	readonly kind: RouteWeatherErrorKind;
	/** HTTP status of the response that caused the error, when there was one. */
	readonly status?: number;

	constructor(kind: RouteWeatherErrorKind, message: string, options: { status?: number; cause?: unknown } = {}) {
		super(message, { cause: options.cause });
		this.name = "RouteWeatherError";
		this.kind = kind;
		this.status = options.status;
	}
}

export function isRouteWeatherError(e: unknown): e is RouteWeatherError {
	return e instanceof RouteWeatherError;
}

/** fetch() rejects with a DOMException named "AbortError"; not every runtime makes it an Error. */
export function isAbortError(e: unknown): boolean {
	return typeof e === "object" && e !== null && "name" in e && e.name === "AbortError";
}

export function toRouteWeatherError(e: unknown, fallback: RouteWeatherErrorKind = "NetworkError"): RouteWeatherError {
	if (isRouteWeatherError(e)) return e;
	if (isAbortError(e)) return new RouteWeatherError("Aborted", "Request cancelled", { cause: e });
	const message = e instanceof Error ? e.message : "Request failed";
	return new RouteWeatherError(fallback, message, { cause: e });
}

export function throwIfAborted(signal?: AbortSignal): void {
	if (signal?.aborted) throw new RouteWeatherError("Aborted", "Request cancelled");
}
