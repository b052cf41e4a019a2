import { RouteWeatherError, isAbortError } from "@/lib/errors";

export interface FetchJsonOptions {
	timeoutMs: number;
	signal?: AbortSignal;
	headers?: Record<string, string>;
}

export interface JsonResponse {
	ok: boolean;
	status: number;
	statusText: string;
	/** Parsed body; undefined when a non-2xx response had no JSON body. */
	data: unknown;
}

/**
 * GET a URL and parse its JSON body within `timeoutMs`. The caller's signal cancels the request.
 * Rejects with kind Timeout, Aborted, NetworkError, or DecodeError (2xx with an unparseable
 * body). Non-2xx responses resolve; callers decide what the status means.
 */
export async function fetchJson(url: string, { timeoutMs, signal, headers }: FetchJsonOptions): Promise<JsonResponse> {
	if (signal?.aborted) throw new RouteWeatherError("Aborted", "Request cancelled");

	const controller = new AbortController();
	let timedOut = false;
	const timer = setTimeout(() => {
		timedOut = true;
		controller.abort();
	}, timeoutMs);
	const onAbort = () => controller.abort();
	signal?.addEventListener("abort", onAbort, { once: true });

	try {
		let res: Response;
		try {
			res = await fetch(url, { headers: { Accept: "application/json", ...headers }, signal: controller.signal });
		} catch (e) {
			throw failure(e, timedOut, signal, timeoutMs);
		}

		let data: unknown;
		try {
			data = await res.json();
		} catch (e) {
			if (timedOut || signal?.aborted || isAbortError(e)) throw failure(e, timedOut, signal, timeoutMs);
			if (res.ok) {
				throw new RouteWeatherError("DecodeError", "Response was not valid JSON", { status: res.status, cause: e });
			}
			data = undefined;
		}
		return { ok: res.ok, status: res.status, statusText: res.statusText, data };
	} finally {
		clearTimeout(timer);
		signal?.removeEventListener("abort", onAbort);
	}
}

function failure(e: unknown, timedOut: boolean, signal: AbortSignal | undefined, timeoutMs: number): RouteWeatherError {
	if (signal?.aborted) return new RouteWeatherError("Aborted", "Request cancelled", { cause: e });
	if (timedOut) return new RouteWeatherError("Timeout", `Request timed out after ${timeoutMs} ms`, { cause: e });
	return new RouteWeatherError("NetworkError", e instanceof Error ? e.message : "Request failed", { cause: e });
}
