import {
	NOMINATIM_URL,
	OPENWEATHER_URL,
	OSRM_BASE,
	PLACEHOLDER_API_KEYS,
	REQUEST_TIMEOUT_MS,
	SAMPLING_INTERVAL_METERS,
} from "@/constants";

export interface AppConfig {
	/** null means no usable key; the weather fetcher then simulates data. */
	weatherApiKey: string | null;
	openWeatherUrl: string;
	osrmUrl: string;
	nominatimUrl: string;
	samplingIntervalMeters: number;
	requestTimeoutMs: number;
}

type Env = Readonly<Record<string, unknown>>;

function readString(env: Env, key: string): string | undefined {
	const value = env[key];
	if (typeof value !== "string") return undefined;
	const trimmed = value.trim();
	return trimmed || undefined;
}

function readPositiveNumber(env: Env, key: string, fallback: number): number {
	const raw = readString(env, key);
	if (raw === undefined) return fallback;
	const n = Number(raw);
	if (!Number.isFinite(n) || n <= 0) {
		console.warn(`[config] Ignoring ${key}=${raw}; using ${fallback}`);
		return fallback;
	}
	return n;
}

export function isUsableApiKey(key: string): boolean {
	const trimmed = key.trim();
	return trimmed !== "" && !PLACEHOLDER_API_KEYS.includes(trimmed);
}

/** Build the app configuration from Vite's `import.meta.env` (or any env-like record). */
export function loadConfig(env: Env): AppConfig {
	const key = readString(env, "VITE_OPENWEATHER_API_KEY");
	return Object.freeze({
		weatherApiKey: key !== undefined && isUsableApiKey(key) ? key : null,
		openWeatherUrl: readString(env, "VITE_OPENWEATHER_URL") ?? OPENWEATHER_URL,
		osrmUrl: (readString(env, "VITE_OSRM_URL") ?? OSRM_BASE).replace(/\/+$/, ""),
		nominatimUrl: readString(env, "VITE_NOMINATIM_URL") ?? NOMINATIM_URL,
		samplingIntervalMeters: readPositiveNumber(env, "VITE_SAMPLING_INTERVAL_METERS", SAMPLING_INTERVAL_METERS),
		requestTimeoutMs: readPositiveNumber(env, "VITE_REQUEST_TIMEOUT_MS", REQUEST_TIMEOUT_MS),
	});
}
