/** Roughly 30 miles between weather checks. */
export const SAMPLING_INTERVAL_METERS = 48000;

export const REQUEST_TIMEOUT_MS = 10000;

export const OSRM_BASE = "https://router.project-osrm.org";

export const NOMINATIM_URL = "https://nominatim.openstreetmap.org/search";

export const USER_AGENT = "RouteWeather/0.1 (route weather checker)";
