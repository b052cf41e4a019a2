export {
	SAMPLING_INTERVAL_METERS,
	REQUEST_TIMEOUT_MS,
	OSRM_BASE,
	NOMINATIM_URL,
	USER_AGENT,
} from "./routing";
export {
	OPENWEATHER_URL,
	HAZARD_CONDITIONS,
	HAZARD_DESCRIPTION_TERMS,
	PLACEHOLDER_API_KEYS,
	SIMULATED_CONDITIONS,
	SIMULATED_TEMPERATURE_RANGE_F,
} from "./weather";
