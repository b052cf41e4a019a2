import type { CurrentWeather } from "@/types";

export const OPENWEATHER_URL = "https://api.openweathermap.org/data/3.0/onecall";

/** Condition groups flagged as hazards, matched exactly against the provider's `main` field. */
export const HAZARD_CONDITIONS: readonly string[] = ["Thunderstorm", "Snow", "Squall", "Tornado"];

/** Lowercased description fragments that also flag a hazard. */
export const HAZARD_DESCRIPTION_TERMS: readonly string[] = ["heavy rain", "extreme"];

/** Values shipped in sample configs; treated the same as no key at all. */
export const PLACEHOLDER_API_KEYS: readonly string[] = ["YOUR_API_KEY_HERE", "Your_API_Key"];

/** Pool for simulated weather when no key is configured. */
export const SIMULATED_CONDITIONS: readonly Omit<CurrentWeather, "temperatureF">[] = [
	{ conditionName: "Clear", description: "clear sky" },
	{ conditionName: "Clouds", description: "broken clouds" },
	{ conditionName: "Rain", description: "light rain" },
	{ conditionName: "Thunderstorm", description: "thunderstorm with rain" },
	{ conditionName: "Rain", description: "heavy rain" },
];

export const SIMULATED_TEMPERATURE_RANGE_F = { min: 50, max: 85 } as const;
