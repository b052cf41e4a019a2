import { createNominatimGeocoder, createOsrmRouter, createWeatherFetcher } from "@/api";
import type { AppConfig } from "@/config";
import type { RouteWeatherDeps } from "@/lib/routeWeather";

/** Wire the HTTP collaborators for the given configuration. */
export function createServices(config: AppConfig): RouteWeatherDeps {
	return {
		geocoder: createNominatimGeocoder(config),
		router: createOsrmRouter(config),
		weather: createWeatherFetcher(config),
	};
}
