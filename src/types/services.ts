import type { Coordinate, GeocodedPlace, RouteResult } from "./route";
import type { CurrentWeather } from "./weather";

export interface Geocoder {
	/** Rejects with kind "NotFound" when nothing matches. */
	geocode(text: string, signal?: AbortSignal): Promise<GeocodedPlace>;
}

export interface Router {
	/** Rejects with kind "NoRoute" when the points cannot be connected. */
	route(from: Coordinate, to: Coordinate, signal?: AbortSignal): Promise<RouteResult>;
}

export interface WeatherFetcher {
	/** True when no usable credential was configured and results are synthetic. */
	readonly simulated: boolean;
	fetchCurrent(coords: Coordinate, signal?: AbortSignal): Promise<CurrentWeather>;
}
