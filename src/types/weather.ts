import type { RouteWeatherErrorKind } from "@/lib/errors";
import type { Coordinate, GeocodedPlace, RoutePoint, RouteResult } from "./route";

/** Current conditions at one coordinate, as reported by the weather provider. */
export interface CurrentWeather {
	/** Provider's condition group, e.g. "Thunderstorm" or "Clear". */
	conditionName: string;
	description: string;
	temperatureF: number;
}

export interface HazardAssessment {
	isHazard: boolean;
	message: string | null;
}

export interface WeatherPoint {
	coords: Coordinate;
	label: string;
	distanceMeters: number;
	conditionSummary: string;
	temperatureF: number | null;
	isHazard: boolean;
	hazardMessage: string | null;
	/** Set only when the weather lookup for this point failed. */
	errorKind: RouteWeatherErrorKind | null;
}

export interface RouteWeatherResult {
	start: GeocodedPlace;
	end: GeocodedPlace;
	route: RouteResult;
	samples: RoutePoint[];
	weatherPoints: WeatherPoint[];
	simulated: boolean;
}
