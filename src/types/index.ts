export type { Coordinate, GeocodedPlace, Polyline, RoutePoint, RouteResult } from "./route";
export type { CurrentWeather, HazardAssessment, RouteWeatherResult, WeatherPoint } from "./weather";
export type { Geocoder, Router, WeatherFetcher } from "./services";
