export { fetchJson, type FetchJsonOptions, type JsonResponse } from "./http";
export { createNominatimGeocoder, parseNominatimResult } from "./nominatim";
export { createOsrmRouter, parseOsrmRoute } from "./osrm";
export { createWeatherFetcher, parseOneCallCurrent, simulateWeather, type RandomSource } from "./openweather";
