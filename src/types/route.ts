/** [lng, lat], the order OSRM and GeoJSON use. */
export type Coordinate = readonly [number, number];

/** Ordered path of a route, at least two vertices. */
export type Polyline = readonly Coordinate[];

/** Point on a polyline with its distance from the first vertex. */
export interface RoutePoint {
	coords: Coordinate;
	distanceMeters: number;
}

export interface GeocodedPlace {
	name: string;
	coords: Coordinate;
	address?: string;
}

export interface RouteResult {
	polyline: Polyline;
	totalDistanceMeters: number;
	durationSeconds?: number;
}
