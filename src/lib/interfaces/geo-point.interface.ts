export interface GeoPoint {
	latitude: number;
	longitude: number;
}
