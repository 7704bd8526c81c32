import { GeoPoint } from '../interfaces/geo-point.interface';

const EPSILON = 1e-9;

/**
 * Planar polygon helpers for campus boundaries. Latitude is the y axis, longitude the x axis.
 */
export class GeofenceUtils {
	static isValidBoundary(boundary: readonly GeoPoint[] | null | undefined): boolean {
		if (!boundary || boundary.length < 3) {
			return false;
		}

		const finite = boundary.every(
			(vertex) => Number.isFinite(vertex?.latitude) && Number.isFinite(vertex?.longitude),
		);

		return finite && Math.abs(this.signedArea(boundary)) > EPSILON;
	}

	/**
	 * Ray-casting containment test. Points on an edge or vertex count as inside.
	 * Degenerate boundaries (fewer than three vertices, non-finite coordinates, zero area)
	 * never contain anything.
	 */
	static isPointInPolygon(point: GeoPoint, boundary: readonly GeoPoint[] | null | undefined): boolean {
		if (!Number.isFinite(point?.latitude) || !Number.isFinite(point?.longitude)) {
			return false;
		}

		if (!boundary || !this.isValidBoundary(boundary)) {
			return false;
		}

		let inside = false;

		for (let i = 0, j = boundary.length - 1; i < boundary.length; j = i++) {
			const current = boundary[i];
			const previous = boundary[j];

			if (this.isPointOnSegment(point, previous, current)) {
				return true;
			}

			const crossesLatitude = current.latitude > point.latitude !== previous.latitude > point.latitude;

			if (crossesLatitude) {
				const edgeLongitude =
					((previous.longitude - current.longitude) * (point.latitude - current.latitude)) /
						(previous.latitude - current.latitude) +
					current.longitude;

				if (point.longitude < edgeLongitude) {
					inside = !inside;
				}
			}
		}

		return inside;
	}

	static isPointOnSegment(point: GeoPoint, start: GeoPoint, end: GeoPoint): boolean {
		const cross =
			(point.latitude - start.latitude) * (end.longitude - start.longitude) -
			(point.longitude - start.longitude) * (end.latitude - start.latitude);

		if (Math.abs(cross) > EPSILON) {
			return false;
		}

		return (
			point.latitude >= Math.min(start.latitude, end.latitude) - EPSILON &&
			point.latitude <= Math.max(start.latitude, end.latitude) + EPSILON &&
			point.longitude >= Math.min(start.longitude, end.longitude) - EPSILON &&
			point.longitude <= Math.max(start.longitude, end.longitude) + EPSILON
		);
	}

	// Shoelace formula; the sign depends on vertex winding.
	static signedArea(boundary: readonly GeoPoint[]): number {
		let area = 0;

		for (let i = 0, j = boundary.length - 1; i < boundary.length; j = i++) {
			area += boundary[j].longitude * boundary[i].latitude - boundary[i].longitude * boundary[j].latitude;
		}

		return area / 2;
	}
}
