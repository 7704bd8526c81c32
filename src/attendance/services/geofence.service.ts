import { Injectable, Logger } from '@nestjs/common';
import { CampusService } from '../../campus/campus.service';
import { Campus } from '../../campus/entities/campus.entity';
import { GeoPoint } from '../../lib/interfaces/geo-point.interface';
import { GeofenceUtils } from '../../lib/utils/geofence.utils';

/**
 * Resolves coordinates against the campus registry. Campuses are tried in registration
 * order, so where boundaries overlap the earliest registered campus wins.
 */
@Injectable()
export class GeofenceService {
	private readonly logger = new Logger(GeofenceService.name);

	constructor(private readonly campusService: CampusService) {}

	async findContainingCampus(point: GeoPoint): Promise<Campus | null> {
		const campuses = await this.campusService.getActiveCampuses();
		const campus = campuses.find((candidate) => GeofenceUtils.isPointInPolygon(point, candidate.boundary)) ?? null;

		this.logger.debug(
			`(${point.latitude}, ${point.longitude}) matched ${campus ? `campus ${campus.uid}` : 'no campus'} of ${campuses.length}`,
		);

		return campus;
	}

	/**
	 * A campus removed after the punch-in no longer contains anything, so pings against it
	 * count as outside.
	 */
	async isInsideCampus(point: GeoPoint, campusUid: number): Promise<boolean> {
		const campus = await this.campusService.findActiveByUid(campusUid);

		if (!campus) {
			this.logger.warn(`Campus ${campusUid} is missing or removed; treating location as outside`);
			return false;
		}

		return GeofenceUtils.isPointInPolygon(point, campus.boundary);
	}
}
