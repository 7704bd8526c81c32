import { GeoPointDto } from '../../lib/dto/geo-point.dto';

/** Current device position sent with punches and location pings. */
export class LocationDto extends GeoPointDto {}
