import { ApiProperty } from '@nestjs/swagger';
import { IsNumber, Max, Min } from 'class-validator';
import { GeoPoint } from '../interfaces/geo-point.interface';

export class GeoPointDto implements GeoPoint {
	@IsNumber({ allowNaN: false, allowInfinity: false })
	@Min(-90)
	@Max(90)
	@ApiProperty({ example: 28.6139, description: 'Latitude in degrees' })
	latitude!: number;

	@IsNumber({ allowNaN: false, allowInfinity: false })
	@Min(-180)
	@Max(180)
	@ApiProperty({ example: 77.209, description: 'Longitude in degrees' })
	longitude!: number;
}
