import { ApiProperty } from '@nestjs/swagger';
import { Type } from 'class-transformer';
import { ArrayMinSize, IsArray, IsNotEmpty, IsOptional, IsString, MaxLength, ValidateNested } from 'class-validator';
import { GeoPointDto } from '../../lib/dto/geo-point.dto';

export class CreateCampusDto {
	@IsString()
	@IsNotEmpty()
	@MaxLength(120)
	@ApiProperty({ example: 'North Campus', description: 'Unique campus name' })
	name!: string;

	@IsArray()
	@ArrayMinSize(3)
	@ValidateNested({ each: true })
	@Type(() => GeoPointDto)
	@ApiProperty({
		type: [GeoPointDto],
		description: 'Polygon vertices in order; the last vertex connects back to the first',
		example: [
			{ latitude: 28.61, longitude: 77.2 },
			{ latitude: 28.61, longitude: 77.22 },
			{ latitude: 28.63, longitude: 77.22 },
			{ latitude: 28.63, longitude: 77.2 },
		],
	})
	boundary!: GeoPointDto[];

	@IsOptional()
	@IsString()
	@ApiProperty({ example: '1 University Road', required: false })
	address?: string;
}
