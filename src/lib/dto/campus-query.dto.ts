import { ApiProperty } from '@nestjs/swagger';
import { Type } from 'class-transformer';
import { IsInt, IsOptional, IsPositive } from 'class-validator';

export class CampusQueryDto {
	@IsOptional()
	@Type(() => Number)
	@IsInt()
	@IsPositive()
	@ApiProperty({ example: 1, description: 'Limit results to one campus', required: false })
	campusId?: number;
}
