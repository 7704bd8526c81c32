import { ApiProperty } from '@nestjs/swagger';
import { Type } from 'class-transformer';
import { IsEnum, IsInt, IsNotEmpty, IsOptional, IsPositive, IsString, MaxLength } from 'class-validator';
import { AnnouncementLevel } from '../../lib/enums/announcement.enums';

export class CreateAnnouncementDto {
	@IsString()
	@IsNotEmpty()
	@MaxLength(200)
	@ApiProperty({ example: 'Convocation schedule' })
	title!: string;

	@IsString()
	@IsNotEmpty()
	@ApiProperty({ example: 'The convocation will be held in the main auditorium.' })
	description!: string;

	@IsEnum(AnnouncementLevel)
	@ApiProperty({ enum: AnnouncementLevel, example: AnnouncementLevel.CAMPUS })
	level!: AnnouncementLevel;

	@IsOptional()
	@Type(() => Number)
	@IsInt()
	@IsPositive()
	@ApiProperty({ example: 1, required: false, description: 'Target campus of a campus announcement' })
	campusUid?: number;
}
