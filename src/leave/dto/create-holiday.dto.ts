import { ApiProperty } from '@nestjs/swagger';
import { IsDateString, IsEnum, IsNotEmpty, IsString, Matches, MaxLength } from 'class-validator';
import { HolidayType } from '../../lib/enums/leave.enums';

export class CreateHolidayDto {
	@IsDateString({ strict: true })
	@Matches(/^\d{4}-\d{2}-\d{2}$/, { message: '$property must be a YYYY-MM-DD date' })
	@ApiProperty({ example: '2024-08-15' })
	date!: string;

	@IsString()
	@IsNotEmpty()
	@MaxLength(120)
	@ApiProperty({ example: 'Independence Day' })
	name!: string;

	@IsEnum(HolidayType)
	@ApiProperty({ enum: HolidayType, example: HolidayType.GAZETTED })
	type!: HolidayType;
}
