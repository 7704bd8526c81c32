import { ApiProperty } from '@nestjs/swagger';
import { Type } from 'class-transformer';
import { IsDateString, Matches, IsEnum, IsInt, IsOptional, IsPositive } from 'class-validator';
import { AttendancePeriod, AttendanceStatus } from '../../lib/enums/attendance.enums';

export class MyAttendanceQueryDto {
	@IsOptional()
	@IsEnum(AttendancePeriod)
	@ApiProperty({ enum: AttendancePeriod, default: AttendancePeriod.DAILY, required: false })
	period?: AttendancePeriod;

	@IsOptional()
	@IsEnum(AttendanceStatus)
	@ApiProperty({ enum: AttendanceStatus, required: false })
	status?: AttendanceStatus;
}

export class CampusAttendanceQueryDto {
	@IsOptional()
	@Type(() => Number)
	@IsInt()
	@IsPositive()
	@ApiProperty({ example: 1, required: false, description: 'Campus filter (super admins only)' })
	campusId?: number;

	@IsOptional()
	@IsDateString({ strict: true })
	@Matches(/^\d{4}-\d{2}-\d{2}$/, { message: '$property must be a YYYY-MM-DD date' })
	@ApiProperty({ example: '2024-03-04', required: false, description: 'Day to report, defaults to today' })
	date?: string;
}
