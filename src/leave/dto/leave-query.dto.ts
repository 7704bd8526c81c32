import { ApiProperty } from '@nestjs/swagger';
import { IsEnum, IsOptional } from 'class-validator';
import { LeaveStatus } from '../../lib/enums/leave.enums';

export class LeaveQueryDto {
	@IsOptional()
	@IsEnum(LeaveStatus)
	@ApiProperty({ enum: LeaveStatus, required: false })
	status?: LeaveStatus;
}
