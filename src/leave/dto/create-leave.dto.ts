import { ApiProperty } from '@nestjs/swagger';
import { IsDateString, IsEnum, IsNotEmpty, IsString, Matches, MaxLength } from 'class-validator';
import { LeaveType } from '../../lib/enums/leave.enums';

export class CreateLeaveDto {
	@IsEnum(LeaveType)
	@ApiProperty({ enum: LeaveType, example: LeaveType.CASUAL })
	leaveType!: LeaveType;

	@IsDateString({ strict: true })
	@Matches(/^\d{4}-\d{2}-\d{2}$/, { message: '$property must be a YYYY-MM-DD date' })
	@ApiProperty({ example: '2024-03-11', description: 'First day of leave' })
	startDate!: string;

	@IsDateString({ strict: true })
	@Matches(/^\d{4}-\d{2}-\d{2}$/, { message: '$property must be a YYYY-MM-DD date' })
	@ApiProperty({ example: '2024-03-12', description: 'Last day of leave, inclusive' })
	endDate!: string;

	@IsString()
	@IsNotEmpty()
	@MaxLength(1000)
	@ApiProperty({ example: 'Family function' })
	reason!: string;
}
