import { ApiProperty } from '@nestjs/swagger';
import { IsDateString, Matches, IsEnum, IsInt, IsOptional, IsPositive, IsString, MaxLength } from 'class-validator';
import { AccessLevel, AccountStatus } from '../../lib/enums/user.enums';

export class UpdateUserDto {
	@IsOptional()
	@IsInt()
	@IsPositive()
	@ApiProperty({ example: 2, description: 'Campus the user works at', required: false })
	campusUid?: number;

	@IsOptional()
	@IsString()
	@MaxLength(40)
	@ApiProperty({ example: 'EMP-0042', required: false })
	employeeId?: string;

	@IsOptional()
	@IsString()
	@ApiProperty({ example: 'Assistant Professor', required: false })
	designation?: string;

	@IsOptional()
	@IsString()
	@ApiProperty({ example: 'Computer Science', required: false })
	department?: string;

	@IsOptional()
	@IsString()
	@ApiProperty({ example: 'Morning (08:00 - 16:00)', required: false })
	shift?: string;

	@IsOptional()
	@IsDateString({ strict: true })
	@Matches(/^\d{4}-\d{2}-\d{2}$/, { message: '$property must be a YYYY-MM-DD date' })
	@ApiProperty({ example: '2023-07-01', required: false })
	dateOfJoining?: string;

	@IsOptional()
	@IsEnum(AccessLevel)
	@ApiProperty({ enum: AccessLevel, required: false })
	accessLevel?: AccessLevel;

	@IsOptional()
	@IsEnum(AccountStatus)
	@ApiProperty({ enum: AccountStatus, required: false })
	status?: AccountStatus;
}
