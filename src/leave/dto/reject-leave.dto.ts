import { ApiProperty } from '@nestjs/swagger';
import { IsNotEmpty, IsString, MaxLength } from 'class-validator';

export class RejectLeaveDto {
	@IsString()
	@IsNotEmpty()
	@MaxLength(1000)
	@ApiProperty({ example: 'Exam duty scheduled for these dates' })
	reason!: string;
}
