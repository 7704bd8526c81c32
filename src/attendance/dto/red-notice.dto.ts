import { ApiProperty } from '@nestjs/swagger';
import { IsNotEmpty, IsString, MaxLength } from 'class-validator';

export class RedNoticeDto {
	@IsString()
	@IsNotEmpty()
	@MaxLength(1000)
	@ApiProperty({
		example: 'Repeatedly away from campus during working hours',
		description: 'Reason recorded on the employee profile',
	})
	reason!: string;
}
