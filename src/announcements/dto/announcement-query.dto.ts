import { ApiProperty } from '@nestjs/swagger';
import { IsOptional, IsString } from 'class-validator';

export class AnnouncementQueryDto {
	// Checked in the service so malformed dates get the documented message.
	@IsOptional()
	@IsString()
	@ApiProperty({ example: '2024-03-04', required: false, description: 'Only announcements posted on this day' })
	date?: string;
}
