import { ApiProperty } from '@nestjs/swagger';
import { IsNotEmpty, IsOptional, IsString, IsUrl, MaxLength } from 'class-validator';

export class UpdateProfileDto {
	@IsOptional()
	@IsString()
	@IsNotEmpty()
	@MaxLength(120)
	@ApiProperty({ example: 'Asha Verma', description: 'Display name', required: false })
	fullName?: string;

	@IsOptional()
	@IsUrl()
	@ApiProperty({
		example: 'https://cdn.university.edu/profiles/asha.png',
		description: 'Link to the profile picture',
		required: false,
	})
	profilePicture?: string;
}
