import { ApiProperty } from '@nestjs/swagger';
import { Type } from 'class-transformer';
import { IsInt, IsNotEmpty, IsOptional, IsPositive, IsString, MaxLength, Min } from 'class-validator';

export class CreateInventoryItemDto {
	@IsString()
	@IsNotEmpty()
	@MaxLength(120)
	@ApiProperty({ example: 'Projector' })
	name!: string;

	@IsString()
	@IsNotEmpty()
	@MaxLength(60)
	@ApiProperty({ example: 'Electronics' })
	category!: string;

	@Type(() => Number)
	@IsInt()
	@Min(0)
	@ApiProperty({ example: 12, description: 'Units in stock' })
	quantity!: number;

	@IsOptional()
	@Type(() => Number)
	@IsInt()
	@IsPositive()
	@ApiProperty({ example: 1, required: false, description: 'Owning campus; admins default to their own' })
	campusUid?: number;
}
