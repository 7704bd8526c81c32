import { ApiProperty } from '@nestjs/swagger';
import { Type } from 'class-transformer';
import { IsInt, IsNotEmpty, IsPositive, IsString, MaxLength } from 'class-validator';

export class CreateInventoryRequestDto {
	@Type(() => Number)
	@IsInt()
	@IsPositive()
	@ApiProperty({ example: 3 })
	itemUid!: number;

	@Type(() => Number)
	@IsInt()
	@IsPositive()
	@ApiProperty({ example: 2 })
	quantity!: number;

	@IsString()
	@IsNotEmpty()
	@MaxLength(500)
	@ApiProperty({ example: 'Seminar hall setup' })
	reason!: string;
}
