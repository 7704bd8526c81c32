import { ApiProperty } from '@nestjs/swagger';
import { IsEnum, IsOptional } from 'class-validator';
import { InventoryRequestStatus } from '../../lib/enums/inventory.enums';

export class InventoryRequestQueryDto {
	@IsOptional()
	@IsEnum(InventoryRequestStatus)
	@ApiProperty({ enum: InventoryRequestStatus, required: false })
	status?: InventoryRequestStatus;
}
