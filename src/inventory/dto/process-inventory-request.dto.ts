import { ApiProperty } from '@nestjs/swagger';
import { IsIn } from 'class-validator';
import { InventoryRequestStatus } from '../../lib/enums/inventory.enums';

export type InventoryDecision = InventoryRequestStatus.APPROVED | InventoryRequestStatus.REJECTED;

export class ProcessInventoryRequestDto {
	@IsIn([InventoryRequestStatus.APPROVED, InventoryRequestStatus.REJECTED])
	@ApiProperty({ enum: [InventoryRequestStatus.APPROVED, InventoryRequestStatus.REJECTED] })
	status!: InventoryDecision;
}
