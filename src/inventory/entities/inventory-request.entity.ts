import { Column, CreateDateColumn, Entity, Index, JoinColumn, ManyToOne, PrimaryGeneratedColumn } from 'typeorm';
import { InventoryRequestStatus } from '../../lib/enums/inventory.enums';
import { User } from '../../user/entities/user.entity';
import { InventoryItem } from './inventory-item.entity';

@Entity('inventory_request')
@Index(['requesterUid', 'status'])
@Index(['itemUid', 'status'])
export class InventoryRequest {
	@PrimaryGeneratedColumn()
	uid!: number;

	@Column({ type: 'int', nullable: false })
	requestedQuantity!: number;

	@Column({ type: 'text', nullable: false })
	reason!: string;

	@Column({ type: 'enum', enum: InventoryRequestStatus, default: InventoryRequestStatus.PENDING })
	status!: InventoryRequestStatus;

	@Column({ type: 'int', nullable: true })
	processedByUid!: number | null;

	@Column({ type: 'datetime', nullable: true })
	processedAt!: Date | null;

	@CreateDateColumn()
	createdAt!: Date;

	// Relations
	@Column({ type: 'int', nullable: false })
	requesterUid!: number;

	@ManyToOne(() => User)
	@JoinColumn({ name: 'requesterUid' })
	requester?: User;

	@Column({ type: 'int', nullable: false })
	itemUid!: number;

	@ManyToOne(() => InventoryItem)
	@JoinColumn({ name: 'itemUid' })
	item?: InventoryItem;
}
