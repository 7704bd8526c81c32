import { Column, CreateDateColumn, Entity, Index, JoinColumn, ManyToOne, PrimaryGeneratedColumn, UpdateDateColumn } from 'typeorm';
import { Campus } from '../../campus/entities/campus.entity';

@Entity('inventory_item')
@Index(['campusUid', 'isDeleted'])
export class InventoryItem {
	@PrimaryGeneratedColumn()
	uid!: number;

	@Column({ nullable: false })
	name!: string;

	@Column({ nullable: false })
	category!: string;

	@Column({ type: 'int', unsigned: true, nullable: false, default: 0 })
	quantity!: number;

	@Column({ nullable: false, default: false })
	isDeleted!: boolean;

	@CreateDateColumn()
	createdAt!: Date;

	@UpdateDateColumn()
	updatedAt!: Date;

	// Relations
	@Column({ type: 'int', nullable: false })
	campusUid!: number;

	@ManyToOne(() => Campus)
	@JoinColumn({ name: 'campusUid' })
	campus?: Campus;
}
