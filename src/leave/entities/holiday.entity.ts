import { Column, CreateDateColumn, Entity, Index, PrimaryGeneratedColumn } from 'typeorm';
import { HolidayType } from '../../lib/enums/leave.enums';

@Entity('holiday')
@Index(['date'])
export class Holiday {
	@PrimaryGeneratedColumn()
	uid!: number;

	@Column({ type: 'date', nullable: false })
	date!: string;

	@Column({ nullable: false })
	name!: string;

	@Column({ type: 'enum', enum: HolidayType, default: HolidayType.GAZETTED })
	type!: HolidayType;

	@CreateDateColumn()
	createdAt!: Date;
}
