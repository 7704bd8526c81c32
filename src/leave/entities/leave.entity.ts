import { User } from '../../user/entities/user.entity';
import { Column, Entity, PrimaryGeneratedColumn, ManyToOne, CreateDateColumn, UpdateDateColumn, JoinColumn, Index } from 'typeorm';
import { LeaveType, LeaveStatus } from '../../lib/enums/leave.enums';
import { AccessLevel } from '../../lib/enums/user.enums';

@Entity('leave')
@Index(['ownerUid', 'status'])
@Index(['campusUid', 'status'])
export class Leave {
	@PrimaryGeneratedColumn()
	uid!: number;

	@ManyToOne(() => User, (user) => user?.leaves)
	@JoinColumn({ name: 'ownerUid' })
	owner?: User;

	@Column({ type: 'int', nullable: false })
	ownerUid!: number;

	// Campus of the requester when the leave was filed; admins decide only for their own.
	@Column({ type: 'int', nullable: true })
	campusUid!: number | null;

	@Column({ type: 'enum', enum: AccessLevel })
	requesterAccessLevel!: AccessLevel;

	@Column({
		type: 'enum',
		enum: LeaveType,
	})
	leaveType!: LeaveType;

	@Column({ type: 'date' })
	startDate!: string;

	@Column({ type: 'date' })
	endDate!: string;

	@Column({ type: 'int' })
	duration!: number;

	@Column({ type: 'text', nullable: false })
	reason!: string;

	@Column({
		type: 'enum',
		enum: LeaveStatus,
		default: LeaveStatus.PENDING,
	})
	status!: LeaveStatus;

	@ManyToOne(() => User, { nullable: true, onDelete: 'SET NULL' })
	@JoinColumn({ name: 'approvedByUid' })
	approvedBy?: User | null;

	@Column({ type: 'int', nullable: true })
	approvedByUid!: number | null;

	@Column({ type: 'datetime', nullable: true })
	approvedAt!: Date | null;

	@Column({ type: 'datetime', nullable: true })
	rejectedAt!: Date | null;

	@Column({ type: 'text', nullable: true })
	rejectionReason!: string | null;

	@Column({ type: 'datetime', nullable: true })
	cancelledAt!: Date | null;

	@CreateDateColumn()
	createdAt!: Date;

	@UpdateDateColumn()
	updatedAt!: Date;
}
