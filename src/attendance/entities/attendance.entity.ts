import { Campus } from '../../campus/entities/campus.entity';
import { AttendanceStatus } from '../../lib/enums/attendance.enums';
import { User } from '../../user/entities/user.entity';
import { Column, CreateDateColumn, Entity, Index, JoinColumn, ManyToOne, PrimaryGeneratedColumn, UpdateDateColumn } from 'typeorm';

/**
 * One record per employee per calendar day. `date` is the day in the configured attendance
 * timezone, so the unique index is what stops a second punch-in for the same day.
 */
@Entity('attendance')
@Index(['ownerUid', 'date'], { unique: true })
@Index(['date', 'totalOutOfBoundsMinutes'])
@Index(['punchInCampusUid', 'date'])
export class Attendance {
	@PrimaryGeneratedColumn()
	uid!: number;

	@Column({ type: 'date', nullable: false })
	date!: string;

	@Column({
		type: 'enum',
		enum: AttendanceStatus,
		default: AttendanceStatus.PRESENT,
	})
	status!: AttendanceStatus;

	@Column({ type: 'datetime', precision: 3, nullable: false })
	punchIn!: Date;

	@Column({ type: 'datetime', precision: 3, nullable: true })
	punchOut!: Date | null;

	@Column({ type: 'double', nullable: false })
	punchInLatitude!: number;

	@Column({ type: 'double', nullable: false })
	punchInLongitude!: number;

	@Column({ type: 'double', nullable: true })
	punchOutLatitude!: number | null;

	@Column({ type: 'double', nullable: true })
	punchOutLongitude!: number | null;

	@Column({ type: 'double', nullable: true })
	totalHours!: number | null;

	// Only ever advanced through Repository.increment.
	@Column({ type: 'double', nullable: false, default: 0 })
	totalOutOfBoundsMinutes!: number;

	@Column({ type: 'datetime', precision: 3, nullable: true })
	exitTime!: Date | null;

	@Column({ type: 'datetime', precision: 3, nullable: true })
	lastPingAt!: Date | null;

	@CreateDateColumn()
	createdAt!: Date;

	@UpdateDateColumn()
	updatedAt!: Date;

	// Relations
	@Column({ type: 'int', nullable: false })
	ownerUid!: number;

	@ManyToOne(() => User, (user) => user?.attendance)
	@JoinColumn({ name: 'ownerUid' })
	owner?: User;

	@Column({ type: 'int', nullable: false })
	punchInCampusUid!: number;

	@ManyToOne(() => Campus)
	@JoinColumn({ name: 'punchInCampusUid' })
	punchInCampus?: Campus;

	@Column({ type: 'int', nullable: true })
	punchOutCampusUid!: number | null;

	@ManyToOne(() => Campus, { nullable: true })
	@JoinColumn({ name: 'punchOutCampusUid' })
	punchOutCampus?: Campus | null;
}
