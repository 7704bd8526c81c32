import { AccessLevel, AccountStatus } from '../../lib/enums/user.enums';
import { Campus } from '../../campus/entities/campus.entity';
import { Attendance } from '../../attendance/entities/attendance.entity';
import { Leave } from '../../leave/entities/leave.entity';
import {
	Entity,
	Column,
	PrimaryGeneratedColumn,
	CreateDateColumn,
	UpdateDateColumn,
	ManyToOne,
	JoinColumn,
	OneToMany,
	Index,
} from 'typeorm';

@Entity('users')
@Index(['accessLevel', 'status'])
@Index(['campusUid', 'status'])
export class User {
	@PrimaryGeneratedColumn()
	uid!: number;

	@Column({ type: 'varchar', nullable: true, unique: true })
	employeeId!: string | null;

	@Column({ unique: true, nullable: false })
	email!: string;

	@Column({ nullable: false, select: false })
	password!: string;

	@Column({ nullable: false })
	fullName!: string;

	@Column({ type: 'enum', enum: AccessLevel, default: AccessLevel.EMPLOYEE })
	accessLevel!: AccessLevel;

	@Column({ type: 'enum', enum: AccountStatus, default: AccountStatus.ACTIVE })
	status!: AccountStatus;

	@Column({ type: 'varchar', nullable: true })
	designation!: string | null;

	@Column({ type: 'varchar', nullable: true })
	department!: string | null;

	@Column({ type: 'date', nullable: true })
	dateOfJoining!: string | null;

	@Column({ type: 'varchar', nullable: true })
	shift!: string | null;

	@Column({ type: 'varchar', nullable: true })
	profilePicture!: string | null;

	@Column({ type: 'int', default: 0 })
	casualLeavesRemaining!: number;

	@Column({ type: 'int', default: 0 })
	sickLeavesRemaining!: number;

	@Column({ type: 'int', default: 0 })
	specialLeavesRemaining!: number;

	@Column({ default: false })
	redNoticeIssued!: boolean;

	@Column({ type: 'text', nullable: true })
	redNoticeReason!: string | null;

	@Column({ type: 'datetime', nullable: true })
	redNoticeIssuedAt!: Date | null;

	@Column({ type: 'int', nullable: true })
	redNoticeIssuedByUid!: number | null;

	@CreateDateColumn()
	createdAt!: Date;

	@UpdateDateColumn()
	updatedAt!: Date;

	// Relations
	@Column({ type: 'int', nullable: true })
	campusUid!: number | null;

	@ManyToOne(() => Campus, (campus) => campus?.users, { nullable: true })
	@JoinColumn({ name: 'campusUid' })
	campus?: Campus | null;

	@OneToMany(() => Attendance, (attendance) => attendance?.owner)
	attendance?: Attendance[];

	@OneToMany(() => Leave, (leave) => leave?.owner)
	leaves?: Leave[];
}
