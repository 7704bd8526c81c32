import { Column, CreateDateColumn, Entity, PrimaryGeneratedColumn } from 'typeorm';
import { AccessLevel } from '../../lib/enums/user.enums';

@Entity('pending_signup')
export class PendingSignup {
	@PrimaryGeneratedColumn()
	uid!: number;

	@Column({ unique: true, nullable: false })
	email!: string;

	// bcrypt hash of the chosen password
	@Column({ nullable: false })
	password!: string;

	@Column({ nullable: false })
	fullName!: string;

	@Column({ type: 'enum', enum: AccessLevel })
	accessLevel!: AccessLevel;

	@Column({ nullable: false })
	otpHash!: string;

	@Column({ type: 'datetime', nullable: false })
	otpExpires!: Date;

	@Column({ type: 'int', default: 0 })
	attempts!: number;

	@CreateDateColumn()
	createdAt!: Date;
}
