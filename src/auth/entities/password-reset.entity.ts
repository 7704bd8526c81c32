import { Column, CreateDateColumn, Entity, Index, PrimaryGeneratedColumn } from 'typeorm';

@Entity('password_reset')
@Index(['email', 'isUsed'])
export class PasswordReset {
	@PrimaryGeneratedColumn()
	uid!: number;

	@Column({ nullable: false })
	email!: string;

	@Column({ nullable: false })
	otpHash!: string;

	@Column({ type: 'datetime', nullable: false })
	otpExpires!: Date;

	@Column({ type: 'int', default: 0 })
	attempts!: number;

	@Column({ default: false })
	isVerified!: boolean;

	@Column({ default: false })
	isUsed!: boolean;

	@CreateDateColumn()
	createdAt!: Date;
}
