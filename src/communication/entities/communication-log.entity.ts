import { Entity, Column, PrimaryGeneratedColumn, CreateDateColumn, Index } from 'typeorm';

@Entity('communication_logs')
@Index(['emailType', 'createdAt'])
export class CommunicationLog {
	@PrimaryGeneratedColumn()
	uid!: number;

	@Column('varchar', { nullable: false })
	emailType!: string;

	@Column('simple-array', { nullable: true })
	recipientEmails!: string[];

	@Column('simple-array', { nullable: true })
	accepted!: string[];

	@Column('simple-array', { nullable: true })
	rejected!: string[];

	@Column({ type: 'varchar', nullable: true })
	messageId!: string | null;

	@Column({ type: 'text', nullable: true })
	response!: string | null;

	@CreateDateColumn()
	createdAt!: Date;
}
