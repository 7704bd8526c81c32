import { Column, CreateDateColumn, Entity, Index, JoinColumn, ManyToOne, PrimaryGeneratedColumn } from 'typeorm';
import { AnnouncementLevel } from '../../lib/enums/announcement.enums';
import { Campus } from '../../campus/entities/campus.entity';
import { User } from '../../user/entities/user.entity';

@Entity('announcement')
@Index(['level', 'createdAt'])
@Index(['campusUid', 'createdAt'])
export class Announcement {
	@PrimaryGeneratedColumn()
	uid!: number;

	@Column({ nullable: false })
	title!: string;

	@Column({ type: 'text', nullable: false })
	description!: string;

	@Column({ type: 'enum', enum: AnnouncementLevel })
	level!: AnnouncementLevel;

	@CreateDateColumn()
	createdAt!: Date;

	// Relations
	@Column({ type: 'int', nullable: true })
	campusUid!: number | null;

	@ManyToOne(() => Campus, { nullable: true })
	@JoinColumn({ name: 'campusUid' })
	campus?: Campus | null;

	@Column({ type: 'int', nullable: false })
	authorUid!: number;

	@ManyToOne(() => User)
	@JoinColumn({ name: 'authorUid' })
	author?: User;
}
