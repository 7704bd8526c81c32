import { Column, CreateDateColumn, Entity, Index, OneToMany, PrimaryGeneratedColumn, UpdateDateColumn } from 'typeorm';
import { GeoPoint } from '../../lib/interfaces/geo-point.interface';
import { User } from '../../user/entities/user.entity';

@Entity('campus')
@Index(['isDeleted'])
export class Campus {
	@PrimaryGeneratedColumn()
	uid!: number;

	@Column({ nullable: false, unique: true })
	name!: string;

	// Closed implicitly: the last vertex connects back to the first.
	@Column({ type: 'json', nullable: false })
	boundary!: GeoPoint[];

	@Column({ type: 'varchar', nullable: true })
	address!: string | null;

	@Column({ nullable: false, default: false })
	isDeleted!: boolean;

	@CreateDateColumn()
	createdAt!: Date;

	@UpdateDateColumn()
	updatedAt!: Date;

	@OneToMany(() => User, (user) => user?.campus)
	users?: User[];
}
