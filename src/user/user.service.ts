import { BadRequestException, HttpException, Injectable, Logger, NotFoundException } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { ConfigService } from '@nestjs/config';
import { FindOptionsWhere, Repository } from 'typeorm';
import { User } from './entities/user.entity';
import { Campus } from '../campus/entities/campus.entity';
import { UpdateProfileDto } from './dto/update-profile.dto';
import { UpdateUserDto } from './dto/update-user.dto';
import { AccessLevel, AccountStatus } from '../lib/enums/user.enums';
import { AuthenticatedUser } from '../lib/interfaces/authenticated-request.interface';
import { LeaveBalance, ProfileData } from '../lib/types/auth';
import { resolveCampusScope } from '../lib/utils/access-level.util';

export interface CreateUserInput {
	email: string;
	password: string;
	fullName: string;
	accessLevel: AccessLevel;
}

@Injectable()
export class UserService {
	private readonly logger = new Logger(UserService.name);

	constructor(
		@InjectRepository(User)
		private userRepository: Repository<User>,
		@InjectRepository(Campus)
		private campusRepository: Repository<Campus>,
		private readonly configService: ConfigService,
	) {}

	private leaveDefault(key: string, fallback: number): number {
		const value = parseInt(this.configService.get<string>(key) ?? '', 10);
		return Number.isNaN(value) ? fallback : value;
	}

	toProfile(user: User): ProfileData {
		return {
			uid: user.uid,
			employeeId: user.employeeId ?? null,
			email: user.email,
			fullName: user.fullName,
			accessLevel: user.accessLevel,
			status: user.status,
			campus: user.campus ? { uid: user.campus.uid, name: user.campus.name } : null,
			designation: user.designation ?? null,
			department: user.department ?? null,
			dateOfJoining: user.dateOfJoining ?? null,
			shift: user.shift ?? null,
			profilePicture: user.profilePicture ?? null,
			redNoticeIssued: user.redNoticeIssued,
		};
	}

	async findActiveByUid(uid: number): Promise<User | null> {
		return this.userRepository.findOne({
			where: { uid, status: AccountStatus.ACTIVE },
		});
	}

	async findOneByEmail(email: string): Promise<User | null> {
		return this.userRepository.findOne({ where: { email: email.toLowerCase() } });
	}

	/**
	 * The only lookup that loads the password hash.
	 */
	async findCredentialsByEmail(email: string): Promise<User | null> {
		return this.userRepository.findOne({
			where: { email: email.toLowerCase() },
			select: { uid: true, email: true, password: true, fullName: true, accessLevel: true, status: true },
		});
	}

	async create(input: CreateUserInput): Promise<User> {
		const user = this.userRepository.create({
			email: input.email.toLowerCase(),
			password: input.password,
			fullName: input.fullName,
			accessLevel: input.accessLevel,
			status: AccountStatus.ACTIVE,
			casualLeavesRemaining: this.leaveDefault('DEFAULT_CASUAL_LEAVES', 8),
			sickLeavesRemaining: this.leaveDefault('DEFAULT_SICK_LEAVES', 10),
			specialLeavesRemaining: this.leaveDefault('DEFAULT_SPECIAL_LEAVES', 2),
		});

		const saved = await this.userRepository.save(user);
		this.logger.log(`Created ${saved.accessLevel} account ${saved.uid} for ${saved.email}`);
		return saved;
	}

	async updatePassword(uid: number, passwordHash: string): Promise<void> {
		await this.userRepository.update({ uid }, { password: passwordHash });
	}

	async getProfile(uid: number): Promise<{ message: string; profile: ProfileData }> {
		const user = await this.userRepository.findOne({ where: { uid }, relations: { campus: true } });

		if (!user) {
			throw new NotFoundException('User not found');
		}

		return { message: 'Profile retrieved successfully', profile: this.toProfile(user) };
	}

	async updateProfile(uid: number, updateProfileDto: UpdateProfileDto): Promise<{ message: string; profile: ProfileData }> {
		const changes: Partial<Pick<User, 'fullName' | 'profilePicture'>> = {};

		if (updateProfileDto.fullName !== undefined) changes.fullName = updateProfileDto.fullName.trim();
		if (updateProfileDto.profilePicture !== undefined) changes.profilePicture = updateProfileDto.profilePicture;

		if (Object.keys(changes).length === 0) {
			throw new BadRequestException('Nothing to update');
		}

		await this.userRepository.update({ uid }, changes);
		const { profile } = await this.getProfile(uid);

		return { message: 'Profile updated successfully', profile };
	}

	async getLeaveBalance(uid: number): Promise<{ message: string; balance: LeaveBalance }> {
		const user = await this.userRepository.findOne({ where: { uid } });

		if (!user) {
			throw new NotFoundException('User not found');
		}

		return {
			message: 'Leave balance retrieved successfully',
			balance: {
				casual: user.casualLeavesRemaining,
				sick: user.sickLeavesRemaining,
				special: user.specialLeavesRemaining,
			},
		};
	}

	async findAll(requester: AuthenticatedUser, campusId?: number): Promise<{ message: string; users: ProfileData[] }> {
		const scopedCampus = resolveCampusScope(requester, campusId);
		const where: FindOptionsWhere<User> = {};

		if (scopedCampus !== undefined) {
			where.campusUid = scopedCampus;
		}

		const users = await this.userRepository.find({
			where,
			relations: { campus: true },
			order: { fullName: 'ASC' },
		});

		return { message: 'Users retrieved successfully', users: users.map((user) => this.toProfile(user)) };
	}

	async adminUpdate(uid: number, updateUserDto: UpdateUserDto): Promise<{ message: string; profile: ProfileData }> {
		try {
			const user = await this.userRepository.findOne({ where: { uid } });

			if (!user) {
				throw new NotFoundException('User not found');
			}

			if (updateUserDto.campusUid !== undefined) {
				const campus = await this.campusRepository.findOne({
					where: { uid: updateUserDto.campusUid, isDeleted: false },
				});

				if (!campus) {
					throw new NotFoundException(`Campus ${updateUserDto.campusUid} not found`);
				}
			}

			const { campusUid, ...fields } = updateUserDto;
			await this.userRepository.update({ uid }, { ...fields, ...(campusUid !== undefined ? { campusUid } : {}) });

			this.logger.log(`User ${uid} updated: ${Object.keys(updateUserDto).join(', ')}`);

			const { profile } = await this.getProfile(uid);
			return { message: 'User updated successfully', profile };
		} catch (error) {
			if (error instanceof HttpException) {
				throw error;
			}
			// Duplicate employee ids surface here
			this.logger.error(`Failed to update user ${uid}`, error instanceof Error ? error.stack : undefined);
			throw new BadRequestException(error instanceof Error ? error.message : 'Failed to update user');
		}
	}
}
