import {
	BadRequestException,
	ForbiddenException,
	HttpException,
	Injectable,
	Logger,
	NotFoundException,
} from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { EventEmitter2 } from '@nestjs/event-emitter';
import { DataSource, FindOptionsWhere, In, LessThanOrEqual, MoreThanOrEqual, Repository } from 'typeorm';
import { Leave } from './entities/leave.entity';
import { User } from '../user/entities/user.entity';
import { CreateLeaveDto } from './dto/create-leave.dto';
import { LeaveQueryDto } from './dto/leave-query.dto';
import { LeaveStatus, LeaveType } from '../lib/enums/leave.enums';
import { AccessLevel } from '../lib/enums/user.enums';
import { EmailType } from '../lib/enums/email.enums';
import { AuthenticatedUser } from '../lib/interfaces/authenticated-request.interface';
import { LeaveView } from '../lib/types/leave';
import { EmailTemplateData } from '../lib/types/email-templates.types';
import { DateRangeUtil } from '../lib/utils/date-range.util';

type LeaveBalanceColumn = 'casualLeavesRemaining' | 'sickLeavesRemaining' | 'specialLeavesRemaining';

// Unpaid leave draws on no balance.
const BALANCE_COLUMNS: Record<LeaveType, LeaveBalanceColumn | null> = {
	[LeaveType.CASUAL]: 'casualLeavesRemaining',
	[LeaveType.SICK]: 'sickLeavesRemaining',
	[LeaveType.SPECIAL]: 'specialLeavesRemaining',
	[LeaveType.UNPAID]: null,
};

@Injectable()
export class LeaveService {
	private readonly logger = new Logger(LeaveService.name);

	constructor(
		@InjectRepository(Leave)
		private leaveRepository: Repository<Leave>,
		@InjectRepository(User)
		private userRepository: Repository<User>,
		private readonly dataSource: DataSource,
		private readonly eventEmitter: EventEmitter2,
	) {}

	private toView(leave: Leave): LeaveView {
		return {
			uid: leave.uid,
			employee_id: leave.ownerUid,
			name: leave.owner?.fullName ?? null,
			leave_type: leave.leaveType,
			start_date: leave.startDate,
			end_date: leave.endDate,
			duration: leave.duration,
			reason: leave.reason,
			status: leave.status,
			rejection_reason: leave.rejectionReason,
		};
	}

	async apply(user: AuthenticatedUser, createLeaveDto: CreateLeaveDto): Promise<{ message: string; leave: LeaveView }> {
		const { leaveType, startDate, endDate } = createLeaveDto;

		if (!DateRangeUtil.isCalendarDate(startDate) || !DateRangeUtil.isCalendarDate(endDate)) {
			throw new BadRequestException('Dates must be valid YYYY-MM-DD dates');
		}

		if (endDate < startDate) {
			throw new BadRequestException('End date cannot be before start date');
		}

		const overlapping = await this.leaveRepository.count({
			where: {
				ownerUid: user.uid,
				status: In([LeaveStatus.PENDING, LeaveStatus.APPROVED]),
				startDate: LessThanOrEqual(endDate),
				endDate: MoreThanOrEqual(startDate),
			},
		});

		if (overlapping > 0) {
			throw new BadRequestException('You already have a pending or approved leave covering these dates');
		}

		const duration = DateRangeUtil.inclusiveDays(startDate, endDate);
		const column = BALANCE_COLUMNS[leaveType];

		if (column) {
			const owner = await this.userRepository.findOne({ where: { uid: user.uid } });

			if (!owner) {
				throw new NotFoundException('User not found');
			}

			if (owner[column] < duration) {
				throw new BadRequestException(
					`Insufficient ${leaveType.toLowerCase()} leave balance: ${owner[column]} day(s) left, ${duration} requested`,
				);
			}
		}

		const leave = await this.leaveRepository.save(
			this.leaveRepository.create({
				ownerUid: user.uid,
				campusUid: user.campusUid,
				requesterAccessLevel: user.role,
				leaveType,
				startDate,
				endDate,
				duration,
				reason: createLeaveDto.reason.trim(),
				status: LeaveStatus.PENDING,
			}),
		);

		this.logger.log(`User ${user.uid} applied for ${duration} day(s) of ${leaveType} leave from ${startDate}`);
		return { message: 'Leave request submitted successfully', leave: this.toView(leave) };
	}

	async getMine(user: AuthenticatedUser, query: LeaveQueryDto): Promise<{ message: string; leaves: LeaveView[] }> {
		const where: FindOptionsWhere<Leave> = { ownerUid: user.uid };

		if (query.status) {
			where.status = query.status;
		}

		const leaves = await this.leaveRepository.find({ where, order: { startDate: 'DESC' } });
		return { message: 'Leaves retrieved successfully', leaves: leaves.map((leave) => this.toView(leave)) };
	}

	async cancel(user: AuthenticatedUser, leaveUid: number): Promise<{ message: string }> {
		const result = await this.leaveRepository.update(
			{ uid: leaveUid, ownerUid: user.uid, status: LeaveStatus.PENDING },
			{ status: LeaveStatus.CANCELLED, cancelledAt: new Date() },
		);

		if (!result.affected) {
			const leave = await this.leaveRepository.findOne({ where: { uid: leaveUid, ownerUid: user.uid } });

			if (!leave) {
				throw new NotFoundException('Leave request not found.');
			}

			throw new BadRequestException(`Only pending leave can be cancelled; this one is ${leave.status}`);
		}

		return { message: 'Leave request cancelled' };
	}

	/**
	 * Admins decide on employee requests filed at their campus; super admins decide on
	 * requests filed by admins.
	 */
	private decisionScope(user: AuthenticatedUser): FindOptionsWhere<Leave> {
		if (user.role === AccessLevel.SUPER_ADMIN) {
			return { requesterAccessLevel: AccessLevel.ADMIN };
		}

		if (user.role === AccessLevel.ADMIN && user.campusUid !== null) {
			return { requesterAccessLevel: AccessLevel.EMPLOYEE, campusUid: user.campusUid };
		}

		throw new ForbiddenException('You cannot decide on leave requests');
	}

	private canDecide(user: AuthenticatedUser, leave: Leave): boolean {
		const scope = this.decisionScope(user);
		return (
			scope.requesterAccessLevel === leave.requesterAccessLevel &&
			(scope.campusUid === undefined || scope.campusUid === leave.campusUid)
		);
	}

	async getPending(user: AuthenticatedUser): Promise<{ message: string; leaves: LeaveView[] }> {
		const leaves = await this.leaveRepository.find({
			where: { ...this.decisionScope(user), status: LeaveStatus.PENDING },
			relations: { owner: true },
			order: { createdAt: 'ASC' },
		});

		return { message: 'Pending leave requests retrieved successfully', leaves: leaves.map((leave) => this.toView(leave)) };
	}

	private async loadForDecision(user: AuthenticatedUser, leaveUid: number): Promise<Leave> {
		const leave = await this.leaveRepository.findOne({ where: { uid: leaveUid }, relations: { owner: true } });

		if (!leave) {
			throw new NotFoundException('Leave request not found.');
		}

		if (!this.canDecide(user, leave)) {
			throw new ForbiddenException('You cannot decide on this leave request');
		}

		if (leave.status !== LeaveStatus.PENDING) {
			throw new BadRequestException(`Leave request is already ${leave.status}`);
		}

		return leave;
	}

	private notifyDecision(leave: Leave, status: LeaveStatus, rejectionReason: string | null): void {
		if (!leave.owner) {
			return;
		}

		const data: EmailTemplateData<EmailType.LEAVE_STATUS_UPDATE> = {
			name: leave.owner.fullName,
			leaveType: leave.leaveType,
			startDate: leave.startDate,
			endDate: leave.endDate,
			duration: leave.duration,
			status,
			rejectionReason,
		};
		this.eventEmitter.emit('send.email', EmailType.LEAVE_STATUS_UPDATE, [leave.owner.email], data);
	}

	/**
	 * Approves the request and deducts the balance in one transaction. The deduction only
	 * applies while the balance still covers the duration.
	 */
	async approve(user: AuthenticatedUser, leaveUid: number): Promise<{ message: string }> {
		const leave = await this.loadForDecision(user, leaveUid);
		const column = BALANCE_COLUMNS[leave.leaveType];

		const queryRunner = this.dataSource.createQueryRunner();
		await queryRunner.connect();
		await queryRunner.startTransaction();

		try {
			const claimed = await queryRunner.manager.update(
				Leave,
				{ uid: leave.uid, status: LeaveStatus.PENDING },
				{ status: LeaveStatus.APPROVED, approvedByUid: user.uid, approvedAt: new Date() },
			);

			if (!claimed.affected) {
				throw new BadRequestException('Leave request is no longer pending');
			}

			if (column) {
				const where: FindOptionsWhere<User> = { uid: leave.ownerUid };
				where[column] = MoreThanOrEqual(leave.duration);

				const deducted = await queryRunner.manager.decrement(User, where, column, leave.duration);

				if (!deducted.affected) {
					throw new BadRequestException('Insufficient leave balance');
				}
			}

			await queryRunner.commitTransaction();
		} catch (error) {
			await queryRunner.rollbackTransaction();

			if (error instanceof HttpException) {
				throw error;
			}
			this.logger.error(`Failed to approve leave ${leave.uid}`, error instanceof Error ? error.stack : undefined);
			throw new BadRequestException('Failed to approve leave request');
		} finally {
			await queryRunner.release();
		}

		this.logger.log(`Leave ${leave.uid} approved by ${user.uid}`);
		this.notifyDecision(leave, LeaveStatus.APPROVED, null);

		return { message: 'Leave request approved successfully' };
	}

	async reject(user: AuthenticatedUser, leaveUid: number, reason: string): Promise<{ message: string }> {
		const leave = await this.loadForDecision(user, leaveUid);

		const result = await this.leaveRepository.update(
			{ uid: leave.uid, status: LeaveStatus.PENDING },
			{
				status: LeaveStatus.REJECTED,
				rejectionReason: reason.trim(),
				rejectedAt: new Date(),
				approvedByUid: user.uid,
			},
		);

		if (!result.affected) {
			throw new BadRequestException('Leave request is no longer pending');
		}

		this.logger.log(`Leave ${leave.uid} rejected by ${user.uid}`);
		this.notifyDecision(leave, LeaveStatus.REJECTED, reason.trim());

		return { message: `Leave request rejected. Reason: ${reason.trim()}` };
	}
}
