import { ForbiddenException, Injectable, Logger, NotFoundException } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { ConfigService } from '@nestjs/config';
import { EventEmitter2 } from '@nestjs/event-emitter';
import { Between, FindOptionsWhere, MoreThan, Repository } from 'typeorm';
import { Attendance } from '../entities/attendance.entity';
import { User } from '../../user/entities/user.entity';
import { AttendanceSettings, readAttendanceSettings } from '../utils/attendance-settings.util';
import { EmailType } from '../../lib/enums/email.enums';
import { AuthenticatedUser } from '../../lib/interfaces/authenticated-request.interface';
import { EscalationStatus, GeofenceViolation, RedNoticeResponse } from '../../lib/types/attendance';
import { EmailTemplateData } from '../../lib/types/email-templates.types';
import { CalendarRange, DateRangeUtil } from '../../lib/utils/date-range.util';
import { TimezoneUtil } from '../../lib/utils/timezone.util';
import { canAccessCampus, resolveCampusScope } from '../../lib/utils/access-level.util';

@Injectable()
export class ViolationReportsService {
	private readonly logger = new Logger(ViolationReportsService.name);
	private readonly settings: AttendanceSettings;

	constructor(
		@InjectRepository(Attendance)
		private attendanceRepository: Repository<Attendance>,
		@InjectRepository(User)
		private userRepository: Repository<User>,
		private readonly configService: ConfigService,
		private readonly eventEmitter: EventEmitter2,
	) {
		this.settings = readAttendanceSettings(this.configService);
	}

	private today(): string {
		return TimezoneUtil.toCalendarDate(new Date(), this.settings.timezone);
	}

	async getDailyViolations(user: AuthenticatedUser, campusId?: number): Promise<GeofenceViolation[]> {
		const today = this.today();
		return this.findViolations(user, { start: today, end: today }, campusId);
	}

	async getWeeklyViolations(user: AuthenticatedUser, campusId?: number): Promise<GeofenceViolation[]> {
		const today = this.today();
		return this.findViolations(user, { start: DateRangeUtil.startOfWeek(today), end: today }, campusId);
	}

	private async findViolations(
		user: AuthenticatedUser,
		range: CalendarRange,
		campusId?: number,
	): Promise<GeofenceViolation[]> {
		const campusUid = resolveCampusScope(user, campusId);

		const where: FindOptionsWhere<Attendance> = {
			date: Between(range.start, range.end),
			totalOutOfBoundsMinutes: MoreThan(this.settings.violationThresholdMinutes),
		};

		if (campusUid !== undefined) {
			where.punchInCampusUid = campusUid;
		}

		const records = await this.attendanceRepository.find({
			where,
			relations: { owner: true },
			order: { date: 'ASC', totalOutOfBoundsMinutes: 'DESC' },
		});

		return records.map((record) => ({
			employee_id: record.ownerUid,
			name: record.owner?.fullName ?? '',
			total_out_of_bounds_time: Math.round(record.totalOutOfBoundsMinutes * 100) / 100,
		}));
	}

	/**
	 * Loads the employee an admin or super admin wants to act on. Admins only reach
	 * employees of their own campus.
	 */
	private async loadEmployee(requester: AuthenticatedUser, employeeUid: number): Promise<User> {
		const employee = await this.userRepository.findOne({ where: { uid: employeeUid } });

		if (!employee) {
			throw new NotFoundException(`User ${employeeUid} not found`);
		}

		if (!canAccessCampus(requester, employee.campusUid)) {
			throw new ForbiddenException('You can only act on employees of your own campus');
		}

		return employee;
	}

	/**
	 * Historical days above the threshold, at any campus. Campus scope only decides who may ask.
	 */
	private async countViolations(employeeUid: number): Promise<number> {
		return this.attendanceRepository.count({
			where: {
				ownerUid: employeeUid,
				totalOutOfBoundsMinutes: MoreThan(this.settings.violationThresholdMinutes),
			},
		});
	}

	async checkEscalation(requester: AuthenticatedUser, employeeUid: number): Promise<EscalationStatus> {
		const employee = await this.loadEmployee(requester, employeeUid);
		const violations = await this.countViolations(employeeUid);

		return {
			employee_id: employee.uid,
			name: employee.fullName,
			violations,
			limit: this.settings.redNoticeViolationLimit,
			eligible: violations >= this.settings.redNoticeViolationLimit,
			red_notice_issued: employee.redNoticeIssued,
		};
	}

	async issueRedNotice(requester: AuthenticatedUser, employeeUid: number, reason: string): Promise<RedNoticeResponse> {
		const employee = await this.loadEmployee(requester, employeeUid);
		const violations = await this.countViolations(employeeUid);

		if (employee.redNoticeIssued) {
			return { message: `Red notice already issued to ${employee.fullName}`, violations };
		}

		if (violations < this.settings.redNoticeViolationLimit) {
			return { message: 'User does not meet red notice criteria yet.', violations };
		}

		const issuedAt = new Date();
		const result = await this.userRepository.update(
			{ uid: employee.uid, redNoticeIssued: false },
			{
				redNoticeIssued: true,
				redNoticeReason: reason.trim(),
				redNoticeIssuedAt: issuedAt,
				redNoticeIssuedByUid: requester.uid,
			},
		);

		if (!result.affected) {
			return { message: `Red notice already issued to ${employee.fullName}`, violations };
		}

		this.logger.log(`Red notice issued to user ${employee.uid} by ${requester.uid} after ${violations} violations`);

		const emailData: EmailTemplateData<EmailType.RED_NOTICE_ISSUED> = {
			name: employee.fullName,
			reason: reason.trim(),
			violations,
			issuedBy: requester.fullName,
			issuedAt: TimezoneUtil.toCalendarDate(issuedAt, this.settings.timezone),
		};
		this.eventEmitter.emit('send.email', EmailType.RED_NOTICE_ISSUED, [employee.email], emailData);

		return { message: `Red notice issued to ${employee.fullName}`, violations };
	}

	async revokeRedNotice(requester: AuthenticatedUser, employeeUid: number): Promise<{ message: string }> {
		const employee = await this.loadEmployee(requester, employeeUid);

		if (!employee.redNoticeIssued) {
			return { message: `No red notice to revoke for ${employee.fullName}` };
		}

		await this.userRepository.update(
			{ uid: employee.uid },
			{ redNoticeIssued: false, redNoticeReason: null, redNoticeIssuedAt: null, redNoticeIssuedByUid: null },
		);

		this.logger.log(`Red notice revoked for user ${employee.uid} by ${requester.uid}`);
		return { message: `Red notice revoked for ${employee.fullName}` };
	}
}
