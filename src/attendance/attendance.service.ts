import { BadRequestException, HttpException, Injectable, Logger } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { ConfigService } from '@nestjs/config';
import { Between, FindOptionsWhere, IsNull, QueryFailedError, Repository } from 'typeorm';
import { Attendance } from './entities/attendance.entity';
import { GeofenceService } from './services/geofence.service';
import { LocationDto } from './dto/location.dto';
import { CampusAttendanceQueryDto, MyAttendanceQueryDto } from './dto/attendance-query.dto';
import {
	AlreadyPunchedInException,
	AlreadyPunchedOutException,
	NoActiveSessionException,
	OutsideGeofenceException,
} from './exceptions/attendance.exceptions';
import { AttendanceSettings, readAttendanceSettings } from './utils/attendance-settings.util';
import { AttendancePeriod, AttendanceState, AttendanceStatus } from '../lib/enums/attendance.enums';
import { AuthenticatedUser } from '../lib/interfaces/authenticated-request.interface';
import {
	AttendanceRecordView,
	LocationPingResponse,
	PunchInResponse,
	PunchOutResponse,
	TodayStatusResponse,
} from '../lib/types/attendance';
import { TimezoneUtil } from '../lib/utils/timezone.util';
import { DateRangeUtil } from '../lib/utils/date-range.util';
import { resolveCampusScope } from '../lib/utils/access-level.util';

const MS_PER_MINUTE = 60 * 1000;
const MS_PER_HOUR = 60 * MS_PER_MINUTE;

/**
 * Daily attendance state machine: punch-in, location pings, punch-out.
 *
 * Every transition is a conditional write so that concurrent requests for the same record
 * cannot double-punch or credit the same out-of-bounds interval twice.
 */
@Injectable()
export class AttendanceService {
	private readonly logger = new Logger(AttendanceService.name);
	private readonly settings: AttendanceSettings;

	constructor(
		@InjectRepository(Attendance)
		private attendanceRepository: Repository<Attendance>,
		private readonly geofenceService: GeofenceService,
		private readonly configService: ConfigService,
	) {
		this.settings = readAttendanceSettings(this.configService);
	}

	today(now: Date = new Date()): string {
		return TimezoneUtil.toCalendarDate(now, this.settings.timezone);
	}

	private isDuplicateKey(error: unknown): boolean {
		if (!(error instanceof QueryFailedError)) {
			return false;
		}
		const driverError: unknown = error.driverError;
		return typeof driverError === 'object' && driverError !== null && 'code' in driverError && driverError.code === 'ER_DUP_ENTRY';
	}

	private toView(record: Attendance): AttendanceRecordView {
		return {
			employee_id: record.ownerUid,
			name: record.owner?.fullName ?? null,
			date: record.date,
			campus: record.punchInCampus?.name ?? null,
			punch_in: record.punchIn,
			punch_out: record.punchOut,
			total_hours: record.totalHours,
			total_out_of_bounds_time: Math.round(record.totalOutOfBoundsMinutes * 100) / 100,
			status: record.status,
		};
	}

	async punchIn(user: AuthenticatedUser, location: LocationDto): Promise<PunchInResponse> {
		const now = new Date();
		const date = this.today(now);

		try {
			const existing = await this.attendanceRepository.findOne({ where: { ownerUid: user.uid, date } });

			if (existing) {
				this.logger.warn(`User ${user.uid} tried to punch in twice on ${date}`);
				throw new AlreadyPunchedInException();
			}

			const campus = await this.geofenceService.findContainingCampus(location);

			if (!campus) {
				this.logger.warn(`User ${user.uid} punch-in at (${location.latitude}, ${location.longitude}) is outside every campus`);
				throw new OutsideGeofenceException('Punch-in');
			}

			const record = this.attendanceRepository.create({
				ownerUid: user.uid,
				date,
				punchIn: now,
				punchInCampusUid: campus.uid,
				punchInLatitude: location.latitude,
				punchInLongitude: location.longitude,
				totalOutOfBoundsMinutes: 0,
				exitTime: null,
				status: AttendanceStatus.PRESENT,
			});

			await this.attendanceRepository.insert(record);
			this.logger.log(`User ${user.uid} punched in at campus ${campus.uid} on ${date}`);

			return { message: `Punched in at ${campus.name}`, status: 'success' };
		} catch (error) {
			if (error instanceof HttpException) {
				throw error;
			}
			// (ownerUid, date) is unique: a racing punch-in lost
			if (this.isDuplicateKey(error)) {
				throw new AlreadyPunchedInException();
			}
			this.logger.error(`Punch-in failed for user ${user.uid}`, error instanceof Error ? error.stack : undefined);
			throw new BadRequestException('Punch-in failed');
		}
	}

	/**
	 * Location ping. While the device is outside the punch-in campus, each ping after the
	 * first credits the minutes since the previous outside ping; a ping from inside closes
	 * the excursion without crediting anything.
	 */
	async checkLocation(user: AuthenticatedUser, location: LocationDto): Promise<LocationPingResponse> {
		const now = new Date();
		const date = this.today(now);

		const record = await this.attendanceRepository.findOne({
			where: { ownerUid: user.uid, date, punchOut: IsNull() },
		});

		if (!record) {
			throw new NoActiveSessionException();
		}

		const inside = await this.geofenceService.isInsideCampus(location, record.punchInCampusUid);
		let accumulated = record.totalOutOfBoundsMinutes;

		if (inside) {
			await this.attendanceRepository.update(
				{ uid: record.uid, punchOut: IsNull() },
				{ exitTime: null, lastPingAt: now },
			);
		} else if (record.exitTime === null) {
			await this.attendanceRepository.update(
				{ uid: record.uid, exitTime: IsNull(), punchOut: IsNull() },
				{ exitTime: now, lastPingAt: now },
			);
			this.logger.debug(`User ${user.uid} left campus ${record.punchInCampusUid}`);
		} else {
			const elapsedMinutes = Math.max(0, (now.getTime() - record.exitTime.getTime()) / MS_PER_MINUTE);

			// Only the ping that moves the marker forward may credit the interval.
			const claimed = await this.attendanceRepository.update(
				{ uid: record.uid, exitTime: record.exitTime, punchOut: IsNull() },
				{ exitTime: now, lastPingAt: now },
			);

			if (claimed.affected === 1 && elapsedMinutes > 0) {
				await this.attendanceRepository.increment({ uid: record.uid }, 'totalOutOfBoundsMinutes', elapsedMinutes);
				accumulated += elapsedMinutes;
			}
		}

		if (accumulated > this.settings.violationThresholdMinutes) {
			return { warning: `Outside campus for ${accumulated.toFixed(1)} minutes today.` };
		}

		return { status: 'Tracking active' };
	}

	async punchOut(user: AuthenticatedUser, location: LocationDto): Promise<PunchOutResponse> {
		const now = new Date();
		const date = this.today(now);

		const record = await this.attendanceRepository.findOne({ where: { ownerUid: user.uid, date } });

		if (!record) {
			throw new NoActiveSessionException('No punch-in record found for today');
		}

		if (record.punchOut) {
			throw new AlreadyPunchedOutException();
		}

		const campus = await this.geofenceService.findContainingCampus(location);

		if (!campus) {
			this.logger.warn(`User ${user.uid} punch-out at (${location.latitude}, ${location.longitude}) is outside every campus`);
			throw new OutsideGeofenceException('Punch-out');
		}

		const totalHours = (now.getTime() - record.punchIn.getTime()) / MS_PER_HOUR;

		const result = await this.attendanceRepository.update(
			{ uid: record.uid, punchOut: IsNull() },
			{
				punchOut: now,
				punchOutCampusUid: campus.uid,
				punchOutLatitude: location.latitude,
				punchOutLongitude: location.longitude,
				totalHours,
				status: AttendanceStatus.COMPLETED,
			},
		);

		if (!result.affected) {
			throw new AlreadyPunchedOutException();
		}

		this.logger.log(`User ${user.uid} punched out at campus ${campus.uid} after ${totalHours.toFixed(2)}h`);

		return {
			message: `Punched out at ${campus.name}`,
			total_hours: totalHours,
			total_out_of_bounds_time: record.totalOutOfBoundsMinutes,
			status: 'success',
		};
	}

	async getTodayStatus(user: AuthenticatedUser): Promise<TodayStatusResponse> {
		const record = await this.attendanceRepository.findOne({
			where: { ownerUid: user.uid, date: this.today() },
			relations: { punchInCampus: true },
		});

		if (!record) {
			return { message: 'No attendance recorded today', state: AttendanceState.NO_RECORD, record: null };
		}

		return {
			message: 'Attendance status retrieved successfully',
			state: record.punchOut ? AttendanceState.PUNCHED_OUT : AttendanceState.PUNCHED_IN,
			record: this.toView(record),
		};
	}

	async getMyAttendance(
		user: AuthenticatedUser,
		query: MyAttendanceQueryDto,
	): Promise<{ message: string; period: AttendancePeriod; from: string; to: string; records: AttendanceRecordView[] }> {
		const period = query.period ?? AttendancePeriod.DAILY;
		const range = DateRangeUtil.periodToDate(period, this.today());

		const where: FindOptionsWhere<Attendance> = {
			ownerUid: user.uid,
			date: Between(range.start, range.end),
		};

		if (query.status) {
			where.status = query.status;
		}

		const records = await this.attendanceRepository.find({
			where,
			relations: { punchInCampus: true },
			order: { date: 'DESC' },
		});

		return {
			message: 'Attendance retrieved successfully',
			period,
			from: range.start,
			to: range.end,
			records: records.map((record) => this.toView(record)),
		};
	}

	async getCampusAttendance(
		user: AuthenticatedUser,
		query: CampusAttendanceQueryDto,
	): Promise<{ message: string; date: string; records: AttendanceRecordView[] }> {
		const campusUid = resolveCampusScope(user, query.campusId);
		const date = query.date ?? this.today();

		if (!DateRangeUtil.isCalendarDate(date)) {
			throw new BadRequestException('date must be a valid YYYY-MM-DD date');
		}

		const where: FindOptionsWhere<Attendance> = { date };

		if (campusUid !== undefined) {
			where.punchInCampusUid = campusUid;
		}

		const records = await this.attendanceRepository.find({
			where,
			relations: { owner: true, punchInCampus: true },
			order: { punchIn: 'ASC' },
		});

		return {
			message: 'Campus attendance retrieved successfully',
			date,
			records: records.map((record) => this.toView(record)),
		};
	}
}
