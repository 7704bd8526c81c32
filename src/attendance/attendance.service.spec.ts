import { Test, TestingModule } from '@nestjs/testing';
import { getRepositoryToken } from '@nestjs/typeorm';
import { ConfigService } from '@nestjs/config';
import { BadRequestException, ForbiddenException } from '@nestjs/common';
import { IsNull, QueryFailedError } from 'typeorm';
import { AttendanceService } from './attendance.service';
import { Attendance } from './entities/attendance.entity';
import { GeofenceService } from './services/geofence.service';
import { CampusService } from '../campus/campus.service';
import {
	AlreadyPunchedInException,
	AlreadyPunchedOutException,
	NoActiveSessionException,
	OutsideGeofenceException,
} from './exceptions/attendance.exceptions';
import { AccessLevel } from '../lib/enums/user.enums';
import { AttendanceState } from '../lib/enums/attendance.enums';
import { AuthenticatedUser } from '../lib/interfaces/authenticated-request.interface';
import { RepositoryMock, repositoryMockFactory } from '../../test/utils/mock-factory';

const mainCampus = {
	uid: 1,
	name: 'Main Campus',
	isDeleted: false,
	boundary: [
		{ latitude: 0, longitude: 0 },
		{ latitude: 0, longitude: 10 },
		{ latitude: 10, longitude: 10 },
		{ latitude: 10, longitude: 0 },
	],
};

const employee: AuthenticatedUser = {
	uid: 42,
	email: 'jane.doe@university.edu',
	fullName: 'Jane Doe',
	role: AccessLevel.EMPLOYEE,
	campusUid: 1,
};

const inside = { latitude: 5, longitude: 5 };
const outside = { latitude: 50, longitude: 50 };

describe('AttendanceService', () => {
	let service: AttendanceService;
	let attendanceRepository: RepositoryMock;
	const campusService = {
		getActiveCampuses: jest.fn(),
		findActiveByUid: jest.fn(),
	};

	const openRecord = (overrides: Partial<Attendance> = {}) => ({
		uid: 7,
		ownerUid: employee.uid,
		date: '2026-03-02',
		punchIn: new Date('2026-03-02T09:00:00.000Z'),
		punchOut: null,
		punchInCampusUid: 1,
		totalOutOfBoundsMinutes: 0,
		exitTime: null,
		...overrides,
	});

	beforeEach(async () => {
		campusService.getActiveCampuses.mockReset().mockResolvedValue([mainCampus]);
		campusService.findActiveByUid.mockReset().mockResolvedValue(mainCampus);

		const module: TestingModule = await Test.createTestingModule({
			providers: [
				AttendanceService,
				GeofenceService,
				{ provide: CampusService, useValue: campusService },
				{ provide: getRepositoryToken(Attendance), useFactory: repositoryMockFactory },
				{ provide: ConfigService, useValue: { get: jest.fn().mockReturnValue(undefined) } },
			],
		}).compile();

		service = module.get<AttendanceService>(AttendanceService);
		attendanceRepository = module.get(getRepositoryToken(Attendance));

		jest.useFakeTimers({ doNotFake: ['nextTick', 'setImmediate', 'setTimeout', 'setInterval', 'queueMicrotask'] });
		jest.setSystemTime(new Date('2026-03-02T09:00:00.000Z'));
	});

	afterEach(() => {
		jest.useRealTimers();
	});

	describe('punchIn', () => {
		it('should record the punch-in against the campus containing the location', async () => {
			attendanceRepository.findOne.mockResolvedValue(null);
			attendanceRepository.insert.mockResolvedValue({ identifiers: [{ uid: 7 }] });

			const result = await service.punchIn(employee, inside);

			expect(result).toEqual({ message: 'Punched in at Main Campus', status: 'success' });
			expect(attendanceRepository.insert).toHaveBeenCalledWith(
				expect.objectContaining({
					ownerUid: 42,
					date: '2026-03-02',
					punchInCampusUid: 1,
					punchInLatitude: 5,
					punchInLongitude: 5,
					totalOutOfBoundsMinutes: 0,
					exitTime: null,
				}),
			);
		});

		it('should reject a location outside every campus', async () => {
			attendanceRepository.findOne.mockResolvedValue(null);

			await expect(service.punchIn(employee, outside)).rejects.toThrow(OutsideGeofenceException);
			await expect(service.punchIn(employee, outside)).rejects.toThrow('Punch-in location outside campus geofence');
			expect(attendanceRepository.insert).not.toHaveBeenCalled();
		});

		it('should reject a second punch-in on the same day', async () => {
			attendanceRepository.findOne.mockResolvedValue(openRecord());

			await expect(service.punchIn(employee, inside)).rejects.toThrow(AlreadyPunchedInException);
			expect(campusService.getActiveCampuses).not.toHaveBeenCalled();
		});

		it('should report a concurrent duplicate insert as already punched in', async () => {
			attendanceRepository.findOne.mockResolvedValue(null);
			attendanceRepository.insert.mockRejectedValue(
				new QueryFailedError('INSERT INTO attendance', [], Object.assign(new Error('Duplicate entry'), { code: 'ER_DUP_ENTRY' })),
			);

			await expect(service.punchIn(employee, inside)).rejects.toThrow(AlreadyPunchedInException);
		});

		it('should wrap unexpected storage failures', async () => {
			attendanceRepository.findOne.mockResolvedValue(null);
			attendanceRepository.insert.mockRejectedValue(new Error('connection lost'));

			await expect(service.punchIn(employee, inside)).rejects.toThrow(BadRequestException);
			await expect(service.punchIn(employee, inside)).rejects.toThrow('Punch-in failed');
		});
	});

	describe('checkLocation', () => {
		it('should require an open session', async () => {
			attendanceRepository.findOne.mockResolvedValue(null);

			await expect(service.checkLocation(employee, inside)).rejects.toThrow(NoActiveSessionException);
		});

		it('should mark the exit on the first ping outside without crediting time', async () => {
			jest.setSystemTime(new Date('2026-03-02T10:00:00.000Z'));
			attendanceRepository.findOne.mockResolvedValue(openRecord());
			attendanceRepository.update.mockResolvedValue({ affected: 1 });

			const result = await service.checkLocation(employee, outside);

			expect(result).toEqual({ status: 'Tracking active' });
			expect(attendanceRepository.update).toHaveBeenCalledWith(
				{ uid: 7, exitTime: IsNull(), punchOut: IsNull() },
				{ exitTime: new Date('2026-03-02T10:00:00.000Z'), lastPingAt: new Date('2026-03-02T10:00:00.000Z') },
			);
			expect(attendanceRepository.increment).not.toHaveBeenCalled();
		});

		it('should credit the minutes since the previous outside ping and warn past the threshold', async () => {
			jest.setSystemTime(new Date('2026-03-02T10:20:00.000Z'));
			attendanceRepository.findOne.mockResolvedValue(
				openRecord({ exitTime: new Date('2026-03-02T10:00:00.000Z'), totalOutOfBoundsMinutes: 15 }),
			);
			attendanceRepository.update.mockResolvedValue({ affected: 1 });

			const result = await service.checkLocation(employee, outside);

			expect(attendanceRepository.increment).toHaveBeenCalledWith({ uid: 7 }, 'totalOutOfBoundsMinutes', 20);
			expect(result).toEqual({ warning: 'Outside campus for 35.0 minutes today.' });
		});

		it('should not credit an interval another ping already claimed', async () => {
			jest.setSystemTime(new Date('2026-03-02T10:20:00.000Z'));
			attendanceRepository.findOne.mockResolvedValue(
				openRecord({ exitTime: new Date('2026-03-02T10:00:00.000Z'), totalOutOfBoundsMinutes: 15 }),
			);
			attendanceRepository.update.mockResolvedValue({ affected: 0 });

			const result = await service.checkLocation(employee, outside);

			expect(attendanceRepository.increment).not.toHaveBeenCalled();
			expect(result).toEqual({ status: 'Tracking active' });
		});

		it('should clear the exit marker when back inside and keep the accumulated total', async () => {
			jest.setSystemTime(new Date('2026-03-02T11:00:00.000Z'));
			attendanceRepository.findOne.mockResolvedValue(
				openRecord({ exitTime: new Date('2026-03-02T10:30:00.000Z'), totalOutOfBoundsMinutes: 40 }),
			);
			attendanceRepository.update.mockResolvedValue({ affected: 1 });

			const result = await service.checkLocation(employee, inside);

			expect(attendanceRepository.update).toHaveBeenCalledWith(
				{ uid: 7, punchOut: IsNull() },
				{ exitTime: null, lastPingAt: new Date('2026-03-02T11:00:00.000Z') },
			);
			expect(attendanceRepository.increment).not.toHaveBeenCalled();
			expect(result).toEqual({ warning: 'Outside campus for 40.0 minutes today.' });
		});

		it('should treat a removed punch-in campus as outside', async () => {
			campusService.findActiveByUid.mockResolvedValue(null);
			attendanceRepository.findOne.mockResolvedValue(openRecord());
			attendanceRepository.update.mockResolvedValue({ affected: 1 });

			await service.checkLocation(employee, inside);

			expect(attendanceRepository.update).toHaveBeenCalledWith(
				{ uid: 7, exitTime: IsNull(), punchOut: IsNull() },
				expect.objectContaining({ exitTime: new Date('2026-03-02T09:00:00.000Z') }),
			);
		});
	});

	describe('punchOut', () => {
		it('should require a punch-in for today', async () => {
			attendanceRepository.findOne.mockResolvedValue(null);

			await expect(service.punchOut(employee, inside)).rejects.toThrow(NoActiveSessionException);
			await expect(service.punchOut(employee, inside)).rejects.toThrow('No punch-in record found for today');
		});

		it('should compute the worked hours from punch-in to punch-out', async () => {
			jest.setSystemTime(new Date('2026-03-02T17:30:00.000Z'));
			attendanceRepository.findOne.mockResolvedValue(openRecord({ totalOutOfBoundsMinutes: 12.5 }));
			attendanceRepository.update.mockResolvedValue({ affected: 1 });

			const result = await service.punchOut(employee, inside);

			expect(result).toEqual({
				message: 'Punched out at Main Campus',
				total_hours: 8.5,
				total_out_of_bounds_time: 12.5,
				status: 'success',
			});
			expect(attendanceRepository.update).toHaveBeenCalledWith(
				{ uid: 7, punchOut: IsNull() },
				expect.objectContaining({ totalHours: 8.5, punchOutCampusUid: 1 }),
			);
		});

		it('should reject a punch-out outside every campus', async () => {
			attendanceRepository.findOne.mockResolvedValue(openRecord());

			await expect(service.punchOut(employee, outside)).rejects.toThrow('Punch-out location outside campus geofence');
			expect(attendanceRepository.update).not.toHaveBeenCalled();
		});

		it('should reject a second punch-out', async () => {
			attendanceRepository.findOne.mockResolvedValue(openRecord({ punchOut: new Date('2026-03-02T16:00:00.000Z') }));

			await expect(service.punchOut(employee, inside)).rejects.toThrow(AlreadyPunchedOutException);
		});

		it('should reject a punch-out that lost a race', async () => {
			attendanceRepository.findOne.mockResolvedValue(openRecord());
			attendanceRepository.update.mockResolvedValue({ affected: 0 });

			await expect(service.punchOut(employee, inside)).rejects.toThrow(AlreadyPunchedOutException);
		});
	});

	describe('getTodayStatus', () => {
		it('should report no record before punch-in', async () => {
			attendanceRepository.findOne.mockResolvedValue(null);

			const result = await service.getTodayStatus(employee);

			expect(result.state).toBe(AttendanceState.NO_RECORD);
			expect(result.record).toBeNull();
		});

		it('should report punched in with the campus name', async () => {
			attendanceRepository.findOne.mockResolvedValue({ ...openRecord(), punchInCampus: mainCampus, status: 'PRESENT' });

			const result = await service.getTodayStatus(employee);

			expect(result.state).toBe(AttendanceState.PUNCHED_IN);
			expect(result.record?.campus).toBe('Main Campus');
		});
	});

	describe('getCampusAttendance', () => {
		const admin: AuthenticatedUser = { ...employee, uid: 2, role: AccessLevel.ADMIN };

		it('should scope an admin to their own campus', async () => {
			attendanceRepository.find.mockResolvedValue([]);

			await service.getCampusAttendance(admin, { date: '2026-03-01' });

			expect(attendanceRepository.find).toHaveBeenCalledWith(
				expect.objectContaining({ where: { date: '2026-03-01', punchInCampusUid: 1 } }),
			);
		});

		it('should forbid employees', async () => {
			await expect(service.getCampusAttendance(employee, {})).rejects.toThrow(ForbiddenException);
		});

		it('should reject malformed dates', async () => {
			await expect(service.getCampusAttendance(admin, { date: '2026-02-30' })).rejects.toThrow(BadRequestException);
		});
	});
});
