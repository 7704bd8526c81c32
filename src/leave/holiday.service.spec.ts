import { Test, TestingModule } from '@nestjs/testing';
import { getRepositoryToken } from '@nestjs/typeorm';
import { ConflictException } from '@nestjs/common';
import { HolidayService } from './holiday.service';
import { Holiday } from './entities/holiday.entity';
import { Leave } from './entities/leave.entity';
import { HolidayType, LeaveStatus, LeaveType } from '../lib/enums/leave.enums';
import { AccessLevel } from '../lib/enums/user.enums';
import { RepositoryMock, repositoryMockFactory } from '../../test/utils/mock-factory';

describe('HolidayService', () => {
	let service: HolidayService;
	let holidayRepository: RepositoryMock;
	let leaveRepository: RepositoryMock;

	beforeEach(async () => {
		const module: TestingModule = await Test.createTestingModule({
			providers: [
				HolidayService,
				{ provide: getRepositoryToken(Holiday), useFactory: repositoryMockFactory },
				{ provide: getRepositoryToken(Leave), useFactory: repositoryMockFactory },
			],
		}).compile();

		service = module.get<HolidayService>(HolidayService);
		holidayRepository = module.get(getRepositoryToken(Holiday));
		leaveRepository = module.get(getRepositoryToken(Leave));
	});

	it('should refuse a second holiday on the same date', async () => {
		holidayRepository.findOne.mockResolvedValue({ uid: 1, date: '2026-08-15', name: 'Independence Day' });

		await expect(
			service.create({ date: '2026-08-15', name: 'Another Day', type: HolidayType.RESTRICTED }),
		).rejects.toThrow(ConflictException);
	});

	it('should merge holidays with the caller leaves and colour them', async () => {
		holidayRepository.find.mockResolvedValue([
			{ uid: 1, date: '2026-01-26', name: 'Republic Day', type: HolidayType.GAZETTED },
			{ uid: 2, date: '2026-03-04', name: 'Holi', type: HolidayType.RESTRICTED },
		]);
		leaveRepository.find.mockResolvedValue([
			{ startDate: '2026-02-02', endDate: '2026-02-03', leaveType: LeaveType.SICK, status: LeaveStatus.APPROVED },
			{ startDate: '2026-04-06', endDate: '2026-04-06', leaveType: LeaveType.CASUAL, status: LeaveStatus.PENDING },
			{ startDate: '2026-05-11', endDate: '2026-05-12', leaveType: LeaveType.SPECIAL, status: LeaveStatus.REJECTED },
		]);

		const { calendar } = await service.getCalendar({
			uid: 42,
			email: 'jane.doe@university.edu',
			fullName: 'Jane Doe',
			role: AccessLevel.EMPLOYEE,
			campusUid: 3,
		});

		expect(calendar).toEqual([
			{ date: '2026-01-26', name: 'Republic Day', type: HolidayType.GAZETTED, color: 'blue' },
			{ date: '2026-03-04', name: 'Holi', type: HolidayType.RESTRICTED, color: 'purple' },
			{ date: '2026-02-02', end_date: '2026-02-03', name: 'SICK Leave', status: LeaveStatus.APPROVED, color: 'green' },
			{ date: '2026-04-06', end_date: '2026-04-06', name: 'CASUAL Leave', status: LeaveStatus.PENDING, color: 'yellow' },
			{ date: '2026-05-11', end_date: '2026-05-12', name: 'SPECIAL Leave', status: LeaveStatus.REJECTED, color: 'red' },
		]);
		expect(leaveRepository.find).toHaveBeenCalledWith({ where: { ownerUid: 42 }, order: { startDate: 'ASC' } });
	});
});
