import { ConflictException, Injectable, Logger, NotFoundException } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { Holiday } from './entities/holiday.entity';
import { Leave } from './entities/leave.entity';
import { CreateHolidayDto } from './dto/create-holiday.dto';
import { HolidayType, LeaveStatus } from '../lib/enums/leave.enums';
import { AuthenticatedUser } from '../lib/interfaces/authenticated-request.interface';
import { CalendarColor, CalendarEntry } from '../lib/types/leave';

const HOLIDAY_COLORS: Record<HolidayType, CalendarColor> = {
	[HolidayType.GAZETTED]: 'blue',
	[HolidayType.RESTRICTED]: 'purple',
};

const leaveColor = (status: LeaveStatus): CalendarColor => {
	switch (status) {
		case LeaveStatus.APPROVED:
			return 'green';
		case LeaveStatus.PENDING:
			return 'yellow';
		default:
			return 'red';
	}
};

@Injectable()
export class HolidayService {
	private readonly logger = new Logger(HolidayService.name);

	constructor(
		@InjectRepository(Holiday)
		private holidayRepository: Repository<Holiday>,
		@InjectRepository(Leave)
		private leaveRepository: Repository<Leave>,
	) {}

	async create(createHolidayDto: CreateHolidayDto): Promise<{ message: string; holiday: Holiday }> {
		const existing = await this.holidayRepository.findOne({ where: { date: createHolidayDto.date } });

		if (existing) {
			throw new ConflictException(`A holiday is already declared on ${createHolidayDto.date}: ${existing.name}`);
		}

		const holiday = await this.holidayRepository.save(
			this.holidayRepository.create({
				date: createHolidayDto.date,
				name: createHolidayDto.name.trim(),
				type: createHolidayDto.type,
			}),
		);

		this.logger.log(`Holiday ${holiday.name} declared on ${holiday.date}`);
		return { message: 'Holiday created successfully', holiday };
	}

	async findAll(): Promise<{ message: string; holidays: Holiday[] }> {
		const holidays = await this.holidayRepository.find({ order: { date: 'ASC' } });
		return { message: 'Holidays retrieved successfully', holidays };
	}

	async remove(uid: number): Promise<{ message: string }> {
		const result = await this.holidayRepository.delete({ uid });

		if (!result.affected) {
			throw new NotFoundException('Holiday not found');
		}

		return { message: 'Holiday removed successfully' };
	}

	/**
	 * Holidays followed by the caller's own leaves, each in date order.
	 */
	async getCalendar(user: AuthenticatedUser): Promise<{ calendar: CalendarEntry[] }> {
		const [holidays, leaves] = await Promise.all([
			this.holidayRepository.find({ order: { date: 'ASC' } }),
			this.leaveRepository.find({ where: { ownerUid: user.uid }, order: { startDate: 'ASC' } }),
		]);

		const calendar: CalendarEntry[] = [
			...holidays.map((holiday) => ({
				date: holiday.date,
				name: holiday.name,
				type: holiday.type,
				color: HOLIDAY_COLORS[holiday.type],
			})),
			...leaves.map((leave) => ({
				date: leave.startDate,
				end_date: leave.endDate,
				name: `${leave.leaveType} Leave`,
				status: leave.status,
				color: leaveColor(leave.status),
			})),
		];

		return { calendar };
	}
}
