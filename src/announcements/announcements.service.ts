import { BadRequestException, ForbiddenException, Injectable, Logger, NotFoundException } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { ConfigService } from '@nestjs/config';
import { Between, FindOptionsWhere, Repository } from 'typeorm';
import { Announcement } from './entities/announcement.entity';
import { CreateAnnouncementDto } from './dto/create-announcement.dto';
import { CampusService } from '../campus/campus.service';
import { AnnouncementLevel } from '../lib/enums/announcement.enums';
import { AccessLevel } from '../lib/enums/user.enums';
import { AuthenticatedUser } from '../lib/interfaces/authenticated-request.interface';
import { AnnouncementView } from '../lib/types/announcement';
import { DateRangeUtil } from '../lib/utils/date-range.util';
import { TimezoneUtil } from '../lib/utils/timezone.util';

@Injectable()
export class AnnouncementsService {
	private readonly logger = new Logger(AnnouncementsService.name);
	private readonly timezone: string;

	constructor(
		@InjectRepository(Announcement)
		private announcementRepository: Repository<Announcement>,
		private readonly campusService: CampusService,
		private readonly configService: ConfigService,
	) {
		this.timezone = TimezoneUtil.getSafeTimezone(this.configService.get<string>('ATTENDANCE_TIMEZONE'));
	}

	private toView(announcement: Announcement): AnnouncementView {
		return {
			uid: announcement.uid,
			title: announcement.title,
			description: announcement.description,
			created_by: announcement.author?.fullName ?? null,
			created_at: announcement.createdAt,
		};
	}

	/**
	 * Super admins post university-wide or to any campus. Admins post to their own campus only.
	 */
	private async resolveTargetCampus(user: AuthenticatedUser, dto: CreateAnnouncementDto): Promise<number | null> {
		if (dto.level === AnnouncementLevel.UNIVERSITY) {
			if (user.role !== AccessLevel.SUPER_ADMIN) {
				throw new ForbiddenException('Only super admins can post university announcements');
			}
			return null;
		}

		if (user.role === AccessLevel.ADMIN) {
			if (user.campusUid === null) {
				throw new ForbiddenException('You are not assigned to a campus');
			}
			if (dto.campusUid !== undefined && dto.campusUid !== user.campusUid) {
				throw new ForbiddenException('You can only post announcements to your own campus');
			}
			return user.campusUid;
		}

		if (dto.campusUid === undefined) {
			throw new BadRequestException('campusUid is required for campus announcements');
		}

		if (!(await this.campusService.findActiveByUid(dto.campusUid))) {
			throw new NotFoundException(`Campus ${dto.campusUid} not found`);
		}

		return dto.campusUid;
	}

	async create(
		user: AuthenticatedUser,
		createAnnouncementDto: CreateAnnouncementDto,
	): Promise<{ message: string; announcement: AnnouncementView }> {
		const campusUid = await this.resolveTargetCampus(user, createAnnouncementDto);

		const announcement = await this.announcementRepository.save(
			this.announcementRepository.create({
				title: createAnnouncementDto.title.trim(),
				description: createAnnouncementDto.description.trim(),
				level: createAnnouncementDto.level,
				campusUid,
				authorUid: user.uid,
			}),
		);

		this.logger.log(
			`Announcement ${announcement.uid} posted by ${user.uid} to ${campusUid === null ? 'the university' : `campus ${campusUid}`}`,
		);

		return {
			message: 'Announcement posted successfully',
			announcement: { ...this.toView(announcement), created_by: user.fullName },
		};
	}

	private async list(where: FindOptionsWhere<Announcement>, date?: string): Promise<AnnouncementView[]> {
		if (date !== undefined) {
			if (!DateRangeUtil.isCalendarDate(date)) {
				throw new BadRequestException('Invalid date format. Use YYYY-MM-DD.');
			}
			const { start, end } = TimezoneUtil.dayBounds(date, this.timezone);
			where.createdAt = Between(start, end);
		}

		const announcements = await this.announcementRepository.find({
			where,
			relations: { author: true },
			order: { createdAt: 'DESC' },
		});

		return announcements.map((announcement) => this.toView(announcement));
	}

	async getUniversityAnnouncements(date?: string): Promise<AnnouncementView[]> {
		return this.list({ level: AnnouncementLevel.UNIVERSITY }, date);
	}

	async getCampusAnnouncements(user: AuthenticatedUser, date?: string): Promise<AnnouncementView[]> {
		if (user.campusUid === null) {
			return [];
		}

		return this.list({ level: AnnouncementLevel.CAMPUS, campusUid: user.campusUid }, date);
	}
}
