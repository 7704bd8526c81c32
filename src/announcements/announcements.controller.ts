import { Body, Controller, Get, Post, Query, Req, UseGuards } from '@nestjs/common';
import {
	ApiBadRequestResponse,
	ApiBearerAuth,
	ApiBody,
	ApiCreatedResponse,
	ApiForbiddenResponse,
	ApiOkResponse,
	ApiOperation,
	ApiQuery,
	ApiTags,
	ApiUnauthorizedResponse,
} from '@nestjs/swagger';
import { AnnouncementsService } from './announcements.service';
import { CreateAnnouncementDto } from './dto/create-announcement.dto';
import { AnnouncementQueryDto } from './dto/announcement-query.dto';
import { AuthGuard } from '../guards/auth.guard';
import { RoleGuard } from '../guards/role.guard';
import { RequireCapability } from '../decorators/capability.decorator';
import { Capability } from '../lib/enums/user.enums';
import { AuthenticatedRequest } from '../lib/interfaces/authenticated-request.interface';

@ApiBearerAuth('JWT-auth')
@ApiTags('📢 Announcements')
@Controller('announcements')
@UseGuards(AuthGuard, RoleGuard)
@ApiUnauthorizedResponse({ description: '🔒 Unauthorized - Authentication required' })
export class AnnouncementsController {
	constructor(private readonly announcementsService: AnnouncementsService) {}

	@Post()
	@RequireCapability(Capability.PUBLISH_ANNOUNCEMENT)
	@ApiOperation({
		summary: '📝 Post an announcement',
		description: 'Super admins post university-wide or to any campus. Admins post to their own campus.',
	})
	@ApiBody({ type: CreateAnnouncementDto })
	@ApiCreatedResponse({ description: 'Announcement posted' })
	@ApiForbiddenResponse({ description: 'Target outside the caller scope' })
	create(@Req() req: AuthenticatedRequest, @Body() createAnnouncementDto: CreateAnnouncementDto) {
		return this.announcementsService.create(req.user, createAnnouncementDto);
	}

	@Get('university')
	@ApiOperation({ summary: '🏛️ University announcements', description: 'Newest first, optionally limited to one day.' })
	@ApiQuery({ name: 'date', required: false, example: '2024-03-04' })
	@ApiOkResponse({ description: 'University announcements' })
	@ApiBadRequestResponse({ description: 'Invalid date format' })
	getUniversity(@Query() query: AnnouncementQueryDto) {
		return this.announcementsService.getUniversityAnnouncements(query.date);
	}

	@Get('campus')
	@ApiOperation({ summary: '🏫 Campus announcements', description: "Announcements for the caller's campus." })
	@ApiQuery({ name: 'date', required: false, example: '2024-03-04' })
	@ApiOkResponse({ description: 'Campus announcements' })
	@ApiBadRequestResponse({ description: 'Invalid date format' })
	getCampus(@Req() req: AuthenticatedRequest, @Query() query: AnnouncementQueryDto) {
		return this.announcementsService.getCampusAnnouncements(req.user, query.date);
	}
}
