import { Body, Controller, Delete, Get, Param, ParseIntPipe, Post, Query, Req, UseGuards } from '@nestjs/common';
import {
	ApiBadRequestResponse,
	ApiBearerAuth,
	ApiBody,
	ApiCreatedResponse,
	ApiForbiddenResponse,
	ApiNotFoundResponse,
	ApiOkResponse,
	ApiOperation,
	ApiParam,
	ApiQuery,
	ApiTags,
	ApiUnauthorizedResponse,
} from '@nestjs/swagger';
import { AttendanceService } from './attendance.service';
import { ViolationReportsService } from './services/violation-reports.service';
import { LocationDto } from './dto/location.dto';
import { RedNoticeDto } from './dto/red-notice.dto';
import { CampusAttendanceQueryDto, MyAttendanceQueryDto } from './dto/attendance-query.dto';
import { CampusQueryDto } from '../lib/dto/campus-query.dto';
import { AuthGuard } from '../guards/auth.guard';
import { RoleGuard } from '../guards/role.guard';
import { RequireCapability } from '../decorators/capability.decorator';
import { Capability } from '../lib/enums/user.enums';
import { AuthenticatedRequest } from '../lib/interfaces/authenticated-request.interface';

@ApiBearerAuth('JWT-auth')
@ApiTags('⏰ Attendance')
@Controller('attendance')
@UseGuards(AuthGuard, RoleGuard)
@ApiUnauthorizedResponse({ description: '🔒 Unauthorized - Authentication required' })
@ApiForbiddenResponse({ description: '🚫 Forbidden - Insufficient permissions' })
export class AttendanceController {
	constructor(
		private readonly attendanceService: AttendanceService,
		private readonly violationReportsService: ViolationReportsService,
	) {}

	@Post('punch-in')
	@RequireCapability(Capability.PUNCH_ATTENDANCE)
	@ApiOperation({
		summary: '🟢 Punch in',
		description: 'Starts the working day at the campus whose geofence contains the location. One punch-in per day.',
	})
	@ApiBody({ type: LocationDto })
	@ApiCreatedResponse({ description: 'Punched in' })
	@ApiBadRequestResponse({ description: 'Already punched in today, or location outside every campus geofence' })
	punchIn(@Req() req: AuthenticatedRequest, @Body() locationDto: LocationDto) {
		return this.attendanceService.punchIn(req.user, locationDto);
	}

	@Post('check-location')
	@RequireCapability(Capability.PUNCH_ATTENDANCE)
	@ApiOperation({
		summary: '📍 Location ping',
		description:
			'Periodic position report while punched in. Time spent outside the punch-in campus is accumulated and a warning is returned once it passes the daily threshold.',
	})
	@ApiBody({ type: LocationDto })
	@ApiCreatedResponse({ description: 'Tracking active, or a warning with the accumulated minutes' })
	@ApiBadRequestResponse({ description: 'No active punch-in session found' })
	checkLocation(@Req() req: AuthenticatedRequest, @Body() locationDto: LocationDto) {
		return this.attendanceService.checkLocation(req.user, locationDto);
	}

	@Post('punch-out')
	@RequireCapability(Capability.PUNCH_ATTENDANCE)
	@ApiOperation({ summary: '🔴 Punch out', description: 'Closes the day and reports the hours worked.' })
	@ApiBody({ type: LocationDto })
	@ApiCreatedResponse({ description: 'Punched out' })
	@ApiBadRequestResponse({ description: 'No punch-in today, already punched out, or outside every campus geofence' })
	punchOut(@Req() req: AuthenticatedRequest, @Body() locationDto: LocationDto) {
		return this.attendanceService.punchOut(req.user, locationDto);
	}

	@Get('today')
	@RequireCapability(Capability.VIEW_OWN_ATTENDANCE)
	@ApiOperation({ summary: '📅 Today', description: 'Where the caller stands in today\'s punch cycle.' })
	@ApiOkResponse({ description: 'Attendance status retrieved successfully' })
	getToday(@Req() req: AuthenticatedRequest) {
		return this.attendanceService.getTodayStatus(req.user);
	}

	@Get('mine')
	@RequireCapability(Capability.VIEW_OWN_ATTENDANCE)
	@ApiOperation({ summary: '🗂️ My attendance', description: 'Own records for the current day, week or month to date.' })
	@ApiOkResponse({ description: 'Attendance retrieved successfully' })
	getMine(@Req() req: AuthenticatedRequest, @Query() query: MyAttendanceQueryDto) {
		return this.attendanceService.getMyAttendance(req.user, query);
	}

	@Get('campus')
	@RequireCapability(Capability.VIEW_CAMPUS_ATTENDANCE)
	@ApiOperation({
		summary: '🏫 Campus attendance',
		description: 'Records of one day. Admins see their own campus; super admins may filter by campus.',
	})
	@ApiOkResponse({ description: 'Campus attendance retrieved successfully' })
	getCampus(@Req() req: AuthenticatedRequest, @Query() query: CampusAttendanceQueryDto) {
		return this.attendanceService.getCampusAttendance(req.user, query);
	}

	@Get('daily-geofencing')
	@RequireCapability(Capability.VIEW_GEOFENCE_VIOLATIONS)
	@ApiOperation({ summary: '🚨 Daily geofence violations', description: 'Employees above the out-of-bounds threshold today.' })
	@ApiQuery({ name: 'campusId', required: false, type: Number })
	@ApiOkResponse({ description: 'Violations for today' })
	getDailyViolations(@Req() req: AuthenticatedRequest, @Query() query: CampusQueryDto) {
		return this.violationReportsService.getDailyViolations(req.user, query.campusId);
	}

	@Get('weekly-geofencing')
	@RequireCapability(Capability.VIEW_GEOFENCE_VIOLATIONS)
	@ApiOperation({
		summary: '🚨 Weekly geofence violations',
		description: 'Days since Monday on which an employee exceeded the out-of-bounds threshold.',
	})
	@ApiQuery({ name: 'campusId', required: false, type: Number })
	@ApiOkResponse({ description: 'Violations for the current week' })
	getWeeklyViolations(@Req() req: AuthenticatedRequest, @Query() query: CampusQueryDto) {
		return this.violationReportsService.getWeeklyViolations(req.user, query.campusId);
	}

	@Get('red-notice/:userId')
	@RequireCapability(Capability.ISSUE_RED_NOTICE)
	@ApiOperation({ summary: '📊 Red notice eligibility', description: 'Violation count against the red notice limit.' })
	@ApiParam({ name: 'userId', type: Number })
	@ApiOkResponse({ description: 'Escalation status' })
	@ApiNotFoundResponse({ description: 'User not found' })
	checkEscalation(@Req() req: AuthenticatedRequest, @Param('userId', ParseIntPipe) userId: number) {
		return this.violationReportsService.checkEscalation(req.user, userId);
	}

	@Post('red-notice/:userId')
	@RequireCapability(Capability.ISSUE_RED_NOTICE)
	@ApiOperation({
		summary: '🟥 Issue red notice',
		description: 'Flags the employee once their violation count reaches the limit and emails them the notice.',
	})
	@ApiParam({ name: 'userId', type: Number })
	@ApiBody({ type: RedNoticeDto })
	@ApiCreatedResponse({ description: 'Outcome message with the violation count' })
	@ApiNotFoundResponse({ description: 'User not found' })
	issueRedNotice(
		@Req() req: AuthenticatedRequest,
		@Param('userId', ParseIntPipe) userId: number,
		@Body() redNoticeDto: RedNoticeDto,
	) {
		return this.violationReportsService.issueRedNotice(req.user, userId, redNoticeDto.reason);
	}

	@Delete('red-notice/:userId')
	@RequireCapability(Capability.REVOKE_RED_NOTICE)
	@ApiOperation({ summary: '↩️ Revoke red notice' })
	@ApiParam({ name: 'userId', type: Number })
	@ApiOkResponse({ description: 'Red notice revoked' })
	revokeRedNotice(@Req() req: AuthenticatedRequest, @Param('userId', ParseIntPipe) userId: number) {
		return this.violationReportsService.revokeRedNotice(req.user, userId);
	}
}
