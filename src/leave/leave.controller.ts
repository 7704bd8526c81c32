import { Body, Controller, Get, Param, ParseIntPipe, Patch, Post, Query, Req, UseGuards } from '@nestjs/common';
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
	ApiTags,
	ApiUnauthorizedResponse,
} from '@nestjs/swagger';
import { LeaveService } from './leave.service';
import { CreateLeaveDto } from './dto/create-leave.dto';
import { LeaveQueryDto } from './dto/leave-query.dto';
import { RejectLeaveDto } from './dto/reject-leave.dto';
import { AuthGuard } from '../guards/auth.guard';
import { RoleGuard } from '../guards/role.guard';
import { RequireCapability } from '../decorators/capability.decorator';
import { Capability } from '../lib/enums/user.enums';
import { AuthenticatedRequest } from '../lib/interfaces/authenticated-request.interface';

@ApiBearerAuth('JWT-auth')
@ApiTags('🌴 Leave Management')
@Controller('leave')
@UseGuards(AuthGuard, RoleGuard)
@ApiUnauthorizedResponse({ description: '🔒 Unauthorized - Authentication required' })
@ApiForbiddenResponse({ description: '🚫 Forbidden - Insufficient permissions' })
export class LeaveController {
	constructor(private readonly leaveService: LeaveService) {}

	@Post()
	@RequireCapability(Capability.REQUEST_LEAVE)
	@ApiOperation({
		summary: '📝 Apply for leave',
		description: 'Files a pending request. Paid leave types must be covered by the remaining balance.',
	})
	@ApiBody({ type: CreateLeaveDto })
	@ApiCreatedResponse({ description: 'Leave request submitted successfully' })
	@ApiBadRequestResponse({ description: 'Invalid range, overlapping leave or insufficient balance' })
	apply(@Req() req: AuthenticatedRequest, @Body() createLeaveDto: CreateLeaveDto) {
		return this.leaveService.apply(req.user, createLeaveDto);
	}

	@Get('mine')
	@RequireCapability(Capability.REQUEST_LEAVE)
	@ApiOperation({ summary: '📋 My leave requests' })
	@ApiOkResponse({ description: 'Leaves retrieved successfully' })
	getMine(@Req() req: AuthenticatedRequest, @Query() query: LeaveQueryDto) {
		return this.leaveService.getMine(req.user, query);
	}

	@Patch(':uid/cancel')
	@RequireCapability(Capability.REQUEST_LEAVE)
	@ApiOperation({ summary: '🚫 Cancel a pending request' })
	@ApiParam({ name: 'uid', type: Number })
	@ApiOkResponse({ description: 'Leave request cancelled' })
	@ApiNotFoundResponse({ description: 'Leave request not found' })
	cancel(@Req() req: AuthenticatedRequest, @Param('uid', ParseIntPipe) uid: number) {
		return this.leaveService.cancel(req.user, uid);
	}

	@Get('pending')
	@RequireCapability(Capability.DECIDE_LEAVE)
	@ApiOperation({
		summary: '⏳ Pending requests to decide',
		description: 'Admins see employee requests of their campus; super admins see requests filed by admins.',
	})
	@ApiOkResponse({ description: 'Pending leave requests retrieved successfully' })
	getPending(@Req() req: AuthenticatedRequest) {
		return this.leaveService.getPending(req.user);
	}

	@Patch(':uid/approve')
	@RequireCapability(Capability.DECIDE_LEAVE)
	@ApiOperation({ summary: '✅ Approve', description: 'Deducts the duration from the matching leave balance.' })
	@ApiParam({ name: 'uid', type: Number })
	@ApiOkResponse({ description: 'Leave request approved successfully' })
	@ApiNotFoundResponse({ description: 'Leave request not found' })
	approve(@Req() req: AuthenticatedRequest, @Param('uid', ParseIntPipe) uid: number) {
		return this.leaveService.approve(req.user, uid);
	}

	@Patch(':uid/reject')
	@RequireCapability(Capability.DECIDE_LEAVE)
	@ApiOperation({ summary: '❌ Reject' })
	@ApiParam({ name: 'uid', type: Number })
	@ApiBody({ type: RejectLeaveDto })
	@ApiOkResponse({ description: 'Leave request rejected' })
	@ApiNotFoundResponse({ description: 'Leave request not found' })
	reject(@Req() req: AuthenticatedRequest, @Param('uid', ParseIntPipe) uid: number, @Body() rejectLeaveDto: RejectLeaveDto) {
		return this.leaveService.reject(req.user, uid, rejectLeaveDto.reason);
	}
}
