import { Body, Controller, Get, Param, ParseIntPipe, Patch, Query, Req, UseGuards } from '@nestjs/common';
import { ApiBearerAuth, ApiForbiddenResponse, ApiOkResponse, ApiOperation, ApiParam, ApiTags, ApiUnauthorizedResponse } from '@nestjs/swagger';
import { UserService } from './user.service';
import { UpdateUserDto } from './dto/update-user.dto';
import { AuthGuard } from '../guards/auth.guard';
import { RoleGuard } from '../guards/role.guard';
import { RequireCapability } from '../decorators/capability.decorator';
import { Capability } from '../lib/enums/user.enums';
import { AuthenticatedRequest } from '../lib/interfaces/authenticated-request.interface';
import { CampusQueryDto } from '../lib/dto/campus-query.dto';

@ApiBearerAuth('JWT-auth')
@ApiTags('👥 Users')
@Controller('users')
@UseGuards(AuthGuard, RoleGuard)
@ApiUnauthorizedResponse({ description: '🔒 Unauthorized - Authentication required' })
@ApiForbiddenResponse({ description: '🚫 Forbidden - Insufficient permissions or campus scope' })
export class UserController {
	constructor(private readonly userService: UserService) {}

	@Get()
	@RequireCapability(Capability.VIEW_CAMPUS_USERS)
	@ApiOperation({
		summary: '📋 List users',
		description: 'Admins see the users of their own campus. Super admins see everyone or filter by campusId.',
	})
	@ApiOkResponse({ description: 'Users retrieved successfully' })
	findAll(@Req() req: AuthenticatedRequest, @Query() query: CampusQueryDto) {
		return this.userService.findAll(req.user, query.campusId);
	}

	@Patch(':uid')
	@RequireCapability(Capability.MANAGE_USERS)
	@ApiOperation({
		summary: '✏️ Update a user',
		description: 'Assigns campus, designation, department, shift, joining date, employee id, role or status.',
	})
	@ApiParam({ name: 'uid', description: 'User id', type: Number })
	@ApiOkResponse({ description: 'User updated successfully' })
	update(@Param('uid', ParseIntPipe) uid: number, @Body() updateUserDto: UpdateUserDto) {
		return this.userService.adminUpdate(uid, updateUserDto);
	}
}
