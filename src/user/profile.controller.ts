import { Body, Controller, Get, Patch, Req, UseGuards } from '@nestjs/common';
import { ApiBearerAuth, ApiOkResponse, ApiOperation, ApiTags, ApiUnauthorizedResponse } from '@nestjs/swagger';
import { UserService } from './user.service';
import { UpdateProfileDto } from './dto/update-profile.dto';
import { AuthGuard } from '../guards/auth.guard';
import { RoleGuard } from '../guards/role.guard';
import { RequireCapability } from '../decorators/capability.decorator';
import { Capability } from '../lib/enums/user.enums';
import { AuthenticatedRequest } from '../lib/interfaces/authenticated-request.interface';

@ApiBearerAuth('JWT-auth')
@ApiTags('🙋 Profile')
@Controller('profile')
@UseGuards(AuthGuard, RoleGuard)
@ApiUnauthorizedResponse({ description: '🔒 Unauthorized - Authentication required' })
export class ProfileController {
	constructor(private readonly userService: UserService) {}

	@Get('me')
	@ApiOperation({ summary: '🙋 Get my profile' })
	@ApiOkResponse({ description: 'Profile retrieved successfully' })
	getProfile(@Req() req: AuthenticatedRequest) {
		return this.userService.getProfile(req.user.uid);
	}

	@Patch('me')
	@ApiOperation({ summary: '✏️ Update my name or profile picture' })
	@ApiOkResponse({ description: 'Profile updated successfully' })
	updateProfile(@Req() req: AuthenticatedRequest, @Body() updateProfileDto: UpdateProfileDto) {
		return this.userService.updateProfile(req.user.uid, updateProfileDto);
	}

	@Get('leave-balance')
	@RequireCapability(Capability.REQUEST_LEAVE)
	@ApiOperation({ summary: '🌴 Get my remaining leave days' })
	@ApiOkResponse({ description: 'Leave balance retrieved successfully' })
	getLeaveBalance(@Req() req: AuthenticatedRequest) {
		return this.userService.getLeaveBalance(req.user.uid);
	}
}
