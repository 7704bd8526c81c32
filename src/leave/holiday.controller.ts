import { Body, Controller, Delete, Get, Param, ParseIntPipe, Post, Req, UseGuards } from '@nestjs/common';
import {
	ApiBearerAuth,
	ApiBody,
	ApiConflictResponse,
	ApiCreatedResponse,
	ApiOkResponse,
	ApiOperation,
	ApiParam,
	ApiTags,
	ApiUnauthorizedResponse,
} from '@nestjs/swagger';
import { HolidayService } from './holiday.service';
import { CreateHolidayDto } from './dto/create-holiday.dto';
import { AuthGuard } from '../guards/auth.guard';
import { RoleGuard } from '../guards/role.guard';
import { RequireCapability } from '../decorators/capability.decorator';
import { Capability } from '../lib/enums/user.enums';
import { AuthenticatedRequest } from '../lib/interfaces/authenticated-request.interface';

@ApiBearerAuth('JWT-auth')
@ApiTags('🎉 Holidays')
@Controller('holidays')
@UseGuards(AuthGuard, RoleGuard)
@ApiUnauthorizedResponse({ description: '🔒 Unauthorized - Authentication required' })
export class HolidayController {
	constructor(private readonly holidayService: HolidayService) {}

	@Post()
	@RequireCapability(Capability.MANAGE_HOLIDAYS)
	@ApiOperation({ summary: '📅 Declare a holiday' })
	@ApiBody({ type: CreateHolidayDto })
	@ApiCreatedResponse({ description: 'Holiday created successfully' })
	@ApiConflictResponse({ description: 'A holiday already exists on that date' })
	create(@Body() createHolidayDto: CreateHolidayDto) {
		return this.holidayService.create(createHolidayDto);
	}

	@Get()
	@ApiOperation({ summary: '📋 List holidays' })
	@ApiOkResponse({ description: 'Holidays retrieved successfully' })
	findAll() {
		return this.holidayService.findAll();
	}

	@Get('calendar')
	@ApiOperation({
		summary: '🗓️ Holiday calendar',
		description:
			'Gazetted (blue) and restricted (purple) holidays merged with the caller\'s leaves: green approved, yellow pending, red otherwise.',
	})
	@ApiOkResponse({ description: 'Calendar entries' })
	getCalendar(@Req() req: AuthenticatedRequest) {
		return this.holidayService.getCalendar(req.user);
	}

	@Delete(':uid')
	@RequireCapability(Capability.MANAGE_HOLIDAYS)
	@ApiOperation({ summary: '🗑️ Remove a holiday' })
	@ApiParam({ name: 'uid', type: Number })
	@ApiOkResponse({ description: 'Holiday removed successfully' })
	remove(@Param('uid', ParseIntPipe) uid: number) {
		return this.holidayService.remove(uid);
	}
}
