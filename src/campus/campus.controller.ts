import { Body, Controller, Delete, Get, Param, ParseIntPipe, Patch, Post, UseGuards } from '@nestjs/common';
import {
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
import { CampusService } from './campus.service';
import { CreateCampusDto } from './dto/create-campus.dto';
import { UpdateCampusDto } from './dto/update-campus.dto';
import { AuthGuard } from '../guards/auth.guard';
import { RoleGuard } from '../guards/role.guard';
import { RequireCapability } from '../decorators/capability.decorator';
import { Capability } from '../lib/enums/user.enums';

@ApiBearerAuth('JWT-auth')
@ApiTags('🏫 Campus')
@Controller('campus')
@UseGuards(AuthGuard, RoleGuard)
@ApiUnauthorizedResponse({ description: '🔒 Unauthorized - Authentication required' })
@ApiForbiddenResponse({ description: '🚫 Forbidden - Insufficient permissions' })
export class CampusController {
	constructor(private readonly campusService: CampusService) {}

	@Post()
	@RequireCapability(Capability.MANAGE_CAMPUSES)
	@ApiOperation({
		summary: '🏗️ Register a campus',
		description: 'Adds a campus with its geofence polygon. Campuses are tried in registration order when a punch is located.',
	})
	@ApiBody({ type: CreateCampusDto })
	@ApiCreatedResponse({ description: 'Campus created successfully' })
	create(@Body() createCampusDto: CreateCampusDto) {
		return this.campusService.create(createCampusDto);
	}

	@Get()
	@ApiOperation({ summary: '📋 List active campuses' })
	@ApiOkResponse({ description: 'Campuses retrieved successfully' })
	findAll() {
		return this.campusService.findAll();
	}

	@Get(':uid')
	@ApiOperation({ summary: '🔍 Get a campus' })
	@ApiParam({ name: 'uid', type: Number })
	@ApiOkResponse({ description: 'Campus retrieved successfully' })
	@ApiNotFoundResponse({ description: 'Campus not found' })
	findOne(@Param('uid', ParseIntPipe) uid: number) {
		return this.campusService.findOne(uid);
	}

	@Patch(':uid')
	@RequireCapability(Capability.MANAGE_CAMPUSES)
	@ApiOperation({
		summary: '✏️ Update a campus',
		description: 'Boundary changes apply to later pings; attendance already recorded keeps its campus.',
	})
	@ApiParam({ name: 'uid', type: Number })
	@ApiOkResponse({ description: 'Campus updated successfully' })
	update(@Param('uid', ParseIntPipe) uid: number, @Body() updateCampusDto: UpdateCampusDto) {
		return this.campusService.update(uid, updateCampusDto);
	}

	@Delete(':uid')
	@RequireCapability(Capability.MANAGE_CAMPUSES)
	@ApiOperation({ summary: '🗑️ Remove a campus', description: 'Soft delete; the campus stops matching punches.' })
	@ApiParam({ name: 'uid', type: Number })
	@ApiOkResponse({ description: 'Campus removed successfully' })
	remove(@Param('uid', ParseIntPipe) uid: number) {
		return this.campusService.remove(uid);
	}
}
