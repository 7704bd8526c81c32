import { Body, Controller, Delete, Get, Param, ParseIntPipe, Patch, Post, Query, Req, UseGuards } from '@nestjs/common';
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
import { InventoryService } from './inventory.service';
import { CreateInventoryItemDto } from './dto/create-inventory-item.dto';
import { UpdateInventoryItemDto } from './dto/update-inventory-item.dto';
import { CreateInventoryRequestDto } from './dto/create-inventory-request.dto';
import { ProcessInventoryRequestDto } from './dto/process-inventory-request.dto';
import { InventoryRequestQueryDto } from './dto/inventory-query.dto';
import { CampusQueryDto } from '../lib/dto/campus-query.dto';
import { AuthGuard } from '../guards/auth.guard';
import { RoleGuard } from '../guards/role.guard';
import { RequireCapability } from '../decorators/capability.decorator';
import { Capability } from '../lib/enums/user.enums';
import { AuthenticatedRequest } from '../lib/interfaces/authenticated-request.interface';

@ApiBearerAuth('JWT-auth')
@ApiTags('📦 Inventory')
@Controller('inventory')
@UseGuards(AuthGuard, RoleGuard)
@ApiUnauthorizedResponse({ description: '🔒 Unauthorized - Authentication required' })
@ApiForbiddenResponse({ description: '🚫 Forbidden - Insufficient permissions' })
export class InventoryController {
	constructor(private readonly inventoryService: InventoryService) {}

	@Post('items')
	@RequireCapability(Capability.MANAGE_INVENTORY)
	@ApiOperation({ summary: '➕ Add an item', description: 'Admins add stock to their own campus.' })
	@ApiBody({ type: CreateInventoryItemDto })
	@ApiCreatedResponse({ description: 'Inventory item created successfully' })
	createItem(@Req() req: AuthenticatedRequest, @Body() createInventoryItemDto: CreateInventoryItemDto) {
		return this.inventoryService.createItem(req.user, createInventoryItemDto);
	}

	@Get('items')
	@RequireCapability(Capability.REQUEST_INVENTORY)
	@ApiOperation({ summary: '📋 List items' })
	@ApiOkResponse({ description: 'Inventory retrieved successfully' })
	findItems(@Req() req: AuthenticatedRequest, @Query() query: CampusQueryDto) {
		return this.inventoryService.findItems(req.user, query.campusId);
	}

	@Patch('items/:uid')
	@RequireCapability(Capability.MANAGE_INVENTORY)
	@ApiOperation({ summary: '✏️ Update an item' })
	@ApiParam({ name: 'uid', type: Number })
	@ApiOkResponse({ description: 'Inventory item updated successfully' })
	@ApiNotFoundResponse({ description: 'Inventory item not found' })
	updateItem(
		@Req() req: AuthenticatedRequest,
		@Param('uid', ParseIntPipe) uid: number,
		@Body() updateInventoryItemDto: UpdateInventoryItemDto,
	) {
		return this.inventoryService.updateItem(req.user, uid, updateInventoryItemDto);
	}

	@Delete('items/:uid')
	@RequireCapability(Capability.MANAGE_INVENTORY)
	@ApiOperation({ summary: '🗑️ Remove an item' })
	@ApiParam({ name: 'uid', type: Number })
	@ApiOkResponse({ description: 'Inventory item removed successfully' })
	removeItem(@Req() req: AuthenticatedRequest, @Param('uid', ParseIntPipe) uid: number) {
		return this.inventoryService.removeItem(req.user, uid);
	}

	@Post('requests')
	@RequireCapability(Capability.REQUEST_INVENTORY)
	@ApiOperation({ summary: '🙋 Request items', description: 'The quantity must be in stock when the request is filed.' })
	@ApiBody({ type: CreateInventoryRequestDto })
	@ApiCreatedResponse({ description: 'Inventory request submitted successfully' })
	@ApiBadRequestResponse({ description: 'Quantity exceeds the stock' })
	createRequest(@Req() req: AuthenticatedRequest, @Body() createInventoryRequestDto: CreateInventoryRequestDto) {
		return this.inventoryService.createRequest(req.user, createInventoryRequestDto);
	}

	@Get('requests')
	@RequireCapability(Capability.REQUEST_INVENTORY)
	@ApiOperation({
		summary: '📋 List requests',
		description: 'Employees see their own requests; admins see requests for their campus stock.',
	})
	@ApiOkResponse({ description: 'Inventory requests retrieved successfully' })
	findRequests(@Req() req: AuthenticatedRequest, @Query() query: InventoryRequestQueryDto) {
		return this.inventoryService.findRequests(req.user, query);
	}

	@Patch('requests/:uid')
	@RequireCapability(Capability.MANAGE_INVENTORY)
	@ApiOperation({ summary: '⚖️ Approve or reject a request', description: 'Approval takes the quantity from stock.' })
	@ApiParam({ name: 'uid', type: Number })
	@ApiBody({ type: ProcessInventoryRequestDto })
	@ApiOkResponse({ description: 'Inventory request processed' })
	processRequest(
		@Req() req: AuthenticatedRequest,
		@Param('uid', ParseIntPipe) uid: number,
		@Body() processInventoryRequestDto: ProcessInventoryRequestDto,
	) {
		return this.inventoryService.processRequest(req.user, uid, processInventoryRequestDto.status);
	}
}
