import {
	BadRequestException,
	ForbiddenException,
	HttpException,
	Injectable,
	Logger,
	NotFoundException,
} from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { EventEmitter2 } from '@nestjs/event-emitter';
import { DataSource, FindOptionsWhere, MoreThanOrEqual, Repository } from 'typeorm';
import { InventoryItem } from './entities/inventory-item.entity';
import { InventoryRequest } from './entities/inventory-request.entity';
import { CreateInventoryItemDto } from './dto/create-inventory-item.dto';
import { UpdateInventoryItemDto } from './dto/update-inventory-item.dto';
import { CreateInventoryRequestDto } from './dto/create-inventory-request.dto';
import { InventoryDecision } from './dto/process-inventory-request.dto';
import { InventoryRequestQueryDto } from './dto/inventory-query.dto';
import { CampusService } from '../campus/campus.service';
import { InventoryRequestStatus } from '../lib/enums/inventory.enums';
import { AccessLevel } from '../lib/enums/user.enums';
import { EmailType } from '../lib/enums/email.enums';
import { AuthenticatedUser } from '../lib/interfaces/authenticated-request.interface';
import { EmailTemplateData } from '../lib/types/email-templates.types';
import { canAccessCampus, resolveCampusScope } from '../lib/utils/access-level.util';

@Injectable()
export class InventoryService {
	private readonly logger = new Logger(InventoryService.name);

	constructor(
		@InjectRepository(InventoryItem)
		private itemRepository: Repository<InventoryItem>,
		@InjectRepository(InventoryRequest)
		private requestRepository: Repository<InventoryRequest>,
		private readonly campusService: CampusService,
		private readonly dataSource: DataSource,
		private readonly eventEmitter: EventEmitter2,
	) {}

	private async loadManagedItem(user: AuthenticatedUser, uid: number): Promise<InventoryItem> {
		const item = await this.itemRepository.findOne({ where: { uid, isDeleted: false } });

		if (!item) {
			throw new NotFoundException(`Inventory item ${uid} not found`);
		}

		if (!canAccessCampus(user, item.campusUid)) {
			throw new ForbiddenException('You can only manage inventory of your own campus');
		}

		return item;
	}

	async createItem(user: AuthenticatedUser, dto: CreateInventoryItemDto): Promise<{ message: string; item: InventoryItem }> {
		const campusUid = dto.campusUid ?? user.campusUid;

		if (campusUid === null) {
			throw new BadRequestException('campusUid is required');
		}

		if (!canAccessCampus(user, campusUid)) {
			throw new ForbiddenException('You can only manage inventory of your own campus');
		}

		if (!(await this.campusService.findActiveByUid(campusUid))) {
			throw new NotFoundException(`Campus ${campusUid} not found`);
		}

		const item = await this.itemRepository.save(
			this.itemRepository.create({
				name: dto.name.trim(),
				category: dto.category.trim(),
				quantity: dto.quantity,
				campusUid,
			}),
		);

		this.logger.log(`Inventory item ${item.uid} added at campus ${campusUid} by ${user.uid}`);
		return { message: 'Inventory item created successfully', item };
	}

	/**
	 * Employees browse the stock of their own campus; admins and super admins follow the
	 * usual campus scope.
	 */
	async findItems(user: AuthenticatedUser, campusId?: number): Promise<{ message: string; items: InventoryItem[] }> {
		const where: FindOptionsWhere<InventoryItem> = { isDeleted: false };

		if (user.role === AccessLevel.EMPLOYEE) {
			if (user.campusUid === null) {
				return { message: 'Inventory retrieved successfully', items: [] };
			}
			where.campusUid = user.campusUid;
		} else {
			const campusUid = resolveCampusScope(user, campusId);
			if (campusUid !== undefined) {
				where.campusUid = campusUid;
			}
		}

		const items = await this.itemRepository.find({ where, order: { category: 'ASC', name: 'ASC' } });
		return { message: 'Inventory retrieved successfully', items };
	}

	async updateItem(
		user: AuthenticatedUser,
		uid: number,
		dto: UpdateInventoryItemDto,
	): Promise<{ message: string; item: InventoryItem }> {
		const item = await this.loadManagedItem(user, uid);

		if (dto.name !== undefined) item.name = dto.name.trim();
		if (dto.category !== undefined) item.category = dto.category.trim();
		if (dto.quantity !== undefined) item.quantity = dto.quantity;

		const saved = await this.itemRepository.save(item);
		return { message: 'Inventory item updated successfully', item: saved };
	}

	async removeItem(user: AuthenticatedUser, uid: number): Promise<{ message: string }> {
		const item = await this.loadManagedItem(user, uid);

		await this.itemRepository.update({ uid: item.uid }, { isDeleted: true });
		this.logger.log(`Inventory item ${item.uid} removed by ${user.uid}`);

		return { message: 'Inventory item removed successfully' };
	}

	async createRequest(
		user: AuthenticatedUser,
		dto: CreateInventoryRequestDto,
	): Promise<{ message: string; request: InventoryRequest }> {
		const item = await this.itemRepository.findOne({ where: { uid: dto.itemUid, isDeleted: false } });

		if (!item) {
			throw new NotFoundException(`Inventory item ${dto.itemUid} not found`);
		}

		if (dto.quantity > item.quantity) {
			throw new BadRequestException(`Only ${item.quantity} unit(s) of ${item.name} available`);
		}

		const request = await this.requestRepository.save(
			this.requestRepository.create({
				requesterUid: user.uid,
				itemUid: item.uid,
				requestedQuantity: dto.quantity,
				reason: dto.reason.trim(),
				status: InventoryRequestStatus.PENDING,
			}),
		);

		this.logger.log(`User ${user.uid} requested ${dto.quantity} x item ${item.uid}`);
		return { message: 'Inventory request submitted successfully', request };
	}

	async findRequests(
		user: AuthenticatedUser,
		query: InventoryRequestQueryDto,
	): Promise<{ message: string; requests: InventoryRequest[] }> {
		const where: FindOptionsWhere<InventoryRequest> = {};

		if (user.role === AccessLevel.EMPLOYEE) {
			where.requesterUid = user.uid;
		} else {
			const campusUid = resolveCampusScope(user);
			if (campusUid !== undefined) {
				where.item = { campusUid };
			}
		}

		if (query.status) {
			where.status = query.status;
		}

		const requests = await this.requestRepository.find({
			where,
			relations: { item: true, requester: true },
			order: { createdAt: 'DESC' },
		});

		return { message: 'Inventory requests retrieved successfully', requests };
	}

	/**
	 * Approval takes the stock in the same transaction; it fails when the stock no longer
	 * covers the request.
	 */
	async processRequest(user: AuthenticatedUser, uid: number, status: InventoryDecision): Promise<{ message: string }> {
		const request = await this.requestRepository.findOne({
			where: { uid },
			relations: { item: true, requester: true },
		});

		if (!request || !request.item) {
			throw new NotFoundException(`Inventory request ${uid} not found`);
		}

		if (!canAccessCampus(user, request.item.campusUid)) {
			throw new ForbiddenException('You can only process requests for your own campus');
		}

		if (request.status !== InventoryRequestStatus.PENDING) {
			throw new BadRequestException(`Inventory request is already ${request.status}`);
		}

		const queryRunner = this.dataSource.createQueryRunner();
		await queryRunner.connect();
		await queryRunner.startTransaction();

		try {
			const claimed = await queryRunner.manager.update(
				InventoryRequest,
				{ uid: request.uid, status: InventoryRequestStatus.PENDING },
				{ status, processedByUid: user.uid, processedAt: new Date() },
			);

			if (!claimed.affected) {
				throw new BadRequestException('Inventory request is no longer pending');
			}

			if (status === InventoryRequestStatus.APPROVED) {
				const taken = await queryRunner.manager.decrement(
					InventoryItem,
					{ uid: request.itemUid, quantity: MoreThanOrEqual(request.requestedQuantity) },
					'quantity',
					request.requestedQuantity,
				);

				if (!taken.affected) {
					throw new BadRequestException(`Not enough ${request.item.name} in stock`);
				}
			}

			await queryRunner.commitTransaction();
		} catch (error) {
			await queryRunner.rollbackTransaction();

			if (error instanceof HttpException) {
				throw error;
			}
			this.logger.error(`Failed to process inventory request ${uid}`, error instanceof Error ? error.stack : undefined);
			throw new BadRequestException('Failed to process inventory request');
		} finally {
			await queryRunner.release();
		}

		this.logger.log(`Inventory request ${uid} ${status.toLowerCase()} by ${user.uid}`);

		if (request.requester) {
			const data: EmailTemplateData<EmailType.INVENTORY_REQUEST_UPDATE> = {
				name: request.requester.fullName,
				itemName: request.item.name,
				quantity: request.requestedQuantity,
				status,
			};
			this.eventEmitter.emit('send.email', EmailType.INVENTORY_REQUEST_UPDATE, [request.requester.email], data);
		}

		return { message: `Inventory request ${status.toLowerCase()}` };
	}
}
