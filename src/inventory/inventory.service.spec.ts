import { Test, TestingModule } from '@nestjs/testing';
import { getRepositoryToken } from '@nestjs/typeorm';
import { EventEmitter2 } from '@nestjs/event-emitter';
import { ForbiddenException } from '@nestjs/common';
import { DataSource, MoreThanOrEqual } from 'typeorm';
import { InventoryService } from './inventory.service';
import { InventoryItem } from './entities/inventory-item.entity';
import { InventoryRequest } from './entities/inventory-request.entity';
import { CampusService } from '../campus/campus.service';
import { InventoryRequestStatus } from '../lib/enums/inventory.enums';
import { AccessLevel } from '../lib/enums/user.enums';
import { EmailType } from '../lib/enums/email.enums';
import { AuthenticatedUser } from '../lib/interfaces/authenticated-request.interface';
import { RepositoryMock, repositoryMockFactory } from '../../test/utils/mock-factory';

const employee: AuthenticatedUser = {
	uid: 42,
	email: 'jane.doe@university.edu',
	fullName: 'Jane Doe',
	role: AccessLevel.EMPLOYEE,
	campusUid: 3,
};

const campusAdmin: AuthenticatedUser = {
	uid: 2,
	email: 'director-north@university.edu',
	fullName: 'North Director',
	role: AccessLevel.ADMIN,
	campusUid: 3,
};

describe('InventoryService', () => {
	let service: InventoryService;
	let itemRepository: RepositoryMock;
	let requestRepository: RepositoryMock;
	const campusService = { findActiveByUid: jest.fn() };
	const eventEmitter = { emit: jest.fn() };
	const queryRunner = {
		connect: jest.fn(),
		startTransaction: jest.fn(),
		commitTransaction: jest.fn(),
		rollbackTransaction: jest.fn(),
		release: jest.fn(),
		manager: { update: jest.fn(), decrement: jest.fn() },
	};

	const projector = { uid: 5, name: 'Projector', category: 'Electronics', quantity: 4, campusUid: 3, isDeleted: false };

	const pendingRequest = () => ({
		uid: 20,
		itemUid: 5,
		item: projector,
		requesterUid: 42,
		requester: { fullName: 'Jane Doe', email: 'jane.doe@university.edu' },
		requestedQuantity: 2,
		status: InventoryRequestStatus.PENDING,
	});

	beforeEach(async () => {
		jest.clearAllMocks();

		const module: TestingModule = await Test.createTestingModule({
			providers: [
				InventoryService,
				{ provide: getRepositoryToken(InventoryItem), useFactory: repositoryMockFactory },
				{ provide: getRepositoryToken(InventoryRequest), useFactory: repositoryMockFactory },
				{ provide: CampusService, useValue: campusService },
				{ provide: DataSource, useValue: { createQueryRunner: () => queryRunner } },
				{ provide: EventEmitter2, useValue: eventEmitter },
			],
		}).compile();

		service = module.get<InventoryService>(InventoryService);
		itemRepository = module.get(getRepositoryToken(InventoryItem));
		requestRepository = module.get(getRepositoryToken(InventoryRequest));
	});

	describe('createItem', () => {
		it('should add stock to the admin campus', async () => {
			campusService.findActiveByUid.mockResolvedValue({ uid: 3, name: 'North Campus' });

			await service.createItem(campusAdmin, { name: ' Projector ', category: 'Electronics', quantity: 4 });

			expect(itemRepository.save).toHaveBeenCalledWith({
				name: 'Projector',
				category: 'Electronics',
				quantity: 4,
				campusUid: 3,
			});
		});

		it('should forbid admins adding stock to another campus', async () => {
			await expect(
				service.createItem(campusAdmin, { name: 'Projector', category: 'Electronics', quantity: 4, campusUid: 7 }),
			).rejects.toThrow(ForbiddenException);
		});
	});

	describe('createRequest', () => {
		it('should refuse quantities beyond the stock', async () => {
			itemRepository.findOne.mockResolvedValue(projector);

			await expect(service.createRequest(employee, { itemUid: 5, quantity: 5, reason: 'Seminar' })).rejects.toThrow(
				'Only 4 unit(s) of Projector available',
			);
		});

		it('should file a pending request', async () => {
			itemRepository.findOne.mockResolvedValue(projector);

			const result = await service.createRequest(employee, { itemUid: 5, quantity: 2, reason: 'Seminar' });

			expect(result.request).toEqual({
				requesterUid: 42,
				itemUid: 5,
				requestedQuantity: 2,
				reason: 'Seminar',
				status: InventoryRequestStatus.PENDING,
			});
		});
	});

	describe('findRequests', () => {
		it('should show employees only their own requests', async () => {
			requestRepository.find.mockResolvedValue([]);

			await service.findRequests(employee, {});

			expect(requestRepository.find).toHaveBeenCalledWith(expect.objectContaining({ where: { requesterUid: 42 } }));
		});

		it('should show admins the requests for their campus stock', async () => {
			requestRepository.find.mockResolvedValue([]);

			await service.findRequests(campusAdmin, { status: InventoryRequestStatus.PENDING });

			expect(requestRepository.find).toHaveBeenCalledWith(
				expect.objectContaining({ where: { item: { campusUid: 3 }, status: InventoryRequestStatus.PENDING } }),
			);
		});
	});

	describe('processRequest', () => {
		it('should take the stock when approving', async () => {
			requestRepository.findOne.mockResolvedValue(pendingRequest());
			queryRunner.manager.update.mockResolvedValue({ affected: 1 });
			queryRunner.manager.decrement.mockResolvedValue({ affected: 1 });

			const result = await service.processRequest(campusAdmin, 20, InventoryRequestStatus.APPROVED);

			expect(result).toEqual({ message: 'Inventory request approved' });
			expect(queryRunner.manager.decrement).toHaveBeenCalledWith(
				InventoryItem,
				{ uid: 5, quantity: MoreThanOrEqual(2) },
				'quantity',
				2,
			);
			expect(queryRunner.commitTransaction).toHaveBeenCalled();
			expect(eventEmitter.emit).toHaveBeenCalledWith(
				'send.email',
				EmailType.INVENTORY_REQUEST_UPDATE,
				['jane.doe@university.edu'],
				{ name: 'Jane Doe', itemName: 'Projector', quantity: 2, status: InventoryRequestStatus.APPROVED },
			);
		});

		it('should roll back when the stock ran out', async () => {
			requestRepository.findOne.mockResolvedValue(pendingRequest());
			queryRunner.manager.update.mockResolvedValue({ affected: 1 });
			queryRunner.manager.decrement.mockResolvedValue({ affected: 0 });

			await expect(service.processRequest(campusAdmin, 20, InventoryRequestStatus.APPROVED)).rejects.toThrow(
				'Not enough Projector in stock',
			);
			expect(queryRunner.rollbackTransaction).toHaveBeenCalled();
			expect(queryRunner.release).toHaveBeenCalled();
		});

		it('should only record a rejection', async () => {
			requestRepository.findOne.mockResolvedValue(pendingRequest());
			queryRunner.manager.update.mockResolvedValue({ affected: 1 });

			const result = await service.processRequest(campusAdmin, 20, InventoryRequestStatus.REJECTED);

			expect(result).toEqual({ message: 'Inventory request rejected' });
			expect(queryRunner.manager.decrement).not.toHaveBeenCalled();
		});

		it('should forbid admins of another campus', async () => {
			requestRepository.findOne.mockResolvedValue({ ...pendingRequest(), item: { ...projector, campusUid: 8 } });

			await expect(service.processRequest(campusAdmin, 20, InventoryRequestStatus.APPROVED)).rejects.toThrow(
				ForbiddenException,
			);
		});
	});
});
