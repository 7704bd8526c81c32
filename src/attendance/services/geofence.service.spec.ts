import { Test, TestingModule } from '@nestjs/testing';
import { GeofenceService } from './geofence.service';
import { CampusService } from '../../campus/campus.service';

const square = (offset: number) => [
	{ latitude: offset, longitude: offset },
	{ latitude: offset, longitude: offset + 10 },
	{ latitude: offset + 10, longitude: offset + 10 },
	{ latitude: offset + 10, longitude: offset },
];

describe('GeofenceService', () => {
	let service: GeofenceService;
	const campusService = {
		getActiveCampuses: jest.fn(),
		findActiveByUid: jest.fn(),
	};

	beforeEach(async () => {
		campusService.getActiveCampuses.mockReset();
		campusService.findActiveByUid.mockReset();

		const module: TestingModule = await Test.createTestingModule({
			providers: [GeofenceService, { provide: CampusService, useValue: campusService }],
		}).compile();

		service = module.get<GeofenceService>(GeofenceService);
	});

	describe('findContainingCampus', () => {
		it('should select the campus whose boundary contains the point', async () => {
			campusService.getActiveCampuses.mockResolvedValue([
				{ uid: 1, name: 'Main Campus', boundary: square(0) },
				{ uid: 2, name: 'East Campus', boundary: square(100) },
			]);

			const campus = await service.findContainingCampus({ latitude: 105, longitude: 105 });

			expect(campus?.uid).toBe(2);
		});

		it('should resolve overlaps in registration order', async () => {
			campusService.getActiveCampuses.mockResolvedValue([
				{ uid: 1, name: 'Main Campus', boundary: square(0) },
				{ uid: 2, name: 'Annex', boundary: square(5) },
			]);

			const campus = await service.findContainingCampus({ latitude: 7, longitude: 7 });

			expect(campus?.name).toBe('Main Campus');
		});

		it('should return null when no campus contains the point', async () => {
			campusService.getActiveCampuses.mockResolvedValue([{ uid: 1, name: 'Main Campus', boundary: square(0) }]);

			expect(await service.findContainingCampus({ latitude: 50, longitude: 50 })).toBeNull();
		});
	});

	describe('isInsideCampus', () => {
		it('should test against the given campus only', async () => {
			campusService.findActiveByUid.mockResolvedValue({ uid: 1, name: 'Main Campus', boundary: square(0) });

			expect(await service.isInsideCampus({ latitude: 5, longitude: 5 }, 1)).toBe(true);
			expect(await service.isInsideCampus({ latitude: 50, longitude: 50 }, 1)).toBe(false);
		});

		it('should treat a removed campus as outside', async () => {
			campusService.findActiveByUid.mockResolvedValue(null);

			expect(await service.isInsideCampus({ latitude: 5, longitude: 5 }, 9)).toBe(false);
		});
	});
});
