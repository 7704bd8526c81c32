import { BadRequestException, ConflictException, HttpException, Inject, Injectable, Logger, NotFoundException } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { ConfigService } from '@nestjs/config';
import { CACHE_MANAGER } from '@nestjs/cache-manager';
import { Cache } from 'cache-manager';
import { Repository } from 'typeorm';
import { Campus } from './entities/campus.entity';
import { CreateCampusDto } from './dto/create-campus.dto';
import { UpdateCampusDto } from './dto/update-campus.dto';
import { GeoPoint } from '../lib/interfaces/geo-point.interface';
import { GeofenceUtils } from '../lib/utils/geofence.utils';

@Injectable()
export class CampusService {
	private readonly logger = new Logger(CampusService.name);
	private readonly CACHE_PREFIX = 'campus';
	private readonly ALL_CAMPUSES_CACHE_KEY = `${this.CACHE_PREFIX}:all`;
	private readonly CACHE_TTL: number;

	constructor(
		@InjectRepository(Campus)
		private campusRepository: Repository<Campus>,
		@Inject(CACHE_MANAGER) private cacheManager: Cache,
		private readonly configService: ConfigService,
	) {
		// seconds in config, milliseconds for cache-manager
		this.CACHE_TTL = parseInt(this.configService.get<string>('CACHE_EXPIRATION_TIME') ?? '600', 10) * 1000;
	}

	private async clearCampusCache(): Promise<void> {
		await this.cacheManager.del(this.ALL_CAMPUSES_CACHE_KEY);
	}

	private assertValidBoundary(boundary: GeoPoint[]): GeoPoint[] {
		if (!GeofenceUtils.isValidBoundary(boundary)) {
			throw new BadRequestException('Boundary must have at least 3 distinct vertices enclosing a non-zero area');
		}
		return boundary.map(({ latitude, longitude }) => ({ latitude, longitude }));
	}

	/**
	 * Active campuses in registration order. The geofence evaluator walks this list on every
	 * punch, so it is served from cache.
	 */
	async getActiveCampuses(): Promise<Campus[]> {
		const cached = await this.cacheManager.get<Campus[]>(this.ALL_CAMPUSES_CACHE_KEY);

		if (cached) {
			return cached;
		}

		const campuses = await this.campusRepository.find({
			where: { isDeleted: false },
			order: { uid: 'ASC' },
		});

		await this.cacheManager.set(this.ALL_CAMPUSES_CACHE_KEY, campuses, this.CACHE_TTL);
		return campuses;
	}

	async findActiveByUid(uid: number): Promise<Campus | null> {
		const campuses = await this.getActiveCampuses();
		return campuses.find((campus) => campus.uid === uid) ?? null;
	}

	async findAll(): Promise<{ message: string; campuses: Campus[] }> {
		const campuses = await this.getActiveCampuses();
		return { message: 'Campuses retrieved successfully', campuses };
	}

	async findOne(uid: number): Promise<{ message: string; campus: Campus }> {
		const campus = await this.findActiveByUid(uid);

		if (!campus) {
			throw new NotFoundException(`Campus ${uid} not found`);
		}

		return { message: 'Campus retrieved successfully', campus };
	}

	async create(createCampusDto: CreateCampusDto): Promise<{ message: string; campus: Campus }> {
		try {
			const boundary = this.assertValidBoundary(createCampusDto.boundary);
			const name = createCampusDto.name.trim();

			const existing = await this.campusRepository.findOne({ where: { name } });
			if (existing) {
				throw new ConflictException(`A campus named "${name}" already exists`);
			}

			const campus = await this.campusRepository.save(
				this.campusRepository.create({
					name,
					boundary,
					address: createCampusDto.address ?? null,
				}),
			);

			await this.clearCampusCache();
			this.logger.log(`Campus ${campus.uid} (${campus.name}) registered with ${boundary.length} vertices`);

			return { message: 'Campus created successfully', campus };
		} catch (error) {
			if (error instanceof HttpException) {
				throw error;
			}
			this.logger.error('Failed to create campus', error instanceof Error ? error.stack : undefined);
			throw new BadRequestException('Failed to create campus');
		}
	}

	async update(uid: number, updateCampusDto: UpdateCampusDto): Promise<{ message: string; campus: Campus }> {
		try {
			const campus = await this.campusRepository.findOne({ where: { uid, isDeleted: false } });

			if (!campus) {
				throw new NotFoundException(`Campus ${uid} not found`);
			}

			if (updateCampusDto.name !== undefined) {
				const name = updateCampusDto.name.trim();
				const clash = await this.campusRepository.findOne({ where: { name } });
				if (clash && clash.uid !== uid) {
					throw new ConflictException(`A campus named "${name}" already exists`);
				}
				campus.name = name;
			}

			if (updateCampusDto.boundary !== undefined) {
				campus.boundary = this.assertValidBoundary(updateCampusDto.boundary);
			}

			if (updateCampusDto.address !== undefined) {
				campus.address = updateCampusDto.address;
			}

			const saved = await this.campusRepository.save(campus);
			await this.clearCampusCache();
			this.logger.log(`Campus ${uid} updated`);

			return { message: 'Campus updated successfully', campus: saved };
		} catch (error) {
			if (error instanceof HttpException) {
				throw error;
			}
			this.logger.error(`Failed to update campus ${uid}`, error instanceof Error ? error.stack : undefined);
			throw new BadRequestException('Failed to update campus');
		}
	}

	async remove(uid: number): Promise<{ message: string }> {
		const result = await this.campusRepository.update({ uid, isDeleted: false }, { isDeleted: true });

		if (!result.affected) {
			throw new NotFoundException(`Campus ${uid} not found`);
		}

		await this.clearCampusCache();
		this.logger.log(`Campus ${uid} removed`);

		return { message: 'Campus removed successfully' };
	}
}
