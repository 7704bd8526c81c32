import { Test, TestingModule } from '@nestjs/testing';
import { getDataSourceToken } from '@nestjs/typeorm';
import { AppService } from './app.service';

describe('AppService', () => {
	const dataSource = { isInitialized: true };
	let service: AppService;

	beforeEach(async () => {
		const module: TestingModule = await Test.createTestingModule({
			providers: [AppService, { provide: getDataSourceToken(), useValue: dataSource }],
		}).compile();

		service = module.get<AppService>(AppService);
	});

	it('should report ok while the database is connected', () => {
		dataSource.isInitialized = true;
		expect(service.getHealth()).toEqual(expect.objectContaining({ status: 'ok', database: true }));
	});

	it('should report degraded without a database connection', () => {
		dataSource.isInitialized = false;
		expect(service.getHealth()).toEqual(expect.objectContaining({ status: 'degraded', database: false }));
	});
});
