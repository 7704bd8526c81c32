import { Injectable } from '@nestjs/common';
import { InjectDataSource } from '@nestjs/typeorm';
import { DataSource } from 'typeorm';

export interface HealthStatus {
	status: 'ok' | 'degraded';
	database: boolean;
	timestamp: string;
}

@Injectable()
export class AppService {
	constructor(
		@InjectDataSource()
		private dataSource: DataSource,
	) {}

	getHealth(): HealthStatus {
		const database = this.dataSource.isInitialized;

		return {
			status: database ? 'ok' : 'degraded',
			database,
			timestamp: new Date().toISOString(),
		};
	}
}
