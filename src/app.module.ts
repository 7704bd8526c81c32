import { Module } from '@nestjs/common';
import { APP_GUARD } from '@nestjs/core';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { TypeOrmModule } from '@nestjs/typeorm';
import { CacheModule } from '@nestjs/cache-manager';
import { EventEmitterModule } from '@nestjs/event-emitter';
import { ThrottlerGuard, ThrottlerModule } from '@nestjs/throttler';
import { AppController } from './app.controller';
import { AppService } from './app.service';
import { AuthModule } from './auth/auth.module';
import { UserModule } from './user/user.module';
import { CampusModule } from './campus/campus.module';
import { AttendanceModule } from './attendance/attendance.module';
import { LeaveModule } from './leave/leave.module';
import { InventoryModule } from './inventory/inventory.module';
import { AnnouncementsModule } from './announcements/announcements.module';
import { CommunicationModule } from './communication/communication.module';

const toInt = (value: string | undefined, fallback: number): number => {
	const parsed = parseInt(value ?? '', 10);
	return Number.isNaN(parsed) ? fallback : parsed;
};

@Module({
	imports: [
		ConfigModule.forRoot({
			isGlobal: true,
		}),
		CacheModule.register({
			ttl: toInt(process.env.CACHE_EXPIRATION_TIME, 600) * 1000,
			max: toInt(process.env.CACHE_MAX_ITEMS, 1000),
			isGlobal: true,
		}),
		EventEmitterModule.forRoot(),
		ThrottlerModule.forRoot([
			{
				name: 'default',
				ttl: 60000,
				limit: toInt(process.env.THROTTLE_LIMIT, 100),
			},
		]),
		TypeOrmModule.forRootAsync({
			imports: [ConfigModule],
			useFactory: (configService: ConfigService) => ({
				type: 'mysql',
				host: configService.get<string>('DATABASE_HOST'),
				port: toInt(configService.get<string>('DATABASE_PORT'), 3306),
				username: configService.get<string>('DATABASE_USER'),
				password: configService.get<string>('DATABASE_PASSWORD'),
				database: configService.get<string>('DATABASE_NAME'),
				autoLoadEntities: true,
				synchronize: configService.get<string>('DATABASE_SYNCHRONIZE') !== 'false',
				logging: false,
				extra: {
					connectionLimit: toInt(configService.get<string>('DB_CONNECTION_LIMIT'), 10),
					ssl: configService.get<string>('NODE_ENV') === 'production' ? { rejectUnauthorized: false } : false,
					charset: 'utf8mb4',
					timezone: 'Z',
				},
				retryAttempts: 10,
				retryDelay: 1000,
			}),
			inject: [ConfigService],
		}),
		AuthModule,
		UserModule,
		CampusModule,
		AttendanceModule,
		LeaveModule,
		InventoryModule,
		AnnouncementsModule,
		CommunicationModule,
	],
	controllers: [AppController],
	providers: [
		AppService,
		{
			provide: APP_GUARD,
			useClass: ThrottlerGuard,
		},
	],
})
export class AppModule {}
