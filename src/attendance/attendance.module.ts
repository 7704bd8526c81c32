import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { AttendanceService } from './attendance.service';
import { AttendanceController } from './attendance.controller';
import { Attendance } from './entities/attendance.entity';
import { GeofenceService } from './services/geofence.service';
import { ViolationReportsService } from './services/violation-reports.service';
import { User } from '../user/entities/user.entity';
import { UserModule } from '../user/user.module';
import { CampusModule } from '../campus/campus.module';

@Module({
	imports: [TypeOrmModule.forFeature([Attendance, User]), UserModule, CampusModule],
	controllers: [AttendanceController],
	providers: [AttendanceService, GeofenceService, ViolationReportsService],
	exports: [AttendanceService, GeofenceService],
})
export class AttendanceModule {}
