import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { LeaveService } from './leave.service';
import { LeaveController } from './leave.controller';
import { HolidayService } from './holiday.service';
import { HolidayController } from './holiday.controller';
import { Leave } from './entities/leave.entity';
import { Holiday } from './entities/holiday.entity';
import { User } from '../user/entities/user.entity';
import { UserModule } from '../user/user.module';

@Module({
	imports: [TypeOrmModule.forFeature([Leave, Holiday, User]), UserModule],
	controllers: [LeaveController, HolidayController],
	providers: [LeaveService, HolidayService],
	exports: [LeaveService],
})
export class LeaveModule {}
