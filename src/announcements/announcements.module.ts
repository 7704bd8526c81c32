import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { AnnouncementsService } from './announcements.service';
import { AnnouncementsController } from './announcements.controller';
import { Announcement } from './entities/announcement.entity';
import { UserModule } from '../user/user.module';
import { CampusModule } from '../campus/campus.module';

@Module({
	imports: [TypeOrmModule.forFeature([Announcement]), UserModule, CampusModule],
	controllers: [AnnouncementsController],
	providers: [AnnouncementsService],
})
export class AnnouncementsModule {}
