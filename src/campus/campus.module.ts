import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { CampusService } from './campus.service';
import { CampusController } from './campus.controller';
import { Campus } from './entities/campus.entity';
import { UserModule } from '../user/user.module';

@Module({
	imports: [UserModule, TypeOrmModule.forFeature([Campus])],
	controllers: [CampusController],
	providers: [CampusService],
	exports: [CampusService],
})
export class CampusModule {}
