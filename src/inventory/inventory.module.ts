import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { InventoryService } from './inventory.service';
import { InventoryController } from './inventory.controller';
import { InventoryItem } from './entities/inventory-item.entity';
import { InventoryRequest } from './entities/inventory-request.entity';
import { UserModule } from '../user/user.module';
import { CampusModule } from '../campus/campus.module';

@Module({
	imports: [TypeOrmModule.forFeature([InventoryItem, InventoryRequest]), UserModule, CampusModule],
	controllers: [InventoryController],
	providers: [InventoryService],
})
export class InventoryModule {}
