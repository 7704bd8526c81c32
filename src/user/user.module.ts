import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { UserService } from './user.service';
import { UserController } from './user.controller';
import { ProfileController } from './profile.controller';
import { User } from './entities/user.entity';
import { Campus } from '../campus/entities/campus.entity';

@Module({
	imports: [TypeOrmModule.forFeature([User, Campus])],
	controllers: [UserController, ProfileController],
	providers: [UserService],
	exports: [UserService, TypeOrmModule],
})
export class UserModule {}
