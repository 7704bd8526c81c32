import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { CommunicationService } from './communication.service';
import { CommunicationLog } from './entities/communication-log.entity';
import { EmailTemplateService } from '../lib/services/email-template.service';

@Module({
	imports: [TypeOrmModule.forFeature([CommunicationLog])],
	providers: [CommunicationService, EmailTemplateService],
	exports: [CommunicationService],
})
export class CommunicationModule {}
