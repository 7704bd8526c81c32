import { Injectable, Logger, NotFoundException } from '@nestjs/common';
import { OnEvent } from '@nestjs/event-emitter';
import { ConfigService } from '@nestjs/config';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import * as nodemailer from 'nodemailer';
import { EmailType } from '../lib/enums/email.enums';
import { EmailTemplateData } from '../lib/types/email-templates.types';
import { EmailTemplateService } from '../lib/services/email-template.service';
import { CommunicationLog } from './entities/communication-log.entity';

type Recipient = string | { address: string };

interface DeliveryResult {
	messageId?: string;
	accepted?: Recipient[];
	rejected?: Recipient[];
	response?: string;
}

const toAddresses = (recipients: Recipient[] | undefined): string[] =>
	(recipients ?? []).map((recipient) => (typeof recipient === 'string' ? recipient : recipient.address));

/**
 * Delivers the `send.email` events raised by the other modules. Without `SMTP_HOST` the
 * messages go through nodemailer's JSON transport, so nothing leaves the process.
 */
@Injectable()
export class CommunicationService {
	private readonly logger = new Logger(CommunicationService.name);
	private readonly emailService: nodemailer.Transporter;

	constructor(
		private readonly configService: ConfigService,
		private readonly emailTemplateService: EmailTemplateService,
		@InjectRepository(CommunicationLog)
		private communicationLogRepository: Repository<CommunicationLog>,
	) {
		const host = this.configService.get<string>('SMTP_HOST');
		const port = parseInt(this.configService.get<string>('SMTP_PORT') ?? '587', 10);

		this.emailService = host
			? nodemailer.createTransport({
					host,
					port,
					secure: port === 465,
					auth: {
						user: this.configService.get<string>('SMTP_USER'),
						pass: this.configService.get<string>('SMTP_PASS'),
					},
			  })
			: nodemailer.createTransport({ jsonTransport: true });

		if (!host) {
			this.logger.warn('SMTP_HOST is not set, emails will be rendered but not delivered');
		}
	}

	@OnEvent('send.email')
	async sendEmail<T extends EmailType>(emailType: T, recipientsEmails: string[], data: EmailTemplateData<T>) {
		try {
			if (!recipientsEmails || recipientsEmails.length === 0) {
				throw new NotFoundException(`No recipients provided for ${emailType} email`);
			}

			const template = this.emailTemplateService.render(emailType, data);

			const emailFrom = this.configService.get<string>('SMTP_FROM') ?? 'no-reply@university.edu';
			const emailFromName = this.configService.get<string>('EMAIL_FROM_NAME');
			const fromField = emailFromName ? `"${emailFromName}" <${emailFrom}>` : emailFrom;

			const result: DeliveryResult = await this.emailService.sendMail({
				from: fromField,
				to: recipientsEmails,
				subject: template.subject,
				html: template.body,
			});

			this.logger.log(`${emailType} email sent to ${recipientsEmails.join(', ')} (${result.messageId ?? 'no id'})`);

			await this.communicationLogRepository.save({
				emailType,
				recipientEmails: recipientsEmails,
				accepted: toAddresses(result.accepted),
				rejected: toAddresses(result.rejected),
				messageId: result.messageId ?? null,
				response: result.response ?? null,
			});

			return result;
		} catch (error) {
			const message = error instanceof Error ? error.message : String(error);
			this.logger.error(`Failed to send ${emailType} email to ${recipientsEmails?.join(', ')}: ${message}`);

			await this.communicationLogRepository.save({
				emailType,
				recipientEmails: recipientsEmails ?? [],
				accepted: [],
				rejected: recipientsEmails ?? [],
				messageId: null,
				response: `Error: ${message}`,
			});

			throw error;
		}
	}
}
