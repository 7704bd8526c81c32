import Handlebars from 'handlebars';
import { existsSync, readFileSync } from 'fs';
import { join } from 'path';
import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { EmailType } from '../enums/email.enums';
import { EmailTemplate } from '../interfaces/email.interface';
import { EmailDataMap } from '../types/email-templates.types';
import '../templates/handlebars/helpers';

interface TemplateDefinition<K extends EmailType> {
	file: string;
	subject: (data: EmailDataMap[K]) => string;
}

type TemplateRegistry = { [K in EmailType]: TemplateDefinition<K> };

const TEMPLATES: TemplateRegistry = {
	[EmailType.SIGNUP_OTP]: { file: 'signup-otp.hbs', subject: () => 'Your verification code' },
	[EmailType.ACCOUNT_VERIFIED]: { file: 'account-verified.hbs', subject: () => 'Your account is ready' },
	[EmailType.PASSWORD_RESET_OTP]: { file: 'password-reset-otp.hbs', subject: () => 'Password reset code' },
	[EmailType.PASSWORD_CHANGED]: { file: 'password-changed.hbs', subject: () => 'Your password was changed' },
	[EmailType.RED_NOTICE_ISSUED]: { file: 'red-notice-issued.hbs', subject: () => 'Red notice issued' },
	[EmailType.LEAVE_STATUS_UPDATE]: {
		file: 'leave-status-update.hbs',
		subject: (data) => `Leave request ${data.status.toLowerCase()}`,
	},
	[EmailType.INVENTORY_REQUEST_UPDATE]: {
		file: 'inventory-request-update.hbs',
		subject: (data) => `Inventory request for ${data.itemName} ${data.status.toLowerCase()}`,
	},
};

@Injectable()
export class EmailTemplateService {
	private readonly logger = new Logger(EmailTemplateService.name);
	private readonly templatesPath: string;
	private readonly compiledTemplates = new Map<string, Handlebars.TemplateDelegate>();
	private layout: Handlebars.TemplateDelegate | null = null;

	constructor(private readonly configService: ConfigService) {
		const potentialPaths = [
			join(__dirname, '../templates/handlebars'),
			join(process.cwd(), 'src', 'lib', 'templates', 'handlebars'),
		];

		this.templatesPath = potentialPaths.find((path) => existsSync(path)) ?? potentialPaths[0];
		this.logger.debug(`Using templates path: ${this.templatesPath}`);
	}

	render<T extends EmailType>(type: T, data: EmailDataMap[T]): EmailTemplate {
		const definition = TEMPLATES[type];
		const subject = definition.subject(data);

		const context = {
			...data,
			subject,
			appName: this.configService.get<string>('APP_NAME') ?? 'Campus Attendance',
			supportEmail: this.configService.get<string>('SUPPORT_EMAIL') ?? 'hroffice@university.edu',
			currentYear: new Date().getFullYear(),
		};

		const body = this.getTemplate(definition.file)(context);

		return {
			subject,
			body: this.getLayout()({ ...context, body }),
		};
	}

	private getLayout(): Handlebars.TemplateDelegate {
		if (!this.layout) {
			this.layout = this.compile(join(this.templatesPath, 'layouts', 'base.hbs'));
		}
		return this.layout;
	}

	private getTemplate(file: string): Handlebars.TemplateDelegate {
		const cached = this.compiledTemplates.get(file);
		if (cached) {
			return cached;
		}

		const compiled = this.compile(join(this.templatesPath, 'emails', file));
		this.compiledTemplates.set(file, compiled);
		return compiled;
	}

	private compile(fullPath: string): Handlebars.TemplateDelegate {
		if (!existsSync(fullPath)) {
			throw new Error(`Template file not found: ${fullPath}`);
		}

		return Handlebars.compile(readFileSync(fullPath, 'utf8'));
	}
}
