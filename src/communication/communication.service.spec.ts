import { Test, TestingModule } from '@nestjs/testing';
import { ConfigService } from '@nestjs/config';
import { getRepositoryToken } from '@nestjs/typeorm';
import { NotFoundException } from '@nestjs/common';
import * as nodemailer from 'nodemailer';
import { CommunicationService } from './communication.service';
import { CommunicationLog } from './entities/communication-log.entity';
import { EmailTemplateService } from '../lib/services/email-template.service';
import { EmailType } from '../lib/enums/email.enums';
import { RepositoryMock, repositoryMockFactory } from '../../test/utils/mock-factory';

jest.mock('nodemailer');

describe('CommunicationService', () => {
	let service: CommunicationService;
	let logRepository: RepositoryMock;
	const sendMail = jest.fn();
	const render = jest.fn();

	beforeEach(async () => {
		sendMail.mockReset();
		render.mockReset();
		jest.mocked(nodemailer.createTransport).mockReturnValue({ sendMail } as unknown as nodemailer.Transporter);

		const module: TestingModule = await Test.createTestingModule({
			providers: [
				CommunicationService,
				{ provide: ConfigService, useValue: { get: jest.fn().mockReturnValue(undefined) } },
				{ provide: EmailTemplateService, useValue: { render } },
				{ provide: getRepositoryToken(CommunicationLog), useFactory: repositoryMockFactory },
			],
		}).compile();

		service = module.get<CommunicationService>(CommunicationService);
		logRepository = module.get(getRepositoryToken(CommunicationLog));
	});

	it('should fall back to the JSON transport without SMTP settings', () => {
		expect(nodemailer.createTransport).toHaveBeenCalledWith({ jsonTransport: true });
	});

	it('should render, send and log an email', async () => {
		render.mockReturnValue({ subject: 'Your verification code', body: '<p>123456</p>' });
		sendMail.mockResolvedValue({ messageId: 'msg-1', accepted: ['asha@university.edu'], rejected: [] });

		await service.sendEmail(EmailType.SIGNUP_OTP, ['asha@university.edu'], {
			name: 'Asha',
			otp: '123456',
			expiryMinutes: 15,
		});

		expect(sendMail).toHaveBeenCalledWith({
			from: 'no-reply@university.edu',
			to: ['asha@university.edu'],
			subject: 'Your verification code',
			html: '<p>123456</p>',
		});
		expect(logRepository.save).toHaveBeenCalledWith({
			emailType: EmailType.SIGNUP_OTP,
			recipientEmails: ['asha@university.edu'],
			accepted: ['asha@university.edu'],
			rejected: [],
			messageId: 'msg-1',
			response: null,
		});
	});

	it('should log and rethrow when there are no recipients', async () => {
		await expect(
			service.sendEmail(EmailType.PASSWORD_CHANGED, [], { name: 'Asha', changeTime: '10:00' }),
		).rejects.toThrow(NotFoundException);

		expect(sendMail).not.toHaveBeenCalled();
		expect(logRepository.save).toHaveBeenCalledWith(
			expect.objectContaining({ emailType: EmailType.PASSWORD_CHANGED, messageId: null }),
		);
	});
});
