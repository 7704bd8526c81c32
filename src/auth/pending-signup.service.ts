import { BadRequestException, Injectable, Logger } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { ConfigService } from '@nestjs/config';
import { Repository } from 'typeorm';
import { PendingSignup } from './entities/pending-signup.entity';
import { AccessLevel } from '../lib/enums/user.enums';
import { OtpSettings, generateOtp, hashOtp, otpMatches, readOtpSettings } from './utils/otp.util';

export interface PendingSignupInput {
	email: string;
	passwordHash: string;
	fullName: string;
	accessLevel: AccessLevel;
}

/**
 * Signups wait here until the emailed code is confirmed. One row per address; signing up
 * again replaces the row and its code.
 */
@Injectable()
export class PendingSignupService {
	private readonly logger = new Logger(PendingSignupService.name);
	private readonly otpSettings: OtpSettings;

	constructor(
		@InjectRepository(PendingSignup)
		private pendingSignupRepository: Repository<PendingSignup>,
		private readonly configService: ConfigService,
	) {
		this.otpSettings = readOtpSettings(this.configService);
	}

	get expiryMinutes(): number {
		return this.otpSettings.expiryMinutes;
	}

	async create(input: PendingSignupInput): Promise<string> {
		const otp = generateOtp();

		await this.pendingSignupRepository.delete({ email: input.email });
		await this.pendingSignupRepository.save(
			this.pendingSignupRepository.create({
				email: input.email,
				password: input.passwordHash,
				fullName: input.fullName,
				accessLevel: input.accessLevel,
				otpHash: await hashOtp(otp),
				otpExpires: new Date(Date.now() + this.otpSettings.expiryMinutes * 60 * 1000),
				attempts: 0,
			}),
		);

		this.logger.log(`Pending signup created for ${input.email}`);
		return otp;
	}

	/**
	 * Checks the code and removes the pending row on success. Expired rows are removed,
	 * and the row is burned once the attempt limit is reached.
	 */
	async verify(email: string, otp: string): Promise<PendingSignup> {
		const pending = await this.pendingSignupRepository.findOne({ where: { email } });

		if (!pending) {
			throw new BadRequestException('Invalid request.');
		}

		if (pending.otpExpires.getTime() < Date.now()) {
			await this.pendingSignupRepository.delete({ uid: pending.uid });
			this.logger.warn(`Expired signup OTP used for ${email}`);
			throw new BadRequestException('OTP has expired. Request again.');
		}

		if (!(await otpMatches(otp, pending.otpHash))) {
			if (pending.attempts + 1 >= this.otpSettings.maxAttempts) {
				await this.pendingSignupRepository.delete({ uid: pending.uid });
				this.logger.warn(`Signup OTP for ${email} burned after ${pending.attempts + 1} attempts`);
			} else {
				await this.pendingSignupRepository.increment({ uid: pending.uid }, 'attempts', 1);
				this.logger.warn(`Wrong signup OTP for ${email}`);
			}
			throw new BadRequestException('Invalid OTP.');
		}

		await this.pendingSignupRepository.delete({ uid: pending.uid });
		return pending;
	}
}
