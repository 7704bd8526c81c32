import { BadRequestException, Injectable, Logger } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { ConfigService } from '@nestjs/config';
import { Repository } from 'typeorm';
import { PasswordReset } from './entities/password-reset.entity';
import { OtpSettings, generateOtp, hashOtp, otpMatches, readOtpSettings } from './utils/otp.util';

@Injectable()
export class PasswordResetService {
	private readonly logger = new Logger(PasswordResetService.name);
	private readonly otpSettings: OtpSettings;

	constructor(
		@InjectRepository(PasswordReset)
		private passwordResetRepository: Repository<PasswordReset>,
		private readonly configService: ConfigService,
	) {
		this.otpSettings = readOtpSettings(this.configService);
	}

	get expiryMinutes(): number {
		return this.otpSettings.expiryMinutes;
	}

	private isExpired(reset: PasswordReset): boolean {
		return reset.otpExpires.getTime() < Date.now();
	}

	async create(email: string): Promise<string> {
		const otp = generateOtp();

		// Only the latest code is valid
		await this.passwordResetRepository.delete({ email, isUsed: false });
		await this.passwordResetRepository.save(
			this.passwordResetRepository.create({
				email,
				otpHash: await hashOtp(otp),
				otpExpires: new Date(Date.now() + this.otpSettings.expiryMinutes * 60 * 1000),
				attempts: 0,
				isVerified: false,
				isUsed: false,
			}),
		);

		this.logger.log(`Password reset OTP created for ${email}`);
		return otp;
	}

	async verify(email: string, otp: string): Promise<void> {
		const reset = await this.passwordResetRepository.findOne({
			where: { email, isUsed: false },
			order: { createdAt: 'DESC' },
		});

		if (!reset) {
			throw new BadRequestException('Invalid request.');
		}

		if (this.isExpired(reset)) {
			await this.passwordResetRepository.delete({ uid: reset.uid });
			this.logger.warn(`Expired reset OTP used for ${email}`);
			throw new BadRequestException('OTP has expired. Request again.');
		}

		if (!(await otpMatches(otp, reset.otpHash))) {
			if (reset.attempts + 1 >= this.otpSettings.maxAttempts) {
				await this.passwordResetRepository.delete({ uid: reset.uid });
				this.logger.warn(`Reset OTP for ${email} burned after ${reset.attempts + 1} attempts`);
			} else {
				await this.passwordResetRepository.increment({ uid: reset.uid }, 'attempts', 1);
				this.logger.warn(`Wrong reset OTP for ${email}`);
			}
			throw new BadRequestException('Invalid OTP.');
		}

		await this.passwordResetRepository.update({ uid: reset.uid }, { isVerified: true });
	}

	/**
	 * Marks the verified reset as used. A reset can be consumed once, and only before its
	 * code expires.
	 */
	async consume(email: string): Promise<void> {
		const reset = await this.passwordResetRepository.findOne({
			where: { email, isVerified: true, isUsed: false },
			order: { createdAt: 'DESC' },
		});

		if (!reset || this.isExpired(reset)) {
			throw new BadRequestException('OTP verification required before resetting the password.');
		}

		const result = await this.passwordResetRepository.update({ uid: reset.uid, isUsed: false }, { isUsed: true });

		if (!result.affected) {
			throw new BadRequestException('OTP verification required before resetting the password.');
		}
	}
}
