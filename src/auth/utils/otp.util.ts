import { randomInt } from 'crypto';
import * as bcrypt from 'bcrypt';
import { ConfigService } from '@nestjs/config';

export interface OtpSettings {
	expiryMinutes: number;
	maxAttempts: number;
}

const OTP_LENGTH = 6;

export function readOtpSettings(configService: ConfigService): OtpSettings {
	const expiry = parseInt(configService.get<string>('OTP_EXPIRY_MINUTES') ?? '', 10);
	const attempts = parseInt(configService.get<string>('OTP_MAX_ATTEMPTS') ?? '', 10);

	return {
		expiryMinutes: Number.isNaN(expiry) || expiry <= 0 ? 15 : expiry,
		maxAttempts: Number.isNaN(attempts) || attempts <= 0 ? 5 : attempts,
	};
}

export function generateOtp(): string {
	return randomInt(0, 10 ** OTP_LENGTH)
		.toString()
		.padStart(OTP_LENGTH, '0');
}

export function hashOtp(otp: string): Promise<string> {
	return bcrypt.hash(otp, 10);
}

export function otpMatches(otp: string, otpHash: string): Promise<boolean> {
	return bcrypt.compare(otp, otpHash);
}
