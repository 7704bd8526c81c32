import { BadRequestException, HttpException, Injectable, Logger, NotFoundException, UnauthorizedException } from '@nestjs/common';
import { JwtService } from '@nestjs/jwt';
import { ConfigService } from '@nestjs/config';
import { EventEmitter2 } from '@nestjs/event-emitter';
import * as bcrypt from 'bcrypt';
import { ForgotPasswordInput, ResetPasswordInput, SignInInput, SignUpInput, VerifyOtpInput } from './dto/auth.dto';
import { UserService } from '../user/user.service';
import { PendingSignupService } from './pending-signup.service';
import { PasswordResetService } from './password-reset.service';
import { MessageResponse, SignInResponse, SignUpResponse } from '../lib/types/auth';
import { Token } from '../lib/types/token';
import { EmailType } from '../lib/enums/email.enums';
import { AccountStatus } from '../lib/enums/user.enums';
import { EmailTemplateData } from '../lib/types/email-templates.types';
import { PASSWORD_POLICY, assignAccessLevel } from '../lib/utils/role-assignment.util';

const BCRYPT_ROUNDS = 10;

@Injectable()
export class AuthService {
	private readonly logger = new Logger(AuthService.name);
	private readonly institutionDomain: string;

	constructor(
		private jwtService: JwtService,
		private userService: UserService,
		private eventEmitter: EventEmitter2,
		private pendingSignupService: PendingSignupService,
		private passwordResetService: PasswordResetService,
		private readonly configService: ConfigService,
	) {
		this.institutionDomain = this.configService.get<string>('INSTITUTION_EMAIL_DOMAIN') ?? 'university.edu';
	}

	private sendEmail<T extends EmailType>(type: T, email: string, data: EmailTemplateData<T>): void {
		this.eventEmitter.emit('send.email', type, [email], data);
	}

	async signUp(signUpInput: SignUpInput): Promise<SignUpResponse> {
		const email = signUpInput.email.toLowerCase();
		this.logger.log(`Sign up attempt for email: ${email}`);

		try {
			const accessLevel = assignAccessLevel(email, this.institutionDomain);

			if (!accessLevel) {
				throw new BadRequestException(`Invalid email. Use a valid @${this.institutionDomain} email.`);
			}

			if (!PASSWORD_POLICY.test(signUpInput.password)) {
				throw new BadRequestException('Password must meet security requirements.');
			}

			const existingUser = await this.userService.findOneByEmail(email);

			if (existingUser) {
				this.logger.warn(`Sign up failed - email already registered: ${email}`);
				throw new BadRequestException('Email already registered.');
			}

			const otp = await this.pendingSignupService.create({
				email,
				passwordHash: await bcrypt.hash(signUpInput.password, BCRYPT_ROUNDS),
				fullName: signUpInput.fullName.trim(),
				accessLevel,
			});

			this.sendEmail(EmailType.SIGNUP_OTP, email, {
				name: signUpInput.fullName.trim(),
				otp,
				expiryMinutes: this.pendingSignupService.expiryMinutes,
			});

			return { message: 'OTP sent to email. Please verify.', email };
		} catch (error) {
			if (error instanceof HttpException) {
				throw error;
			}
			this.logger.error(`Sign up failed for email: ${email}`, error instanceof Error ? error.stack : undefined);
			throw new BadRequestException('Sign up failed');
		}
	}

	async verifyOtp(verifyOtpInput: VerifyOtpInput): Promise<MessageResponse> {
		const email = verifyOtpInput.email.toLowerCase();

		try {
			const pending = await this.pendingSignupService.verify(email, verifyOtpInput.otp);

			if (await this.userService.findOneByEmail(email)) {
				throw new BadRequestException('Email already registered.');
			}

			const user = await this.userService.create({
				email,
				password: pending.password,
				fullName: pending.fullName,
				accessLevel: pending.accessLevel,
			});

			this.sendEmail(EmailType.ACCOUNT_VERIFIED, email, { name: user.fullName, role: user.accessLevel });
			this.logger.log(`Account ${user.uid} activated for ${email} as ${user.accessLevel}`);

			return { message: 'Signup successful. You can now log in.' };
		} catch (error) {
			if (error instanceof HttpException) {
				throw error;
			}
			this.logger.error(`OTP verification failed for ${email}`, error instanceof Error ? error.stack : undefined);
			throw new BadRequestException('OTP verification failed');
		}
	}

	async signIn(signInInput: SignInInput): Promise<SignInResponse> {
		const email = signInInput.email.toLowerCase();
		const user = await this.userService.findCredentialsByEmail(email);

		if (!user || !(await bcrypt.compare(signInInput.password, user.password))) {
			this.logger.warn(`Invalid credentials for ${email}`);
			throw new UnauthorizedException('Invalid email or password.');
		}

		if (user.status !== AccountStatus.ACTIVE) {
			this.logger.warn(`Sign in refused for inactive account ${user.uid}`);
			throw new UnauthorizedException('Account is inactive.');
		}

		const payload: Token = { uid: user.uid, email: user.email, role: user.accessLevel };
		const accessToken = await this.jwtService.signAsync(payload);

		this.logger.log(`User ${user.uid} signed in`);

		return {
			message: 'Login successful',
			access_token: accessToken,
			token_type: 'bearer',
			role: user.accessLevel,
		};
	}

	async forgotPassword(forgotPasswordInput: ForgotPasswordInput): Promise<MessageResponse> {
		const email = forgotPasswordInput.email.toLowerCase();

		if (!assignAccessLevel(email, this.institutionDomain)) {
			throw new BadRequestException(`Invalid email. Use an @${this.institutionDomain} email.`);
		}

		const user = await this.userService.findOneByEmail(email);

		if (!user) {
			throw new NotFoundException('User not found.');
		}

		const otp = await this.passwordResetService.create(email);
		this.sendEmail(EmailType.PASSWORD_RESET_OTP, email, {
			name: user.fullName,
			otp,
			expiryMinutes: this.passwordResetService.expiryMinutes,
		});

		return { message: 'OTP sent to email for password reset.' };
	}

	async verifyForgotOtp(verifyOtpInput: VerifyOtpInput): Promise<MessageResponse> {
		await this.passwordResetService.verify(verifyOtpInput.email.toLowerCase(), verifyOtpInput.otp);
		return { message: 'OTP verified. You can now reset your password.' };
	}

	async resetPassword(resetPasswordInput: ResetPasswordInput): Promise<MessageResponse> {
		const email = resetPasswordInput.email.toLowerCase();

		if (resetPasswordInput.newPassword !== resetPasswordInput.confirmPassword) {
			throw new BadRequestException('Passwords do not match.');
		}

		if (!PASSWORD_POLICY.test(resetPasswordInput.newPassword)) {
			throw new BadRequestException('Password must meet security requirements.');
		}

		const user = await this.userService.findOneByEmail(email);

		if (!user) {
			throw new BadRequestException('Invalid request.');
		}

		await this.passwordResetService.consume(email);
		await this.userService.updatePassword(user.uid, await bcrypt.hash(resetPasswordInput.newPassword, BCRYPT_ROUNDS));

		this.sendEmail(EmailType.PASSWORD_CHANGED, email, { name: user.fullName, changeTime: new Date().toISOString() });
		this.logger.log(`Password reset for user ${user.uid}`);

		return { message: 'Password reset successful. You can now log in.' };
	}
}
