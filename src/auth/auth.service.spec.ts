import { Test, TestingModule } from '@nestjs/testing';
import { JwtService } from '@nestjs/jwt';
import { ConfigService } from '@nestjs/config';
import { EventEmitter2 } from '@nestjs/event-emitter';
import { BadRequestException, NotFoundException, UnauthorizedException } from '@nestjs/common';
import * as bcrypt from 'bcrypt';
import { AuthService } from './auth.service';
import { UserService } from '../user/user.service';
import { PendingSignupService } from './pending-signup.service';
import { PasswordResetService } from './password-reset.service';
import { AccessLevel, AccountStatus } from '../lib/enums/user.enums';
import { EmailType } from '../lib/enums/email.enums';

jest.mock('bcrypt', () => ({
	hash: jest.fn((value: string) => Promise.resolve(`hashed-${value}`)),
	compare: jest.fn(),
}));

describe('AuthService', () => {
	let service: AuthService;
	const compareMock = bcrypt.compare as jest.Mock;

	const userService = {
		findOneByEmail: jest.fn(),
		findCredentialsByEmail: jest.fn(),
		create: jest.fn(),
		updatePassword: jest.fn(),
	};
	const jwtService = { signAsync: jest.fn() };
	const eventEmitter = { emit: jest.fn() };
	const pendingSignupService = { create: jest.fn(), verify: jest.fn(), expiryMinutes: 15 };
	const passwordResetService = { create: jest.fn(), verify: jest.fn(), consume: jest.fn(), expiryMinutes: 15 };

	beforeEach(async () => {
		jest.clearAllMocks();

		const module: TestingModule = await Test.createTestingModule({
			providers: [
				AuthService,
				{ provide: UserService, useValue: userService },
				{ provide: JwtService, useValue: jwtService },
				{ provide: EventEmitter2, useValue: eventEmitter },
				{ provide: PendingSignupService, useValue: pendingSignupService },
				{ provide: PasswordResetService, useValue: passwordResetService },
				{ provide: ConfigService, useValue: { get: jest.fn().mockReturnValue(undefined) } },
			],
		}).compile();

		service = module.get<AuthService>(AuthService);
	});

	describe('signUp', () => {
		it('should reject addresses outside the institution domain', async () => {
			await expect(
				service.signUp({ email: 'jane@gmail.com', password: 'Secret@123', fullName: 'Jane Doe' }),
			).rejects.toThrow('Invalid email. Use a valid @university.edu email.');
			expect(pendingSignupService.create).not.toHaveBeenCalled();
		});

		it('should reject weak passwords', async () => {
			await expect(
				service.signUp({ email: 'jane.doe@university.edu', password: 'password', fullName: 'Jane Doe' }),
			).rejects.toThrow('Password must meet security requirements.');
		});

		it('should reject registered addresses', async () => {
			userService.findOneByEmail.mockResolvedValue({ uid: 3 });

			await expect(
				service.signUp({ email: 'jane.doe@university.edu', password: 'Secret@123', fullName: 'Jane Doe' }),
			).rejects.toThrow(BadRequestException);
		});

		it('should store a pending signup with the derived role and email the code', async () => {
			userService.findOneByEmail.mockResolvedValue(null);
			pendingSignupService.create.mockResolvedValue('123456');

			const result = await service.signUp({ email: 'VC@University.edu', password: 'Secret@123', fullName: ' Vice Chancellor ' });

			expect(result).toEqual({ message: 'OTP sent to email. Please verify.', email: 'vc@university.edu' });
			expect(pendingSignupService.create).toHaveBeenCalledWith({
				email: 'vc@university.edu',
				passwordHash: 'hashed-Secret@123',
				fullName: 'Vice Chancellor',
				accessLevel: AccessLevel.SUPER_ADMIN,
			});
			expect(eventEmitter.emit).toHaveBeenCalledWith('send.email', EmailType.SIGNUP_OTP, ['vc@university.edu'], {
				name: 'Vice Chancellor',
				otp: '123456',
				expiryMinutes: 15,
			});
		});
	});

	describe('verifyOtp', () => {
		it('should create the account from the pending signup', async () => {
			pendingSignupService.verify.mockResolvedValue({
				email: 'director-north@university.edu',
				password: 'hashed-Secret@123',
				fullName: 'North Director',
				accessLevel: AccessLevel.ADMIN,
			});
			userService.findOneByEmail.mockResolvedValue(null);
			userService.create.mockResolvedValue({ uid: 5, fullName: 'North Director', accessLevel: AccessLevel.ADMIN });

			const result = await service.verifyOtp({ email: 'director-north@university.edu', otp: '123456' });

			expect(result).toEqual({ message: 'Signup successful. You can now log in.' });
			expect(userService.create).toHaveBeenCalledWith({
				email: 'director-north@university.edu',
				password: 'hashed-Secret@123',
				fullName: 'North Director',
				accessLevel: AccessLevel.ADMIN,
			});
			expect(eventEmitter.emit).toHaveBeenCalledWith(
				'send.email',
				EmailType.ACCOUNT_VERIFIED,
				['director-north@university.edu'],
				{ name: 'North Director', role: AccessLevel.ADMIN },
			);
		});

		it('should pass code failures through', async () => {
			pendingSignupService.verify.mockRejectedValue(new BadRequestException('Invalid OTP.'));

			await expect(service.verifyOtp({ email: 'jane.doe@university.edu', otp: '000000' })).rejects.toThrow('Invalid OTP.');
			expect(userService.create).not.toHaveBeenCalled();
		});
	});

	describe('signIn', () => {
		const credentials = {
			uid: 8,
			email: 'jane.doe@university.edu',
			password: 'hashed-Secret@123',
			accessLevel: AccessLevel.EMPLOYEE,
			status: AccountStatus.ACTIVE,
		};

		it('should reject unknown addresses', async () => {
			userService.findCredentialsByEmail.mockResolvedValue(null);

			await expect(service.signIn({ email: 'ghost@university.edu', password: 'Secret@123' })).rejects.toThrow(
				UnauthorizedException,
			);
		});

		it('should reject a wrong password', async () => {
			userService.findCredentialsByEmail.mockResolvedValue(credentials);
			compareMock.mockResolvedValue(false);

			await expect(service.signIn({ email: 'jane.doe@university.edu', password: 'Wrong@123' })).rejects.toThrow(
				'Invalid email or password.',
			);
		});

		it('should reject inactive accounts', async () => {
			userService.findCredentialsByEmail.mockResolvedValue({ ...credentials, status: AccountStatus.INACTIVE });
			compareMock.mockResolvedValue(true);

			await expect(service.signIn({ email: 'jane.doe@university.edu', password: 'Secret@123' })).rejects.toThrow(
				'Account is inactive.',
			);
		});

		it('should issue a bearer token carrying the role', async () => {
			userService.findCredentialsByEmail.mockResolvedValue(credentials);
			compareMock.mockResolvedValue(true);
			jwtService.signAsync.mockResolvedValue('signed-token');

			const result = await service.signIn({ email: 'jane.doe@university.edu', password: 'Secret@123' });

			expect(result).toEqual({
				message: 'Login successful',
				access_token: 'signed-token',
				token_type: 'bearer',
				role: AccessLevel.EMPLOYEE,
			});
			expect(jwtService.signAsync).toHaveBeenCalledWith({
				uid: 8,
				email: 'jane.doe@university.edu',
				role: AccessLevel.EMPLOYEE,
			});
		});
	});

	describe('password reset', () => {
		it('should refuse unknown accounts', async () => {
			userService.findOneByEmail.mockResolvedValue(null);

			await expect(service.forgotPassword({ email: 'ghost@university.edu' })).rejects.toThrow(NotFoundException);
		});

		it('should email a reset code', async () => {
			userService.findOneByEmail.mockResolvedValue({ uid: 8, fullName: 'Jane Doe' });
			passwordResetService.create.mockResolvedValue('654321');

			const result = await service.forgotPassword({ email: 'jane.doe@university.edu' });

			expect(result).toEqual({ message: 'OTP sent to email for password reset.' });
			expect(eventEmitter.emit).toHaveBeenCalledWith(
				'send.email',
				EmailType.PASSWORD_RESET_OTP,
				['jane.doe@university.edu'],
				{ name: 'Jane Doe', otp: '654321', expiryMinutes: 15 },
			);
		});

		it('should reject mismatched passwords', async () => {
			await expect(
				service.resetPassword({
					email: 'jane.doe@university.edu',
					newPassword: 'Secret@456',
					confirmPassword: 'Secret@457',
				}),
			).rejects.toThrow('Passwords do not match.');
		});

		it('should store the new hash once the reset is consumed', async () => {
			userService.findOneByEmail.mockResolvedValue({ uid: 8, fullName: 'Jane Doe' });
			passwordResetService.consume.mockResolvedValue(undefined);

			const result = await service.resetPassword({
				email: 'jane.doe@university.edu',
				newPassword: 'Secret@456',
				confirmPassword: 'Secret@456',
			});

			expect(result).toEqual({ message: 'Password reset successful. You can now log in.' });
			expect(passwordResetService.consume).toHaveBeenCalledWith('jane.doe@university.edu');
			expect(userService.updatePassword).toHaveBeenCalledWith(8, 'hashed-Secret@456');
		});

		it('should not change the password without a verified code', async () => {
			userService.findOneByEmail.mockResolvedValue({ uid: 8, fullName: 'Jane Doe' });
			passwordResetService.consume.mockRejectedValue(
				new BadRequestException('OTP verification required before resetting the password.'),
			);

			await expect(
				service.resetPassword({
					email: 'jane.doe@university.edu',
					newPassword: 'Secret@456',
					confirmPassword: 'Secret@456',
				}),
			).rejects.toThrow(BadRequestException);
			expect(userService.updatePassword).not.toHaveBeenCalled();
		});
	});
});
