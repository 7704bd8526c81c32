import { Body, Controller, HttpCode, HttpStatus, Post } from '@nestjs/common';
import { Throttle } from '@nestjs/throttler';
import {
	ApiBadRequestResponse,
	ApiBody,
	ApiCreatedResponse,
	ApiNotFoundResponse,
	ApiOkResponse,
	ApiOperation,
	ApiTags,
	ApiTooManyRequestsResponse,
	ApiUnauthorizedResponse,
} from '@nestjs/swagger';
import { AuthService } from './auth.service';
import { ForgotPasswordInput, ResetPasswordInput, SignInInput, SignUpInput, VerifyOtpInput } from './dto/auth.dto';
import { isPublic } from '../decorators/public.decorator';

@ApiTags('🔐 Authentication')
@Controller('auth')
@Throttle({ default: { limit: 10, ttl: 60000 } })
@ApiTooManyRequestsResponse({ description: '⏳ Too many requests - try again in a minute' })
export class AuthController {
	constructor(private readonly authService: AuthService) {}

	@Post('signup')
	@isPublic()
	@ApiOperation({
		summary: '📝 Sign up',
		description:
			'Registers an institution address. The role is derived from the address and a 6 digit code is emailed for verification.',
	})
	@ApiBody({ type: SignUpInput })
	@ApiCreatedResponse({ description: 'OTP sent to email' })
	@ApiBadRequestResponse({ description: 'Address outside the institution, weak password or already registered' })
	signUp(@Body() signUpInput: SignUpInput) {
		return this.authService.signUp(signUpInput);
	}

	@Post('verify-otp')
	@isPublic()
	@HttpCode(HttpStatus.OK)
	@ApiOperation({ summary: '✅ Verify signup code', description: 'Activates the account once the emailed code matches.' })
	@ApiBody({ type: VerifyOtpInput })
	@ApiOkResponse({ description: 'Signup successful' })
	@ApiBadRequestResponse({ description: 'Invalid or expired code' })
	verifyOtp(@Body() verifyOtpInput: VerifyOtpInput) {
		return this.authService.verifyOtp(verifyOtpInput);
	}

	@Post('login')
	@isPublic()
	@HttpCode(HttpStatus.OK)
	@Throttle({ default: { limit: 5, ttl: 60000 } })
	@ApiOperation({ summary: '🔑 Log in', description: 'Returns a bearer token and the account role.' })
	@ApiBody({ type: SignInInput })
	@ApiOkResponse({ description: 'Login successful' })
	@ApiUnauthorizedResponse({ description: 'Invalid email or password, or inactive account' })
	signIn(@Body() signInInput: SignInInput) {
		return this.authService.signIn(signInInput);
	}

	@Post('forgot-password')
	@isPublic()
	@HttpCode(HttpStatus.OK)
	@ApiOperation({ summary: '📧 Forgot password', description: 'Emails a 6 digit reset code.' })
	@ApiBody({ type: ForgotPasswordInput })
	@ApiOkResponse({ description: 'OTP sent to email for password reset' })
	@ApiNotFoundResponse({ description: 'User not found' })
	forgotPassword(@Body() forgotPasswordInput: ForgotPasswordInput) {
		return this.authService.forgotPassword(forgotPasswordInput);
	}

	@Post('verify-forgot-otp')
	@isPublic()
	@HttpCode(HttpStatus.OK)
	@ApiOperation({ summary: '✅ Verify reset code' })
	@ApiBody({ type: VerifyOtpInput })
	@ApiOkResponse({ description: 'OTP verified' })
	@ApiBadRequestResponse({ description: 'Invalid or expired code' })
	verifyForgotOtp(@Body() verifyOtpInput: VerifyOtpInput) {
		return this.authService.verifyForgotOtp(verifyOtpInput);
	}

	@Post('reset-password')
	@isPublic()
	@HttpCode(HttpStatus.OK)
	@ApiOperation({ summary: '🔄 Reset password', description: 'Sets a new password after the reset code was verified.' })
	@ApiBody({ type: ResetPasswordInput })
	@ApiOkResponse({ description: 'Password reset successful' })
	@ApiBadRequestResponse({ description: 'Passwords differ, weak password or code not verified' })
	resetPassword(@Body() resetPasswordInput: ResetPasswordInput) {
		return this.authService.resetPassword(resetPasswordInput);
	}
}
