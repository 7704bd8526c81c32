import { ApiProperty } from '@nestjs/swagger';
import { Transform } from 'class-transformer';
import { IsEmail, IsNotEmpty, IsString, Length, Matches, MaxLength } from 'class-validator';
import { PASSWORD_POLICY } from '../../lib/utils/role-assignment.util';

const PASSWORD_POLICY_MESSAGE =
	'Password must be at least 6 characters with upper and lower case letters, a digit and one of @#$%^&+=';

const normalizeEmail = ({ value }: { value: unknown }) => (typeof value === 'string' ? value.trim().toLowerCase() : value);

export class SignUpInput {
	@Transform(normalizeEmail)
	@IsNotEmpty()
	@IsEmail()
	@ApiProperty({ example: 'jane.doe@university.edu', description: 'Institution email address' })
	email!: string;

	@IsNotEmpty()
	@IsString()
	@Matches(PASSWORD_POLICY, { message: PASSWORD_POLICY_MESSAGE })
	@ApiProperty({ example: 'Secret@123', description: 'Account password' })
	password!: string;

	@IsNotEmpty()
	@IsString()
	@MaxLength(120)
	@ApiProperty({ example: 'Jane Doe', description: 'Full name shown on reports' })
	fullName!: string;
}

export class VerifyOtpInput {
	@Transform(normalizeEmail)
	@IsNotEmpty()
	@IsEmail()
	@ApiProperty({ example: 'jane.doe@university.edu' })
	email!: string;

	@IsString()
	@Length(6, 6)
	@Matches(/^\d{6}$/, { message: 'otp must be a 6 digit code' })
	@ApiProperty({ example: '123456', description: 'Code received by email' })
	otp!: string;
}

export class SignInInput {
	@Transform(normalizeEmail)
	@IsNotEmpty()
	@IsEmail()
	@ApiProperty({ example: 'jane.doe@university.edu' })
	email!: string;

	@IsNotEmpty()
	@IsString()
	@ApiProperty({ example: 'Secret@123' })
	password!: string;
}

export class ForgotPasswordInput {
	@Transform(normalizeEmail)
	@IsNotEmpty()
	@IsEmail()
	@ApiProperty({ example: 'jane.doe@university.edu' })
	email!: string;
}

export class ResetPasswordInput {
	@Transform(normalizeEmail)
	@IsNotEmpty()
	@IsEmail()
	@ApiProperty({ example: 'jane.doe@university.edu' })
	email!: string;

	@IsNotEmpty()
	@IsString()
	@Matches(PASSWORD_POLICY, { message: PASSWORD_POLICY_MESSAGE })
	@ApiProperty({ example: 'Secret@456' })
	newPassword!: string;

	@IsNotEmpty()
	@IsString()
	@ApiProperty({ example: 'Secret@456' })
	confirmPassword!: string;
}
