import { Module } from '@nestjs/common';
import { JwtModule } from '@nestjs/jwt';
import { ConfigService } from '@nestjs/config';
import { TypeOrmModule } from '@nestjs/typeorm';
import { AuthService } from './auth.service';
import { AuthController } from './auth.controller';
import { UserModule } from '../user/user.module';
import { PendingSignupService } from './pending-signup.service';
import { PasswordResetService } from './password-reset.service';
import { PendingSignup } from './entities/pending-signup.entity';
import { PasswordReset } from './entities/password-reset.entity';

@Module({
	imports: [
		TypeOrmModule.forFeature([PendingSignup, PasswordReset]),
		JwtModule.registerAsync({
			global: true,
			inject: [ConfigService],
			useFactory: (configService: ConfigService) => ({
				secret: configService.getOrThrow<string>('JWT_SECRET'),
				signOptions: { expiresIn: configService.get<string>('JWT_EXPIRES_IN') ?? '1h' },
			}),
		}),
		UserModule,
	],
	controllers: [AuthController],
	providers: [AuthService, PendingSignupService, PasswordResetService],
	exports: [AuthService],
})
export class AuthModule {}
