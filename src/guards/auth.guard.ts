import { CanActivate, ExecutionContext, Injectable, Logger, UnauthorizedException } from '@nestjs/common';
import { Reflector } from '@nestjs/core';
import { JwtService } from '@nestjs/jwt';
import { Request } from 'express';
import { UserService } from '../user/user.service';
import { IS_PUBLIC_KEY } from '../decorators/public.decorator';
import { AuthenticatedUser } from '../lib/interfaces/authenticated-request.interface';
import { BaseGuard } from './base.guard';

/**
 * Verifies the bearer token and loads the account behind it. Inactive or removed accounts
 * are rejected even while their token is still valid.
 */
@Injectable()
export class AuthGuard extends BaseGuard implements CanActivate {
	protected logger = new Logger(AuthGuard.name);

	constructor(
		jwtService: JwtService,
		private readonly reflector: Reflector,
		private readonly userService: UserService,
	) {
		super(jwtService);
	}

	async canActivate(context: ExecutionContext): Promise<boolean> {
		const isPublicRoute = this.reflector.getAllAndOverride<boolean>(IS_PUBLIC_KEY, [
			context.getHandler(),
			context.getClass(),
		]);

		if (isPublicRoute) {
			return true;
		}

		const request = context.switchToHttp().getRequest<Request & { user?: AuthenticatedUser }>();
		const decodedToken = await this.extractAndValidateToken(request);

		const user = await this.userService.findActiveByUid(decodedToken.uid);

		if (!user) {
			this.logger.warn(`Rejected token for missing or inactive user ${decodedToken.uid}`);
			throw new UnauthorizedException('Account not found or inactive');
		}

		request.user = {
			uid: user.uid,
			email: user.email,
			fullName: user.fullName,
			role: user.accessLevel,
			campusUid: user.campusUid ?? null,
		};

		return true;
	}
}
