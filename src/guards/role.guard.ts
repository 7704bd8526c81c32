import { CanActivate, ExecutionContext, ForbiddenException, Injectable, Logger, UnauthorizedException } from '@nestjs/common';
import { Reflector } from '@nestjs/core';
import { Request } from 'express';
import { IS_PUBLIC_KEY } from '../decorators/public.decorator';
import { CAPABILITIES_KEY } from '../decorators/capability.decorator';
import { Capability } from '../lib/enums/user.enums';
import { AuthenticatedUser } from '../lib/interfaces/authenticated-request.interface';
import { hasCapability } from '../lib/utils/access-level.util';

@Injectable()
export class RoleGuard implements CanActivate {
	private readonly logger = new Logger(RoleGuard.name);

	constructor(private readonly reflector: Reflector) {}

	canActivate(context: ExecutionContext): boolean {
		const isPublicRoute = this.reflector.getAllAndOverride<boolean>(IS_PUBLIC_KEY, [
			context.getHandler(),
			context.getClass(),
		]);

		if (isPublicRoute) {
			return true;
		}

		const request = context.switchToHttp().getRequest<Request & { user?: AuthenticatedUser }>();
		const path = `${request.method} ${request.path ?? request.url}`;
		const user = request.user;

		if (!user?.role) {
			this.logger.warn(`Denied (no user): ${path}`);
			throw new UnauthorizedException('Authentication required');
		}

		const required = this.reflector.getAllAndOverride<Capability[] | undefined>(CAPABILITIES_KEY, [
			context.getHandler(),
			context.getClass(),
		]);

		if (!required || required.length === 0) {
			return true;
		}

		const missing = required.filter((capability) => !hasCapability(user.role, capability));

		if (missing.length > 0) {
			this.logger.warn(`Denied ${path} for ${user.role}: missing ${missing.join(', ')}`);
			throw new ForbiddenException({
				statusCode: 403,
				message: 'You do not have sufficient permissions to access this resource',
				error: 'Forbidden',
			});
		}

		return true;
	}
}
