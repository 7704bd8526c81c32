import { Injectable, Logger, UnauthorizedException } from '@nestjs/common';
import { JwtService } from '@nestjs/jwt';
import { Request } from 'express';
import { Token } from '../lib/types/token';

@Injectable()
export class BaseGuard {
	protected logger = new Logger(BaseGuard.name);

	constructor(protected readonly jwtService: JwtService) {}

	protected async extractAndValidateToken(request: Request): Promise<Token> {
		const token = this.extractTokenFromHeader(request);

		if (!token) {
			throw new UnauthorizedException('No token provided');
		}

		try {
			const decodedToken = await this.jwtService.verifyAsync<Token>(token);

			if (!decodedToken?.uid) {
				throw new UnauthorizedException('Invalid token format');
			}

			return decodedToken;
		} catch (error) {
			if (error instanceof UnauthorizedException) {
				throw error;
			}
			if (error instanceof Error && error.name === 'TokenExpiredError') {
				throw new UnauthorizedException('Token expired');
			}
			this.logger.warn(`Token verification failed: ${error instanceof Error ? error.message : String(error)}`);
			throw new UnauthorizedException('Invalid token');
		}
	}

	private extractTokenFromHeader(request: Request): string | undefined {
		const tokenHeader = request.headers['token'];
		if (typeof tokenHeader === 'string' && tokenHeader) {
			return tokenHeader;
		}
		const [type, authToken] = request.headers.authorization?.split(' ') ?? [];
		return type === 'Bearer' ? authToken : undefined;
	}
}
