import { INestApplication, ValidationPipe } from '@nestjs/common';
import helmet from 'helmet';
import compression from 'compression';

/** Middleware, CORS and validation shared by every HTTP entry point. */
export function configureApp(app: INestApplication, allowedOrigins?: string): void {
	app.use(helmet());

	app.use(compression());

	app.enableCors({
		origin: allowedOrigins?.split(',').map((origin) => origin.trim()) ?? ['http://localhost:3000'],
		methods: ['GET', 'POST', 'PUT', 'DELETE', 'PATCH', 'OPTIONS'],
		credentials: true,
		allowedHeaders: ['Content-Type', 'Authorization', 'X-Requested-With', 'token'],
		maxAge: 3600,
	});

	app.useGlobalPipes(
		new ValidationPipe({
			whitelist: true,
			transform: true,
		}),
	);
}
