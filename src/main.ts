import { Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { SwaggerModule, DocumentBuilder } from '@nestjs/swagger';
import { AppModule } from './app.module';
import { configureApp } from './app.setup';

async function bootstrap() {
	const app = await NestFactory.create(AppModule);
	const logger = new Logger('Bootstrap');

	configureApp(app, process.env.ALLOWED_ORIGINS);

	const config = new DocumentBuilder()
		.setTitle('Campus Attendance API')
		.setDescription(
			`
Role-based HR and attendance service for a multi-campus university.

- **Attendance**: geofenced punch-in and punch-out with periodic location pings
- **Geofencing**: daily and weekly out-of-bounds reports and red notices
- **Leave**: requests, approvals and the holiday calendar
- **Inventory**: campus stock and item requests
- **Announcements**: university-wide and campus notices
`,
		)
		.setVersion('1.0')
		.addBearerAuth(
			{ type: 'http', scheme: 'bearer', bearerFormat: 'JWT', in: 'header' },
			'JWT-auth',
		)
		.build();

	const document = SwaggerModule.createDocument(app, config, {
		operationIdFactory: (controllerKey: string, methodKey: string) => {
			const controllerName = controllerKey.replace('Controller', '').toLowerCase();
			return `${controllerName}_${methodKey}`;
		},
	});

	SwaggerModule.setup('api', app, document, {
		swaggerOptions: {
			persistAuthorization: true,
			tagsSorter: 'alpha',
			docExpansion: 'none',
			filter: true,
		},
		customSiteTitle: 'Campus Attendance API',
	});

	const port = process.env.PORT ?? 4400;
	await app.listen(port);
	logger.log(`Listening on port ${port}`);
}

bootstrap().catch((error: unknown) => {
	new Logger('Bootstrap').error('Failed to start', error instanceof Error ? error.stack : undefined);
	process.exit(1);
});
