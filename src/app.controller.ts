import { Controller, Get } from '@nestjs/common';
import { ApiOkResponse, ApiOperation, ApiTags } from '@nestjs/swagger';
import { SkipThrottle } from '@nestjs/throttler';
import { AppService } from './app.service';

@ApiTags('🔧 System Health')
@Controller()
@SkipThrottle()
export class AppController {
	constructor(private readonly appService: AppService) {}

	@Get('health')
	@ApiOperation({ summary: 'Health check', description: 'Reports whether the API and its database connection are up.' })
	@ApiOkResponse({
		description: 'API is responding',
		schema: {
			type: 'object',
			properties: {
				status: { type: 'string', example: 'ok' },
				database: { type: 'boolean', example: true },
				timestamp: { type: 'string', format: 'date-time' },
			},
		},
	})
	getHealth() {
		return this.appService.getHealth();
	}
}
