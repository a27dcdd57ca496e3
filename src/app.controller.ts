import { Controller, Get } from '@nestjs/common';
import { ApiOperation, ApiResponse, ApiTags } from '@nestjs/swagger';
import { AppService } from './app.service';
import { Public } from './auth/decorators/public.decorator';

@ApiTags('Health')
@Controller()
export class AppController {
  constructor(private readonly appService: AppService) {}

  @Get('/health')
  @Public() // probes carry no token
  @ApiOperation({ summary: 'Health check endpoint', description: 'Public endpoint, no authentication required.' })
  @ApiResponse({
    status: 200,
    description: 'Service is healthy',
    schema: {
      type: 'object',
      properties: {
        status: { type: 'string', example: 'ok' },
        service: { type: 'string', example: 'product-api' },
        timestamp: { type: 'string', format: 'date-time', example: '2026-01-19T00:00:00.000Z' }
      }
    }
  })
  health() {
    return this.appService.health();
  }
}
