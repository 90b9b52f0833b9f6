import { Controller, Get } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';

@Controller('health')
export class HealthController {
  constructor(private readonly configService: ConfigService) {}

  @Get()
  check(): { status: 'ok'; service: string; timestamp: string } {
    return {
      status: 'ok',
      service: this.configService.get<string>('SERVICE_NAME', 'analysis-service'),
      timestamp: new Date().toISOString(),
    };
  }
}
