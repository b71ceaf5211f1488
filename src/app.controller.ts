import { Controller, Get } from '@nestjs/common';

@Controller()
export class AppController {
  @Get('health')
  health(): { ok: true; service: string; timestamp: string } {
    return {
      ok: true,
      service: 'clinic-appointments-api',
      timestamp: new Date().toISOString(),
    };
  }
}
