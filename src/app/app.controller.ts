import { Controller, Get } from '@nestjs/common';

import { HealthResponse, StatusResponse } from '@libs/interfaces';

@Controller()
export class AppController {
  /**
   * Liveness probe.
   */
  @Get()
  public getStatus(): StatusResponse {
    return { status: 'OK' };
  }

  @Get('health')
  public getHealth(): HealthResponse {
    return { status: 'healthy', timestamp: new Date().toISOString() };
  }
}
