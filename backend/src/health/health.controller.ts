import { Controller, Get } from '@nestjs/common';
import { PollerService, PollerState } from '../live';

/**
 * Liveness endpoint for the process supervisor.
 * Reports 'ok' while the process serves requests; the poller state is
 * informational, a failing BMS does not make the service unhealthy.
 */
@Controller('health')
export class HealthController {
  constructor(private readonly poller: PollerService) {}

  @Get()
  check(): {
    status: 'ok';
    timestamp: string;
    poller: { state: PollerState; lastSuccessAt: string | null };
  } {
    const stats = this.poller.getStats();
    return {
      status: 'ok',
      timestamp: new Date().toISOString(),
      poller: {
        state: stats.state,
        lastSuccessAt: stats.lastSuccessAt?.toISOString() ?? null,
      },
    };
  }
}
