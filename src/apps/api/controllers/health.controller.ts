import { Controller, Get } from '@nestjs/common';
import { ProxyPoolService } from '../../../shared/proxy/services/proxy-pool.service';

@Controller('health')
export class HealthController {
  constructor(private readonly proxyPool: ProxyPoolService) {}

  @Get()
  getHealth() {
    const proxies = this.proxyPool.stats();

    return {
      status: 'ok',
      timestamp: new Date().toISOString(),
      service: 'api',
      proxies: {
        mode: proxies.total > 0 ? 'rotating' : 'direct',
        ...proxies,
      },
    };
  }
}
