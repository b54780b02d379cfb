import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { PROXY_SOURCE } from './interfaces/proxy.interface';
import { HttpProxySource } from './providers/http-proxy-source.provider';
import { ProxyPoolService } from './services/proxy-pool.service';

@Module({
  imports: [ConfigModule],
  providers: [
    {
      provide: PROXY_SOURCE,
      useClass: HttpProxySource,
    },
    ProxyPoolService,
  ],
  exports: [ProxyPoolService],
})
export class ProxyModule {}
