import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { request } from 'undici';
import type { IProxySource, Proxy } from '../interfaces/proxy.interface';
import { parseProxyList } from '../proxy-list.parser';

@Injectable()
export class HttpProxySource implements IProxySource {
  private readonly logger = new Logger(HttpProxySource.name);
  private readonly url?: string;
  private readonly timeoutMs: number;

  constructor(private readonly configService: ConfigService) {
    this.url = this.configService.get<string>('PROXIES_URL');
    this.timeoutMs =
      this.configService.get<number>('FETCH_TIMEOUT_MS') || 15_000;
  }

  get configured(): boolean {
    return Boolean(this.url);
  }

  async fetchProxies(): Promise<Proxy[]> {
    if (!this.url) {
      return [];
    }

    this.logger.log(`Fetching proxy list from ${new URL(this.url).host}`);

    const response = await request(this.url, {
      method: 'GET',
      headersTimeout: this.timeoutMs,
      bodyTimeout: this.timeoutMs,
    });

    if (response.statusCode >= 400) {
      // drain so the socket goes back to the pool
      await response.body.dump();
      throw new Error(`Proxy source responded with HTTP ${response.statusCode}`);
    }

    return parseProxyList(await response.body.text());
  }
}
