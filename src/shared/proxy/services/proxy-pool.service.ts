import {
  Inject,
  Injectable,
  Logger,
  OnModuleDestroy,
  OnModuleInit,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { SchedulerRegistry } from '@nestjs/schedule';
import {
  DEFAULT_PROXY_MAX_REQUESTS_PER_WINDOW,
  DEFAULT_PROXY_WINDOW_MS,
} from '../../config/config.defaults';
import { errorMessage } from '../../lib/util';
import {
  PROXY_SOURCE,
  type IProxySource,
  type Proxy,
  type ProxyPoolStats,
  type ProxyUsageRecord,
  type RateLimitPolicy,
} from '../interfaces/proxy.interface';
import { currentUsage, selectProxy } from '../proxy-selection';
import { USER_AGENTS } from '../user-agents';

const REFRESH_INTERVAL_NAME = 'proxy-pool-refresh';

/**
 * Owns the egress proxy set and the per-proxy usage ledger.
 *
 * `select()` is synchronous from reading the ledger to committing the new
 * record, so concurrent requests on the event loop cannot lose an update.
 */
@Injectable()
export class ProxyPoolService implements OnModuleInit, OnModuleDestroy {
  private readonly logger = new Logger(ProxyPoolService.name);
  private readonly policy: RateLimitPolicy;
  private readonly refreshIntervalMs: number;

  private proxies: readonly Proxy[] = [];
  private usage = new Map<string, ProxyUsageRecord>();
  private lastRefreshAt?: Date;

  constructor(
    private readonly configService: ConfigService,
    @Inject(PROXY_SOURCE) private readonly source: IProxySource,
    private readonly schedulerRegistry: SchedulerRegistry,
  ) {
    this.policy = {
      windowMs:
        this.configService.get<number>('PROXY_WINDOW_MS') ||
        DEFAULT_PROXY_WINDOW_MS,
      maxRequestsPerWindow:
        this.configService.get<number>('PROXY_MAX_REQUESTS_PER_WINDOW') ||
        DEFAULT_PROXY_MAX_REQUESTS_PER_WINDOW,
    };
    this.refreshIntervalMs =
      (this.configService.get<number>('PROXY_REFRESH_INTERVAL_MINUTES') || 0) *
      60_000;
  }

  async onModuleInit() {
    await this.refresh();

    if (this.refreshIntervalMs > 0 && this.source.configured) {
      const timer = setInterval(() => {
        void this.refresh();
      }, this.refreshIntervalMs);
      this.schedulerRegistry.addInterval(REFRESH_INTERVAL_NAME, timer);
      this.logger.log(
        `Proxy list refresh scheduled every ${this.refreshIntervalMs / 60_000} min`,
      );
    }
  }

  onModuleDestroy() {
    if (this.schedulerRegistry.doesExist('interval', REFRESH_INTERVAL_NAME)) {
      this.schedulerRegistry.deleteInterval(REFRESH_INTERVAL_NAME);
    }
  }

  /**
   * Replaces the proxy set with a freshly fetched one. A failed fetch keeps
   * the current set. Resolves to whether the set was replaced.
   */
  async refresh(): Promise<boolean> {
    if (!this.source.configured) {
      this.logger.warn('PROXIES_URL not set, using direct connections');
      return false;
    }

    try {
      const proxies = await this.source.fetchProxies();
      this.proxies = Object.freeze([...proxies]);
      this.usage = new Map();
      this.lastRefreshAt = new Date();

      if (proxies.length === 0) {
        this.logger.warn('Proxy source returned no usable records');
      } else {
        this.logger.log(`Loaded ${proxies.length} proxies`);
      }
      return true;
    } catch (error) {
      this.logger.error(
        `Failed to refresh proxies, keeping ${this.proxies.length}: ${errorMessage(error)}`,
      );
      return false;
    }
  }

  /** Next proxy to use, or undefined for a direct connection. */
  select(): Proxy | undefined {
    const now = Date.now();
    const selection = selectProxy(this.proxies, this.usage, this.policy, now);
    if (!selection) {
      return undefined;
    }

    if (selection.record) {
      this.usage.set(selection.proxy.id, selection.record);
    } else {
      this.logger.warn(
        `All ${this.proxies.length} proxies at ${this.policy.maxRequestsPerWindow} requests per window, reusing ${selection.proxy.host}:${selection.proxy.port}`,
      );
    }

    return selection.proxy;
  }

  userAgent(): string {
    return USER_AGENTS[Math.floor(Math.random() * USER_AGENTS.length)];
  }

  usageOf(proxyId: string): ProxyUsageRecord | undefined {
    const record = this.usage.get(proxyId);
    return record ? { ...record } : undefined;
  }

  size(): number {
    return this.proxies.length;
  }

  stats(): ProxyPoolStats {
    const now = Date.now();
    const saturated = [...this.usage.values()].filter(
      (record) =>
        currentUsage(record, this.policy, now).requestsInCurrentWindow >=
        this.policy.maxRequestsPerWindow,
    ).length;

    return {
      total: this.proxies.length,
      tracked: this.usage.size,
      saturated,
      lastRefreshAt: this.lastRefreshAt,
    };
  }
}
