import { ConfigService } from '@nestjs/config';
import { SchedulerRegistry } from '@nestjs/schedule';
import type { IProxySource, Proxy } from '../interfaces/proxy.interface';
import { USER_AGENTS } from '../user-agents';
import { ProxyPoolService } from './proxy-pool.service';

class FakeProxySource implements IProxySource {
  configured = true;
  proxies: Proxy[] = [];
  failure?: Error;

  async fetchProxies(): Promise<Proxy[]> {
    if (this.failure) throw this.failure;
    return this.proxies;
  }
}

function proxy(n: number): Proxy {
  return {
    id: `10.0.0.${n}:8080:user`,
    host: `10.0.0.${n}`,
    port: 8080,
    username: 'user',
    password: 'test-secret',
  };
}

describe('ProxyPoolService', () => {
  let source: FakeProxySource;
  let registry: SchedulerRegistry;

  function createPool(config: Record<string, unknown> = {}) {
    return new ProxyPoolService(
      new ConfigService({
        PROXY_WINDOW_MS: 60_000,
        PROXY_MAX_REQUESTS_PER_WINDOW: 10,
        ...config,
      }),
      source,
      registry,
    );
  }

  beforeEach(() => {
    source = new FakeProxySource();
    registry = new SchedulerRegistry();
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('selects nothing while the pool is empty', () => {
    expect(createPool().select()).toBeUndefined();
  });

  it('replaces the proxy set on refresh', async () => {
    const pool = createPool();
    source.proxies = [proxy(1), proxy(2)];

    await expect(pool.refresh()).resolves.toBe(true);

    expect(pool.size()).toBe(2);
    expect([proxy(1).id, proxy(2).id]).toContain(pool.select()?.id);
  });

  it('keeps the current set when the source fails', async () => {
    const pool = createPool();
    source.proxies = [proxy(1), proxy(2)];
    await pool.refresh();

    source.failure = new Error('HTTP 500');
    await expect(pool.refresh()).resolves.toBe(false);

    expect(pool.size()).toBe(2);
  });

  it('skips the fetch when no source is configured', async () => {
    source.configured = false;
    const fetchProxies = jest.spyOn(source, 'fetchProxies');
    const pool = createPool();

    await expect(pool.refresh()).resolves.toBe(false);

    expect(fetchProxies).not.toHaveBeenCalled();
    expect(pool.size()).toBe(0);
  });

  it('rate limits a single proxy and resets after the window', async () => {
    const now = jest.spyOn(Date, 'now').mockReturnValue(1_000_000);
    const pool = createPool();
    source.proxies = [proxy(1)];
    await pool.refresh();

    for (let i = 0; i < 10; i++) pool.select();
    expect(pool.usageOf(proxy(1).id)).toEqual({
      lastUsedAt: 1_000_000,
      requestsInCurrentWindow: 10,
    });
    expect(pool.stats().saturated).toBe(1);

    // degraded pick: still handed out, counter untouched
    expect(pool.select()?.id).toBe(proxy(1).id);
    expect(pool.usageOf(proxy(1).id)?.requestsInCurrentWindow).toBe(10);

    now.mockReturnValue(1_060_001);
    pool.select();
    expect(pool.usageOf(proxy(1).id)).toEqual({
      lastUsedAt: 1_060_001,
      requestsInCurrentWindow: 1,
    });
  });

  it('drops the usage ledger when the set is refreshed', async () => {
    const pool = createPool();
    source.proxies = [proxy(1)];
    await pool.refresh();
    pool.select();

    await pool.refresh();

    expect(pool.usageOf(proxy(1).id)).toBeUndefined();
  });

  it('hands out user agents from the fixed list', () => {
    const pool = createPool();
    for (let i = 0; i < 20; i++) {
      expect(USER_AGENTS).toContain(pool.userAgent());
    }
  });

  it('schedules periodic refreshes when configured', async () => {
    const pool = createPool({ PROXY_REFRESH_INTERVAL_MINUTES: 5 });
    source.proxies = [proxy(1)];

    await pool.onModuleInit();
    expect(pool.size()).toBe(1);
    expect(registry.doesExist('interval', 'proxy-pool-refresh')).toBe(true);

    pool.onModuleDestroy();
    expect(registry.doesExist('interval', 'proxy-pool-refresh')).toBe(false);
  });

  it('does not schedule refreshes by default', async () => {
    const pool = createPool();

    await pool.onModuleInit();

    expect(registry.doesExist('interval', 'proxy-pool-refresh')).toBe(false);
  });
});
