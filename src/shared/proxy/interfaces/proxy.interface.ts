export interface Proxy {
  /** `host:port:username`, stable across refreshes of the same list. */
  id: string;
  host: string;
  port: number;
  username: string;
  password: string;
}

export interface ProxyUsageRecord {
  lastUsedAt: number;
  requestsInCurrentWindow: number;
}

export interface RateLimitPolicy {
  windowMs: number;
  maxRequestsPerWindow: number;
}

export interface ProxyPoolStats {
  total: number;
  tracked: number;
  saturated: number;
  lastRefreshAt?: Date;
}

export const PROXY_SOURCE = 'PROXY_SOURCE';

export interface IProxySource {
  /** False when no list location is configured; the pool then stays empty. */
  readonly configured: boolean;
  fetchProxies(): Promise<Proxy[]>;
}
