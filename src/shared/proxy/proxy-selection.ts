import type {
  Proxy,
  ProxyUsageRecord,
  RateLimitPolicy,
} from './interfaces/proxy.interface';

export interface ProxySelection {
  proxy: Proxy;
  /** Record to commit for `proxy`; absent when the pick was degraded. */
  record?: ProxyUsageRecord;
  degraded: boolean;
}

function shuffled<T>(items: readonly T[], random: () => number): T[] {
  const copy = [...items];
  for (let i = copy.length - 1; i > 0; i--) {
    const j = Math.floor(random() * (i + 1));
    [copy[i], copy[j]] = [copy[j], copy[i]];
  }
  return copy;
}

/**
 * Returns the usage record as it stands at `now`: a window older than
 * `windowMs` no longer counts.
 */
export function currentUsage(
  record: ProxyUsageRecord | undefined,
  policy: RateLimitPolicy,
  now: number,
): ProxyUsageRecord {
  if (!record || now - record.lastUsedAt > policy.windowMs) {
    return { lastUsedAt: record?.lastUsedAt ?? 0, requestsInCurrentWindow: 0 };
  }
  return record;
}

/**
 * Shuffles the candidates and takes the first one under the window ceiling.
 * When all are saturated it falls back to a uniformly random candidate, so the
 * ceiling is advisory. Does not mutate `usage`; the caller commits `record`.
 */
export function selectProxy(
  candidates: readonly Proxy[],
  usage: ReadonlyMap<string, ProxyUsageRecord>,
  policy: RateLimitPolicy,
  now: number,
  random: () => number = Math.random,
): ProxySelection | undefined {
  if (candidates.length === 0) {
    return undefined;
  }

  for (const proxy of shuffled(candidates, random)) {
    const record = currentUsage(usage.get(proxy.id), policy, now);
    if (record.requestsInCurrentWindow < policy.maxRequestsPerWindow) {
      return {
        proxy,
        record: {
          lastUsedAt: now,
          requestsInCurrentWindow: record.requestsInCurrentWindow + 1,
        },
        degraded: false,
      };
    }
  }

  const fallback = candidates[Math.floor(random() * candidates.length)];
  return { proxy: fallback, degraded: true };
}
