import type { Proxy } from './interfaces/proxy.interface';

/**
 * Parses newline-delimited `ip:port:user:password` records. Lines that do not
 * have exactly four fields, carry a non-numeric port or do not form a valid
 * proxy URL are dropped.
 */
export function parseProxyList(text: string): Proxy[] {
  const proxies: Proxy[] = [];

  for (const rawLine of text.split(/\r?\n/)) {
    const line = rawLine.trim();
    if (!line) continue;

    const parts = line.split(':');
    if (parts.length !== 4) continue;

    const [host, portText, username, password] = parts;
    const port = Number(portText);
    if (!host || !Number.isInteger(port) || port <= 0 || port > 65535) {
      continue;
    }

    const proxy: Proxy = {
      id: `${host}:${port}:${username}`,
      host,
      port,
      username,
      password,
    };
    if (!isValidProxyUrl(proxy)) continue;

    proxies.push(proxy);
  }

  return proxies;
}

export function toConnectionString(proxy: Proxy): string {
  const user = encodeURIComponent(proxy.username);
  const password = encodeURIComponent(proxy.password);
  return `http://${user}:${password}@${proxy.host}:${proxy.port}`;
}

function isValidProxyUrl(proxy: Proxy): boolean {
  try {
    new URL(toConnectionString(proxy));
    return true;
  } catch {
    return false;
  }
}

/** Connection string without credentials, safe for logs. */
export function describeProxy(proxy: Proxy | undefined): string {
  return proxy ? `${proxy.host}:${proxy.port}` : 'direct';
}
