import { setTimeout as sleep } from 'timers/promises';

/**
 * Message of a caught value, whatever was thrown.
 */
export function errorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return typeof error === 'string' ? error : JSON.stringify(error);
}

/**
 * Node's system errors carry a string `code` (ENOENT, ECONNRESET, ...).
 */
export function errorCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error) {
    const { code } = error;
    return typeof code === 'string' ? code : undefined;
  }
  return undefined;
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function randomInt(min: number, max: number, random = Math.random) {
  return min + Math.floor(random() * (max - min + 1));
}

/**
 * Resolves after `ms`; rejects with the signal's AbortError if it fires first.
 */
export async function delay(ms: number, signal?: AbortSignal): Promise<void> {
  await sleep(ms, undefined, { signal });
}
