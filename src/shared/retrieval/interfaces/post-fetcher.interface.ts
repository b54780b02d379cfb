import type { Proxy } from '../../proxy/interfaces/proxy.interface';

export const POST_FETCHER = 'POST_FETCHER';

export interface FetchRequest {
  shortcode: string;
  /** Absent for a direct connection. */
  proxy?: Proxy;
  userAgent: string;
  timeoutMs: number;
  signal?: AbortSignal;
}

export interface FetchedPost {
  video: Buffer;
  caption: string;
  authorUsername?: string;
}

/**
 * One connection attempt per call. Implementations must not retry on their
 * own; rotation across egress identities happens in the orchestrator.
 * Failures are reported as `FetchError`.
 */
export interface IPostFetcher {
  fetchPost(request: FetchRequest): Promise<FetchedPost>;
}

export interface RetrievedPost extends FetchedPost {
  shortcode: string;
}

export interface PlaybackDescriptor {
  play: string;
  title: string;
  authorUsername?: string;
}
