import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { ArtifactStoreService } from '../../artifacts/services/artifact-store.service';
import {
  ErrorKind,
  RetrievalError,
} from '../../common/errors/retrieval.error';
import {
  DEFAULT_BACKOFF_MAX_MS,
  DEFAULT_BACKOFF_MIN_MS,
  DEFAULT_FETCH_TIMEOUT_MS,
  DEFAULT_MAX_ATTEMPTS,
} from '../../config/config.defaults';
import { delay, errorMessage, randomInt } from '../../lib/util';
import { describeProxy } from '../../proxy/proxy-list.parser';
import { ProxyPoolService } from '../../proxy/services/proxy-pool.service';
import { FetchError, FetchErrorKind } from '../errors/fetch.error';
import {
  POST_FETCHER,
  type IPostFetcher,
  type PlaybackDescriptor,
  type RetrievedPost,
} from '../interfaces/post-fetcher.interface';
import { classifyFailure, exhaustedKind } from '../outcome-classifier';
import { extractShortcode } from '../post-identifier';

@Injectable()
export class RetrievalOrchestratorService {
  private readonly logger = new Logger(RetrievalOrchestratorService.name);
  private readonly maxAttempts: number;
  private readonly backoffMinMs: number;
  private readonly backoffMaxMs: number;
  private readonly fetchTimeoutMs: number;

  constructor(
    private readonly configService: ConfigService,
    private readonly proxyPool: ProxyPoolService,
    @Inject(POST_FETCHER) private readonly fetcher: IPostFetcher,
    private readonly artifactStore: ArtifactStoreService,
  ) {
    this.maxAttempts =
      this.configService.get<number>('RETRIEVAL_MAX_ATTEMPTS') ||
      DEFAULT_MAX_ATTEMPTS;
    this.backoffMinMs =
      this.configService.get<number>('RETRIEVAL_BACKOFF_MIN_MS') ??
      DEFAULT_BACKOFF_MIN_MS;
    this.backoffMaxMs = Math.max(
      this.backoffMinMs,
      this.configService.get<number>('RETRIEVAL_BACKOFF_MAX_MS') ??
        DEFAULT_BACKOFF_MAX_MS,
    );
    this.fetchTimeoutMs =
      this.configService.get<number>('FETCH_TIMEOUT_MS') ||
      DEFAULT_FETCH_TIMEOUT_MS;
  }

  /**
   * Fetches, stores and transcodes the post's video and returns where it can
   * be played from.
   */
  async download(
    postUrl: string,
    baseUrl: string,
    signal?: AbortSignal,
  ): Promise<PlaybackDescriptor> {
    const post = await this.retrieve(postUrl, signal);
    this.throwIfCancelled(post.shortcode, signal);

    await this.artifactStore.put(post.shortcode, post.video, post.caption);
    this.logger.log(`Successfully processed ${post.shortcode}`);

    return {
      play: this.artifactStore.playbackUrl(post.shortcode, baseUrl),
      title: post.caption,
      authorUsername: post.authorUsername,
    };
  }

  /**
   * Tries up to `RETRIEVAL_MAX_ATTEMPTS` times, each with a freshly selected
   * proxy and user agent. Only connection-class failures are retried.
   */
  async retrieve(postUrl: string, signal?: AbortSignal): Promise<RetrievedPost> {
    const shortcode = extractShortcode(postUrl);
    this.logger.log(`Extracted shortcode ${shortcode} from ${postUrl}`);

    let lastError: unknown;
    let lastThrottled = false;

    for (let attempt = 1; attempt <= this.maxAttempts; attempt++) {
      this.throwIfCancelled(shortcode, signal);

      const proxy = this.proxyPool.select();
      const userAgent = this.proxyPool.userAgent();
      this.logger.log(
        `Attempt ${attempt}/${this.maxAttempts} for ${shortcode} using proxy: ${describeProxy(proxy)}`,
      );

      try {
        const post = await this.fetcher.fetchPost({
          shortcode,
          proxy,
          userAgent,
          timeoutMs: this.fetchTimeoutMs,
          signal,
        });
        return { shortcode, ...post };
      } catch (error) {
        this.throwIfCancelled(shortcode, signal);

        const decision = classifyFailure(error);
        if (decision.action === 'abort') {
          throw this.abortError(decision.kind, shortcode, error);
        }

        lastError = error;
        lastThrottled = decision.throttled;
        this.logger.warn(
          `Connection error for ${shortcode} on attempt ${attempt}: ${errorMessage(error)}`,
        );

        if (attempt < this.maxAttempts) {
          await this.backoff(shortcode, signal);
        }
      }
    }

    const kind = exhaustedKind(lastThrottled);
    throw new RetrievalError(
      kind,
      kind === ErrorKind.RateLimited
        ? 'Rate limited by Instagram. Please try again later.'
        : `Connection error after ${this.maxAttempts} attempts`,
      { cause: lastError },
    );
  }

  private async backoff(shortcode: string, signal?: AbortSignal) {
    const ms = randomInt(this.backoffMinMs, this.backoffMaxMs);
    try {
      await delay(ms, signal);
    } catch (error) {
      throw new RetrievalError(
        ErrorKind.Cancelled,
        `Retrieval of ${shortcode} cancelled`,
        { cause: error },
      );
    }
  }

  private throwIfCancelled(shortcode: string, signal?: AbortSignal) {
    if (signal?.aborted) {
      throw new RetrievalError(
        ErrorKind.Cancelled,
        `Retrieval of ${shortcode} cancelled`,
      );
    }
  }

  private abortError(
    kind: ErrorKind,
    shortcode: string,
    error: unknown,
  ): RetrievalError {
    if (kind === ErrorKind.Unexpected) {
      this.logger.error(
        `Unexpected error for ${shortcode}: ${errorMessage(error)}`,
      );
      return new RetrievalError(
        kind,
        'Unexpected error while retrieving the post',
        { cause: error },
      );
    }

    const notFound =
      error instanceof FetchError && error.kind === FetchErrorKind.NotFound;
    this.logger.error(`Upstream rejected ${shortcode}: ${errorMessage(error)}`);
    return new RetrievalError(
      kind,
      notFound
        ? `Post ${shortcode} not found, private, or has no video`
        : `Instagram rejected the request for ${shortcode}`,
      { cause: error },
    );
  }
}
