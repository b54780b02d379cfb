import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Dispatcher, ProxyAgent, request } from 'undici';
import { errorMessage } from '../../lib/util';
import type { Proxy } from '../../proxy/interfaces/proxy.interface';
import { describeProxy, toConnectionString } from '../../proxy/proxy-list.parser';
import { FetchError, FetchErrorKind } from '../errors/fetch.error';
import type {
  FetchedPost,
  FetchRequest,
  IPostFetcher,
} from '../interfaces/post-fetcher.interface';
import { parseMediaInfo } from './instagram-media.parser';

const INSTAGRAM_ORIGIN = 'https://www.instagram.com';

interface SendOptions {
  headers: Record<string, string>;
  dispatcher?: Dispatcher;
  signal?: AbortSignal;
  timeoutMs: number;
}

/**
 * Maps an upstream HTTP status to a fetch failure. Redirects are treated as
 * the login wall Instagram serves to throttled or anonymous clients.
 */
export function failureForStatus(statusCode: number, what: string): FetchError {
  const message = `${what} responded with HTTP ${statusCode}`;

  if (statusCode === 401 || statusCode === 403) {
    return new FetchError(FetchErrorKind.Forbidden, message, statusCode);
  }
  if (statusCode >= 300 && statusCode < 400) {
    return new FetchError(
      FetchErrorKind.Forbidden,
      `${what} redirected to login (HTTP ${statusCode})`,
      statusCode,
    );
  }
  if (statusCode === 404) {
    return new FetchError(FetchErrorKind.NotFound, message, statusCode);
  }
  if (statusCode === 429 || statusCode >= 500) {
    return new FetchError(FetchErrorKind.Connection, message, statusCode);
  }
  return new FetchError(FetchErrorKind.Other, message, statusCode);
}

/** An unusable proxy is an egress failure; the next attempt rotates away. */
export function createProxyAgent(proxy: Proxy): ProxyAgent {
  try {
    return new ProxyAgent({ uri: toConnectionString(proxy) });
  } catch (error) {
    throw new FetchError(
      FetchErrorKind.Connection,
      `Proxy ${describeProxy(proxy)} is unusable: ${errorMessage(error)}`,
      undefined,
      { cause: error },
    );
  }
}

@Injectable()
export class InstagramFetchProvider implements IPostFetcher {
  private readonly logger = new Logger(InstagramFetchProvider.name);
  private readonly sessionId?: string;
  private readonly appId: string;

  constructor(private readonly configService: ConfigService) {
    this.sessionId = this.configService.get<string>('INSTAGRAM_SESSION_ID');
    this.appId =
      this.configService.get<string>('INSTAGRAM_APP_ID') || '936619743392459';
  }

  async fetchPost(fetchRequest: FetchRequest): Promise<FetchedPost> {
    const { shortcode, proxy } = fetchRequest;
    const dispatcher = proxy ? createProxyAgent(proxy) : undefined;

    try {
      const media = await this.fetchMediaInfo(fetchRequest, dispatcher);
      const video = await this.downloadVideo(
        media.videoUrl,
        fetchRequest,
        dispatcher,
      );

      this.logger.debug(
        `Fetched ${shortcode} via ${describeProxy(proxy)}: ${video.length} bytes`,
      );

      return {
        video,
        caption: media.caption,
        authorUsername: media.authorUsername,
      };
    } finally {
      await dispatcher?.close();
    }
  }

  private async fetchMediaInfo(
    { shortcode, userAgent, timeoutMs, signal }: FetchRequest,
    dispatcher?: Dispatcher,
  ) {
    const headers: Record<string, string> = {
      'User-Agent': userAgent,
      Accept: 'application/json',
      'Accept-Language': 'en-US,en;q=0.9',
      'X-IG-App-ID': this.appId,
      'X-Requested-With': 'XMLHttpRequest',
      Referer: `${INSTAGRAM_ORIGIN}/p/${shortcode}/`,
    };
    if (this.sessionId) {
      headers.Cookie = `sessionid=${this.sessionId}`;
    }

    const body = await this.send(
      `${INSTAGRAM_ORIGIN}/p/${encodeURIComponent(shortcode)}/?__a=1&__d=dis`,
      'Post info',
      { headers, dispatcher, signal, timeoutMs },
    );

    let payload: unknown;
    try {
      payload = JSON.parse(body.toString('utf8'));
    } catch (error) {
      // an HTML page instead of JSON is the login wall
      throw new FetchError(
        FetchErrorKind.Forbidden,
        'Post info returned HTML instead of JSON (login required)',
        undefined,
        { cause: error },
      );
    }

    return parseMediaInfo(payload);
  }

  private async downloadVideo(
    videoUrl: string,
    { userAgent, timeoutMs, signal }: FetchRequest,
    dispatcher?: Dispatcher,
  ): Promise<Buffer> {
    const video = await this.send(videoUrl, 'Video download', {
      headers: { 'User-Agent': userAgent, Referer: `${INSTAGRAM_ORIGIN}/` },
      dispatcher,
      signal,
      timeoutMs,
    });

    if (video.length === 0) {
      throw new FetchError(FetchErrorKind.Connection, 'Video download was empty');
    }
    return video;
  }

  /**
   * Single request, whole body buffered. Transport errors (refused, reset,
   * timeouts) surface as `Connection` failures.
   */
  private async send(
    url: string,
    what: string,
    { headers, dispatcher, signal, timeoutMs }: SendOptions,
  ): Promise<Buffer> {
    const response = await request(url, {
      method: 'GET',
      headers,
      dispatcher,
      signal,
      headersTimeout: timeoutMs,
      bodyTimeout: timeoutMs,
    }).catch((error: unknown) => {
      throw this.transportFailure(what, error, signal);
    });

    if (response.statusCode !== 200) {
      await response.body.dump();
      throw failureForStatus(response.statusCode, what);
    }

    try {
      return Buffer.from(await response.body.arrayBuffer());
    } catch (error) {
      throw this.transportFailure(what, error, signal);
    }
  }

  private transportFailure(
    what: string,
    error: unknown,
    signal?: AbortSignal,
  ): unknown {
    // caller cancellation is not a connection failure; let it through
    if (signal?.aborted) {
      return error;
    }
    return new FetchError(
      FetchErrorKind.Connection,
      `${what} failed: ${errorMessage(error)}`,
      undefined,
      { cause: error },
    );
  }
}
