import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { promises as fs } from 'fs';
import path from 'path';
import {
  ErrorKind,
  RetrievalError,
} from '../../common/errors/retrieval.error';
import {
  DEFAULT_ARTIFACT_ROOT,
  DEFAULT_ARTIFACT_TTL_MINUTES,
} from '../../config/config.defaults';
import { errorCode, errorMessage } from '../../lib/util';
import {
  ARTIFACT_URL_PREFIX,
  EXPIRY_MARKER_FILE,
  TRANSCODER,
  type ArtifactHandle,
  type ITranscoder,
} from '../interfaces/artifact.interface';
import { ArtifactLockService } from './artifact-lock.service';

const SAFE_POST_ID = /^[A-Za-z0-9_-]+$/;
const ISO_DATE_TIME =
  /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}(:\d{2}(\.\d+)?)?(Z|[+-]\d{2}:\d{2})?$/;

export type ExpiryState =
  | { state: 'missing' }
  | { state: 'invalid'; raw: string }
  | { state: 'set'; expiresAt: Date };

/**
 * One directory per post under the artifact root:
 *
 *   <root>/<postId>/<postId>.mp4
 *   <root>/<postId>/<postId>.txt          caption, only when non-empty
 *   <root>/<postId>/expiry_timestamp.txt  ISO-8601, written last
 *
 * The expiry marker doubles as the readiness signal: a directory without one
 * is still being written and the reclaimer leaves it alone. A failed
 * transcode removes the directory.
 */
@Injectable()
export class ArtifactStoreService {
  private readonly logger = new Logger(ArtifactStoreService.name);
  private readonly root: string;
  private readonly ttlMs: number;
  private readonly publicBaseUrl?: string;

  constructor(
    private readonly configService: ConfigService,
    @Inject(TRANSCODER) private readonly transcoder: ITranscoder,
    private readonly locks: ArtifactLockService,
  ) {
    this.root = path.resolve(
      this.configService.get<string>('ARTIFACT_ROOT') || DEFAULT_ARTIFACT_ROOT,
    );
    this.ttlMs =
      (this.configService.get<number>('ARTIFACT_TTL_MINUTES') ||
        DEFAULT_ARTIFACT_TTL_MINUTES) * 60_000;
    this.publicBaseUrl = this.configService.get<string>('PUBLIC_BASE_URL');
  }

  get rootDirectory(): string {
    return this.root;
  }

  async ensureRoot(): Promise<string> {
    await fs.mkdir(this.root, { recursive: true });
    return this.root;
  }

  directoryOf(postId: string): string {
    return path.join(this.root, postId);
  }

  videoFileName(postId: string): string {
    return `${postId}.mp4`;
  }

  async put(
    postId: string,
    video: Buffer,
    caption: string,
  ): Promise<ArtifactHandle> {
    if (!SAFE_POST_ID.test(postId)) {
      throw new RetrievalError(
        ErrorKind.InvalidInput,
        `Invalid post identifier: ${postId}`,
      );
    }

    return this.locks.runExclusive(postId, async () => {
      try {
        return await this.write(postId, video, caption);
      } catch (error) {
        if (error instanceof RetrievalError) throw error;
        this.logger.error(
          `Failed to store artifact ${postId}: ${errorMessage(error)}`,
        );
        throw new RetrievalError(
          ErrorKind.Unexpected,
          'Failed to store the downloaded video',
          { cause: error },
        );
      }
    });
  }

  playbackUrl(postId: string, baseUrl: string): string {
    const base = (this.publicBaseUrl || baseUrl).replace(/\/+$/, '');
    const id = encodeURIComponent(postId);
    return `${base}${ARTIFACT_URL_PREFIX}/${id}/${encodeURIComponent(this.videoFileName(postId))}`;
  }

  async readExpiry(postId: string): Promise<ExpiryState> {
    let raw: string;
    try {
      raw = await fs.readFile(
        path.join(this.directoryOf(postId), EXPIRY_MARKER_FILE),
        'utf8',
      );
    } catch (error) {
      const code = errorCode(error);
      if (code === 'ENOENT' || code === 'ENOTDIR') {
        return { state: 'missing' };
      }
      throw error;
    }

    const text = raw.trim();
    if (!ISO_DATE_TIME.test(text)) {
      return { state: 'invalid', raw };
    }
    const expiresAt = new Date(text);
    if (Number.isNaN(expiresAt.getTime())) {
      return { state: 'invalid', raw };
    }
    return { state: 'set', expiresAt };
  }

  /** Deletes the post's directory. Missing directories are not an error. */
  async remove(postId: string): Promise<void> {
    await fs.rm(this.directoryOf(postId), { recursive: true, force: true });
  }

  private async write(
    postId: string,
    video: Buffer,
    caption: string,
  ): Promise<ArtifactHandle> {
    const directory = this.directoryOf(postId);
    const videoPath = path.join(directory, this.videoFileName(postId));
    const captionPath = path.join(directory, `${postId}.txt`);
    const markerPath = path.join(directory, EXPIRY_MARKER_FILE);

    // the previous artifact stops being "ready" before its files change
    await fs.rm(markerPath, { force: true });

    await this.writeInto(directory, videoPath, video);

    try {
      await this.transcoder.normalize(videoPath);
    } catch (error) {
      this.logger.error(`Transcoding ${postId} failed: ${errorMessage(error)}`);
      await this.remove(postId);
      throw new RetrievalError(
        ErrorKind.TranscodeFailed,
        `Transcoding failed for ${postId}`,
        { cause: error },
      );
    }

    if (caption) {
      await this.writeInto(directory, captionPath, caption);
    } else {
      await fs.rm(captionPath, { force: true });
    }

    const expiresAt = new Date(Date.now() + this.ttlMs);
    await this.writeInto(
      directory,
      `${markerPath}.tmp`,
      expiresAt.toISOString(),
    );
    await fs.rename(`${markerPath}.tmp`, markerPath);

    this.logger.log(
      `Stored ${postId} (${video.length} bytes raw), expires ${expiresAt.toISOString()}`,
    );

    return {
      postId,
      directory,
      videoPath,
      captionPath: caption ? captionPath : undefined,
      expiresAt,
    };
  }

  /**
   * Writes a file, recreating the directory once if it vanished underneath
   * (deleted outside this process while we were writing).
   */
  private async writeInto(
    directory: string,
    filePath: string,
    data: Buffer | string,
  ): Promise<void> {
    for (let attempt = 1; ; attempt++) {
      try {
        await fs.mkdir(directory, { recursive: true });
        await fs.writeFile(filePath, data);
        return;
      } catch (error) {
        if (errorCode(error) !== 'ENOENT' || attempt >= 2) {
          throw error;
        }
        this.logger.warn(`${directory} disappeared during write, recreating`);
      }
    }
  }
}
