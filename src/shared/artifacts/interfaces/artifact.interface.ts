export const ARTIFACT_URL_PREFIX = '/downloads';
export const EXPIRY_MARKER_FILE = 'expiry_timestamp.txt';

export interface ArtifactHandle {
  postId: string;
  directory: string;
  videoPath: string;
  captionPath?: string;
  expiresAt: Date;
}

export interface SweepReport {
  scanned: number;
  deleted: number;
  skipped: number;
  failed: number;
}

export const TRANSCODER = 'TRANSCODER';

export interface ITranscoder {
  /**
   * Re-encodes `inputPath` into a fast-start playable file that replaces the
   * input. Resolves to the output path.
   */
  normalize(inputPath: string): Promise<string>;
}

export class TranscodeError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'TranscodeError';
  }
}
