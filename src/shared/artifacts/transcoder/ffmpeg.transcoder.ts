import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { spawn } from 'child_process';
import { promises as fs } from 'fs';
import path from 'path';
import { errorMessage } from '../../lib/util';
import { ITranscoder, TranscodeError } from '../interfaces/artifact.interface';

const STDERR_TAIL_BYTES = 2000;

/**
 * H.264 main profile + AAC in an MP4 with the moov atom up front, capped at
 * 4 Mbit/s so players can start before the whole file arrives.
 */
export function getFfmpegArgs(inputPath: string, outputPath: string): string[] {
  return [
    '-y',
    '-hide_banner',
    '-loglevel',
    'error',
    '-i',
    inputPath,
    '-c:v',
    'libx264',
    '-preset',
    'ultrafast',
    '-pix_fmt',
    'yuv420p',
    '-profile:v',
    'main',
    '-level:v',
    '4.0',
    '-b:v',
    '4000k',
    '-maxrate',
    '4000k',
    '-bufsize',
    '8000k',
    '-c:a',
    'aac',
    '-b:a',
    '128k',
    '-movflags',
    '+faststart',
    outputPath,
  ];
}

@Injectable()
export class FfmpegTranscoder implements ITranscoder {
  private readonly logger = new Logger(FfmpegTranscoder.name);
  private readonly ffmpegPath: string;

  constructor(private readonly configService: ConfigService) {
    this.ffmpegPath = this.configService.get<string>('FFMPEG_PATH') || 'ffmpeg';
  }

  async normalize(inputPath: string): Promise<string> {
    const tempPath = path.join(
      path.dirname(inputPath),
      `processed_${path.basename(inputPath)}`,
    );

    this.logger.log(`Transcoding ${inputPath}`);
    const startTime = Date.now();

    try {
      await this.run(getFfmpegArgs(inputPath, tempPath));
      await fs.rename(tempPath, inputPath);
    } catch (error) {
      await fs.rm(tempPath, { force: true });
      throw error instanceof TranscodeError
        ? error
        : new TranscodeError(`Transcoding failed: ${errorMessage(error)}`, {
            cause: error,
          });
    }

    this.logger.log(
      `Transcoded ${path.basename(inputPath)} in ${Date.now() - startTime}ms`,
    );
    return inputPath;
  }

  private run(args: string[]): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      const ffmpeg = spawn(this.ffmpegPath, args, {
        stdio: ['ignore', 'ignore', 'pipe'],
      });

      let stderr = '';
      ffmpeg.stderr.on('data', (chunk: Buffer) => {
        stderr = (stderr + chunk.toString()).slice(-STDERR_TAIL_BYTES);
      });

      ffmpeg.once('error', (error) => {
        reject(
          new TranscodeError(
            `Could not start ${this.ffmpegPath}: ${error.message}`,
            { cause: error },
          ),
        );
      });

      ffmpeg.once('close', (code, signal) => {
        if (code === 0) {
          resolve();
          return;
        }
        reject(
          new TranscodeError(
            `ffmpeg exited with ${signal ?? `code ${code}`}: ${stderr.trim()}`,
          ),
        );
      });
    });
  }
}
