import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { TRANSCODER } from './interfaces/artifact.interface';
import { ArtifactLockService } from './services/artifact-lock.service';
import { ArtifactStoreService } from './services/artifact-store.service';
import { ReclaimerService } from './services/reclaimer.service';
import { FfmpegTranscoder } from './transcoder/ffmpeg.transcoder';

@Module({
  imports: [ConfigModule],
  providers: [
    {
      provide: TRANSCODER,
      useClass: FfmpegTranscoder,
    },
    ArtifactLockService,
    ArtifactStoreService,
    ReclaimerService,
  ],
  exports: [ArtifactStoreService, ReclaimerService],
})
export class ArtifactsModule {}
