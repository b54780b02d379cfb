import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { ArtifactsModule } from '../artifacts/artifacts.module';
import { ProxyModule } from '../proxy/proxy.module';
import { POST_FETCHER } from './interfaces/post-fetcher.interface';
import { InstagramFetchProvider } from './providers/instagram-fetch.provider';
import { RetrievalOrchestratorService } from './services/retrieval-orchestrator.service';

@Module({
  imports: [ConfigModule, ProxyModule, ArtifactsModule],
  providers: [
    {
      provide: POST_FETCHER,
      useClass: InstagramFetchProvider,
    },
    RetrievalOrchestratorService,
  ],
  exports: [RetrievalOrchestratorService],
})
export class RetrievalModule {}
