import 'reflect-metadata';
import { Logger, ValidationPipe } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { NestFactory } from '@nestjs/core';
import {
  FastifyAdapter,
  NestFastifyApplication,
} from '@nestjs/platform-fastify';
import { ARTIFACT_URL_PREFIX } from '../../shared/artifacts/interfaces/artifact.interface';
import { ArtifactStoreService } from '../../shared/artifacts/services/artifact-store.service';
import { RetrievalExceptionFilter } from '../../shared/common/filters/retrieval-exception.filter';
import { setupGracefulShutdown } from '../../shared/utils/graceful-shutdown';
import { ApiAppModule } from './app.module';

async function bootstrap() {
  const logger = new Logger('Api');
  const app = await NestFactory.create<NestFastifyApplication>(
    ApiAppModule,
    new FastifyAdapter({ trustProxy: true }),
  );

  app.useGlobalFilters(new RetrievalExceptionFilter());
  app.useGlobalPipes(new ValidationPipe({ transform: true, whitelist: true }));
  app.enableCors({
    origin: true,
    methods: ['GET', 'POST', 'OPTIONS'],
  });

  // artifacts are served read-only, 1:1 with the artifact root
  const artifactRoot = await app.get(ArtifactStoreService).ensureRoot();
  app.useStaticAssets({
    root: artifactRoot,
    prefix: `${ARTIFACT_URL_PREFIX}/`,
  });

  setupGracefulShutdown(app);

  const port = app.get(ConfigService).get<number>('PORT') || 8000;
  await app.listen(port, '0.0.0.0');
  logger.log(`Post video relay listening on http://localhost:${port}`);
}

void bootstrap();
