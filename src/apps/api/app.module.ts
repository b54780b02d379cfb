import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { ScheduleModule } from '@nestjs/schedule';
import { ArtifactsModule } from '../../shared/artifacts/artifacts.module';
import { loadEnv } from '../../shared/config/load-env';
import { validationSchema } from '../../shared/config/env.validation';
import { ProxyModule } from '../../shared/proxy/proxy.module';
import { RetrievalModule } from '../../shared/retrieval/retrieval.module';
import { HealthController } from './controllers/health.controller';
import { InstaController } from './controllers/insta.controller';

loadEnv();

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      validationSchema,
      ignoreEnvFile: true,
    }),
    ScheduleModule.forRoot(),
    ProxyModule,
    ArtifactsModule,
    RetrievalModule,
  ],
  controllers: [InstaController, HealthController],
})
export class ApiAppModule {}
