import {
  Body,
  Controller,
  HttpCode,
  HttpStatus,
  Logger,
  Post,
  Req,
  Res,
} from '@nestjs/common';
import type { FastifyReply, FastifyRequest } from 'fastify';
import type { PlaybackDescriptor } from '../../../shared/retrieval/interfaces/post-fetcher.interface';
import { RetrievalOrchestratorService } from '../../../shared/retrieval/services/retrieval-orchestrator.service';
import { DownloadPostDto } from '../dto/download-post.dto';

/** Honors X-Forwarded-Proto/-Host when the adapter trusts the proxy. */
export function requestBaseUrl(request: FastifyRequest): string {
  return `${request.protocol}://${request.hostname}`;
}

@Controller('insta')
export class InstaController {
  private readonly logger = new Logger(InstaController.name);

  constructor(private readonly orchestrator: RetrievalOrchestratorService) {}

  @Post()
  @HttpCode(HttpStatus.OK)
  async download(
    @Body() body: DownloadPostDto,
    @Req() request: FastifyRequest,
    @Res({ passthrough: true }) reply: FastifyReply,
  ): Promise<{ data: PlaybackDescriptor }> {
    this.logger.log(`Received download request for URL: ${body.url}`);

    // stop rotating proxies for a client that already hung up
    const abort = new AbortController();
    const onClose = () => {
      if (!reply.raw.writableFinished) abort.abort();
    };
    reply.raw.once('close', onClose);

    try {
      const data = await this.orchestrator.download(
        body.url,
        requestBaseUrl(request),
        abort.signal,
      );
      return { data };
    } finally {
      reply.raw.off('close', onClose);
    }
  }
}
