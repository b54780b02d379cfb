import {
  ArgumentsHost,
  Catch,
  ExceptionFilter,
  Logger,
} from '@nestjs/common';
import type { FastifyReply, FastifyRequest } from 'fastify';
import {
  ErrorKind,
  RetrievalError,
} from '../errors/retrieval.error';

@Catch(RetrievalError)
export class RetrievalExceptionFilter implements ExceptionFilter {
  private readonly logger = new Logger(RetrievalExceptionFilter.name);

  catch(exception: RetrievalError, host: ArgumentsHost) {
    const ctx = host.switchToHttp();
    const reply = ctx.getResponse<FastifyReply>();
    const request = ctx.getRequest<FastifyRequest>();
    const status = exception.statusCode;

    if (exception.kind === ErrorKind.Cancelled) {
      this.logger.debug(`Request to ${request.url} cancelled by client`);
    } else if (status >= 500) {
      this.logger.error(`${exception.kind}: ${exception.message}`);
    } else {
      this.logger.warn(`${exception.kind}: ${exception.message}`);
    }

    if (reply.sent) {
      return;
    }

    void reply.status(status).send({
      statusCode: status,
      error: exception.kind,
      message: exception.message,
      path: request.url,
      timestamp: new Date().toISOString(),
    });
  }
}
