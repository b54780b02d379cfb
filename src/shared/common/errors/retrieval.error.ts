import { HttpStatus } from '@nestjs/common';

export enum ErrorKind {
  InvalidInput = 'InvalidInput',
  UpstreamRejected = 'UpstreamRejected',
  RateLimited = 'RateLimited',
  UpstreamUnavailable = 'UpstreamUnavailable',
  TranscodeFailed = 'TranscodeFailed',
  Unexpected = 'Unexpected',
  Cancelled = 'Cancelled',
}

// 499 is the de-facto "client closed request" code; there is no HttpStatus member for it.
const CLIENT_CLOSED_REQUEST = 499;

export const ERROR_KIND_STATUS: Record<ErrorKind, number> = {
  [ErrorKind.InvalidInput]: HttpStatus.BAD_REQUEST,
  [ErrorKind.UpstreamRejected]: HttpStatus.NOT_FOUND,
  [ErrorKind.RateLimited]: HttpStatus.TOO_MANY_REQUESTS,
  [ErrorKind.UpstreamUnavailable]: HttpStatus.BAD_GATEWAY,
  [ErrorKind.TranscodeFailed]: HttpStatus.INTERNAL_SERVER_ERROR,
  [ErrorKind.Unexpected]: HttpStatus.INTERNAL_SERVER_ERROR,
  [ErrorKind.Cancelled]: CLIENT_CLOSED_REQUEST,
};

/**
 * The only error type that leaves the retrieval core. Collaborator failures are
 * wrapped into one of these before they reach a controller.
 */
export class RetrievalError extends Error {
  constructor(
    readonly kind: ErrorKind,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'RetrievalError';
  }

  get statusCode(): number {
    return ERROR_KIND_STATUS[this.kind];
  }
}
