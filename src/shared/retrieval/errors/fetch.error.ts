export enum FetchErrorKind {
  Connection = 'connection',
  NotFound = 'not_found',
  Forbidden = 'forbidden',
  Other = 'other',
}

export class FetchError extends Error {
  constructor(
    readonly kind: FetchErrorKind,
    message: string,
    readonly statusCode?: number,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'FetchError';
  }
}
