export type ErrorCode = 'CONFIG' | 'TRANSPORT' | 'UPSTREAM_STATUS' | 'DECODE' | 'INTERNAL';

export interface ErrorResponse {
  error: string;
  code: ErrorCode;
  detail?: string;
  timestamp: string;
}

export interface ExporterErrorOptions {
  detail?: string;
  /** HTTP status returned by the upstream API, when there was one. */
  status?: number;
  cause?: unknown;
  timestamp?: Date;
}

export class ExporterError extends Error {
  constructor(
    public readonly code: ErrorCode,
    message: string,
    public readonly options: ExporterErrorOptions = {},
  ) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'ExporterError';
  }

  get status(): number | undefined {
    return this.options.status;
  }

  toResponse(): ErrorResponse {
    return {
      error: this.message,
      code: this.code,
      detail: this.options.detail,
      timestamp: (this.options.timestamp ?? new Date()).toISOString(),
    };
  }
}

export function isExporterError(err: unknown): err is ExporterError {
  return err instanceof ExporterError;
}

export function toExporterError(err: unknown): ExporterError {
  if (err instanceof ExporterError) {
    return err;
  }
  const message = err instanceof Error ? err.message : String(err);
  return new ExporterError('INTERNAL', 'unexpected error occurred', { detail: message, cause: err });
}

export function toErrorResponse(err: unknown): ErrorResponse {
  return toExporterError(err).toResponse();
}
