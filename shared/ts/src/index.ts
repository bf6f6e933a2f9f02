export * from './config';
export * from './observability';
export {
  ExporterError,
  isExporterError,
  toExporterError,
  toErrorResponse,
  type ErrorCode,
  type ErrorResponse,
  type ExporterErrorOptions,
} from './errors';
