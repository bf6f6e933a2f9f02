import pino, { type Logger } from 'pino';
import { collectDefaultMetrics } from 'prom-client';

import type { ServiceConfig } from '../config';
import { exporterRegistry } from './metrics';

export type { Logger } from 'pino';

export interface LoggerOptions {
  name: string;
  level: string;
  /** Alternate sink, used to capture log lines. Defaults to stdout. */
  destination?: { write(line: string): void };
}

export function createLogger(options: LoggerOptions): Logger {
  const settings = { name: options.name, level: options.level };
  return options.destination ? pino(settings, options.destination) : pino(settings);
}

export function loggerFromConfig(config: Pick<ServiceConfig, 'name' | 'logLevel'>): Logger {
  return createLogger({ name: config.name, level: config.logLevel });
}

let defaultMetricsStarted = false;

/** Registers Node process metrics on the exporter registry once per process. */
export function startProcessMetrics(prefix = ''): void {
  if (defaultMetricsStarted) {
    return;
  }
  collectDefaultMetrics({ register: exporterRegistry, prefix });
  defaultMetricsStarted = true;
}

export {
  exporterRegistry,
  fetchFailures,
  incrementFetchFailure,
  resetExporterMetrics,
  fetchFailureCount,
  type FetchFailureReason,
} from './metrics';
