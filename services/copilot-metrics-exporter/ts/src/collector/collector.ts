import {
  incrementFetchFailure,
  toExporterError,
  type CollectionMode,
  type ErrorCode,
  type FetchFailureReason,
  type Logger,
} from '@copilot-exporter/shared';

import type { DescriptorRegistry, MetricDescriptor } from './descriptors';
import { exportRecords, type Observation } from './exporter';
import type { UsageSource } from './fetcher';
import { SnapshotRefresher, type Snapshot } from './snapshot';

/** Two-phase pull contract consumed by the metrics endpoint. */
export interface MetricsCollector {
  describe(): readonly MetricDescriptor[];
  collect(): Promise<readonly Observation[]>;
}

export interface CollectorOptions {
  registry: DescriptorRegistry;
  source: UsageSource;
  /** Value of the `org` label on every observation. */
  org: string;
  logger: Logger;
  mode?: CollectionMode;
  refreshIntervalMs?: number;
}

const FAILURE_REASONS: Record<ErrorCode, FetchFailureReason> = {
  CONFIG: 'internal',
  INTERNAL: 'internal',
  TRANSPORT: 'transport',
  UPSTREAM_STATUS: 'upstream_status',
  DECODE: 'decode',
};

const DEFAULT_REFRESH_INTERVAL_MS = 60 * 60 * 1000;

export class CopilotCollector implements MetricsCollector {
  readonly mode: CollectionMode;
  private readonly registry: DescriptorRegistry;
  private readonly source: UsageSource;
  private readonly org: string;
  private readonly logger: Logger;
  private readonly refresher: SnapshotRefresher<readonly Observation[]> | undefined;

  constructor(options: CollectorOptions) {
    this.registry = options.registry;
    this.source = options.source;
    this.org = options.org;
    this.logger = options.logger;
    this.mode = options.mode ?? 'live';

    if (this.mode === 'cached') {
      this.refresher = new SnapshotRefresher({
        refresh: () => this.fetchAndExport(),
        intervalMs: options.refreshIntervalMs ?? DEFAULT_REFRESH_INTERVAL_MS,
        onError: (err) => this.reportFailure(err),
      });
    }
  }

  describe(): readonly MetricDescriptor[] {
    return this.registry.list();
  }

  /**
   * Live mode fetches and exports on every call. Cached mode only reads the
   * current snapshot. A failed fetch yields no observations at all.
   */
  async collect(): Promise<readonly Observation[]> {
    if (this.refresher) {
      return this.refresher.current()?.value ?? [];
    }
    try {
      return await this.fetchAndExport();
    } catch (err) {
      this.reportFailure(err);
      return [];
    }
  }

  /** Starts background refreshing in cached mode; a no-op in live mode. */
  async start(): Promise<void> {
    await this.refresher?.start();
  }

  stop(): void {
    this.refresher?.stop();
  }

  refresh(): Promise<void> {
    return this.refresher?.refreshNow() ?? Promise.resolve();
  }

  snapshot(): Snapshot<readonly Observation[]> | undefined {
    return this.refresher?.current();
  }

  private async fetchAndExport(): Promise<readonly Observation[]> {
    const records = await this.source.fetchUsage();
    return Object.freeze(exportRecords(records, this.registry, this.org));
  }

  private reportFailure(err: unknown): void {
    const error = toExporterError(err);
    incrementFetchFailure(FAILURE_REASONS[error.code]);
    this.logger.error({ err: error, code: error.code, status: error.status }, 'Error fetching metrics');
  }
}
