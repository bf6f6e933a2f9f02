export interface Snapshot<T> {
  readonly value: T;
  readonly refreshedAt: Date;
}

export interface SnapshotRefresherOptions<T> {
  refresh: () => Promise<T>;
  intervalMs: number;
  onError: (err: unknown) => void;
}

/**
 * Periodically replaces a single snapshot. Only the refresher writes it, and
 * it is swapped as one frozen object, so readers see either the previous or
 * the next snapshot. A failed refresh keeps the previous one.
 */
export class SnapshotRefresher<T> {
  private snapshot: Snapshot<T> | undefined;
  private timer: NodeJS.Timeout | undefined;
  private inFlight: Promise<void> | undefined;

  constructor(private readonly options: SnapshotRefresherOptions<T>) {}

  current(): Snapshot<T> | undefined {
    return this.snapshot;
  }

  get running(): boolean {
    return this.timer !== undefined;
  }

  async start(): Promise<void> {
    if (this.timer) {
      return;
    }
    this.timer = setInterval(() => {
      void this.refreshNow();
    }, this.options.intervalMs);
    this.timer.unref();
    await this.refreshNow();
  }

  stop(): void {
    clearInterval(this.timer);
    this.timer = undefined;
  }

  /** Runs a refresh, or joins the one already running. */
  refreshNow(): Promise<void> {
    if (!this.inFlight) {
      this.inFlight = this.run().finally(() => {
        this.inFlight = undefined;
      });
    }
    return this.inFlight;
  }

  private async run(): Promise<void> {
    try {
      const value = await this.options.refresh();
      this.snapshot = Object.freeze({ value, refreshedAt: new Date() });
    } catch (err) {
      this.options.onError(err);
    }
  }
}
