import type { Logger } from '@copilot-exporter/shared';

export interface ShutdownOptions {
  close: () => Promise<void>;
  logger: Logger;
  exit?: (code: number) => void;
}

/**
 * Builds the signal handler: closes the exporter, then exits 0, or logs the
 * failure and exits 1. The returned promise settles once exit was requested.
 */
export function createShutdownHandler(options: ShutdownOptions) {
  const exit = options.exit ?? ((code: number) => process.exit(code));
  return async (signal: NodeJS.Signals): Promise<void> => {
    options.logger.info({ signal }, 'shutting down exporter');
    try {
      await options.close();
    } catch (err) {
      options.logger.error({ err }, 'failed to shut down exporter');
      exit(1);
      return;
    }
    exit(0);
  };
}
