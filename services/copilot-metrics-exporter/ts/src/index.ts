import {
  createLogger,
  exporterRegistry,
  loadConfig,
  loggerFromConfig,
  orgLabel,
  startProcessMetrics,
  type ExporterConfig,
} from '@copilot-exporter/shared';

import { CopilotCollector } from './collector/collector';
import { createDescriptorRegistry } from './collector/descriptors';
import { GitHubMetricsClient } from './collector/fetcher';
import { createShutdownHandler } from './lifecycle';
import { buildServer, METRICS_PATH } from './server';

const bootstrapLogger = () => createLogger({ name: 'copilot-metrics-exporter', level: 'info' });

async function start() {
  let config: ExporterConfig;
  try {
    config = loadConfig();
  } catch (err) {
    bootstrapLogger().fatal({ err }, 'invalid configuration');
    process.exit(1);
  }

  const logger = loggerFromConfig(config.service);
  startProcessMetrics();

  const collector = new CopilotCollector({
    registry: createDescriptorRegistry(config.collection.profile),
    source: new GitHubMetricsClient({
      token: config.github.token,
      target: {
        enterprise: config.github.enterprise,
        organization: config.github.organization,
        team: config.github.team,
      },
      apiUrl: config.github.apiUrl,
      timeoutMs: config.github.timeoutMs,
    }),
    org: orgLabel(config.github),
    logger,
    mode: config.collection.mode,
    refreshIntervalMs: config.collection.refreshIntervalMs,
  });

  const app = buildServer({ collector, logger, registries: [exporterRegistry] });

  const close = async () => {
    collector.stop();
    await app.close();
  };

  const shutdown = createShutdownHandler({ close, logger });
  const onSignal = (signal: NodeJS.Signals) => {
    shutdown(signal).catch((err: unknown) => {
      logger.fatal({ err }, 'shutdown handler failed');
      process.exit(1);
    });
  };

  process.on('SIGINT', onSignal);
  process.on('SIGTERM', onSignal);

  const address = { port: config.service.port, host: config.service.host };
  try {
    await app.listen(address);
  } catch (err) {
    logger.error({ err }, 'failed to start exporter');
    await close();
    process.exit(1);
  }

  logger.info(`Starting GitHub Copilot Metrics Exporter on ${address.host}:${address.port}`);
  if (collector.mode === 'cached') {
    logger.info(`Metrics are refreshed from the GitHub API every ${config.collection.refreshIntervalMs}ms`);
  } else {
    logger.info('Metrics will be fetched fresh from GitHub API on each scrape');
  }
  logger.info(`Metrics available at http://localhost:${address.port}${METRICS_PATH}`);

  await collector.start();
}

start().catch((err: unknown) => {
  bootstrapLogger().fatal({ err }, 'exporter stopped unexpectedly');
  process.exit(1);
});
