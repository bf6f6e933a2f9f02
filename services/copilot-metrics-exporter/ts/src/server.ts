import Fastify from 'fastify';
import type { Registry } from 'prom-client';
import { toErrorResponse, type Logger } from '@copilot-exporter/shared';

import type { MetricsCollector } from './collector/collector';
import { renderExposition } from './collector/exposition';

export const METRICS_PATH = '/metrics';

export interface ServerOptions {
  collector: MetricsCollector;
  logger: Logger;
  /** Registries rendered after the collector's metrics on every scrape. */
  registries?: readonly Registry[];
}

export function landingPage(metricsPath: string): string {
  return `<html>
<head><title>GitHub Copilot Metrics Exporter</title></head>
<body>
<h1>GitHub Copilot Metrics Exporter</h1>
<p><a href="${metricsPath}">Metrics</a></p>
</body>
</html>`;
}

export function buildServer(options: ServerOptions) {
  const app = Fastify({ logger: options.logger });
  const registries = options.registries ?? [];

  app.setErrorHandler((error, request, reply) => {
    request.log.error({ err: error }, 'request failed');
    return reply.code(500).send(toErrorResponse(error));
  });

  app.get('/', async (_request, reply) => {
    return reply.type('text/html').send(landingPage(METRICS_PATH));
  });

  app.get('/health', async (_request, reply) => {
    return reply.type('text/plain').send('OK');
  });

  app.get(METRICS_PATH, async (request, reply) => {
    const observations = await options.collector.collect();
    const exposition = await renderExposition(options.collector.describe(), observations, registries);
    if (exposition.collapsed > 0) {
      request.log.debug({ collapsed: exposition.collapsed }, 'samples with repeated labels were collapsed');
    }
    return reply.type(exposition.contentType).send(exposition.body);
  });

  return app;
}
