import { config as loadEnv } from 'dotenv';

import { ExporterError } from '../errors';

loadEnv();

export type CollectionMode = 'live' | 'cached';
export type MetricsProfile = 'full' | 'minimal';

export interface ServiceConfig {
  name: string;
  host: string;
  port: number;
  logLevel: string;
}

export interface GitHubConfig {
  token: string;
  organization: string;
  team: string;
  enterprise: string;
  apiUrl: string;
  timeoutMs: number;
}

export interface CollectionConfig {
  mode: CollectionMode;
  profile: MetricsProfile;
  refreshIntervalMs: number;
}

export interface ExporterConfig {
  service: ServiceConfig;
  github: GitHubConfig;
  collection: CollectionConfig;
}

const HOUR_MS = 60 * 60 * 1000;

export const DEFAULT_PORT = 8082;
export const DEFAULT_API_URL = 'https://api.github.com';
export const DEFAULT_TIMEOUT_MS = 10_000;

export function loadConfig(env: NodeJS.ProcessEnv = process.env): ExporterConfig {
  const token = getEnv(env, 'GITHUB_TOKEN', '').trim();
  if (!token) {
    throw new ExporterError('CONFIG', 'GITHUB_TOKEN environment variable is required');
  }

  const organization = getEnv(env, 'GITHUB_ORG', '').trim();
  const team = getEnv(env, 'GITHUB_TEAM', '').trim();
  const enterprise = getEnv(env, 'GITHUB_ENTERPRISE', '').trim();
  if (!organization && !enterprise) {
    throw new ExporterError('CONFIG', 'Either GITHUB_ORG or GITHUB_ENTERPRISE environment variable is required');
  }

  const mode = getEnv(env, 'COLLECTION_MODE', 'live').toLowerCase();
  if (mode !== 'live' && mode !== 'cached') {
    throw new ExporterError('CONFIG', `Unsupported collection mode: ${mode}`);
  }

  const profile = getEnv(env, 'METRICS_PROFILE', 'full').toLowerCase();
  if (profile !== 'full' && profile !== 'minimal') {
    throw new ExporterError('CONFIG', `Unsupported metrics profile: ${profile}`);
  }

  const rawPort = getEnv(env, 'PORT', '').trim();
  const port = rawPort === '' ? DEFAULT_PORT : Number(rawPort);
  if (!Number.isInteger(port) || port < 0 || port > 65535) {
    throw new ExporterError('CONFIG', `Invalid PORT: ${rawPort}`);
  }

  return {
    service: {
      name: getEnv(env, 'SERVICE_NAME', 'copilot-metrics-exporter'),
      host: getEnv(env, 'SERVICE_HOST', '0.0.0.0'),
      port,
      logLevel: getEnv(env, 'LOG_LEVEL', 'info'),
    },
    github: {
      token,
      organization,
      team,
      enterprise,
      apiUrl: getEnv(env, 'GITHUB_API_URL', DEFAULT_API_URL).replace(/\/+$/, ''),
      timeoutMs: readDuration(env, 'GITHUB_API_TIMEOUT', DEFAULT_TIMEOUT_MS),
    },
    collection: {
      mode,
      profile,
      refreshIntervalMs: readDuration(env, 'REFRESH_INTERVAL', HOUR_MS),
    },
  };
}

/**
 * Label value identifying the scraped account: the enterprise when one is
 * configured, otherwise the organization.
 */
export function orgLabel(github: Pick<GitHubConfig, 'organization' | 'enterprise'>): string {
  return github.enterprise !== '' ? github.enterprise : github.organization;
}

function getEnv(env: NodeJS.ProcessEnv, key: string, fallback: string): string {
  return env[key] ?? fallback;
}

/**
 * Parses `250ms`, `30s`, `15m` or `1h`; a bare number is seconds. Returns
 * undefined for anything else.
 */
export function parseDurationMs(value: string): number | undefined {
  const match = /^(\d+)(ms|s|m|h)?$/.exec(value.trim());
  if (!match) {
    return undefined;
  }
  const [, amount, unit] = match;
  const quantity = Number(amount);
  switch (unit) {
    case 'ms':
      return quantity;
    case 's':
    case undefined:
      return quantity * 1000;
    case 'm':
      return quantity * 60 * 1000;
    case 'h':
      return quantity * HOUR_MS;
    default:
      return undefined;
  }
}

// Unset or blank takes the default; anything else must be a positive duration.
function readDuration(env: NodeJS.ProcessEnv, key: string, fallback: number): number {
  const raw = getEnv(env, key, '').trim();
  if (raw === '') {
    return fallback;
  }
  const duration = parseDurationMs(raw);
  if (duration === undefined || duration <= 0) {
    throw new ExporterError('CONFIG', `Invalid ${key}: ${raw}`);
  }
  return duration;
}
