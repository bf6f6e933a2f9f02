import axios, { type AxiosInstance, type AxiosResponse } from 'axios';
import { DEFAULT_API_URL, DEFAULT_TIMEOUT_MS, ExporterError } from '@copilot-exporter/shared';

import type { UsageRecord } from './model';
import { decodeUsageResponse } from './schema';

export const GITHUB_API_VERSION = '2022-11-28';
export const GITHUB_ACCEPT = 'application/vnd.github+json';

export interface MetricsTarget {
  enterprise?: string;
  organization?: string;
  team?: string;
}

/** Anything able to produce one usage document per call. */
export interface UsageSource {
  fetchUsage(): Promise<UsageRecord[]>;
}

export interface GitHubMetricsClientOptions {
  token: string;
  target: MetricsTarget;
  apiUrl?: string;
  timeoutMs?: number;
}

/**
 * Picks the metrics endpoint for a target. An enterprise wins over an
 * organization, and a team is only meaningful inside an organization.
 */
export function resolveMetricsPath(target: MetricsTarget): string {
  if (target.enterprise) {
    return `/enterprises/${encodeURIComponent(target.enterprise)}/copilot/metrics`;
  }
  if (!target.organization) {
    throw new ExporterError('CONFIG', 'an organization or enterprise is required to fetch Copilot metrics');
  }
  const org = encodeURIComponent(target.organization);
  if (target.team) {
    return `/orgs/${org}/team/${encodeURIComponent(target.team)}/copilot/metrics`;
  }
  return `/orgs/${org}/copilot/metrics`;
}

export class GitHubMetricsClient implements UsageSource {
  readonly path: string;
  private readonly http: AxiosInstance;
  private readonly timeoutMs: number;

  constructor(options: GitHubMetricsClientOptions) {
    this.path = resolveMetricsPath(options.target);
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.http = axios.create({
      baseURL: options.apiUrl ?? DEFAULT_API_URL,
      timeout: this.timeoutMs,
      responseType: 'text',
      // Non-2xx answers are inspected below instead of rejected by axios.
      validateStatus: () => true,
      headers: {
        Authorization: `Bearer ${options.token}`,
        Accept: GITHUB_ACCEPT,
        'X-GitHub-Api-Version': GITHUB_API_VERSION,
        'User-Agent': 'copilot-metrics-exporter',
      },
    });
  }

  async fetchUsage(): Promise<UsageRecord[]> {
    let response: AxiosResponse<string>;
    try {
      // `timeout` only bounds socket inactivity; the signal bounds the whole exchange.
      response = await this.http.get<string>(this.path, { signal: AbortSignal.timeout(this.timeoutMs) });
    } catch (err) {
      throw new ExporterError('TRANSPORT', `error making request: ${describeTransportError(err, this.timeoutMs)}`, {
        cause: err,
      });
    }

    const body = typeof response.data === 'string' ? response.data : '';
    if (response.status !== 200) {
      throw new ExporterError('UPSTREAM_STATUS', `API request failed with status ${response.status}: ${body}`, {
        status: response.status,
        detail: body,
      });
    }

    let payload: unknown;
    try {
      payload = JSON.parse(body);
    } catch (err) {
      throw new ExporterError('DECODE', 'error unmarshaling response: invalid JSON', {
        detail: err instanceof Error ? err.message : String(err),
        cause: err,
      });
    }

    const decoded = decodeUsageResponse(payload);
    if (!decoded.success) {
      throw new ExporterError('DECODE', 'error unmarshaling response: unexpected document shape', {
        detail: decoded.issues.join('; '),
      });
    }
    return decoded.records;
  }
}

function describeTransportError(err: unknown, timeoutMs: number): string {
  if (axios.isCancel(err) || (axios.isAxiosError(err) && err.code === 'ECONNABORTED')) {
    return `request timed out after ${timeoutMs}ms`;
  }
  return err instanceof Error ? err.message : String(err);
}
