import type { MetricsProfile } from '@copilot-exporter/shared';

import { USAGE_COUNTERS, type UsageCounter } from './model';

export interface MetricDescriptor<L extends string = string> {
  readonly name: string;
  readonly help: string;
  readonly labelNames: readonly L[];
}

export type DayOrgLabel = 'day' | 'org';
export type BreakdownLabel = DayOrgLabel | 'language' | 'editor' | 'model';
export type RepositoryLabel = DayOrgLabel | 'repository';

export type FeatureMetric = 'ideCodeCompletions' | 'ideChat' | 'dotcomChat' | 'dotcomPullRequests';

export interface DetailDescriptors {
  readonly breakdown: Readonly<Record<UsageCounter, MetricDescriptor<BreakdownLabel>>>;
  readonly engagedUsers: Readonly<Record<FeatureMetric, MetricDescriptor<DayOrgLabel>>>;
  readonly repositoryEngagedUsers: MetricDescriptor<RepositoryLabel>;
}

/**
 * Immutable metric catalogue. `detail` is only present for the full profile;
 * the exporter walks breakdowns and feature sections only when it is.
 */
export interface DescriptorRegistry {
  readonly profile: MetricsProfile;
  readonly totals: Readonly<Record<UsageCounter, MetricDescriptor<DayOrgLabel>>>;
  readonly acceptanceRate: MetricDescriptor<DayOrgLabel>;
  readonly detail?: DetailDescriptors;
  list(): readonly MetricDescriptor[];
}

const DAY_ORG = ['day', 'org'] as const;
const BREAKDOWN_LABELS = ['day', 'org', 'language', 'editor', 'model'] as const;
const REPOSITORY_LABELS = ['day', 'org', 'repository'] as const;

const TOTALS: Record<UsageCounter, { name: string; help: string }> = {
  suggestions: {
    name: 'github_copilot_suggestions_total',
    help: 'Total number of Copilot suggestions',
  },
  acceptances: {
    name: 'github_copilot_acceptances_total',
    help: 'Total number of Copilot acceptances',
  },
  linesSuggested: {
    name: 'github_copilot_lines_suggested_total',
    help: 'Total number of lines suggested by Copilot',
  },
  linesAccepted: {
    name: 'github_copilot_lines_accepted_total',
    help: 'Total number of lines accepted from Copilot',
  },
  activeUsers: {
    name: 'github_copilot_active_users_total',
    help: 'Total number of active Copilot users',
  },
  chatAcceptances: {
    name: 'github_copilot_chat_acceptances_total',
    help: 'Total number of Copilot chat acceptances',
  },
  chatTurns: {
    name: 'github_copilot_chat_turns_total',
    help: 'Total number of Copilot chat turns',
  },
  activeChatUsers: {
    name: 'github_copilot_active_chat_users_total',
    help: 'Total number of active Copilot chat users',
  },
};

const BREAKDOWNS: Record<UsageCounter, { name: string; help: string }> = {
  suggestions: {
    name: 'github_copilot_breakdown_suggestions_total',
    help: 'Copilot suggestions by language, editor, or model',
  },
  acceptances: {
    name: 'github_copilot_breakdown_acceptances_total',
    help: 'Copilot acceptances by language, editor, or model',
  },
  linesSuggested: {
    name: 'github_copilot_breakdown_lines_suggested_total',
    help: 'Lines suggested by language, editor, or model',
  },
  linesAccepted: {
    name: 'github_copilot_breakdown_lines_accepted_total',
    help: 'Lines accepted by language, editor, or model',
  },
  activeUsers: {
    name: 'github_copilot_breakdown_active_users',
    help: 'Active users by language, editor, or model',
  },
  chatAcceptances: {
    name: 'github_copilot_breakdown_chat_acceptances_total',
    help: 'Chat acceptances by language, editor, or model',
  },
  chatTurns: {
    name: 'github_copilot_breakdown_chat_turns_total',
    help: 'Chat turns by language, editor, or model',
  },
  activeChatUsers: {
    name: 'github_copilot_breakdown_active_chat_users',
    help: 'Active chat users by language, editor, or model',
  },
};

const FEATURES: Record<FeatureMetric, { name: string; help: string }> = {
  ideCodeCompletions: {
    name: 'github_copilot_ide_code_completions_engaged_users',
    help: 'Total engaged users for IDE code completions',
  },
  ideChat: {
    name: 'github_copilot_ide_chat_engaged_users',
    help: 'Total engaged users for IDE chat',
  },
  dotcomChat: {
    name: 'github_copilot_dotcom_chat_engaged_users',
    help: 'Total engaged users for Dotcom chat',
  },
  dotcomPullRequests: {
    name: 'github_copilot_dotcom_pr_engaged_users',
    help: 'Total engaged users for Dotcom pull requests',
  },
};

const FEATURE_ORDER: readonly FeatureMetric[] = ['ideCodeCompletions', 'ideChat', 'dotcomChat', 'dotcomPullRequests'];

function descriptor<L extends string>(
  definition: { name: string; help: string },
  labelNames: readonly L[],
): MetricDescriptor<L> {
  return Object.freeze({ name: definition.name, help: definition.help, labelNames: Object.freeze([...labelNames]) });
}

function mapCounters<L extends string>(
  definitions: Record<UsageCounter, { name: string; help: string }>,
  labelNames: readonly L[],
): Readonly<Record<UsageCounter, MetricDescriptor<L>>> {
  return Object.freeze({
    suggestions: descriptor(definitions.suggestions, labelNames),
    acceptances: descriptor(definitions.acceptances, labelNames),
    linesSuggested: descriptor(definitions.linesSuggested, labelNames),
    linesAccepted: descriptor(definitions.linesAccepted, labelNames),
    activeUsers: descriptor(definitions.activeUsers, labelNames),
    chatAcceptances: descriptor(definitions.chatAcceptances, labelNames),
    chatTurns: descriptor(definitions.chatTurns, labelNames),
    activeChatUsers: descriptor(definitions.activeChatUsers, labelNames),
  });
}

export function createDescriptorRegistry(profile: MetricsProfile = 'full'): DescriptorRegistry {
  const totals = mapCounters(TOTALS, DAY_ORG);
  const acceptanceRate = descriptor(
    { name: 'github_copilot_acceptance_rate', help: 'Copilot acceptance rate (acceptances/suggestions)' },
    DAY_ORG,
  );

  const catalogue: MetricDescriptor[] = [...USAGE_COUNTERS.map((counter) => totals[counter]), acceptanceRate];

  let detail: DetailDescriptors | undefined;
  if (profile === 'full') {
    const breakdown = mapCounters(BREAKDOWNS, BREAKDOWN_LABELS);
    const engagedUsers = Object.freeze({
      ideCodeCompletions: descriptor(FEATURES.ideCodeCompletions, DAY_ORG),
      ideChat: descriptor(FEATURES.ideChat, DAY_ORG),
      dotcomChat: descriptor(FEATURES.dotcomChat, DAY_ORG),
      dotcomPullRequests: descriptor(FEATURES.dotcomPullRequests, DAY_ORG),
    });
    const repositoryEngagedUsers = descriptor(
      {
        name: 'github_copilot_dotcom_pr_repo_engaged_users',
        help: 'Engaged users for Dotcom pull requests by repository',
      },
      REPOSITORY_LABELS,
    );
    detail = Object.freeze({ breakdown, engagedUsers, repositoryEngagedUsers });
    catalogue.push(
      ...USAGE_COUNTERS.map((counter) => breakdown[counter]),
      ...FEATURE_ORDER.map((feature) => engagedUsers[feature]),
      repositoryEngagedUsers,
    );
  }

  const frozen: readonly MetricDescriptor[] = Object.freeze(catalogue);
  return Object.freeze({
    profile,
    totals,
    acceptanceRate,
    detail,
    list: () => frozen,
  });
}
