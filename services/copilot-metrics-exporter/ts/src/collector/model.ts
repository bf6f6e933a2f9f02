/**
 * Shape of the `GET .../copilot/metrics` response after decoding.
 *
 * Field names follow the upstream JSON. Optional upstream values are
 * normalized by the decoder: absent counters are `0`, absent dimensions are
 * `''`, absent lists are `[]` and absent feature sections are empty sections.
 */

export const USAGE_COUNTERS = [
  'suggestions',
  'acceptances',
  'linesSuggested',
  'linesAccepted',
  'activeUsers',
  'chatAcceptances',
  'chatTurns',
  'activeChatUsers',
] as const;

export type UsageCounter = (typeof USAGE_COUNTERS)[number];

export type BreakdownDimension = 'language' | 'editor' | 'model';

export interface BreakdownCounters {
  suggestions_count: number;
  acceptances_count: number;
  lines_suggested: number;
  lines_accepted: number;
  active_users: number;
  chat_acceptances: number;
  chat_turns: number;
  active_chat_users: number;
}

export interface BreakdownEntry extends BreakdownCounters {
  language: string;
  editor: string;
  model: string;
}

export interface UsageTotals {
  total_suggestions_count: number;
  total_acceptances_count: number;
  total_lines_suggested: number;
  total_lines_accepted: number;
  total_active_users: number;
  total_chat_acceptances: number;
  total_chat_turns: number;
  total_active_chat_users: number;
}

export interface IdeCodeCompletions {
  total_engaged_users: number;
  languages: BreakdownEntry[];
  editors: BreakdownEntry[];
  models: BreakdownEntry[];
}

export interface IdeChat {
  total_engaged_users: number;
  editors: BreakdownEntry[];
  models: BreakdownEntry[];
}

export interface DotcomChat {
  total_engaged_users: number;
  models: BreakdownEntry[];
}

export interface RepositoryEntry {
  name: string;
  total_engaged_users: number;
  models: BreakdownEntry[];
}

export interface DotcomPullRequests {
  total_engaged_users: number;
  repositories: RepositoryEntry[];
  models: BreakdownEntry[];
}

export interface UsageRecord extends UsageTotals {
  day: string;
  breakdown: BreakdownEntry[];
  copilot_ide_code_completions: IdeCodeCompletions;
  copilot_ide_chat: IdeChat;
  copilot_dotcom_chat: DotcomChat;
  copilot_dotcom_pull_requests: DotcomPullRequests;
}

/** Upstream field backing each top-level total. */
export const TOTAL_FIELDS: Readonly<Record<UsageCounter, keyof UsageTotals>> = {
  suggestions: 'total_suggestions_count',
  acceptances: 'total_acceptances_count',
  linesSuggested: 'total_lines_suggested',
  linesAccepted: 'total_lines_accepted',
  activeUsers: 'total_active_users',
  chatAcceptances: 'total_chat_acceptances',
  chatTurns: 'total_chat_turns',
  activeChatUsers: 'total_active_chat_users',
};

/** Upstream field backing each breakdown counter. */
export const BREAKDOWN_FIELDS: Readonly<Record<UsageCounter, keyof BreakdownCounters>> = {
  suggestions: 'suggestions_count',
  acceptances: 'acceptances_count',
  linesSuggested: 'lines_suggested',
  linesAccepted: 'lines_accepted',
  activeUsers: 'active_users',
  chatAcceptances: 'chat_acceptances',
  chatTurns: 'chat_turns',
  activeChatUsers: 'active_chat_users',
};
