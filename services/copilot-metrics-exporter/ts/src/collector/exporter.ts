import type { DescriptorRegistry, DetailDescriptors, FeatureMetric, MetricDescriptor } from './descriptors';
import {
  BREAKDOWN_FIELDS,
  TOTAL_FIELDS,
  USAGE_COUNTERS,
  type BreakdownDimension,
  type BreakdownEntry,
  type RepositoryEntry,
  type UsageRecord,
} from './model';

export interface Observation {
  readonly descriptor: MetricDescriptor;
  readonly labels: Readonly<Record<string, string>>;
  readonly value: number;
}

export const UNKNOWN_DIMENSION = 'unknown';

type Dimensions = Record<BreakdownDimension, string>;
type Emit = (observation: Observation) => void;

interface DayOrg {
  day: string;
  org: string;
}

interface TaggedList {
  entries: readonly BreakdownEntry[];
  dimension: BreakdownDimension;
}

interface FeatureWalk {
  metric: FeatureMetric;
  engagedUsers(record: UsageRecord): number;
  /** Walked after the engaged-user scalar and before the section's own lists. */
  repositories?(record: UsageRecord): readonly RepositoryEntry[];
  lists(record: UsageRecord): readonly TaggedList[];
}

const FEATURE_WALKS: readonly FeatureWalk[] = [
  {
    metric: 'ideCodeCompletions',
    engagedUsers: (record) => record.copilot_ide_code_completions.total_engaged_users,
    lists: ({ copilot_ide_code_completions: section }) => [
      { entries: section.languages, dimension: 'language' },
      { entries: section.editors, dimension: 'editor' },
      { entries: section.models, dimension: 'model' },
    ],
  },
  {
    metric: 'ideChat',
    engagedUsers: (record) => record.copilot_ide_chat.total_engaged_users,
    lists: ({ copilot_ide_chat: section }) => [
      { entries: section.editors, dimension: 'editor' },
      { entries: section.models, dimension: 'model' },
    ],
  },
  {
    metric: 'dotcomChat',
    engagedUsers: (record) => record.copilot_dotcom_chat.total_engaged_users,
    lists: ({ copilot_dotcom_chat: section }) => [{ entries: section.models, dimension: 'model' }],
  },
  {
    metric: 'dotcomPullRequests',
    engagedUsers: (record) => record.copilot_dotcom_pull_requests.total_engaged_users,
    repositories: (record) => record.copilot_dotcom_pull_requests.repositories,
    lists: ({ copilot_dotcom_pull_requests: section }) => [{ entries: section.models, dimension: 'model' }],
  },
];

export function observe<L extends string>(
  descriptor: MetricDescriptor<L>,
  labels: Record<L, string>,
  value: number,
): Observation {
  return { descriptor, labels, value };
}

export function acceptanceRate(record: Pick<UsageRecord, 'total_suggestions_count' | 'total_acceptances_count'>): number {
  if (record.total_suggestions_count <= 0) {
    return 0;
  }
  return record.total_acceptances_count / record.total_suggestions_count;
}

/**
 * Replaces the field named by `dimension` with {@link UNKNOWN_DIMENSION} when
 * it is empty. The other two fields are returned as they are.
 */
export function defaultDimension(
  entry: Pick<BreakdownEntry, BreakdownDimension>,
  dimension: BreakdownDimension,
): Dimensions {
  const dimensions: Dimensions = { language: entry.language, editor: entry.editor, model: entry.model };
  if (dimensions[dimension] === '') {
    dimensions[dimension] = UNKNOWN_DIMENSION;
  }
  return dimensions;
}

function exportCounters(
  entry: BreakdownEntry,
  dimensions: Dimensions,
  base: DayOrg,
  descriptors: DetailDescriptors['breakdown'],
  emit: Emit,
): void {
  for (const counter of USAGE_COUNTERS) {
    const value = entry[BREAKDOWN_FIELDS[counter]];
    if (value > 0) {
      emit(observe(descriptors[counter], { ...base, ...dimensions }, value));
    }
  }
}

function exportTaggedList(list: TaggedList, base: DayOrg, detail: DetailDescriptors, emit: Emit): void {
  for (const entry of list.entries) {
    exportCounters(entry, defaultDimension(entry, list.dimension), base, detail.breakdown, emit);
  }
}

function exportDetail(record: UsageRecord, base: DayOrg, detail: DetailDescriptors, emit: Emit): void {
  // The generic breakdown list keeps its dimensions verbatim.
  for (const entry of record.breakdown) {
    const dimensions = { language: entry.language, editor: entry.editor, model: entry.model };
    exportCounters(entry, dimensions, base, detail.breakdown, emit);
  }

  for (const walk of FEATURE_WALKS) {
    const engaged = walk.engagedUsers(record);
    if (engaged > 0) {
      emit(observe(detail.engagedUsers[walk.metric], base, engaged));
    }

    for (const repository of walk.repositories?.(record) ?? []) {
      if (repository.total_engaged_users > 0) {
        emit(
          observe(
            detail.repositoryEngagedUsers,
            { ...base, repository: repository.name },
            repository.total_engaged_users,
          ),
        );
      }
      exportTaggedList({ entries: repository.models, dimension: 'model' }, base, detail, emit);
    }

    for (const list of walk.lists(record)) {
      exportTaggedList(list, base, detail, emit);
    }
  }
}

/** Appends the observations of one day to `emit`, in catalogue order. */
export function exportRecord(record: UsageRecord, registry: DescriptorRegistry, org: string, emit: Emit): void {
  const base: DayOrg = { day: record.day, org };

  for (const counter of USAGE_COUNTERS) {
    emit(observe(registry.totals[counter], base, record[TOTAL_FIELDS[counter]]));
  }
  emit(observe(registry.acceptanceRate, base, acceptanceRate(record)));

  if (registry.detail) {
    exportDetail(record, base, registry.detail, emit);
  }
}

/**
 * Flattens a usage document into observations. Days are exported in document
 * order and independently of each other.
 */
export function exportRecords(
  records: readonly UsageRecord[],
  registry: DescriptorRegistry,
  org: string,
): Observation[] {
  const observations: Observation[] = [];
  const emit: Emit = (observation) => {
    observations.push(observation);
  };
  for (const record of records) {
    exportRecord(record, registry, org, emit);
  }
  return observations;
}
