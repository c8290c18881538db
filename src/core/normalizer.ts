import { createHash } from 'crypto';
import {
  CanonicalRecord,
  ChangeEntry,
  FatalReason,
  NormalizationDefect,
  NormalizationResult,
  RawSnapshot,
  RunMode,
  SourceDescriptor,
  SourceNormalizationSummary,
  SourceTier,
} from '../types';
import { MapperRegistry, MappedRow } from './mappers';
import { isOlderThanCutoff } from './source-connector';
import { toIsoDate, toIsoTimestamp, timestampValue } from './dates';
import { Logger, defaultLogger, scoped } from './logger';

const TIER_RANK: Record<SourceTier, number> = {
  [SourceTier.Primary]: 0,
  [SourceTier.Secondary]: 1,
  [SourceTier.Fallback]: 2,
};

/**
 * Fields compared to tell an update from an unchanged record
 */
const FINGERPRINT_FIELDS = [
  'title',
  'region',
  'target_group',
  'category',
  'eligibility_text',
  'benefit_text',
  'application_start',
  'application_end',
  'official_url',
] as const;

export interface NormalizeOptions {
  mode: RunMode;
  sources: SourceDescriptor[];
  previous?: CanonicalRecord[];
}

interface Candidate {
  record: CanonicalRecord;
  tierRank: number;
  sourceOrder: number;
}

/**
 * Hash key for rows without a natural key: normalized (title, official_url)
 */
export function contentKey(title: string | null, officialUrl: string | null): string {
  const normTitle = (title ?? '').toLowerCase().replace(/\s+/g, ' ').trim();
  const normUrl = (officialUrl ?? '').trim().replace(/\/+$/, '').toLowerCase();
  return createHash('sha1').update(`${normTitle}\n${normUrl}`).digest('hex').slice(0, 16);
}

function fingerprint(record: CanonicalRecord): string {
  return FINGERPRINT_FIELDS.map((field) => record[field] ?? '').join('|');
}

/**
 * Decides which of two records with the same policy_id is kept:
 * the more recently checked one, then the higher tier, then the source listed first.
 */
function prefer(current: Candidate, challenger: Candidate): Candidate {
  const byTime = timestampValue(challenger.record.last_checked_at) - timestampValue(current.record.last_checked_at);
  if (byTime !== 0 && !Number.isNaN(byTime)) return byTime > 0 ? challenger : current;
  if (challenger.tierRank !== current.tierRank) return challenger.tierRank < current.tierRank ? challenger : current;
  if (challenger.sourceOrder !== current.sourceOrder) {
    return challenger.sourceOrder < current.sourceOrder ? challenger : current;
  }
  return current;
}

/**
 * Compare a new dataset with the previous one, keyed by policy_id
 */
export function diffDatasets(current: CanonicalRecord[], previous: CanonicalRecord[]): ChangeEntry[] {
  const previousById = new Map(previous.map((p) => [p.policy_id, p]));
  const currentIds = new Set(current.map((c) => c.policy_id));
  const changes: ChangeEntry[] = [];

  for (const record of current) {
    const old = previousById.get(record.policy_id);
    const changeType = !old ? 'created' : fingerprint(old) === fingerprint(record) ? 'unchanged' : 'updated';
    changes.push({ policy_id: record.policy_id, change_type: changeType, title: record.title });
  }
  for (const old of previous) {
    if (!currentIds.has(old.policy_id)) {
      changes.push({ policy_id: old.policy_id, change_type: 'closed', title: old.title });
    }
  }
  return changes;
}

/**
 * Maps raw snapshots into one deduplicated canonical dataset.
 * Pure with respect to its inputs: identical snapshots give identical records.
 */
export class CanonicalNormalizer {
  private readonly logger: Logger;

  constructor(logger: Logger = defaultLogger) {
    this.logger = scoped('normalize', logger);
  }

  normalize(snapshots: RawSnapshot[], options: NormalizeOptions): NormalizationResult {
    const registry = new MapperRegistry(options.sources);
    const sourceOrder = new Map(options.sources.map((s, i) => [s.id, i]));
    const byId = new Map<string, Candidate>();
    const defects: NormalizationDefect[] = [];
    const summaries: SourceNormalizationSummary[] = [];

    const ordered = [...snapshots].sort(
      (a, b) => (sourceOrder.get(a.source_id) ?? Infinity) - (sourceOrder.get(b.source_id) ?? Infinity)
    );

    for (const snapshot of ordered) {
      const source = options.sources.find((s) => s.id === snapshot.source_id);
      if (!source) {
        throw new Error(`Snapshot ${snapshot.source_id}/${snapshot.run_id} has no source definition`);
      }

      const summary: SourceNormalizationSummary = {
        source_id: source.id,
        tier: source.tier,
        snapshot_status: snapshot.status,
        raw_rows: snapshot.items.length,
        canonical_rows: 0,
        skipped_rows: 0,
      };
      summaries.push(summary);
      if (snapshot.status !== 'ok') continue;

      const mapper = registry.get(source.id);
      for (const row of snapshot.items) {
        if (source.cutoff && isOlderThanCutoff(row, source.cutoff)) {
          summary.skipped_rows += 1;
          continue;
        }

        const mapped = mapper(row);
        const record = this.toRecord(source, snapshot, mapped.fields, mapped.naturalKey, defects);
        if (!record) {
          summary.skipped_rows += 1;
          continue;
        }
        if (mapped.status) record.status = mapped.status;

        summary.canonical_rows += 1;
        const candidate: Candidate = {
          record,
          tierRank: TIER_RANK[source.tier],
          sourceOrder: sourceOrder.get(source.id) ?? Infinity,
        };
        const existing = byId.get(record.policy_id);
        byId.set(record.policy_id, existing ? prefer(existing, candidate) : candidate);
      }
    }

    const records = [...byId.values()]
      .map((c) => c.record)
      .sort((a, b) => (a.policy_id < b.policy_id ? -1 : a.policy_id > b.policy_id ? 1 : 0));

    const fatal = this.fatalReasons(records, summaries, options);
    for (const reason of fatal) {
      this.logger.error(`fatal: ${reason}`);
    }
    this.logger.log(`${records.length} canonical records, ${defects.length} defect(s)`);

    return {
      records,
      changes: diffDatasets(records, options.previous ?? []),
      defects,
      sources: summaries,
      fatal,
    };
  }

  private toRecord(
    source: SourceDescriptor,
    snapshot: RawSnapshot,
    fields: MappedRow['fields'],
    naturalKey: string | null,
    defects: NormalizationDefect[]
  ): CanonicalRecord | null {
    const title = fields.title ?? null;
    const officialUrl = fields.official_url ?? null;

    if (!naturalKey && !title && !officialUrl) {
      defects.push({
        source_id: source.id,
        code: 'unidentifiable_row',
        message: 'row has no natural key, title or official URL',
      });
      return null;
    }

    const policyId = naturalKey ?? contentKey(title, officialUrl);
    const defect = (code: NormalizationDefect['code'], field: string, message: string): void => {
      defects.push({ source_id: source.id, code, field, policy_id: policyId, message });
    };

    let lastChecked: string | null = snapshot.fetched_at;
    if (fields.last_checked_at !== undefined) {
      lastChecked = toIsoTimestamp(fields.last_checked_at);
      if (!lastChecked) defect('malformed_date', 'last_checked_at', `unparseable timestamp '${fields.last_checked_at}'`);
    }

    if (!title) defect('missing_required_field', 'title', 'title is empty');
    if (!officialUrl) defect('missing_required_field', 'official_url', 'official_url is empty');

    const record: CanonicalRecord = {
      policy_id: policyId,
      title,
      official_url: officialUrl,
      last_checked_at: lastChecked,
      source_api: source.id,
      source_org: fields.source_org ?? source.id,
      snapshot_id: `${snapshot.source_id}/${snapshot.run_id}`,
      status: 'active',
    };

    for (const field of ['application_start', 'application_end'] as const) {
      const raw = fields[field];
      if (raw === undefined) continue;
      const date = toIsoDate(raw);
      if (date) {
        record[field] = date;
      } else {
        defect('malformed_date', field, `unparseable date '${raw}'`);
      }
    }
    for (const field of ['eligibility_text', 'benefit_text', 'category', 'region', 'target_group'] as const) {
      const value = fields[field];
      if (value !== undefined) record[field] = value;
    }
    return record;
  }

  private fatalReasons(
    records: CanonicalRecord[],
    summaries: SourceNormalizationSummary[],
    options: NormalizeOptions
  ): FatalReason[] {
    const fatal: FatalReason[] = [];
    if (records.length === 0) {
      fatal.push('canonical_empty');
    }

    const primaries = options.sources.filter((s) => s.enabled && s.tier === SourceTier.Primary);
    const primaryRows = primaries.reduce(
      (sum, s) => sum + (summaries.find((x) => x.source_id === s.id)?.canonical_rows ?? 0),
      0
    );
    if (primaries.length > 0 && primaryRows === 0 && options.mode !== RunMode.Bootstrap) {
      fatal.push('primary_sources_unavailable');
    }
    return fatal;
  }
}
