import { FieldMapping, MappedField, PolicyStatus, RawItem, SourceDescriptor } from '../types';

/**
 * Canonical-shaped view of one raw row, before validation and dedup
 */
export interface MappedRow {
  /** Natural key supplied by the source, if it has one */
  naturalKey: string | null;
  fields: Partial<Record<MappedField, string>>;
  status?: PolicyStatus;
}

export type RowMapper = (row: RawItem) => MappedRow;

const MAPPED_FIELDS: MappedField[] = [
  'policy_id',
  'title',
  'official_url',
  'last_checked_at',
  'eligibility_text',
  'benefit_text',
  'application_start',
  'application_end',
  'category',
  'region',
  'target_group',
  'source_org',
];

/**
 * First non-empty value among `keys`, as trimmed text
 */
export function pickText(row: RawItem, keys: string[]): string | undefined {
  for (const key of keys) {
    const value = row[key];
    if (typeof value !== 'string' && typeof value !== 'number') continue;
    const text = String(value).trim();
    if (text) return text;
  }
  return undefined;
}

function compact(fields: Partial<Record<MappedField, string | undefined>>): Partial<Record<MappedField, string>> {
  const out: Partial<Record<MappedField, string>> = {};
  for (const field of MAPPED_FIELDS) {
    const value = fields[field];
    if (value !== undefined && value !== '') out[field] = value;
  }
  return out;
}

/**
 * Declared field table: canonical field -> ordered raw keys.
 * A field without an entry is read from the raw key of the same name.
 */
function tableMapper(mapping: Extract<FieldMapping, { kind: 'table' }>, source: SourceDescriptor): RowMapper {
  const keyFields = mapping.naturalKey ?? mapping.fields.policy_id;

  return (row) => {
    const fields: Partial<Record<MappedField, string | undefined>> = {};
    for (const field of MAPPED_FIELDS) {
      fields[field] = pickText(row, mapping.fields[field] ?? [field]) ?? mapping.defaults?.[field];
    }
    fields.official_url = fields.official_url ?? source.fallbackOfficialUrl;

    const status = pickText(row, ['status']);
    return {
      naturalKey: keyFields ? pickText(row, keyFields) ?? null : null,
      fields: compact(fields),
      status: status === 'closed' ? 'closed' : undefined,
    };
  };
}

/**
 * Detail links in the announcement registry often come without a scheme
 */
export function announcementUrl(row: RawItem): string | undefined {
  const value = pickText(row, ['detl_pg_url', 'biz_aply_url', 'biz_gdnc_url']);
  if (!value) return undefined;
  if (value.startsWith('http://') || value.startsWith('https://')) return value;
  return `https://${value.replace(/^\/+/, '')}`;
}

/**
 * Column-style announcement registry (serial number, title, receipt window, ...)
 */
function announcementMapper(source: SourceDescriptor): RowMapper {
  return (row) => {
    const recruiting = pickText(row, ['rcrt_prgs_yn']);
    return {
      naturalKey: pickText(row, ['pbanc_sn', 'id']) ?? null,
      fields: compact({
        title: pickText(row, ['biz_pbanc_nm']),
        official_url: announcementUrl(row) ?? source.fallbackOfficialUrl,
        region: pickText(row, ['supt_regin']) ?? '전국',
        target_group: pickText(row, ['aply_trgt']),
        category: pickText(row, ['supt_biz_clsfc']) ?? '창업',
        eligibility_text: pickText(row, ['aply_trgt_ctnt']),
        benefit_text: pickText(row, ['pbanc_ctnt']),
        application_start: pickText(row, ['pbanc_rcpt_bgng_dt']),
        application_end: pickText(row, ['pbanc_rcpt_end_dt']),
        source_org: pickText(row, ['sprv_inst', 'pbanc_ntrp_nm']),
      }),
      status: recruiting !== undefined && recruiting.toUpperCase() !== 'Y' ? 'closed' : undefined,
    };
  };
}

export function createMapper(source: SourceDescriptor): RowMapper {
  const mapping = source.mapping;
  switch (mapping.kind) {
    case 'table':
      return tableMapper(mapping, source);
    case 'announcement':
      return announcementMapper(source);
  }
}

/**
 * Row mappers keyed by source id
 */
export class MapperRegistry {
  private readonly mappers = new Map<string, RowMapper>();

  constructor(sources: SourceDescriptor[] = []) {
    for (const source of sources) {
      this.register(source.id, createMapper(source));
    }
  }

  register(sourceId: string, mapper: RowMapper): void {
    this.mappers.set(sourceId, mapper);
  }

  has(sourceId: string): boolean {
    return this.mappers.has(sourceId);
  }

  get(sourceId: string): RowMapper {
    const mapper = this.mappers.get(sourceId);
    if (!mapper) {
      throw new Error(`No field mapping registered for source: ${sourceId}`);
    }
    return mapper;
  }
}
