/**
 * Gate decisions, ordered by severity.
 *
 * pass      - no rule breached
 * soft_fail - only soft rules breached; recorded, does not block deploy
 * hard_fail - at least one hard rule breached; blocks deploy
 */
export enum GateDecision {
  Pass = 'pass',
  SoftFail = 'soft_fail',
  HardFail = 'hard_fail',
}

/**
 * Pipeline run modes
 */
export enum RunMode {
  Bootstrap = 'bootstrap', // fallback/fixture data may stand in for primary sources
  Daily = 'daily', // scheduled run, primary sources are mandatory
  Manual = 'manual',
}

/**
 * Priority tier of a data source
 */
export enum SourceTier {
  Primary = 'primary',
  Secondary = 'secondary',
  Fallback = 'fallback',
}

/**
 * Lifecycle status of a run record
 */
export enum RunStatus {
  Running = 'running',
  Success = 'success',
  Failed = 'failed',
  DeploySkipped = 'deploy_skipped',
}

/**
 * Pipeline stages in execution order
 */
export enum Stage {
  Fetch = 'fetch',
  Normalize = 'normalize',
  Generate = 'generate',
  Quality = 'quality',
  Monetization = 'monetization',
  Deploy = 'deploy',
  Promote = 'promote',
}

export type GateName = 'quality' | 'monetization';

export type FindingSeverity = 'hard' | 'soft';

/**
 * Source authentication
 */
export type SourceAuth =
  | { type: 'none' }
  | { type: 'query_key'; envKey: string; paramName: string };

/**
 * Pagination settings for http_json sources
 */
export interface PaginationConfig {
  mode: 'none' | 'page';
  pageParam: string;
  sizeParam: string;
  startPage: number;
  maxPages: number;
  pageSize: number;
  /** Dot path of the per-page record count in the response body */
  countPath: string;
}

/**
 * Stop paging once every record of a page is older than `date`
 */
export interface CutoffConfig {
  field: string;
  date: string;
}

/**
 * Canonical fields a table mapping can fill from raw keys
 */
export type MappedField =
  | 'policy_id'
  | 'title'
  | 'official_url'
  | 'last_checked_at'
  | 'eligibility_text'
  | 'benefit_text'
  | 'application_start'
  | 'application_end'
  | 'category'
  | 'region'
  | 'target_group'
  | 'source_org';

/**
 * Per-source field mapping, one variant per raw schema family
 */
export type FieldMapping =
  | {
      kind: 'table';
      /** Raw keys forming the natural key; first non-empty value wins */
      naturalKey?: string[];
      fields: Partial<Record<MappedField, string[]>>;
      defaults?: Partial<Record<MappedField, string>>;
    }
  | { kind: 'announcement' };

export type SourceKind = 'http_json' | 'file_json';

/**
 * Declarative description of one upstream source
 */
export interface SourceDescriptor {
  id: string;
  kind: SourceKind;
  tier: SourceTier;
  enabled: boolean;
  /** URL template ({page}, {pageSize}) for http_json, file path for file_json */
  endpoint: string;
  params?: Record<string, string | number>;
  auth?: SourceAuth;
  pagination?: PaginationConfig;
  itemsPath?: string;
  cutoff?: CutoffConfig;
  mapping: FieldMapping;
  fallbackOfficialUrl?: string;
}

export type RawItem = Record<string, unknown>;

/**
 * Immutable raw snapshot, one per (source_id, run_id)
 */
export interface RawSnapshot {
  schema: 'policy-pipeline.raw_snapshot.v1';
  source_id: string;
  run_id: string;
  tier: SourceTier;
  status: 'ok' | 'failed';
  fetched_at: string;
  pages: number;
  error: string | null;
  items: RawItem[];
}

export type FetchFailure = 'transient' | 'permanent';

/**
 * Outcome of fetching one source
 */
export interface SourceFetchReport {
  source_id: string;
  tier: SourceTier;
  ok: boolean;
  rows: number;
  pages: number;
  attempts: number;
  failure: FetchFailure | null;
  error: string | null;
  snapshot_path: string | null;
}

export type PolicyStatus = 'active' | 'closed';

/**
 * Canonical policy/benefit record
 */
export interface CanonicalRecord {
  policy_id: string;
  title: string | null;
  official_url: string | null;
  last_checked_at: string | null;
  eligibility_text?: string;
  benefit_text?: string;
  application_start?: string;
  application_end?: string;
  category?: string;
  region?: string;
  target_group?: string;
  source_api: string;
  source_org: string;
  snapshot_id: string;
  status: PolicyStatus;
}

export type RequiredField = 'policy_id' | 'title' | 'official_url' | 'last_checked_at' | 'source_api' | 'source_org';

export type ChangeType = 'created' | 'updated' | 'unchanged' | 'closed';

export interface ChangeEntry {
  policy_id: string;
  change_type: ChangeType;
  title: string | null;
}

export type DefectCode = 'malformed_date' | 'missing_required_field' | 'unidentifiable_row' | 'duplicate_record';

/**
 * Field-level problem found while normalizing a raw row
 */
export interface NormalizationDefect {
  source_id: string;
  code: DefectCode;
  field?: string;
  policy_id?: string;
  message: string;
}

export interface SourceNormalizationSummary {
  source_id: string;
  tier: SourceTier;
  snapshot_status: RawSnapshot['status'];
  raw_rows: number;
  canonical_rows: number;
  skipped_rows: number;
}

export type FatalReason = 'canonical_empty' | 'primary_sources_unavailable';

export interface NormalizationResult {
  records: CanonicalRecord[];
  changes: ChangeEntry[];
  defects: NormalizationDefect[];
  sources: SourceNormalizationSummary[];
  fatal: FatalReason[];
}

/**
 * A single rule breach
 */
export interface GateFinding {
  code: string;
  severity: FindingSeverity;
  message: string;
  subject?: string;
}

/**
 * Result of one gate for one run
 */
export interface GateReport {
  schema: 'policy-pipeline.gate_report.v1';
  gate: GateName;
  run_id: string | null;
  decision: GateDecision;
  reasons: string[];
  findings: GateFinding[];
  metrics: Record<string, number>;
  inputs: Record<string, string | null>;
  generated_at: string;
}

export interface AdSlot {
  /** Document-order index of the slot element */
  position: number;
  id: string | null;
}

export interface PageAnchor {
  text: string;
  href: string;
}

/**
 * One generated HTML page, parsed
 */
export interface SitePage {
  route: string;
  file: string;
  template: string;
  indexable: boolean;
  title: string;
  description: string;
  canonical: string | null;
  openGraph: Record<string, string>;
  bytes: number;
  adSlots: AdSlot[];
  anchors: PageAnchor[];
  html: string;
}

/**
 * Everything the gates need to know about a generated site directory
 */
export interface SiteInventory {
  siteDir: string;
  baseUrl: string;
  pages: SitePage[];
  sitemapUrls: string[] | null;
  robots: { present: boolean; sitemapRefs: string[] };
}

export interface FrontendReport {
  schema: 'policy-pipeline.frontend_report.v1';
  decision: GateDecision;
  total_pages: number;
  indexable_pages: number;
  templates: Record<string, number>;
  total_bytes: number;
  max_page_bytes: number;
  missing_sections: string[];
  generated_at: string;
}

export interface StageEntry {
  stage: Stage;
  status: 'completed' | 'failed' | 'skipped';
  started_at: string;
  ended_at: string;
  artifacts: string[];
  detail?: Record<string, unknown>;
}

export interface RunDecision {
  quality: GateDecision | null;
  monetization: GateDecision | null;
  deploy_ready: boolean;
  deployed: boolean;
}

/**
 * One pipeline execution
 */
export interface RunRecord {
  schema: 'policy-pipeline.run_meta.v1';
  run_id: string;
  mode: RunMode;
  status: RunStatus;
  stage: Stage | 'start' | 'completed';
  started_at: string;
  ended_at: string | null;
  site_base_url: string;
  stages: StageEntry[];
  decision: RunDecision;
  reasons: string[];
  error: string | null;
}

export interface DeployReceipt {
  confirmed: boolean;
  target: string;
  deployed_at: string;
  files: number;
}

export interface PublishReport {
  run_id: string;
  deploy_ready: boolean;
  quality_decision: GateDecision;
  monetization_decision: GateDecision;
  generated_pages: number;
  deployed: boolean;
  site_base_url: string;
  timestamp: string;
}

/**
 * Fetch/retry behaviour shared by every http source
 */
export interface FetchConfig {
  requestTimeoutMs: number;
  retry: {
    attempts: number;
    baseDelayMs: number;
    maxDelayMs: number;
  };
}

export interface QualityGateConfig {
  requiredFields: RequiredField[];
  maxNullRatio: number;
  maxDuplicateIdRatio: number;
  maxBrokenLinkRatio: number;
  maxDuplicateMetaRatio: number;
  maxVolumeDropRatio: number;
  maxDuplicateTrendDelta: number;
  openGraph: {
    keyTemplates: string[];
    requiredTags: string[];
  };
  anchors: {
    genericPhrases: string[];
    maxGenericRatio: number;
    minAnchors: number;
  };
  performance: {
    maxPageBytes: number;
    maxOverBudgetRatio: number;
  };
}

export interface RpmRecommendation {
  id: string;
  description: string;
  applied: boolean;
}

export interface MonetizationGateConfig {
  maxSlotsPerPage: number;
  forbidBeforeFirstHeading: boolean;
  /** Minimum number of elements between an ad slot and a conversion element */
  minElementsFromConversion: number;
  denylist: string[];
  nonCriticalTemplates: string[];
  rpmRecommendations: RpmRecommendation[];
}

export interface SiteConfig {
  baseUrl: string;
  /** Text fragments every detail page must contain */
  requiredDetailSections: string[];
  disclaimerText: string;
  adClient: string;
}

export interface PathsConfig {
  artifactsDir: string;
  dataDir: string;
  deployDir: string;
}

/**
 * Pipeline configuration
 */
export interface PipelineConfig {
  paths: PathsConfig;
  sources: SourceDescriptor[];
  fetch: FetchConfig;
  quality: QualityGateConfig;
  monetization: MonetizationGateConfig;
  site: SiteConfig;
}
