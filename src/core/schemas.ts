import Ajv, { AnySchema, ErrorObject, ValidateFunction } from 'ajv';
import addFormats from 'ajv-formats';

/**
 * JSON schemas for the artifacts the pipeline reads from or hands to other tools.
 * These act as validation gates at the boundaries: config in, datasets and reports out.
 */

export const SourceDescriptorSchema = {
  type: 'object',
  properties: {
    id: { type: 'string', pattern: '^[a-z0-9][a-z0-9_-]*$' },
    kind: { enum: ['http_json', 'file_json'] },
    tier: { enum: ['primary', 'secondary', 'fallback'] },
    enabled: { type: 'boolean' },
    endpoint: { type: 'string', minLength: 1 },
    params: {
      type: 'object',
      additionalProperties: { type: ['string', 'number'] },
    },
    auth: {
      oneOf: [
        {
          type: 'object',
          properties: { type: { const: 'none' } },
          required: ['type'],
        },
        {
          type: 'object',
          properties: {
            type: { const: 'query_key' },
            envKey: { type: 'string', minLength: 1 },
            paramName: { type: 'string', minLength: 1 },
          },
          required: ['type', 'envKey', 'paramName'],
        },
      ],
    },
    pagination: {
      type: 'object',
      properties: {
        mode: { enum: ['none', 'page'] },
        pageParam: { type: 'string' },
        sizeParam: { type: 'string' },
        startPage: { type: 'integer', minimum: 0 },
        maxPages: { type: 'integer', minimum: 1 },
        pageSize: { type: 'integer', minimum: 1 },
        countPath: { type: 'string' },
      },
      required: ['mode', 'pageParam', 'sizeParam', 'startPage', 'maxPages', 'pageSize', 'countPath'],
    },
    itemsPath: { type: 'string' },
    cutoff: {
      type: 'object',
      properties: {
        field: { type: 'string', minLength: 1 },
        date: { type: 'string', pattern: '^\\d{4}-?\\d{2}-?\\d{2}$' },
      },
      required: ['field', 'date'],
    },
    mapping: {
      type: 'object',
      properties: {
        kind: { enum: ['table', 'announcement'] },
        naturalKey: { type: 'array', items: { type: 'string' } },
        fields: {
          type: 'object',
          additionalProperties: { type: 'array', items: { type: 'string' } },
        },
        defaults: {
          type: 'object',
          additionalProperties: { type: 'string' },
        },
      },
      required: ['kind'],
      if: { properties: { kind: { const: 'table' } } },
      then: { required: ['fields'] },
    },
    fallbackOfficialUrl: { type: 'string' },
  },
  required: ['id', 'kind', 'tier', 'enabled', 'endpoint', 'mapping'],
  additionalProperties: false,
};

export const SourceListSchema = {
  type: 'array',
  items: SourceDescriptorSchema,
};

export const RawSnapshotSchema = {
  type: 'object',
  properties: {
    schema: { const: 'policy-pipeline.raw_snapshot.v1' },
    source_id: { type: 'string', minLength: 1 },
    run_id: { type: 'string', minLength: 1 },
    tier: { enum: ['primary', 'secondary', 'fallback'] },
    status: { enum: ['ok', 'failed'] },
    fetched_at: { type: 'string', format: 'date-time' },
    pages: { type: 'integer', minimum: 0 },
    error: { type: ['string', 'null'] },
    items: { type: 'array', items: { type: 'object' } },
  },
  required: ['schema', 'source_id', 'run_id', 'tier', 'status', 'fetched_at', 'pages', 'error', 'items'],
};

export const CanonicalRecordSchema = {
  type: 'object',
  properties: {
    policy_id: { type: 'string', minLength: 1 },
    title: { type: ['string', 'null'] },
    official_url: { type: ['string', 'null'] },
    last_checked_at: { type: ['string', 'null'] },
    eligibility_text: { type: 'string' },
    benefit_text: { type: 'string' },
    application_start: { type: 'string', format: 'date' },
    application_end: { type: 'string', format: 'date' },
    category: { type: 'string' },
    region: { type: 'string' },
    target_group: { type: 'string' },
    source_api: { type: 'string', minLength: 1 },
    source_org: { type: 'string' },
    snapshot_id: { type: 'string', minLength: 1 },
    status: { enum: ['active', 'closed'] },
  },
  required: ['policy_id', 'title', 'official_url', 'last_checked_at', 'source_api', 'source_org', 'snapshot_id', 'status'],
  additionalProperties: false,
};

export const CanonicalDatasetSchema = {
  type: 'array',
  items: CanonicalRecordSchema,
};

export const GateReportSchema = {
  type: 'object',
  properties: {
    schema: { const: 'policy-pipeline.gate_report.v1' },
    gate: { enum: ['quality', 'monetization'] },
    run_id: { type: ['string', 'null'] },
    decision: { enum: ['pass', 'soft_fail', 'hard_fail'] },
    reasons: { type: 'array', items: { type: 'string' } },
    findings: {
      type: 'array',
      items: {
        type: 'object',
        properties: {
          code: { type: 'string' },
          severity: { enum: ['hard', 'soft'] },
          message: { type: 'string' },
          subject: { type: 'string' },
        },
        required: ['code', 'severity', 'message'],
      },
    },
    metrics: { type: 'object', additionalProperties: { type: 'number' } },
    inputs: { type: 'object' },
    generated_at: { type: 'string', format: 'date-time' },
  },
  required: ['schema', 'gate', 'decision', 'reasons', 'findings', 'metrics', 'generated_at'],
  additionalProperties: false,
};

export const FrontendReportSchema = {
  type: 'object',
  properties: {
    schema: { const: 'policy-pipeline.frontend_report.v1' },
    decision: { enum: ['pass', 'soft_fail', 'hard_fail'] },
    total_pages: { type: 'integer', minimum: 0 },
    indexable_pages: { type: 'integer', minimum: 0 },
    templates: { type: 'object', additionalProperties: { type: 'integer', minimum: 0 } },
    total_bytes: { type: 'integer', minimum: 0 },
    max_page_bytes: { type: 'integer', minimum: 0 },
    missing_sections: { type: 'array', items: { type: 'string' } },
    generated_at: { type: 'string' },
  },
  required: [
    'schema',
    'decision',
    'total_pages',
    'indexable_pages',
    'templates',
    'total_bytes',
    'max_page_bytes',
    'missing_sections',
    'generated_at',
  ],
};

const DECISION_OR_NULL = { enum: ['pass', 'soft_fail', 'hard_fail', null] };
const STAGES = ['fetch', 'normalize', 'generate', 'quality', 'monetization', 'deploy', 'promote'];

export const RunRecordSchema = {
  type: 'object',
  properties: {
    schema: { const: 'policy-pipeline.run_meta.v1' },
    run_id: { type: 'string', minLength: 1 },
    mode: { enum: ['bootstrap', 'daily', 'manual'] },
    status: { enum: ['running', 'success', 'failed', 'deploy_skipped'] },
    stage: { enum: ['start', 'completed', ...STAGES] },
    started_at: { type: 'string', format: 'date-time' },
    ended_at: { type: ['string', 'null'] },
    site_base_url: { type: 'string' },
    stages: {
      type: 'array',
      items: {
        type: 'object',
        properties: {
          stage: { enum: STAGES },
          status: { enum: ['completed', 'failed', 'skipped'] },
          started_at: { type: 'string' },
          ended_at: { type: 'string' },
          artifacts: { type: 'array', items: { type: 'string' } },
          detail: { type: 'object' },
        },
        required: ['stage', 'status', 'started_at', 'ended_at', 'artifacts'],
      },
    },
    decision: {
      type: 'object',
      properties: {
        quality: DECISION_OR_NULL,
        monetization: DECISION_OR_NULL,
        deploy_ready: { type: 'boolean' },
        deployed: { type: 'boolean' },
      },
      required: ['quality', 'monetization', 'deploy_ready', 'deployed'],
    },
    reasons: { type: 'array', items: { type: 'string' } },
    error: { type: ['string', 'null'] },
  },
  required: ['schema', 'run_id', 'mode', 'status', 'stage', 'started_at', 'ended_at', 'stages', 'decision', 'reasons', 'error'],
};

let ajvInstance: Ajv | undefined;

function getAjv(): Ajv {
  if (!ajvInstance) {
    ajvInstance = new Ajv({ allErrors: true, strict: false });
    addFormats(ajvInstance);
  }
  return ajvInstance;
}

const compiled = new Map<AnySchema, ValidateFunction>();

function formatError(error: ErrorObject): string {
  const location = error.instancePath || '/';
  return `${location}: ${error.message ?? 'invalid'}`;
}

/**
 * Validate a value against one of the schemas above.
 * Returns human readable messages; an empty list means valid.
 */
export function validateAgainst(schema: AnySchema, value: unknown): string[] {
  let validate = compiled.get(schema);
  if (!validate) {
    validate = getAjv().compile(schema);
    compiled.set(schema, validate);
  }
  if (validate(value)) {
    return [];
  }
  return (validate.errors ?? []).map(formatError);
}
