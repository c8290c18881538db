import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { CanonicalRecord, RawSnapshot, SourceDescriptor, SourceTier } from '../../src/types';
import { Logger } from '../../src/core/logger';

export function makeTempDir(prefix = 'policy-pipeline-test-'): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), prefix));
}

export function removeDir(dir: string): void {
  if (dir && fs.existsSync(dir)) {
    fs.rmSync(dir, { recursive: true, force: true });
  }
}

/**
 * Logger that keeps every line for assertions
 */
export class RecordingLogger implements Logger {
  readonly lines: string[] = [];
  readonly warnings: string[] = [];
  readonly errors: string[] = [];

  log(message: string): void {
    this.lines.push(message);
  }

  warn(message: string): void {
    this.warnings.push(message);
  }

  error(message: string): void {
    this.errors.push(message);
  }
}

export function makeRecord(overrides: Partial<CanonicalRecord> = {}): CanonicalRecord {
  const id = overrides.policy_id ?? 'P-001';
  return {
    policy_id: id,
    title: `Policy ${id}`,
    official_url: `https://www.example.go.kr/policies/${id}`,
    last_checked_at: '2025-07-01T00:00:00.000Z',
    source_api: 'fixtures',
    source_org: 'Test Ministry',
    snapshot_id: 'fixtures/run-1',
    status: 'active',
    ...overrides,
  };
}

export function makeSource(overrides: Partial<SourceDescriptor> = {}): SourceDescriptor {
  return {
    id: 'registry',
    kind: 'http_json',
    tier: SourceTier.Primary,
    enabled: true,
    endpoint: 'https://api.example.test/policies',
    itemsPath: 'data',
    mapping: { kind: 'table', naturalKey: ['id'], fields: { title: ['name'], official_url: ['url'] } },
    ...overrides,
  };
}

export function makeSnapshot(overrides: Partial<RawSnapshot> = {}): RawSnapshot {
  return {
    schema: 'policy-pipeline.raw_snapshot.v1',
    source_id: 'registry',
    run_id: 'run-1',
    tier: SourceTier.Primary,
    status: 'ok',
    fetched_at: '2025-07-02T00:00:00.000Z',
    pages: 1,
    error: null,
    items: [],
    ...overrides,
  };
}

/**
 * A fetch Response with a JSON body
 */
export function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}

/**
 * Write files below `dir`; keys are relative paths
 */
export function writeFiles(dir: string, files: Record<string, string>): void {
  for (const [relative, content] of Object.entries(files)) {
    const target = path.join(dir, relative);
    fs.mkdirSync(path.dirname(target), { recursive: true });
    fs.writeFileSync(target, content);
  }
}

export interface PageSpec {
  title?: string;
  description?: string;
  canonical?: string | null;
  template?: string;
  noindex?: boolean;
  og?: Record<string, string>;
  body?: string;
}

/**
 * Minimal HTML page for site-level tests
 */
export function htmlPage(spec: PageSpec = {}): string {
  const head: string[] = ['<meta charset="utf-8">'];
  if (spec.title !== undefined) head.push(`<title>${spec.title}</title>`);
  if (spec.description !== undefined) head.push(`<meta name="description" content="${spec.description}">`);
  if (spec.canonical) head.push(`<link rel="canonical" href="${spec.canonical}">`);
  if (spec.noindex) head.push('<meta name="robots" content="noindex">');
  for (const [property, content] of Object.entries(spec.og ?? {})) {
    head.push(`<meta property="${property}" content="${content}">`);
  }
  const template = spec.template ? ` data-template="${spec.template}"` : '';
  return `<!doctype html><html><head>${head.join('')}</head><body${template}>${spec.body ?? '<h1>Heading</h1>'}</body></html>`;
}
