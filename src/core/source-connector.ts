import * as fs from 'fs';
import * as path from 'path';
import { setTimeout as sleepFor } from 'timers/promises';
import {
  CutoffConfig,
  FetchConfig,
  PaginationConfig,
  RawItem,
  RawSnapshot,
  SourceDescriptor,
  SourceFetchReport,
} from '../types';
import { RawSnapshotStore } from './raw_snapshot_store';
import { FetchError, errorMessage } from './errors';
import { Logger, defaultLogger, scoped } from './logger';
import { toIsoDate } from './dates';

const NO_PAGINATION: PaginationConfig = {
  mode: 'none',
  pageParam: 'page',
  sizeParam: 'perPage',
  startPage: 1,
  maxPages: 1,
  pageSize: 100,
  countPath: 'currentCount',
};

export interface SourceFetchResult {
  snapshot: RawSnapshot;
  report: SourceFetchReport;
}

export interface SourceConnectorOptions {
  fetch: FetchConfig;
  store: RawSnapshotStore;
  /** Directory file_json endpoints are resolved against */
  baseDir?: string;
  logger?: Logger;
  env?: NodeJS.ProcessEnv;
  sleep?: (ms: number) => Promise<void>;
  now?: () => Date;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Follow a dot path ("response.body.items") into a parsed JSON document
 */
export function readPath(payload: unknown, dotPath: string | undefined): unknown {
  if (!dotPath) return payload;
  let current: unknown = payload;
  for (const token of dotPath.split('.')) {
    if (!isRecord(current) || !(token in current)) return undefined;
    current = current[token];
  }
  return current;
}

/**
 * Records at `itemsPath`; anything that is not an object row is dropped
 */
export function readItems(payload: unknown, itemsPath: string | undefined): RawItem[] {
  const found = readPath(payload, itemsPath);
  return Array.isArray(found) ? found.filter(isRecord) : [];
}

function readCount(payload: unknown, countPath: string): number | null {
  const value = readPath(payload, countPath);
  if (typeof value === 'number' && Number.isFinite(value)) return value;
  if (typeof value === 'string' && value.trim() !== '' && !Number.isNaN(Number(value))) return Number(value);
  return null;
}

/**
 * True when the record's cutoff field holds a date before the cutoff.
 * Records without a parseable date are not considered older.
 */
export function isOlderThanCutoff(item: RawItem, cutoff: CutoffConfig): boolean {
  const limit = toIsoDate(cutoff.date);
  const value = toIsoDate(item[cutoff.field]);
  if (!limit || !value) return false;
  return value < limit;
}

/**
 * Exponential backoff: base * 2^(attempt-1), capped
 */
export function backoffDelay(attempt: number, retry: FetchConfig['retry']): number {
  return Math.min(retry.baseDelayMs * 2 ** (attempt - 1), retry.maxDelayMs);
}

/**
 * Rejects once the signal aborts; a body read does not always observe the signal itself
 */
function rejectOnAbort(signal: AbortSignal): Promise<never> {
  return new Promise((_resolve, reject) => {
    signal.addEventListener('abort', () => reject(new Error('aborted')), { once: true });
  });
}

/**
 * Build the request URL for one page: template placeholders first,
 * then query parameters, then the credential.
 */
export function buildRequestUrl(
  source: SourceDescriptor,
  page: number | null,
  env: NodeJS.ProcessEnv
): URL {
  const pagination = source.pagination ?? NO_PAGINATION;
  const templated = source.endpoint.includes('{page}') || source.endpoint.includes('{pageSize}');
  const endpoint = source.endpoint
    .replace(/\{page\}/g, String(page ?? pagination.startPage))
    .replace(/\{pageSize\}/g, String(pagination.pageSize));

  let url: URL;
  try {
    url = new URL(endpoint);
  } catch {
    throw FetchError.permanent(`Invalid endpoint URL for source ${source.id}`);
  }

  for (const [key, value] of Object.entries(source.params ?? {})) {
    url.searchParams.set(key, String(value));
  }
  if (page !== null && !templated) {
    url.searchParams.set(pagination.pageParam, String(page));
    url.searchParams.set(pagination.sizeParam, String(pagination.pageSize));
  }

  const auth = source.auth ?? { type: 'none' };
  if (auth.type === 'query_key') {
    const secret = env[auth.envKey];
    if (!secret) {
      throw FetchError.permanent(`Missing secret env: ${auth.envKey}`);
    }
    url.searchParams.set(auth.paramName, secret);
  }
  return url;
}

/**
 * Fetches source registries into raw snapshots.
 *
 * Transient failures (5xx, 429, timeouts, network errors) are retried with bounded
 * exponential backoff; any other 4xx fails the source at once. A failed source is
 * reported, never thrown, so sibling sources always complete.
 */
export class SourceConnector {
  private readonly config: FetchConfig;
  private readonly store: RawSnapshotStore;
  private readonly baseDir: string;
  private readonly logger: Logger;
  private readonly env: NodeJS.ProcessEnv;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly now: () => Date;

  constructor(options: SourceConnectorOptions) {
    this.config = options.fetch;
    this.store = options.store;
    this.baseDir = options.baseDir ?? process.cwd();
    this.logger = scoped('fetch', options.logger ?? defaultLogger);
    this.env = options.env ?? process.env;
    this.sleep = options.sleep ?? ((ms) => sleepFor(ms).then(() => undefined));
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Fetch every enabled source in parallel and wait for all of them to settle.
   * Only storage errors (e.g. a snapshot that already exists) are rethrown, after the join.
   */
  async fetchAll(sources: SourceDescriptor[], runId: string): Promise<SourceFetchResult[]> {
    const enabled = sources.filter((s) => s.enabled);
    const settled = await Promise.allSettled(enabled.map((s) => this.fetchSource(s, runId)));

    const results: SourceFetchResult[] = [];
    for (const outcome of settled) {
      if (outcome.status === 'rejected') {
        throw outcome.reason;
      }
      results.push(outcome.value);
    }
    return results;
  }

  /**
   * Fetch one source and write its snapshot (also when the fetch failed)
   */
  async fetchSource(source: SourceDescriptor, runId: string): Promise<SourceFetchResult> {
    const counter = { attempts: 0, pages: 0 };
    let items: RawItem[] = [];
    let error: FetchError | null = null;

    try {
      items = source.kind === 'file_json' ? this.readFile(source, counter) : await this.fetchHttp(source, counter);
      this.logger.log(`${source.id}: ${items.length} rows in ${counter.pages} page(s)`);
    } catch (e) {
      error = e instanceof FetchError ? e : FetchError.permanent(errorMessage(e));
      this.logger.warn(`${source.id}: failed (${error.kind}) after ${counter.attempts} attempt(s): ${error.message}`);
    }

    const snapshot: RawSnapshot = {
      schema: 'policy-pipeline.raw_snapshot.v1',
      source_id: source.id,
      run_id: runId,
      tier: source.tier,
      status: error ? 'failed' : 'ok',
      fetched_at: this.now().toISOString(),
      pages: counter.pages,
      error: error ? error.message : null,
      items: error ? [] : items,
    };
    const snapshotPath = this.store.save(snapshot);

    return {
      snapshot,
      report: {
        source_id: source.id,
        tier: source.tier,
        ok: error === null,
        rows: snapshot.items.length,
        pages: counter.pages,
        attempts: counter.attempts,
        failure: error ? error.kind : null,
        error: error ? error.message : null,
        snapshot_path: snapshotPath,
      },
    };
  }

  private readFile(source: SourceDescriptor, counter: { attempts: number; pages: number }): RawItem[] {
    const filepath = path.resolve(this.baseDir, source.endpoint);
    counter.attempts += 1;
    if (!fs.existsSync(filepath)) {
      throw FetchError.permanent(`Source file not found: ${filepath}`);
    }
    let payload: unknown;
    try {
      payload = JSON.parse(fs.readFileSync(filepath, 'utf-8'));
    } catch (e) {
      throw FetchError.permanent(`Source file is not valid JSON: ${filepath}: ${errorMessage(e)}`);
    }
    counter.pages += 1;
    return readItems(payload, source.itemsPath);
  }

  private async fetchHttp(source: SourceDescriptor, counter: { attempts: number; pages: number }): Promise<RawItem[]> {
    const pagination = source.pagination ?? NO_PAGINATION;

    if (pagination.mode === 'none') {
      const body = await this.requestWithRetry(buildRequestUrl(source, null, this.env), counter);
      counter.pages += 1;
      return readItems(body, source.itemsPath);
    }

    const rows: RawItem[] = [];
    for (let i = 0; i < pagination.maxPages; i++) {
      const page = pagination.startPage + i;
      const body = await this.requestWithRetry(buildRequestUrl(source, page, this.env), counter);
      counter.pages += 1;

      const items = readItems(body, source.itemsPath);
      rows.push(...items);

      const count = readCount(body, pagination.countPath) ?? items.length;
      if (count === 0 || items.length === 0) break;

      // upstream returns newest first: once a whole page is past the cutoff, the rest is too
      const cutoff = source.cutoff;
      if (cutoff && items.every((item) => isOlderThanCutoff(item, cutoff))) {
        this.logger.log(`${source.id}: page ${page} is entirely before cutoff ${cutoff.date}, stopping`);
        break;
      }
    }
    return rows;
  }

  private async requestWithRetry(url: URL, counter: { attempts: number }): Promise<unknown> {
    const { attempts } = this.config.retry;

    for (let attempt = 1; ; attempt++) {
      counter.attempts += 1;
      try {
        return await this.requestOnce(url);
      } catch (e) {
        const error = e instanceof FetchError ? e : FetchError.transient(errorMessage(e));
        if (error.kind === 'permanent' || attempt >= attempts) {
          throw error;
        }
        const delay = backoffDelay(attempt, this.config.retry);
        this.logger.warn(`${url.host}${url.pathname}: ${error.message}, retrying in ${delay}ms`);
        await this.sleep(delay);
      }
    }
  }

  private async requestOnce(url: URL): Promise<unknown> {
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.config.requestTimeoutMs);
    const timedOut = (): FetchError =>
      FetchError.transient(`Request timed out after ${this.config.requestTimeoutMs}ms`);

    // the timer covers the body read as well as the headers
    try {
      let response: Response;
      try {
        response = await fetch(url.toString(), {
          signal: controller.signal,
          headers: { Accept: 'application/json' },
        });
      } catch (e) {
        throw controller.signal.aborted ? timedOut() : FetchError.transient(errorMessage(e));
      }

      if (response.status >= 500 || response.status === 429) {
        throw FetchError.transient(`HTTP ${response.status}`, response.status);
      }
      if (!response.ok) {
        throw FetchError.permanent(`HTTP ${response.status}`, response.status);
      }

      if (controller.signal.aborted) throw timedOut();
      try {
        return await Promise.race([response.json(), rejectOnAbort(controller.signal)]);
      } catch (e) {
        if (controller.signal.aborted) throw timedOut();
        throw FetchError.transient(`Invalid JSON body: ${errorMessage(e)}`, response.status);
      }
    } finally {
      clearTimeout(timeout);
    }
  }
}
