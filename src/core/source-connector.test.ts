import * as fs from 'fs';
import * as path from 'path';
import {
  SourceConnector,
  backoffDelay,
  buildRequestUrl,
  isOlderThanCutoff,
  readItems,
} from './source-connector';
import { RawSnapshotStore } from './raw_snapshot_store';
import { FetchError, SnapshotExistsError } from './errors';
import { FetchConfig, PaginationConfig, SourceDescriptor, SourceTier } from '../types';
import {
  RecordingLogger,
  jsonResponse,
  makeSnapshot,
  makeSource,
  makeTempDir,
  removeDir,
  writeFiles,
} from '../../tests/helpers/fixtures';

const paging: PaginationConfig = {
  mode: 'page',
  pageParam: 'page',
  sizeParam: 'perPage',
  startPage: 1,
  maxPages: 10,
  pageSize: 2,
  countPath: 'currentCount',
};

const fetchConfig: FetchConfig = {
  requestTimeoutMs: 1000,
  retry: { attempts: 3, baseDelayMs: 10, maxDelayMs: 15 },
};

function pageOf(url: string): number {
  return Number(new URL(url).searchParams.get('page'));
}

describe('request building', () => {
  const env = { POLICY_API_KEY: 'test-secret' };

  it('should fill URL templates and append the credential', () => {
    const source = makeSource({
      endpoint: 'https://api.example.test/list?page={page}&perPage={pageSize}',
      pagination: { ...paging, pageSize: 50 },
      auth: { type: 'query_key', envKey: 'POLICY_API_KEY', paramName: 'serviceKey' },
    });

    expect(buildRequestUrl(source, 3, env).toString()).toBe(
      'https://api.example.test/list?page=3&perPage=50&serviceKey=test-secret'
    );
  });

  it('should put paging into query parameters when the endpoint has no template', () => {
    const source = makeSource({
      endpoint: 'https://api.example.test/list',
      params: { returnType: 'json' },
      pagination: paging,
    });

    expect(buildRequestUrl(source, 2, env).toString()).toBe(
      'https://api.example.test/list?returnType=json&page=2&perPage=2'
    );
  });

  it('should fail permanently without the credential', () => {
    const source = makeSource({ auth: { type: 'query_key', envKey: 'POLICY_API_KEY', paramName: 'serviceKey' } });

    expect(() => buildRequestUrl(source, 1, {})).toThrow(new FetchError('Missing secret env: POLICY_API_KEY', 'permanent'));
  });

  it('should grow the backoff exponentially up to the cap', () => {
    const retry = { attempts: 5, baseDelayMs: 400, maxDelayMs: 1000 };
    expect([1, 2, 3, 4].map((n) => backoffDelay(n, retry))).toEqual([400, 800, 1000, 1000]);
  });

  it('should read items at a dot path and drop non-object rows', () => {
    expect(readItems({ response: { body: { items: [{ a: 1 }, 'x', null] } } }, 'response.body.items')).toEqual([{ a: 1 }]);
    expect(readItems({ data: {} }, 'data')).toEqual([]);
  });

  it('should compare cutoff dates on the configured field', () => {
    const cutoff = { field: 'opens', date: '2025-07-01' };
    expect(isOlderThanCutoff({ opens: '20250630' }, cutoff)).toBe(true);
    expect(isOlderThanCutoff({ opens: '2025-07-01' }, cutoff)).toBe(false);
    expect(isOlderThanCutoff({}, cutoff)).toBe(false);
  });
});

describe('SourceConnector', () => {
  let artifactsDir: string;
  let store: RawSnapshotStore;
  let sleep: jest.Mock;
  let logger: RecordingLogger;
  const originalFetch = global.fetch;

  function connector(overrides: Partial<FetchConfig> = {}): SourceConnector {
    return new SourceConnector({
      fetch: { ...fetchConfig, ...overrides },
      store,
      baseDir: artifactsDir,
      logger,
      env: { POLICY_API_KEY: 'test-secret' },
      sleep,
      now: () => new Date('2025-07-02T00:00:00.000Z'),
    });
  }

  beforeEach(() => {
    artifactsDir = makeTempDir('source-connector-test-');
    store = new RawSnapshotStore(artifactsDir);
    sleep = jest.fn().mockResolvedValue(undefined);
    logger = new RecordingLogger();
  });

  afterEach(() => {
    global.fetch = originalFetch;
    removeDir(artifactsDir);
  });

  it('should page until the count is zero', async () => {
    global.fetch = jest.fn().mockImplementation(async (url: string) => {
      const page = pageOf(url);
      const items = page === 1 ? [{ id: 1 }, { id: 2 }] : page === 2 ? [{ id: 3 }] : [];
      return jsonResponse({ currentCount: items.length, data: items });
    });

    const { snapshot, report } = await connector().fetchSource(makeSource({ pagination: paging }), 'run-1');

    expect(snapshot.items).toEqual([{ id: 1 }, { id: 2 }, { id: 3 }]);
    expect(snapshot.status).toBe('ok');
    expect(report).toEqual({
      source_id: 'registry',
      tier: SourceTier.Primary,
      ok: true,
      rows: 3,
      pages: 3,
      attempts: 3,
      failure: null,
      error: null,
      snapshot_path: path.join(artifactsDir, 'runs', 'run-1', 'raw', 'registry.json'),
    });
    expect(global.fetch).toHaveBeenCalledTimes(3);
  });

  it('should stop at maxPages', async () => {
    global.fetch = jest.fn().mockImplementation(async (url: string) =>
      jsonResponse({ currentCount: 1, data: [{ id: pageOf(url) }] })
    );

    const { report } = await connector().fetchSource(makeSource({ pagination: { ...paging, maxPages: 2 } }), 'run-1');

    expect(report.pages).toBe(2);
    expect(global.fetch).toHaveBeenCalledTimes(2);
  });

  it('should stop once a whole page is older than the cutoff', async () => {
    global.fetch = jest.fn().mockImplementation(async (url: string) => {
      const page = pageOf(url);
      const items = page === 1 ? [{ id: 1, opens: '20250705' }, { id: 2, opens: '20250620' }] : [{ id: 3, opens: '20250610' }];
      return jsonResponse({ currentCount: items.length, data: items });
    });
    const source = makeSource({ pagination: paging, cutoff: { field: 'opens', date: '2025-07-01' } });

    const { snapshot } = await connector().fetchSource(source, 'run-1');

    expect(global.fetch).toHaveBeenCalledTimes(2);
    expect(snapshot.items.map((item) => item.id)).toEqual([1, 2, 3]);
  });

  it('should retry transient failures with backoff', async () => {
    global.fetch = jest
      .fn()
      .mockResolvedValueOnce(new Response('busy', { status: 503 }))
      .mockResolvedValueOnce(new Response('slow down', { status: 429 }))
      .mockResolvedValueOnce(jsonResponse({ data: [{ id: 1 }] }));

    const { report } = await connector().fetchSource(makeSource(), 'run-1');

    expect(report.ok).toBe(true);
    expect(report.attempts).toBe(3);
    expect(sleep.mock.calls).toEqual([[10], [15]]);
  });

  it('should give up after the last attempt and still write a snapshot', async () => {
    global.fetch = jest.fn().mockImplementation(async () => new Response('down', { status: 500 }));

    const { snapshot, report } = await connector().fetchSource(makeSource(), 'run-1');

    expect(report).toMatchObject({ ok: false, attempts: 3, failure: 'transient', error: 'HTTP 500', rows: 0 });
    expect(snapshot).toMatchObject({ status: 'failed', error: 'HTTP 500', items: [] });
    expect(store.load('run-1', 'registry')).toEqual(snapshot);
    expect(logger.warnings).toContain('[fetch] registry: failed (transient) after 3 attempt(s): HTTP 500');
  });

  it('should not retry client errors', async () => {
    global.fetch = jest.fn().mockResolvedValue(new Response('not found', { status: 404 }));

    const { report } = await connector().fetchSource(makeSource(), 'run-1');

    expect(report).toMatchObject({ ok: false, attempts: 1, failure: 'permanent', error: 'HTTP 404' });
    expect(sleep).not.toHaveBeenCalled();
  });

  it('should retry network errors', async () => {
    global.fetch = jest
      .fn()
      .mockRejectedValueOnce(new TypeError('fetch failed'))
      .mockResolvedValueOnce(jsonResponse({ data: [{ id: 1 }] }));

    const { report } = await connector().fetchSource(makeSource(), 'run-1');

    expect(report).toMatchObject({ ok: true, attempts: 2, rows: 1 });
  });

  it('should treat an unparseable body as transient', async () => {
    global.fetch = jest.fn().mockImplementation(async () => new Response('<html>maintenance</html>', { status: 200 }));

    const { report } = await connector().fetchSource(makeSource(), 'run-1');

    expect(report.failure).toBe('transient');
    expect(report.attempts).toBe(3);
    expect(report.error).toMatch(/^Invalid JSON body: /);
  });

  it('should abort requests that exceed the timeout', async () => {
    global.fetch = jest.fn().mockImplementation(
      (_url: string, init?: RequestInit) =>
        new Promise((_resolve, reject) => {
          init?.signal?.addEventListener('abort', () => reject(new Error('aborted')));
        })
    );

    const { report } = await connector({ requestTimeoutMs: 20, retry: { attempts: 1, baseDelayMs: 10, maxDelayMs: 10 } }).fetchSource(
      makeSource(),
      'run-1'
    );

    expect(report).toMatchObject({ ok: false, failure: 'transient', error: 'Request timed out after 20ms' });
  });

  it('should time out a response body that never completes', async () => {
    global.fetch = jest.fn().mockImplementation(() =>
      Promise.resolve({ ok: true, status: 200, json: () => new Promise(() => undefined) })
    );

    const { report } = await connector({ requestTimeoutMs: 20, retry: { attempts: 1, baseDelayMs: 10, maxDelayMs: 10 } }).fetchSource(
      makeSource(),
      'run-1'
    );

    expect(report).toMatchObject({ ok: false, failure: 'transient', error: 'Request timed out after 20ms', attempts: 1 });
  });

  it('should fail a source without its credential before any request', async () => {
    global.fetch = jest.fn();
    const source = makeSource({ auth: { type: 'query_key', envKey: 'OTHER_API_KEY', paramName: 'serviceKey' } });

    const { report } = await connector().fetchSource(source, 'run-1');

    expect(report).toMatchObject({ ok: false, attempts: 0, failure: 'permanent', error: 'Missing secret env: OTHER_API_KEY' });
    expect(global.fetch).not.toHaveBeenCalled();
  });

  it('should read file sources relative to the base directory', async () => {
    writeFiles(artifactsDir, { 'fixtures/policies.json': JSON.stringify({ data: [{ id: 'F-1' }, { id: 'F-2' }] }) });
    const source = makeSource({ id: 'fixtures', kind: 'file_json', tier: SourceTier.Fallback, endpoint: 'fixtures/policies.json' });

    const { snapshot, report } = await connector().fetchSource(source, 'run-1');

    expect(snapshot.items).toEqual([{ id: 'F-1' }, { id: 'F-2' }]);
    expect(report).toMatchObject({ ok: true, rows: 2, pages: 1, attempts: 1 });
  });

  it('should fail a missing file source permanently', async () => {
    const source = makeSource({ id: 'fixtures', kind: 'file_json', endpoint: 'missing.json' });

    const { report } = await connector().fetchSource(source, 'run-1');

    expect(report.failure).toBe('permanent');
    expect(report.error).toBe(`Source file not found: ${path.join(artifactsDir, 'missing.json')}`);
  });

  describe('fetchAll', () => {
    const sources: SourceDescriptor[] = [
      makeSource({ id: 'registry' }),
      makeSource({ id: 'broken', endpoint: 'https://broken.example.test/policies' }),
      makeSource({ id: 'disabled', enabled: false }),
    ];

    it('should let every enabled source finish when one fails', async () => {
      global.fetch = jest.fn().mockImplementation(async (url: string) =>
        url.startsWith('https://broken.example.test') ? new Response('gone', { status: 410 }) : jsonResponse({ data: [{ id: 1 }] })
      );

      const results = await connector().fetchAll(sources, 'run-1');

      expect(results.map((r) => [r.report.source_id, r.report.ok])).toEqual([
        ['registry', true],
        ['broken', false],
      ]);
      expect(store.list('run-1').map((s) => s.source_id)).toEqual(['broken', 'registry']);
    });

    it('should rethrow storage errors after all sources settled', async () => {
      global.fetch = jest.fn().mockImplementation(async () => jsonResponse({ data: [] }));
      store.save(makeSnapshot({ source_id: 'registry', run_id: 'run-1' }));

      await expect(connector().fetchAll(sources, 'run-1')).rejects.toThrow(SnapshotExistsError);
      expect(fs.existsSync(store.pathFor('run-1', 'broken'))).toBe(true);
    });
  });
});
