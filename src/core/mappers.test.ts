import { MapperRegistry, announcementUrl, createMapper, pickText } from './mappers';
import { makeSource } from '../../tests/helpers/fixtures';

describe('pickText', () => {
  it('should return the first non-empty value, trimmed', () => {
    expect(pickText({ a: '  ', b: ' value ', c: 'later' }, ['a', 'b', 'c'])).toBe('value');
    expect(pickText({ n: 7 }, ['n'])).toBe('7');
    expect(pickText({ o: { nested: true } }, ['o'])).toBeUndefined();
  });
});

describe('table mapping', () => {
  it('should map declared keys and read undeclared fields by name', () => {
    const mapper = createMapper(makeSource());
    const row = mapper({ id: 42, name: ' Youth Rent ', url: 'https://www.example.go.kr/42', region: 'Seoul' });

    expect(row.naturalKey).toBe('42');
    expect(row.fields).toEqual({
      title: 'Youth Rent',
      official_url: 'https://www.example.go.kr/42',
      region: 'Seoul',
    });
    expect(row.status).toBeUndefined();
  });

  it('should apply defaults and the fallback official URL', () => {
    const mapper = createMapper(
      makeSource({
        mapping: { kind: 'table', naturalKey: ['id'], fields: { title: ['name'] }, defaults: { region: '전국' } },
        fallbackOfficialUrl: 'https://www.example.go.kr',
      })
    );
    const row = mapper({ id: 'A-1', name: 'Rent support' });

    expect(row.fields.region).toBe('전국');
    expect(row.fields.official_url).toBe('https://www.example.go.kr');
  });

  it('should mark rows with status closed', () => {
    const mapper = createMapper(makeSource());
    expect(mapper({ id: 1, name: 'x', status: 'closed' }).status).toBe('closed');
    expect(mapper({ id: 1, name: 'x', status: 'open' }).status).toBeUndefined();
  });

  it('should have no natural key when the key column is empty', () => {
    const mapper = createMapper(makeSource());
    expect(mapper({ name: 'No id' }).naturalKey).toBeNull();
  });
});

describe('announcement mapping', () => {
  const source = makeSource({ id: 'announcements', mapping: { kind: 'announcement' } });

  it('should map registry columns to canonical fields', () => {
    const row = createMapper(source)({
      pbanc_sn: 1001,
      biz_pbanc_nm: 'Startup fund',
      detl_pg_url: 'www.k-startup.go.kr/detail?id=1001',
      pbanc_rcpt_bgng_dt: '20250801',
      pbanc_rcpt_end_dt: '20250831',
      sprv_inst: 'Ministry of SMEs',
      rcrt_prgs_yn: 'N',
    });

    expect(row.naturalKey).toBe('1001');
    expect(row.fields).toEqual({
      title: 'Startup fund',
      official_url: 'https://www.k-startup.go.kr/detail?id=1001',
      region: '전국',
      category: '창업',
      application_start: '20250801',
      application_end: '20250831',
      source_org: 'Ministry of SMEs',
    });
    expect(row.status).toBe('closed');
  });

  it('should keep rows that are still recruiting active', () => {
    const row = createMapper(source)({ pbanc_sn: 1, biz_pbanc_nm: 'x', rcrt_prgs_yn: 'y' });
    expect(row.status).toBeUndefined();
  });

  it('should leave absolute detail URLs unchanged', () => {
    expect(announcementUrl({ detl_pg_url: 'http://example.go.kr/a' })).toBe('http://example.go.kr/a');
    expect(announcementUrl({ biz_aply_url: '//apply.example.go.kr' })).toBe('https://apply.example.go.kr');
    expect(announcementUrl({})).toBeUndefined();
  });
});

describe('MapperRegistry', () => {
  it('should build one mapper per source', () => {
    const registry = new MapperRegistry([makeSource({ id: 'a' }), makeSource({ id: 'b' })]);
    expect(registry.has('a')).toBe(true);
    expect(registry.has('b')).toBe(true);
  });

  it('should throw for an unknown source', () => {
    const registry = new MapperRegistry();
    expect(() => registry.get('missing')).toThrow('No field mapping registered for source: missing');
  });
});
