import * as fs from 'fs';
import * as path from 'path';
import { CanonicalRecord, ChangeEntry, SiteConfig } from '../types';
import { Logger, defaultLogger, scoped } from './logger';

const HTML_ESCAPES: Record<string, string> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
  "'": '&#39;',
};

export function escapeHtml(value: string): string {
  return value.replace(/[&<>"']/g, (match) => HTML_ESCAPES[match] ?? match);
}

/**
 * Lowercase, word characters only, dash separated. "서울 청년_지원" -> "서울-청년-지원"
 */
export function slugify(value: string): string {
  const slug = value
    .trim()
    .toLowerCase()
    .replace(/[^\p{L}\p{N}_\s-]/gu, '')
    .replace(/[\s_]+/g, '-')
    .replace(/-+/g, '-')
    .replace(/^-|-$/g, '');
  return slug || 'unknown';
}

/**
 * Slug per value; values whose slugs collide get -2, -3, ... in input order
 */
function uniqueSlugs(values: string[]): Map<string, string> {
  const used = new Set<string>();
  const slugs = new Map<string, string>();
  for (const value of values) {
    const slug = slugify(value);
    let candidate = slug;
    for (let n = 2; used.has(candidate); n++) {
      candidate = `${slug}-${n}`;
    }
    used.add(candidate);
    slugs.set(value, candidate);
  }
  return slugs;
}

export interface GenerateOptions {
  baseUrl: string;
  changes?: ChangeEntry[];
}

export interface GeneratedSite {
  siteDir: string;
  pages: number;
  sitemapUrls: string[];
}

/**
 * Renders the static site for a canonical dataset
 */
export interface PageGenerator {
  generate(records: CanonicalRecord[], siteDir: string, options: GenerateOptions): GeneratedSite;
}

interface PageMeta {
  title: string;
  description: string;
  canonical: string | null;
  template: string;
  indexable?: boolean;
}

interface ListingGroup {
  route: 'category' | 'region';
  label: string;
  field: 'category' | 'region';
  fallback: string;
}

const LISTING_GROUPS: ListingGroup[] = [
  { route: 'category', label: '분야', field: 'category', fallback: '기타' },
  { route: 'region', label: '지역', field: 'region', fallback: '전국' },
];

const CHANGE_LABELS: Record<ChangeEntry['change_type'], string> = {
  created: '신규',
  updated: '변경',
  unchanged: '유지',
  closed: '종료',
};

/**
 * Writes detail pages, category/region listings, home, updates, 404, sitemap.xml and robots.txt.
 * Output depends only on the records, changes and base URL.
 */
export class StaticSiteGenerator implements PageGenerator {
  private readonly site: SiteConfig;
  private readonly logger: Logger;

  constructor(site: SiteConfig, logger: Logger = defaultLogger) {
    this.site = site;
    this.logger = scoped('generate', logger);
  }

  generate(records: CanonicalRecord[], siteDir: string, options: GenerateOptions): GeneratedSite {
    const base = options.baseUrl.replace(/\/+$/, '');
    fs.rmSync(siteDir, { recursive: true, force: true });
    fs.mkdirSync(siteDir, { recursive: true });

    const sitemap = new Set<string>();
    let pages = 0;
    const write = (route: string, meta: PageMeta, body: string): void => {
      const file = route === '/' ? 'index.html' : route.endsWith('/') ? `${route.slice(1)}index.html` : route.slice(1);
      const target = path.join(siteDir, file);
      fs.mkdirSync(path.dirname(target), { recursive: true });
      fs.writeFileSync(target, this.layout(meta, body));
      pages += 1;
      if (meta.indexable !== false && meta.canonical) sitemap.add(meta.canonical);
    };

    const active = records.filter((r) => r.status === 'active' && r.title && r.official_url);
    const slugs = uniqueSlugs(active.map((r) => r.policy_id));

    for (const record of active) {
      const route = `/grants/${slugs.get(record.policy_id)}/`;
      write(route, this.detailMeta(record, `${base}${route}`), this.detailBody(record));
    }

    const listingLinks: string[] = [];
    for (const group of LISTING_GROUPS) {
      const buckets = new Map<string, CanonicalRecord[]>();
      for (const record of active) {
        const value = record[group.field] ?? group.fallback;
        buckets.set(value, [...(buckets.get(value) ?? []), record]);
      }
      const values = [...buckets.keys()].sort();
      const valueSlugs = uniqueSlugs(values);
      for (const value of values) {
        const route = `/grants/${group.route}/${valueSlugs.get(value)}/`;
        const items = buckets.get(value) ?? [];
        write(
          route,
          {
            title: `${value} ${group.label} 정책 모음`,
            description: `${value} ${group.label}의 지원 정책 ${items.length}건을 신청기간과 함께 정리했습니다.`,
            canonical: `${base}${route}`,
            template: group.route,
          },
          `<h1>${escapeHtml(value)} ${group.label} 정책</h1>
<aside class="ad-slot" id="ad-${group.route}"></aside>
<ul class="link-list">
${items.map((r) => this.recordLink(r, slugs)).join('\n')}
</ul>`
        );
        listingLinks.push(`<li><a href="${escapeHtml(route)}">${escapeHtml(value)} ${group.label} 정책</a></li>`);
      }
    }

    const changes = (options.changes ?? []).filter((c) => c.change_type !== 'unchanged');
    write(
      '/updates/',
      {
        title: '최근 변경된 지원 정책',
        description: `신규, 변경, 종료된 지원 정책 ${changes.length}건의 목록입니다.`,
        canonical: `${base}/updates/`,
        template: 'updates',
      },
      `<h1>최근 변경사항</h1>
<ul class="link-list">
${changes
  .map((c) => {
    const label = `${c.title ?? c.policy_id} · ${CHANGE_LABELS[c.change_type]}`;
    const slug = slugs.get(c.policy_id);
    return slug ? `<li><a href="/grants/${escapeHtml(slug)}/">${escapeHtml(label)}</a></li>` : `<li>${escapeHtml(label)}</li>`;
  })
  .join('\n')}
</ul>`
    );

    write(
      '/',
      {
        title: '정부 지원 정책 한눈에 보기',
        description: `신청 가능한 정부 지원 정책 ${active.length}건을 분야와 지역별로 확인하세요.`,
        canonical: `${base}/`,
        template: 'home',
      },
      `<h1>정부 지원 정책</h1>
<nav class="listing-nav"><ul>
${listingLinks.join('\n')}
<li><a href="/updates/">최근 변경사항</a></li>
</ul></nav>
<ul class="link-list">
${active.map((r) => this.recordLink(r, slugs)).join('\n')}
</ul>`
    );

    write(
      '/404.html',
      { title: '페이지를 찾을 수 없습니다', description: '', canonical: null, template: 'error', indexable: false },
      '<h1>페이지를 찾을 수 없습니다</h1>\n<p><a href="/">홈으로 이동</a></p>'
    );

    const sitemapUrls = [...sitemap].sort();
    fs.writeFileSync(
      path.join(siteDir, 'sitemap.xml'),
      [
        '<?xml version="1.0" encoding="UTF-8"?>',
        '<urlset xmlns="http://www.sitemaps.org/schemas/sitemap/0.9">',
        ...sitemapUrls.map((u) => `  <url><loc>${escapeHtml(u)}</loc></url>`),
        '</urlset>',
        '',
      ].join('\n')
    );
    fs.writeFileSync(path.join(siteDir, 'robots.txt'), `User-agent: *\nAllow: /\nSitemap: ${base}/sitemap.xml\n`);

    this.logger.log(`${pages} page(s), ${sitemapUrls.length} sitemap URL(s) in ${siteDir}`);
    return { siteDir, pages, sitemapUrls };
  }

  /**
   * policy_id -> slug, suffixed on collision; records arrive sorted by policy_id
   */
  private recordLink(record: CanonicalRecord, slugs: Map<string, string>): string {
    return `<li><a href="/grants/${escapeHtml(slugs.get(record.policy_id) ?? '')}/">${escapeHtml(record.title ?? record.policy_id)}</a></li>`;
  }

  private detailMeta(record: CanonicalRecord, canonical: string): PageMeta {
    const title = record.title ?? record.policy_id;
    return {
      title,
      description: `${title}: ${record.target_group ?? '일반'} 대상 ${record.category ?? '기타'} 정책. 신청기간, 조건, 방법을 한 번에 확인.`,
      canonical,
      template: 'detail',
    };
  }

  private detailBody(record: CanonicalRecord): string {
    const text = (value: string | undefined, fallback: string): string => escapeHtml(value ?? fallback);
    const period =
      record.application_start || record.application_end
        ? `${record.application_start ?? ''} ~ ${record.application_end ?? ''}`
        : '공고문 참고';
    const officialUrl = escapeHtml(record.official_url ?? '');

    return `<article class="policy-post">
<header class="post-header">
<p class="kicker">${text(record.category, '기타')}</p>
<h1>${text(record.title ?? undefined, record.policy_id)}</h1>
<p class="meta-line">${text(record.region, '전국')} · ${text(record.target_group, '일반')}</p>
</header>
<section data-section="summary"><h2>핵심 요약</h2><p>${text(record.benefit_text, '공고문 참고')}</p></section>
<section data-section="eligibility"><h2>지원 대상</h2><p>${text(record.eligibility_text, '공고문 참고')}</p></section>
<section data-section="period"><h2>신청 기간</h2><p>${escapeHtml(period)}</p></section>
<aside class="ad-slot" id="ad-detail"></aside>
<section data-section="official-source"><h2>공식 출처</h2>
<p><a data-conversion href="${officialUrl}" rel="noopener noreferrer" target="_blank">${officialUrl}</a></p>
<p class="notice">본 사이트는 ${escapeHtml(this.site.disclaimerText)}, 신청 전 원문 공고를 확인하세요.</p>
</section>
<section data-section="last-checked"><h2>최종 확인 시각</h2><p>${text(record.last_checked_at ?? undefined, '확인 전')}</p></section>
<section data-section="disclaimer"><h2>안내</h2><p>본 사이트는 ${escapeHtml(this.site.disclaimerText)}, 최종 신청 및 자격 판단은 반드시 원문 공고를 확인하세요.</p></section>
<nav class="related"><ul><li><a href="/updates/">최근 변경사항 보기</a></li><li><a href="/">다른 정책 더 보기</a></li></ul></nav>
</article>`;
  }

  private layout(meta: PageMeta, body: string): string {
    const head = [
      '<meta charset="utf-8">',
      '<meta name="viewport" content="width=device-width, initial-scale=1">',
      `<title>${escapeHtml(meta.title)}</title>`,
      `<meta name="description" content="${escapeHtml(meta.description)}">`,
    ];
    if (meta.indexable === false) {
      head.push('<meta name="robots" content="noindex">');
    }
    if (meta.canonical) {
      head.push(
        `<link rel="canonical" href="${escapeHtml(meta.canonical)}">`,
        `<meta property="og:type" content="${meta.template === 'detail' ? 'article' : 'website'}">`,
        `<meta property="og:title" content="${escapeHtml(meta.title)}">`,
        `<meta property="og:description" content="${escapeHtml(meta.description)}">`,
        `<meta property="og:url" content="${escapeHtml(meta.canonical)}">`
      );
    }
    if (this.site.adClient) {
      head.push(
        `<script async src="https://pagead2.googlesyndication.com/pagead/js/adsbygoogle.js?client=${encodeURIComponent(this.site.adClient)}" crossorigin="anonymous"></script>`
      );
    }

    return `<!doctype html>
<html lang="ko">
<head>
${head.join('\n')}
</head>
<body data-template="${escapeHtml(meta.template)}">
<header class="site-header"><a class="brand" href="/">정책 지원 안내</a></header>
<main>
${body}
</main>
<footer class="site-footer"><p>본 사이트는 ${escapeHtml(this.site.disclaimerText)}, 각 정책의 공식 출처를 함께 표기합니다.</p></footer>
</body>
</html>
`;
  }
}
