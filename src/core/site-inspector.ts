import * as fs from 'fs';
import * as path from 'path';
import * as cheerio from 'cheerio';
import {
  FrontendReport,
  GateDecision,
  SiteConfig,
  SiteInventory,
  SitePage,
} from '../types';

export const DETAIL_TEMPLATE = 'detail';
export const AD_SLOT_SELECTOR = '.ad-slot, ins.adsbygoogle';

function listHtmlFiles(dir: string): string[] {
  const out: string[] = [];
  for (const entry of fs.readdirSync(dir, { withFileTypes: true })) {
    const full = path.join(dir, entry.name);
    if (entry.isDirectory()) {
      out.push(...listHtmlFiles(full));
    } else if (entry.isFile() && entry.name.endsWith('.html')) {
      out.push(full);
    }
  }
  return out;
}

/**
 * "grants/a-1/index.html" -> "/grants/a-1/", "404.html" -> "/404.html"
 */
export function routeForFile(relativePath: string): string {
  const posix = relativePath.split(path.sep).join('/');
  if (posix === 'index.html') return '/';
  if (posix.endsWith('/index.html')) return `/${posix.slice(0, -'index.html'.length)}`;
  return `/${posix}`;
}

function templateForRoute(route: string): string {
  if (route === '/') return 'home';
  const first = route.split('/').filter(Boolean)[0] ?? 'page';
  return first.replace(/\.html$/, '');
}

/**
 * Parse one generated HTML page
 */
export function parsePage(html: string, route: string, file: string): SitePage {
  const $ = cheerio.load(html);
  const all = $('*').toArray();

  const robots = ($('meta[name="robots"]').attr('content') ?? '').toLowerCase();
  const openGraph: Record<string, string> = {};
  for (const el of $('meta[property^="og:"]').toArray()) {
    const property = $(el).attr('property');
    const content = ($(el).attr('content') ?? '').trim();
    if (property && content) openGraph[property] = content;
  }

  return {
    route,
    file,
    template: $('body').attr('data-template') ?? templateForRoute(route),
    indexable: !robots.includes('noindex'),
    title: $('title').first().text().trim(),
    description: ($('meta[name="description"]').attr('content') ?? '').trim(),
    canonical: $('link[rel="canonical"]').attr('href')?.trim() ?? null,
    openGraph,
    bytes: Buffer.byteLength(html, 'utf-8'),
    adSlots: $(AD_SLOT_SELECTOR)
      .toArray()
      .map((el) => ({ position: all.indexOf(el), id: $(el).attr('id') ?? null })),
    anchors: $('a[href]')
      .toArray()
      .map((el) => ({ text: $(el).text().replace(/\s+/g, ' ').trim(), href: $(el).attr('href') ?? '' })),
    html,
  };
}

function readSitemapUrls(siteDir: string, baseUrl: string, file: string, depth = 0): string[] | null {
  const filepath = path.join(siteDir, file);
  if (!fs.existsSync(filepath)) return null;

  const $ = cheerio.load(fs.readFileSync(filepath, 'utf-8'), { xml: true });
  const urls = $('urlset > url > loc')
    .toArray()
    .map((el) => $(el).text().trim());

  // sitemap index: follow children that live in this site directory
  if (depth === 0) {
    const base = baseUrl.replace(/\/+$/, '');
    for (const el of $('sitemapindex > sitemap > loc').toArray()) {
      const loc = $(el).text().trim();
      if (!loc.startsWith(`${base}/`)) continue;
      const child = readSitemapUrls(siteDir, baseUrl, loc.slice(base.length + 1), depth + 1);
      if (child) urls.push(...child);
    }
  }
  return urls;
}

function readRobots(siteDir: string): SiteInventory['robots'] {
  const filepath = path.join(siteDir, 'robots.txt');
  if (!fs.existsSync(filepath)) return { present: false, sitemapRefs: [] };

  const sitemapRefs = fs
    .readFileSync(filepath, 'utf-8')
    .split(/\r?\n/)
    .map((line) => /^\s*sitemap:\s*(\S+)/i.exec(line)?.[1])
    .filter((ref): ref is string => ref !== undefined);
  return { present: true, sitemapRefs };
}

/**
 * Read a generated site directory into what the gates check
 */
export function inspectSite(siteDir: string, baseUrl: string): SiteInventory {
  if (!fs.existsSync(siteDir)) {
    throw new Error(`Site directory not found: ${siteDir}`);
  }

  const pages = listHtmlFiles(siteDir)
    .map((file) => {
      const relative = path.relative(siteDir, file);
      return parsePage(fs.readFileSync(file, 'utf-8'), routeForFile(relative), relative);
    })
    .sort((a, b) => (a.route < b.route ? -1 : a.route > b.route ? 1 : 0));

  return {
    siteDir,
    baseUrl,
    pages,
    sitemapUrls: readSitemapUrls(siteDir, baseUrl, 'sitemap.xml'),
    robots: readRobots(siteDir),
  };
}

/**
 * Summarize the generated pages. Detail pages missing a required section make it a hard_fail.
 */
export function buildFrontendReport(inventory: SiteInventory, site: SiteConfig, now: Date = new Date()): FrontendReport {
  const templates: Record<string, number> = {};
  for (const page of inventory.pages) {
    templates[page.template] = (templates[page.template] ?? 0) + 1;
  }

  const missingSections = inventory.pages
    .filter((p) => p.template === DETAIL_TEMPLATE)
    .filter((p) => site.requiredDetailSections.some((fragment) => !p.html.includes(fragment)))
    .map((p) => p.route);

  return {
    schema: 'policy-pipeline.frontend_report.v1',
    decision: missingSections.length > 0 ? GateDecision.HardFail : GateDecision.Pass,
    total_pages: inventory.pages.length,
    indexable_pages: inventory.pages.filter((p) => p.indexable).length,
    templates,
    total_bytes: inventory.pages.reduce((sum, p) => sum + p.bytes, 0),
    max_page_bytes: inventory.pages.reduce((max, p) => Math.max(max, p.bytes), 0),
    missing_sections: missingSections,
    generated_at: now.toISOString(),
  };
}
