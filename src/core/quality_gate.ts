import { CanonicalRecord, GateReport, QualityGateConfig, SiteInventory, SitePage } from '../types';
import { isAbsoluteHttpUrl } from './canonical_store';
import { DETAIL_TEMPLATE } from './site-inspector';
import { FindingList, buildGateReport, ratio, sample } from './gate_report';

export interface QualityInput {
  canonical: CanonicalRecord[];
  previous?: CanonicalRecord[] | null;
  site: SiteInventory;
  config: QualityGateConfig;
  /** Fragments every detail page must contain */
  requiredSections?: string[];
  runId?: string | null;
  inputs?: Record<string, string | null>;
  now?: Date;
}

function isBlank(value: unknown): boolean {
  return value === null || value === undefined || (typeof value === 'string' && value.trim() === '');
}

/**
 * Share of values that repeat an earlier value
 */
export function duplicateRatio(values: string[]): number {
  return ratio(values.length - new Set(values).size, values.length);
}

function titleDuplicateRatio(records: CanonicalRecord[]): number {
  const titles = records
    .map((r) => (r.title ?? '').toLowerCase().replace(/\s+/g, ' ').trim())
    .filter((t) => t !== '');
  return duplicateRatio(titles);
}

/**
 * Absolute URL a page is expected under: base URL + route
 */
export function pageUrl(baseUrl: string, route: string): string {
  return `${baseUrl.replace(/\/+$/, '')}${route}`;
}

function isInternalHref(href: string, baseUrl: string): boolean {
  if (href.startsWith('/') && !href.startsWith('//')) return true;
  return href.startsWith(baseUrl.replace(/\/+$/, ''));
}

function checkData(findings: FindingList, metrics: Record<string, number>, input: QualityInput): void {
  const { canonical: records, config } = input;
  const total = records.length;
  metrics.rows = total;

  if (total === 0) {
    findings.hard('canonical_dataset_empty', 'Canonical dataset has no rows');
    return;
  }

  const missingUrl = records.filter((r) => isBlank(r.official_url)).map((r) => r.policy_id);
  if (missingUrl.length > 0) {
    findings.hard('official_url_missing', `${missingUrl.length} row(s) without official_url`, sample(missingUrl));
  }

  for (const field of config.requiredFields) {
    const nullRatio = ratio(records.filter((r) => isBlank(r[field])).length, total);
    metrics[`null_ratio.${field}`] = nullRatio;
    if (nullRatio > config.maxNullRatio) {
      findings.hard(
        'required_field_null_ratio',
        `${field} null ratio ${nullRatio.toFixed(4)} exceeds ${config.maxNullRatio}`,
        field
      );
    }
  }

  const dupIdRatio = duplicateRatio(records.map((r) => r.policy_id));
  metrics.duplicate_id_ratio = dupIdRatio;
  if (dupIdRatio > config.maxDuplicateIdRatio) {
    findings.hard('duplicate_id_ratio', `duplicate policy_id ratio ${dupIdRatio.toFixed(4)} exceeds ${config.maxDuplicateIdRatio}`);
  }

  const broken = records
    .filter((r) => !isBlank(r.official_url) && !isAbsoluteHttpUrl(r.official_url))
    .map((r) => r.policy_id);
  const brokenRatio = ratio(broken.length, total);
  metrics.broken_link_ratio = brokenRatio;
  if (brokenRatio > config.maxBrokenLinkRatio) {
    findings.hard(
      'broken_link_ratio',
      `non-http(s) official_url ratio ${brokenRatio.toFixed(4)} exceeds ${config.maxBrokenLinkRatio}`,
      sample(broken)
    );
  }

  const previous = input.previous ?? [];
  if (previous.length > 0) {
    const drop = (previous.length - total) / previous.length;
    metrics.volume_drop_ratio = Math.max(drop, 0);
    if (drop > config.maxVolumeDropRatio) {
      findings.soft('record_volume_drop', `row count fell from ${previous.length} to ${total}`);
    }

    const current = titleDuplicateRatio(records);
    const before = titleDuplicateRatio(previous);
    metrics.duplicate_title_ratio = current;
    if (current - before > config.maxDuplicateTrendDelta) {
      findings.soft(
        'duplicate_trend_rising',
        `duplicate title ratio rose from ${before.toFixed(4)} to ${current.toFixed(4)}`
      );
    }
  }
}

function checkPages(findings: FindingList, metrics: Record<string, number>, input: QualityInput): void {
  const { site, config } = input;
  const indexable = site.pages.filter((p) => p.indexable);
  const base = site.baseUrl.replace(/\/+$/, '');
  metrics.pages = site.pages.length;
  metrics.indexable_pages = indexable.length;

  const routes = (pages: SitePage[]): string[] => pages.map((p) => p.route);

  const noCanonical = indexable.filter((p) => !p.canonical);
  if (noCanonical.length > 0) {
    findings.hard('page_missing_canonical', `${noCanonical.length} page(s) without canonical link`, sample(routes(noCanonical)));
  }
  const noTitle = indexable.filter((p) => p.title === '');
  if (noTitle.length > 0) {
    findings.hard('page_empty_title', `${noTitle.length} page(s) with empty title`, sample(routes(noTitle)));
  }
  const noDescription = indexable.filter((p) => p.description === '');
  if (noDescription.length > 0) {
    findings.hard(
      'page_empty_description',
      `${noDescription.length} page(s) with empty meta description`,
      sample(routes(noDescription))
    );
  }

  const malformed = indexable.filter(
    (p) => p.canonical !== null && (!isAbsoluteHttpUrl(p.canonical) || !(p.canonical === base || p.canonical.startsWith(`${base}/`)))
  );
  if (malformed.length > 0) {
    findings.hard(
      'canonical_url_malformed',
      `${malformed.length} canonical URL(s) relative or outside ${base}`,
      sample(routes(malformed))
    );
  }

  if (site.sitemapUrls === null) {
    findings.hard('sitemap_coverage_missing', 'sitemap.xml is missing');
  } else {
    const listed = new Set(site.sitemapUrls);
    const unlisted = indexable.filter((p) => !listed.has(p.canonical ?? pageUrl(base, p.route)));
    metrics.sitemap_urls = site.sitemapUrls.length;
    if (unlisted.length > 0) {
      findings.hard(
        'sitemap_coverage_missing',
        `${unlisted.length} indexable page(s) not in sitemap`,
        sample(routes(unlisted))
      );
    }
  }

  if (!site.robots.present) {
    findings.hard('robots_sitemap_missing', 'robots.txt is missing');
  } else if (site.robots.sitemapRefs.length === 0) {
    findings.hard('robots_sitemap_missing', 'robots.txt has no Sitemap: line');
  }

  const fragments = input.requiredSections ?? [];
  if (fragments.length > 0) {
    const incomplete = site.pages.filter(
      (p) => p.template === DETAIL_TEMPLATE && fragments.some((f) => !p.html.includes(f))
    );
    if (incomplete.length > 0) {
      findings.hard(
        'required_sections_missing',
        `${incomplete.length} detail page(s) missing required sections`,
        sample(routes(incomplete))
      );
    }
  }

  const overBudget = site.pages.filter((p) => p.bytes > config.performance.maxPageBytes);
  const overRatio = ratio(overBudget.length, site.pages.length);
  metrics.over_budget_ratio = overRatio;
  if (overRatio > config.performance.maxOverBudgetRatio) {
    findings.hard(
      'performance_budget_exceeded',
      `${overBudget.length} page(s) above ${config.performance.maxPageBytes} bytes`,
      sample(routes(overBudget))
    );
  }

  const titleDup = duplicateRatio(indexable.map((p) => p.title).filter((t) => t !== ''));
  const descDup = duplicateRatio(indexable.map((p) => p.description).filter((d) => d !== ''));
  metrics.duplicate_page_title_ratio = titleDup;
  metrics.duplicate_page_description_ratio = descDup;
  if (Math.max(titleDup, descDup) > config.maxDuplicateMetaRatio) {
    findings.soft(
      'duplicate_meta_ratio',
      `duplicate title/description ratio ${Math.max(titleDup, descDup).toFixed(4)} exceeds ${config.maxDuplicateMetaRatio}`
    );
  }

  const keyPages = site.pages.filter((p) => config.openGraph.keyTemplates.includes(p.template));
  const withoutOg = keyPages.filter((p) => config.openGraph.requiredTags.some((tag) => !p.openGraph[tag]));
  if (withoutOg.length > 0) {
    findings.soft('open_graph_missing', `${withoutOg.length} key page(s) missing Open Graph tags`, sample(routes(withoutOg)));
  }

  const internal = site.pages.flatMap((p) => p.anchors).filter((a) => isInternalHref(a.href, base));
  const generic = new Set(config.anchors.genericPhrases.map((g) => g.toLowerCase()));
  const genericCount = internal.filter((a) => a.text === '' || generic.has(a.text.toLowerCase())).length;
  const genericRatio = ratio(genericCount, internal.length);
  metrics.internal_anchors = internal.length;
  metrics.generic_anchor_ratio = genericRatio;
  if (internal.length >= config.anchors.minAnchors && genericRatio > config.anchors.maxGenericRatio) {
    findings.soft(
      'low_quality_anchors',
      `generic anchor ratio ${genericRatio.toFixed(4)} exceeds ${config.anchors.maxGenericRatio}`
    );
  }
}

/**
 * Quality Gate over the canonical dataset and the generated pages
 */
export function evaluateQuality(input: QualityInput): GateReport {
  const findings = new FindingList();
  const metrics: Record<string, number> = {};

  checkData(findings, metrics, input);
  checkPages(findings, metrics, input);

  return buildGateReport({
    gate: 'quality',
    runId: input.runId ?? null,
    findings: findings.items,
    metrics,
    inputs: input.inputs ?? {},
    now: input.now,
  });
}
