import * as cheerio from 'cheerio';
import { FrontendReport, GateReport, MonetizationGateConfig, SiteInventory, SitePage } from '../types';
import { AD_SLOT_SELECTOR, DETAIL_TEMPLATE } from './site-inspector';
import { FindingList, buildGateReport, sample } from './gate_report';

export const CONVERSION_SELECTOR = '[data-conversion]';
const DISCLAIMER_CONTAINER = 'section, article, main';

export interface MonetizationInput {
  site: SiteInventory;
  frontend: FrontendReport;
  config: MonetizationGateConfig;
  disclaimerText: string;
  runId?: string | null;
  inputs?: Record<string, string | null>;
  now?: Date;
}

interface PagePlacement {
  slots: number[];
  firstHeading: number | null;
  conversions: number[];
  /** Conversion elements whose container lacks the disclaimer */
  undisclaimed: number;
  text: string;
}

/**
 * Document-order positions of the elements the placement rules look at
 */
export function placementOf(page: SitePage, disclaimerText: string): PagePlacement {
  const $ = cheerio.load(page.html);
  const all = $('*').toArray();
  const conversionEls = $(CONVERSION_SELECTOR).toArray();
  const firstHeading = $('h1').first().toArray()[0];

  const undisclaimed = conversionEls.filter((el) => {
    const closest = $(el).closest(DISCLAIMER_CONTAINER);
    const container = closest.length > 0 ? closest : $('body');
    return !container.text().includes(disclaimerText);
  }).length;

  return {
    slots: $(AD_SLOT_SELECTOR)
      .toArray()
      .map((el) => all.indexOf(el)),
    firstHeading: firstHeading ? all.indexOf(firstHeading) : null,
    conversions: conversionEls.map((el) => all.indexOf(el)),
    undisclaimed,
    text: $('body').text().replace(/\s+/g, ' '),
  };
}

function prohibitedSlots(placement: PagePlacement, config: MonetizationGateConfig): string[] {
  const problems: string[] = [];
  for (const slot of placement.slots) {
    if (config.forbidBeforeFirstHeading && (placement.firstHeading === null || slot < placement.firstHeading)) {
      problems.push('before first heading');
    }
    const between = placement.conversions.map((c) => Math.abs(c - slot) - 1);
    if (between.some((n) => n < config.minElementsFromConversion)) {
      problems.push('next to conversion element');
    }
  }
  return problems;
}

/**
 * Monetization Gate over the generated pages
 */
export function evaluateMonetization(input: MonetizationInput): GateReport {
  const { site, frontend, config } = input;
  const findings = new FindingList();
  const denylist = config.denylist.map((phrase) => phrase.toLowerCase());

  const detailPages = site.pages.filter((p) => p.template === DETAIL_TEMPLATE);
  if (detailPages.length === 0) {
    findings.hard('no_detail_pages', 'Site has no detail pages to monetize');
  }

  const dense: string[] = [];
  const misplaced: string[] = [];
  const undisclaimed: string[] = [];
  const risky: string[] = [];
  let totalSlots = 0;

  for (const page of site.pages) {
    totalSlots += page.adSlots.length;
    if (page.adSlots.length > config.maxSlotsPerPage) {
      dense.push(page.route);
    }

    const placement = placementOf(page, input.disclaimerText);
    const problems = prohibitedSlots(placement, config);
    if (problems.length > 0) {
      misplaced.push(`${page.route} (${[...new Set(problems)].join(', ')})`);
    }
    if (placement.undisclaimed > 0) {
      undisclaimed.push(page.route);
    }

    const text = placement.text.toLowerCase();
    const hits = denylist.filter((phrase) => text.includes(phrase));
    if (hits.length > 0) {
      risky.push(`${page.route} ("${hits.join('", "')}")`);
    }
  }

  if (dense.length > 0) {
    findings.hard('ad_density_exceeded', `${dense.length} page(s) above ${config.maxSlotsPerPage} ad slots`, sample(dense));
  }
  if (misplaced.length > 0) {
    findings.hard('ad_position_prohibited', `${misplaced.length} page(s) with ad slots in prohibited positions`, sample(misplaced));
  }
  if (undisclaimed.length > 0) {
    findings.hard(
      'trust_disclaimer_missing',
      `${undisclaimed.length} page(s) with a conversion element lacking the disclaimer`,
      sample(undisclaimed)
    );
  }
  if (risky.length > 0) {
    findings.hard('high_risk_wording', `${risky.length} page(s) with denylisted wording`, sample(risky));
  }

  for (const template of config.nonCriticalTemplates) {
    if ((frontend.templates[template] ?? 0) === 0) continue;
    const hasSlot = site.pages.some((p) => p.template === template && p.adSlots.length > 0);
    if (!hasSlot) {
      findings.soft('ad_slot_missing', `template '${template}' has no ad slot on any page`, template);
    }
  }

  for (const rec of config.rpmRecommendations.filter((r) => !r.applied)) {
    findings.soft('rpm_recommendation_unapplied', rec.description, rec.id);
  }

  return buildGateReport({
    gate: 'monetization',
    runId: input.runId ?? null,
    findings: findings.items,
    metrics: {
      pages: site.pages.length,
      detail_pages: detailPages.length,
      ad_slots: totalSlots,
      max_slots_per_page: site.pages.reduce((max, p) => Math.max(max, p.adSlots.length), 0),
    },
    inputs: input.inputs ?? {},
    now: input.now,
  });
}
