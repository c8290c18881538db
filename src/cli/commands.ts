import * as fs from 'fs';
import { FrontendReport, GateReport, PipelineConfig, RunRecord, RunStatus } from '../types';
import { readCanonicalFile } from '../core/canonical_store';
import { readJson } from '../core/artifact_writer';
import { FrontendReportSchema, validateAgainst } from '../core/schemas';
import { buildFrontendReport, inspectSite } from '../core/site-inspector';
import { evaluateQuality } from '../core/quality_gate';
import { evaluateMonetization } from '../core/monetization_gate';

/**
 * Reasons that mean the run broke, as opposed to being stopped by a gate
 */
const ERROR_REASONS = ['unexpected_error', 'deploy_unconfirmed'];

/**
 * Exit code of `run`: 0 when the run closed normally, 2 when a gate or a fatal
 * data condition stopped it, 1 when it failed for any other reason.
 */
export function runExitCode(record: RunRecord): number {
  if (record.status === RunStatus.Success || record.status === RunStatus.DeploySkipped) return 0;
  if (record.error !== null || record.reasons.some((r) => ERROR_REASONS.includes(r))) return 1;
  return 2;
}

export type PreflightProfile = 'refresh' | 'deploy' | 'all';

export const PREFLIGHT_PROFILES: PreflightProfile[] = ['refresh', 'deploy', 'all'];

export function isPreflightProfile(value: string): value is PreflightProfile {
  return PREFLIGHT_PROFILES.some((p) => p === value);
}

export interface PreflightResult {
  missing: string[];
  warnings: string[];
}

/**
 * Environment variables a profile needs before it can run
 */
export function preflight(config: PipelineConfig, env: NodeJS.ProcessEnv, profile: PreflightProfile): PreflightResult {
  const required = new Set<string>();
  if (profile === 'refresh' || profile === 'all') {
    for (const source of config.sources) {
      if (source.enabled && source.auth?.type === 'query_key') required.add(source.auth.envKey);
    }
  }
  if (profile === 'deploy' || profile === 'all') {
    required.add('SITE_BASE_URL');
    required.add('DEPLOY_DIR');
  }

  const warnings: string[] = [];
  if (!env.ADSENSE_CLIENT_ID) {
    warnings.push('ADSENSE_CLIENT_ID is not set (optional)');
  }
  return {
    missing: [...required].filter((name) => !env[name]).sort(),
    warnings,
  };
}

export interface QualityGateArgs {
  canonicalPath: string;
  previousPath?: string;
  siteDir: string;
  siteBaseUrl?: string;
  config: PipelineConfig;
}

/**
 * Quality Gate over files on disk
 */
export function runQualityGate(args: QualityGateArgs): GateReport {
  const baseUrl = args.siteBaseUrl ?? args.config.site.baseUrl;
  const previous = args.previousPath && fs.existsSync(args.previousPath) ? readCanonicalFile(args.previousPath) : [];

  return evaluateQuality({
    canonical: readCanonicalFile(args.canonicalPath),
    previous,
    site: inspectSite(args.siteDir, baseUrl),
    config: args.config.quality,
    requiredSections: args.config.site.requiredDetailSections,
    inputs: {
      canonical: args.canonicalPath,
      previous: args.previousPath ?? null,
      site: args.siteDir,
    },
  });
}

function isFrontendReport(value: unknown): value is FrontendReport {
  return validateAgainst(FrontendReportSchema, value).length === 0;
}

export function readFrontendReport(filepath: string): FrontendReport {
  const parsed = readJson(filepath);
  if (!isFrontendReport(parsed)) {
    const problems = validateAgainst(FrontendReportSchema, parsed);
    throw new Error(`Invalid frontend report ${filepath}: ${problems.slice(0, 5).join('; ')}`);
  }
  return parsed;
}

export interface MonetizationGateArgs {
  siteDir: string;
  frontendReportPath?: string;
  siteBaseUrl?: string;
  config: PipelineConfig;
}

/**
 * Monetization Gate over a site directory; the frontend report is rebuilt when not given
 */
export function runMonetizationGate(args: MonetizationGateArgs): GateReport {
  const site = inspectSite(args.siteDir, args.siteBaseUrl ?? args.config.site.baseUrl);
  const frontend = args.frontendReportPath
    ? readFrontendReport(args.frontendReportPath)
    : buildFrontendReport(site, args.config.site);

  return evaluateMonetization({
    site,
    frontend,
    config: args.config.monetization,
    disclaimerText: args.config.site.disclaimerText,
    inputs: {
      site: args.siteDir,
      frontend: args.frontendReportPath ?? null,
    },
  });
}

/**
 * Console lines for a gate report
 */
export function formatGateReport(report: GateReport): string[] {
  const lines = [`\n=== ${report.gate === 'quality' ? 'Quality' : 'Monetization'} Gate ===\n`];
  lines.push(`Decision: ${report.decision.toUpperCase()}`);
  if (report.findings.length === 0) {
    lines.push('No findings.');
  }
  for (const finding of report.findings) {
    const subject = finding.subject ? ` [${finding.subject}]` : '';
    lines.push(`  ${finding.severity === 'hard' ? '✗' : '!'} ${finding.code}: ${finding.message}${subject}`);
  }
  lines.push('');
  return lines;
}

/**
 * Console lines for a run record
 */
export function formatRunRecord(record: RunRecord): string[] {
  const lines = [
    `\n=== Run ${record.run_id} ===\n`,
    `Mode:          ${record.mode}`,
    `Status:        ${record.status}`,
    `Started:       ${record.started_at}`,
    `Ended:         ${record.ended_at ?? '-'}`,
    `Quality:       ${record.decision.quality ?? '-'}`,
    `Monetization:  ${record.decision.monetization ?? '-'}`,
    `Deployed:      ${record.decision.deployed ? 'yes' : 'no'}`,
  ];
  if (record.reasons.length > 0) {
    lines.push(`Reasons:       ${record.reasons.join(', ')}`);
  }
  if (record.error) {
    lines.push(`Error:         ${record.error}`);
  }
  lines.push('\nStages:');
  for (const stage of record.stages) {
    lines.push(`  • ${stage.stage} (${stage.status})`);
  }
  lines.push('');
  return lines;
}
