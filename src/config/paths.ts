import * as path from 'path';

/**
 * Artifact layout shared by the pipeline, the CLI and the status API.
 *
 * EXTERNAL CONTRACT: deploy scripts and weekly reports read these locations.
 * Changing them breaks every tool that expects this directory structure.
 */
export const DEFAULT_ARTIFACTS_DIR = 'artifacts';
export const DEFAULT_DATA_DIR = 'data';
export const DEFAULT_DEPLOY_DIR = path.join('site', 'production');

export const RUNS_SUBDIR = 'runs';
export const LATEST_SUBDIR = 'latest';

const RUN_ID_PATTERN = /^[A-Za-z0-9][A-Za-z0-9._-]{0,127}$/;

/**
 * Run ids become directory names, so they must not carry path separators.
 */
export function isValidRunId(runId: string): boolean {
  return RUN_ID_PATTERN.test(runId) && !runId.includes('..');
}

export interface RunPaths {
  root: string;
  meta: string;
  rawDir: string;
  canonical: string;
  changes: string;
  defects: string;
  fetchReport: string;
  siteDir: string;
  frontendReport: string;
  qualityReport: string;
  monetizationReport: string;
  publishReport: string;
}

export function runPaths(artifactsDir: string, runId: string): RunPaths {
  const root = path.join(artifactsDir, RUNS_SUBDIR, runId);
  return {
    root,
    meta: path.join(root, 'run_meta.json'),
    rawDir: path.join(root, 'raw'),
    canonical: path.join(root, 'canonical', 'policies.json'),
    changes: path.join(root, 'canonical', 'changes.json'),
    defects: path.join(root, 'canonical', 'defects.json'),
    fetchReport: path.join(root, 'fetch', 'report.json'),
    siteDir: path.join(root, 'site'),
    frontendReport: path.join(root, 'frontend', 'report.json'),
    qualityReport: path.join(root, 'quality', 'report.json'),
    monetizationReport: path.join(root, 'monetization', 'report.json'),
    publishReport: path.join(root, 'publish', 'report.json'),
  };
}

export function latestRunDir(artifactsDir: string): string {
  return path.join(artifactsDir, LATEST_SUBDIR);
}

export function canonicalLatestPath(dataDir: string): string {
  return path.join(dataDir, 'canonical', LATEST_SUBDIR, 'policies.json');
}

export function canonicalPreviousPath(dataDir: string): string {
  return path.join(dataDir, 'canonical', 'previous', 'policies.json');
}
