#!/usr/bin/env node

import * as path from 'path';
import { Command } from 'commander';
import { loadConfig, validateConfig, parseRunMode, exitCodeFor } from '../config';
import { isValidRunId, runPaths } from '../config/paths';
import { startServer } from '../api';
import { PipelineRunner } from '../core/orchestrator';
import { writeJsonAtomic } from '../core/artifact_writer';
import { ConfigError, errorMessage } from '../core/errors';
import { listRunRecords, readRunRecord } from '../core/run_record';
import { defaultLogger } from '../core/logger';
import { PipelineConfig } from '../types';
import {
  PREFLIGHT_PROFILES,
  formatGateReport,
  formatRunRecord,
  isPreflightProfile,
  preflight,
  runExitCode,
  runMonetizationGate,
  runQualityGate,
} from './commands';

interface ConfigOption {
  config?: string;
}

interface RunCommandOptions extends ConfigOption {
  runId?: string;
  mode: string;
  siteBaseUrl?: string;
  deploy: boolean;
}

interface QualityGateOptions extends ConfigOption {
  canonical: string;
  previous?: string;
  siteDir: string;
  siteBaseUrl?: string;
  output?: string;
}

interface MonetizationGateOptions extends ConfigOption {
  siteDir: string;
  frontendReport?: string;
  siteBaseUrl?: string;
  output?: string;
}

interface StatusOptions extends ConfigOption {
  runId?: string;
}

const program = new Command();

/**
 * Load and validate configuration; invalid configuration is an error (exit 1)
 */
function getConfig(options: ConfigOption): PipelineConfig {
  const config = loadConfig(undefined, options.config, defaultLogger);
  const problems = validateConfig(config);
  if (problems.length > 0) {
    throw new ConfigError(problems);
  }
  return config;
}

function print(lines: string[]): void {
  lines.forEach((line) => console.log(line));
}

program
  .name('policy-pipeline')
  .description('Policy data pipeline: fetch, normalize, generate, gate and publish')
  .version('1.0.0');

/**
 * Run command
 */
program
  .command('run')
  .description('Run the full pipeline once')
  .option('--run-id <id>', 'Run id (default: generated)')
  .option('-m, --mode <mode>', 'Run mode (bootstrap, daily, manual)', 'manual')
  .option('--site-base-url <url>', 'Public base URL of the site')
  .option('--no-deploy', 'Stop after the gates and skip deploy')
  .option('-c, --config <path>', 'Config file')
  .action(async (options: RunCommandOptions) => {
    const mode = parseRunMode(options.mode);
    if (!mode) {
      console.error(`\n❌ Invalid mode: ${options.mode}. Use bootstrap, daily or manual.\n`);
      process.exitCode = 1;
      return;
    }

    const runner = new PipelineRunner(getConfig(options), { logger: defaultLogger });
    const outcome = await runner.run({
      runId: options.runId,
      mode,
      siteBaseUrl: options.siteBaseUrl,
      deploy: options.deploy,
    });

    print(formatRunRecord(outcome.record));
    if (outcome.quality) print(formatGateReport(outcome.quality));
    if (outcome.monetization) print(formatGateReport(outcome.monetization));
    console.log(`Artifacts: ${outcome.paths.root}\n`);
    process.exitCode = runExitCode(outcome.record);
  });

/**
 * Quality gate command
 */
program
  .command('quality-gate')
  .description('Run the Quality Gate over a canonical dataset and a generated site')
  .requiredOption('--canonical <path>', 'Canonical policies.json')
  .option('--previous <path>', 'Previous canonical policies.json')
  .requiredOption('--site-dir <dir>', 'Generated site directory')
  .option('--site-base-url <url>', 'Public base URL of the site')
  .option('-o, --output <path>', 'Write the report to this file')
  .option('-c, --config <path>', 'Config file')
  .action((options: QualityGateOptions) => {
    const report = runQualityGate({
      canonicalPath: path.resolve(options.canonical),
      previousPath: options.previous ? path.resolve(options.previous) : undefined,
      siteDir: path.resolve(options.siteDir),
      siteBaseUrl: options.siteBaseUrl,
      config: getConfig(options),
    });
    if (options.output) writeJsonAtomic(path.resolve(options.output), report);

    print(formatGateReport(report));
    process.exitCode = exitCodeFor(report.decision);
  });

/**
 * Monetization gate command
 */
program
  .command('monetization-gate')
  .description('Run the Monetization Gate over a generated site')
  .requiredOption('--site-dir <dir>', 'Generated site directory')
  .option('--frontend-report <path>', 'Frontend report (rebuilt from the site when omitted)')
  .option('--site-base-url <url>', 'Public base URL of the site')
  .option('-o, --output <path>', 'Write the report to this file')
  .option('-c, --config <path>', 'Config file')
  .action((options: MonetizationGateOptions) => {
    const report = runMonetizationGate({
      siteDir: path.resolve(options.siteDir),
      frontendReportPath: options.frontendReport ? path.resolve(options.frontendReport) : undefined,
      siteBaseUrl: options.siteBaseUrl,
      config: getConfig(options),
    });
    if (options.output) writeJsonAtomic(path.resolve(options.output), report);

    print(formatGateReport(report));
    process.exitCode = exitCodeFor(report.decision);
  });

/**
 * Status command
 */
program
  .command('status')
  .description('Show the latest run, or one run by id')
  .option('--run-id <id>', 'Run id')
  .option('-c, --config <path>', 'Config file')
  .action((options: StatusOptions) => {
    const artifactsDir = path.resolve(getConfig(options).paths.artifactsDir);

    if (options.runId) {
      if (!isValidRunId(options.runId)) {
        console.error(`\n❌ Invalid run id: ${options.runId}\n`);
        process.exitCode = 1;
        return;
      }
      const record = readRunRecord(runPaths(artifactsDir, options.runId).meta);
      if (!record) {
        console.log(`\nNo run with id ${options.runId}.\n`);
        process.exitCode = 1;
        return;
      }
      print(formatRunRecord(record));
      return;
    }

    const runs = listRunRecords(artifactsDir, defaultLogger);
    if (runs.length === 0) {
      console.log(`\nNo runs found in ${artifactsDir}.\n`);
      return;
    }
    print(formatRunRecord(runs[0]));
    console.log(`${runs.length} run(s) recorded.\n`);
  });

/**
 * Preflight command
 */
program
  .command('preflight')
  .description('Check required environment variables')
  .option('-p, --profile <profile>', `Profile (${PREFLIGHT_PROFILES.join(', ')})`, 'all')
  .option('-c, --config <path>', 'Config file')
  .action((options: ConfigOption & { profile: string }) => {
    if (!isPreflightProfile(options.profile)) {
      console.error(`\n❌ Unknown profile: ${options.profile}. Use ${PREFLIGHT_PROFILES.join(', ')}.\n`);
      process.exitCode = 1;
      return;
    }

    const result = preflight(getConfig(options), process.env, options.profile);
    result.warnings.forEach((warning) => console.log(`[WARN] ${warning}`));
    if (result.missing.length > 0) {
      console.log('[ERROR] Missing required environment variables:');
      result.missing.forEach((name) => console.log(`- ${name}`));
      process.exitCode = 1;
      return;
    }
    console.log(`preflight ok (profile=${options.profile})`);
  });

/**
 * Validate-config command
 */
program
  .command('validate-config')
  .description('Validate the configuration file')
  .option('-c, --config <path>', 'Config file')
  .action((options: ConfigOption) => {
    const config = loadConfig(undefined, options.config, defaultLogger);
    const problems = validateConfig(config);

    if (problems.length > 0) {
      console.log('\n❌ Configuration is invalid:\n');
      problems.forEach((p) => console.log(`  • ${p}`));
      console.log('');
      process.exitCode = 1;
      return;
    }

    console.log('\n✅ Configuration is valid.\n');
    console.log(`Sources:   ${config.sources.map((s) => `${s.id} (${s.tier}${s.enabled ? '' : ', disabled'})`).join(', ')}`);
    console.log(`Site:      ${config.site.baseUrl}`);
    console.log(`Artifacts: ${config.paths.artifactsDir}`);
    console.log('');
  });

/**
 * Server command
 */
program
  .command('serve')
  .description('Start the read-only status server')
  .option('-p, --port <port>', 'Port to listen on', '3000')
  .option('-c, --config <path>', 'Config file')
  .action(async (options: ConfigOption & { port: string }) => {
    const port = parseInt(options.port, 10);
    const artifactsDir = path.resolve(getConfig(options).paths.artifactsDir);
    console.log('\n🚀 Starting status server...\n');
    await startServer({ artifactsDir, logger: defaultLogger }, port);
  });

program.parseAsync().catch((error: unknown) => {
  console.error(`\n❌ ${errorMessage(error)}\n`);
  process.exitCode = 1;
});
