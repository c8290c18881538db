import * as path from 'path';
import { v4 as uuidv4 } from 'uuid';
import {
  FatalReason,
  FrontendReport,
  GateDecision,
  GateFinding,
  GateReport,
  NormalizationResult,
  PipelineConfig,
  PublishReport,
  RunMode,
  RunRecord,
  RunStatus,
  Stage,
} from '../types';
import { RunPaths, isValidRunId, latestRunDir, runPaths } from '../config/paths';
import { ArtifactWriter } from './artifact_writer';
import { CanonicalStore, publishBlockers } from './canonical_store';
import { Deployer, DirectoryDeployer } from './deployer';
import { FatalPipelineError, errorMessage } from './errors';
import { buildGateReport } from './gate_report';
import { Logger, defaultLogger, scoped } from './logger';
import { evaluateMonetization } from './monetization_gate';
import { CanonicalNormalizer } from './normalizer';
import { PageGenerator, StaticSiteGenerator } from './page_generator';
import { evaluateQuality } from './quality_gate';
import { RawSnapshotStore } from './raw_snapshot_store';
import { RunRecorder } from './run_record';
import { buildFrontendReport, inspectSite } from './site-inspector';
import { SourceConnector } from './source-connector';

export interface RunOptions {
  runId?: string;
  mode: RunMode;
  siteBaseUrl?: string;
  /** false: stop after the gates and close the run as deploy_skipped */
  deploy?: boolean;
}

export interface PipelineDependencies {
  /** Directory relative config paths are resolved against */
  baseDir?: string;
  logger?: Logger;
  connector?: SourceConnector;
  generator?: PageGenerator;
  deployer?: Deployer;
  now?: () => Date;
  sleep?: (ms: number) => Promise<void>;
  env?: NodeJS.ProcessEnv;
}

export interface RunOutcome {
  record: RunRecord;
  paths: RunPaths;
  normalization: NormalizationResult | null;
  frontend: FrontendReport | null;
  quality: GateReport | null;
  monetization: GateReport | null;
}

const FATAL_MESSAGES: Record<FatalReason, string> = {
  canonical_empty: 'No source produced a canonical row',
  primary_sources_unavailable: 'No primary source produced rows',
};

/**
 * Hard reason codes of a gate report, in report order
 */
function hardReasons(report: GateReport): string[] {
  const hard = new Set(report.findings.filter((f) => f.severity === 'hard').map((f) => f.code));
  return report.reasons.filter((code) => hard.has(code));
}

export function defaultRunId(now: Date): string {
  const stamp = now.toISOString().replace(/[-:]/g, '').slice(0, 15);
  return `run-${stamp}-${uuidv4().slice(0, 8)}`;
}

/**
 * Runs the pipeline: fetch -> normalize -> generate -> quality -> monetization -> deploy -> promote.
 *
 * Each stage writes its own artifacts under runs/<run_id>/ and later stages only read them.
 * Production output and the "latest" dataset change only after both gates allow it and the
 * deploy is confirmed.
 */
export class PipelineRunner {
  private readonly config: PipelineConfig;
  private readonly logger: Logger;
  private readonly baseDir: string;
  private readonly now: () => Date;
  private readonly store: CanonicalStore;
  private readonly snapshots: RawSnapshotStore;
  private readonly connector: SourceConnector;
  private readonly generator: PageGenerator;
  private readonly deployer: Deployer;

  constructor(config: PipelineConfig, deps: PipelineDependencies = {}) {
    this.config = config;
    this.baseDir = deps.baseDir ?? process.cwd();
    this.logger = deps.logger ?? defaultLogger;
    this.now = deps.now ?? (() => new Date());
    this.store = new CanonicalStore(this.resolve(config.paths.dataDir));
    this.snapshots = new RawSnapshotStore(this.artifactsDir);
    this.connector =
      deps.connector ??
      new SourceConnector({
        fetch: config.fetch,
        store: this.snapshots,
        baseDir: this.baseDir,
        logger: this.logger,
        env: deps.env,
        sleep: deps.sleep,
        now: this.now,
      });
    this.generator = deps.generator ?? new StaticSiteGenerator(config.site, this.logger);
    this.deployer =
      deps.deployer ?? new DirectoryDeployer(this.resolve(config.paths.deployDir), this.logger, this.now);
  }

  get artifactsDir(): string {
    return this.resolve(this.config.paths.artifactsDir);
  }

  get canonicalStore(): CanonicalStore {
    return this.store;
  }

  async run(options: RunOptions): Promise<RunOutcome> {
    const runId = options.runId ?? defaultRunId(this.now());
    if (!isValidRunId(runId)) {
      throw new Error(`Invalid run id: ${runId}`);
    }
    const baseUrl = (options.siteBaseUrl ?? this.config.site.baseUrl).replace(/\/+$/, '');
    const paths = runPaths(this.artifactsDir, runId);

    // refuses a run id that was used before, before anything else is written
    const recorder = RunRecorder.start(paths.meta, { runId, mode: options.mode, siteBaseUrl: baseUrl }, this.now);
    const writer = new ArtifactWriter(paths.root);
    const log = scoped(`run ${runId}`, this.logger);
    log.log(`started (mode=${options.mode}, deploy=${options.deploy !== false})`);

    const outcome: Omit<RunOutcome, 'record'> = {
      paths,
      normalization: null,
      frontend: null,
      quality: null,
      monetization: null,
    };

    let record: RunRecord;
    try {
      record = await this.execute(options, baseUrl, paths, recorder, writer, outcome);
    } catch (error) {
      log.error(`failed: ${errorMessage(error)}`);
      if (recorder.closed) {
        record = recorder.current;
      } else if (error instanceof FatalPipelineError) {
        record = recorder.close(RunStatus.Failed, { reasons: error.reasons });
      } else {
        record = recorder.close(RunStatus.Failed, { reasons: ['unexpected_error'], error: errorMessage(error) });
      }
    }

    try {
      writer.mirrorTo(latestRunDir(this.artifactsDir));
    } catch (error) {
      log.warn(`could not mirror run to ${latestRunDir(this.artifactsDir)}: ${errorMessage(error)}`);
    }

    log.log(`finished with status ${record.status}`);
    return { ...outcome, record };
  }

  private async execute(
    options: RunOptions,
    baseUrl: string,
    paths: RunPaths,
    recorder: RunRecorder,
    writer: ArtifactWriter,
    outcome: Omit<RunOutcome, 'record'>
  ): Promise<RunRecord> {
    const runId = recorder.current.run_id;

    let started = this.now();
    const fetched = await this.connector.fetchAll(this.config.sources, runId);
    const fetchReport = writer.write(paths.fetchReport, {
      run_id: runId,
      sources: fetched.map((f) => f.report),
    });
    recorder.stage(
      Stage.Fetch,
      'completed',
      started,
      [fetchReport, ...fetched.map((f) => f.report.snapshot_path).filter((p): p is string => p !== null)],
      {
        ok: fetched.filter((f) => f.report.ok).map((f) => f.report.source_id),
        failed: fetched.filter((f) => !f.report.ok).map((f) => f.report.source_id),
      }
    );

    started = this.now();
    const previous = this.store.loadLatest();
    const normalizer = new CanonicalNormalizer(this.logger);
    const result = normalizer.normalize(
      fetched.map((f) => f.snapshot),
      { mode: options.mode, sources: this.config.sources, previous }
    );
    outcome.normalization = result;
    const normalizeArtifacts = [
      writer.write(paths.canonical, result.records),
      writer.write(paths.changes, result.changes),
      writer.write(paths.defects, { defects: result.defects, sources: result.sources }),
    ];
    if (result.fatal.length > 0) {
      const fatalReport = buildGateReport({
        gate: 'quality',
        runId,
        findings: result.fatal.map((code): GateFinding => ({ code, severity: 'hard', message: FATAL_MESSAGES[code] })),
        metrics: { rows: result.records.length },
        inputs: { canonical: paths.canonical, previous: previous.length > 0 ? this.store.latestPath : null },
        now: this.now(),
      });
      outcome.quality = fatalReport;
      normalizeArtifacts.push(writer.write(paths.qualityReport, fatalReport));
      recorder.decide({ quality: fatalReport.decision });
      recorder.stage(Stage.Normalize, 'failed', started, normalizeArtifacts, { fatal: result.fatal });
      throw new FatalPipelineError(result.fatal);
    }
    recorder.stage(Stage.Normalize, 'completed', started, normalizeArtifacts, {
      records: result.records.length,
      defects: result.defects.length,
    });

    started = this.now();
    const generated = this.generator.generate(result.records, paths.siteDir, { baseUrl, changes: result.changes });
    const inventory = inspectSite(paths.siteDir, baseUrl);
    const frontend = buildFrontendReport(inventory, this.config.site, this.now());
    outcome.frontend = frontend;
    recorder.stage(Stage.Generate, 'completed', started, [writer.write(paths.frontendReport, frontend)], {
      pages: generated.pages,
    });

    const inputs = {
      canonical: paths.canonical,
      previous: previous.length > 0 ? this.store.latestPath : null,
      site: paths.siteDir,
      frontend: paths.frontendReport,
    };

    started = this.now();
    const quality = evaluateQuality({
      canonical: result.records,
      previous,
      site: inventory,
      config: this.config.quality,
      requiredSections: this.config.site.requiredDetailSections,
      runId,
      inputs,
      now: this.now(),
    });
    outcome.quality = quality;
    recorder.decide({ quality: quality.decision });
    recorder.stage(Stage.Quality, 'completed', started, [writer.write(paths.qualityReport, quality)], {
      decision: quality.decision,
    });

    started = this.now();
    const monetization = evaluateMonetization({
      site: inventory,
      frontend,
      config: this.config.monetization,
      disclaimerText: this.config.site.disclaimerText,
      runId,
      inputs,
      now: this.now(),
    });
    outcome.monetization = monetization;
    recorder.decide({ monetization: monetization.decision });
    recorder.stage(Stage.Monetization, 'completed', started, [writer.write(paths.monetizationReport, monetization)], {
      decision: monetization.decision,
    });

    const blockers = publishBlockers(result.records);
    const gateReasons = [...hardReasons(quality), ...hardReasons(monetization)];
    const deployReady =
      quality.decision !== GateDecision.HardFail &&
      monetization.decision !== GateDecision.HardFail &&
      blockers.length === 0;
    recorder.decide({ deploy_ready: deployReady });

    const publish = (deployed: boolean): string =>
      writer.write(paths.publishReport, this.publishReport(runId, baseUrl, quality, monetization, generated.pages, deployReady, deployed));

    started = this.now();
    if (!deployReady) {
      const reasons = blockers.length > 0 ? [...gateReasons, 'canonical_unpublishable'] : gateReasons;
      recorder.stage(Stage.Deploy, 'skipped', started, [publish(false)], { reasons, blockers });
      return recorder.close(RunStatus.Failed, { reasons });
    }
    if (options.deploy === false) {
      recorder.stage(Stage.Deploy, 'skipped', started, [publish(false)], { reason: 'deploy disabled' });
      return recorder.close(RunStatus.DeploySkipped, { reasons: quality.reasons.concat(monetization.reasons) });
    }

    const receipt = await this.deployer.deploy(paths.siteDir);
    recorder.decide({ deployed: receipt.confirmed });
    recorder.stage(Stage.Deploy, receipt.confirmed ? 'completed' : 'failed', started, [publish(receipt.confirmed)], {
      target: receipt.target,
      files: receipt.files,
      deployed_at: receipt.deployed_at,
    });
    if (!receipt.confirmed) {
      return recorder.close(RunStatus.Failed, { reasons: ['deploy_unconfirmed'] });
    }

    started = this.now();
    this.store.promote(result.records);
    recorder.stage(Stage.Promote, 'completed', started, [this.store.latestPath], { records: result.records.length });
    return recorder.close(RunStatus.Success, { reasons: quality.reasons.concat(monetization.reasons) });
  }

  private publishReport(
    runId: string,
    baseUrl: string,
    quality: GateReport,
    monetization: GateReport,
    pages: number,
    deployReady: boolean,
    deployed: boolean
  ): PublishReport {
    return {
      run_id: runId,
      deploy_ready: deployReady,
      quality_decision: quality.decision,
      monetization_decision: monetization.decision,
      generated_pages: pages,
      deployed,
      site_base_url: baseUrl,
      timestamp: this.now().toISOString(),
    };
  }

  private resolve(target: string): string {
    return path.resolve(this.baseDir, target);
  }
}
