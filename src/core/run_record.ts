import * as fs from 'fs';
import * as path from 'path';
import { GateReport, RunDecision, RunMode, RunRecord, RunStatus, Stage, StageEntry } from '../types';
import { RunRecordSchema, GateReportSchema, validateAgainst } from './schemas';
import { readJson, writeJsonAtomic } from './artifact_writer';
import { RunConflictError, errorMessage } from './errors';
import { RUNS_SUBDIR, isValidRunId, runPaths } from '../config/paths';
import { Logger, defaultLogger } from './logger';

export function isRunRecord(value: unknown): value is RunRecord {
  return validateAgainst(RunRecordSchema, value).length === 0;
}

export function isGateReport(value: unknown): value is GateReport {
  return validateAgainst(GateReportSchema, value).length === 0;
}

/**
 * Read run_meta.json; null when the run does not exist
 */
export function readRunRecord(metaPath: string): RunRecord | null {
  if (!fs.existsSync(metaPath)) return null;
  const parsed = readJson(metaPath);
  if (!isRunRecord(parsed)) {
    throw new Error(`Malformed run record: ${metaPath}`);
  }
  return parsed;
}

/**
 * Run records under <artifactsDir>/runs, newest first.
 * Unreadable records are skipped with a warning.
 */
export function listRunRecords(artifactsDir: string, logger: Logger = defaultLogger): RunRecord[] {
  const runsDir = path.join(artifactsDir, RUNS_SUBDIR);
  if (!fs.existsSync(runsDir)) return [];

  const records: RunRecord[] = [];
  for (const runId of fs.readdirSync(runsDir)) {
    if (!isValidRunId(runId)) continue;
    try {
      const record = readRunRecord(runPaths(artifactsDir, runId).meta);
      if (record) records.push(record);
    } catch (error) {
      logger.warn(`Skipping run ${runId}: ${errorMessage(error)}`);
    }
  }
  return records.sort((a, b) =>
    a.started_at === b.started_at ? (a.run_id < b.run_id ? 1 : -1) : a.started_at < b.started_at ? 1 : -1
  );
}

export interface RunStart {
  runId: string;
  mode: RunMode;
  siteBaseUrl: string;
}

/**
 * Owns run_meta.json for one run: created once, appended per stage, closed once.
 * Every change is persisted immediately so a killed run still shows how far it got.
 */
export class RunRecorder {
  private record: RunRecord;

  private constructor(
    private readonly metaPath: string,
    record: RunRecord,
    private readonly now: () => Date
  ) {
    this.record = record;
  }

  /**
   * Create the record for a new run. An existing run id, closed or not, is refused.
   */
  static start(metaPath: string, start: RunStart, now: () => Date = () => new Date()): RunRecorder {
    const existing = readRunRecord(metaPath);
    if (existing) {
      throw new RunConflictError(start.runId, existing.status);
    }

    const recorder = new RunRecorder(
      metaPath,
      {
        schema: 'policy-pipeline.run_meta.v1',
        run_id: start.runId,
        mode: start.mode,
        status: RunStatus.Running,
        stage: 'start',
        started_at: now().toISOString(),
        ended_at: null,
        site_base_url: start.siteBaseUrl,
        stages: [],
        decision: { quality: null, monetization: null, deploy_ready: false, deployed: false },
        reasons: [],
        error: null,
      },
      now
    );
    recorder.persist();
    return recorder;
  }

  get current(): RunRecord {
    return structuredClone(this.record);
  }

  get closed(): boolean {
    return this.record.status !== RunStatus.Running;
  }

  /**
   * Append a finished stage
   */
  stage(
    stage: Stage,
    status: StageEntry['status'],
    startedAt: Date,
    artifacts: string[] = [],
    detail?: Record<string, unknown>
  ): void {
    this.ensureOpen();
    const entry: StageEntry = {
      stage,
      status,
      started_at: startedAt.toISOString(),
      ended_at: this.now().toISOString(),
      artifacts,
    };
    if (detail) entry.detail = detail;
    this.record.stages.push(entry);
    this.record.stage = stage;
    this.persist();
  }

  decide(update: Partial<RunDecision>): void {
    this.ensureOpen();
    this.record.decision = { ...this.record.decision, ...update };
    this.persist();
  }

  /**
   * Close the run with its final status; a run closes exactly once
   */
  close(status: Exclude<RunStatus, RunStatus.Running>, outcome: { reasons?: string[]; error?: string | null } = {}): RunRecord {
    this.ensureOpen();
    this.record.status = status;
    this.record.stage = 'completed';
    this.record.ended_at = this.now().toISOString();
    this.record.reasons = [...new Set(outcome.reasons ?? [])];
    this.record.error = outcome.error ?? null;
    this.persist();
    return this.current;
  }

  private ensureOpen(): void {
    if (this.closed) {
      throw new RunConflictError(this.record.run_id, this.record.status);
    }
  }

  private persist(): void {
    writeJsonAtomic(this.metaPath, this.record);
  }
}
