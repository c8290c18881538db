import * as fs from 'fs';
import * as path from 'path';
import { RawSnapshot } from '../types';
import { runPaths } from '../config/paths';
import { writeJsonOnce, readJson } from './artifact_writer';
import { SnapshotExistsError } from './errors';
import { RawSnapshotSchema, validateAgainst } from './schemas';

export function isRawSnapshot(value: unknown): value is RawSnapshot {
  return validateAgainst(RawSnapshotSchema, value).length === 0;
}

/**
 * Persists raw snapshots, one immutable file per (source_id, run_id)
 */
export class RawSnapshotStore {
  constructor(private readonly artifactsDir: string) {}

  public pathFor(runId: string, sourceId: string): string {
    return path.join(runPaths(this.artifactsDir, runId).rawDir, `${sourceId}.json`);
  }

  /**
   * Write a snapshot. Never overwrites: a second write for the same key throws.
   */
  public save(snapshot: RawSnapshot): string {
    const filepath = this.pathFor(snapshot.run_id, snapshot.source_id);
    if (!writeJsonOnce(filepath, snapshot)) {
      throw new SnapshotExistsError(filepath);
    }
    return filepath;
  }

  public load(runId: string, sourceId: string): RawSnapshot | null {
    const filepath = this.pathFor(runId, sourceId);
    if (!fs.existsSync(filepath)) return null;

    const parsed = readJson(filepath);
    if (!isRawSnapshot(parsed)) {
      const problems = validateAgainst(RawSnapshotSchema, parsed);
      throw new Error(`Malformed raw snapshot: ${filepath}: ${problems.slice(0, 5).join('; ')}`);
    }
    return parsed;
  }

  /**
   * All snapshots of a run, ordered by source id
   */
  public list(runId: string): RawSnapshot[] {
    const dir = runPaths(this.artifactsDir, runId).rawDir;
    if (!fs.existsSync(dir)) return [];

    return fs
      .readdirSync(dir)
      .filter((f) => f.endsWith('.json'))
      .sort()
      .map((f) => this.load(runId, f.slice(0, -'.json'.length)))
      .filter((s): s is RawSnapshot => s !== null);
  }
}
