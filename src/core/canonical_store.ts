import * as fs from 'fs';
import { CanonicalRecord } from '../types';
import { canonicalLatestPath, canonicalPreviousPath } from '../config/paths';
import { CanonicalDatasetSchema, validateAgainst } from './schemas';
import { copyFileAtomic, readJson, writeJsonAtomic } from './artifact_writer';

export function isAbsoluteHttpUrl(value: string | null | undefined): boolean {
  if (!value) return false;
  try {
    const url = new URL(value);
    return (url.protocol === 'http:' || url.protocol === 'https:') && url.host !== '';
  } catch {
    return false;
  }
}

export function isCanonicalDataset(value: unknown): value is CanonicalRecord[] {
  return validateAgainst(CanonicalDatasetSchema, value).length === 0;
}

/**
 * Read and validate a canonical dataset file
 */
export function readCanonicalFile(filepath: string): CanonicalRecord[] {
  const parsed = readJson(filepath);
  if (!isCanonicalDataset(parsed)) {
    const problems = validateAgainst(CanonicalDatasetSchema, parsed);
    throw new Error(`Invalid canonical dataset ${filepath}: ${problems.slice(0, 5).join('; ')}`);
  }
  return parsed;
}

/**
 * Reasons a dataset must not become "latest"; empty when publishable
 */
export function publishBlockers(records: CanonicalRecord[]): string[] {
  const blockers: string[] = [];
  if (records.length === 0) {
    blockers.push('dataset is empty');
  }
  const badUrls = records.filter((r) => !isAbsoluteHttpUrl(r.official_url));
  if (badUrls.length > 0) {
    blockers.push(
      `${badUrls.length} record(s) without an absolute official_url (e.g. ${badUrls[0].policy_id})`
    );
  }
  return blockers;
}

/**
 * The shared "latest" / "previous" canonical datasets.
 *
 * Single writer: only a run whose gates passed and whose deploy was confirmed
 * calls promote(). Both files are replaced via tmp + rename.
 */
export class CanonicalStore {
  constructor(private readonly dataDir: string) {}

  get latestPath(): string {
    return canonicalLatestPath(this.dataDir);
  }

  get previousPath(): string {
    return canonicalPreviousPath(this.dataDir);
  }

  loadLatest(): CanonicalRecord[] {
    return fs.existsSync(this.latestPath) ? readCanonicalFile(this.latestPath) : [];
  }

  loadPrevious(): CanonicalRecord[] {
    return fs.existsSync(this.previousPath) ? readCanonicalFile(this.previousPath) : [];
  }

  /**
   * Rotate latest -> previous and write the new latest.
   */
  promote(records: CanonicalRecord[]): void {
    const blockers = publishBlockers(records);
    if (blockers.length > 0) {
      throw new Error(`Refusing to publish canonical dataset: ${blockers.join('; ')}`);
    }

    if (fs.existsSync(this.latestPath)) {
      copyFileAtomic(this.latestPath, this.previousPath);
    }
    writeJsonAtomic(this.latestPath, records);
  }
}
