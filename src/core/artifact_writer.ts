import * as fs from 'fs';
import * as path from 'path';

/**
 * Write JSON so readers only ever see the old or the new file, never a partial one:
 * write to a sibling tmp file, then rename over the target.
 */
export function writeJsonAtomic(filepath: string, data: unknown): void {
  fs.mkdirSync(path.dirname(filepath), { recursive: true });
  const tmpFilepath = `${filepath}.${process.pid}.tmp`;

  try {
    fs.writeFileSync(tmpFilepath, `${JSON.stringify(data, null, 2)}\n`);
    fs.renameSync(tmpFilepath, filepath);
  } finally {
    // rename failed: leave no tmp file behind
    if (fs.existsSync(tmpFilepath)) fs.unlinkSync(tmpFilepath);
  }
}

/**
 * Write JSON only if the file does not exist yet (exclusive create).
 * Returns false when the target is already there.
 */
export function writeJsonOnce(filepath: string, data: unknown): boolean {
  fs.mkdirSync(path.dirname(filepath), { recursive: true });
  try {
    fs.writeFileSync(filepath, `${JSON.stringify(data, null, 2)}\n`, { flag: 'wx' });
    return true;
  } catch (error) {
    if (isErrnoException(error) && error.code === 'EEXIST') {
      return false;
    }
    throw error;
  }
}

export function readJson(filepath: string): unknown {
  return JSON.parse(fs.readFileSync(filepath, 'utf-8'));
}

export function readJsonIfExists(filepath: string): unknown {
  if (!fs.existsSync(filepath)) return undefined;
  return readJson(filepath);
}

/**
 * Copy a file via tmp + rename, so the destination is replaced in one step.
 */
export function copyFileAtomic(source: string, destination: string): void {
  fs.mkdirSync(path.dirname(destination), { recursive: true });
  const tmpFilepath = `${destination}.${process.pid}.tmp`;
  try {
    fs.copyFileSync(source, tmpFilepath);
    fs.renameSync(tmpFilepath, destination);
  } finally {
    if (fs.existsSync(tmpFilepath)) fs.unlinkSync(tmpFilepath);
  }
}

export function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}

/**
 * Replace `destination` with a copy of `source`.
 * The old directory is swapped out only after the new copy is complete.
 */
export function replaceDirectory(source: string, destination: string, filter?: (src: string) => boolean): void {
  const staging = `${destination}.${process.pid}.staging`;
  const retired = `${destination}.${process.pid}.retired`;
  fs.rmSync(staging, { recursive: true, force: true });
  fs.mkdirSync(path.dirname(destination), { recursive: true });
  fs.cpSync(source, staging, { recursive: true, filter });
  if (fs.existsSync(destination)) {
    fs.renameSync(destination, retired);
  }
  fs.renameSync(staging, destination);
  fs.rmSync(retired, { recursive: true, force: true });
}

/**
 * Regular files below `dir`, as sorted relative paths
 */
export function listFiles(dir: string): string[] {
  if (!fs.existsSync(dir)) return [];
  const out: string[] = [];
  const walk = (current: string): void => {
    for (const entry of fs.readdirSync(current, { withFileTypes: true })) {
      const full = path.join(current, entry.name);
      if (entry.isDirectory()) walk(full);
      else if (entry.isFile()) out.push(path.relative(dir, full));
    }
  };
  walk(dir);
  return out.sort();
}

/**
 * Responsible for writing the artifacts of one run.
 * Paths are resolved against the run directory; every write is atomic.
 */
export class ArtifactWriter {
  private readonly dirPath: string;
  private readonly written: string[] = [];

  constructor(dirPath: string) {
    this.dirPath = path.resolve(dirPath);
    fs.mkdirSync(this.dirPath, { recursive: true });
  }

  get root(): string {
    return this.dirPath;
  }

  /**
   * Write an artifact; returns its absolute path
   */
  public write(target: string, data: unknown): string {
    const filepath = path.isAbsolute(target) ? target : path.join(this.dirPath, target);
    writeJsonAtomic(filepath, data);
    this.written.push(filepath);
    return filepath;
  }

  /**
   * Paths written so far, in order
   */
  public writtenPaths(): string[] {
    return [...this.written];
  }

  /**
   * Mirror this run directory to `destination` for operators ("latest run" view).
   * The previous mirror is swapped out only after the new copy is complete.
   */
  public mirrorTo(destination: string): void {
    // the generated site is already deployed or discarded; keep the mirror small
    replaceDirectory(
      this.dirPath,
      destination,
      (src) => path.basename(src) !== 'site' || path.dirname(src) !== this.dirPath
    );
  }
}
