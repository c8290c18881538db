import * as fs from 'fs';
import * as path from 'path';
import { DeployReceipt } from '../types';
import { listFiles, replaceDirectory } from './artifact_writer';
import { Logger, defaultLogger, scoped } from './logger';

/**
 * Publishes a generated site directory.
 * The receipt's `confirmed` is true only once the target was verified.
 */
export interface Deployer {
  readonly target: string;
  deploy(siteDir: string): Promise<DeployReceipt>;
}

/**
 * Deploys by swapping the site into a production directory served as-is
 */
export class DirectoryDeployer implements Deployer {
  readonly target: string;
  private readonly logger: Logger;
  private readonly now: () => Date;

  constructor(target: string, logger: Logger = defaultLogger, now: () => Date = () => new Date()) {
    this.target = path.resolve(target);
    this.logger = scoped('deploy', logger);
    this.now = now;
  }

  async deploy(siteDir: string): Promise<DeployReceipt> {
    if (!fs.existsSync(siteDir)) {
      throw new Error(`Site directory not found: ${siteDir}`);
    }

    const expected = listFiles(siteDir);
    replaceDirectory(siteDir, this.target);

    const deployed = listFiles(this.target);
    const confirmed =
      deployed.length === expected.length && expected.every((file, i) => deployed[i] === file);
    if (confirmed) {
      this.logger.log(`${deployed.length} file(s) deployed to ${this.target}`);
    } else {
      this.logger.error(`verification failed: expected ${expected.length} file(s), found ${deployed.length}`);
    }

    return {
      confirmed,
      target: this.target,
      deployed_at: this.now().toISOString(),
      files: deployed.length,
    };
  }
}
