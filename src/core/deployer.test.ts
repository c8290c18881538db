import * as fs from 'fs';
import * as path from 'path';
import { DirectoryDeployer } from './deployer';
import { ArtifactWriter, listFiles, replaceDirectory } from './artifact_writer';
import { RecordingLogger, makeTempDir, removeDir, writeFiles } from '../../tests/helpers/fixtures';

describe('directory deploys', () => {
  let workDir: string;

  beforeEach(() => {
    workDir = makeTempDir('deployer-test-');
  });

  afterEach(() => {
    removeDir(workDir);
  });

  describe('listFiles', () => {
    it('should list nested files as sorted relative paths', () => {
      writeFiles(workDir, { 'b.txt': 'b', 'a/index.html': 'a', 'a/z/deep.xml': 'z' });
      expect(listFiles(workDir)).toEqual([path.join('a', 'index.html'), path.join('a', 'z', 'deep.xml'), 'b.txt']);
    });

    it('should return nothing for a missing directory', () => {
      expect(listFiles(path.join(workDir, 'missing'))).toEqual([]);
    });
  });

  describe('replaceDirectory', () => {
    it('should replace the destination contents completely', () => {
      const source = path.join(workDir, 'source');
      const destination = path.join(workDir, 'production');
      writeFiles(source, { 'index.html': 'new' });
      writeFiles(destination, { 'index.html': 'old', 'stale.html': 'old' });

      replaceDirectory(source, destination);

      expect(listFiles(destination)).toEqual(['index.html']);
      expect(fs.readFileSync(path.join(destination, 'index.html'), 'utf-8')).toBe('new');
      expect(fs.readdirSync(workDir).sort()).toEqual(['production', 'source']);
    });
  });

  describe('ArtifactWriter.mirrorTo', () => {
    it('should mirror the run directory without its site', () => {
      const runDir = path.join(workDir, 'runs', 'run-1');
      writeFiles(runDir, { 'run_meta.json': '{}', 'site/index.html': '<html></html>', 'quality/report.json': '{}' });

      new ArtifactWriter(runDir).mirrorTo(path.join(workDir, 'latest'));

      expect(listFiles(path.join(workDir, 'latest'))).toEqual([path.join('quality', 'report.json'), 'run_meta.json']);
    });
  });

  describe('DirectoryDeployer', () => {
    it('should deploy the site and confirm the file list', async () => {
      const siteDir = path.join(workDir, 'site');
      writeFiles(siteDir, { 'index.html': 'home', 'robots.txt': 'User-agent: *', 'grants/a/index.html': 'a' });
      const logger = new RecordingLogger();
      const deployer = new DirectoryDeployer(
        path.join(workDir, 'production'),
        logger,
        () => new Date('2025-07-01T00:00:00.000Z')
      );

      const receipt = await deployer.deploy(siteDir);

      expect(receipt).toEqual({
        confirmed: true,
        target: path.join(workDir, 'production'),
        deployed_at: '2025-07-01T00:00:00.000Z',
        files: 3,
      });
      expect(listFiles(deployer.target)).toEqual(listFiles(siteDir));
      expect(logger.lines).toEqual([`[deploy] 3 file(s) deployed to ${deployer.target}`]);
    });

    it('should reject a missing site directory', async () => {
      const deployer = new DirectoryDeployer(path.join(workDir, 'production'), new RecordingLogger());
      await expect(deployer.deploy(path.join(workDir, 'nope'))).rejects.toThrow('Site directory not found');
    });
  });
});
