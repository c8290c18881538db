import { ArtifactWriter, writeJsonAtomic, writeJsonOnce } from './artifact_writer';
import * as fs from 'fs';
import * as path from 'path';

jest.mock('fs');

describe('artifact writes', () => {
  const TEST_DIR = '/mock/artifacts/runs/run-1';
  const tmpFor = (target: string): string => `${target}.${process.pid}.tmp`;

  beforeEach(() => {
    jest.resetAllMocks();
    (fs.existsSync as jest.Mock).mockReturnValue(false);
  });

  describe('writeJsonAtomic', () => {
    it('should write a tmp file and rename it over the target', () => {
      const target = path.join(TEST_DIR, 'quality', 'report.json');

      writeJsonAtomic(target, { decision: 'pass' });

      expect(fs.mkdirSync).toHaveBeenCalledWith(path.join(TEST_DIR, 'quality'), { recursive: true });
      expect(fs.writeFileSync).toHaveBeenCalledWith(tmpFor(target), '{\n  "decision": "pass"\n}\n');
      expect(fs.renameSync).toHaveBeenCalledWith(tmpFor(target), target);
      expect(fs.unlinkSync).not.toHaveBeenCalled();
    });

    it('should remove the tmp file when the rename fails', () => {
      const target = path.join(TEST_DIR, 'run_meta.json');
      (fs.renameSync as jest.Mock).mockImplementation(() => {
        throw new Error('EXDEV');
      });
      (fs.existsSync as jest.Mock).mockReturnValue(true);

      expect(() => writeJsonAtomic(target, {})).toThrow('EXDEV');
      expect(fs.unlinkSync).toHaveBeenCalledWith(tmpFor(target));
    });
  });

  describe('writeJsonOnce', () => {
    it('should create the file exclusively', () => {
      const target = path.join(TEST_DIR, 'raw', 'registry.json');

      expect(writeJsonOnce(target, [])).toBe(true);
      expect(fs.writeFileSync).toHaveBeenCalledWith(target, '[]\n', { flag: 'wx' });
    });

    it('should return false when the file already exists', () => {
      (fs.writeFileSync as jest.Mock).mockImplementation(() => {
        throw Object.assign(new Error('file exists'), { code: 'EEXIST' });
      });

      expect(writeJsonOnce(path.join(TEST_DIR, 'raw', 'registry.json'), [])).toBe(false);
    });

    it('should rethrow other errors', () => {
      (fs.writeFileSync as jest.Mock).mockImplementation(() => {
        throw Object.assign(new Error('permission denied'), { code: 'EACCES' });
      });

      expect(() => writeJsonOnce(path.join(TEST_DIR, 'raw', 'registry.json'), [])).toThrow('permission denied');
    });
  });

  describe('ArtifactWriter', () => {
    it('should resolve relative targets against the run directory and remember them', () => {
      const writer = new ArtifactWriter(TEST_DIR);

      const written = writer.write(path.join('fetch', 'report.json'), { sources: [] });
      const absolute = writer.write('/mock/elsewhere/report.json', {});

      expect(written).toBe(path.join(TEST_DIR, 'fetch', 'report.json'));
      expect(absolute).toBe('/mock/elsewhere/report.json');
      expect(writer.writtenPaths()).toEqual([written, absolute]);
      expect(fs.renameSync).toHaveBeenCalledWith(tmpFor(written), written);
    });
  });
});
