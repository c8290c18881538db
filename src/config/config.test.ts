import * as fs from 'fs';
import * as path from 'path';
import {
  loadConfig,
  getDefaultConfig,
  validateConfig,
  applyEnvironment,
  parseRunMode,
  exitCodeFor,
} from './index';
import { GateDecision, RunMode, SourceTier } from '../types';
import { RecordingLogger } from '../../tests/helpers/fixtures';

// Mock fs module
jest.mock('fs');

describe('config', () => {
  beforeEach(() => {
    jest.clearAllMocks();
  });

  describe('getDefaultConfig', () => {
    it('should return default configuration', () => {
      const config = getDefaultConfig();

      expect(config.sources.map((s) => [s.id, s.tier])).toEqual([
        ['startup-announcements', SourceTier.Primary],
        ['public-services', SourceTier.Primary],
        ['fixtures', SourceTier.Fallback],
      ]);
      expect(config.quality.maxNullRatio).toBe(0.05);
      expect(config.quality.maxDuplicateMetaRatio).toBe(0.03);
      expect(config.monetization.maxSlotsPerPage).toBe(3);
      expect(config.paths.artifactsDir).toBe('artifacts');
    });

    it('should be valid', () => {
      expect(validateConfig(getDefaultConfig())).toEqual([]);
    });

    it('should return a fresh copy each time', () => {
      const first = getDefaultConfig();
      first.quality.requiredFields.push('title');
      expect(getDefaultConfig().quality.requiredFields).toHaveLength(6);
    });
  });

  describe('loadConfig', () => {
    it('should return default config when no file exists', () => {
      (fs.existsSync as jest.Mock).mockReturnValue(false);

      const config = loadConfig('/some/path', undefined, new RecordingLogger(), {});

      expect(config).toEqual(getDefaultConfig());
    });

    it('should load and merge config from file', () => {
      (fs.existsSync as jest.Mock).mockImplementation((p: string) =>
        p.endsWith(path.join('.policy-pipeline', 'config.yml'))
      );
      (fs.readFileSync as jest.Mock).mockReturnValue(`
site:
  baseUrl: https://grants.example.org
quality:
  maxNullRatio: 0.1
fetch:
  retry:
    attempts: 5
`);

      const config = loadConfig('/some/path', undefined, new RecordingLogger(), {});

      expect(config.site.baseUrl).toBe('https://grants.example.org');
      expect(config.site.disclaimerText).toBe(getDefaultConfig().site.disclaimerText);
      expect(config.quality.maxNullRatio).toBe(0.1);
      expect(config.quality.maxDuplicateIdRatio).toBe(0.03);
      expect(config.fetch.retry).toEqual({ attempts: 5, baseDelayMs: 400, maxDelayMs: 5000 });
      expect(config.fetch.requestTimeoutMs).toBe(20000);
    });

    it('should replace sources instead of merging them', () => {
      (fs.existsSync as jest.Mock).mockImplementation((p: string) => p.endsWith('policy-pipeline.yml'));
      (fs.readFileSync as jest.Mock).mockReturnValue(`
sources:
  - id: fixtures
    kind: file_json
    tier: fallback
    enabled: true
    endpoint: data/fixtures/policies.json
    mapping:
      kind: table
      naturalKey: [policy_id]
      fields: {}
`);

      const config = loadConfig('/some/path', undefined, new RecordingLogger(), {});

      expect(config.sources.map((s) => s.id)).toEqual(['fixtures']);
      expect(validateConfig(config)).toEqual([]);
    });

    it('should let environment variables override the file', () => {
      (fs.existsSync as jest.Mock).mockReturnValue(false);

      const config = loadConfig('/some/path', undefined, new RecordingLogger(), {
        SITE_BASE_URL: 'https://env.example.org',
        DEPLOY_DIR: '/srv/www',
        ADSENSE_CLIENT_ID: 'ca-pub-test',
      });

      expect(config.site.baseUrl).toBe('https://env.example.org');
      expect(config.site.adClient).toBe('ca-pub-test');
      expect(config.paths.deployDir).toBe('/srv/www');
    });

    it('should read the file named by POLICY_PIPELINE_CONFIG', () => {
      (fs.existsSync as jest.Mock).mockImplementation((p: string) => p === path.resolve('/some/path', 'custom.yml'));
      (fs.readFileSync as jest.Mock).mockReturnValue('monetization:\n  maxSlotsPerPage: 2\n');

      const config = loadConfig('/some/path', undefined, new RecordingLogger(), { POLICY_PIPELINE_CONFIG: 'custom.yml' });

      expect(config.monetization.maxSlotsPerPage).toBe(2);
    });

    it('should throw when an explicit config file is missing', () => {
      (fs.existsSync as jest.Mock).mockReturnValue(false);

      expect(() => loadConfig('/some/path', 'missing.yml', new RecordingLogger(), {})).toThrow(
        `Config file not found: ${path.resolve('/some/path', 'missing.yml')}`
      );
    });

    it('should warn and fall back to defaults when a found file is not a mapping', () => {
      (fs.existsSync as jest.Mock).mockImplementation((p: string) => p.endsWith('policy-pipeline.yaml'));
      (fs.readFileSync as jest.Mock).mockReturnValue('- just\n- a list\n');
      const logger = new RecordingLogger();

      const config = loadConfig('/some/path', undefined, logger, {});

      expect(config).toEqual(getDefaultConfig());
      expect(logger.warnings).toHaveLength(1);
      expect(logger.warnings[0]).toContain('must be a mapping');
    });

    it('should reject a file with an unknown section', () => {
      (fs.existsSync as jest.Mock).mockReturnValue(true);
      (fs.readFileSync as jest.Mock).mockReturnValue('deploy:\n  target: /srv/www\n');

      expect(() => loadConfig('/some/path', 'custom.yml', new RecordingLogger(), {})).toThrow(
        `Config at ${path.resolve('/some/path', 'custom.yml')} must be a mapping of known sections`
      );
    });
  });

  describe('applyEnvironment', () => {
    it('should leave the config alone without variables', () => {
      expect(applyEnvironment(getDefaultConfig(), {})).toEqual(getDefaultConfig());
    });
  });

  describe('validateConfig', () => {
    it('should report duplicate and malformed sources', () => {
      const config = getDefaultConfig();
      config.sources.push({ ...config.sources[2] });
      config.sources.push({ ...config.sources[2], id: 'Bad ID' });

      const errors = validateConfig(config);

      expect(errors).toContain('Duplicate source id: fixtures');
      expect(errors.some((e) => e.startsWith('Invalid source definition at sources/4/id'))).toBe(true);
    });

    it('should require an enabled source', () => {
      const config = getDefaultConfig();
      config.sources = config.sources.map((s) => ({ ...s, enabled: false }));

      expect(validateConfig(config)).toEqual(['At least one source must be enabled.']);
    });

    it('should reject a relative base URL and ratios outside 0..1', () => {
      const config = getDefaultConfig();
      config.site.baseUrl = 'policy.example.org';
      config.quality.maxNullRatio = 1.5;

      expect(validateConfig(config)).toEqual([
        'Invalid site base URL: policy.example.org. Must be an absolute http(s) URL.',
        'Invalid ratio for quality.maxNullRatio: 1.5. Must be between 0 and 1.',
      ]);
    });

    it('should require at least one fetch attempt', () => {
      const config = getDefaultConfig();
      config.fetch.retry.attempts = 0;

      expect(validateConfig(config)).toEqual(['fetch.retry.attempts must be at least 1.']);
    });

    it('should require every pagination setting of a paged source', () => {
      (fs.existsSync as jest.Mock).mockReturnValue(true);
      (fs.readFileSync as jest.Mock).mockReturnValue(`
sources:
  - id: paged
    kind: http_json
    tier: primary
    enabled: true
    endpoint: https://api.example.test/policies
    pagination:
      mode: page
    mapping:
      kind: announcement
`);

      const errors = validateConfig(loadConfig('/some/path', 'custom.yml', new RecordingLogger(), {}));

      expect(errors).toContain("Invalid source definition at sources/0/pagination: must have required property 'maxPages'");
      expect(errors).toContain("Invalid source definition at sources/0/pagination: must have required property 'pageSize'");
      expect(errors).toContain("Invalid source definition at sources/0/pagination: must have required property 'countPath'");
    });

    it('should require fields for a table mapping', () => {
      (fs.existsSync as jest.Mock).mockReturnValue(true);
      (fs.readFileSync as jest.Mock).mockReturnValue(`
sources:
  - id: table
    kind: file_json
    tier: fallback
    enabled: true
    endpoint: data/fixtures/policies.json
    mapping:
      kind: table
      naturalKey: [policy_id]
`);

      const errors = validateConfig(loadConfig('/some/path', 'custom.yml', new RecordingLogger(), {}));

      expect(errors).toContain("Invalid source definition at sources/0/mapping: must have required property 'fields'");
    });

    it('should reject an empty disclaimer and empty denylist phrases', () => {
      const config = getDefaultConfig();
      config.site.disclaimerText = ' ';
      config.monetization.denylist = ['click the ad', ''];

      expect(validateConfig(config)).toEqual([
        'site.disclaimerText must not be empty.',
        'monetization.denylist must not contain empty phrases.',
      ]);
    });
  });

  describe('parseRunMode', () => {
    it('should accept known modes only', () => {
      expect(parseRunMode('daily')).toBe(RunMode.Daily);
      expect(parseRunMode('bootstrap')).toBe(RunMode.Bootstrap);
      expect(parseRunMode('weekly')).toBeNull();
    });
  });

  describe('exitCodeFor', () => {
    it('should exit 2 only on hard_fail', () => {
      expect(exitCodeFor(GateDecision.Pass)).toBe(0);
      expect(exitCodeFor(GateDecision.SoftFail)).toBe(0);
      expect(exitCodeFor(GateDecision.HardFail)).toBe(2);
    });
  });
});
