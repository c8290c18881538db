import * as fs from 'fs';
import * as path from 'path';
import * as yaml from 'yaml';
import {
  PipelineConfig,
  SourceDescriptor,
  SourceTier,
  RunMode,
  GateDecision,
} from '../types';
import { SourceListSchema, validateAgainst } from '../core/schemas';
import { DEFAULT_ARTIFACTS_DIR, DEFAULT_DATA_DIR, DEFAULT_DEPLOY_DIR } from './paths';
import { Logger, defaultLogger } from '../core/logger';

/**
 * Default configuration for the pipeline.
 * Thresholds are starting values, every one of them can be overridden per deployment.
 */
const DEFAULT_CONFIG: PipelineConfig = {
  paths: {
    artifactsDir: DEFAULT_ARTIFACTS_DIR,
    dataDir: DEFAULT_DATA_DIR,
    deployDir: DEFAULT_DEPLOY_DIR,
  },
  sources: [
    {
      id: 'startup-announcements',
      kind: 'http_json',
      tier: SourceTier.Primary,
      enabled: true,
      endpoint:
        'https://apis.data.go.kr/B552735/kisedKstartupService01/getAnnouncementInformation01?page={page}&perPage={pageSize}&returnType=json',
      auth: { type: 'query_key', envKey: 'POLICY_API_KEY', paramName: 'serviceKey' },
      pagination: {
        mode: 'page',
        pageParam: 'page',
        sizeParam: 'perPage',
        startPage: 1,
        maxPages: 300,
        pageSize: 200,
        countPath: 'currentCount',
      },
      itemsPath: 'data',
      cutoff: { field: 'pbanc_rcpt_bgng_dt', date: '2025-07-01' },
      mapping: { kind: 'announcement' },
      fallbackOfficialUrl: 'https://www.k-startup.go.kr',
    },
    {
      id: 'public-services',
      kind: 'http_json',
      tier: SourceTier.Primary,
      enabled: true,
      endpoint: 'https://api.odcloud.kr/api/gov24/v3/serviceList',
      auth: { type: 'query_key', envKey: 'POLICY_API_KEY', paramName: 'serviceKey' },
      pagination: {
        mode: 'page',
        pageParam: 'page',
        sizeParam: 'perPage',
        startPage: 1,
        maxPages: 50,
        pageSize: 100,
        countPath: 'currentCount',
      },
      itemsPath: 'data',
      mapping: {
        kind: 'table',
        naturalKey: ['서비스ID'],
        fields: {
          title: ['서비스명'],
          official_url: ['상세조회URL'],
          source_org: ['소관기관명'],
          target_group: ['지원대상'],
          eligibility_text: ['선정기준'],
          benefit_text: ['지원내용'],
          category: ['서비스분야'],
          last_checked_at: ['수정일시'],
        },
        defaults: { region: '전국' },
      },
    },
    {
      id: 'fixtures',
      kind: 'file_json',
      tier: SourceTier.Fallback,
      enabled: true,
      endpoint: 'data/fixtures/policies.json',
      mapping: {
        kind: 'table',
        naturalKey: ['policy_id'],
        fields: {},
      },
    },
  ],
  fetch: {
    requestTimeoutMs: 20000,
    retry: {
      attempts: 3,
      baseDelayMs: 400,
      maxDelayMs: 5000,
    },
  },
  quality: {
    requiredFields: ['policy_id', 'title', 'official_url', 'last_checked_at', 'source_api', 'source_org'],
    maxNullRatio: 0.05,
    maxDuplicateIdRatio: 0.03,
    maxBrokenLinkRatio: 0.01,
    maxDuplicateMetaRatio: 0.03,
    maxVolumeDropRatio: 0.2,
    maxDuplicateTrendDelta: 0.02,
    openGraph: {
      keyTemplates: ['home', 'detail'],
      requiredTags: ['og:title', 'og:description', 'og:url'],
    },
    anchors: {
      genericPhrases: ['click here', 'here', 'more', 'read more', 'link', '바로가기', '더보기', '클릭'],
      maxGenericRatio: 0.1,
      minAnchors: 50,
    },
    performance: {
      maxPageBytes: 200_000,
      maxOverBudgetRatio: 0,
    },
  },
  monetization: {
    maxSlotsPerPage: 3,
    forbidBeforeFirstHeading: true,
    minElementsFromConversion: 2,
    denylist: ['광고를 클릭', '지금 클릭해서 지원받기', 'guaranteed approval', 'click the ad'],
    nonCriticalTemplates: ['category', 'region'],
    rpmRecommendations: [],
  },
  site: {
    baseUrl: 'https://policy.example.org',
    requiredDetailSections: ['data-section="official-source"', 'data-section="last-checked"', 'data-section="disclaimer"', 'rel="canonical"'],
    disclaimerText: '공식기관이 아니며',
    adClient: '',
  },
};

/**
 * Configuration file paths to search (in order)
 */
const CONFIG_PATHS = [
  '.policy-pipeline/config.yml',
  '.policy-pipeline/config.yaml',
  'policy-pipeline.yml',
  'policy-pipeline.yaml',
];

type ConfigOverride = {
  paths?: Partial<PipelineConfig['paths']>;
  sources?: SourceDescriptor[];
  fetch?: Partial<Omit<PipelineConfig['fetch'], 'retry'>> & { retry?: Partial<PipelineConfig['fetch']['retry']> };
  quality?: Partial<PipelineConfig['quality']>;
  monetization?: Partial<PipelineConfig['monetization']>;
  site?: Partial<PipelineConfig['site']>;
};

/**
 * Load pipeline configuration from file or use defaults.
 * An explicit path (argument or POLICY_PIPELINE_CONFIG) must exist and parse.
 * Environment variables (SITE_BASE_URL, DEPLOY_DIR, ADSENSE_CLIENT_ID) win over the file.
 */
export function loadConfig(
  basePath?: string,
  explicitPath?: string,
  logger: Logger = defaultLogger,
  env: NodeJS.ProcessEnv = process.env
): PipelineConfig {
  const base = basePath || process.cwd();
  const requested = explicitPath || env.POLICY_PIPELINE_CONFIG;

  if (requested) {
    const configPath = path.resolve(base, requested);
    if (!fs.existsSync(configPath)) {
      throw new Error(`Config file not found: ${configPath}`);
    }
    return applyEnvironment(mergeConfig(getDefaultConfig(), parseConfigFile(configPath)), env);
  }

  const searchPaths = CONFIG_PATHS.map((p) => path.resolve(base, p));

  for (const configPath of searchPaths) {
    if (fs.existsSync(configPath)) {
      try {
        return applyEnvironment(mergeConfig(getDefaultConfig(), parseConfigFile(configPath)), env);
      } catch (error) {
        logger.warn(`Warning: Failed to parse config at ${configPath}: ${error}`);
      }
    }
  }

  return applyEnvironment(getDefaultConfig(), env);
}

export function applyEnvironment(config: PipelineConfig, env: NodeJS.ProcessEnv): PipelineConfig {
  return {
    ...config,
    paths: { ...config.paths, deployDir: env.DEPLOY_DIR || config.paths.deployDir },
    site: {
      ...config.site,
      baseUrl: env.SITE_BASE_URL || config.site.baseUrl,
      adClient: env.ADSENSE_CLIENT_ID || config.site.adClient,
    },
  };
}

function parseConfigFile(configPath: string): ConfigOverride {
  const content = fs.readFileSync(configPath, 'utf-8');
  const parsed: unknown = yaml.parse(content);
  if (parsed === null || parsed === undefined) {
    return {};
  }
  if (!isConfigOverride(parsed)) {
    throw new Error(`Config at ${configPath} must be a mapping of known sections`);
  }
  return parsed;
}

const SECTIONS = ['paths', 'sources', 'fetch', 'quality', 'monetization', 'site'];

function isMapping(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Section-level shape only; field values are checked by validateConfig once merged with the defaults.
 */
function isConfigOverride(value: unknown): value is ConfigOverride {
  if (!isMapping(value)) return false;
  return Object.entries(value).every(([key, section]) => {
    if (!SECTIONS.includes(key)) return false;
    return key === 'sources' ? Array.isArray(section) : isMapping(section);
  });
}

/**
 * Merge configuration with defaults, section by section
 */
export function mergeConfig(defaults: PipelineConfig, override: ConfigOverride): PipelineConfig {
  return {
    paths: { ...defaults.paths, ...override.paths },
    // Replace sources completely if provided (don't merge with defaults)
    sources: override.sources !== undefined ? override.sources : defaults.sources,
    fetch: {
      ...defaults.fetch,
      ...override.fetch,
      retry: { ...defaults.fetch.retry, ...override.fetch?.retry },
    },
    quality: { ...defaults.quality, ...override.quality },
    monetization: { ...defaults.monetization, ...override.monetization },
    site: { ...defaults.site, ...override.site },
  };
}

/**
 * Get the default configuration (deep copy)
 */
export function getDefaultConfig(): PipelineConfig {
  return structuredClone(DEFAULT_CONFIG);
}

function isRatio(value: number): boolean {
  return Number.isFinite(value) && value >= 0 && value <= 1;
}

/**
 * Validate configuration
 */
export function validateConfig(config: PipelineConfig): string[] {
  const errors: string[] = [];

  for (const message of validateAgainst(SourceListSchema, config.sources)) {
    errors.push(`Invalid source definition at sources${message}`);
  }

  const seen = new Set<string>();
  for (const source of config.sources) {
    if (seen.has(source.id)) {
      errors.push(`Duplicate source id: ${source.id}`);
    }
    seen.add(source.id);
  }

  if (!config.sources.some((s) => s.enabled)) {
    errors.push('At least one source must be enabled.');
  }

  if (!/^https?:\/\/[^/]+/.test(config.site.baseUrl)) {
    errors.push(`Invalid site base URL: ${config.site.baseUrl}. Must be an absolute http(s) URL.`);
  }

  if (config.fetch.retry.attempts < 1) {
    errors.push('fetch.retry.attempts must be at least 1.');
  }
  if (config.fetch.requestTimeoutMs <= 0) {
    errors.push('fetch.requestTimeoutMs must be positive.');
  }

  const ratios: Array<[string, number]> = [
    ['quality.maxNullRatio', config.quality.maxNullRatio],
    ['quality.maxDuplicateIdRatio', config.quality.maxDuplicateIdRatio],
    ['quality.maxBrokenLinkRatio', config.quality.maxBrokenLinkRatio],
    ['quality.maxDuplicateMetaRatio', config.quality.maxDuplicateMetaRatio],
    ['quality.maxVolumeDropRatio', config.quality.maxVolumeDropRatio],
    ['quality.performance.maxOverBudgetRatio', config.quality.performance.maxOverBudgetRatio],
    ['quality.anchors.maxGenericRatio', config.quality.anchors.maxGenericRatio],
  ];
  for (const [name, value] of ratios) {
    if (!isRatio(value)) {
      errors.push(`Invalid ratio for ${name}: ${value}. Must be between 0 and 1.`);
    }
  }

  if (config.site.disclaimerText.trim() === '') {
    errors.push('site.disclaimerText must not be empty.');
  }
  if (config.monetization.denylist.some((phrase) => phrase.trim() === '')) {
    errors.push('monetization.denylist must not contain empty phrases.');
  }

  if (config.monetization.maxSlotsPerPage < 0) {
    errors.push('monetization.maxSlotsPerPage must not be negative.');
  }

  return errors;
}

/**
 * Parse a CLI/env mode string
 */
export function parseRunMode(value: string): RunMode | null {
  switch (value) {
    case RunMode.Bootstrap:
      return RunMode.Bootstrap;
    case RunMode.Daily:
      return RunMode.Daily;
    case RunMode.Manual:
      return RunMode.Manual;
    default:
      return null;
  }
}

/**
 * Process exit code for a decision: 0 on pass/soft_fail, 2 on hard_fail
 */
export function exitCodeFor(decision: GateDecision): number {
  return decision === GateDecision.HardFail ? 2 : 0;
}
