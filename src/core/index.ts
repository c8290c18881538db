export { PipelineRunner, defaultRunId } from './orchestrator';
export type { RunOptions, PipelineDependencies, RunOutcome } from './orchestrator';
export { SourceConnector, buildRequestUrl, readItems, readPath, isOlderThanCutoff, backoffDelay } from './source-connector';
export type { SourceFetchResult, SourceConnectorOptions } from './source-connector';
export { RawSnapshotStore, isRawSnapshot } from './raw_snapshot_store';
export { MapperRegistry, createMapper } from './mappers';
export type { MappedRow, RowMapper } from './mappers';
export { CanonicalNormalizer, contentKey, diffDatasets } from './normalizer';
export { CanonicalStore, readCanonicalFile, publishBlockers, isAbsoluteHttpUrl } from './canonical_store';
export { inspectSite, buildFrontendReport } from './site-inspector';
export { evaluateQuality } from './quality_gate';
export type { QualityInput } from './quality_gate';
export { evaluateMonetization } from './monetization_gate';
export type { MonetizationInput } from './monetization_gate';
export { decide, buildGateReport } from './gate_report';
export { StaticSiteGenerator, slugify, escapeHtml } from './page_generator';
export type { PageGenerator, GenerateOptions, GeneratedSite } from './page_generator';
export { DirectoryDeployer } from './deployer';
export type { Deployer } from './deployer';
export { RunRecorder, readRunRecord, listRunRecords } from './run_record';
export { ArtifactWriter } from './artifact_writer';
export { FetchError, SnapshotExistsError, FatalPipelineError, ConfigError, RunConflictError } from './errors';
export { ConsoleLogger, defaultLogger } from './logger';
export type { Logger } from './logger';
