/**
 * shopext - Shopware extension tooling
 * Library entry point; the CLI lives in ./cli/index.ts
 */

export * from './core/errors/index.js';
export * from './core/extensions/index.js';

export { VersionConstraint, parseVersion } from './core/version/constraint.js';

export type { CliConfig } from './core/config/cli-config.js';
export { loadCliConfig } from './core/config/cli-config.js';

export type {
  AssetBuildConfig,
  AssetBuildOutcome,
  AssetBuilder,
  AssetPhase,
  AssetSource,
} from './core/assets/types.js';
export {
  convertExtensionsToSources,
  findAssetSourcesOfProject,
  getShopwareProjectConstraint,
} from './core/assets/collector.js';
export { CommandAssetBuilder } from './core/assets/builder.js';
export type {
  AssetBuildRunOptions,
  AssetBuildStep,
  AssetBuildSummary,
} from './core/assets/orchestrator.js';
export { AssetBuildOrchestrator } from './core/assets/orchestrator.js';

export { ValidationContext } from './core/validation/context.js';
export { createSourceArchive } from './core/validation/archive.js';
export type {
  HttpTransport,
  RemoteResult,
} from './core/validation/php-syntax-checker.js';
export { PhpSyntaxChecker } from './core/validation/php-syntax-checker.js';
export { ValidationPipeline } from './core/validation/pipeline.js';

export { findClosestShopwareProject } from './core/projects/project-root.js';
export { logger, LogLevel } from './core/monitoring/logger.js';
