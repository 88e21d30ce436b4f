/**
 * Asset build orchestration
 *
 * Builds administration and storefront of every source in order. The first
 * failure aborts the run; assets:install only happens after all builds passed.
 */

import { AssetBuildError, ErrorCode, getErrorMessage } from '../errors/index.js';
import {
  type CommandRunner,
  runTransparentCommand,
} from '../execution/command-runner.js';
import { logger } from '../monitoring/logger.js';
import { CommandAssetBuilder } from './builder.js';
import type {
  AssetBuildConfig,
  AssetBuildOutcome,
  AssetBuilder,
  AssetPhase,
  AssetSource,
} from './types.js';

export interface AssetBuildOrchestratorOptions {
  builder?: AssetBuilder;
  runner?: CommandRunner;
}

export interface AssetBuildRunOptions {
  /** Run `php bin/console assets:install` in config.shopwareRoot afterwards */
  installAssets?: boolean;
}

export interface AssetBuildStep {
  source: string;
  phase: AssetPhase;
}

export interface AssetBuildSummary {
  built: AssetBuildStep[];
  /** Phases without build tooling; nothing was written for them */
  skipped: AssetBuildStep[];
  /** Exit code of assets:install; undefined when it did not run */
  installExitCode?: number;
}

export class AssetBuildOrchestrator {
  private readonly builder: AssetBuilder;
  private readonly runner: CommandRunner;

  constructor(options: AssetBuildOrchestratorOptions = {}) {
    this.runner = options.runner ?? runTransparentCommand;
    this.builder = options.builder ?? new CommandAssetBuilder(this.runner);
  }

  private phasesOf(source: AssetSource, config: AssetBuildConfig): AssetPhase[] {
    const phases: AssetPhase[] = [];
    if (source.administrationEntry && !config.disableAdministrationBuild) {
      phases.push('administration');
    }
    if (source.storefrontEntry && !config.disableStorefrontBuild) {
      phases.push('storefront');
    }
    return phases;
  }

  async build(
    sources: readonly AssetSource[],
    config: AssetBuildConfig,
    options: AssetBuildRunOptions = {}
  ): Promise<AssetBuildSummary> {
    const summary: AssetBuildSummary = { built: [], skipped: [] };

    for (const source of sources) {
      for (const phase of this.phasesOf(source, config)) {
        logger.info('Building assets', { source: source.name, phase });

        let outcome: AssetBuildOutcome;
        try {
          outcome = await this.builder.build(source, phase, config);
        } catch (error) {
          if (error instanceof AssetBuildError) {
            throw error;
          }
          throw new AssetBuildError(
            `Building ${phase} of ${source.name} failed: ${getErrorMessage(error)}`,
            ErrorCode.ASSET_BUILD_FAILED,
            { source: source.name, phase },
            error instanceof Error ? error : undefined
          );
        }

        if (outcome === 'skipped') {
          logger.warn('No package.json in the phase directory, nothing built', {
            source: source.name,
            phase,
          });
          summary.skipped.push({ source: source.name, phase });
        } else {
          summary.built.push({ source: source.name, phase });
        }
      }
    }

    if (options.installAssets) {
      summary.installExitCode = await this.installAssets(config);
    }

    return summary;
  }

  private async installAssets(config: AssetBuildConfig): Promise<number | undefined> {
    if (!config.shopwareRoot) {
      logger.warn('No shopware root known, skipping assets:install');
      return undefined;
    }

    logger.info('Installing assets', { shopwareRoot: config.shopwareRoot });

    try {
      return await this.runner('php', ['bin/console', 'assets:install'], {
        cwd: config.shopwareRoot,
      });
    } catch (error) {
      throw new AssetBuildError(
        `Could not run assets:install: ${getErrorMessage(error)}`,
        ErrorCode.ASSET_INSTALL_FAILED,
        { shopwareRoot: config.shopwareRoot },
        error instanceof Error ? error : undefined
      );
    }
  }
}
