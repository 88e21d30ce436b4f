/**
 * Default asset builder: runs the npm build script that every Shopware
 * administration/storefront app directory carries
 */

import * as fs from 'fs';
import * as path from 'path';
import { AssetBuildError, ErrorCode, getErrorMessage } from '../errors/index.js';
import {
  type CommandRunner,
  runTransparentCommand,
} from '../execution/command-runner.js';
import { logger } from '../monitoring/logger.js';
import type {
  AssetBuildConfig,
  AssetBuildOutcome,
  AssetBuilder,
  AssetPhase,
  AssetSource,
} from './types.js';

export class CommandAssetBuilder implements AssetBuilder {
  constructor(private readonly runner: CommandRunner = runTransparentCommand) {}

  async build(
    source: AssetSource,
    phase: AssetPhase,
    config: AssetBuildConfig
  ): Promise<AssetBuildOutcome> {
    const cwd = path.join(source.resourcesDir, 'app', phase);
    if (!fs.existsSync(path.join(cwd, 'package.json'))) {
      return 'skipped';
    }

    const constraint = config.shopwareVersion ?? source.constraint;
    const env: Record<string, string> = {
      EXTENSION_NAME: source.name,
      SHOPWARE_VERSION_CONSTRAINT: constraint.toString(),
      OUTPUT_DIR: path.join(source.resourcesDir, 'public'),
    };
    if (config.shopwareRoot) {
      env.SHOPWARE_ROOT = config.shopwareRoot;
    }
    if (config.browserslist) {
      env.BROWSERSLIST = config.browserslist;
    }

    let exitCode: number;
    try {
      exitCode = await this.runner('npm', ['run', 'build'], { cwd, env });
    } catch (error) {
      throw new AssetBuildError(
        `Could not start the ${phase} build of ${source.name}: ${getErrorMessage(error)}`,
        ErrorCode.ASSET_BUILD_FAILED,
        { source: source.name, phase },
        error instanceof Error ? error : undefined
      );
    }

    if (exitCode !== 0) {
      throw new AssetBuildError(
        `The ${phase} build of ${source.name} exited with code ${exitCode}`,
        ErrorCode.ASSET_BUILD_FAILED,
        { source: source.name, phase, exitCode }
      );
    }

    return 'built';
  }
}
