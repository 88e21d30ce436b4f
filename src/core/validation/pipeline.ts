/**
 * Validation pipeline
 *
 * Structural tier: the extension's own manifest checks, local only.
 * Remote tier: zip the PHP sources and lint them against the minimum PHP
 * version of the extension's Shopware constraint. Remote failures degrade
 * to warnings; only a missing constraint or reported syntax errors become
 * errors.
 */

import type { CliConfig } from '../config/cli-config.js';
import { ParallelExecutor } from '../execution/parallel-executor.js';
import { getErrorMessage } from '../errors/index.js';
import { logger } from '../monitoring/logger.js';
import type { Extension, ExtensionType } from '../extensions/types.js';
import type { VersionConstraint } from '../version/constraint.js';
import { createSourceArchive, isPhpFile } from './archive.js';
import { ValidationContext } from './context.js';
import {
  type HttpTransport,
  PhpSyntaxChecker,
  type RemoteResult,
} from './php-syntax-checker.js';

/**
 * Extension kinds that ship PHP sources
 */
export const PHP_EXTENSION_TYPES: ReadonlySet<ExtensionType> = new Set([
  'plugin',
  'bundle',
]);

export interface ValidationPipelineOptions {
  checker?: PhpSyntaxChecker;
  skipRemoteCheck?: boolean;
  /** Extensions validated at the same time by validateAll */
  concurrency?: number;
}

export class ValidationPipeline {
  private readonly checker: PhpSyntaxChecker;
  private readonly skipRemoteCheck: boolean;
  private readonly concurrency: number;

  constructor(options: ValidationPipelineOptions = {}) {
    this.checker = options.checker ?? new PhpSyntaxChecker();
    this.skipRemoteCheck = options.skipRemoteCheck ?? false;
    this.concurrency = options.concurrency ?? 4;
  }

  static fromConfig(
    config: CliConfig,
    transport?: HttpTransport
  ): ValidationPipeline {
    return new ValidationPipeline({
      checker: new PhpSyntaxChecker({
        transport,
        phpVersionUrl: config.phpVersionUrl,
        syntaxCheckerUrl: config.syntaxCheckerUrl,
        timeout: config.httpTimeout,
      }),
      skipRemoteCheck: config.skipRemoteCheck,
      concurrency: config.validationConcurrency,
    });
  }

  async validate(extension: Extension): Promise<ValidationContext> {
    const ctx = new ValidationContext(extension);

    extension.validate(ctx);

    if (!this.skipRemoteCheck && PHP_EXTENSION_TYPES.has(extension.type)) {
      await this.runRemoteTier(ctx);
    }

    logger.debug('Validation finished', {
      path: extension.getPath(),
      errors: ctx.errors.length,
      warnings: ctx.warnings.length,
    });

    return ctx;
  }

  /**
   * Validate every extension with its own context; order follows the input
   */
  async validateAll(
    extensions: readonly Extension[]
  ): Promise<ValidationContext[]> {
    const executor = new ParallelExecutor(this.concurrency);
    const results = await executor.executeParallel(extensions, (extension) =>
      this.validate(extension)
    );

    return results.map((result, index) => {
      if (result.success && result.result) {
        return result.result;
      }

      // validate() does not throw; keep the report complete if it ever does
      const ctx = new ValidationContext(extensions[index]);
      ctx.addError(
        `Validation aborted: ${getErrorMessage(result.error ?? 'unknown error')}`
      );
      return ctx;
    });
  }

  private async runRemoteTier(ctx: ValidationContext): Promise<void> {
    const extension = ctx.extension;

    let archive: Uint8Array;
    try {
      archive = await createSourceArchive(extension.getPath(), isPhpFile);
    } catch (error) {
      ctx.addError(`Could not package php files: ${getErrorMessage(error)}`);
      return;
    }

    applyRemoteResult(ctx, await this.checkSyntax(extension, archive));
  }

  private async checkSyntax(
    extension: Extension,
    archive: Uint8Array
  ): Promise<RemoteResult<string[]>> {
    let constraint: VersionConstraint;
    try {
      constraint = extension.getShopwareVersionConstraint();
    } catch (error) {
      return {
        kind: 'fatal',
        message: `Could not parse shopware version constraint: ${getErrorMessage(error)}`,
      };
    }

    const phpVersion = await this.checker.resolvePhpVersion(constraint);
    if (phpVersion.kind !== 'success') {
      return phpVersion;
    }

    logger.info('Using php version for syntax check', {
      phpVersion: phpVersion.value,
      constraint: constraint.toString(),
    });

    return this.checker.checkArchive(archive, phpVersion.value);
  }
}

function applyRemoteResult(
  ctx: ValidationContext,
  result: RemoteResult<string[]>
): void {
  switch (result.kind) {
    case 'success':
      for (const syntaxError of result.value) {
        ctx.addError(syntaxError);
      }
      break;
    case 'warning':
      ctx.addWarning(result.message);
      break;
    case 'fatal':
      ctx.addError(result.message);
      break;
  }
}
