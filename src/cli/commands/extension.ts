/**
 * Extension commands: work on a single extension directory
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { loadCliConfig } from '../../core/config/cli-config.js';
import { ErrorHandler } from '../../core/errors/index.js';
import { getExtensionByFolder } from '../../core/extensions/discovery.js';
import type { ValidationContext } from '../../core/validation/context.js';
import { ValidationPipeline } from '../../core/validation/pipeline.js';

/**
 * Print errors and warnings of one extension; true when it passed
 */
export function printValidationReport(ctx: ValidationContext): boolean {
  let name: string;
  try {
    name = ctx.extension.getName();
  } catch {
    name = ctx.extension.getPath();
  }

  if (!ctx.hasErrors() && !ctx.hasWarnings()) {
    console.log(chalk.green(`✓ ${name}`));
    return true;
  }

  console.log(ctx.hasErrors() ? chalk.red(`✗ ${name}`) : chalk.yellow(`⚠ ${name}`));
  ctx.errors.forEach((error) => {
    console.log(chalk.red(`  • ${error}`));
  });
  ctx.warnings.forEach((warning) => {
    console.log(chalk.yellow(`  • ${warning}`));
  });

  return !ctx.hasErrors();
}

export function createExtensionCommand(): Command {
  const extension = new Command('extension').description(
    'Work with a single extension'
  );

  extension
    .command('validate <path>')
    .description('Validate an extension (manifest checks and php syntax)')
    .option('--skip-remote', 'Only run the local checks')
    .action(async (dir: string, options: { skipRemote?: boolean }) => {
      try {
        const config = loadCliConfig();
        if (options.skipRemote) {
          config.skipRemoteCheck = true;
        }

        const ctx = await ValidationPipeline.fromConfig(config).validate(
          getExtensionByFolder(dir)
        );
        process.exitCode = printValidationReport(ctx) ? 0 : 1;
      } catch (error) {
        ErrorHandler.handle(error, 'extension validate');
      }
    });

  extension
    .command('changelog <path>')
    .description('Print the changelog of the current extension version')
    .option('-l, --locale <locale>', 'de-DE or en-GB', 'en-GB')
    .action((dir: string, options: { locale: string }) => {
      try {
        const { version, changelog } = getExtensionByFolder(dir).getChangelog();
        const text =
          options.locale === 'de-DE' ? changelog['de-DE'] : changelog['en-GB'];

        console.log(chalk.bold(version));
        console.log(text);
      } catch (error) {
        ErrorHandler.handle(error, 'extension changelog');
      }
    });

  return extension;
}
