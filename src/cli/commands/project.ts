/**
 * Project commands: operate on every extension of a Shopware project
 */

import { Command } from 'commander';
import chalk from 'chalk';
import * as path from 'path';
import {
  findAssetSourcesOfProject,
  getShopwareProjectConstraint,
} from '../../core/assets/collector.js';
import { AssetBuildOrchestrator } from '../../core/assets/orchestrator.js';
import { loadCliConfig } from '../../core/config/cli-config.js';
import { ErrorHandler, getErrorMessage } from '../../core/errors/index.js';
import {
  type DiscoveryFailure,
  findExtensionsFromProject,
} from '../../core/extensions/discovery.js';
import type { Extension } from '../../core/extensions/types.js';
import { logger } from '../../core/monitoring/logger.js';
import { findClosestShopwareProject } from '../../core/projects/project-root.js';
import { ValidationPipeline } from '../../core/validation/pipeline.js';
import { printValidationReport } from './extension.js';

function resolveProjectRoot(dir: string | undefined): string {
  return dir !== undefined ? path.resolve(dir) : findClosestShopwareProject();
}

function describeExtension(extension: Extension): Record<string, string> {
  const attempt = (read: () => string): string => {
    try {
      return read();
    } catch (error) {
      logger.debug('Cannot read extension property', {
        path: extension.getPath(),
        error: getErrorMessage(error),
      });
      return '-';
    }
  };

  return {
    name: attempt(() => extension.getName()),
    type: extension.type,
    version: attempt(() => extension.getVersion().version),
    constraint: attempt(() => extension.getShopwareVersionConstraint().toString()),
    path: extension.getPath(),
  };
}

function printFailures(failures: readonly DiscoveryFailure[]): void {
  failures.forEach((failure) => {
    console.log(chalk.red(`✗ ${failure.path}`));
    console.log(chalk.red(`  • ${failure.message}`));
  });
}

export function createProjectCommand(): Command {
  const project = new Command('project').description(
    'Work with the extensions of a Shopware project'
  );

  const extension = project
    .command('extension')
    .description('Inspect the extensions of a project');

  extension
    .command('list [dir]')
    .description('List all extensions of the project')
    .option('--json', 'Output as JSON')
    .action((dir: string | undefined, options: { json?: boolean }) => {
      try {
        const { extensions, failures } = findExtensionsFromProject(
          resolveProjectRoot(dir)
        );
        const rows = extensions.map(describeExtension);

        if (options.json) {
          console.log(JSON.stringify({ extensions: rows, failures }, null, 2));
          return;
        }

        if (rows.length === 0) {
          console.log(chalk.gray('No extensions found'));
        }
        rows.forEach((row) => {
          console.log(
            `${chalk.cyan(row.name)} ${chalk.gray(`(${row.type})`)} ${row.version}  ${chalk.gray(row.constraint)}`
          );
        });
        printFailures(failures);
      } catch (error) {
        ErrorHandler.handle(error, 'project extension list');
      }
    });

  project
    .command('validate [dir]')
    .description('Validate every extension of the project')
    .option('--skip-remote', 'Only run the local checks')
    .action(async (dir: string | undefined, options: { skipRemote?: boolean }) => {
      try {
        const config = loadCliConfig();
        if (options.skipRemote) {
          config.skipRemoteCheck = true;
        }

        const { extensions, failures } = findExtensionsFromProject(
          resolveProjectRoot(dir)
        );
        const results = await ValidationPipeline.fromConfig(config).validateAll(
          extensions
        );

        results.forEach((ctx) => printValidationReport(ctx));
        printFailures(failures);

        const failed =
          results.filter((ctx) => ctx.hasErrors()).length + failures.length;
        console.log(
          failed === 0
            ? chalk.green(`\n✅ ${results.length} extensions valid`)
            : chalk.red(`\n❌ ${failed} extensions have errors`)
        );

        process.exitCode = failed === 0 ? 0 : 1;
      } catch (error) {
        ErrorHandler.handle(error, 'project validate');
      }
    });

  project
    .command('admin-build [dir]')
    .description('Build the administration assets of all extensions')
    .option('--skip-assets-install', 'Do not run assets:install afterwards')
    .action(
      async (dir: string | undefined, options: { skipAssetsInstall?: boolean }) => {
        try {
          const projectRoot = resolveProjectRoot(dir);
          logger.info('Looking for extensions to build assets in project', {
            projectRoot,
          });

          const sources = findAssetSourcesOfProject(projectRoot);
          const shopwareVersion = getShopwareProjectConstraint(projectRoot);

          const summary = await new AssetBuildOrchestrator().build(
            sources,
            {
              disableAdministrationBuild: false,
              disableStorefrontBuild: true,
              shopwareRoot: projectRoot,
              shopwareVersion,
            },
            { installAssets: !options.skipAssetsInstall }
          );

          console.log(
            chalk.green(`✓ Built ${summary.built.length} administration bundles`)
          );
          summary.skipped.forEach((step) => {
            console.log(
              chalk.yellow(`⚠ ${step.source}: no package.json in app/${step.phase}, not built`)
            );
          });
          process.exitCode = summary.installExitCode ?? 0;
        } catch (error) {
          ErrorHandler.handle(error, 'project admin-build');
        }
      }
    );

  return project;
}
