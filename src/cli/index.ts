#!/usr/bin/env node
/**
 * shopext CLI
 * Command-line interface for Shopware extension development
 */

// Load environment variables (quiet mode to suppress logging)
import { config as loadDotenv } from 'dotenv';
loadDotenv({ quiet: true });

import { program } from 'commander';
import * as fs from 'fs';
import * as path from 'path';
import { fileURLToPath } from 'url';
import { z } from 'zod';
import { LogLevel, logger } from '../core/monitoring/logger.js';
import { createExtensionCommand } from './commands/extension.js';
import { createProjectCommand } from './commands/project.js';

const PackageJsonSchema = z.object({ version: z.string() });

// Find package.json by walking up directories; works from src/ and dist/
function findPackageVersion(): string {
  let dir = path.dirname(fileURLToPath(import.meta.url));
  for (let i = 0; i < 5; i++) {
    const pkgPath = path.join(dir, 'package.json');
    if (fs.existsSync(pkgPath)) {
      try {
        const parsed = PackageJsonSchema.safeParse(
          JSON.parse(fs.readFileSync(pkgPath, 'utf-8'))
        );
        if (parsed.success) {
          return parsed.data.version;
        }
      } catch {
        logger.debug('Unreadable package.json', { pkgPath });
      }
    }
    dir = path.dirname(dir);
  }
  return '0.0.0';
}

program
  .name('shopext')
  .description('Discover, build and validate Shopware extensions')
  .version(findPackageVersion())
  .option('-v, --verbose', 'Print debug logs')
  .hook('preAction', (thisCommand) => {
    if (thisCommand.opts<{ verbose?: boolean }>().verbose) {
      logger.setLevel(LogLevel.DEBUG);
    } else if (!process.env['SHOPEXT_LOG_LEVEL']) {
      // command output goes to stdout; keep progress logs quiet by default
      logger.setLevel(LogLevel.WARN);
    }
  });

program.addCommand(createExtensionCommand());
program.addCommand(createProjectCommand());

// Only parse when running as main module (not when imported for testing)
const isMainModule =
  import.meta.url === `file://${process.argv[1]}` ||
  process.argv[1]?.endsWith('/shopext') ||
  process.argv[1]?.endsWith('index.ts');

if (isMainModule) {
  program.parseAsync().catch((error: unknown) => {
    logger.error('Command failed', error instanceof Error ? error : undefined);
    process.exit(1);
  });
}

export { program };
