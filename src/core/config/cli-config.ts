/**
 * Runtime configuration for shopext
 * Read from the environment (a .env file is loaded by the CLI entry point)
 */

import { z } from 'zod';
import { ErrorCode, SystemError } from '../errors/index.js';

export const DEFAULT_PHP_VERSION_URL =
  'https://raw.githubusercontent.com/FriendsOfShopware/shopware-static-data/main/data/php-version.json';

export const DEFAULT_SYNTAX_CHECKER_URL = 'https://php-syntax-checker.fos.gg/';

const booleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .transform((value) => value === 'true' || value === '1');

export const CliConfigSchema = z.object({
  phpVersionUrl: z.string().url().default(DEFAULT_PHP_VERSION_URL),
  syntaxCheckerUrl: z.string().url().default(DEFAULT_SYNTAX_CHECKER_URL),
  httpTimeout: z.coerce.number().int().min(100).max(300000).default(15000),
  validationConcurrency: z.coerce.number().int().min(1).max(32).default(4),
  skipRemoteCheck: booleanFlag.default('false'),
});

export type CliConfig = z.infer<typeof CliConfigSchema>;

/**
 * Build the configuration from environment variables
 */
export function loadCliConfig(
  env: NodeJS.ProcessEnv = process.env
): CliConfig {
  const result = CliConfigSchema.safeParse({
    phpVersionUrl: env['SHOPEXT_PHP_VERSION_URL'] || undefined,
    syntaxCheckerUrl: env['SHOPEXT_SYNTAX_CHECKER_URL'] || undefined,
    httpTimeout: env['SHOPEXT_HTTP_TIMEOUT'] || undefined,
    validationConcurrency: env['SHOPEXT_VALIDATION_CONCURRENCY'] || undefined,
    skipRemoteCheck: env['SHOPEXT_SKIP_REMOTE_CHECK'] || undefined,
  });

  if (!result.success) {
    const issues = result.error.issues.map(
      (issue) => `${issue.path.join('.')}: ${issue.message}`
    );
    throw new SystemError(
      `Invalid environment configuration: ${issues.join('; ')}`,
      ErrorCode.CONFIGURATION_ERROR,
      { issues }
    );
  }

  return result.data;
}
