/**
 * Remote PHP syntax checker client
 *
 * Two endpoints: a static lookup table mapping Shopware versions to the PHP
 * version they require, and a lambda that lints a zip of PHP files against
 * one PHP version. Every failure here is advisory; callers get a result
 * value and decide, nothing is thrown.
 */

import { z } from 'zod';
import { SemVer, compare } from 'semver';
import {
  DEFAULT_PHP_VERSION_URL,
  DEFAULT_SYNTAX_CHECKER_URL,
} from '../config/cli-config.js';
import { getErrorMessage, isAbortError } from '../errors/index.js';
import { logger } from '../monitoring/logger.js';
import { type VersionConstraint, parseVersion } from '../version/constraint.js';

export type HttpTransport = (
  url: string,
  init?: RequestInit
) => Promise<Response>;

export type RemoteResult<T> =
  | { kind: 'success'; value: T }
  | { kind: 'warning'; message: string }
  | { kind: 'fatal'; message: string };

export interface PhpSyntaxCheckerOptions {
  transport?: HttpTransport;
  phpVersionUrl?: string;
  syntaxCheckerUrl?: string;
  /** Per request, in milliseconds */
  timeout?: number;
}

const PhpVersionTableSchema = z.record(z.string(), z.string());

const SyntaxCheckerResponseSchema = z.object({
  errors: z.array(z.string()).default([]),
});

/**
 * PHP version of the lowest Shopware version in the table that satisfies
 * the constraint. Keys that are no version are ignored.
 */
export function selectPhpVersion(
  table: Record<string, string>,
  constraint: VersionConstraint
): string | undefined {
  const candidates: Array<{ version: SemVer; php: string }> = [];

  for (const [shopwareVersion, phpVersion] of Object.entries(table)) {
    let version: SemVer;
    try {
      version = parseVersion(shopwareVersion);
    } catch {
      continue;
    }

    if (constraint.check(version)) {
      candidates.push({ version, php: phpVersion });
    }
  }

  candidates.sort((a, b) => compare(a.version, b.version));
  return candidates[0]?.php;
}

export class PhpSyntaxChecker {
  private readonly transport: HttpTransport;
  private readonly phpVersionUrl: string;
  private readonly syntaxCheckerUrl: string;
  private readonly timeout: number;

  constructor(options: PhpSyntaxCheckerOptions = {}) {
    this.transport = options.transport ?? ((url, init) => fetch(url, init));
    this.phpVersionUrl = options.phpVersionUrl ?? DEFAULT_PHP_VERSION_URL;
    this.syntaxCheckerUrl = options.syntaxCheckerUrl ?? DEFAULT_SYNTAX_CHECKER_URL;
    this.timeout = options.timeout ?? 15000;
  }

  private describeFailure(error: unknown): string {
    return isAbortError(error)
      ? `request timed out after ${this.timeout}ms`
      : getErrorMessage(error);
  }

  /**
   * Minimum PHP version for the constraint; any failure is a warning
   */
  async resolvePhpVersion(
    constraint: VersionConstraint
  ): Promise<RemoteResult<string>> {
    const warn = (reason: string): RemoteResult<string> => ({
      kind: 'warning',
      message: `Could not find min php version for plugin: ${reason}`,
    });

    let table: Record<string, string>;
    try {
      const response = await this.transport(this.phpVersionUrl, {
        method: 'GET',
        signal: AbortSignal.timeout(this.timeout),
      });

      if (!response.ok) {
        return warn(`HTTP ${response.status}`);
      }

      const parsed = PhpVersionTableSchema.safeParse(await response.json());
      if (!parsed.success) {
        return warn('unexpected response format');
      }
      table = parsed.data;
    } catch (error) {
      return warn(this.describeFailure(error));
    }

    const phpVersion = selectPhpVersion(table, constraint);
    if (phpVersion === undefined) {
      return warn(
        `no php version known for shopware version ${constraint.toString()}`
      );
    }

    return { kind: 'success', value: phpVersion };
  }

  /**
   * Send the archive to the linter. Success carries the syntax errors it
   * reported, which is an empty list for HTTP 200.
   */
  async checkArchive(
    archive: Uint8Array,
    phpVersion: string
  ): Promise<RemoteResult<string[]>> {
    const url = new URL(this.syntaxCheckerUrl);
    url.searchParams.set('version', phpVersion);

    const body = new FormData();
    body.append(
      'file',
      new Blob([archive], { type: 'application/zip' }),
      'file.zip'
    );

    logger.info('Checking php syntax remotely', {
      phpVersion,
      endpoint: url.origin,
      bytes: archive.byteLength,
    });

    let response: Response;
    try {
      response = await this.transport(url.toString(), {
        method: 'POST',
        body,
        signal: AbortSignal.timeout(this.timeout),
      });
    } catch (error) {
      return {
        kind: 'warning',
        message: `Could not validate php files: ${this.describeFailure(error)}`,
      };
    }

    if (response.status === 200) {
      return { kind: 'success', value: [] };
    }

    try {
      const parsed = SyntaxCheckerResponseSchema.parse(
        JSON.parse(await response.text())
      );
      return { kind: 'success', value: parsed.errors };
    } catch (error) {
      return {
        kind: 'warning',
        message: `cannot decode php syntax checker response: ${getErrorMessage(error)}`,
      };
    }
  }
}
