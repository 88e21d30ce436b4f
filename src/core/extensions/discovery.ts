/**
 * Extension discovery
 * Finds extensions in a Shopware project and picks the variant per directory
 */

import * as fs from 'fs';
import * as path from 'path';
import { z } from 'zod';
import { ErrorCode, ExtensionError, getErrorMessage } from '../errors/index.js';
import { logger } from '../monitoring/logger.js';
import { App, hasAppManifest } from './app.js';
import { COMPOSER_TYPE_BUNDLE, COMPOSER_TYPE_PLUGIN } from './composer.js';
import { PlatformPlugin } from './platform-plugin.js';
import { ShopwareBundle } from './shopware-bundle.js';
import type { Extension, ExtensionType } from './types.js';

/**
 * Directories below the project root that hold one extension per child
 */
export const EXTENSION_CONTAINERS = [
  'custom/apps',
  'custom/plugins',
  'custom/static-plugins',
];

interface ExtensionVariant {
  type: ExtensionType;
  matches(dir: string): boolean;
  create(dir: string): Extension;
}

/**
 * Composer type of the directory, undefined without composer.json.
 * Unparsable JSON is a construction error of the extension it belongs to.
 */
function composerTypeOf(dir: string): string | undefined {
  const file = path.join(dir, 'composer.json');
  if (!fs.existsSync(file)) {
    return undefined;
  }

  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(file, 'utf-8'));
  } catch (error) {
    throw new ExtensionError(
      `composer.json is not valid JSON: ${getErrorMessage(error)}`,
      ErrorCode.MANIFEST_INVALID,
      { path: dir }
    );
  }

  if (raw !== null && typeof raw === 'object' && 'type' in raw) {
    return typeof raw.type === 'string' ? raw.type : undefined;
  }
  return undefined;
}

/**
 * Most specific manifest first
 */
const VARIANTS: readonly ExtensionVariant[] = [
  {
    type: 'app',
    matches: hasAppManifest,
    create: (dir) => App.fromPath(dir),
  },
  {
    type: 'plugin',
    matches: (dir) => composerTypeOf(dir) === COMPOSER_TYPE_PLUGIN,
    create: (dir) => PlatformPlugin.fromPath(dir),
  },
  {
    type: 'bundle',
    matches: (dir) => composerTypeOf(dir) === COMPOSER_TYPE_BUNDLE,
    create: (dir) => ShopwareBundle.fromPath(dir),
  },
];

function detectVariant(dir: string): ExtensionVariant | undefined {
  return VARIANTS.find((variant) => variant.matches(dir));
}

/**
 * Build the extension living in the directory
 */
export function getExtensionByFolder(dir: string): Extension {
  const absolute = path.resolve(dir);

  if (!fs.existsSync(absolute)) {
    throw new ExtensionError(
      `Directory ${absolute} does not exist`,
      ErrorCode.EXTENSION_NOT_FOUND,
      { path: absolute }
    );
  }

  const variant = detectVariant(absolute);
  if (!variant) {
    throw new ExtensionError(
      `Unknown extension type in ${absolute}`,
      ErrorCode.UNKNOWN_EXTENSION_TYPE,
      { path: absolute }
    );
  }

  return variant.create(absolute);
}

export interface DiscoveryFailure {
  path: string;
  message: string;
}

export interface DiscoveryResult {
  extensions: Extension[];
  failures: DiscoveryFailure[];
}

function isDirectory(candidate: string): boolean {
  try {
    return fs.statSync(candidate).isDirectory();
  } catch {
    // dangling symlink
    return false;
  }
}

function listChildDirectories(dir: string): string[] {
  if (!isDirectory(dir)) {
    return [];
  }

  return fs
    .readdirSync(dir)
    .filter((name) => !name.startsWith('.'))
    .sort()
    .map((name) => path.join(dir, name))
    .filter(isDirectory);
}

const ComposerLockSchema = z.object({
  packages: z
    .array(
      z.object({
        name: z.string(),
        type: z.string().optional(),
        version: z.string().optional(),
      })
    )
    .default([]),
});

export type ComposerLock = z.infer<typeof ComposerLockSchema>;

/**
 * composer.lock of the project, undefined when absent or unreadable
 */
export function readComposerLock(projectRoot: string): ComposerLock | undefined {
  const file = path.join(projectRoot, 'composer.lock');
  if (!fs.existsSync(file)) {
    return undefined;
  }

  try {
    const parsed = ComposerLockSchema.safeParse(
      JSON.parse(fs.readFileSync(file, 'utf-8'))
    );
    if (parsed.success) {
      return parsed.data;
    }
    logger.warn('composer.lock has an unexpected structure', {
      file,
      issues: parsed.error.issues.length,
    });
  } catch (error) {
    logger.warn('composer.lock is not valid JSON', {
      file,
      error: getErrorMessage(error),
    });
  }
  return undefined;
}

/**
 * Plugins and bundles installed through composer into vendor/
 */
function vendorExtensionDirectories(projectRoot: string): string[] {
  const lock = readComposerLock(projectRoot);
  if (!lock) {
    return [];
  }

  return lock.packages
    .filter(
      (pkg) =>
        pkg.type === COMPOSER_TYPE_PLUGIN || pkg.type === COMPOSER_TYPE_BUNDLE
    )
    .map((pkg) => path.join(projectRoot, 'vendor', ...pkg.name.split('/')))
    .filter(isDirectory);
}

/**
 * Walk the extension containers of a project. Directories without a known
 * manifest are skipped; directories whose manifest is broken end up in
 * `failures` and the walk continues.
 */
export function findExtensionsFromProject(projectRoot: string): DiscoveryResult {
  const root = path.resolve(projectRoot);
  const candidates = new Set<string>();

  for (const container of EXTENSION_CONTAINERS) {
    for (const dir of listChildDirectories(path.join(root, container))) {
      candidates.add(dir);
    }
  }

  for (const dir of vendorExtensionDirectories(root)) {
    candidates.add(dir);
  }

  const result: DiscoveryResult = { extensions: [], failures: [] };

  for (const dir of [...candidates].sort()) {
    try {
      const variant = detectVariant(dir);
      if (!variant) {
        logger.debug('Skipping directory without extension manifest', {
          path: dir,
        });
        continue;
      }

      result.extensions.push(variant.create(dir));
    } catch (error) {
      const message = getErrorMessage(error);
      logger.warn('Could not load extension', { path: dir, error: message });
      result.failures.push({ path: dir, message });
    }
  }

  logger.debug('Extension discovery finished', {
    projectRoot: root,
    extensions: result.extensions.length,
    failures: result.failures.length,
  });

  return result;
}
