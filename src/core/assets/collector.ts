/**
 * Asset source collection
 * Turns discovered extensions into the inputs of the asset build
 */

import * as fs from 'fs';
import * as path from 'path';
import {
  ConstraintError,
  ErrorCode,
  getErrorMessage,
} from '../errors/index.js';
import { SHOPWARE_CORE_PACKAGE } from '../extensions/composer.js';
import {
  findExtensionsFromProject,
  readComposerLock,
} from '../extensions/discovery.js';
import type { Extension } from '../extensions/types.js';
import { logger } from '../monitoring/logger.js';
import { VersionConstraint } from '../version/constraint.js';
import type { AssetPhase, AssetSource } from './types.js';

const ENTRY_FILES = ['main.ts', 'main.js'];

/**
 * Entry file of a phase below a Resources directory
 */
export function findPhaseEntry(
  resourcesDir: string,
  phase: AssetPhase
): string | undefined {
  return ENTRY_FILES.map((file) =>
    path.join(resourcesDir, 'app', phase, 'src', file)
  ).find((candidate) => fs.existsSync(candidate));
}

function resolveSourceConstraint(extension: Extension): VersionConstraint {
  try {
    return extension.getShopwareVersionConstraint();
  } catch (error) {
    throw new ConstraintError(
      `Could not resolve the shopware version constraint of ${extension.getPath()}: ${getErrorMessage(error)}`,
      error instanceof ConstraintError ? error.code : ErrorCode.CONSTRAINT_INVALID,
      { path: extension.getPath() }
    );
  }
}

function sourceFor(
  name: string,
  resourcesDir: string,
  constraint: VersionConstraint
): AssetSource | undefined {
  const administrationEntry = findPhaseEntry(resourcesDir, 'administration');
  const storefrontEntry = findPhaseEntry(resourcesDir, 'storefront');

  if (!administrationEntry && !storefrontEntry) {
    return undefined;
  }

  return { name, resourcesDir, administrationEntry, storefrontEntry, constraint };
}

/**
 * Keep the extensions (and their extra bundles) that ship front-end sources.
 * A constraint that cannot be resolved aborts the collection.
 */
export function convertExtensionsToSources(
  extensions: readonly Extension[]
): AssetSource[] {
  const sources: AssetSource[] = [];

  for (const extension of extensions) {
    const resourcesDir = extension.getResourcesDir();
    const extraBundles = extension.getExtensionConfig().build.extraBundles;

    const hasOwnAssets =
      findPhaseEntry(resourcesDir, 'administration') !== undefined ||
      findPhaseEntry(resourcesDir, 'storefront') !== undefined;

    if (!hasOwnAssets && extraBundles.length === 0) {
      continue;
    }

    const constraint = resolveSourceConstraint(extension);

    const own = sourceFor(extension.getName(), resourcesDir, constraint);
    if (own) {
      sources.push(own);
    }

    for (const bundle of extraBundles) {
      const bundleRoot = path.join(extension.getRootDir(), bundle.path);
      const bundleSource = sourceFor(
        bundle.name ?? path.basename(bundleRoot),
        path.join(bundleRoot, 'Resources'),
        constraint
      );
      if (bundleSource) {
        sources.push(bundleSource);
      }
    }
  }

  return sources;
}

export function findAssetSourcesOfProject(projectRoot: string): AssetSource[] {
  const { extensions, failures } = findExtensionsFromProject(projectRoot);

  if (failures.length > 0) {
    logger.warn('Some extensions could not be loaded and are not built', {
      failures: failures.map((failure) => failure.path),
    });
  }

  const sources = convertExtensionsToSources(extensions);
  logger.info('Collected asset sources', {
    extensions: extensions.length,
    sources: sources.map((source) => source.name),
  });

  return sources;
}

/**
 * Host version of a project: the installed shopware/core from composer.lock,
 * else the requirement in composer.json
 */
export function getShopwareProjectConstraint(
  projectRoot: string
): VersionConstraint {
  const lock = readComposerLock(projectRoot);
  const installed = lock?.packages.find(
    (pkg) => pkg.name === SHOPWARE_CORE_PACKAGE
  )?.version;

  if (installed !== undefined) {
    try {
      return VersionConstraint.parse(installed.replace(/^v/, ''));
    } catch {
      // dev branches (dev-trunk) carry no usable version
      logger.debug('Installed shopware/core has no usable version', {
        version: installed,
      });
    }
  }

  const composerFile = path.join(projectRoot, 'composer.json');
  if (fs.existsSync(composerFile)) {
    let composer: unknown;
    try {
      composer = JSON.parse(fs.readFileSync(composerFile, 'utf-8'));
    } catch (error) {
      throw new ConstraintError(
        `composer.json of the project is not valid JSON: ${getErrorMessage(error)}`,
        ErrorCode.CONSTRAINT_MISSING,
        { projectRoot }
      );
    }

    const required =
      composer !== null &&
      typeof composer === 'object' &&
      'require' in composer &&
      composer.require !== null &&
      typeof composer.require === 'object' &&
      SHOPWARE_CORE_PACKAGE in composer.require
        ? Object.entries(composer.require).find(
            ([name]) => name === SHOPWARE_CORE_PACKAGE
          )?.[1]
        : undefined;

    if (typeof required === 'string') {
      return VersionConstraint.parse(required);
    }
  }

  throw new ConstraintError(
    `Could not determine the shopware version of ${projectRoot}`,
    ErrorCode.CONSTRAINT_MISSING,
    { projectRoot }
  );
}
