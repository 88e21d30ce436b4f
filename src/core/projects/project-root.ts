/**
 * Shopware project root detection
 */

import * as fs from 'fs';
import * as path from 'path';
import { ErrorCode, SystemError } from '../errors/index.js';
import { SHOPWARE_CORE_PACKAGE } from '../extensions/composer.js';
import { logger } from '../monitoring/logger.js';

const PROJECT_MARKER_PACKAGES = [SHOPWARE_CORE_PACKAGE, 'shopware/platform'];

/**
 * A project requires shopware/core (or is the platform repository itself)
 */
export function isShopwareProject(dir: string): boolean {
  const composerFile = path.join(dir, 'composer.json');
  if (!fs.existsSync(composerFile)) {
    return false;
  }

  let composer: unknown;
  try {
    composer = JSON.parse(fs.readFileSync(composerFile, 'utf-8'));
  } catch {
    logger.debug('Ignoring unparsable composer.json', { file: composerFile });
    return false;
  }

  if (composer === null || typeof composer !== 'object') {
    return false;
  }

  if ('name' in composer && composer.name === 'shopware/platform') {
    return true;
  }

  if (
    'require' in composer &&
    composer.require !== null &&
    typeof composer.require === 'object'
  ) {
    const required = Object.keys(composer.require);
    return PROJECT_MARKER_PACKAGES.some((pkg) => required.includes(pkg));
  }

  return false;
}

/**
 * Walk up from the start directory to the nearest Shopware project
 */
export function findClosestShopwareProject(start: string = process.cwd()): string {
  let dir = path.resolve(start);

  for (;;) {
    if (isShopwareProject(dir)) {
      return dir;
    }

    const parent = path.dirname(dir);
    if (parent === dir) {
      break;
    }
    dir = parent;
  }

  throw new SystemError(
    `Cannot find a Shopware project in ${path.resolve(start)} or its parents`,
    ErrorCode.PROJECT_NOT_FOUND,
    { start }
  );
}
