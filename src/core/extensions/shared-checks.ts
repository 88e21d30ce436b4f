/**
 * Structural checks that do not depend on the manifest format
 */

import * as fs from 'fs';
import * as path from 'path';
import type { ValidationContext } from '../validation/context.js';
import type { Extension } from './types.js';

export const DEFAULT_PLUGIN_ICON = 'src/Resources/config/plugin.png';
export const DEFAULT_APP_ICON = 'Resources/config/plugin.png';

export function validateIcon(
  extension: Extension,
  icon: string,
  ctx: ValidationContext
): void {
  if (!fs.existsSync(path.join(extension.getPath(), icon))) {
    ctx.addError(`The plugin icon ${icon} does not exist`);
  }
}

/**
 * Storefront themes ship a theme.json with a preview image
 */
export function validateTheme(
  extension: Extension,
  ctx: ValidationContext
): void {
  const themeFile = path.join(extension.getResourcesDir(), 'theme.json');
  if (!fs.existsSync(themeFile)) {
    return;
  }

  let theme: unknown;
  try {
    theme = JSON.parse(fs.readFileSync(themeFile, 'utf-8'));
  } catch {
    ctx.addError('Cannot decode theme.json');
    return;
  }

  const previewMedia =
    theme !== null && typeof theme === 'object' && 'previewMedia' in theme
      ? theme.previewMedia
      : undefined;

  if (typeof previewMedia !== 'string' || previewMedia === '') {
    ctx.addError('Required field "previewMedia" in theme.json is not set');
    return;
  }

  const mediaPath = path.join(extension.getResourcesDir(), previewMedia);
  if (!fs.existsSync(mediaPath)) {
    const relative = path
      .relative(extension.getPath(), mediaPath)
      .split(path.sep)
      .join('/');
    ctx.addError(
      `Theme preview image file is expected to be placed at ${relative}, but not found there.`
    );
  }
}
