/**
 * Extension model
 *
 * @example
 * ```typescript
 * import { findExtensionsFromProject } from './core/extensions/index.js';
 *
 * const { extensions, failures } = findExtensionsFromProject('/var/www/shop');
 * for (const extension of extensions) {
 *   console.log(extension.getName(), extension.getShopwareVersionConstraint().toString());
 * }
 * ```
 */

export type {
  Extension,
  ExtensionChangelog,
  ExtensionMetadata,
  ExtensionType,
  StoreLocale,
  Translated,
} from './types.js';
export { STORE_LOCALES } from './types.js';

export { App } from './app.js';
export { PlatformPlugin } from './platform-plugin.js';
export { ShopwareBundle } from './shopware-bundle.js';

export type { ExtensionConfig, ExtraBundle } from './config.js';
export { readExtensionConfig } from './config.js';

export type { DiscoveryFailure, DiscoveryResult } from './discovery.js';
export {
  EXTENSION_CONTAINERS,
  findExtensionsFromProject,
  getExtensionByFolder,
} from './discovery.js';
