/**
 * Extension Type Definitions
 * One capability interface shared by every extension kind
 */

import type { SemVer } from 'semver';
import type { VersionConstraint } from '../version/constraint.js';
import type { ValidationContext } from '../validation/context.js';
import type { ExtensionConfig } from './config.js';

export type ExtensionType = 'plugin' | 'bundle' | 'app';

/**
 * Store locales every extension has to be described in
 */
export const STORE_LOCALES = ['de-DE', 'en-GB'] as const;

export type StoreLocale = (typeof STORE_LOCALES)[number];

export type Translated = Record<StoreLocale, string>;

export interface ExtensionMetadata {
  label: Translated;
  description: Translated;
}

export interface ExtensionChangelog {
  version: string;
  changelog: Translated;
}

export interface Extension {
  readonly type: ExtensionType;

  /** Technical name, e.g. `FroshTools` */
  getName(): string;
  getVersion(): SemVer;
  /** Build-time override first, manifest requirement second */
  getShopwareVersionConstraint(): VersionConstraint;
  getMetaData(): ExtensionMetadata;
  getLicense(): string;
  getChangelog(): ExtensionChangelog;
  getExtensionConfig(): ExtensionConfig;

  getPath(): string;
  getRootDir(): string;
  getResourcesDir(): string;

  /** Appends structural findings to the context, never throws */
  validate(ctx: ValidationContext): void;
}

export function translate(
  values: Record<string, string> | undefined
): Translated {
  return {
    'de-DE': values?.['de-DE'] ?? '',
    'en-GB': values?.['en-GB'] ?? '',
  };
}
