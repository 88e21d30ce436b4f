/**
 * composer.json handling shared by plugins and bundles
 */

import * as fs from 'fs';
import * as path from 'path';
import { z } from 'zod';
import type { SemVer } from 'semver';
import {
  ConstraintError,
  ErrorCode,
  ExtensionError,
  getErrorMessage,
} from '../errors/index.js';
import { VersionConstraint, parseVersion } from '../version/constraint.js';
import type { ValidationContext } from '../validation/context.js';
import type { ExtensionConfig } from './config.js';
import { STORE_LOCALES } from './types.js';

export const COMPOSER_TYPE_PLUGIN = 'shopware-platform-plugin';
export const COMPOSER_TYPE_BUNDLE = 'shopware-bundle';
export const SHOPWARE_CORE_PACKAGE = 'shopware/core';

// PHP encodes an empty object as []
const emptyArrayAsObject = (value: unknown): unknown =>
  Array.isArray(value) && value.length === 0 ? {} : value;

const StringMapSchema = z.preprocess(
  emptyArrayAsObject,
  z.record(z.string(), z.string())
);

const AutoloadMapSchema = z.preprocess(
  emptyArrayAsObject,
  z.record(z.string(), z.union([z.string(), z.array(z.string())]))
);

export const ComposerManifestSchema = z.object({
  name: z.string().default(''),
  description: z.string().default(''),
  version: z.string().default(''),
  type: z.string().default(''),
  license: z
    .union([z.string(), z.array(z.string())])
    .default('')
    .transform((license) =>
      Array.isArray(license) ? license.join(' OR ') : license
    ),
  keywords: z.array(z.string()).default([]),
  authors: z
    .array(
      z.object({
        name: z.string().optional(),
        email: z.string().optional(),
        homepage: z.string().optional(),
        role: z.string().optional(),
      })
    )
    .default([]),
  require: StringMapSchema.default({}),
  autoload: z
    .object({
      'psr-0': AutoloadMapSchema.default({}),
      'psr-4': AutoloadMapSchema.default({}),
    })
    .default({}),
  extra: z
    .object({
      'shopware-plugin-class': z.string().optional(),
      'shopware-bundle-name': z.string().optional(),
      'plugin-icon': z.string().optional(),
      label: StringMapSchema.default({}),
      description: StringMapSchema.default({}),
      manufacturerLink: StringMapSchema.default({}),
      supportLink: StringMapSchema.default({}),
    })
    .default({}),
});

export type ComposerManifest = z.infer<typeof ComposerManifestSchema>;

/**
 * Read and parse composer.json; any failure is a construction error
 */
export function readComposerManifest(extensionDir: string): ComposerManifest {
  const file = path.join(extensionDir, 'composer.json');

  if (!fs.existsSync(file)) {
    throw new ExtensionError(
      `composer.json not found in ${extensionDir}`,
      ErrorCode.MANIFEST_MISSING,
      { path: extensionDir }
    );
  }

  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(file, 'utf-8'));
  } catch (error) {
    throw new ExtensionError(
      `composer.json is not valid JSON: ${getErrorMessage(error)}`,
      ErrorCode.MANIFEST_INVALID,
      { path: extensionDir },
      error instanceof Error ? error : undefined
    );
  }

  const result = ComposerManifestSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.map(
      (issue) => `${issue.path.join('.')}: ${issue.message}`
    );
    throw new ExtensionError(
      `composer.json is malformed: ${issues.join('; ')}`,
      ErrorCode.MANIFEST_INVALID,
      { path: extensionDir, issues }
    );
  }

  return result.data;
}

/**
 * Resolve the constraint of a composer based extension: the build override
 * from .shopware-extension.yml wins over require["shopware/core"]
 */
export function resolveComposerConstraint(
  composer: ComposerManifest,
  config: ExtensionConfig
): VersionConstraint {
  const override = config.build.shopwareVersionConstraint;
  if (override !== undefined && override !== '') {
    return VersionConstraint.parse(override);
  }

  const required = composer.require[SHOPWARE_CORE_PACKAGE];
  if (required === undefined) {
    throw new ConstraintError(
      `require.${SHOPWARE_CORE_PACKAGE} is required`,
      ErrorCode.CONSTRAINT_MISSING
    );
  }

  return VersionConstraint.parse(required);
}

export function composerVersion(composer: ComposerManifest): SemVer {
  if (composer.version === '') {
    throw new ConstraintError(
      'composer.json has no version',
      ErrorCode.VERSION_MISSING
    );
  }
  return parseVersion(composer.version);
}

/**
 * Checks every composer based extension has to pass
 */
export function validateComposerManifest(
  composer: ComposerManifest,
  expectedType: string,
  ctx: ValidationContext
): void {
  if (composer.name === '') {
    ctx.addError('Key `name` is required');
  }

  if (composer.type === '') {
    ctx.addError('Key `type` is required');
  } else if (composer.type !== expectedType) {
    ctx.addError(`The composer type must be ${expectedType}`);
  }

  if (composer.description === '') {
    ctx.addError('Key `description` is required');
  }

  if (composer.license === '') {
    ctx.addError('Key `license` is required');
  }

  if (composer.version === '') {
    ctx.addError('Key `version` is required');
  }

  if (composer.authors.length === 0) {
    ctx.addError('Key `authors` is required');
  }

  if (Object.keys(composer.require).length === 0) {
    ctx.addError('Key `require` is required');
  } else if (!(SHOPWARE_CORE_PACKAGE in composer.require)) {
    ctx.addError(`You need to require "${SHOPWARE_CORE_PACKAGE}" package`);
  }

  if (
    Object.keys(composer.autoload['psr-0']).length === 0 &&
    Object.keys(composer.autoload['psr-4']).length === 0
  ) {
    ctx.addError(
      'At least one of the properties psr-0 or psr-4 are required in the composer.json'
    );
  }
}

/**
 * Store listing fields, required for every store locale
 */
export function validateComposerStoreMetadata(
  composer: ComposerManifest,
  ctx: ValidationContext
): void {
  const { extra } = composer;

  for (const locale of STORE_LOCALES) {
    if (!(locale in extra.label)) {
      ctx.addError(`extra.label for language ${locale} is required`);
    }

    if (!(locale in extra.description)) {
      ctx.addError(`extra.description for language ${locale} is required`);
    }

    if (!(locale in extra.manufacturerLink)) {
      ctx.addError(`extra.manufacturerLink for language ${locale} is required`);
    }

    if (!(locale in extra.supportLink)) {
      ctx.addError(`extra.supportLink for language ${locale} is required`);
    }
  }
}
