/**
 * Per-extension configuration read from .shopware-extension.yml
 */

import * as fs from 'fs';
import * as path from 'path';
import * as yaml from 'js-yaml';
import { z } from 'zod';
import { ErrorCode, ExtensionError, getErrorMessage } from '../errors/index.js';

export const EXTENSION_CONFIG_FILES = [
  '.shopware-extension.yml',
  '.shopware-extension.yaml',
];

const ExtraBundleSchema = z.object({
  path: z.string().min(1),
  name: z.string().min(1).optional(),
});

const BuildSchema = z
  .object({
    shopwareVersionConstraint: z.string().optional(),
    extraBundles: z.array(ExtraBundleSchema).default([]),
    zip: z
      .object({
        assets: z
          .object({ enabled: z.boolean().default(true) })
          .default({}),
      })
      .default({}),
  })
  .default({});

const StoreSchema = z
  .object({
    default_locale: z.enum(['de_DE', 'en_GB']).optional(),
    availabilities: z.array(z.string()).default([]),
    localizations: z.array(z.string()).default([]),
    categories: z.array(z.string()).default([]),
    type: z.string().optional(),
    icon: z.string().optional(),
    automatic_bugfix_version_compatibility: z.boolean().default(false),
  })
  .default({})
  .transform((store) => ({
    defaultLocale: store.default_locale,
    availabilities: store.availabilities,
    localizations: store.localizations,
    categories: store.categories,
    type: store.type,
    icon: store.icon,
    automaticBugfixVersionCompatibility:
      store.automatic_bugfix_version_compatibility,
  }));

export const ExtensionConfigSchema = z.object({
  build: BuildSchema,
  store: StoreSchema,
});

export type ExtensionConfig = z.infer<typeof ExtensionConfigSchema>;
export type ExtraBundle = z.infer<typeof ExtraBundleSchema>;

export function defaultExtensionConfig(): ExtensionConfig {
  return ExtensionConfigSchema.parse({});
}

/**
 * Read the config next to the manifest; no file means defaults
 */
export function readExtensionConfig(extensionDir: string): ExtensionConfig {
  const file = EXTENSION_CONFIG_FILES.map((name) =>
    path.join(extensionDir, name)
  ).find((candidate) => fs.existsSync(candidate));

  if (!file) {
    return defaultExtensionConfig();
  }

  let raw: unknown;
  try {
    raw = yaml.load(fs.readFileSync(file, 'utf-8'));
  } catch (error) {
    throw new ExtensionError(
      `${path.basename(file)} is not valid YAML: ${getErrorMessage(error)}`,
      ErrorCode.EXTENSION_CONFIG_INVALID,
      { file },
      error instanceof Error ? error : undefined
    );
  }

  const result = ExtensionConfigSchema.safeParse(raw ?? {});
  if (!result.success) {
    const issues = result.error.issues.map(
      (issue) => `${issue.path.join('.')}: ${issue.message}`
    );
    throw new ExtensionError(
      `${path.basename(file)} is invalid: ${issues.join('; ')}`,
      ErrorCode.EXTENSION_CONFIG_INVALID,
      { file, issues }
    );
  }

  return result.data;
}
