import * as fs from 'fs';
import * as path from 'path';
import type { SemVer } from 'semver';
import { z } from 'zod';
import {
  ConstraintError,
  ErrorCode,
  ExtensionError,
  getErrorMessage,
} from '../errors/index.js';
import { VersionConstraint, parseVersion } from '../version/constraint.js';
import type { ValidationContext } from '../validation/context.js';
import { parseExtensionChangelog } from './changelog.js';
import { type ExtensionConfig, readExtensionConfig } from './config.js';
import { DEFAULT_APP_ICON, validateIcon, validateTheme } from './shared-checks.js';
import {
  type Extension,
  type ExtensionChangelog,
  type ExtensionMetadata,
  STORE_LOCALES,
  translate,
} from './types.js';

export const APP_MANIFEST_FILE = 'manifest.json';

export const AppManifestSchema = z.object({
  meta: z.object({
    name: z.string().default(''),
    label: z.record(z.string(), z.string()).default({}),
    description: z.record(z.string(), z.string()).default({}),
    author: z.string().default(''),
    copyright: z.string().optional(),
    version: z.string().default(''),
    license: z.string().default(''),
    icon: z.string().optional(),
    privacy: z.string().optional(),
    compatibility: z.string().optional(),
  }),
  setup: z
    .object({
      registrationUrl: z.string().optional(),
      secret: z.string().optional(),
    })
    .optional(),
});

export type AppManifest = z.infer<typeof AppManifestSchema>;

/**
 * True when the directory carries an app manifest; says nothing about
 * whether that manifest is well-formed
 */
export function hasAppManifest(extensionDir: string): boolean {
  return fs.existsSync(path.join(extensionDir, APP_MANIFEST_FILE));
}

function readAppManifest(extensionDir: string): AppManifest {
  const file = path.join(extensionDir, APP_MANIFEST_FILE);

  if (!fs.existsSync(file)) {
    throw new ExtensionError(
      `${APP_MANIFEST_FILE} not found in ${extensionDir}`,
      ErrorCode.MANIFEST_MISSING,
      { path: extensionDir }
    );
  }

  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(file, 'utf-8'));
  } catch (error) {
    throw new ExtensionError(
      `${APP_MANIFEST_FILE} is not valid JSON: ${getErrorMessage(error)}`,
      ErrorCode.MANIFEST_INVALID,
      { path: extensionDir },
      error instanceof Error ? error : undefined
    );
  }

  const result = AppManifestSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.map(
      (issue) => `${issue.path.join('.')}: ${issue.message}`
    );
    throw new ExtensionError(
      `${APP_MANIFEST_FILE} is malformed: ${issues.join('; ')}`,
      ErrorCode.MANIFEST_INVALID,
      { path: extensionDir, issues }
    );
  }

  return result.data;
}

/**
 * A Shopware app: manifest.json with a meta block, no PHP sources
 */
export class App implements Extension {
  readonly type = 'app' as const;

  private constructor(
    private readonly extensionPath: string,
    private readonly manifest: AppManifest,
    private readonly config: ExtensionConfig
  ) {}

  static fromPath(extensionDir: string): App {
    const absolute = path.resolve(extensionDir);
    return new App(
      absolute,
      readAppManifest(absolute),
      readExtensionConfig(absolute)
    );
  }

  getName(): string {
    if (this.manifest.meta.name === '') {
      throw new ExtensionError(
        'extension name is empty',
        ErrorCode.EXTENSION_NAME_MISSING,
        { path: this.extensionPath }
      );
    }
    return this.manifest.meta.name;
  }

  /** Apps may ship without a version; only reading it fails then */
  getVersion(): SemVer {
    if (this.manifest.meta.version === '') {
      throw new ConstraintError(
        `${APP_MANIFEST_FILE} has no version`,
        ErrorCode.VERSION_MISSING
      );
    }
    return parseVersion(this.manifest.meta.version);
  }

  getShopwareVersionConstraint(): VersionConstraint {
    const override = this.config.build.shopwareVersionConstraint;
    if (override !== undefined && override !== '') {
      return VersionConstraint.parse(override);
    }

    const compatibility = this.manifest.meta.compatibility;
    if (compatibility === undefined || compatibility === '') {
      throw new ConstraintError(
        'meta.compatibility is required',
        ErrorCode.CONSTRAINT_MISSING
      );
    }

    return VersionConstraint.parse(compatibility);
  }

  getMetaData(): ExtensionMetadata {
    return {
      label: translate(this.manifest.meta.label),
      description: translate(this.manifest.meta.description),
    };
  }

  getLicense(): string {
    return this.manifest.meta.license;
  }

  getChangelog(): ExtensionChangelog {
    return parseExtensionChangelog(this);
  }

  getExtensionConfig(): ExtensionConfig {
    return this.config;
  }

  getPath(): string {
    return this.extensionPath;
  }

  getRootDir(): string {
    return this.extensionPath;
  }

  getResourcesDir(): string {
    return path.join(this.extensionPath, 'Resources');
  }

  validate(ctx: ValidationContext): void {
    const { meta } = this.manifest;

    if (meta.name === '') {
      ctx.addError('Key `meta.name` is required');
    }

    if (meta.author === '') {
      ctx.addError('Key `meta.author` is required');
    }

    if (meta.license === '') {
      ctx.addError('Key `meta.license` is required');
    }

    for (const locale of STORE_LOCALES) {
      if (!(locale in meta.label)) {
        ctx.addError(`meta.label for language ${locale} is required`);
      }

      if (!(locale in meta.description)) {
        ctx.addError(`meta.description for language ${locale} is required`);
      }
    }

    validateIcon(this, meta.icon || DEFAULT_APP_ICON, ctx);
    validateTheme(this, ctx);
  }
}
