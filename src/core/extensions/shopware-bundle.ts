import * as path from 'path';
import type { SemVer } from 'semver';
import { ErrorCode, ExtensionError } from '../errors/index.js';
import type { VersionConstraint } from '../version/constraint.js';
import type { ValidationContext } from '../validation/context.js';
import { parseExtensionChangelog } from './changelog.js';
import {
  COMPOSER_TYPE_BUNDLE,
  type ComposerManifest,
  composerVersion,
  readComposerManifest,
  resolveComposerConstraint,
  validateComposerManifest,
} from './composer.js';
import { type ExtensionConfig, readExtensionConfig } from './config.js';
import { validateTheme } from './shared-checks.js';
import {
  type Extension,
  type ExtensionChangelog,
  type ExtensionMetadata,
  translate,
} from './types.js';

/**
 * A Symfony bundle shipped through composer (type shopware-bundle).
 * Not distributed through the store, so no store metadata is required.
 */
export class ShopwareBundle implements Extension {
  readonly type = 'bundle' as const;

  private constructor(
    private readonly extensionPath: string,
    private readonly composer: ComposerManifest,
    private readonly config: ExtensionConfig
  ) {}

  static fromPath(extensionDir: string): ShopwareBundle {
    const absolute = path.resolve(extensionDir);
    const composer = readComposerManifest(absolute);

    if (composer.type !== COMPOSER_TYPE_BUNDLE) {
      throw new ExtensionError(
        `composer.json is not type of ${COMPOSER_TYPE_BUNDLE}`,
        ErrorCode.MANIFEST_WRONG_TYPE,
        { path: absolute, type: composer.type }
      );
    }

    return new ShopwareBundle(absolute, composer, readExtensionConfig(absolute));
  }

  getName(): string {
    const bundleName = this.composer.extra['shopware-bundle-name'];
    if (bundleName === undefined || bundleName === '') {
      throw new ExtensionError(
        'extra.shopware-bundle-name is required',
        ErrorCode.EXTENSION_NAME_MISSING,
        { path: this.extensionPath }
      );
    }
    return bundleName;
  }

  getVersion(): SemVer {
    return composerVersion(this.composer);
  }

  getShopwareVersionConstraint(): VersionConstraint {
    return resolveComposerConstraint(this.composer, this.config);
  }

  getMetaData(): ExtensionMetadata {
    return {
      label: translate(this.composer.extra.label),
      description: translate(this.composer.extra.description),
    };
  }

  getLicense(): string {
    return this.composer.license;
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
    return path.join(this.extensionPath, 'src');
  }

  getResourcesDir(): string {
    return path.join(this.getRootDir(), 'Resources');
  }

  validate(ctx: ValidationContext): void {
    validateComposerManifest(this.composer, COMPOSER_TYPE_BUNDLE, ctx);

    if (!this.composer.extra['shopware-bundle-name']) {
      ctx.addError('Key `extra.shopware-bundle-name` is required');
    }

    validateTheme(this, ctx);
  }
}
