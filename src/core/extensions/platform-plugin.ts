import * as path from 'path';
import type { SemVer } from 'semver';
import { ErrorCode, ExtensionError } from '../errors/index.js';
import type { VersionConstraint } from '../version/constraint.js';
import type { ValidationContext } from '../validation/context.js';
import { parseExtensionChangelog } from './changelog.js';
import {
  COMPOSER_TYPE_PLUGIN,
  type ComposerManifest,
  composerVersion,
  readComposerManifest,
  resolveComposerConstraint,
  validateComposerManifest,
  validateComposerStoreMetadata,
} from './composer.js';
import { type ExtensionConfig, readExtensionConfig } from './config.js';
import {
  DEFAULT_PLUGIN_ICON,
  validateIcon,
  validateTheme,
} from './shared-checks.js';
import {
  type Extension,
  type ExtensionChangelog,
  type ExtensionMetadata,
  translate,
} from './types.js';

/**
 * A Shopware 6 plugin: composer.json of type shopware-platform-plugin
 */
export class PlatformPlugin implements Extension {
  readonly type = 'plugin' as const;

  private constructor(
    private readonly extensionPath: string,
    private readonly composer: ComposerManifest,
    private readonly config: ExtensionConfig
  ) {}

  static fromPath(extensionDir: string): PlatformPlugin {
    const absolute = path.resolve(extensionDir);
    const composer = readComposerManifest(absolute);

    if (composer.type !== COMPOSER_TYPE_PLUGIN) {
      throw new ExtensionError(
        `composer.json is not type of ${COMPOSER_TYPE_PLUGIN}`,
        ErrorCode.MANIFEST_WRONG_TYPE,
        { path: absolute, type: composer.type }
      );
    }

    return new PlatformPlugin(absolute, composer, readExtensionConfig(absolute));
  }

  getName(): string {
    const pluginClass = this.composer.extra['shopware-plugin-class'];
    if (pluginClass === undefined || pluginClass === '') {
      throw new ExtensionError(
        'extension name is empty',
        ErrorCode.EXTENSION_NAME_MISSING,
        { path: this.extensionPath }
      );
    }

    const parts = pluginClass.split('\\');
    return parts[parts.length - 1];
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
    validateComposerManifest(this.composer, COMPOSER_TYPE_PLUGIN, ctx);
    validateComposerStoreMetadata(this.composer, ctx);
    validateIcon(
      this,
      this.composer.extra['plugin-icon'] || DEFAULT_PLUGIN_ICON,
      ctx
    );
    validateTheme(this, ctx);
  }
}
