import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as path from 'path';
import {
  captureError,
  makeTempDir,
  pluginComposer,
  removeDir,
  writeApp,
  writeFile,
  writePlugin,
} from '../../../__tests__/fixtures.js';
import { ConstraintError, ErrorCode } from '../../errors/index.js';
import { PlatformPlugin } from '../../extensions/platform-plugin.js';
import {
  convertExtensionsToSources,
  findAssetSourcesOfProject,
  getShopwareProjectConstraint,
} from '../collector.js';

const ADMIN_ENTRY = 'src/Resources/app/administration/src';
const STOREFRONT_ENTRY = 'src/Resources/app/storefront/src';

describe('asset source collection', () => {
  let root: string;

  const plugin = (
    name: string,
    overrides: Record<string, unknown> = {}
  ): string =>
    writePlugin(
      path.join(root, 'custom/plugins', name),
      pluginComposer({
        extra: { 'shopware-plugin-class': `Test\\${name}` },
        ...overrides,
      })
    );

  beforeEach(() => {
    root = makeTempDir();
  });

  afterEach(() => {
    removeDir(root);
  });

  describe('convertExtensionsToSources', () => {
    it('should keep extensions with entry files', () => {
      const admin = plugin('AdminPlugin');
      writeFile(admin, `${ADMIN_ENTRY}/main.js`, '');
      const none = plugin('NoAssets');

      const sources = convertExtensionsToSources([
        PlatformPlugin.fromPath(admin),
        PlatformPlugin.fromPath(none),
      ]);

      expect(sources).toHaveLength(1);
      expect(sources[0]).toMatchObject({
        name: 'AdminPlugin',
        resourcesDir: path.join(admin, 'src/Resources'),
        administrationEntry: path.join(admin, ADMIN_ENTRY, 'main.js'),
        storefrontEntry: undefined,
      });
      expect(sources[0].constraint.toString()).toBe('~6.5.0');
    });

    it('should prefer main.ts over main.js', () => {
      const dir = plugin('TsPlugin');
      writeFile(dir, `${STOREFRONT_ENTRY}/main.js`, '');
      writeFile(dir, `${STOREFRONT_ENTRY}/main.ts`, '');

      const [source] = convertExtensionsToSources([PlatformPlugin.fromPath(dir)]);

      expect(source.storefrontEntry).toBe(path.join(dir, STOREFRONT_ENTRY, 'main.ts'));
    });

    it('should add extra bundles with the constraint of their extension', () => {
      const dir = plugin('BundlePlugin');
      writeFile(dir, `${STOREFRONT_ENTRY}/main.ts`, '');
      writeFile(dir, 'src/Extra/Resources/app/administration/src/main.ts', '');
      writeFile(dir, 'src/Unnamed/Resources/app/storefront/src/main.js', '');
      writeFile(
        dir,
        '.shopware-extension.yml',
        [
          'build:',
          '  shopwareVersionConstraint: "~6.6.0"',
          '  extraBundles:',
          '    - path: Extra',
          '      name: ExtraBundle',
          '    - path: Unnamed',
          '    - path: Empty',
          '',
        ].join('\n')
      );

      const sources = convertExtensionsToSources([PlatformPlugin.fromPath(dir)]);

      expect(sources.map((source) => source.name)).toEqual([
        'BundlePlugin',
        'ExtraBundle',
        'Unnamed',
      ]);
      expect(sources[1].resourcesDir).toBe(path.join(dir, 'src/Extra/Resources'));
      expect(sources.map((source) => source.constraint.toString())).toEqual([
        '~6.6.0',
        '~6.6.0',
        '~6.6.0',
      ]);
    });

    it('should fail when an asset-bearing extension has no constraint', () => {
      const dir = plugin('Unconstrained', { require: { php: '>=8.1' } });
      writeFile(dir, `${ADMIN_ENTRY}/main.ts`, '');

      const error = captureError(() =>
        convertExtensionsToSources([PlatformPlugin.fromPath(dir)])
      );

      expect(error).toBeInstanceOf(ConstraintError);
      expect(error).toMatchObject({ code: ErrorCode.CONSTRAINT_MISSING });
    });

    it('should ignore the constraint of extensions without assets', () => {
      const dir = plugin('Unconstrained', { require: { php: '>=8.1' } });

      expect(convertExtensionsToSources([PlatformPlugin.fromPath(dir)])).toEqual([]);
    });
  });

  describe('findAssetSourcesOfProject', () => {
    it('should collect the sources of all discovered extensions', () => {
      writeFile(plugin('AdminPlugin'), `${ADMIN_ENTRY}/main.ts`, '');
      plugin('NoAssets');
      const app = writeApp(path.join(root, 'custom/apps/TestApp'));
      writeFile(app, 'Resources/app/storefront/src/main.js', '');
      writeFile(root, 'custom/plugins/Broken/composer.json', '{');

      const sources = findAssetSourcesOfProject(root);

      expect(sources.map((source) => source.name)).toEqual(['TestApp', 'AdminPlugin']);
      expect(sources[0].constraint.toString()).toBe('~6.6.0');
    });
  });

  describe('getShopwareProjectConstraint', () => {
    it('should pin the installed shopware/core version', () => {
      writeFile(root, 'composer.lock', {
        packages: [
          { name: 'symfony/console', version: 'v6.4.0' },
          { name: 'shopware/core', version: 'v6.5.8.2' },
        ],
      });

      const constraint = getShopwareProjectConstraint(root);

      expect(constraint.toString()).toBe('6.5.8.2');
      expect(constraint.check('6.5.8')).toBe(true);
      expect(constraint.check('6.5.9')).toBe(false);
    });

    it('should fall back to the composer.json requirement', () => {
      writeFile(root, 'composer.lock', {
        packages: [{ name: 'shopware/core', version: 'dev-trunk' }],
      });
      writeFile(root, 'composer.json', { require: { 'shopware/core': '~6.6.0' } });

      expect(getShopwareProjectConstraint(root).toString()).toBe('~6.6.0');
    });

    it('should fail without any version information', () => {
      writeFile(root, 'composer.json', { require: { php: '>=8.2' } });

      expect(captureError(() => getShopwareProjectConstraint(root))).toMatchObject({
        code: ErrorCode.CONSTRAINT_MISSING,
      });
    });
  });
});
