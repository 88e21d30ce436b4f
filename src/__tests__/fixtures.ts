/**
 * On-disk fixtures shared by the test suites
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';

export function makeTempDir(prefix = 'shopext-test-'): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), prefix));
}

export function removeDir(dir: string): void {
  fs.rmSync(dir, { recursive: true, force: true });
}

/**
 * Write a file below root; objects are stored as JSON
 */
export function writeFile(
  root: string,
  relativePath: string,
  content: string | object
): string {
  const file = path.join(root, relativePath);
  fs.mkdirSync(path.dirname(file), { recursive: true });
  fs.writeFileSync(
    file,
    typeof content === 'string' ? content : JSON.stringify(content, null, 2)
  );
  return file;
}

const storeTexts = (text: string): Record<string, string> => ({
  'de-DE': text,
  'en-GB': text,
});

/**
 * composer.json of a plugin that passes every structural check
 */
export function pluginComposer(
  overrides: Record<string, unknown> = {}
): Record<string, unknown> {
  return {
    name: 'test/test-plugin',
    description: 'A plugin for tests',
    version: '1.0.0',
    type: 'shopware-platform-plugin',
    license: 'MIT',
    authors: [{ name: 'Test Author' }],
    require: { 'shopware/core': '~6.5.0' },
    autoload: { 'psr-4': { 'TestPlugin\\': 'src/' } },
    extra: {
      'shopware-plugin-class': 'TestPlugin\\TestPlugin',
      label: storeTexts('Test Plugin'),
      description: storeTexts('A plugin for tests'),
      manufacturerLink: storeTexts('https://example.com'),
      supportLink: storeTexts('https://example.com/support'),
    },
    ...overrides,
  };
}

export function bundleComposer(
  overrides: Record<string, unknown> = {}
): Record<string, unknown> {
  return {
    name: 'test/test-bundle',
    description: 'A bundle for tests',
    version: '2.0.0',
    type: 'shopware-bundle',
    license: 'MIT',
    authors: [{ name: 'Test Author' }],
    require: { 'shopware/core': '>=6.5,<6.6' },
    autoload: { 'psr-4': { 'TestBundle\\': 'src/' } },
    extra: { 'shopware-bundle-name': 'TestBundle' },
    ...overrides,
  };
}

export function appManifest(
  metaOverrides: Record<string, unknown> = {}
): Record<string, unknown> {
  return {
    meta: {
      name: 'TestApp',
      label: storeTexts('Test App'),
      description: storeTexts('An app for tests'),
      author: 'Test Author',
      version: '1.2.0',
      license: 'MIT',
      compatibility: '~6.6.0',
      ...metaOverrides,
    },
  };
}

/**
 * Plugin directory with composer.json and the default icon
 */
export function writePlugin(
  dir: string,
  composer: Record<string, unknown> = pluginComposer()
): string {
  writeFile(dir, 'composer.json', composer);
  writeFile(dir, 'src/Resources/config/plugin.png', 'png');
  return dir;
}

export function writeBundle(
  dir: string,
  composer: Record<string, unknown> = bundleComposer()
): string {
  writeFile(dir, 'composer.json', composer);
  return dir;
}

export function writeApp(
  dir: string,
  manifest: Record<string, unknown> = appManifest()
): string {
  writeFile(dir, 'manifest.json', manifest);
  writeFile(dir, 'Resources/config/plugin.png', 'png');
  return dir;
}

/**
 * The error thrown by fn; fails the test when nothing is thrown
 */
export function captureError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  throw new Error('expected the call to throw');
}

export async function captureRejection(promise: Promise<unknown>): Promise<unknown> {
  try {
    await promise;
  } catch (error) {
    return error;
  }
  throw new Error('expected the promise to reject');
}
