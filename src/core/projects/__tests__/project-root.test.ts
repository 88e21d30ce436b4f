import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as path from 'path';
import {
  captureError,
  makeTempDir,
  removeDir,
  writeFile,
} from '../../../__tests__/fixtures.js';
import { ErrorCode } from '../../errors/index.js';
import { findClosestShopwareProject, isShopwareProject } from '../project-root.js';

describe('project root detection', () => {
  let root: string;

  beforeEach(() => {
    root = makeTempDir();
  });

  afterEach(() => {
    removeDir(root);
  });

  it('should recognise projects requiring shopware/core', () => {
    writeFile(root, 'composer.json', { require: { 'shopware/core': '~6.5.0' } });

    expect(isShopwareProject(root)).toBe(true);
  });

  it('should recognise the platform repository', () => {
    writeFile(root, 'composer.json', { name: 'shopware/platform' });

    expect(isShopwareProject(root)).toBe(true);
  });

  it('should not take plugins for projects', () => {
    writeFile(root, 'composer.json', { require: { php: '>=8.1' } });

    expect(isShopwareProject(root)).toBe(false);
    expect(isShopwareProject(path.join(root, 'missing'))).toBe(false);
  });

  it('should walk up to the closest project', () => {
    writeFile(root, 'composer.json', { require: { 'shopware/core': '~6.5.0' } });
    writeFile(root, 'custom/plugins/TestPlugin/composer.json', {
      type: 'shopware-platform-plugin',
      require: { php: '>=8.1' },
    });

    expect(
      findClosestShopwareProject(path.join(root, 'custom/plugins/TestPlugin'))
    ).toBe(root);
  });

  it('should fail outside of a project', () => {
    const nested = path.join(root, 'a', 'b');
    writeFile(nested, 'README.md', '');

    // tmp dirs are not inside a shopware project
    expect(captureError(() => findClosestShopwareProject(nested))).toMatchObject({
      code: ErrorCode.PROJECT_NOT_FOUND,
    });
  });
});
