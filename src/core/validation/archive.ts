/**
 * In-memory zip of an extension's source files
 */

import { promises as fs } from 'fs';
import * as path from 'path';
import { glob } from 'glob';
import JSZip from 'jszip';
import { ErrorCode, ValidationError } from '../errors/index.js';

export type FilePredicate = (relativePath: string) => boolean;

export const isPhpFile: FilePredicate = (relativePath) =>
  relativePath.endsWith('.php');

// Fixed entry timestamp so identical trees produce identical bytes
const ENTRY_DATE = new Date(Date.UTC(2020, 0, 1));

/**
 * Relative, `/`-separated paths of all files below root that pass the
 * predicate, sorted
 */
export async function collectSourceFiles(
  rootDir: string,
  predicate: FilePredicate
): Promise<string[]> {
  const files = await glob('**/*', {
    cwd: rootDir,
    nodir: true,
    dot: true,
    posix: true,
    ignore: ['**/node_modules/**'],
  });

  const selected = files.filter(predicate).sort();

  // Archives extracted on case-insensitive filesystems would merge these
  const seen = new Map<string, string>();
  for (const file of selected) {
    const key = file.toLowerCase();
    const existing = seen.get(key);
    if (existing !== undefined) {
      throw new ValidationError(
        `Source files ${existing} and ${file} collide in the archive`,
        ErrorCode.ARCHIVE_PATH_COLLISION,
        { rootDir, paths: [existing, file] }
      );
    }
    seen.set(key, file);
  }

  return selected;
}

/**
 * Zip the selected files with paths relative to root
 */
export async function createSourceArchive(
  rootDir: string,
  predicate: FilePredicate = isPhpFile
): Promise<Uint8Array> {
  const files = await collectSourceFiles(rootDir, predicate);
  const zip = new JSZip();

  for (const file of files) {
    const content = await fs.readFile(path.join(rootDir, ...file.split('/')));
    zip.file(file, content, { date: ENTRY_DATE, createFolders: false });
  }

  return zip.generateAsync({ type: 'uint8array', compression: 'DEFLATE' });
}
