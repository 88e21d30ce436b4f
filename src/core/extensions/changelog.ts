/**
 * Markdown changelogs (CHANGELOG_en-GB.md, CHANGELOG_de-DE.md)
 */

import * as fs from 'fs';
import * as path from 'path';
import { ErrorCode, ExtensionError } from '../errors/index.js';
import { parseVersion } from '../version/constraint.js';
import type { Extension, ExtensionChangelog } from './types.js';

/**
 * Split a changelog into sections keyed by the version in their heading
 */
export function parseChangelogSections(markdown: string): Map<string, string> {
  const sections = new Map<string, string>();
  let current: string | undefined;
  let lines: string[] = [];

  const flush = () => {
    if (current !== undefined && !sections.has(current)) {
      sections.set(current, lines.join('\n').trim());
    }
  };

  for (const line of markdown.split(/\r?\n/)) {
    const heading = /^#{1,3}\s+v?(\S+)/.exec(line);
    if (heading) {
      flush();
      current = heading[1];
      lines = [];
    } else if (current !== undefined) {
      lines.push(line);
    }
  }
  flush();

  return sections;
}

function findSection(
  sections: Map<string, string>,
  version: string
): string | undefined {
  const wanted = parseVersion(version).version;
  for (const [heading, body] of sections) {
    try {
      if (parseVersion(heading).version === wanted) {
        return body;
      }
    } catch {
      // headings that are no version (e.g. "Unreleased") never match
      continue;
    }
  }
  return undefined;
}

function readSection(file: string, version: string): string | undefined {
  if (!fs.existsSync(file)) {
    return undefined;
  }
  return findSection(
    parseChangelogSections(fs.readFileSync(file, 'utf-8')),
    version
  );
}

/**
 * Changelog of the current version; German falls back to English
 */
export function parseExtensionChangelog(
  extension: Extension
): ExtensionChangelog {
  const version = extension.getVersion().version;
  const englishFile = path.join(extension.getPath(), 'CHANGELOG_en-GB.md');

  if (!fs.existsSync(englishFile)) {
    throw new ExtensionError(
      'CHANGELOG_en-GB.md is missing',
      ErrorCode.CHANGELOG_MISSING,
      { path: extension.getPath() }
    );
  }

  const english = readSection(englishFile, version);
  if (english === undefined) {
    throw new ExtensionError(
      `CHANGELOG_en-GB.md has no entry for version ${version}`,
      ErrorCode.CHANGELOG_MISSING,
      { path: extension.getPath(), version }
    );
  }

  const german = readSection(
    path.join(extension.getPath(), 'CHANGELOG_de-DE.md'),
    version
  );

  return {
    version,
    changelog: {
      'en-GB': english,
      'de-DE': german ?? english,
    },
  };
}
