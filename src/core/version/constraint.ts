/**
 * Composer-style version constraints evaluated with node-semver
 */

import { Range, type SemVer, parse } from 'semver';
import { ConstraintError, ErrorCode } from '../errors/index.js';

const VERSION_PATTERN = /^v?\d+(\.\d+){0,3}(-[0-9A-Za-z.-]+)?(\+[0-9A-Za-z.-]+)?$/;

/**
 * Parse a concrete version. Shopware's four-part versions (6.5.0.0) and
 * short forms (1.2) are accepted; anything else throws.
 */
export function parseVersion(input: string): SemVer {
  const raw = input.trim();

  if (raw === '') {
    throw new ConstraintError('version is empty', ErrorCode.VERSION_MISSING);
  }

  if (!VERSION_PATTERN.test(raw)) {
    throw new ConstraintError(
      `Malformed version: ${input}`,
      ErrorCode.VERSION_INVALID,
      { version: input }
    );
  }

  const [, numbers, suffix] = /^v?([\d.]+)(.*)$/.exec(raw) ?? ['', raw, ''];
  const segments = numbers.split('.').slice(0, 3);
  while (segments.length < 3) {
    segments.push('0');
  }

  const parsed = parse(`${segments.join('.')}${suffix}`);
  if (!parsed) {
    throw new ConstraintError(
      `Malformed version: ${input}`,
      ErrorCode.VERSION_INVALID,
      { version: input }
    );
  }

  return parsed;
}

/**
 * Rewrite one Composer comparator into node-semver syntax.
 */
function normalizeComparator(token: string): string {
  const withoutFlag = token.replace(/@[a-z]+$/i, '');
  const match = /^(>=|<=|>|<|==|=|!=|~|\^)?v?(.+)$/.exec(withoutFlag);
  if (!match) {
    return withoutFlag;
  }

  const operator = match[1] ?? '';
  let version = match[2];

  if (operator === '!=') {
    // node-semver has no inequality comparator
    throw new ConstraintError(
      `Unsupported comparator "!=" in ${token}`,
      ErrorCode.CONSTRAINT_INVALID
    );
  }

  const parts = version.split('.');
  if (parts.length === 4 && parts.every((p) => /^\d+$/.test(p))) {
    version = parts.slice(0, 3).join('.');
  }

  // Composer ~X.Y means >=X.Y <X+1; node-semver would stop at X.Y+1
  if (operator === '~' && /^\d+\.\d+$/.test(version)) {
    return `^${version}`;
  }

  return `${operator === '==' ? '=' : operator}${version}`;
}

function normalizeExpression(expression: string): string {
  return expression
    .split(/\s*\|\|?\s*/)
    .map((alternative) => {
      if (/\s-\s/.test(alternative)) {
        // hyphen range, node-semver reads it natively
        return alternative.trim();
      }

      return alternative
        .replace(/\s*(!=|>=|<=|==|>|<|=)\s*/g, ' $1')
        .split(/[\s,]+/)
        .filter((token) => token !== '')
        .map(normalizeComparator)
        .join(' ');
    })
    .join(' || ');
}

/**
 * An immutable range of host-platform versions, e.g. `>=6.4,<6.6` or
 * `~6.5.0 || ~6.6.0`.
 */
export class VersionConstraint {
  private constructor(
    private readonly expression: string,
    private readonly range: Range
  ) {}

  static parse(expression: string): VersionConstraint {
    const trimmed = expression.trim();

    if (trimmed === '') {
      throw new ConstraintError(
        'Version constraint is empty',
        ErrorCode.CONSTRAINT_INVALID
      );
    }

    const normalized = normalizeExpression(trimmed);
    const alternatives = normalized.split('||');
    if (alternatives.some((alternative) => alternative.trim() === '')) {
      throw new ConstraintError(
        `Malformed version constraint: ${expression}`,
        ErrorCode.CONSTRAINT_INVALID,
        { constraint: expression }
      );
    }

    let range: Range;
    try {
      range = new Range(normalized);
    } catch {
      throw new ConstraintError(
        `Malformed version constraint: ${expression}`,
        ErrorCode.CONSTRAINT_INVALID,
        { constraint: expression, normalized }
      );
    }

    return new VersionConstraint(trimmed, range);
  }

  check(version: SemVer | string): boolean {
    const parsed = typeof version === 'string' ? parseVersion(version) : version;
    return this.range.test(parsed);
  }

  toString(): string {
    return this.expression;
  }
}
