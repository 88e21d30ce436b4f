import { describe, it, expect } from 'vitest';
import { ConstraintError, ErrorCode } from '../../errors/index.js';
import { captureError } from '../../../__tests__/fixtures.js';
import { VersionConstraint, parseVersion } from '../constraint.js';

describe('parseVersion', () => {
  it('should parse plain semantic versions', () => {
    expect(parseVersion('1.2.3').version).toBe('1.2.3');
    expect(parseVersion('v1.2.3').version).toBe('1.2.3');
  });

  it('should fill up short versions', () => {
    expect(parseVersion('1.2').version).toBe('1.2.0');
    expect(parseVersion('7').version).toBe('7.0.0');
  });

  it('should drop the fourth segment of shopware versions', () => {
    expect(parseVersion('6.5.0.0').version).toBe('6.5.0');
    expect(parseVersion('6.6.10.2').version).toBe('6.6.10');
    expect(parseVersion('6.5.12.0').version).toBe('6.5.12');
    expect(parseVersion('v6.4.20.2').version).toBe('6.4.20');
  });

  it('should never turn a four-part version into a pre-release', () => {
    expect(parseVersion('6.6.10.2').prerelease).toEqual([]);
    expect(parseVersion('6.5.12.0').prerelease).toEqual([]);
  });

  it('should keep pre-release tags of short versions', () => {
    expect(parseVersion('1.0-rc.1').version).toBe('1.0.0-rc.1');
  });

  it('should reject an empty version', () => {
    expect(() => parseVersion('  ')).toThrow(ConstraintError);
    expect(captureError(() => parseVersion(''))).toMatchObject({
      code: ErrorCode.VERSION_MISSING,
    });
  });

  it('should reject garbage', () => {
    expect(captureError(() => parseVersion('latest'))).toMatchObject({
      code: ErrorCode.VERSION_INVALID,
    });
  });
});

describe('VersionConstraint', () => {
  describe('parse', () => {
    it('should keep the original expression', () => {
      expect(VersionConstraint.parse(' >=6.5,<6.6 ').toString()).toBe(
        '>=6.5,<6.6'
      );
    });

    it.each(['', '   ', '>=6.5 ||', 'not-a-version', '!=6.5.0'])(
      'should reject %j',
      (expression) => {
        expect(() => VersionConstraint.parse(expression)).toThrow(
          ConstraintError
        );
      }
    );
  });

  describe('check', () => {
    it('should treat a comma as AND', () => {
      const constraint = VersionConstraint.parse('>=6.5,<6.6');

      expect(constraint.check('6.5.3')).toBe(true);
      expect(constraint.check('6.6.0')).toBe(false);
      expect(constraint.check('6.4.20')).toBe(false);
    });

    it('should match four-part host versions with two-digit patches', () => {
      const constraint = VersionConstraint.parse('>=6.6.5,<6.7');

      expect(constraint.check('6.6.10.2')).toBe(true);
      expect(constraint.check('6.6.4.9')).toBe(false);
    });

    it('should treat whitespace as AND', () => {
      const constraint = VersionConstraint.parse('>= 6.5.0.0 < 6.6.0.0');

      expect(constraint.check('6.5.5')).toBe(true);
      expect(constraint.check('6.6.0')).toBe(false);
    });

    it('should treat a pipe as OR', () => {
      const single = VersionConstraint.parse('~6.4.0 | ~6.5.0');
      const double = VersionConstraint.parse('~6.4.0 || ~6.5.0');

      for (const constraint of [single, double]) {
        expect(constraint.check('6.4.2')).toBe(true);
        expect(constraint.check('6.5.1')).toBe(true);
        expect(constraint.check('6.6.0')).toBe(false);
      }
    });

    it('should read a two-part tilde up to the next major', () => {
      const constraint = VersionConstraint.parse('~6.5');

      expect(constraint.check('6.9.0')).toBe(true);
      expect(constraint.check('7.0.0')).toBe(false);
    });

    it('should read a three-part tilde up to the next minor', () => {
      const constraint = VersionConstraint.parse('~6.5.0');

      expect(constraint.check('6.5.9')).toBe(true);
      expect(constraint.check('6.6.0')).toBe(false);
    });

    it('should support wildcards and four-part versions', () => {
      const constraint = VersionConstraint.parse('6.5.*');

      expect(constraint.check('6.5.8.0')).toBe(true);
      expect(constraint.check('6.6.0.0')).toBe(false);
    });

    it('should ignore stability flags', () => {
      expect(VersionConstraint.parse('^6.5@dev').check('6.7.1')).toBe(true);
    });

    it('should accept parsed versions', () => {
      expect(VersionConstraint.parse('^6.5').check(parseVersion('6.5.0.0'))).toBe(
        true
      );
    });
  });
});
