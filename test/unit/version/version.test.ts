import { describe, it } from 'mocha';
import { strict as assert } from 'assert';
import { ErrorCode, LintError } from '../../../src/errors';
import {
  isUpgradeFrom2xTo3x,
  isVersionAtLeast,
  majorMinorLabel,
  parseVersion,
  sameMajorMinor,
  tryParseVersion,
} from '../../../src/version';

describe('version helpers', () => {
  describe('parseVersion', () => {
    it('should parse full semantic versions', () => {
      assert.equal(parseVersion('2.25.1').version, '2.25.1');
    });

    it('should accept a leading v and missing parts', () => {
      assert.equal(parseVersion('v3.0').version, '3.0.0');
      assert.equal(parseVersion('3').version, '3.0.0');
    });

    it('should keep pre-release tags', () => {
      assert.equal(parseVersion('3.0.0-ea.1').version, '3.0.0-ea.1');
    });

    it('should reject garbage', () => {
      assert.throws(
        () => parseVersion('three'),
        (err: unknown) => err instanceof LintError && err.code === ErrorCode.L103_INVALID_VERSION
      );
    });
  });

  it('tryParseVersion should return undefined instead of throwing', () => {
    assert.equal(tryParseVersion(undefined), undefined);
    assert.equal(tryParseVersion(''), undefined);
    assert.equal(tryParseVersion('x.y'), undefined);
    assert.equal(tryParseVersion('2.16')?.version, '2.16.0');
  });

  it('isUpgradeFrom2xTo3x should require both versions', () => {
    assert.equal(isUpgradeFrom2xTo3x(parseVersion('2.25'), parseVersion('3.0')), true);
    assert.equal(isUpgradeFrom2xTo3x(parseVersion('3.0'), parseVersion('3.3')), false);
    assert.equal(isUpgradeFrom2xTo3x(undefined, parseVersion('3.0')), false);
  });

  it('isVersionAtLeast should compare major.minor only', () => {
    assert.equal(isVersionAtLeast(parseVersion('3.3.0'), 3, 3), true);
    assert.equal(isVersionAtLeast(parseVersion('3.2.9'), 3, 3), false);
    assert.equal(isVersionAtLeast(parseVersion('4.0.0'), 3, 3), true);
    assert.equal(isVersionAtLeast(undefined, 3, 3), false);
  });

  it('sameMajorMinor and majorMinorLabel should ignore patch', () => {
    assert.equal(sameMajorMinor(parseVersion('2.25.0'), parseVersion('2.25.3')), true);
    assert.equal(sameMajorMinor(parseVersion('2.25.0'), parseVersion('3.0.0')), false);
    assert.equal(majorMinorLabel(parseVersion('2.25.3')), '2.25');
  });
});
