import { describe, expect, it } from 'vitest';

import { isTrackedTag, normalizeRefName } from '../src/filters/refs.js';

describe('normalizeRefName', () => {
  it('strips a leading v', () => {
    expect(normalizeRefName('v1.2.3')).toBe('1.2.3');
  });

  it('leaves names without a v prefix untouched', () => {
    expect(normalizeRefName('1.2.3')).toBe('1.2.3');
    expect(normalizeRefName('main')).toBe('main');
    expect(normalizeRefName('release-4.18')).toBe('release-4.18');
  });

  it('strips only one character', () => {
    expect(normalizeRefName('vv1')).toBe('v1');
  });
});

describe('isTrackedTag', () => {
  it.each(['v1.0.0', '1.0.0', 'release-4.18', '4.19'])('accepts %s', name => {
    expect(isTrackedTag(name)).toBe(true);
  });

  it.each(['feature-x', 'v1.0.0-rc1', 'release-', '4.x', ''])('rejects "%s"', name => {
    expect(isTrackedTag(name)).toBe(false);
  });
});
