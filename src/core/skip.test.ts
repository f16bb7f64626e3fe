import { describe, it, expect } from 'vitest';
import { parseFilter, shouldSkip, SkipState } from './skip.js';

describe('parseFilter', () => {
  it('splits on commas and pipes and trims whitespace', () => {
    expect(parseFilter(' js, !go | rb ')).toEqual({ include: ['js', 'rb'], exclude: ['go'] });
  });

  it('returns null for an empty filter', () => {
    expect(parseFilter('  ')).toBeNull();
  });

  it('returns null for a malformed tag', () => {
    expect(parseFilter('js, no spaces')).toBeNull();
  });
});

describe('shouldSkip', () => {
  it('skips when the host tag is negated', () => {
    expect(shouldSkip({ include: [], exclude: ['js'] }, 'js')).toBe(true);
  });

  it('applies when another tag is negated', () => {
    expect(shouldSkip({ include: [], exclude: ['go'] }, 'js')).toBe(false);
  });

  it('applies when the host tag is listed', () => {
    expect(shouldSkip({ include: ['go', 'js'], exclude: [] }, 'js')).toBe(false);
  });

  it('skips when only other hosts are listed', () => {
    expect(shouldSkip({ include: ['go'], exclude: [] }, 'js')).toBe(true);
  });

  it('a negation elsewhere makes unlisted hosts applicable', () => {
    expect(shouldSkip({ include: ['rb'], exclude: ['go'] }, 'js')).toBe(false);
  });
});

describe('SkipState', () => {
  it('inherits a comment filter until the next comment', () => {
    const state = new SkipState('js');
    expect(state.enterComment({ include: [], exclude: ['js'] })).toBe(true);
    expect(state.resolveFeature(null)).toBe(true);
    expect(state.resolveFeature(null)).toBe(true);

    expect(state.enterComment(null)).toBe(false);
    expect(state.resolveFeature(null)).toBe(false);
  });

  it('lets a feature filter override the inherited state', () => {
    const state = new SkipState('js');
    state.enterComment({ include: [], exclude: ['js'] });
    expect(state.resolveFeature({ include: ['js'], exclude: [] })).toBe(false);
    expect(state.resolveFeature(null)).toBe(true);
  });

  it('starts with nothing skipped', () => {
    expect(new SkipState('js').resolveFeature(null)).toBe(false);
  });
});
