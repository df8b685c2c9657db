import { describe, expect, it } from 'vitest';
import {
  compressFrameRanges,
  expandFrameRanges,
  formatFrameRange,
  isSingleFrame,
  middleFrame,
  parseFrameRange
} from './04-ranges';

const compress = (frames: number[]) => compressFrameRanges(frames).map(formatFrameRange);

describe('compressFrameRanges', () => {
  it('splits at gaps', () => {
    expect(compress([1, 2, 3, 5, 6, 7])).toEqual(['1-3', '5-7']);
  });

  it('merges a fully contiguous list', () => {
    expect(compress([1, 2, 3, 4, 5, 6])).toEqual(['1-6']);
  });

  it('renders single frames without a dash', () => {
    expect(compress([38])).toEqual(['38']);
    expect(compress([1, 3])).toEqual(['1', '3']);
  });

  it('returns nothing for an empty list', () => {
    expect(compressFrameRanges([])).toEqual([]);
  });

  it('flattens back to the listed frames', () => {
    const frames = [0, 1, 2, 10, 12, 13, 14, 99];
    expect(expandFrameRanges(compressFrameRanges(frames))).toEqual(frames);
  });
});

describe('parseFrameRange', () => {
  it('reads both serialized forms', () => {
    expect(parseFrameRange('32-34')).toEqual({ start: 32, end: 34 });
    expect(parseFrameRange('38')).toEqual({ start: 38, end: 38 });
  });

  it('rejects reversed and non-numeric ranges', () => {
    expect(parseFrameRange('34-32')).toBeNull();
    expect(parseFrameRange('a-b')).toBeNull();
    expect(parseFrameRange('')).toBeNull();
  });
});

describe('middleFrame', () => {
  it('rounds toward the start', () => {
    expect(middleFrame({ start: 10, end: 20 })).toBe(15);
    expect(middleFrame({ start: 10, end: 13 })).toBe(11);
    expect(middleFrame({ start: 7, end: 7 })).toBe(7);
  });

  it('identifies single frames', () => {
    expect(isSingleFrame({ start: 7, end: 7 })).toBe(true);
    expect(isSingleFrame({ start: 7, end: 8 })).toBe(false);
  });
});
