import type { FrameRange } from './types';

/**
 * Groups an ascending frame list into maximal contiguous runs.
 *
 * [1, 2, 3, 5, 6, 7] → 1-3, 5-7
 * [1, 3] → 1, 3
 */
export function compressFrameRanges(frames: readonly number[]): FrameRange[] {
  if (frames.length === 0) return [];

  const ranges: FrameRange[] = [];
  let start = frames[0];
  let end = frames[0];

  for (let i = 1; i < frames.length; i += 1) {
    const frame = frames[i];
    if (frame === end + 1) {
      end = frame;
      continue;
    }
    ranges.push({ start, end });
    start = frame;
    end = frame;
  }
  ranges.push({ start, end });

  return ranges;
}

export function formatFrameRange(range: FrameRange): string {
  return range.start === range.end ? String(range.start) : `${range.start}-${range.end}`;
}

/** Inverse of formatFrameRange; returns null for anything it did not produce. */
export function parseFrameRange(value: string): FrameRange | null {
  const match = /^(\d+)(?:-(\d+))?$/.exec(value.trim());
  if (!match) return null;
  const start = Number.parseInt(match[1], 10);
  const end = match[2] === undefined ? start : Number.parseInt(match[2], 10);
  return start <= end ? { start, end } : null;
}

export function isSingleFrame(range: FrameRange): boolean {
  return range.start === range.end;
}

export function expandFrameRanges(ranges: readonly FrameRange[]): number[] {
  const frames: number[] = [];
  for (const range of ranges) {
    for (let frame = range.start; frame <= range.end; frame += 1) {
      frames.push(frame);
    }
  }
  return frames;
}

/** Frame used for the range's thumbnail. */
export function middleFrame(range: FrameRange): number {
  return range.start + Math.floor((range.end - range.start) / 2);
}
