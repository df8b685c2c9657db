import { TimecodeRangeError } from '@/lib/errors';
import type { FrameRange } from './types';

// hh has two digits and no day rollover.
const MAX_HOURS = 24;

const pad = (n: number) => n.toString().padStart(2, '0');

/**
 * Converts a frame number to non-drop `hh:mm:ss:ff`.
 *
 * At 24 fps: 35 → 00:00:01:11, 1569 → 00:01:05:09, 14000 → 00:09:43:08
 */
export function frameToTimecode(frame: number, fps: number): string {
  if (!Number.isInteger(fps) || fps <= 0) {
    throw new TimecodeRangeError(`Frame rate must be a positive integer, received ${fps}`);
  }
  if (!Number.isInteger(frame) || frame < 0) {
    throw new TimecodeRangeError(`Frame must be a non-negative integer, received ${frame}`);
  }

  let second = Math.floor(frame / fps);
  const frameInSecond = frame % fps;
  let minute = Math.floor(second / 60);
  second %= 60;
  const hour = Math.floor(minute / 60);
  minute %= 60;

  if (hour >= MAX_HOURS) {
    throw new TimecodeRangeError(`Frame ${frame} at ${fps} fps is past ${MAX_HOURS} hours`);
  }

  return `${pad(hour)}:${pad(minute)}:${pad(second)}:${pad(frameInSecond)}`;
}

export function frameRangeToTimeRange(range: FrameRange, fps: number): string {
  const start = frameToTimecode(range.start, fps);
  if (range.start === range.end) return start;
  return `${start} - ${frameToTimecode(range.end, fps)}`;
}
