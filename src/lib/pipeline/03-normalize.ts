import type { FrameToken, Sentinel } from './types';

const SENTINELS = new Map<string, Sentinel>([
  ['<err>', 'err'],
  ['<null>', 'null'],
  ['', 'empty']
]);

// Longer runs of digits do not fit a double exactly and are not frame numbers.
const MAX_FRAME_DIGITS = 15;
const DIGITS = new RegExp(`^[0-9]{1,${MAX_FRAME_DIGITS}}$`);

/**
 * Classifies one export token. Returns null for anything that is neither a
 * frame number nor a sentinel, which is where the path region ends.
 */
export function classifyToken(raw: string): FrameToken | null {
  if (DIGITS.test(raw)) {
    return { kind: 'frame', value: Number.parseInt(raw, 10) };
  }
  const sentinel = SENTINELS.get(raw);
  return sentinel ? { kind: 'sentinel', sentinel } : null;
}

/**
 * Keeps the tokens that are plain frame numbers, in the order they appear.
 *
 * Producers emit frames ascending and without repeats, so nothing is sorted
 * or deduplicated here; callers with other sources must sort first.
 */
export function normalizeFrameTokens(rawTokens: readonly string[]): number[] {
  const frames: number[] = [];
  for (const raw of rawTokens) {
    const token = classifyToken(raw);
    if (token?.kind === 'frame') {
      frames.push(token.value);
    }
  }
  return frames;
}
