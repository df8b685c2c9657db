import { MalformedLineError } from '@/lib/errors';
import { classifyToken } from './03-normalize';
import type { Grammar, ParsedLine } from './types';

type SplitLine = {
  pathTokens: string[];
  frameTokens: string[];
};

/**
 * Frame numbers and sentinels trail a path that may itself contain spaces,
 * so the path region ends at the last token (scanning backwards) that is not
 * frame-like.
 */
export function splitLineTokens(line: string): SplitLine {
  const tokens = line.split(' ');
  let boundary = tokens.length;
  while (boundary > 0 && classifyToken(tokens[boundary - 1]) !== null) {
    boundary -= 1;
  }
  return {
    pathTokens: tokens.slice(0, boundary),
    frameTokens: tokens.slice(boundary)
  };
}

function normalizeSeparators(path: string): string {
  return path.replace(/\\/g, '/');
}

/** Baselight-style line: `<path with optional spaces> <frames...>` */
export function parseSinglePathLine(line: string): ParsedLine {
  if (!line) {
    return { reviewedPath: '', rawFrameTokens: [] };
  }
  const { pathTokens, frameTokens } = splitLineTokens(line);
  return {
    reviewedPath: normalizeSeparators(pathTokens.join(' ')).trim(),
    rawFrameTokens: frameTokens
  };
}

/** Flame-style line: `<storage> <location> <frames...>`, neither segment containing spaces. */
export function parseDualPathLine(line: string): ParsedLine {
  if (!line) {
    return { reviewedPath: '', rawFrameTokens: [] };
  }
  const { pathTokens, frameTokens } = splitLineTokens(line);
  if (pathTokens.length !== 2) {
    throw new MalformedLineError(
      line,
      `Expected a storage and a location segment, found ${pathTokens.length} path token(s)`
    );
  }
  const [storage, location] = pathTokens.map(normalizeSeparators);
  const reviewedPath = `${storage.replace(/\/+$/, '')}/${location.replace(/^\/+/, '')}`;
  return { reviewedPath: reviewedPath.trim(), rawFrameTokens: frameTokens };
}

export function parseExportLine(line: string, grammar: Grammar): ParsedLine {
  return grammar === 'dual-path' ? parseDualPathLine(line) : parseSinglePathLine(line);
}
