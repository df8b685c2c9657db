import { MalformedLineError } from '@/lib/errors';
import { parseExportLine } from './02-parse-line';
import { normalizeFrameTokens } from './03-normalize';
import { compressFrameRanges } from './04-ranges';
import { reconcilePath } from './05-reconcile';
import type {
  Grammar,
  MalformedLine,
  MalformedLinePolicy,
  ParsedLine,
  RecordSink,
  ReconcileSummary,
  WorkOrder
} from './types';

export { parseWorkOrder, getField } from './01-work-order';
export { parseExportLine, parseSinglePathLine, parseDualPathLine, splitLineTokens } from './02-parse-line';
export { classifyToken, normalizeFrameTokens } from './03-normalize';
export {
  compressFrameRanges,
  expandFrameRanges,
  formatFrameRange,
  isSingleFrame,
  middleFrame,
  parseFrameRange
} from './04-ranges';
export { MIN_SHARED_SEPARATORS, reconcilePath, reversedCommonPath, type PathMatch } from './05-reconcile';
export { frameRangeToTimeRange, frameToTimecode } from './06-timecode';
export { getFileDate, grammarForMachine, parseExportFileName } from './utils/file-name';
export type * from './types';

export type ReconcileOptions = {
  workOrder: WorkOrder;
  grammar: Grammar;
  sink: RecordSink;
  onMalformedLine?: MalformedLinePolicy;
  /** Called for lines whose path matched no canonical path. */
  onUnreconciled?: (reviewedPath: string, lineNumber: number) => void;
};

/**
 * Runs every line of one export through parse → normalize → compress →
 * reconcile and hands each matched range to the sink. A line that matches
 * nothing emits nothing; a malformed line is recorded (or rethrown under the
 * 'throw' policy) without touching the lines around it.
 */
export function reconcileExport(content: string, options: ReconcileOptions): ReconcileSummary {
  const policy = options.onMalformedLine ?? 'skip';
  const malformed: MalformedLine[] = [];
  let lines = 0;
  let reconciled = 0;
  let unreconciled = 0;
  let records = 0;

  const rawLines = content.split('\n');
  for (let index = 0; index < rawLines.length; index += 1) {
    const line = rawLines[index].replace(/\r$/, '');
    if (!line) continue;
    lines += 1;

    let parsed: ParsedLine;
    try {
      parsed = parseExportLine(line, options.grammar);
    } catch (error) {
      if (policy === 'throw' || !(error instanceof MalformedLineError)) throw error;
      malformed.push({ lineNumber: index + 1, line, message: error.message });
      continue;
    }

    const ranges = compressFrameRanges(normalizeFrameTokens(parsed.rawFrameTokens));
    const match = reconcilePath(parsed.reviewedPath, options.workOrder.canonicalPaths);
    if (!match) {
      unreconciled += 1;
      options.onUnreconciled?.(parsed.reviewedPath, index + 1);
      continue;
    }

    reconciled += 1;
    for (const frameRange of ranges) {
      options.sink({ canonicalPath: match.canonicalPath, frameRange });
      records += 1;
    }
  }

  return { lines, reconciled, unreconciled, malformed, records };
}
