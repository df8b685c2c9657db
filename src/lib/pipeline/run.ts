import fs from 'node:fs/promises';
import path from 'node:path';
import type { Logger } from 'pino';
import { connectToDatabase } from '@/lib/db/mongoose';
import { FrameRecord, Job } from '@/lib/db/models';
import { getAllFrameRecords, type WorkItem } from '@/lib/db/queries';
import { errorMessage } from '@/lib/errors';
import { createChildLogger } from '@/lib/logger';
import type { FrameExtractor, VideoProbe } from '@/lib/media/ffmpeg';
import { parseWorkOrder } from './01-work-order';
import { isSingleFrame, middleFrame, parseFrameRange, formatFrameRange } from './04-ranges';
import { frameRangeToTimeRange, frameToTimecode } from './06-timecode';
import { buildWorkbook, toCsvString, writeCsv, writeWorkbook, type WorkbookRow } from './07-export';
import { reconcileExport } from './index';
import { parseExportFileName } from './utils/file-name';
import type { ExportFileIdentity, MalformedLinePolicy, ReconcileSummary, WorkOrder } from './types';

export type ReconciledRow = {
  userOnFile: string;
  fileDate: Date;
  location: string;
  frameRange: string;
};

export type ExportFileResult = {
  file: string;
  identity: ExportFileIdentity;
  rows: ReconciledRow[];
  summary: ReconcileSummary;
};

export async function loadWorkOrder(filePath: string): Promise<WorkOrder> {
  return parseWorkOrder(await fs.readFile(filePath, 'utf8'));
}

/**
 * Reconciles one export file against the work order. The grammar and the
 * identity stamped on each row come from the file name.
 */
export async function reconcileExportFile(
  filePath: string,
  workOrder: WorkOrder,
  options: { onMalformedLine?: MalformedLinePolicy; log?: Logger } = {}
): Promise<ExportFileResult> {
  const log = options.log ?? createChildLogger({ file: path.basename(filePath) });
  const identity = parseExportFileName(filePath);
  const content = await fs.readFile(filePath, 'utf8');
  log.debug({ machine: identity.machine, userOnFile: identity.userOnFile }, 'reading export');

  const rows: ReconciledRow[] = [];
  const summary = reconcileExport(content, {
    workOrder,
    grammar: identity.grammar,
    onMalformedLine: options.onMalformedLine,
    sink: (record) => {
      rows.push({
        userOnFile: identity.userOnFile,
        fileDate: identity.fileDate,
        location: record.canonicalPath,
        frameRange: formatFrameRange(record.frameRange)
      });
    },
    onUnreconciled: (reviewedPath, lineNumber) => {
      log.debug({ reviewedPath, lineNumber }, 'no canonical path shares enough of this path');
    }
  });

  for (const malformed of summary.malformed) {
    log.warn({ lineNumber: malformed.lineNumber, line: malformed.line }, malformed.message);
  }
  log.info(
    { lines: summary.lines, reconciled: summary.reconciled, unreconciled: summary.unreconciled, records: summary.records },
    'export reconciled'
  );

  return { file: filePath, identity, rows, summary };
}

function markStage(log: Logger, stage: number, total: number, name: string, message?: string) {
  log.info(`Stage ${stage}/${total} (${name})${message ? `: ${message}` : ''}`);
}

export type CsvExportOptions = {
  workOrderPath: string;
  files: readonly string[];
  outputDir: string;
  delimiter?: string;
  onMalformedLine?: MalformedLinePolicy;
};

export async function runCsvExport(options: CsvExportOptions) {
  const log = createChildLogger({ output: 'CSV' });

  markStage(log, 1, 3, 'Work order', options.workOrderPath);
  const workOrder = await loadWorkOrder(options.workOrderPath);
  log.debug({ producer: workOrder.producer, paths: workOrder.canonicalPaths.length }, 'work order loaded');

  markStage(log, 2, 3, 'Reconcile', `${options.files.length} export file(s)`);
  const results: ExportFileResult[] = [];
  for (const file of options.files) {
    results.push(await reconcileExportFile(file, workOrder, { onMalformedLine: options.onMalformedLine }));
  }

  const outputPath = path.join(options.outputDir, 'output.csv');
  markStage(log, 3, 3, 'Export', outputPath);
  const rows = results.flatMap((result) => result.rows);
  await writeCsv(outputPath, toCsvString(workOrder, rows, options.delimiter));

  return { outputPath, rows: rows.length, results };
}

export type DbExportOptions = {
  workOrderPath: string;
  files: readonly string[];
  scriptUser: string;
  onMalformedLine?: MalformedLinePolicy;
};

const INSERT_BATCH_SIZE = 1000;

export async function runDbExport(options: DbExportOptions) {
  const log = createChildLogger({ output: 'DB' });

  markStage(log, 1, 3, 'Work order', options.workOrderPath);
  const workOrder = await loadWorkOrder(options.workOrderPath);

  markStage(log, 2, 3, 'Connect');
  await connectToDatabase();

  markStage(log, 3, 3, 'Reconcile + insert', `${options.files.length} export file(s)`);
  let inserted = 0;
  for (const file of options.files) {
    const result = await reconcileExportFile(file, workOrder, { onMalformedLine: options.onMalformedLine });
    await Job.create({
      script_user: options.scriptUser,
      machine: result.identity.machine,
      user_on_file: result.identity.userOnFile,
      file_date: result.identity.fileDate,
      submitted_date: new Date()
    });

    const docs = result.rows.map((row) => ({
      user_on_file: row.userOnFile,
      file_date: row.fileDate,
      location: row.location,
      frame_range: row.frameRange
    }));
    for (let i = 0; i < docs.length; i += INSERT_BATCH_SIZE) {
      await FrameRecord.insertMany(docs.slice(i, i + INSERT_BATCH_SIZE), { ordered: true });
    }
    inserted += docs.length;
  }

  return { files: options.files.length, inserted };
}

export type WorkbookExportOptions = {
  videoPath: string;
  outputDir: string;
  probe: (videoPath: string) => Promise<VideoProbe>;
  extractFrame: FrameExtractor;
  loadRecords?: () => Promise<WorkItem[]>;
};

type PlannedRow = {
  location: string;
  frameRange: string;
  start: number;
  end: number;
};

/**
 * Only true ranges that end inside the video get a row; single frames and
 * ranges past the last frame are dropped.
 */
export function planWorkbookRows(items: readonly WorkItem[], frameCount: number): PlannedRow[] {
  const planned: PlannedRow[] = [];
  for (const item of items) {
    const range = parseFrameRange(item.frameRange);
    if (!range || isSingleFrame(range) || range.end > frameCount) continue;
    planned.push({ location: item.location, frameRange: item.frameRange, start: range.start, end: range.end });
  }
  return planned;
}

export async function runWorkbookExport(options: WorkbookExportOptions) {
  const log = createChildLogger({ output: 'XLS' });

  markStage(log, 1, 4, 'Probe', options.videoPath);
  const { frameCount, fps } = await options.probe(options.videoPath);
  log.debug({ frameCount, fps, endTimecode: frameToTimecode(frameCount, fps) }, 'video probed');

  markStage(log, 2, 4, 'Load frames');
  let loadRecords = options.loadRecords;
  if (!loadRecords) {
    await connectToDatabase();
    loadRecords = getAllFrameRecords;
  }
  const planned = planWorkbookRows(await loadRecords(), frameCount);
  log.debug({ rows: planned.length }, 'ranges inside the video');

  markStage(log, 3, 4, 'Thumbnails', `${planned.length} frame(s)`);
  const thumbnailDir = path.join(options.outputDir, 'thumbnails');
  await fs.mkdir(thumbnailDir, { recursive: true });

  const rows: WorkbookRow[] = [];
  for (const row of planned) {
    const range = { start: row.start, end: row.end };
    const frame = middleFrame(range);
    const thumbnail = `thumbnails/frame-${frame}.png`;
    try {
      await fs.writeFile(path.join(options.outputDir, thumbnail), await options.extractFrame(options.videoPath, frame));
    } catch (error) {
      throw new Error(`Thumbnail for ${row.location} ${row.frameRange} failed: ${errorMessage(error)}`, { cause: error });
    }
    rows.push({
      location: row.location,
      frameRange: row.frameRange,
      timeRange: frameRangeToTimeRange(range, fps),
      thumbnail
    });
  }

  const outputPath = path.join(options.outputDir, 'output.xlsx');
  markStage(log, 4, 4, 'Export', outputPath);
  await writeWorkbook(outputPath, buildWorkbook(rows));

  return { outputPath, rows: rows.length, thumbnailDir };
}
