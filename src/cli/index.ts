import os from 'node:os';
import { parseArgs } from 'node:util';
import { z } from 'zod';
import { getEnv } from '@/lib/config/env';
import { disconnectFromDatabase, connectToDatabase } from '@/lib/db/mongoose';
import {
  clearDatabase,
  describeDatabase,
  getFlameUsers,
  getWorkBeforeDate,
  getWorkByUser,
  getWorkOnDateAtLocation,
  type WorkItem
} from '@/lib/db/queries';
import { errorMessage } from '@/lib/errors';
import { logger, setVerbose } from '@/lib/logger';
import { createFrameExtractor, probeVideo } from '@/lib/media/ffmpeg';
import { runCsvExport, runDbExport, runWorkbookExport } from '@/lib/pipeline/run';
import { parseCompactDate } from '@/lib/pipeline/utils/file-name';

const USAGE = `frame-reconcile: reconcile review-tool frame exports against a work order

Commands:
  export --output CSV|DB|XLS [-f <export>]... [-x <work order>] [-p <video>] [--strict] [--verbose]
  db show | db clear
  query user <name>
  query before <YYYY-MM-DD> <export file name>
  query on <YYYY-MM-DD> <location fragment>
  query flame-users <export file name>...

Export files are named <Baselight|Flame>_<User>_<YYYYMMDD>.txt.
CSV and DB need a work order (-x) and at least one export (-f); XLS needs a video (-p).`;

export class UsageError extends Error {}

const exportSchema = z
  .object({
    output: z.enum(['CSV', 'DB', 'XLS'], {
      errorMap: () => ({ message: 'Output destination must be specified (CSV, DB or XLS)' })
    }),
    files: z.array(z.string().min(1)).default([]),
    workOrder: z.string().min(1).optional(),
    process: z.string().min(1).optional(),
    strict: z.boolean().default(false),
    verbose: z.boolean().default(false)
  })
  .superRefine((value, ctx) => {
    if (value.output === 'XLS' && !value.process) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'Process file must be specified for XLS output' });
    }
    if (value.output !== 'XLS' && !value.workOrder) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'A work order (-x) is required for CSV and DB output' });
    }
    if (value.output !== 'XLS' && value.files.length === 0) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'At least one export file (-f) is required' });
    }
  });

export type ExportArgs = z.infer<typeof exportSchema>;

function readExportFlags(argv: string[]) {
  return parseArgs({
    args: argv,
    strict: true,
    allowPositionals: false,
    options: {
      output: { type: 'string', short: 'o' },
      file: { type: 'string', short: 'f', multiple: true },
      xytech: { type: 'string', short: 'x' },
      process: { type: 'string', short: 'p' },
      strict: { type: 'boolean' },
      verbose: { type: 'boolean' }
    }
  }).values;
}

export function parseExportArgs(argv: string[]): ExportArgs {
  let values: ReturnType<typeof readExportFlags>;
  try {
    values = readExportFlags(argv);
  } catch (error) {
    throw new UsageError(`${errorMessage(error)}\nIf entering multiple files, use -f for each file.`);
  }

  const parsed = exportSchema.safeParse({
    output: values.output?.toUpperCase(),
    files: values.file,
    workOrder: values.xytech,
    process: values.process,
    strict: values.strict,
    verbose: values.verbose
  });
  if (!parsed.success) {
    throw new UsageError(parsed.error.issues[0]?.message ?? 'Invalid arguments');
  }
  return parsed.data;
}

const isoDate = z
  .string()
  .regex(/^\d{4}-\d{2}-\d{2}$/, 'Dates are written YYYY-MM-DD')
  .transform((value, ctx) => {
    const date = parseCompactDate(value.replace(/-/g, ''));
    if (!date) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Invalid date "${value}"` });
      return z.NEVER;
    }
    return date;
  });

export function parseQueryDate(value: string | undefined): Date {
  const parsed = isoDate.safeParse(value);
  if (!parsed.success) {
    throw new UsageError(parsed.error.issues[0]?.message ?? 'Invalid date');
  }
  return parsed.data;
}

function printWork(title: string, work: readonly WorkItem[]) {
  console.log(title);
  for (const item of work) {
    console.log(`\t${item.location} ${item.frameRange}`);
  }
}

async function handleExport(argv: string[]) {
  const args = parseExportArgs(argv);
  setVerbose(args.verbose);
  const env = getEnv();
  const onMalformedLine = args.strict ? 'throw' : 'skip';

  if (args.output === 'XLS' && args.process) {
    const result = await runWorkbookExport({
      videoPath: args.process,
      outputDir: env.OUTPUT_DIR,
      probe: (videoPath) => probeVideo(env.FFPROBE_PATH, videoPath),
      extractFrame: createFrameExtractor(env.FFMPEG_PATH)
    });
    console.log(`Wrote ${result.rows} row(s) to ${result.outputPath}`);
    return;
  }

  const workOrderPath = args.workOrder;
  if (!workOrderPath) {
    throw new UsageError('A work order (-x) is required for CSV and DB output');
  }
  if (args.output === 'CSV') {
    const result = await runCsvExport({
      workOrderPath,
      files: args.files,
      outputDir: env.OUTPUT_DIR,
      delimiter: env.CSV_DELIMITER,
      onMalformedLine
    });
    console.log(`Wrote ${result.rows} row(s) to ${result.outputPath}`);
    return;
  }

  const result = await runDbExport({
    workOrderPath,
    files: args.files,
    scriptUser: os.userInfo().username,
    onMalformedLine
  });
  console.log(`Inserted ${result.inserted} frame record(s) from ${result.files} file(s)`);
}

async function handleDb(argv: string[]) {
  const [subcommand] = argv;
  if (subcommand !== 'show' && subcommand !== 'clear') {
    throw new UsageError('db expects "show" or "clear"');
  }
  await connectToDatabase();
  if (subcommand === 'clear') {
    const removed = await clearDatabase();
    console.log(`Removed ${removed.jobs} job(s) and ${removed.frames} frame record(s)`);
    return;
  }
  const { collections, jobs, frames } = await describeDatabase();
  console.log(`collections: ${collections.join(', ')}`);
  console.log('\njobs collection:');
  for (const job of jobs) console.log(JSON.stringify(job));
  console.log('\nframes collection:');
  for (const frame of frames) console.log(JSON.stringify(frame));
}

async function handleQuery(argv: string[]) {
  const [subcommand, ...rest] = argv;
  switch (subcommand) {
    case 'user': {
      const [user] = rest;
      if (!user) throw new UsageError('query user <name>');
      await connectToDatabase();
      printWork(`Work done by ${user}:`, await getWorkByUser(user));
      return;
    }
    case 'before': {
      const [date, file] = rest;
      if (!file) throw new UsageError('query before <YYYY-MM-DD> <export file name>');
      const before = parseQueryDate(date);
      await connectToDatabase();
      printWork(`Work done before ${date} on ${file}:`, await getWorkBeforeDate(before, file));
      return;
    }
    case 'on': {
      const [date, fragment] = rest;
      if (!fragment) throw new UsageError('query on <YYYY-MM-DD> <location fragment>');
      const on = parseQueryDate(date);
      await connectToDatabase();
      printWork(`Work done on ${fragment} on ${date}:`, await getWorkOnDateAtLocation(on, fragment));
      return;
    }
    case 'flame-users':
      console.log(`Flame users: ${getFlameUsers(rest).join(', ')}`);
      return;
    default:
      throw new UsageError('query expects user, before, on or flame-users');
  }
}

export async function main(argv: string[]): Promise<number> {
  const [command, ...rest] = argv;
  if (!command || command === '--help' || command === '-h') {
    console.log(USAGE);
    return command ? 0 : 1;
  }

  try {
    if (command === 'export') await handleExport(rest);
    else if (command === 'db') await handleDb(rest);
    else if (command === 'query') await handleQuery(rest);
    else throw new UsageError(`Unknown command "${command}"`);
    return 0;
  } catch (error) {
    if (error instanceof UsageError) {
      console.error(`${error.message}\n\n${USAGE}`);
      return 2;
    }
    logger.error({ err: error }, errorMessage(error));
    return 1;
  } finally {
    await disconnectFromDatabase();
  }
}
