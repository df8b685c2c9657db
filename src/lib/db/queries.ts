import mongoose from 'mongoose';
import { parseExportFileName } from '@/lib/pipeline/utils/file-name';
import { FrameRecord, Job } from './models';

export type WorkItem = {
  location: string;
  frameRange: string;
};

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

export function workByUserFilter(userOnFile: string) {
  return { user_on_file: userOnFile };
}

/** The user comes from the export file name, e.g. `Flame_DFlowers_20230323.txt`. */
export function workBeforeDateFilter(date: Date, exportFileName: string) {
  const { userOnFile } = parseExportFileName(exportFileName);
  return { user_on_file: userOnFile, file_date: { $lt: date } };
}

/** Work on a file date whose location mentions a storage or folder name such as `hpsans13`. */
export function workOnDateAtLocationFilter(date: Date, locationFragment: string) {
  return { file_date: date, location: { $regex: escapeRegExp(locationFragment) } };
}

/** Unique Flame users across the given export file names, in first-seen order. */
export function getFlameUsers(fileNames: readonly string[]): string[] {
  const users: string[] = [];
  for (const fileName of fileNames) {
    const identity = parseExportFileName(fileName);
    if (identity.machine === 'Flame' && !users.includes(identity.userOnFile)) {
      users.push(identity.userOnFile);
    }
  }
  return users;
}

type FrameRow = { location: string; frame_range: string };

export function toWorkItems(rows: readonly FrameRow[]): WorkItem[] {
  return rows.map((row) => ({ location: row.location, frameRange: row.frame_range }));
}

export async function getWorkByUser(userOnFile: string): Promise<WorkItem[]> {
  return toWorkItems(await FrameRecord.find(workByUserFilter(userOnFile)).lean());
}

export async function getWorkBeforeDate(date: Date, exportFileName: string): Promise<WorkItem[]> {
  return toWorkItems(await FrameRecord.find(workBeforeDateFilter(date, exportFileName)).lean());
}

export async function getWorkOnDateAtLocation(date: Date, locationFragment: string): Promise<WorkItem[]> {
  return toWorkItems(await FrameRecord.find(workOnDateAtLocationFilter(date, locationFragment)).lean());
}

export async function getAllFrameRecords(): Promise<WorkItem[]> {
  return toWorkItems(await FrameRecord.find().lean());
}

export async function describeDatabase() {
  const collections = (await mongoose.connection.db?.listCollections().toArray()) ?? [];
  const [jobs, frames] = await Promise.all([Job.find().lean(), FrameRecord.find().lean()]);
  return {
    collections: collections.map((collection) => collection.name),
    jobs,
    frames
  };
}

export async function clearDatabase() {
  const [jobs, frames] = await Promise.all([Job.deleteMany({}), FrameRecord.deleteMany({})]);
  return { jobs: jobs.deletedCount, frames: frames.deletedCount };
}
