import { basename } from 'node:path';
import { z } from 'zod';
import { runCommand, type CommandRunner } from './exec';

export type VideoProbe = {
  readonly frameCount: number;
  readonly fps: number;
};

export const THUMBNAIL_WIDTH = 96;
export const THUMBNAIL_HEIGHT = 74;

export type FrameExtractor = (videoPath: string, frame: number) => Promise<Buffer>;

export const buildProbeArgs = (input: string): string[] => [
  '-v',
  'error',
  '-select_streams',
  'v:0',
  '-count_packets',
  '-show_entries',
  'stream=r_frame_rate,nb_frames,nb_read_packets',
  '-of',
  'json',
  input
];

const probeSchema = z.object({
  streams: z
    .array(
      z.object({
        r_frame_rate: z.string().optional(),
        nb_frames: z.string().optional(),
        nb_read_packets: z.string().optional()
      })
    )
    .default([])
});

const parseCount = (value?: string): number | undefined => {
  if (!value) return undefined;
  const parsed = Number(value);
  return Number.isInteger(parsed) && parsed >= 0 ? parsed : undefined;
};

/** Timecodes are integer-rate, so 23.976 reports as 24. */
export const parseProbeOutput = (input: string, stdout: string): VideoProbe => {
  const payload = probeSchema.parse(JSON.parse(stdout));
  const stream = payload.streams.at(0);
  if (!stream) {
    throw new Error(`ffprobe found no video stream in ${basename(input)}`);
  }

  let fps: number | undefined;
  if (stream.r_frame_rate && stream.r_frame_rate.includes('/')) {
    const [num, den] = stream.r_frame_rate.split('/', 2).map((part) => Number(part));
    if (Number.isFinite(num) && Number.isFinite(den) && den !== 0) {
      fps = Math.round(num / den);
    }
  }
  if (!fps || fps <= 0) {
    throw new Error(`ffprobe did not report a frame rate for ${basename(input)}`);
  }

  const frameCount = parseCount(stream.nb_frames) ?? parseCount(stream.nb_read_packets);
  if (frameCount === undefined) {
    throw new Error(`ffprobe did not report a frame count for ${basename(input)}`);
  }

  return { frameCount, fps };
};

export const probeVideo = async (
  ffprobe: string,
  input: string,
  run: CommandRunner = runCommand
): Promise<VideoProbe> => {
  const { stdout } = await run(ffprobe, buildProbeArgs(input));
  return parseProbeOutput(input, stdout.toString('utf8'));
};

export const buildExtractFrameArgs = (input: string, frame: number): string[] => [
  '-v',
  'error',
  '-i',
  input,
  '-vf',
  `select=gte(n\\,${frame}),scale=${THUMBNAIL_WIDTH}:${THUMBNAIL_HEIGHT}:force_original_aspect_ratio=decrease`,
  '-vframes',
  '1',
  '-f',
  'image2pipe',
  '-c:v',
  'png',
  '-'
];

export const createFrameExtractor =
  (ffmpeg: string, run: CommandRunner = runCommand): FrameExtractor =>
  async (videoPath, frame) => {
    const { stdout } = await run(ffmpeg, buildExtractFrameArgs(videoPath, frame));
    if (stdout.byteLength === 0) {
      throw new Error(`ffmpeg returned no image for frame ${frame} of ${basename(videoPath)}`);
    }
    return stdout;
  };
