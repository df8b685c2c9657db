import * as dotenv from 'dotenv';
import { z } from 'zod';
import { ConfigError } from '@/lib/errors';

dotenv.config();

const envSchema = z.object({
  MONGODB_URI: z.string().min(1).default('mongodb://localhost:27017/mydatabase'),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  OUTPUT_DIR: z.string().min(1).default('.'),
  CSV_DELIMITER: z.string().length(1).default(','),
  FFMPEG_PATH: z.string().min(1).default('ffmpeg'),
  FFPROBE_PATH: z.string().min(1).default('ffprobe')
});

export type Env = z.infer<typeof envSchema>;

export function loadEnv(source: NodeJS.ProcessEnv = process.env): Env {
  const parsed = envSchema.safeParse(source);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new ConfigError(
      issue ? `${issue.path.join('.')}: ${issue.message}` : 'Invalid environment'
    );
  }
  return parsed.data;
}

let cached: Env | null = null;

export function getEnv(): Env {
  if (!cached) {
    cached = loadEnv();
  }
  return cached;
}
