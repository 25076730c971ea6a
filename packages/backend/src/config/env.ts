/**
 * 環境変数の読み込みと検証
 * パッケージ直下の .env を読み込み、zod スキーマで検証する
 */
import { z } from 'zod';
import dotenv from 'dotenv';
import path from 'path';
import { fileURLToPath } from 'url';
import { ConfigError } from '../utils/errors.js';

// ESModule で __dirname を得る
const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);

/** packages/backend */
export const PACKAGE_ROOT = path.resolve(__dirname, '../..');

const positiveInt = (fallback: number) => z.coerce.number().int().positive().default(fallback);

const envSchema = z.object({
  // YouTube Data API（カンマ区切りで複数指定するとクォータ切れ時にローテーション）
  YOUTUBE_API_KEYS: z
    .string({ required_error: 'YOUTUBE_API_KEYS is required' })
    .transform((value) => value.split(',').map((key) => key.trim()).filter(Boolean))
    .refine((keys) => keys.length > 0, 'YOUTUBE_API_KEYS must contain at least one key'),

  // MongoDB
  MONGODB_URI: z.string().default('mongodb://localhost:27017/yt-comments'),

  // ソースレジストリ
  SOURCES_FILE: z.string().default(path.join(PACKAGE_ROOT, 'config', 'sources.json')),
  CUTOFF_DATE: z
    .string()
    .optional()
    .refine((value) => value === undefined || !Number.isNaN(Date.parse(value)), 'CUTOFF_DATE must be an ISO date'),

  // 再開位置・再試行
  PROGRESS_TTL_DAYS: positiveInt(30),
  GLOBAL_BACKOFF_SECONDS: z.coerce.number().nonnegative().default(600),
  MAX_RETRIES: positiveInt(5),
  BACKOFF_FACTOR: z.coerce.number().nonnegative().default(0.2),
  MAX_CONCURRENT_REQUESTS: positiveInt(5),
  VIDEO_CONCURRENCY: positiveInt(1),
  PAGE_SIZE: z.coerce.number().int().min(1).max(100).default(100),
  FLUSH_MODE: z.enum(['stream', 'page']).default('stream'),

  // メタデータキャッシュ
  CACHE_DIR: z.string().default(path.join(PACKAGE_ROOT, 'yt_cache')),
  CACHE_MAX_SIZE: positiveInt(1000),

  // スケジュール実行・ステータスAPI
  HARVEST_SCHEDULE: z.string().optional(),
  PORT: positiveInt(3000),
});

export type Env = z.infer<typeof envSchema>;

/**
 * 環境変数を検証する
 * @throws ConfigError 不正な値がある場合（すべての問題を列挙）
 */
export function parseEnv(source: NodeJS.ProcessEnv): Env {
  const result = envSchema.safeParse(source);
  if (!result.success) {
    throw new ConfigError(
      'Invalid environment variables',
      result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
    );
  }
  return result.data;
}

/**
 * .env を読み込んでから process.env を検証する
 */
export function loadEnv(): Env {
  const envPath = path.join(PACKAGE_ROOT, '.env');
  const envResult = dotenv.config({ path: envPath });
  if (envResult.error) {
    console.log('.env が見つからないため環境変数のみを使用します:', envPath);
  }
  return parseEnv(process.env);
}
