/**
 * ソースレジストリ（収集対象チャンネル・キーワード・カットオフ日時）の読み込み
 * 起動時に1回だけ読み込み、実行中は変更しない
 */
import fs from 'fs';
import { z } from 'zod';
import { ConfigError } from '../utils/errors.js';
import type { ChannelRegistry } from '../types/harvest.js';

const channelSchema = z.object({
  handle: z.string().optional(),
  channelId: z.string().min(1),
  wholeChannel: z.boolean().default(false),
  tags: z.array(z.string()).default([]),
  outdated: z.boolean().default(false),
});

const sourcesSchema = z.object({
  cutoffDate: z.string().refine((value) => !Number.isNaN(Date.parse(value)), 'cutoffDate must be an ISO date'),
  keywords: z.array(z.string().min(1)).min(1),
  channels: z.record(channelSchema),
});

export interface SourceRegistry {
  cutoffDate: Date;
  keywords: string[];
  channels: ChannelRegistry;
}

/**
 * JSON 値を検証してレジストリにする
 * @throws ConfigError
 */
export function parseSources(raw: unknown): SourceRegistry {
  const result = sourcesSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigError(
      'Invalid source registry',
      result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
    );
  }
  const { cutoffDate, keywords, channels } = result.data;
  return {
    cutoffDate: new Date(cutoffDate),
    // 重複キーワードは1つにまとめる
    keywords: [...new Set(keywords)],
    channels,
  };
}

/**
 * ファイルからレジストリを読み込む
 * @param cutoffOverride 指定があればファイルの cutoffDate より優先
 */
export function loadSources(filePath: string, cutoffOverride?: string): SourceRegistry {
  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
  } catch (error) {
    throw new ConfigError(`Cannot read source registry: ${filePath}`, [error instanceof Error ? error.message : String(error)]);
  }
  const registry = parseSources(raw);
  return cutoffOverride ? { ...registry, cutoffDate: new Date(cutoffOverride) } : registry;
}
