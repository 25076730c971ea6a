/**
 * 動画・チャンネルのメタデータ取得
 * キャッシュを優先し、足りない分だけ API でまとめて取得する
 */
import type { MetadataCache } from '../utils/cache.js';
import type { VideoMetadata } from '../types/harvest.js';
import type { Video, YouTubeGateway } from './youtubeApi.js';

/** videos.list / channels.list の1回あたりの最大ID数 */
export const MAX_IDS_PER_REQUEST = 50;

export function chunk<T>(items: T[], size: number): T[][] {
  const chunks: T[][] = [];
  for (let i = 0; i < items.length; i += size) {
    chunks.push(items.slice(i, i + size));
  }
  return chunks;
}

export class MetadataService {
  constructor(
    private readonly api: YouTubeGateway,
    private readonly cache: MetadataCache
  ) {}

  private remember(video: Video): void {
    const snippet = video.snippet;
    if (!video.id || !snippet?.title || !snippet.channelId) return;

    const channelName = snippet.channelTitle ?? this.cache.channels.get(snippet.channelId) ?? null;
    if (snippet.channelTitle) {
      this.cache.channels.set(snippet.channelId, snippet.channelTitle);
    }
    this.cache.videos.set(video.id, {
      title: snippet.title,
      channelId: snippet.channelId,
      channelName,
      publishedAt: snippet.publishedAt ? new Date(snippet.publishedAt) : null,
    });
  }

  /**
   * 複数動画のメタデータを取得
   * @returns 解決できた動画だけを含む Map
   */
  async getVideoMetadataBatch(videoIds: string[]): Promise<Map<string, VideoMetadata>> {
    const unique = [...new Set(videoIds)];
    const missing = unique.filter((id) => !this.cache.videos.has(id));

    for (const ids of chunk(missing, MAX_IDS_PER_REQUEST)) {
      const videos = await this.api.getVideos(ids);
      for (const video of videos ?? []) {
        this.remember(video);
      }
    }

    const result = new Map<string, VideoMetadata>();
    for (const id of unique) {
      const cached = this.cache.videos.get(id);
      if (cached) result.set(id, cached);
    }
    return result;
  }

  /**
   * 単一動画のメタデータを取得
   * @returns 解決できなければ null
   */
  async getVideoMetadata(videoId: string): Promise<VideoMetadata | null> {
    const result = await this.getVideoMetadataBatch([videoId]);
    return result.get(videoId) ?? null;
  }

  /**
   * チャンネル名を取得
   * @returns チャンネルが見つからなければ null
   */
  async getChannelName(channelId: string): Promise<string | null> {
    const cached = this.cache.channels.get(channelId);
    if (cached !== undefined) return cached;

    const channels = await this.api.getChannels([channelId], ['snippet']);
    const title = channels?.[0]?.snippet?.title;
    if (!title) return null;
    this.cache.channels.set(channelId, title);
    return title;
  }
}
