/**
 * テスト用のインメモリ実装
 * MongoDB と YouTube API の代わりにプロセス内で動作する
 */
import type { CursorStore } from '../services/cursorStore.js';
import type { RecencyIndex } from '../services/recencyIndex.js';
import type { BulkCounts, BulkWriter, CommentSink, UpsertResult } from '../services/commentSink.js';
import type { Channel, CommentThread, Playlist, Video, YouTubeGateway } from '../services/youtubeApi.js';
import type { CommentRecord, Page } from '../types/harvest.js';

// ========================================
// 永続化層
// ========================================

export class InMemoryCursorStore implements CursorStore {
  readonly cursors = new Map<string, string | null>();
  readonly saves: Array<[string, string | null]> = [];

  async exists(streamId: string): Promise<boolean> {
    return this.cursors.has(streamId);
  }

  async get(streamId: string): Promise<string | null> {
    return this.cursors.get(streamId) ?? null;
  }

  async save(streamId: string, pageToken: string | null): Promise<void> {
    this.saves.push([streamId, pageToken]);
    this.cursors.set(streamId, pageToken);
  }
}

export class InMemoryRecencyIndex implements RecencyIndex {
  readonly marks = new Map<string, Date>();

  set(channelId: string, videoId: string, updatedAt: Date): void {
    this.marks.set(`${channelId}/${videoId}`, updatedAt);
  }

  async getLowWaterMark(channelId: string, videoId: string, fallback: Date): Promise<Date> {
    return this.marks.get(`${channelId}/${videoId}`) ?? fallback;
  }
}

export class InMemoryCommentSink implements CommentSink {
  readonly comments = new Map<string, CommentRecord>();
  readonly batches: CommentRecord[][] = [];

  async upsertComments(records: CommentRecord[]): Promise<UpsertResult> {
    this.batches.push(records);
    const result: UpsertResult = { upserted: 0, matched: 0, modified: 0, skipped: 0, failedBatches: 0 };
    for (const record of records) {
      if (this.comments.has(record.commentId)) {
        result.matched++;
        result.modified++;
      } else {
        result.upserted++;
      }
      this.comments.set(record.commentId, record);
    }
    return result;
  }
}

/**
 * Map を comments コレクションに見立てた BulkWriter
 */
export function createMapBulkWriter(store: Map<string, Omit<CommentRecord, 'commentId'>>): BulkWriter {
  return async (operations) => {
    const counts: BulkCounts = { upserted: 0, matched: 0, modified: 0 };
    for (const { updateOne } of operations) {
      const existing = store.get(updateOne.filter.commentId);
      const next = updateOne.update.$set;
      if (!existing) {
        counts.upserted++;
      } else {
        counts.matched++;
        if (JSON.stringify(existing) !== JSON.stringify(next)) counts.modified++;
      }
      store.set(updateOne.filter.commentId, next);
    }
    return counts;
  };
}

// ========================================
// YouTube API
// ========================================

export interface ThreadInput {
  id: string;
  videoId: string;
  updatedAt: string;
  publishedAt?: string;
  author?: string;
  authorChannelId?: string;
  text?: string;
  likeCount?: number;
}

/**
 * commentThreads.list が返す形のコメントスレッドを作る
 */
export function makeThread(input: ThreadInput): CommentThread {
  return {
    id: input.id,
    snippet: {
      videoId: input.videoId,
      topLevelComment: {
        id: input.id,
        snippet: {
          videoId: input.videoId,
          authorDisplayName: input.author ?? 'viewer',
          authorChannelId: input.authorChannelId ? { value: input.authorChannelId } : undefined,
          textOriginal: input.text ?? `comment ${input.id}`,
          likeCount: input.likeCount ?? 0,
          publishedAt: input.publishedAt ?? input.updatedAt,
          updatedAt: input.updatedAt,
        },
      },
    },
  };
}

export function page<T>(items: T[], nextPageToken: string | null = null): Page<T> {
  return { items, nextPageToken };
}

/** ID ごと・ページトークンごとの応答。先頭ページのトークンは '' */
export class PageBook<T> {
  private readonly pages = new Map<string, Map<string, Page<T> | null | Error>>();

  set(id: string, token: string | null, response: Page<T> | null | Error): this {
    const byToken = this.pages.get(id) ?? new Map<string, Page<T> | null | Error>();
    byToken.set(token ?? '', response);
    this.pages.set(id, byToken);
    return this;
  }

  async get(id: string, token: string | null): Promise<Page<T> | null> {
    const response = this.pages.get(id)?.get(token ?? '');
    if (response instanceof Error) throw response;
    return response ?? null;
  }
}

export interface ChannelFixture {
  title?: string;
  subscriberCount?: string;
  uploadsPlaylistId?: string;
}

export class FakeYouTubeGateway implements YouTubeGateway {
  readonly videoComments = new PageBook<CommentThread>();
  readonly channelComments = new PageBook<CommentThread>();
  readonly playlists = new PageBook<Playlist>();
  readonly playlistItems = new PageBook<string>();
  readonly searchResults = new PageBook<string>();
  readonly videos = new Map<string, Video>();
  readonly channels = new Map<string, ChannelFixture>();
  readonly latestUploads = new Map<string, Date>();
  /** 呼び出し履歴（メソッド名:ID:トークン） */
  readonly calls: string[] = [];

  addVideo(id: string, title: string, channelId: string, publishedAt: string | null = null, channelTitle?: string): this {
    this.videos.set(id, {
      id,
      snippet: { title, channelId, channelTitle, publishedAt: publishedAt ?? undefined },
    });
    return this;
  }

  addChannel(id: string, fixture: ChannelFixture): this {
    this.channels.set(id, fixture);
    return this;
  }

  async listVideoCommentThreads(videoId: string, pageToken: string | null) {
    this.calls.push(`videoComments:${videoId}:${pageToken ?? ''}`);
    return this.videoComments.get(videoId, pageToken);
  }

  async listChannelCommentThreads(channelId: string, pageToken: string | null) {
    this.calls.push(`channelComments:${channelId}:${pageToken ?? ''}`);
    return this.channelComments.get(channelId, pageToken);
  }

  async listChannelPlaylists(channelId: string, pageToken: string | null) {
    this.calls.push(`playlists:${channelId}:${pageToken ?? ''}`);
    return this.playlists.get(channelId, pageToken);
  }

  async listPlaylistVideoIds(playlistId: string, pageToken: string | null) {
    this.calls.push(`playlistItems:${playlistId}:${pageToken ?? ''}`);
    return this.playlistItems.get(playlistId, pageToken);
  }

  async searchChannelVideoIds(channelId: string, query: string, pageToken: string | null) {
    this.calls.push(`search:${channelId}:${query}:${pageToken ?? ''}`);
    return this.searchResults.get(channelId, pageToken);
  }

  async getVideos(videoIds: string[]) {
    this.calls.push(`videos:${videoIds.join(',')}`);
    return videoIds.flatMap((id) => {
      const video = this.videos.get(id);
      return video ? [video] : [];
    });
  }

  async getChannels(channelIds: string[], parts: string[]) {
    this.calls.push(`channels:${channelIds.join(',')}:${parts.join(',')}`);
    return channelIds.flatMap((id): Channel[] => {
      const fixture = this.channels.get(id);
      if (!fixture) return [];
      return [
        {
          id,
          snippet: { title: fixture.title },
          statistics: { subscriberCount: fixture.subscriberCount },
          contentDetails: { relatedPlaylists: { uploads: fixture.uploadsPlaylistId } },
        },
      ];
    });
  }

  async getLatestUploadDate(uploadsPlaylistId: string) {
    this.calls.push(`latestUpload:${uploadsPlaylistId}`);
    return this.latestUploads.get(uploadsPlaylistId) ?? null;
  }
}
