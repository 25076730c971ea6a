/**
 * チャンネル単位のコメント収集
 *
 * 2つの巡回方式をチャンネル定義の wholeChannel フラグで切り替える:
 * - チャンネル全体巡回: チャンネル全体を1ストリーム（chan::<id>）として新しい順に読み、
 *   カットオフより古いコメントに当たった時点で巡回全体を終了する
 * - プレイリスト/キーワード巡回: キーワードに一致するプレイリストの動画ごとに差分取得する。
 *   一致するプレイリストがなければチャンネル内のキーワード検索にフォールバックする
 */
import { QuotaExhaustedError, errorMessage } from '../utils/errors.js';
import { Semaphore } from '../utils/semaphore.js';
import { channelStreamId, CursorStore } from './cursorStore.js';
import { commentUpdatedAt, commentVideoId, toCommentRecord } from './commentMapper.js';
import type { CommentSink } from './commentSink.js';
import type { RecencyIndex } from './recencyIndex.js';
import type { MetadataService } from './metadata.js';
import type { StreamEnumerator } from './streamEnumerator.js';
import type { FetchOutcome, IncrementalFetcher } from './incrementalFetcher.js';
import type { YouTubeGateway } from './youtubeApi.js';
import type { ChannelSource, CommentRecord } from '../types/harvest.js';

export type SweepState = 'completed' | 'up-to-date' | 'exhausted' | 'not-found' | 'error';

export interface SweepResult {
  state: SweepState;
  streams: number;
  inserted: number;
}

export interface ChannelProcessorDeps {
  api: Pick<YouTubeGateway, 'listChannelCommentThreads'>;
  cursors: CursorStore;
  recency: RecencyIndex;
  sink: CommentSink;
  metadata: MetadataService;
  enumerator: StreamEnumerator;
  fetcher: IncrementalFetcher;
}

export interface ChannelProcessorOptions {
  /** 取得対象の最古日時（これより前のコメントは対象外） */
  cutoff: Date;
  keywords: string[];
  pageSize?: number;
  /** 1チャンネル内で同時に処理する動画数 */
  videoConcurrency?: number;
}

export interface ProcessOptions {
  ignoreProgress?: boolean;
}

/**
 * 複数のジェネレーターを順番に連結する
 */
async function* concat<T>(sources: Array<() => AsyncIterable<T>>): AsyncGenerator<T> {
  for (const source of sources) {
    yield* source();
  }
}

export class ChannelProcessor {
  private readonly pageSize: number;
  private readonly videoConcurrency: number;

  constructor(
    private readonly deps: ChannelProcessorDeps,
    private readonly options: ChannelProcessorOptions
  ) {
    this.pageSize = options.pageSize ?? 100;
    this.videoConcurrency = options.videoConcurrency ?? 1;
  }

  /**
   * チャンネル定義に応じて巡回方式を選ぶ
   */
  async processChannel(name: string, source: ChannelSource, options: ProcessOptions = {}): Promise<SweepResult> {
    console.log(`📺 チャンネル "${name}" (${source.channelId}) を処理します（${source.wholeChannel ? 'チャンネル全体' : 'プレイリスト'}）`);
    return source.wholeChannel
      ? this.sweepWholeChannel(source.channelId)
      : this.sweepPlaylists(source.channelId, options);
  }

  // ========================================
  // チャンネル全体巡回
  // ========================================

  async sweepWholeChannel(channelId: string): Promise<SweepResult> {
    const { api, cursors, metadata, sink } = this.deps;
    const streamId = channelStreamId(channelId);
    const cutoff = this.options.cutoff.getTime();
    const result: SweepResult = { state: 'completed', streams: 1, inserted: 0 };

    let pageToken = await cursors.get(streamId);
    if (pageToken === null && (await cursors.exists(streamId))) {
      console.log(`[DEBUG] チャンネル ${channelId} は最新です。スキップします`);
      return { ...result, state: 'up-to-date', streams: 0 };
    }

    try {
      const channelName = await metadata.getChannelName(channelId);
      if (!channelName) {
        console.warn(`⚠️  チャンネル ${channelId} が見つかりません`);
        return { ...result, state: 'not-found', streams: 0 };
      }

      for (;;) {
        const page = await api.listChannelCommentThreads(channelId, pageToken, this.pageSize);
        if (!page || page.items.length === 0) {
          await cursors.save(streamId, null);
          break;
        }

        const videoIds = page.items.map(commentVideoId).filter((id): id is string => id !== null);
        const videos = await metadata.getVideoMetadataBatch(videoIds);

        const rows: CommentRecord[] = [];
        let reachedCutoff = false;
        for (const item of page.items) {
          const updatedAt = commentUpdatedAt(item);
          if (!updatedAt) {
            console.warn(`⚠️  updatedAt のないコメントを捨てます: ${item.id ?? '(id なし)'} (${streamId})`);
            continue;
          }
          // チャンネル全体のフィードは時系列順なので、カットオフより古ければ以降もすべて古い
          if (updatedAt.getTime() < cutoff) {
            reachedCutoff = true;
            break;
          }

          const videoId = commentVideoId(item);
          const video = videoId ? videos.get(videoId) : undefined;
          if (!videoId || !video || video.channelId !== channelId) continue;

          const record = toCommentRecord(item, {
            videoId,
            videoTitle: video.title,
            channelId,
            channelName,
            videoPublishDate: video.publishedAt,
          });
          if (!record) {
            console.warn(`⚠️  必須項目が欠けたコメントを捨てます: ${item.id ?? '(id なし)'} (${streamId})`);
            continue;
          }
          rows.push(record);
        }

        if (rows.length > 0) {
          const written = await sink.upsertComments(rows);
          result.inserted += written.upserted;
        }

        if (reachedCutoff) {
          await cursors.save(streamId, null);
          break;
        }

        const next = page.nextPageToken;
        if (next !== null && next === pageToken) {
          console.warn(`⚠️  ページトークン "${next}" が進まないため中断します (${streamId})`);
          return { ...result, state: 'error' };
        }
        await cursors.save(streamId, next);
        if (!next) break;
        pageToken = next;
      }
    } catch (error) {
      if (error instanceof QuotaExhaustedError) {
        console.warn(`🚫 クォータ切れのためチャンネル ${channelId} の巡回を中断しました`);
        return { ...result, state: 'exhausted' };
      }
      throw error;
    }

    return result;
  }

  // ========================================
  // プレイリスト/キーワード巡回
  // ========================================

  /**
   * 動画1本を差分取得する
   * @returns メタデータが解決できずスキップした場合は null
   */
  private async processVideo(
    videoId: string,
    channelId: string,
    channelName: string,
    options: ProcessOptions
  ): Promise<FetchOutcome | null> {
    const { metadata, recency, fetcher } = this.deps;

    const video = await metadata.getVideoMetadata(videoId);
    if (!video) {
      console.log(`動画 ${videoId} のメタデータが取得できないためスキップします`);
      return null;
    }

    const lowWaterMark = await recency.getLowWaterMark(channelId, videoId, this.options.cutoff);
    return fetcher.fetch({
      videoId,
      channelId,
      channelName,
      videoTitle: video.title,
      videoPublishDate: video.publishedAt,
      lowWaterMark,
      ignoreProgress: options.ignoreProgress,
    });
  }

  async sweepPlaylists(channelId: string, options: ProcessOptions = {}): Promise<SweepResult> {
    const { enumerator, metadata } = this.deps;
    const { keywords } = this.options;
    const result: SweepResult = { state: 'completed', streams: 0, inserted: 0 };

    // この巡回で処理済みの動画（複数のプレイリストに含まれる動画を二重に処理しない）
    const handledVideos = new Set<string>();
    let exhausted = false;
    let failed = false;
    const semaphore = new Semaphore(this.videoConcurrency);
    const running = new Set<Promise<void>>();

    try {
      const channelName = await metadata.getChannelName(channelId);
      if (!channelName) {
        console.warn(`⚠️  チャンネル ${channelId} が見つかりません`);
        return { ...result, state: 'not-found' };
      }

      const playlists = await enumerator.findPlaylists(channelId, keywords);
      let videoIds: AsyncIterable<string>;
      if (playlists.length > 0) {
        videoIds = concat(
          playlists.map((playlist) => () => {
            console.log(`プレイリストを処理します: ${playlist.playlistId} – ${playlist.title}`);
            return enumerator.playlistVideos(playlist.playlistId);
          })
        );
      } else {
        console.log(`チャンネル ${channelId} に一致するプレイリストがありません。キーワード検索に切り替えます`);
        videoIds = enumerator.searchVideos(channelId, keywords);
      }

      for await (const videoId of videoIds) {
        if (exhausted) break;
        if (handledVideos.has(videoId)) continue;

        await semaphore.acquire();
        if (exhausted) {
          semaphore.release();
          break;
        }
        handledVideos.add(videoId);

        const task: Promise<void> = (async () => {
          try {
            const outcome = await this.processVideo(videoId, channelId, channelName, options);
            if (!outcome) return;
            result.streams++;
            result.inserted += outcome.write.upserted;
            if (outcome.state === 'STOP_EXHAUSTED') exhausted = true;
          } catch (error) {
            if (error instanceof QuotaExhaustedError) {
              exhausted = true;
              return;
            }
            failed = true;
            console.error(`動画 ${videoId} の処理エラー:`, errorMessage(error));
          } finally {
            semaphore.release();
            running.delete(task);
          }
        })();
        running.add(task);
      }
    } catch (error) {
      if (!(error instanceof QuotaExhaustedError)) throw error;
      exhausted = true;
    } finally {
      await Promise.all(running);
    }

    if (exhausted) {
      console.warn(`🚫 クォータ切れのためチャンネル ${channelId} の残りの動画をスキップしました`);
      return { ...result, state: 'exhausted' };
    }
    return failed ? { ...result, state: 'error' } : result;
  }
}
