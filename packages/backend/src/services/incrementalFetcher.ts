/**
 * 動画1本分のコメントを差分取得する
 *
 * 状態: START → FETCHING_PAGE → { CONTINUE, STOP_EXHAUSTED, STOP_CAUGHT_UP, STOP_ERROR }
 * - 低水位線より新しい（strictly newer）コメントだけを新規とする
 * - ページは途中で打ち切らず最後まで走査し、継続判定は nextPageToken の有無だけで行う
 * - 各ページの処理後にカーソルを保存するので、途中で止まっても次の未処理ページから再開できる
 */
import { QuotaExhaustedError } from '../utils/errors.js';
import { toCommentRecord, commentUpdatedAt } from './commentMapper.js';
import type { CommentThread, YouTubeGateway } from './youtubeApi.js';
import type { CursorStore } from './cursorStore.js';
import type { CommentSink, UpsertResult } from './commentSink.js';
import type { CommentRecord } from '../types/harvest.js';

export type FetchState = 'STOP_CAUGHT_UP' | 'STOP_EXHAUSTED' | 'STOP_ERROR';

/** per stream: ストリーム終了時にまとめて書き込む / per page: ページごとに書き込む */
export type FlushMode = 'stream' | 'page';

export interface VideoStream {
  videoId: string;
  channelId: string;
  videoTitle: string;
  channelName: string;
  videoPublishDate: Date | null;
}

export interface FetchRequest extends VideoStream {
  /** これ以前（同時刻を含む）の updatedAt は取得済みとみなす */
  lowWaterMark: Date;
  /** true なら保存済みカーソルを無視して先頭から */
  ignoreProgress?: boolean;
}

export interface FetchOutcome {
  state: FetchState;
  streamId: string;
  pages: number;
  scanned: number;
  newRecords: number;
  write: UpsertResult;
}

export interface IncrementalFetcherDeps {
  api: Pick<YouTubeGateway, 'listVideoCommentThreads'>;
  cursors: CursorStore;
  sink: CommentSink;
}

export interface IncrementalFetcherOptions {
  pageSize?: number;
  flushMode?: FlushMode;
}

function emptyWrite(): UpsertResult {
  return { upserted: 0, matched: 0, modified: 0, skipped: 0, failedBatches: 0 };
}

function addWrite(total: UpsertResult, result: UpsertResult): void {
  total.upserted += result.upserted;
  total.matched += result.matched;
  total.modified += result.modified;
  total.skipped += result.skipped;
  total.failedBatches += result.failedBatches;
}

/**
 * 1ページ分から新規コメントを選び、正規化する
 * - updatedAt > lowWaterMark（同時刻は既存扱い）
 * - 動画の公開日時が分かっていれば updatedAt >= 公開日時
 * 必須項目が欠けたコメントは警告を出して捨てる
 */
export function selectNewComments(items: CommentThread[], stream: VideoStream, lowWaterMark: Date): CommentRecord[] {
  const records: CommentRecord[] = [];
  const mark = lowWaterMark.getTime();
  const publishedAt = stream.videoPublishDate?.getTime() ?? null;

  for (const item of items) {
    const updatedAt = commentUpdatedAt(item);
    if (!updatedAt) {
      console.warn(`⚠️  updatedAt のないコメントを捨てます: ${item.id ?? '(id なし)'} (${stream.videoId})`);
      continue;
    }
    const time = updatedAt.getTime();
    if (time <= mark) continue;
    if (publishedAt !== null && time < publishedAt) continue;

    const record = toCommentRecord(item, stream);
    if (!record) {
      console.warn(`⚠️  必須項目が欠けたコメントを捨てます: ${item.id ?? '(id なし)'} (${stream.videoId})`);
      continue;
    }
    records.push(record);
  }
  return records;
}

export class IncrementalFetcher {
  private readonly pageSize: number;
  private readonly flushMode: FlushMode;

  constructor(
    private readonly deps: IncrementalFetcherDeps,
    options: IncrementalFetcherOptions = {}
  ) {
    this.pageSize = options.pageSize ?? 100;
    this.flushMode = options.flushMode ?? 'stream';
  }

  async fetch(request: FetchRequest): Promise<FetchOutcome> {
    const { api, cursors, sink } = this.deps;
    const streamId = request.videoId;
    const outcome: FetchOutcome = {
      state: 'STOP_CAUGHT_UP',
      streamId,
      pages: 0,
      scanned: 0,
      newRecords: 0,
      write: emptyWrite(),
    };

    let pending: CommentRecord[] = [];
    const flush = async () => {
      if (pending.length === 0) return;
      const records = pending;
      pending = [];
      addWrite(outcome.write, await sink.upsertComments(records));
    };

    let pageToken = request.ignoreProgress ? null : await cursors.get(streamId);
    // undefined は「まだ1ページも要求していない」
    let previousToken: string | null | undefined = undefined;

    try {
      for (;;) {
        if (pageToken !== null && pageToken === previousToken) {
          console.warn(`⚠️  ページトークン "${pageToken}" が進まないため中断します (${streamId})`);
          outcome.state = 'STOP_ERROR';
          break;
        }
        previousToken = pageToken;

        const page = await api.listVideoCommentThreads(request.videoId, pageToken, this.pageSize);
        if (!page || page.items.length === 0) {
          await cursors.save(streamId, null);
          outcome.state = 'STOP_CAUGHT_UP';
          break;
        }

        outcome.pages++;
        outcome.scanned += page.items.length;
        const records = selectNewComments(page.items, request, request.lowWaterMark);
        outcome.newRecords += records.length;
        pending.push(...records);

        if (this.flushMode === 'page') {
          await flush();
        }
        await cursors.save(streamId, page.nextPageToken);

        if (!page.nextPageToken) {
          outcome.state = 'STOP_CAUGHT_UP';
          break;
        }
        pageToken = page.nextPageToken;
      }
    } catch (error) {
      // カーソルは保存済みなので、ここまでの分は書き込んでから返す
      await flush();
      if (!(error instanceof QuotaExhaustedError)) throw error;
      console.warn(`🚫 クォータ切れのため ${streamId} の取得を中断しました`);
      outcome.state = 'STOP_EXHAUSTED';
      return outcome;
    }

    await flush();
    if (outcome.newRecords > 0) {
      console.log(`💬 ${streamId}: 新規 ${outcome.newRecords} 件（${outcome.pages} ページ）`);
    }
    return outcome;
  }
}
