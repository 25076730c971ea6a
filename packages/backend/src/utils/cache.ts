/**
 * メタデータキャッシュ
 * 動画・チャンネル・プレイリストの情報を容量上限付きで保持し、
 * 起動時にディスクから読み込み、プロセス終了時に1回だけ書き出す
 * YouTube API へのリクエスト回数を削減するために使用
 */
import fs from 'fs';
import path from 'path';
import type { PlaylistSummary, VideoMetadata } from '../types/harvest.js';

/**
 * 容量上限付き LRU キャッシュ
 * 読み取り・上書きで最新扱いになり、上限を超えると最も古いエントリを追い出す
 */
export class LruCache<V> {
  private readonly entries = new Map<string, V>();

  constructor(readonly maxSize: number) {
    if (!Number.isInteger(maxSize) || maxSize < 1) {
      throw new RangeError(`maxSize must be a positive integer (got ${maxSize})`);
    }
  }

  get size(): number {
    return this.entries.size;
  }

  has(key: string): boolean {
    return this.entries.has(key);
  }

  /**
   * キャッシュからデータを取得
   * @returns 存在しない場合は undefined
   */
  get(key: string): V | undefined {
    const value = this.entries.get(key);
    if (value === undefined) return undefined;
    this.entries.delete(key);
    this.entries.set(key, value);
    return value;
  }

  /**
   * キャッシュにデータを保存
   */
  set(key: string, value: V): void {
    if (this.entries.has(key)) {
      this.entries.delete(key);
    } else if (this.entries.size >= this.maxSize) {
      const oldest = this.entries.keys().next();
      if (!oldest.done) this.entries.delete(oldest.value);
    }
    this.entries.set(key, value);
  }

  /** 古い順のエントリ */
  toEntries(): Array<[string, V]> {
    return [...this.entries.entries()];
  }

  clear(): void {
    this.entries.clear();
  }
}

interface StoredVideoMetadata {
  title: string;
  channelId: string;
  channelName: string | null;
  publishedAt: string | null;
}

interface CacheFile {
  videos?: Array<[string, StoredVideoMetadata]>;
  channels?: Array<[string, string]>;
  playlists?: Array<[string, PlaylistSummary[]]>;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

function isStoredVideo(value: unknown): value is StoredVideoMetadata {
  return (
    isRecord(value) &&
    typeof value.title === 'string' &&
    typeof value.channelId === 'string' &&
    (value.channelName === null || typeof value.channelName === 'string') &&
    (value.publishedAt === null || typeof value.publishedAt === 'string')
  );
}

function isPlaylistSummary(value: unknown): value is PlaylistSummary {
  return isRecord(value) && typeof value.playlistId === 'string' && typeof value.title === 'string';
}

function pairs(value: unknown): Array<[string, unknown]> {
  if (!Array.isArray(value)) return [];
  return value.flatMap((entry: unknown): Array<[string, unknown]> =>
    Array.isArray(entry) && entry.length === 2 && typeof entry[0] === 'string' ? [[entry[0], entry[1]]] : []
  );
}

/** CACHE_DIR 内のキャッシュファイル名 */
export const METADATA_CACHE_FILE = 'metadata-cache.json';

export class MetadataCache {
  readonly videos: LruCache<VideoMetadata>;
  readonly channels: LruCache<string>;
  readonly playlists: LruCache<PlaylistSummary[]>;
  private flushed = false;

  /**
   * @param filePath 永続化先の JSON ファイル。null ならメモリのみ
   * @param maxSize 各キャッシュの上限件数
   */
  constructor(readonly filePath: string | null, maxSize = 1000) {
    this.videos = new LruCache(maxSize);
    this.channels = new LruCache(maxSize);
    this.playlists = new LruCache(maxSize);
  }

  /**
   * CACHE_DIR 内のキャッシュファイルを使うインスタンスを作る
   */
  static inDirectory(cacheDir: string, maxSize?: number): MetadataCache {
    return new MetadataCache(path.join(cacheDir, METADATA_CACHE_FILE), maxSize);
  }

  /**
   * ディスクから読み込む（ファイルがなければ何もしない）
   */
  load(): void {
    if (!this.filePath || !fs.existsSync(this.filePath)) return;

    let parsed: unknown;
    try {
      parsed = JSON.parse(fs.readFileSync(this.filePath, 'utf-8'));
    } catch (error) {
      console.warn(`⚠️  キャッシュファイルを読み込めません（空で開始します）: ${this.filePath}`, error);
      return;
    }
    if (!isRecord(parsed)) return;

    for (const [id, value] of pairs(parsed.videos)) {
      if (!isStoredVideo(value)) continue;
      this.videos.set(id, {
        title: value.title,
        channelId: value.channelId,
        channelName: value.channelName,
        publishedAt: value.publishedAt ? new Date(value.publishedAt) : null,
      });
    }
    for (const [id, value] of pairs(parsed.channels)) {
      if (typeof value === 'string') this.channels.set(id, value);
    }
    for (const [id, value] of pairs(parsed.playlists)) {
      if (Array.isArray(value) && value.every(isPlaylistSummary)) this.playlists.set(id, value);
    }
    console.log(`キャッシュを読み込みました: 動画 ${this.videos.size} 件 / チャンネル ${this.channels.size} 件`);
  }

  /**
   * ディスクへ書き出す（同期。exit ハンドラからも呼べるように）
   */
  save(): void {
    if (!this.filePath) return;
    const data: CacheFile = {
      videos: this.videos.toEntries().map(([id, meta]) => [
        id,
        { ...meta, publishedAt: meta.publishedAt ? meta.publishedAt.toISOString() : null },
      ]),
      channels: this.channels.toEntries(),
      playlists: this.playlists.toEntries(),
    };
    fs.mkdirSync(path.dirname(this.filePath), { recursive: true });
    fs.writeFileSync(this.filePath, JSON.stringify(data), 'utf-8');
  }

  /**
   * 1回だけ書き出す。2回目以降は何もしない
   */
  flushOnce(): boolean {
    if (this.flushed) return false;
    this.flushed = true;
    try {
      this.save();
      return true;
    } catch (error) {
      console.error('キャッシュの書き出しに失敗しました:', error);
      return false;
    }
  }

  /**
   * プロセス終了時に書き出すフックを登録
   */
  registerExitHook(): void {
    process.once('exit', () => {
      this.flushOnce();
    });
  }
}
