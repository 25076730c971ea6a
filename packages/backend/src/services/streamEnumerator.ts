/**
 * ストリーム（処理対象の動画）の列挙
 * いずれも非同期ジェネレーターで、呼び出し側は途中で打ち切れる
 */
import type { MetadataCache } from '../utils/cache.js';
import type { Page, PlaylistSummary } from '../types/harvest.js';
import type { YouTubeGateway } from './youtubeApi.js';

type PageFetcher<T> = (pageToken: string | null) => Promise<Page<T> | null>;

/**
 * ページングされた一覧を要素単位で順に返す
 * null（データなし）か nextPageToken なしで終了
 */
export async function* paginate<T>(fetchPage: PageFetcher<T>): AsyncGenerator<T> {
  let pageToken: string | null = null;
  for (;;) {
    const page = await fetchPage(pageToken);
    if (!page) return;
    yield* page.items;
    if (!page.nextPageToken || page.nextPageToken === pageToken) return;
    pageToken = page.nextPageToken;
  }
}

/**
 * タイトルがキーワードのいずれかを含むか（大文字小文字を区別しない部分一致）
 */
export function matchesAnyKeyword(title: string, keywords: Iterable<string>): boolean {
  const lower = title.toLowerCase();
  for (const keyword of keywords) {
    if (keyword && lower.includes(keyword.toLowerCase())) return true;
  }
  return false;
}

export class StreamEnumerator {
  constructor(
    private readonly api: YouTubeGateway,
    private readonly cache: MetadataCache
  ) {}

  /**
   * チャンネルのプレイリストのうち、タイトルがキーワードに一致するもの
   */
  async *matchingPlaylists(channelId: string, keywords: string[]): AsyncGenerator<PlaylistSummary> {
    const playlists = paginate((token) => this.api.listChannelPlaylists(channelId, token));
    for await (const playlist of playlists) {
      const title = playlist.snippet?.title;
      if (playlist.id && title && matchesAnyKeyword(title, keywords)) {
        yield { playlistId: playlist.id, title };
      }
    }
  }

  /**
   * 一致したプレイリストの一覧（チャンネルごとにキャッシュ）
   */
  async findPlaylists(channelId: string, keywords: string[]): Promise<PlaylistSummary[]> {
    const cached = this.cache.playlists.get(channelId);
    if (cached) return cached;

    const found: PlaylistSummary[] = [];
    for await (const playlist of this.matchingPlaylists(channelId, keywords)) {
      found.push(playlist);
    }
    this.cache.playlists.set(channelId, found);
    return found;
  }

  /**
   * プレイリスト内の動画ID
   */
  playlistVideos(playlistId: string): AsyncGenerator<string> {
    return paginate((token) => this.api.listPlaylistVideoIds(playlistId, token));
  }

  /**
   * チャンネル内のキーワード検索結果の動画ID（日付順）
   */
  searchVideos(channelId: string, keywords: string[]): AsyncGenerator<string> {
    const query = keywords.join('|');
    return paginate((token) => this.api.searchChannelVideoIds(channelId, query, token));
  }
}
