/**
 * YouTube Data API v3 サービスクラス
 * APIキー認証のクォータ対応クライアント経由で、収集に必要な一覧系エンドポイントを呼び出す
 */
import { youtube_v3 } from 'googleapis';
import type { YouTubeClient } from './quotaClient.js';
import type { Page } from '../types/harvest.js';

export type CommentThread = youtube_v3.Schema$CommentThread;
export type Video = youtube_v3.Schema$Video;
export type Channel = youtube_v3.Schema$Channel;
export type Playlist = youtube_v3.Schema$Playlist;

/**
 * 収集処理が依存する YouTube API の操作
 * null は「今回はデータなし」（再試行不能なエラーを含む）
 */
export interface YouTubeGateway {
  listVideoCommentThreads(videoId: string, pageToken: string | null, maxResults?: number): Promise<Page<CommentThread> | null>;
  listChannelCommentThreads(channelId: string, pageToken: string | null, maxResults?: number): Promise<Page<CommentThread> | null>;
  listChannelPlaylists(channelId: string, pageToken: string | null, maxResults?: number): Promise<Page<Playlist> | null>;
  listPlaylistVideoIds(playlistId: string, pageToken: string | null, maxResults?: number): Promise<Page<string> | null>;
  searchChannelVideoIds(channelId: string, query: string, pageToken: string | null, maxResults?: number): Promise<Page<string> | null>;
  getVideos(videoIds: string[]): Promise<Video[] | null>;
  getChannels(channelIds: string[], parts: string[]): Promise<Channel[] | null>;
  getLatestUploadDate(uploadsPlaylistId: string): Promise<Date | null>;
}

function toPage<T>(items: T[] | undefined, nextPageToken: string | null | undefined): Page<T> {
  return { items: items ?? [], nextPageToken: nextPageToken || null };
}

export class YouTubeApiService implements YouTubeGateway {
  /**
   * コンストラクタ
   * @param client クォータ対応クライアント（キーのローテーションと再試行を担当）
   */
  constructor(private readonly client: YouTubeClient) {}

  // ========================================
  // コメント関連のメソッド
  // ========================================

  /**
   * 動画のコメントスレッドを新しい順に1ページ取得
   */
  async listVideoCommentThreads(videoId: string, pageToken: string | null, maxResults = 100) {
    const data = await this.client.execute(
      (yt) =>
        yt.commentThreads.list({
          part: ['snippet'],
          videoId,
          maxResults,
          order: 'time',
          pageToken: pageToken ?? undefined,
        }),
      `commentThreads(video=${videoId})`
    );
    return data ? toPage(data.items, data.nextPageToken) : null;
  }

  /**
   * チャンネルに関連する全コメントスレッドを新しい順に1ページ取得
   */
  async listChannelCommentThreads(channelId: string, pageToken: string | null, maxResults = 100) {
    const data = await this.client.execute(
      (yt) =>
        yt.commentThreads.list({
          part: ['snippet'],
          allThreadsRelatedToChannelId: channelId,
          maxResults,
          order: 'time',
          pageToken: pageToken ?? undefined,
        }),
      `commentThreads(channel=${channelId})`
    );
    return data ? toPage(data.items, data.nextPageToken) : null;
  }

  // ========================================
  // プレイリスト関連のメソッド
  // ========================================

  /**
   * チャンネルのプレイリスト一覧を1ページ取得
   */
  async listChannelPlaylists(channelId: string, pageToken: string | null, maxResults = 10) {
    const data = await this.client.execute(
      (yt) =>
        yt.playlists.list({
          part: ['id', 'snippet'],
          channelId,
          maxResults,
          pageToken: pageToken ?? undefined,
        }),
      `playlists(channel=${channelId})`
    );
    return data ? toPage(data.items, data.nextPageToken) : null;
  }

  /**
   * プレイリスト内の動画IDを1ページ取得
   */
  async listPlaylistVideoIds(playlistId: string, pageToken: string | null, maxResults = 50) {
    const data = await this.client.execute(
      (yt) =>
        yt.playlistItems.list({
          part: ['snippet', 'contentDetails'],
          playlistId,
          maxResults,
          pageToken: pageToken ?? undefined,
        }),
      `playlistItems(playlist=${playlistId})`
    );
    if (!data) return null;
    const ids = (data.items ?? [])
      .map((item) => item.contentDetails?.videoId ?? item.snippet?.resourceId?.videoId)
      .filter((id): id is string => typeof id === 'string');
    return toPage(ids, data.nextPageToken);
  }

  /**
   * チャンネル内をキーワード検索して動画IDを日付順に1ページ取得
   */
  async searchChannelVideoIds(channelId: string, query: string, pageToken: string | null, maxResults = 50) {
    const data = await this.client.execute(
      (yt) =>
        yt.search.list({
          part: ['id'],
          channelId,
          q: query,
          type: ['video'],
          maxResults,
          order: 'date',
          pageToken: pageToken ?? undefined,
        }),
      `search(channel=${channelId})`
    );
    if (!data) return null;
    const ids = (data.items ?? [])
      .map((item) => item.id?.videoId)
      .filter((id): id is string => typeof id === 'string');
    return toPage(ids, data.nextPageToken);
  }

  // ========================================
  // メタデータ関連のメソッド
  // ========================================

  /**
   * 動画のスニペットをまとめて取得（最大50件）
   */
  async getVideos(videoIds: string[]) {
    if (videoIds.length === 0) return [];
    const data = await this.client.execute(
      (yt) =>
        yt.videos.list({
          part: ['snippet'],
          id: videoIds,
          maxResults: videoIds.length,
          fields: 'items(id,snippet(channelId,channelTitle,title,publishedAt))', // 必要なフィールドのみ
        }),
      `videos(${videoIds.length}件)`
    );
    return data ? data.items ?? [] : null;
  }

  /**
   * チャンネル情報をまとめて取得（最大50件）
   */
  async getChannels(channelIds: string[], parts: string[]) {
    if (channelIds.length === 0) return [];
    const data = await this.client.execute(
      (yt) =>
        yt.channels.list({
          part: parts,
          id: channelIds,
          maxResults: channelIds.length,
        }),
      `channels(${parts.join(',')})`
    );
    return data ? data.items ?? [] : null;
  }

  /**
   * アップロード再生リストの最新アイテムから最終投稿日時を取得
   */
  async getLatestUploadDate(uploadsPlaylistId: string) {
    const data = await this.client.execute(
      (yt) =>
        yt.playlistItems.list({
          part: ['contentDetails'],
          playlistId: uploadsPlaylistId,
          maxResults: 1,
        }),
      `playlistItems(uploads=${uploadsPlaylistId})`
    );
    const publishedAt = data?.items?.[0]?.contentDetails?.videoPublishedAt;
    return publishedAt ? new Date(publishedAt) : null;
  }
}
