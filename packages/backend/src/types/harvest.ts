/**
 * 収集パイプライン全体で共有する型定義
 */

/**
 * 正規化済みコメント（comments コレクションの1ドキュメント）
 * commentId が自然キー。updatedAt が低水位線の比較に使われる。
 */
export interface CommentRecord {
  commentId: string;
  videoId: string;
  videoTitle: string;
  channelId: string;
  channelName: string;
  videoPublishDate: Date | null;
  author: string;
  authorChannelId: string | null;
  text: string;
  likeCount: number;
  publishedAt: Date;
  updatedAt: Date;
}

/**
 * 動画メタデータ（キャッシュ対象）
 */
export interface VideoMetadata {
  title: string;
  channelId: string;
  channelName: string | null;
  publishedAt: Date | null;
}

/**
 * プレイリストの要約（キーワード一致したもの）
 */
export interface PlaylistSummary {
  playlistId: string;
  title: string;
}

/**
 * ソースレジストリの1チャンネル
 * wholeChannel=true ならチャンネル全体を1ストリームとして巡回する
 */
export interface ChannelSource {
  handle?: string;
  channelId: string;
  wholeChannel: boolean;
  tags: string[];
  outdated: boolean;
}

/** 表示名 → チャンネル定義 */
export type ChannelRegistry = Record<string, ChannelSource>;

/**
 * 1ページ分の取得結果
 */
export interface Page<T> {
  items: T[];
  nextPageToken: string | null;
}

/**
 * 1回の収集実行のサマリー
 */
export interface HarvestSummary {
  channels: number;
  streams: number;
  inserted: number;
  exhaustedChannels: string[];
  failedChannels: string[];
  startedAt: string;
  finishedAt: string;
}
