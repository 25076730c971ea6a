/**
 * コメントスレッド → 正規化コメントの変換
 */
import type { CommentThread } from './youtubeApi.js';
import type { CommentRecord } from '../types/harvest.js';

/**
 * 変換時に付与する動画・チャンネルの文脈
 */
export interface CommentContext {
  videoId?: string;
  videoTitle: string;
  channelId: string;
  channelName: string;
  videoPublishDate: Date | null;
}

/**
 * トップレベルコメントの updatedAt を取り出す（不正な日時は null）
 */
export function commentUpdatedAt(thread: CommentThread): Date | null {
  const raw = thread.snippet?.topLevelComment?.snippet?.updatedAt;
  if (!raw) return null;
  const date = new Date(raw);
  return Number.isNaN(date.getTime()) ? null : date;
}

/**
 * コメントが属する動画ID
 */
export function commentVideoId(thread: CommentThread): string | null {
  return thread.snippet?.topLevelComment?.snippet?.videoId ?? thread.snippet?.videoId ?? null;
}

/**
 * コメントスレッドを CommentRecord に変換
 * 必須項目が欠けている場合は null（部分的なドキュメントは作らない）
 */
export function toCommentRecord(thread: CommentThread, context: CommentContext): CommentRecord | null {
  const snippet = thread.snippet?.topLevelComment?.snippet;
  const updatedAt = commentUpdatedAt(thread);
  const publishedAt = snippet?.publishedAt ? new Date(snippet.publishedAt) : null;
  const videoId = context.videoId ?? commentVideoId(thread);
  const text = snippet?.textOriginal ?? snippet?.textDisplay;

  if (
    !thread.id ||
    !snippet ||
    !videoId ||
    !updatedAt ||
    !publishedAt ||
    Number.isNaN(publishedAt.getTime()) ||
    typeof snippet.authorDisplayName !== 'string' ||
    typeof text !== 'string' ||
    typeof snippet.likeCount !== 'number'
  ) {
    return null;
  }

  return {
    commentId: thread.id,
    videoId,
    videoTitle: context.videoTitle,
    channelId: context.channelId,
    channelName: context.channelName,
    videoPublishDate: context.videoPublishDate,
    author: snippet.authorDisplayName,
    authorChannelId: snippet.authorChannelId?.value ?? null,
    text,
    likeCount: snippet.likeCount,
    publishedAt,
    updatedAt,
  };
}
