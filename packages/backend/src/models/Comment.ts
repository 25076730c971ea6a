/**
 * 収集したコメントのモデル
 * commentId（YouTube が割り当てるID）で一意。再取得しても upsert で冪等になる。
 */
import mongoose, { Schema } from 'mongoose';
import type { CommentRecord } from '../types/harvest.js';

export type IComment = CommentRecord;

const CommentSchema = new Schema<IComment>(
  {
    commentId: { type: String, required: true },
    videoId: { type: String, required: true },
    videoTitle: { type: String, required: true },
    channelId: { type: String, required: true },
    channelName: { type: String, required: true },
    videoPublishDate: { type: Date, default: null },
    author: { type: String, required: true },
    authorChannelId: { type: String, default: null },
    text: { type: String, required: true },
    likeCount: { type: Number, required: true },
    publishedAt: { type: Date, required: true },
    updatedAt: { type: Date, required: true },
  },
  {
    // updatedAt は YouTube 側の値なので mongoose の自動タイムスタンプは使わない
    timestamps: false,
    versionKey: false,
  }
);

// 分析クエリ用
CommentSchema.index({ channelId: 1, likeCount: 1, updatedAt: 1 }, { name: 'channel_like_updated_idx' });
// 低水位線（動画ごとの最新コメント）の取得用
CommentSchema.index({ channelId: 1, videoId: 1, updatedAt: -1 }, { name: 'channel_video_updated_idx' });
// 自然キー
CommentSchema.index({ commentId: 1 }, { unique: true, name: 'comment_id_unique_idx' });

export const Comment = mongoose.model<IComment>('Comment', CommentSchema, 'comments');
