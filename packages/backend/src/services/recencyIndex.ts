/**
 * 低水位線（保存済みの最新コメント時刻）の取得
 */
import { Comment } from '../models/Comment.js';

export interface RecencyIndex {
  /**
   * (チャンネル, 動画) の最新保存済みコメントの updatedAt。なければ fallback
   */
  getLowWaterMark(channelId: string, videoId: string, fallback: Date): Promise<Date>;
}

export class MongoRecencyIndex implements RecencyIndex {
  async getLowWaterMark(channelId: string, videoId: string, fallback: Date): Promise<Date> {
    try {
      const latest = await Comment.findOne({ channelId, videoId })
        .sort({ updatedAt: -1 })
        .select({ updatedAt: 1 })
        .lean();
      return latest?.updatedAt ?? fallback;
    } catch (error) {
      // 取得できなければカットオフから取り直す（upsert なので重複はしない）
      console.error(`最新コメント取得エラー (${channelId}/${videoId}):`, error);
      return fallback;
    }
  }
}
