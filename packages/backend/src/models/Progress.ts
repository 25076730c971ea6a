/**
 * ページングの再開位置（カーソル）モデル
 * _id はストリームID（動画ID、またはチャンネル全体なら "chan::<channelId>"）
 * lastPageToken が null のドキュメントは「追いついた」状態を表す
 */
import mongoose, { Schema } from 'mongoose';

export interface IProgress {
  _id: string;
  lastPageToken: string | null;
  timestamp: Date;
}

export const PROGRESS_TTL_INDEX = 'progress_ttl_idx';

const ProgressSchema = new Schema<IProgress>(
  {
    _id: { type: String, required: true },
    lastPageToken: { type: String, default: null },
    timestamp: { type: Date, required: true, default: Date.now },
  },
  {
    versionKey: false,
    // TTL インデックスは保持期間が設定値なので MongoCursorStore.ensureIndexes で作成する
    autoIndex: false,
  }
);

export const Progress = mongoose.model<IProgress>('Progress', ProgressSchema, 'progress');
