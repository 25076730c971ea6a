/**
 * ストリームごとのページング再開位置（カーソル）の永続化
 */
import mongoose from 'mongoose';
import { Progress, PROGRESS_TTL_INDEX, IProgress } from '../models/Progress.js';

/**
 * チャンネル全体巡回のストリームID
 */
export function channelStreamId(channelId: string): string {
  return `chan::${channelId}`;
}

export interface CursorSnapshot {
  streamId: string;
  lastPageToken: string | null;
  timestamp: Date;
}

/**
 * カーソルストア
 * - レコードなし: 未着手
 * - lastPageToken が null: 追いついた
 */
export interface CursorStore {
  exists(streamId: string): Promise<boolean>;
  get(streamId: string): Promise<string | null>;
  save(streamId: string, pageToken: string | null): Promise<void>;
}

function toSnapshot(doc: IProgress): CursorSnapshot {
  return { streamId: doc._id, lastPageToken: doc.lastPageToken ?? null, timestamp: doc.timestamp };
}

/**
 * MongoDB の progress コレクションを使うカーソルストア
 * 読み取り失敗はログを出して「なし」として扱い、書き込み失敗は1回分の書き込みに閉じる
 */
export class MongoCursorStore implements CursorStore {
  constructor(private readonly now: () => Date = () => new Date()) {}

  /**
   * TTL インデックスを作成（保持期間が変わっていれば作り直す）
   */
  async ensureIndexes(ttlSeconds: number): Promise<void> {
    let existing: { name?: unknown; expireAfterSeconds?: unknown } | undefined;
    try {
      const indexes = await Progress.collection.indexes();
      existing = indexes.find((index) => index.name === PROGRESS_TTL_INDEX);
    } catch (error) {
      // コレクション未作成（NamespaceNotFound）はインデックスなしと同じ
      if (!(error instanceof mongoose.mongo.MongoServerError && error.code === 26)) throw error;
    }

    if (existing?.expireAfterSeconds === ttlSeconds) return;
    if (existing) {
      await Progress.collection.dropIndex(PROGRESS_TTL_INDEX);
      console.log(`インデックス ${PROGRESS_TTL_INDEX} を再作成のため削除しました`);
    }
    await Progress.collection.createIndex(
      { timestamp: 1 },
      { name: PROGRESS_TTL_INDEX, expireAfterSeconds: ttlSeconds }
    );
    console.log(`インデックス ${PROGRESS_TTL_INDEX} を作成しました（TTL: ${ttlSeconds} 秒）`);
  }

  async exists(streamId: string): Promise<boolean> {
    try {
      return (await Progress.countDocuments({ _id: streamId }, { limit: 1 })) === 1;
    } catch (error) {
      console.error(`カーソル存在確認エラー (${streamId}):`, error);
      return false;
    }
  }

  async get(streamId: string): Promise<string | null> {
    try {
      const doc = await Progress.findById(streamId).lean();
      return doc?.lastPageToken ?? null;
    } catch (error) {
      console.error(`カーソル取得エラー (${streamId}):`, error);
      return null;
    }
  }

  async save(streamId: string, pageToken: string | null): Promise<void> {
    try {
      await Progress.updateOne(
        { _id: streamId },
        { $set: { lastPageToken: pageToken, timestamp: this.now() } },
        { upsert: true }
      );
    } catch (error) {
      console.error(`カーソル保存エラー (${streamId}):`, error);
    }
  }

  /**
   * ストリームのカーソルを取得（ステータスAPI用）
   */
  async find(streamId: string): Promise<CursorSnapshot | null> {
    const doc = await Progress.findById(streamId).lean();
    return doc ? toSnapshot(doc) : null;
  }

  /**
   * 最近更新されたカーソルの一覧（ステータスAPI用）
   */
  async list(limit = 50): Promise<CursorSnapshot[]> {
    const docs = await Progress.find().sort({ timestamp: -1 }).limit(limit).lean();
    return docs.map(toSnapshot);
  }
}
