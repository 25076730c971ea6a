/**
 * コメントの一括 upsert
 * commentId をキーに updateOne(upsert) をまとめて書き込む。バッチ単位で失敗を閉じ込める。
 */
import mongoose from 'mongoose';
import { Comment } from '../models/Comment.js';
import type { CommentRecord } from '../types/harvest.js';

export const UPSERT_BATCH_SIZE = 1000;

export interface BulkCounts {
  upserted: number;
  matched: number;
  modified: number;
}

export interface UpsertResult extends BulkCounts {
  skipped: number;
  failedBatches: number;
}

export interface CommentSink {
  upsertComments(records: CommentRecord[]): Promise<UpsertResult>;
}

export interface CommentUpsertOperation {
  updateOne: {
    filter: { commentId: string };
    update: { $set: Omit<CommentRecord, 'commentId'> };
    upsert: true;
  };
}

/** 1バッチを書き込み、件数を返す */
export type BulkWriter = (operations: CommentUpsertOperation[]) => Promise<BulkCounts>;

function isValidDate(value: unknown): value is Date {
  return value instanceof Date && !Number.isNaN(value.getTime());
}

/**
 * 必須項目が揃っているか（部分的なドキュメントは書き込まない）
 */
export function isCompleteComment(record: CommentRecord): boolean {
  return (
    record.commentId.length > 0 &&
    record.videoId.length > 0 &&
    record.channelId.length > 0 &&
    typeof record.videoTitle === 'string' &&
    typeof record.channelName === 'string' &&
    typeof record.author === 'string' &&
    typeof record.text === 'string' &&
    Number.isFinite(record.likeCount) &&
    isValidDate(record.publishedAt) &&
    isValidDate(record.updatedAt) &&
    (record.videoPublishDate === null || isValidDate(record.videoPublishDate))
  );
}

export function toUpsertOperation(record: CommentRecord): CommentUpsertOperation {
  const { commentId, ...fields } = record;
  return {
    updateOne: {
      filter: { commentId },
      update: { $set: fields },
      upsert: true,
    },
  };
}

/**
 * Comment モデルに順序なしで書き込む BulkWriter
 */
export const mongooseBulkWriter: BulkWriter = async (operations) => {
  const result = await Comment.bulkWrite(operations, { ordered: false });
  return {
    upserted: result.upsertedCount,
    matched: result.matchedCount,
    modified: result.modifiedCount,
  };
};

export class MongoCommentSink implements CommentSink {
  constructor(
    private readonly write: BulkWriter = mongooseBulkWriter,
    private readonly batchSize = UPSERT_BATCH_SIZE
  ) {}

  async upsertComments(records: CommentRecord[]): Promise<UpsertResult> {
    const result: UpsertResult = { upserted: 0, matched: 0, modified: 0, skipped: 0, failedBatches: 0 };
    let batch: CommentUpsertOperation[] = [];

    const flush = async () => {
      if (batch.length === 0) return;
      const current = batch;
      batch = [];
      try {
        const counts = await this.write(current);
        result.upserted += counts.upserted;
        result.matched += counts.matched;
        result.modified += counts.modified;
      } catch (error) {
        result.failedBatches++;
        if (error instanceof mongoose.mongo.MongoBulkWriteError) {
          // 順序なし書き込みなので成功分は反映済み
          result.upserted += error.result.upsertedCount;
          result.matched += error.result.matchedCount;
          result.modified += error.result.modifiedCount;
          const writeErrors = Array.isArray(error.writeErrors) ? error.writeErrors : [error.writeErrors];
          console.error(
            `一括書き込みエラー: ${writeErrors.length} 件失敗`,
            writeErrors.map((e) => ({ index: e.index, code: e.code, message: e.errmsg }))
          );
        } else {
          console.error(`コメントの一括書き込みに失敗しました (${current.length} 件):`, error);
        }
      }
    };

    for (const record of records) {
      if (!isCompleteComment(record)) {
        console.warn(`不完全なコメントをスキップします: ${record.commentId || '(id なし)'}`);
        result.skipped++;
        continue;
      }
      batch.push(toUpsertOperation(record));
      if (batch.length >= this.batchSize) {
        await flush();
      }
    }
    await flush();

    console.log(
      `📊 一括書き込み結果 – upserted:${result.upserted} matched:${result.matched} modified:${result.modified}` +
        (result.skipped > 0 ? ` skipped:${result.skipped}` : '')
    );
    return result;
  }
}
