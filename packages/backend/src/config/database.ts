/**
 * MongoDB データベース接続設定
 */
import mongoose from 'mongoose';
import { Comment } from '../models/Comment.js';
import { MongoCursorStore } from '../services/cursorStore.js';
import { errorMessage } from '../utils/errors.js';

/**
 * 接続先ホストだけをログ用に取り出す（認証情報は出力しない）
 */
export function describeMongoHost(mongoUri: string): string {
  try {
    return new URL(mongoUri.replace(/^mongodb(\+srv)?:/, 'http:')).host;
  } catch {
    return '(不明)';
  }
}

/**
 * MongoDB に接続し、コメントと再開位置のインデックスを整える
 * @param progressTtlSeconds 再開位置ドキュメントの保持期間
 */
export async function connectDatabase(mongoUri: string, progressTtlSeconds: number, cursors: MongoCursorStore) {
  console.log('MongoDB 接続先ホスト:', describeMongoHost(mongoUri));
  await mongoose.connect(mongoUri, { serverSelectionTimeoutMS: 5000 });
  console.log('MongoDB 接続に成功しました');

  // 定義と異なるインデックスは作り直す
  const dropped = await Comment.syncIndexes();
  if (dropped.length > 0) {
    console.log('再作成のため削除したインデックス:', dropped.join(', '));
  }
  await cursors.ensureIndexes(progressTtlSeconds);
  console.log('インデックスを確認しました');
}

/**
 * 接続中なら切断する（未接続のまま終了する経路からも呼ばれる）
 * @returns 切断した場合 true
 */
export async function disconnectDatabase(): Promise<boolean> {
  if (mongoose.connection.readyState === mongoose.ConnectionStates.disconnected) return false;
  try {
    await mongoose.disconnect();
    console.log('MongoDB 接続を閉じました');
    return true;
  } catch (error) {
    console.error('MongoDB 接続を閉じられませんでした:', errorMessage(error));
    return false;
  }
}
