/**
 * アプリケーション固有のエラー
 */

/**
 * APIキープール全体がクォータ切れになったことを示す
 * 一般的なエラーとは区別して呼び出し元に伝播させる
 */
export class QuotaExhaustedError extends Error {
  constructor(
    message = 'All API keys exhausted',
    readonly exhaustedAt: Date = new Date()
  ) {
    super(message);
    this.name = 'QuotaExhaustedError';
  }
}

/**
 * 環境変数・ソースレジストリの検証エラー
 */
export class ConfigError extends Error {
  constructor(message: string, readonly issues: string[] = []) {
    super(issues.length > 0 ? `${message}\n  - ${issues.join('\n  - ')}` : message);
    this.name = 'ConfigError';
  }
}

/**
 * unknown なエラー値からログ用のメッセージを取り出す
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
