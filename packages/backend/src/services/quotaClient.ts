/**
 * クォータ対応 YouTube API クライアント
 *
 * 概要:
 * - 5xx は同じキーで指数バックオフ再試行
 * - クォータ系 403 はキープールを前方にローテーションして即再試行
 * - プール全体が尽きたら QuotaExhaustedError を投げ、以降はグローバル待機時間が過ぎるまで待つ
 * - それ以外のエラーは再試行せず null（「今回はデータなし」）
 */
import { google, youtube_v3 } from 'googleapis';
import { classifyApiError } from './apiErrors.js';
import { QuotaExhaustedError, errorMessage } from '../utils/errors.js';
import { Semaphore, sleep as defaultSleep } from '../utils/semaphore.js';

/**
 * リクエスト生成関数
 * 現在のキーに紐づくサービスを受け取り、遅延実行されるリクエストを返す。実行するのはクライアントだけ。
 */
export type RequestBuilder<S, T> = (service: S) => Promise<{ data: T }>;

export interface QuotaAwareClientOptions<S> {
  apiKeys: string[];
  /** APIキーからサービス（セッション）を生成する */
  createService: (apiKey: string) => S;
  /** 一時エラー時の最大試行回数 */
  maxRetries?: number;
  /** バックオフ係数（秒）。待機は backoffFactor * 2^attempt */
  backoffFactor?: number;
  /** プール枯渇後のグローバル待機時間（秒） */
  globalBackoffSeconds?: number;
  /** 同時実行できる API 呼び出し数 */
  maxConcurrent?: number;
  sleep?: (ms: number) => Promise<void>;
  now?: () => number;
}

/**
 * ログ用にAPIキーを伏せ字にする
 */
export function maskApiKey(key: string): string {
  return key.length <= 4 ? '****' : `****${key.slice(-4)}`;
}

export class QuotaAwareClient<S> {
  private readonly apiKeys: string[];
  private readonly createService: (apiKey: string) => S;
  private readonly services = new Map<number, S>();
  private readonly maxRetries: number;
  private readonly backoffFactor: number;
  private readonly globalBackoffMs: number;
  private readonly semaphore: Semaphore;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly now: () => number;

  // ローテーション位置とプール枯渇時刻は、このインスタンスを共有する全呼び出し元で共有する状態
  // 変更は await を挟まない同期区間でのみ行う
  private keyIndex = 0;
  private lastGlobalExhaustAt: number | null = null;

  constructor(options: QuotaAwareClientOptions<S>) {
    if (options.apiKeys.length === 0) {
      throw new RangeError('At least one API key is required');
    }
    this.apiKeys = [...options.apiKeys];
    this.createService = options.createService;
    this.maxRetries = options.maxRetries ?? 5;
    this.backoffFactor = options.backoffFactor ?? 0.2;
    this.globalBackoffMs = (options.globalBackoffSeconds ?? 600) * 1000;
    this.semaphore = new Semaphore(options.maxConcurrent ?? 5);
    this.sleep = options.sleep ?? defaultSleep;
    this.now = options.now ?? Date.now;
  }

  get keyCount(): number {
    return this.apiKeys.length;
  }

  get currentKeyIndex(): number {
    return this.keyIndex;
  }

  get lastExhaustedAt(): Date | null {
    return this.lastGlobalExhaustAt === null ? null : new Date(this.lastGlobalExhaustAt);
  }

  /**
   * プール枯渇後の待機時間内かどうか
   */
  isInGlobalBackoff(): boolean {
    return this.remainingGlobalBackoffMs() > 0;
  }

  /**
   * リクエストを再試行・ローテーション付きで実行する
   * @param build リクエスト生成関数
   * @param label ログに出す呼び出し名
   * @returns レスポンス本文。データなし扱いの失敗時は null
   * @throws QuotaExhaustedError キープール全体がクォータ切れの場合
   */
  async execute<T>(build: RequestBuilder<S, T>, label = 'request'): Promise<T | null> {
    return this.semaphore.run(() => this.executeWithRetry(build, label));
  }

  private remainingGlobalBackoffMs(): number {
    if (this.lastGlobalExhaustAt === null) return 0;
    return this.lastGlobalExhaustAt + this.globalBackoffMs - this.now();
  }

  private serviceFor(index: number): S {
    const existing = this.services.get(index);
    if (existing !== undefined) return existing;
    const service = this.createService(this.apiKeys[index]);
    this.services.set(index, service);
    console.log(`🔑 APIキー #${index + 1} (${maskApiKey(this.apiKeys[index])}) を使用します`);
    return service;
  }

  /**
   * failedIndex が現在のキーなら次へ進める（他の呼び出し元が既に進めていれば何もしない）
   * 進めた先がこの呼び出しで失敗済みのキーなら、さらに前方へ進める
   */
  private rotateFrom(failedIndex: number, failedKeys: ReadonlySet<number>): void {
    if (this.keyIndex !== failedIndex && !failedKeys.has(this.keyIndex)) return;
    do {
      this.keyIndex = (this.keyIndex + 1) % this.apiKeys.length;
    } while (failedKeys.has(this.keyIndex));
  }

  private async executeWithRetry<T>(build: RequestBuilder<S, T>, label: string): Promise<T | null> {
    const remaining = this.remainingGlobalBackoffMs();
    if (remaining > 0) {
      console.warn(`⏳ 全APIキーがクォータ切れのため ${(remaining / 1000).toFixed(1)} 秒待機します (${label})`);
      await this.sleep(remaining);
    }

    const quotaFailedKeys = new Set<number>();
    let attempt = 0;

    for (;;) {
      const index = this.keyIndex;
      const service = this.serviceFor(index);

      try {
        const response = await build(service);
        return response.data;
      } catch (error) {
        const { kind, status, reason } = classifyApiError(error);

        if (kind === 'transient') {
          if (attempt + 1 >= this.maxRetries) {
            console.error(`${label}: 再試行上限 (${this.maxRetries}) に達しました (HTTP ${status})`);
            return null;
          }
          await this.sleep(this.backoffFactor * 2 ** attempt * 1000);
          attempt++;
          continue;
        }

        if (kind === 'quota') {
          quotaFailedKeys.add(index);
          if (quotaFailedKeys.size >= this.apiKeys.length) {
            this.lastGlobalExhaustAt = this.now();
            console.error(`🚫 ${label}: 全 ${this.apiKeys.length} 個のAPIキーがクォータ切れです (${reason})`);
            throw new QuotaExhaustedError('All API keys exhausted', new Date(this.lastGlobalExhaustAt));
          }
          this.rotateFrom(index, quotaFailedKeys);
          console.warn(`🔁 ${label}: APIキー #${index + 1} がクォータ切れ (${reason})。キー #${this.keyIndex + 1} に切り替えます`);
          attempt = 0;
          continue;
        }

        if (kind === 'fatal') {
          console.error(`${label}: HTTP ${status} (${reason ?? 'unknown'}) のため再試行しません`);
          return null;
        }

        console.error(`${label}: 予期しないエラー:`, errorMessage(error));
        return null;
      }
    }
  }
}

export type YouTubeClient = QuotaAwareClient<youtube_v3.Youtube>;

/**
 * googleapis の YouTube Data API v3 サービスを使うクライアントを作成
 */
export function createYouTubeClient(
  options: Omit<QuotaAwareClientOptions<youtube_v3.Youtube>, 'createService'>
): YouTubeClient {
  return new QuotaAwareClient<youtube_v3.Youtube>({
    ...options,
    createService: (apiKey) => google.youtube({ version: 'v3', auth: apiKey }),
  });
}
