/**
 * カウンティングセマフォ
 * 同時に実行できる非同期処理の数を permits 個に制限する（取得順は FIFO）
 */
export class Semaphore {
  private available: number;
  private readonly waiters: Array<() => void> = [];

  constructor(readonly permits: number) {
    if (!Number.isInteger(permits) || permits < 1) {
      throw new RangeError(`permits must be a positive integer (got ${permits})`);
    }
    this.available = permits;
  }

  /** 現在実行中の数 */
  get inUse(): number {
    return this.permits - this.available;
  }

  async acquire(): Promise<void> {
    if (this.available > 0) {
      this.available--;
      return;
    }
    await new Promise<void>((resolve) => this.waiters.push(resolve));
  }

  release(): void {
    const next = this.waiters.shift();
    if (next) {
      // 許可をそのまま待機者に引き渡す
      next();
      return;
    }
    this.available = Math.min(this.available + 1, this.permits);
  }

  /**
   * 許可を取得して task を実行し、終了後（失敗時も）に解放する
   */
  async run<T>(task: () => Promise<T>): Promise<T> {
    await this.acquire();
    try {
      return await task();
    } finally {
      this.release();
    }
  }
}

/**
 * 指定ミリ秒待機する
 */
export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, Math.max(0, ms)));
}
