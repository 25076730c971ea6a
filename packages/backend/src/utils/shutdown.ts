/**
 * シグナル受信時の終了処理
 * 後から登録した処理ほど先に実行し（タスク停止 → サーバー停止 → DB 切断 → キャッシュ書き出し）、
 * 最後に終了コード 0 で終了する
 */
import { errorMessage } from './errors.js';

export type ShutdownHook = () => void | Promise<void>;

export interface SignalSource {
  once(event: NodeJS.Signals, listener: () => void): unknown;
}

export class GracefulShutdown {
  private readonly hooks: ShutdownHook[] = [];
  private started = false;

  constructor(private readonly exit: (code: number) => void = (code) => process.exit(code)) {}

  add(hook: ShutdownHook): void {
    this.hooks.push(hook);
  }

  /**
   * 登録済みの処理を実行して終了する（2回目以降の呼び出しは無視）
   */
  async run(signal: string): Promise<void> {
    if (this.started) return;
    this.started = true;
    console.log(`${signal} を受信しました。終了します...`);

    for (const hook of [...this.hooks].reverse()) {
      try {
        await hook();
      } catch (error) {
        console.error('終了処理エラー:', errorMessage(error));
      }
    }
    this.exit(0);
  }

  install(source: SignalSource = process, signals: NodeJS.Signals[] = ['SIGINT', 'SIGTERM']): void {
    for (const signal of signals) {
      source.once(signal, () => {
        void this.run(signal);
      });
    }
  }
}
