/**
 * 収集ジョブ
 * 概要:
 *  - 選択されたチャンネルを順番に処理し、実行サマリーを返します。
 *  - 1チャンネルの失敗は記録して次のチャンネルへ進みます。
 *  - node-cron で定期実行する場合、前回の実行が終わっていなければ今回はスキップします。
 */
import cron, { type ScheduledTask } from 'node-cron';
import type { ChannelProcessor, ProcessOptions } from '../services/channelProcessor.js';
import type { ChannelRegistry, HarvestSummary } from '../types/harvest.js';
import { ConfigError, errorMessage } from '../utils/errors.js';

type Processor = Pick<ChannelProcessor, 'processChannel'>;

/**
 * 1回の収集を実行する
 */
export async function runHarvest(
  processor: Processor,
  channels: ChannelRegistry,
  options: ProcessOptions = {},
  now: () => Date = () => new Date()
): Promise<HarvestSummary> {
  const summary: HarvestSummary = {
    channels: 0,
    streams: 0,
    inserted: 0,
    exhaustedChannels: [],
    failedChannels: [],
    startedAt: now().toISOString(),
    finishedAt: '',
  };

  console.log(`🔄 収集を開始します（対象チャンネル: ${Object.keys(channels).length} 件）`);

  for (const [name, source] of Object.entries(channels)) {
    summary.channels++;
    try {
      const result = await processor.processChannel(name, source, options);
      summary.streams += result.streams;
      summary.inserted += result.inserted;

      switch (result.state) {
        case 'exhausted':
          summary.exhaustedChannels.push(name);
          break;
        case 'not-found':
        case 'error':
          summary.failedChannels.push(name);
          break;
        default:
          console.log(`✅ ${name}: ${result.streams} ストリーム / ${result.inserted} 件を保存しました`);
      }
    } catch (error) {
      summary.failedChannels.push(name);
      console.error(`チャンネル ${name} の処理エラー:`, errorMessage(error));
    }
  }

  summary.finishedAt = now().toISOString();
  console.log(
    `✅ 収集が完了しました: チャンネル ${summary.channels} 件 / ストリーム ${summary.streams} 件 / 保存 ${summary.inserted} 件`
  );
  if (summary.exhaustedChannels.length > 0) {
    console.warn(`🚫 クォータ切れで中断したチャンネル: ${summary.exhaustedChannels.join(', ')}`);
  }
  if (summary.failedChannels.length > 0) {
    console.warn(`⚠️  エラーになったチャンネル: ${summary.failedChannels.join(', ')}`);
  }
  return summary;
}

export interface HarvestJobState {
  running: boolean;
  runs: number;
  lastSummary: HarvestSummary | null;
  lastError: string | null;
}

export interface HarvestJobOptions extends ProcessOptions {
  /** 実行後に呼ばれる（メタデータキャッシュの書き出しなど） */
  afterRun?: () => void;
  now?: () => Date;
}

/**
 * 実行状態を保持する収集ジョブ
 * ステータスAPIはこの状態を参照する
 */
export class HarvestJob {
  private readonly current: HarvestJobState = { running: false, runs: 0, lastSummary: null, lastError: null };

  constructor(
    private readonly processor: Processor,
    private readonly channels: ChannelRegistry,
    private readonly options: HarvestJobOptions = {}
  ) {}

  get state(): Readonly<HarvestJobState> {
    return { ...this.current };
  }

  /**
   * 1回実行する
   * @returns 前回の実行中で今回をスキップした場合は null
   */
  async run(): Promise<HarvestSummary | null> {
    if (this.current.running) {
      console.warn('⏭️  前回の収集が実行中のため今回はスキップします');
      return null;
    }

    this.current.running = true;
    try {
      const summary = await runHarvest(
        this.processor,
        this.channels,
        { ignoreProgress: this.options.ignoreProgress },
        this.options.now
      );
      this.current.lastSummary = summary;
      this.current.lastError = null;
      return summary;
    } catch (error) {
      this.current.lastError = errorMessage(error);
      throw error;
    } finally {
      this.current.running = false;
      this.current.runs++;
      this.options.afterRun?.();
    }
  }

  /**
   * cron 式で定期実行を開始する
   * @throws ConfigError cron 式が不正な場合
   */
  schedule(expression: string): ScheduledTask {
    if (!cron.validate(expression)) {
      throw new ConfigError('Invalid cron expression', [expression]);
    }

    const task = cron.schedule(expression, () => {
      this.run().catch((error: unknown) => {
        console.error('定期収集エラー:', errorMessage(error));
      });
    });
    console.log(`✅ 収集ジョブをスケジュールしました: ${expression}`);
    return task;
  }
}
