/**
 * チャンネル関連の操作（登録者数の順位付け、最終投稿日、稼働確認）
 */
import { chunk, MAX_IDS_PER_REQUEST } from './metadata.js';
import type { YouTubeGateway } from './youtubeApi.js';
import type { ChannelRegistry } from '../types/harvest.js';

export interface ChannelHealth {
  exists: boolean;
  lastUpload: Date | null;
  inactive: boolean;
}

const DAY_MS = 24 * 60 * 60 * 1000;

export class ChannelService {
  constructor(
    private readonly api: YouTubeGateway,
    private readonly now: () => Date = () => new Date()
  ) {}

  /**
   * チャンネルIDごとの登録者数（取得できない・数値でないものは 0）
   */
  async getSubscriberCounts(channelIds: string[]): Promise<Map<string, number>> {
    const counts = new Map<string, number>();
    for (const ids of chunk([...new Set(channelIds)], MAX_IDS_PER_REQUEST)) {
      const channels = await this.api.getChannels(ids, ['statistics']);
      for (const channel of channels ?? []) {
        if (!channel.id) continue;
        const parsed = Number.parseInt(channel.statistics?.subscriberCount ?? '0', 10);
        counts.set(channel.id, Number.isNaN(parsed) ? 0 : parsed);
      }
    }
    return counts;
  }

  private async rankBySubscribers(channels: ChannelRegistry, n: number, direction: 'desc' | 'asc'): Promise<ChannelRegistry> {
    const entries = Object.entries(channels).filter(([, info]) => info.channelId);
    if (entries.length === 0 || n <= 0) return {};

    const counts = await this.getSubscriberCounts(entries.map(([, info]) => info.channelId));
    const sign = direction === 'desc' ? -1 : 1;
    // 同数の場合は元の順序を保つ（Array.prototype.sort は安定ソート）
    const sorted = [...entries].sort(
      ([, a], [, b]) => sign * ((counts.get(a.channelId) ?? 0) - (counts.get(b.channelId) ?? 0))
    );
    return Object.fromEntries(sorted.slice(0, n));
  }

  /**
   * 登録者数の多い順に上位 n 件
   */
  getTopChannels(channels: ChannelRegistry, n: number): Promise<ChannelRegistry> {
    return this.rankBySubscribers(channels, n, 'desc');
  }

  /**
   * 登録者数の少ない順に下位 n 件
   */
  getBottomChannels(channels: ChannelRegistry, n: number): Promise<ChannelRegistry> {
    return this.rankBySubscribers(channels, n, 'asc');
  }

  /**
   * チャンネルの最新アップロード日時
   */
  async getLastUploadDate(channelId: string): Promise<Date | null> {
    const channels = await this.api.getChannels([channelId], ['contentDetails']);
    const uploads = channels?.[0]?.contentDetails?.relatedPlaylists?.uploads;
    if (!uploads) return null;
    return this.api.getLatestUploadDate(uploads);
  }

  /**
   * チャンネルの存在と稼働状況を確認する
   * @param cutoffDays この日数より前が最終投稿なら inactive
   */
  async verifyChannels(channels: ChannelRegistry, cutoffDays = 365): Promise<Record<string, ChannelHealth>> {
    const cutoff = this.now().getTime() - cutoffDays * DAY_MS;
    const report: Record<string, ChannelHealth> = {};

    for (const [name, info] of Object.entries(channels)) {
      const found = await this.api.getChannels([info.channelId], ['id']);
      if (!found || found.length === 0) {
        report[name] = { exists: false, lastUpload: null, inactive: true };
        continue;
      }

      const lastUpload = await this.getLastUploadDate(info.channelId);
      report[name] = {
        exists: true,
        lastUpload,
        inactive: lastUpload === null || lastUpload.getTime() < cutoff,
      };
    }
    return report;
  }
}
