/**
 * 処理対象チャンネルの絞り込み
 * 適用順: outdated 除外 → --channels → --types → --limit-top → --limit-bottom → --skip → --exclude-types → --max-inactive-days
 */
import type { ChannelService } from '../services/channels.js';
import type { ChannelRegistry, ChannelSource } from '../types/harvest.js';
import type { CliOptions } from './options.js';

export type ChannelFilterOptions = Pick<
  CliOptions,
  'channels' | 'skip' | 'types' | 'excludeTypes' | 'limitTop' | 'limitBottom' | 'maxInactiveDays'
>;

type ChannelLookup = Pick<ChannelService, 'getTopChannels' | 'getBottomChannels' | 'getLastUploadDate'>;

const DAY_MS = 24 * 60 * 60 * 1000;

/**
 * カンマ区切り文字列を小文字・前後空白除去の集合にする
 */
export function csvToSet(csv: string): Set<string> {
  return new Set(
    csv
      .split(',')
      .map((value) => value.trim().toLowerCase())
      .filter(Boolean)
  );
}

function matchesAnyTag(source: ChannelSource, tags: Set<string>): boolean {
  return source.tags.some((tag) => tags.has(tag.toLowerCase()));
}

function pick(channels: ChannelRegistry, predicate: (name: string, source: ChannelSource) => boolean): ChannelRegistry {
  return Object.fromEntries(Object.entries(channels).filter(([name, source]) => predicate(name, source)));
}

export class ChannelFilter {
  constructor(
    private readonly lookup: ChannelLookup,
    private readonly now: () => Date = () => new Date()
  ) {}

  async apply(channels: ChannelRegistry, options: ChannelFilterOptions): Promise<ChannelRegistry> {
    let filtered = pick(channels, (_, source) => !source.outdated);

    if (options.channels) {
      const requested = csvToSet(options.channels);
      filtered = pick(filtered, (name) => requested.has(name.toLowerCase()));
    }
    if (options.types) {
      const required = csvToSet(options.types);
      filtered = pick(filtered, (_, source) => matchesAnyTag(source, required));
    }
    if (options.limitTop) {
      filtered = await this.lookup.getTopChannels(filtered, options.limitTop);
    }
    if (options.limitBottom) {
      filtered = await this.lookup.getBottomChannels(filtered, options.limitBottom);
    }
    if (options.skip) {
      const skipped = csvToSet(options.skip);
      filtered = pick(filtered, (name) => !skipped.has(name.toLowerCase()));
    }
    if (options.excludeTypes) {
      const forbidden = csvToSet(options.excludeTypes);
      filtered = pick(filtered, (_, source) => !matchesAnyTag(source, forbidden));
    }
    if (options.maxInactiveDays) {
      filtered = await this.keepRecentlyActive(filtered, options.maxInactiveDays);
    }
    return filtered;
  }

  private async keepRecentlyActive(channels: ChannelRegistry, maxInactiveDays: number): Promise<ChannelRegistry> {
    const cutoff = this.now().getTime() - maxInactiveDays * DAY_MS;
    const active: ChannelRegistry = {};
    for (const [name, source] of Object.entries(channels)) {
      const lastUpload = await this.lookup.getLastUploadDate(source.channelId);
      if (lastUpload && lastUpload.getTime() >= cutoff) {
        active[name] = source;
      } else {
        console.log(`${name} をスキップします（最終投稿: ${lastUpload ? lastUpload.toISOString().slice(0, 10) : 'なし'}）`);
      }
    }
    return active;
  }
}
