import { describe, expect, it, vi } from 'vitest';
import { HarvestJob, runHarvest } from './harvest.js';
import { ConfigError } from '../utils/errors.js';
import { MetadataCache } from '../utils/cache.js';
import { ChannelProcessor } from '../services/channelProcessor.js';
import { IncrementalFetcher } from '../services/incrementalFetcher.js';
import { MetadataService } from '../services/metadata.js';
import { StreamEnumerator } from '../services/streamEnumerator.js';
import {
  FakeYouTubeGateway,
  InMemoryCommentSink,
  InMemoryCursorStore,
  InMemoryRecencyIndex,
  makeThread,
  page,
} from '../test-utils/fakes.js';
import type { SweepResult } from '../services/channelProcessor.js';
import type { ChannelRegistry, ChannelSource } from '../types/harvest.js';

const registry: ChannelRegistry = {
  Alpha: { channelId: 'UC_a', wholeChannel: true, tags: [], outdated: false },
  Beta: { channelId: 'UC_b', wholeChannel: false, tags: [], outdated: false },
  Gamma: { channelId: 'UC_c', wholeChannel: false, tags: [], outdated: false },
  Delta: { channelId: 'UC_d', wholeChannel: false, tags: [], outdated: false },
};

const results: Record<string, SweepResult | Error> = {
  Alpha: { state: 'completed', streams: 1, inserted: 10 },
  Beta: { state: 'exhausted', streams: 2, inserted: 3 },
  Gamma: new Error('boom'),
  Delta: { state: 'not-found', streams: 0, inserted: 0 },
};

const processor = {
  processChannel: async (name: string, _source: ChannelSource) => {
    const result = results[name];
    if (result instanceof Error) throw result;
    return result;
  },
};

const fixedNow = () => new Date('2024-06-01T00:00:00Z');

describe('runHarvest', () => {
  it('processes every channel and summarises the run', async () => {
    const summary = await runHarvest(processor, registry, {}, fixedNow);

    expect(summary).toEqual({
      channels: 4,
      streams: 3,
      inserted: 13,
      exhaustedChannels: ['Beta'],
      failedChannels: ['Gamma', 'Delta'],
      startedAt: '2024-06-01T00:00:00.000Z',
      finishedAt: '2024-06-01T00:00:00.000Z',
    });
  });

  it('passes the ignore-progress option through', async () => {
    const processChannel = vi.fn(async (): Promise<SweepResult> => ({ state: 'completed', streams: 0, inserted: 0 }));
    await runHarvest({ processChannel }, { Alpha: registry.Alpha }, { ignoreProgress: true });
    expect(processChannel).toHaveBeenCalledWith('Alpha', registry.Alpha, { ignoreProgress: true });
  });
});

describe('HarvestJob', () => {
  it('records the last summary and calls the after-run hook', async () => {
    const afterRun = vi.fn();
    const job = new HarvestJob(processor, { Alpha: registry.Alpha }, { afterRun, now: fixedNow });

    const summary = await job.run();

    expect(summary?.inserted).toBe(10);
    expect(job.state).toEqual({ running: false, runs: 1, lastSummary: summary, lastError: null });
    expect(afterRun).toHaveBeenCalledTimes(1);
  });

  it('skips a run while the previous one is still going', async () => {
    let finish: () => void = () => {};
    const slow = {
      processChannel: () =>
        new Promise<SweepResult>((resolve) => {
          finish = () => resolve({ state: 'completed', streams: 1, inserted: 1 });
        }),
    };
    const job = new HarvestJob(slow, { Alpha: registry.Alpha });

    const first = job.run();
    expect(job.state.running).toBe(true);
    expect(await job.run()).toBeNull();

    finish();
    expect((await first)?.inserted).toBe(1);
    expect(job.state.runs).toBe(1);
  });

  it('rejects an invalid cron expression', () => {
    const job = new HarvestJob(processor, registry);
    expect(() => job.schedule('every tuesday')).toThrow(ConfigError);
  });

  it('collects new comments on already-seen videos in later runs', async () => {
    const api = new FakeYouTubeGateway();
    const cursors = new InMemoryCursorStore();
    const sink = new InMemoryCommentSink();
    const cache = new MetadataCache(null);
    const channelProcessor = new ChannelProcessor(
      {
        api,
        cursors,
        recency: new InMemoryRecencyIndex(),
        sink,
        metadata: new MetadataService(api, cache),
        enumerator: new StreamEnumerator(api, cache),
        fetcher: new IncrementalFetcher({ api, cursors, sink }),
      },
      { cutoff: new Date('2024-01-01T00:00:00Z'), keywords: ['patch'] }
    );
    api.addChannel('UC_b', { title: 'Beta' });
    api.playlists.set('UC_b', null, page([{ id: 'PL1', snippet: { title: 'Patch notes' } }]));
    api.playlistItems.set('PL1', null, page(['v1']));
    api.addVideo('v1', 'Patch 1.0', 'UC_b');
    api.videoComments.set('v1', null, page([makeThread({ id: 'c1', videoId: 'v1', updatedAt: '2024-02-01T00:00:00Z' })]));
    const job = new HarvestJob(channelProcessor, { Beta: registry.Beta });

    await job.run();
    expect(sink.comments.has('c1')).toBe(true);

    api.videoComments.set(
      'v1',
      null,
      page([
        makeThread({ id: 'c2', videoId: 'v1', updatedAt: '2024-02-10T00:00:00Z' }),
        makeThread({ id: 'c1', videoId: 'v1', updatedAt: '2024-02-01T00:00:00Z' }),
      ])
    );
    const second = await job.run();

    expect(sink.comments.has('c2')).toBe(true);
    expect(second?.streams).toBe(1);
    expect(api.calls.filter((call) => call.startsWith('videoComments:'))).toEqual([
      'videoComments:v1:',
      'videoComments:v1:',
    ]);
  });
});

