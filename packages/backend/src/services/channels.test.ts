import { describe, expect, it } from 'vitest';
import { ChannelService } from './channels.js';
import { FakeYouTubeGateway } from '../test-utils/fakes.js';
import type { ChannelRegistry } from '../types/harvest.js';

const registry: ChannelRegistry = {
  Alpha: { channelId: 'UC_a', wholeChannel: false, tags: [], outdated: false },
  Beta: { channelId: 'UC_b', wholeChannel: false, tags: [], outdated: false },
  Gamma: { channelId: 'UC_c', wholeChannel: false, tags: [], outdated: false },
};

function gateway() {
  return new FakeYouTubeGateway()
    .addChannel('UC_a', { title: 'Alpha', subscriberCount: '100', uploadsPlaylistId: 'UU_a' })
    .addChannel('UC_b', { title: 'Beta', subscriberCount: '300', uploadsPlaylistId: 'UU_b' })
    .addChannel('UC_c', { title: 'Gamma', subscriberCount: '200' });
}

describe('ChannelService', () => {
  it('reads subscriber counts and treats unparsable values as zero', async () => {
    const api = gateway().addChannel('UC_d', { subscriberCount: 'hidden' });
    const service = new ChannelService(api);

    const counts = await service.getSubscriberCounts(['UC_a', 'UC_d', 'UC_a']);

    expect([...counts.entries()]).toEqual([
      ['UC_a', 100],
      ['UC_d', 0],
    ]);
  });

  it('ranks channels by subscribers', async () => {
    const service = new ChannelService(gateway());

    expect(Object.keys(await service.getTopChannels(registry, 2))).toEqual(['Beta', 'Gamma']);
    expect(Object.keys(await service.getBottomChannels(registry, 2))).toEqual(['Alpha', 'Gamma']);
    expect(await service.getTopChannels(registry, 0)).toEqual({});
  });

  it('keeps registry order for equal counts', async () => {
    const api = new FakeYouTubeGateway()
      .addChannel('UC_a', { subscriberCount: '5' })
      .addChannel('UC_b', { subscriberCount: '5' })
      .addChannel('UC_c', { subscriberCount: '5' });
    const service = new ChannelService(api);

    expect(Object.keys(await service.getTopChannels(registry, 3))).toEqual(['Alpha', 'Beta', 'Gamma']);
  });

  it('resolves the last upload through the uploads playlist', async () => {
    const api = gateway();
    api.latestUploads.set('UU_a', new Date('2024-05-01T00:00:00Z'));
    const service = new ChannelService(api);

    expect(await service.getLastUploadDate('UC_a')).toEqual(new Date('2024-05-01T00:00:00Z'));
    expect(await service.getLastUploadDate('UC_c')).toBeNull();
  });

  it('reports existence and activity for each channel', async () => {
    const api = gateway().addChannel('UC_b', { title: 'Beta', uploadsPlaylistId: 'UU_b' });
    api.latestUploads.set('UU_a', new Date('2024-05-01T00:00:00Z'));
    api.latestUploads.set('UU_b', new Date('2022-01-01T00:00:00Z'));
    const service = new ChannelService(api, () => new Date('2024-06-01T00:00:00Z'));

    const report = await service.verifyChannels(
      { ...registry, Missing: { channelId: 'UC_missing', wholeChannel: false, tags: [], outdated: false } },
      365
    );

    expect(report).toEqual({
      Alpha: { exists: true, lastUpload: new Date('2024-05-01T00:00:00Z'), inactive: false },
      Beta: { exists: true, lastUpload: new Date('2022-01-01T00:00:00Z'), inactive: true },
      Gamma: { exists: true, lastUpload: null, inactive: true },
      Missing: { exists: false, lastUpload: null, inactive: true },
    });
  });
});
