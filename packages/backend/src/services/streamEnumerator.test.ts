import { describe, expect, it } from 'vitest';
import { matchesAnyKeyword, paginate, StreamEnumerator } from './streamEnumerator.js';
import { MetadataCache } from '../utils/cache.js';
import { FakeYouTubeGateway, page } from '../test-utils/fakes.js';
import type { Page } from '../types/harvest.js';

async function collect<T>(source: AsyncIterable<T>): Promise<T[]> {
  const items: T[] = [];
  for await (const item of source) items.push(item);
  return items;
}

describe('matchesAnyKeyword', () => {
  it('matches case-insensitive substrings', () => {
    expect(matchesAnyKeyword('Patch Notes 1.2', ['patch'])).toBe(true);
    expect(matchesAnyKeyword('Daily vlog', ['PATCH', 'season'])).toBe(false);
    expect(matchesAnyKeyword('anything', [''])).toBe(false);
  });
});

describe('paginate', () => {
  it('yields items across pages until there is no next token', async () => {
    const pages = new Map<string, Page<number>>([
      ['', page([1, 2], 'p2')],
      ['p2', page([3])],
    ]);
    const tokens: Array<string | null> = [];

    const items = await collect(
      paginate(async (token) => {
        tokens.push(token);
        return pages.get(token ?? '') ?? null;
      })
    );

    expect(items).toEqual([1, 2, 3]);
    expect(tokens).toEqual([null, 'p2']);
  });

  it('stops on a missing page or a repeated token', async () => {
    expect(await collect(paginate<number>(async () => null))).toEqual([]);

    let calls = 0;
    const repeated = await collect(
      paginate(async () => {
        calls++;
        return page([calls], 'same');
      })
    );
    expect(repeated).toEqual([1, 2]);
  });
});

describe('StreamEnumerator', () => {
  it('finds matching playlists once per channel', async () => {
    const api = new FakeYouTubeGateway();
    api.playlists
      .set('UC_a', null, page([{ id: 'PL1', snippet: { title: 'Patch notes' } }], 'p2'))
      .set('UC_a', 'p2', page([{ id: 'PL2', snippet: { title: 'Vlogs' } }, { id: 'PL3', snippet: { title: 'Season patch' } }]));
    const enumerator = new StreamEnumerator(api, new MetadataCache(null));

    const first = await enumerator.findPlaylists('UC_a', ['patch']);
    const second = await enumerator.findPlaylists('UC_a', ['patch']);

    expect(first).toEqual([
      { playlistId: 'PL1', title: 'Patch notes' },
      { playlistId: 'PL3', title: 'Season patch' },
    ]);
    expect(second).toEqual(first);
    expect(api.calls).toEqual(['playlists:UC_a:', 'playlists:UC_a:p2']);
  });

  it('joins keywords into a single search query', async () => {
    const api = new FakeYouTubeGateway();
    api.searchResults.set('UC_a', null, page(['v1', 'v2']));
    const enumerator = new StreamEnumerator(api, new MetadataCache(null));

    expect(await collect(enumerator.searchVideos('UC_a', ['patch', 'season']))).toEqual(['v1', 'v2']);
    expect(api.calls).toEqual(['search:UC_a:patch|season:']);
  });

  it('lists playlist videos page by page', async () => {
    const api = new FakeYouTubeGateway();
    api.playlistItems.set('PL1', null, page(['v1'], 'p2')).set('PL1', 'p2', page(['v2']));
    const enumerator = new StreamEnumerator(api, new MetadataCache(null));

    expect(await collect(enumerator.playlistVideos('PL1'))).toEqual(['v1', 'v2']);
  });
});
