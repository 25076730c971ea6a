import fs from 'fs';
import os from 'os';
import path from 'path';
import { describe, expect, it } from 'vitest';
import { loadSources, parseSources } from './sources.js';
import { ConfigError } from '../utils/errors.js';

const valid = {
  cutoffDate: '2024-01-01T00:00:00Z',
  keywords: ['patch', 'season', 'patch'],
  channels: {
    Alpha: { channelId: 'UC_a', wholeChannel: true, tags: ['mmo'] },
    Beta: { handle: '@beta', channelId: 'UC_b' },
  },
};

describe('parseSources', () => {
  it('parses the registry and fills channel defaults', () => {
    const registry = parseSources(valid);

    expect(registry.cutoffDate).toEqual(new Date('2024-01-01T00:00:00Z'));
    expect(registry.keywords).toEqual(['patch', 'season']);
    expect(registry.channels.Beta).toEqual({
      handle: '@beta',
      channelId: 'UC_b',
      wholeChannel: false,
      tags: [],
      outdated: false,
    });
  });

  it('rejects an invalid registry', () => {
    expect(() => parseSources({ ...valid, cutoffDate: 'soon' })).toThrow(ConfigError);
    expect(() => parseSources({ ...valid, keywords: [] })).toThrow(ConfigError);
    expect(() => parseSources({ ...valid, channels: { Alpha: { channelId: '' } } })).toThrow(ConfigError);
  });
});

describe('loadSources', () => {
  it('reads a file and applies the cutoff override', () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'sources-'));
    const filePath = path.join(dir, 'sources.json');
    fs.writeFileSync(filePath, JSON.stringify(valid), 'utf-8');

    try {
      expect(loadSources(filePath).cutoffDate).toEqual(new Date('2024-01-01T00:00:00Z'));
      expect(loadSources(filePath, '2020-05-01T00:00:00Z').cutoffDate).toEqual(new Date('2020-05-01T00:00:00Z'));
    } finally {
      fs.rmSync(dir, { recursive: true, force: true });
    }
  });

  it('reports a missing file as a configuration error', () => {
    expect(() => loadSources(path.join(os.tmpdir(), 'does-not-exist', 'sources.json'))).toThrow(ConfigError);
  });
});
