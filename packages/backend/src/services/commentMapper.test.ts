import { describe, expect, it } from 'vitest';
import { commentUpdatedAt, commentVideoId, toCommentRecord } from './commentMapper.js';
import { makeThread } from '../test-utils/fakes.js';

const context = {
  videoTitle: 'Patch notes',
  channelId: 'UC_test',
  channelName: 'Test Channel',
  videoPublishDate: null,
};

describe('commentMapper', () => {
  it('reads the update time and video id from the top-level comment', () => {
    const thread = makeThread({ id: 'c1', videoId: 'v1', updatedAt: '2024-02-01T00:00:00Z' });
    expect(commentUpdatedAt(thread)).toEqual(new Date('2024-02-01T00:00:00Z'));
    expect(commentVideoId(thread)).toBe('v1');
  });

  it('returns null for an unparsable update time', () => {
    expect(commentUpdatedAt(makeThread({ id: 'c1', videoId: 'v1', updatedAt: 'not-a-date' }))).toBeNull();
  });

  it('takes the video id from the thread when the context has none', () => {
    const record = toCommentRecord(makeThread({ id: 'c1', videoId: 'v9', updatedAt: '2024-02-01T00:00:00Z' }), context);
    expect(record?.videoId).toBe('v9');
    expect(record?.authorChannelId).toBeNull();
  });

  it('prefers the original text over the display text', () => {
    const thread = makeThread({ id: 'c1', videoId: 'v1', updatedAt: '2024-02-01T00:00:00Z', text: 'raw <b>text</b>' });
    const snippet = thread.snippet?.topLevelComment?.snippet;
    if (snippet) snippet.textDisplay = 'raw text';
    expect(toCommentRecord(thread, context)?.text).toBe('raw <b>text</b>');
  });

  it('returns null when a required field is missing', () => {
    const thread = makeThread({ id: 'c1', videoId: 'v1', updatedAt: '2024-02-01T00:00:00Z' });
    const snippet = thread.snippet?.topLevelComment?.snippet;
    if (snippet) snippet.likeCount = undefined;
    expect(toCommentRecord(thread, context)).toBeNull();
    expect(toCommentRecord({ snippet: thread.snippet }, context)).toBeNull();
  });
});
