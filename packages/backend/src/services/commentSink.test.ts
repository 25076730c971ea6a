import { describe, expect, it } from 'vitest';
import { isCompleteComment, MongoCommentSink, toUpsertOperation, type BulkWriter } from './commentSink.js';
import { createMapBulkWriter } from '../test-utils/fakes.js';
import type { CommentRecord } from '../types/harvest.js';

function record(commentId: string, overrides: Partial<CommentRecord> = {}): CommentRecord {
  return {
    commentId,
    videoId: 'v1',
    videoTitle: 'Patch notes',
    channelId: 'UC_test',
    channelName: 'Test Channel',
    videoPublishDate: new Date('2024-01-01T00:00:00Z'),
    author: 'viewer',
    authorChannelId: null,
    text: 'nice',
    likeCount: 0,
    publishedAt: new Date('2024-02-01T00:00:00Z'),
    updatedAt: new Date('2024-02-01T00:00:00Z'),
    ...overrides,
  };
}

describe('toUpsertOperation', () => {
  it('keys the upsert on commentId and sets every other field', () => {
    const operation = toUpsertOperation(record('c1'));
    expect(operation.updateOne.filter).toEqual({ commentId: 'c1' });
    expect(operation.updateOne.upsert).toBe(true);
    expect(operation.updateOne.update.$set).not.toHaveProperty('commentId');
    expect(operation.updateOne.update.$set.text).toBe('nice');
  });
});

describe('isCompleteComment', () => {
  it('rejects records with missing keys or invalid dates', () => {
    expect(isCompleteComment(record('c1'))).toBe(true);
    expect(isCompleteComment(record(''))).toBe(false);
    expect(isCompleteComment(record('c1', { updatedAt: new Date('invalid') }))).toBe(false);
    expect(isCompleteComment(record('c1', { likeCount: Number.NaN }))).toBe(false);
  });
});

describe('MongoCommentSink', () => {
  it('is idempotent when the same records are written twice', async () => {
    const store = new Map<string, Omit<CommentRecord, 'commentId'>>();
    const sink = new MongoCommentSink(createMapBulkWriter(store));

    const first = await sink.upsertComments([record('c1'), record('c2')]);
    const second = await sink.upsertComments([record('c1'), record('c2')]);

    expect(first).toEqual({ upserted: 2, matched: 0, modified: 0, skipped: 0, failedBatches: 0 });
    expect(second).toEqual({ upserted: 0, matched: 2, modified: 0, skipped: 0, failedBatches: 0 });
    expect(store.size).toBe(2);
  });

  it('overwrites the stored document when a comment changes', async () => {
    const store = new Map<string, Omit<CommentRecord, 'commentId'>>();
    const sink = new MongoCommentSink(createMapBulkWriter(store));

    await sink.upsertComments([record('c1')]);
    const result = await sink.upsertComments([record('c1', { likeCount: 5 })]);

    expect(result.modified).toBe(1);
    expect(store.get('c1')?.likeCount).toBe(5);
  });

  it('skips incomplete records without writing them', async () => {
    const store = new Map<string, Omit<CommentRecord, 'commentId'>>();
    const sink = new MongoCommentSink(createMapBulkWriter(store));

    const result = await sink.upsertComments([record(''), record('c2')]);

    expect(result.skipped).toBe(1);
    expect(result.upserted).toBe(1);
    expect([...store.keys()]).toEqual(['c2']);
  });

  it('confines a failed batch to itself', async () => {
    const store = new Map<string, Omit<CommentRecord, 'commentId'>>();
    const mapWriter = createMapBulkWriter(store);
    const writer: BulkWriter = async (operations) => {
      if (operations.some((operation) => operation.updateOne.filter.commentId === 'bad')) {
        throw new Error('write failed');
      }
      return mapWriter(operations);
    };
    const sink = new MongoCommentSink(writer, 2);

    const result = await sink.upsertComments([record('c1'), record('bad'), record('c3')]);

    expect(result.failedBatches).toBe(1);
    expect(result.upserted).toBe(1);
    expect([...store.keys()]).toEqual(['c3']);
  });

  it('does not call the writer for an empty input', async () => {
    let calls = 0;
    const sink = new MongoCommentSink(async () => {
      calls++;
      return { upserted: 0, matched: 0, modified: 0 };
    });

    await sink.upsertComments([]);

    expect(calls).toBe(0);
  });
});
