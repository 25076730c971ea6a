import { describe, expect, it } from 'vitest';
import { classifyApiError, extractErrorReason } from './apiErrors.js';

describe('extractErrorReason', () => {
  it('reads the first reason from the response body', () => {
    const error = { response: { status: 403, data: { error: { errors: [{ reason: 'quotaExceeded' }, { reason: 'other' }] } } } };
    expect(extractErrorReason(error)).toBe('quotaExceeded');
  });

  it('parses a JSON string body', () => {
    const error = { response: { status: 403, data: JSON.stringify({ error: { errors: [{ reason: 'dailyLimitExceeded' }] } }) } };
    expect(extractErrorReason(error)).toBe('dailyLimitExceeded');
  });

  it('falls back to the errors array on the error itself', () => {
    const error = { code: 403, errors: [{ reason: 'userRateLimitExceeded' }] };
    expect(extractErrorReason(error)).toBe('userRateLimitExceeded');
  });

  it('returns null for bodies without a reason', () => {
    expect(extractErrorReason({ response: { status: 500, data: 'not json' } })).toBeNull();
    expect(extractErrorReason('boom')).toBeNull();
  });
});

describe('classifyApiError', () => {
  it('treats 500, 502, 503 and 504 as transient', () => {
    for (const status of [500, 502, 503, 504]) {
      expect(classifyApiError({ response: { status } }).kind).toBe('transient');
    }
  });

  it('treats quota reasons on 403 as quota', () => {
    const error = { response: { status: 403, data: { error: { errors: [{ reason: 'quotaExceeded' }] } } } };
    expect(classifyApiError(error)).toEqual({ kind: 'quota', status: 403, reason: 'quotaExceeded' });
  });

  it('treats other client errors as fatal', () => {
    expect(classifyApiError({ response: { status: 404 } })).toEqual({ kind: 'fatal', status: 404, reason: null });
    const forbidden = { response: { status: 403, data: { error: { errors: [{ reason: 'commentsDisabled' }] } } } };
    expect(classifyApiError(forbidden).kind).toBe('fatal');
    expect(classifyApiError({ response: { status: 501 } }).kind).toBe('fatal');
  });

  it('uses a numeric code when there is no response', () => {
    expect(classifyApiError({ code: 503 }).kind).toBe('transient');
  });

  it('treats anything without an HTTP error status as unexpected', () => {
    expect(classifyApiError(new Error('ECONNRESET')).kind).toBe('unexpected');
    expect(classifyApiError({ code: 'ECONNRESET' }).kind).toBe('unexpected');
    expect(classifyApiError(null).kind).toBe('unexpected');
  });
});
