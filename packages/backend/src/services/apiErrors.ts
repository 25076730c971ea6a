/**
 * YouTube Data API エラーの分類
 * googleapis が投げる gaxios 形式のエラー（response.status / response.data.error.errors[].reason）を解析する
 */

/** 一時的なサーバーエラー（同じキーで指数バックオフ再試行） */
export const TRANSIENT_STATUSES: ReadonlySet<number> = new Set([500, 502, 503, 504]);

/** クォータ系の 403 理由（キーをローテーション） */
export const QUOTA_REASONS: ReadonlySet<string> = new Set([
  'quotaExceeded',
  'dailyLimitExceeded',
  'userRateLimitExceeded',
]);

export type ApiErrorKind = 'transient' | 'quota' | 'fatal' | 'unexpected';

export interface ClassifiedApiError {
  kind: ApiErrorKind;
  status: number | null;
  reason: string | null;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

/**
 * HTTPステータスを取り出す（response.status を優先し、なければ数値の code）
 */
function extractStatus(error: Record<string, unknown>): number | null {
  const response = error.response;
  if (isRecord(response) && typeof response.status === 'number') {
    return response.status;
  }
  if (typeof error.code === 'number') {
    return error.code;
  }
  if (typeof error.status === 'number') {
    return error.status;
  }
  return null;
}

function firstReason(errors: unknown): string | null {
  if (!Array.isArray(errors) || errors.length === 0) return null;
  const first: unknown = errors[0];
  return isRecord(first) && typeof first.reason === 'string' ? first.reason : null;
}

/**
 * エラー本文の error.errors[0].reason を取り出す
 */
export function extractErrorReason(error: unknown): string | null {
  if (!isRecord(error)) return null;

  const response = error.response;
  if (isRecord(response)) {
    let data: unknown = response.data;
    if (typeof data === 'string') {
      try {
        data = JSON.parse(data);
      } catch {
        data = undefined;
      }
    }
    if (isRecord(data) && isRecord(data.error)) {
      const reason = firstReason(data.error.errors);
      if (reason) return reason;
    }
  }

  // GaxiosError は errors を直下にも展開している
  return firstReason(error.errors);
}

/**
 * エラーを transient / quota / fatal / unexpected に分類する
 */
export function classifyApiError(error: unknown): ClassifiedApiError {
  if (!isRecord(error)) {
    return { kind: 'unexpected', status: null, reason: null };
  }

  const status = extractStatus(error);
  const reason = extractErrorReason(error);

  if (status === null || status < 400) {
    return { kind: 'unexpected', status, reason };
  }
  if (TRANSIENT_STATUSES.has(status)) {
    return { kind: 'transient', status, reason };
  }
  if (status === 403 && reason !== null && QUOTA_REASONS.has(reason)) {
    return { kind: 'quota', status, reason };
  }
  return { kind: 'fatal', status, reason };
}
