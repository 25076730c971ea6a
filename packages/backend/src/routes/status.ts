/**
 * 収集状況ルーター
 * - 稼働確認、直近の実行サマリー、APIキープールの状態
 * - ストリームごとの再開位置
 */
import express, { Request, Response } from 'express'
import type { HarvestJob } from '../jobs/harvest.js'
import type { MongoCursorStore } from '../services/cursorStore.js'
import type { QuotaAwareClient } from '../services/quotaClient.js'
import { errorMessage } from '../utils/errors.js'

export interface StatusDeps {
  job: Pick<HarvestJob, 'state'>
  client: Pick<QuotaAwareClient<unknown>, 'keyCount' | 'currentKeyIndex' | 'lastExhaustedAt' | 'isInGlobalBackoff'>
  cursors: Pick<MongoCursorStore, 'find' | 'list'>
}

/** ステータスコードとレスポンス本文 */
export interface StatusReply {
  status: number
  body: object
}

const DEFAULT_PROGRESS_LIMIT = 50
const MAX_PROGRESS_LIMIT = 200

/**
 * クエリの limit を 1〜200 に収める（不正値は既定の 50）
 */
export function progressLimit(raw: unknown): number {
  if (raw === undefined) return DEFAULT_PROGRESS_LIMIT
  const requested = Number(raw)
  return Number.isInteger(requested) && requested > 0 ? Math.min(requested, MAX_PROGRESS_LIMIT) : DEFAULT_PROGRESS_LIMIT
}

/**
 * ルートごとの処理（Express に依存しない）
 */
export function createStatusHandlers({ job, client, cursors }: StatusDeps) {
  return {
    health(): StatusReply {
      return { status: 200, body: { status: 'ok', message: 'コメント収集サービスは稼働中です' } }
    },

    status(): StatusReply {
      const lastExhaustedAt = client.lastExhaustedAt
      return {
        status: 200,
        body: {
          job: job.state,
          quota: {
            keys: client.keyCount,
            currentKey: client.currentKeyIndex + 1,
            lastExhaustedAt: lastExhaustedAt ? lastExhaustedAt.toISOString() : null,
            inGlobalBackoff: client.isInGlobalBackoff(),
          },
        },
      }
    },

    async progressList(rawLimit: unknown): Promise<StatusReply> {
      try {
        const items = await cursors.list(progressLimit(rawLimit))
        return { status: 200, body: { items } }
      } catch (error) {
        console.error('再開位置の一覧取得エラー:', errorMessage(error))
        return { status: 500, body: { error: 'internal_error' } }
      }
    },

    async progressOne(streamId: string): Promise<StatusReply> {
      try {
        const snapshot = await cursors.find(streamId)
        if (!snapshot) return { status: 404, body: { error: 'not_found' } }
        return { status: 200, body: { ...snapshot, caughtUp: snapshot.lastPageToken === null } }
      } catch (error) {
        console.error('再開位置の取得エラー:', errorMessage(error))
        return { status: 500, body: { error: 'internal_error' } }
      }
    },
  }
}

function send(res: Response, reply: StatusReply) {
  res.status(reply.status).json(reply.body)
}

export function createStatusRouter(deps: StatusDeps) {
  const router = express.Router()
  const handlers = createStatusHandlers(deps)

  /**
   * GET /api/health
   */
  router.get('/health', (_req: Request, res: Response) => {
    send(res, handlers.health())
  })

  /**
   * GET /api/status
   * 実行状態とキープールの状態（キーそのものは返さない）
   */
  router.get('/status', (_req: Request, res: Response) => {
    send(res, handlers.status())
  })

  /**
   * GET /api/progress
   * 最近更新された再開位置の一覧
   * クエリ: limit (任意, 1〜200)
   */
  router.get('/progress', async (req: Request, res: Response) => {
    send(res, await handlers.progressList(req.query.limit))
  })

  /**
   * GET /api/progress/:streamId
   * 1ストリームの再開位置（lastPageToken が null なら追いついた状態）
   */
  router.get('/progress/:streamId', async (req: Request, res: Response) => {
    send(res, await handlers.progressOne(req.params.streamId))
  })

  return router
}
