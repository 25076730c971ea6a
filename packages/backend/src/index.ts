#!/usr/bin/env node
/**
 * YouTube コメント収集 - エントリポイント
 *
 * 概要:
 * - 環境変数（.env）とソースレジストリの読み込み
 * - コマンドライン引数による対象チャンネルの絞り込み
 * - --verify-channels ならチャンネルの稼働確認だけを行って終了
 * - データベース接続後、1回実行または cron による定期実行
 * - --serve なら収集状況 API を公開
 */
import express from 'express'

import { loadEnv } from './config/env.js'
import { loadSources } from './config/sources.js'
import { connectDatabase, disconnectDatabase } from './config/database.js'
import { parseCli } from './cli/options.js'
import { ChannelFilter } from './cli/channelFilter.js'
import { HarvestJob } from './jobs/harvest.js'
import { createStatusRouter } from './routes/status.js'
import { createYouTubeClient } from './services/quotaClient.js'
import { YouTubeApiService } from './services/youtubeApi.js'
import { ChannelService } from './services/channels.js'
import { MetadataService } from './services/metadata.js'
import { StreamEnumerator } from './services/streamEnumerator.js'
import { MongoCursorStore } from './services/cursorStore.js'
import { MongoRecencyIndex } from './services/recencyIndex.js'
import { MongoCommentSink } from './services/commentSink.js'
import { IncrementalFetcher } from './services/incrementalFetcher.js'
import { ChannelProcessor } from './services/channelProcessor.js'
import { MetadataCache } from './utils/cache.js'
import { ConfigError, errorMessage } from './utils/errors.js'
import { GracefulShutdown } from './utils/shutdown.js'

const SECONDS_PER_DAY = 24 * 60 * 60

const formatDate = (date: Date | null) => (date ? date.toISOString().slice(0, 10) : 'なし')

async function main(argv: string[]): Promise<void> {
  // API 呼び出しが始まる前に登録し、どの段階の中断でも終了コード 0 で終える
  const shutdown = new GracefulShutdown()
  shutdown.install()

  const options = parseCli(argv)
  const env = loadEnv()
  const sources = loadSources(env.SOURCES_FILE, env.CUTOFF_DATE)

  console.log('設定の読み込み状況:')
  console.log('YOUTUBE_API_KEYS:', `${env.YOUTUBE_API_KEYS.length} 件`)
  console.log('SOURCES_FILE:', env.SOURCES_FILE)
  console.log('カットオフ日時:', sources.cutoffDate.toISOString())

  const client = createYouTubeClient({
    apiKeys: env.YOUTUBE_API_KEYS,
    maxRetries: env.MAX_RETRIES,
    backoffFactor: env.BACKOFF_FACTOR,
    globalBackoffSeconds: env.GLOBAL_BACKOFF_SECONDS,
    maxConcurrent: env.MAX_CONCURRENT_REQUESTS,
  })
  const api = new YouTubeApiService(client)

  const cache = MetadataCache.inDirectory(env.CACHE_DIR, env.CACHE_MAX_SIZE)
  cache.load()
  cache.registerExitHook()
  shutdown.add(() => {
    cache.flushOnce()
  })

  const channelService = new ChannelService(api)
  const selected = await new ChannelFilter(channelService).apply(sources.channels, options)

  if (options.verifyChannels) {
    const report = await channelService.verifyChannels(selected, options.verifyCutoffDays)
    console.log('チャンネル稼働確認:')
    for (const [name, health] of Object.entries(report)) {
      const status = !health.exists ? '❌ 見つかりません' : health.inactive ? '💤 非アクティブ' : '✅ アクティブ'
      console.log(`  ${name}: ${status}（最終投稿: ${formatDate(health.lastUpload)}）`)
    }
    return
  }

  if (Object.keys(selected).length === 0) {
    console.error('対象チャンネルがありません。絞り込み条件を確認してください')
    return
  }

  const cursors = new MongoCursorStore()
  await connectDatabase(env.MONGODB_URI, env.PROGRESS_TTL_DAYS * SECONDS_PER_DAY, cursors)
  shutdown.add(async () => {
    await disconnectDatabase()
  })

  const sink = new MongoCommentSink()
  const processor = new ChannelProcessor(
    {
      api,
      cursors,
      recency: new MongoRecencyIndex(),
      sink,
      metadata: new MetadataService(api, cache),
      enumerator: new StreamEnumerator(api, cache),
      fetcher: new IncrementalFetcher({ api, cursors, sink }, { pageSize: env.PAGE_SIZE, flushMode: env.FLUSH_MODE }),
    },
    {
      cutoff: sources.cutoffDate,
      keywords: sources.keywords,
      pageSize: env.PAGE_SIZE,
      videoConcurrency: env.VIDEO_CONCURRENCY,
    }
  )

  const job = new HarvestJob(processor, selected, {
    ignoreProgress: options.ignoreProgress,
    afterRun: () => {
      try {
        cache.save()
      } catch (error) {
        console.error('キャッシュの書き出しに失敗しました:', errorMessage(error))
      }
    },
  })

  const schedule = options.schedule ?? env.HARVEST_SCHEDULE

  if (options.serve) {
    const app = express()
    app.use(express.json())
    app.use('/api', createStatusRouter({ job, client, cursors }))
    const server = app.listen(env.PORT, () => {
      console.log(`サーバー起動: http://localhost:${env.PORT}`)
    })
    shutdown.add(() => {
      server.close()
    })
  }

  if (schedule) {
    const task = job.schedule(schedule)
    shutdown.add(() => {
      task.stop()
    })
    return
  }

  await job.run()
  if (!options.serve) {
    cache.flushOnce()
    await disconnectDatabase()
  }
}

main(process.argv.slice(2)).catch(async (error: unknown) => {
  if (error instanceof ConfigError) {
    console.error('設定エラー:', error.message)
  } else {
    console.error('収集の実行に失敗しました:', errorMessage(error))
  }
  await disconnectDatabase()
  process.exit(1)
})
