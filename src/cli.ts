#!/usr/bin/env node
import { mkdir } from "node:fs/promises"

import { readEnvConfig } from "./config.js"
import { ShardKeyCollisionError } from "./harvest/errors.js"
import { resolveRunPaths } from "./harvest/paths.js"
import { runHarvest } from "./harvest/run.js"
import { HttpShardDownloader, ShardFetcher } from "./harvest/shard-fetcher.js"
import { createProgram, parseOptions } from "./options.js"
import { createRenderer, type VerboseLog } from "./rendering/index.js"
import { resolveShardUrls } from "./sitemap/sitemap-index.js"
import { isCancellationError, listenForInterrupt } from "./utils/cancel.js"
import { getErrorMessage } from "./utils/errors.js"
import type { HttpRequestConfig } from "./utils/http.js"

const main = async (): Promise<number> => {
  const startedAt = Date.now()
  const program = createProgram(readEnvConfig())
  const rawArgs = process.argv.slice(2)
  const normalizedArgs = rawArgs[0] === "--" ? rawArgs.slice(1) : rawArgs
  program.parse(["node", "app-catalog-harvester", ...normalizedArgs])
  const options = parseOptions(program)
  const renderer = createRenderer(options.plain || !process.stdout.isTTY ? "plain" : "interactive")
  const { signal, dispose } = listenForInterrupt({
    onInterrupt: () => {
      renderer.warn("\nInterrupted (CTRL+C). Finishing shards in flight, no new ones start...")
    },
    onForceExit: () => {
      renderer.error("Force exit requested.")
      process.exit(130)
    },
  })
  const isRunCancellation = (error: unknown): boolean =>
    signal.aborted && isCancellationError(error)

  const verboseLog: VerboseLog | undefined = options.verbose
    ? (scope, message) => {
        renderer.logVerbose(scope, message, (Date.now() - startedAt) / 1000)
      }
    : undefined

  try {
    const paths = resolveRunPaths(options.outputDir, options.task)
    // sitemaps.txt lives here; runHarvest creates the cache directory
    await mkdir(paths.outputDir, { recursive: true })
    renderer.header({
      taskName: options.task,
      cacheDir: paths.cacheDir,
      outputPath: paths.outputPath,
      concurrency: options.concurrency,
    })

    const http: HttpRequestConfig = {
      timeoutMs: options.timeoutMs,
      headers: { "user-agent": options.userAgent },
    }

    // ── Shard URLs ──────────────────────────────────────────────────

    renderer.step("Loading sitemap shard URLs")
    const spinner = renderer.createSpinner(`Reading ${paths.shardUrlCacheFile}`)
    let shardUrls: Set<string>
    try {
      const resolved = await resolveShardUrls({
        cacheFile: paths.shardUrlCacheFile,
        robotsUrl: options.robotsUrl,
        http,
        signal,
        onIndexFetched: (done, total, indexUrl) => {
          spinner.update(`Sitemap indexes ${done}/${total}`)
          verboseLog?.("sitemap", `fetched index ${indexUrl}`)
        },
      })
      shardUrls = resolved.urls
      spinner.succeed(
        resolved.source === "cache"
          ? `${shardUrls.size} shard URL(s) from ${paths.shardUrlCacheFile}`
          : `${shardUrls.size} shard URL(s) from ${options.robotsUrl}`,
      )
    } catch (error) {
      if (isRunCancellation(error)) {
        spinner.fail("Interrupted")
        throw error
      }
      spinner.fail(`Could not resolve shard URLs: ${getErrorMessage(error)}`)
      return 1
    }

    // ── Fetch + merge ───────────────────────────────────────────────

    renderer.step("Fetching app ids")
    const processor = new ShardFetcher({
      downloader: new HttpShardDownloader(http),
      productPrefix: options.productPrefix,
      malformedEntries: options.malformedEntries,
    })
    const tracker = renderer.createProgressTracker("shards")
    const result = await runHarvest({
      concurrency: options.concurrency,
      cacheDir: paths.cacheDir,
      outputPath: paths.outputPath,
      shardUrls,
      processor,
      mergeWithFailures: options.mergeWithFailures,
      signal,
      onProgress: (event) => {
        tracker.onShard(event)
        if (event.status === "failed" && options.verbose) {
          renderer.shardFailed(event)
        }
      },
    }).finally(() => {
      tracker.stop()
    })

    verboseLog?.(
      "harvest",
      `${result.fetch.alreadyCompleted} of ${result.fetch.total} shard(s) were already done`,
    )
    renderer.fetchSummary(result.fetch)
    renderer.mergeResult(result.merge)

    if (signal.aborted) {
      renderer.warn("Run cancelled by user.")
      return 130
    }

    renderer.runComplete(Math.round((Date.now() - startedAt) / 1000), paths.outputPath)
    // failed shards are reported above but do not change the exit code
    return 0
  } catch (error) {
    if (isRunCancellation(error)) {
      renderer.warn("Run cancelled by user.")
      return 130
    }
    if (error instanceof ShardKeyCollisionError) {
      renderer.error(error.message)
      return 1
    }
    throw error
  } finally {
    dispose()
  }
}

main()
  .then((code) => {
    process.exit(code)
  })
  .catch((error: unknown) => {
    if (isCancellationError(error)) {
      console.error("Run cancelled by user.")
      process.exit(130)
    }
    console.error(`Unexpected error: ${getErrorMessage(error)}`)
    process.exit(1)
  })
