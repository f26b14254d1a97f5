import { mkdir } from "node:fs/promises"

import { mergeShardRecords, type MergeOutcome } from "./aggregator.js"
import { MergeError } from "./errors.js"
import { runFetchScheduler, type FetchSummary, type ShardProgressEvent } from "./scheduler.js"
import type { ShardProcessor, ShardUrl } from "./types.js"

export interface HarvestRunOptions {
  concurrency: number
  cacheDir: string
  outputPath: string
  shardUrls: ReadonlySet<ShardUrl>
  processor: ShardProcessor
  /** Merge the records that exist even though some shards failed in this run. */
  mergeWithFailures?: boolean
  signal?: AbortSignal
  onProgress?: (event: ShardProgressEvent) => void
}

export type MergeStep =
  | MergeOutcome
  | { status: "deferred"; reason: "failures" | "cancelled" }
  | { status: "failed"; error: MergeError }

export interface HarvestRunResult {
  fetch: FetchSummary
  merge: MergeStep
}

/**
 * Fetches every pending shard, then merges the records. By default the merge
 * waits for a run in which nothing failed or was cancelled: once the output
 * exists it is never rebuilt, so it must not be built from an incomplete cache.
 * `mergeWithFailures` lifts the wait for failures only, for shards that fail
 * on every run. An interrupted run never merges.
 */
export const runHarvest = async (options: HarvestRunOptions): Promise<HarvestRunResult> => {
  await mkdir(options.cacheDir, { recursive: true })

  const fetch = await runFetchScheduler(options.shardUrls, {
    cacheDir: options.cacheDir,
    concurrency: options.concurrency,
    processor: options.processor,
    signal: options.signal,
    onProgress: options.onProgress,
  })

  if (fetch.cancelled > 0 || options.signal?.aborted) {
    return { fetch, merge: { status: "deferred", reason: "cancelled" } }
  }
  if (fetch.failed > 0 && !options.mergeWithFailures) {
    return { fetch, merge: { status: "deferred", reason: "failures" } }
  }

  try {
    return { fetch, merge: await mergeShardRecords(options.cacheDir, options.outputPath) }
  } catch (error) {
    if (error instanceof MergeError) {
      return { fetch, merge: { status: "failed", error } }
    }
    throw error
  }
}
