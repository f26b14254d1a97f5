import pLimit from "p-limit"

import { getErrorMessage } from "../utils/errors.js"
import { InvalidShardUrlError, ShardFetchError, ShardKeyCollisionError } from "./errors.js"
import { completedShardKeys } from "./resume-index.js"
import { resolveShardKey } from "./shard-name.js"
import type { ShardFailure, ShardKey, ShardProcessor, ShardResult, ShardUrl } from "./types.js"

export const DEFAULT_CONCURRENCY = 10

export interface ShardPlan {
  /** Sorted by URL; this is the dispatch order. */
  pending: ShardUrl[]
  completed: ShardUrl[]
}

export type ShardOutcomeStatus = "succeeded" | "failed" | "cancelled"

export interface ShardProgressEvent {
  url: ShardUrl
  status: ShardOutcomeStatus
  result: ShardResult | null
  completed: number
  total: number
  succeeded: number
  failed: number
  cancelled: number
}

export interface FetchSummary {
  total: number
  alreadyCompleted: number
  dispatched: number
  succeeded: number
  failed: number
  /** Pending shards never started because the run was interrupted. */
  cancelled: number
  failures: ShardFailure[]
}

export interface FetchSchedulerOptions {
  cacheDir: string
  concurrency: number
  processor: ShardProcessor
  signal?: AbortSignal
  onProgress?: (event: ShardProgressEvent) => void
}

export const planShards = (
  shardUrls: Iterable<ShardUrl>,
  completedKeys: ReadonlySet<ShardKey>,
): ShardPlan => {
  const owners = new Map<ShardKey, ShardUrl>()
  const plan: ShardPlan = { pending: [], completed: [] }

  for (const url of [...new Set(shardUrls)].sort()) {
    let key: ShardKey
    try {
      key = resolveShardKey(url)
    } catch (error) {
      if (error instanceof InvalidShardUrlError) {
        // no record can exist for it; the unit reports the failure
        plan.pending.push(url)
        continue
      }
      throw error
    }
    const owner = owners.get(key)
    if (owner !== undefined) {
      throw new ShardKeyCollisionError(key, [owner, url])
    }
    owners.set(key, url)
    if (completedKeys.has(key)) {
      plan.completed.push(url)
    } else {
      plan.pending.push(url)
    }
  }

  return plan
}

const keyOrNull = (url: ShardUrl): ShardKey | null => {
  try {
    return resolveShardKey(url)
  } catch (error) {
    if (error instanceof InvalidShardUrlError) {
      return null
    }
    throw error
  }
}

const assertConcurrency = (concurrency: number): void => {
  if (!Number.isInteger(concurrency) || concurrency < 1) {
    throw new RangeError(`Concurrency must be a positive integer, got ${concurrency}`)
  }
}

export const runFetchScheduler = async (
  shardUrls: Iterable<ShardUrl>,
  options: FetchSchedulerOptions,
): Promise<FetchSummary> => {
  assertConcurrency(options.concurrency)
  const plan = planShards(shardUrls, await completedShardKeys(options.cacheDir))

  const summary: FetchSummary = {
    total: plan.pending.length + plan.completed.length,
    alreadyCompleted: plan.completed.length,
    dispatched: plan.pending.length,
    succeeded: 0,
    failed: 0,
    cancelled: 0,
    failures: [],
  }
  if (plan.pending.length === 0) {
    return summary
  }

  const { cacheDir, processor, signal } = options
  const limit = pLimit(options.concurrency)
  let completed = 0
  // a throwing listener is detached; its error is raised once every unit has settled
  const listenerErrors: unknown[] = []

  const notify = (event: ShardProgressEvent): void => {
    if (listenerErrors.length > 0) {
      return
    }
    try {
      options.onProgress?.(event)
    } catch (error) {
      listenerErrors.push(error)
    }
  }

  const record = (url: ShardUrl, result: ShardResult | null): void => {
    let status: ShardOutcomeStatus
    if (result === null) {
      status = "cancelled"
      summary.cancelled += 1
    } else if (result.ok) {
      status = "succeeded"
      summary.succeeded += 1
    } else {
      status = "failed"
      summary.failed += 1
      summary.failures.push(result)
    }
    completed += 1
    notify({
      url,
      status,
      result,
      completed,
      total: plan.pending.length,
      succeeded: summary.succeeded,
      failed: summary.failed,
      cancelled: summary.cancelled,
    })
  }

  const runUnit = async (url: ShardUrl): Promise<void> => {
    // interrupts are honoured between units only
    if (signal?.aborted) {
      record(url, null)
      return
    }
    let result: ShardResult
    try {
      result = await processor.fetch(url, cacheDir)
    } catch (error) {
      result = {
        ok: false,
        url,
        key: keyOrNull(url),
        error: new ShardFetchError("unexpected", url, getErrorMessage(error), { cause: error }),
      }
    }
    record(url, result)
  }

  await Promise.all(plan.pending.map((url) => limit(() => runUnit(url))))
  if (listenerErrors.length > 0) {
    throw listenerErrors[0]
  }
  return summary
}
