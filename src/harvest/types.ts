import type { ShardFetchError } from "./errors.js"

export type ShardUrl = string

/** Final path segment of a shard URL; also the record file stem. */
export type ShardKey = string

export type MalformedEntryPolicy = "fail" | "skip"

export interface ShardSuccess {
  ok: true
  url: ShardUrl
  key: ShardKey
  idCount: number
  skippedEntries: number
}

export interface ShardFailure {
  ok: false
  url: ShardUrl
  key: ShardKey | null
  error: ShardFetchError
}

export type ShardResult = ShardSuccess | ShardFailure

/**
 * One unit of work for the scheduler. Implementations must resolve, never
 * reject, and must leave no record behind when they report a failure.
 */
export interface ShardProcessor {
  fetch(url: ShardUrl, cacheDir: string): Promise<ShardResult>
}

export interface ShardDownloader {
  download(url: ShardUrl): Promise<Uint8Array>
}
