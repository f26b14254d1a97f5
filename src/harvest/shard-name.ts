import { join } from "node:path"

import { InvalidShardUrlError } from "./errors.js"
import type { ShardKey } from "./types.js"

export const SHARD_RECORD_SUFFIX = ".txt"

export const resolveShardKey = (url: string): ShardKey => {
  let pathname: string
  try {
    pathname = new URL(url).pathname
  } catch {
    throw new InvalidShardUrlError(url, "not an absolute URL")
  }
  const segment = pathname.slice(pathname.lastIndexOf("/") + 1)
  if (!segment) {
    throw new InvalidShardUrlError(url, "path has no final segment")
  }
  // dotfiles are never read back as records
  if (segment.startsWith(".")) {
    throw new InvalidShardUrlError(url, `"${segment}" would be a hidden file`)
  }
  return segment
}

export const shardRecordFileName = (key: ShardKey): string => `${key}${SHARD_RECORD_SUFFIX}`

export const shardRecordPath = (cacheDir: string, key: ShardKey): string =>
  join(cacheDir, shardRecordFileName(key))

export const shardKeyFromFileName = (fileName: string): ShardKey | null => {
  if (fileName.startsWith(".") || !fileName.endsWith(SHARD_RECORD_SUFFIX)) {
    return null
  }
  const key = fileName.slice(0, -SHARD_RECORD_SUFFIX.length)
  return key || null
}
