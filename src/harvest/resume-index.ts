import { readdir } from "node:fs/promises"

import { isMissingPathError } from "../utils/errors.js"
import { shardKeyFromFileName } from "./shard-name.js"
import type { ShardKey } from "./types.js"

/** Record file names in `cacheDir`, unordered. A missing directory has none. */
export const listShardRecordFiles = async (cacheDir: string): Promise<string[]> => {
  try {
    const entries = await readdir(cacheDir, { withFileTypes: true })
    return entries
      .filter((entry) => entry.isFile() && shardKeyFromFileName(entry.name) !== null)
      .map((entry) => entry.name)
  } catch (error: unknown) {
    if (isMissingPathError(error)) {
      return []
    }
    throw error
  }
}

export const completedShardKeys = async (cacheDir: string): Promise<Set<ShardKey>> => {
  const keys = new Set<ShardKey>()
  for (const fileName of await listShardRecordFiles(cacheDir)) {
    const key = shardKeyFromFileName(fileName)
    if (key !== null) {
      keys.add(key)
    }
  }
  return keys
}
