import { rename, rm, writeFile } from "node:fs/promises"
import { join } from "node:path"

import { getErrorMessage } from "../utils/errors.js"
import { gunzipBytes } from "../utils/gzip.js"
import { httpGetBytes, type HttpRequestConfig } from "../utils/http.js"
import { loadXmlDocument } from "../utils/xml.js"
import { ShardFetchError, type ShardFetchErrorKind } from "./errors.js"
import { collectHrefs, extractIds, type ExtractIdsOptions } from "./extract-ids.js"
import { resolveShardKey, shardRecordFileName, shardRecordPath } from "./shard-name.js"
import type {
  ShardDownloader,
  ShardFailure,
  ShardKey,
  ShardProcessor,
  ShardResult,
  ShardUrl,
} from "./types.js"

export class HttpShardDownloader implements ShardDownloader {
  constructor(private readonly config: HttpRequestConfig) {}

  async download(url: ShardUrl): Promise<Uint8Array> {
    const response = await httpGetBytes(url, this.config)
    return response.body
  }
}

export interface ShardFetcherConfig extends ExtractIdsOptions {
  downloader: ShardDownloader
}

const inStep = async <T>(
  kind: ShardFetchErrorKind,
  url: ShardUrl,
  run: () => T | Promise<T>,
): Promise<T> => {
  try {
    return await run()
  } catch (error) {
    throw new ShardFetchError(kind, url, getErrorMessage(error), { cause: error })
  }
}

const toShardFetchError = (url: ShardUrl, error: unknown): ShardFetchError =>
  error instanceof ShardFetchError
    ? error
    : new ShardFetchError("unexpected", url, getErrorMessage(error), { cause: error })

const temporaryRecordPath = (cacheDir: string, key: ShardKey): string =>
  join(cacheDir, `.${shardRecordFileName(key)}.partial`)

/**
 * Downloads one sitemap shard and turns it into a shard record. The record is
 * renamed into place only once complete, and a failure removes it.
 */
export class ShardFetcher implements ShardProcessor {
  constructor(private readonly config: ShardFetcherConfig) {}

  async fetch(url: ShardUrl, cacheDir: string): Promise<ShardResult> {
    let key: ShardKey
    try {
      key = resolveShardKey(url)
    } catch (error) {
      return {
        ok: false,
        url,
        key: null,
        error: new ShardFetchError("invalid-url", url, getErrorMessage(error), { cause: error }),
      }
    }

    const targetPath = shardRecordPath(cacheDir, key)
    const tempPath = temporaryRecordPath(cacheDir, key)

    try {
      const compressed = await inStep("network", url, () => this.config.downloader.download(url))
      const payload = await inStep("decompress", url, () => gunzipBytes(compressed))
      const $ = await inStep("parse", url, () => loadXmlDocument(payload.toString("utf-8")))
      const { ids, skippedEntries } = await inStep("malformed-entry", url, () =>
        extractIds(collectHrefs($), this.config),
      )
      await inStep("persist", url, async () => {
        await writeFile(tempPath, ids.map((id) => `${id}\n`).join(""), "utf-8")
        await rename(tempPath, targetPath)
      })
      return { ok: true, url, key, idCount: ids.length, skippedEntries }
    } catch (error) {
      return this.fail(url, key, toShardFetchError(url, error), [tempPath, targetPath])
    }
  }

  private async fail(
    url: ShardUrl,
    key: ShardKey,
    error: ShardFetchError,
    leftovers: string[],
  ): Promise<ShardFailure> {
    try {
      await Promise.all(leftovers.map((path) => rm(path, { force: true })))
    } catch (cleanupError) {
      return {
        ok: false,
        url,
        key,
        error: new ShardFetchError(
          "persist",
          url,
          `${error.message}; cleanup failed: ${getErrorMessage(cleanupError)}`,
          { cause: error },
        ),
      }
    }
    return { ok: false, url, key, error }
  }
}
