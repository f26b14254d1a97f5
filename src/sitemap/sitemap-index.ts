import { readFile, rename, rm, writeFile } from "node:fs/promises"
import { basename, dirname, join } from "node:path"

import { throwIfAborted } from "../utils/cancel.js"
import { isMissingPathError } from "../utils/errors.js"
import { gunzipIfCompressed } from "../utils/gzip.js"
import { httpGetBytes, type HttpRequestConfig } from "../utils/http.js"
import { loadXmlDocument } from "../utils/xml.js"
import { fetchRobotsSitemaps } from "./robots.js"

export interface ResolveShardUrlsOptions {
  /** Trusted as-is when present; written after a live resolution. */
  cacheFile: string
  robotsUrl: string
  http: HttpRequestConfig
  signal?: AbortSignal
  onIndexFetched?: (done: number, total: number, indexUrl: string) => void
}

export interface ResolvedShardUrls {
  urls: Set<string>
  source: "cache" | "live"
}

/** `<loc>` entries of a `<sitemapindex>` document. */
export const parseSitemapIndex = (xml: string): string[] => {
  const $ = loadXmlDocument(xml)
  return $("sitemap > loc")
    .toArray()
    .map((element) => $(element).text().trim())
    .filter((loc) => loc.length > 0)
}

export const readShardUrlCache = async (cacheFile: string): Promise<Set<string> | null> => {
  let content: string
  try {
    content = await readFile(cacheFile, "utf-8")
  } catch (error: unknown) {
    if (isMissingPathError(error)) {
      return null
    }
    throw error
  }
  return new Set(
    content
      .split(/\r?\n/)
      .map((line) => line.trim())
      .filter((line) => line.length > 0),
  )
}

/** Written beside the cache and renamed over it, since any cache file present is trusted. */
export const writeShardUrlCache = async (
  cacheFile: string,
  urls: ReadonlySet<string>,
): Promise<void> => {
  const lines = [...urls].sort().map((url) => `${url}\n`)
  const tempPath = join(dirname(cacheFile), `.${basename(cacheFile)}.partial`)
  try {
    await writeFile(tempPath, lines.join(""), "utf-8")
    await rename(tempPath, cacheFile)
  } catch (error) {
    await rm(tempPath, { force: true, recursive: true })
    throw error
  }
}

const fetchSitemapIndex = async (
  indexUrl: string,
  http: HttpRequestConfig,
  signal?: AbortSignal,
): Promise<string[]> => {
  const response = await httpGetBytes(indexUrl, http, signal)
  const payload = await gunzipIfCompressed(response.body)
  return parseSitemapIndex(payload.toString("utf-8"))
}

export const resolveShardUrls = async (
  options: ResolveShardUrlsOptions,
): Promise<ResolvedShardUrls> => {
  const cached = await readShardUrlCache(options.cacheFile)
  if (cached !== null) {
    return { urls: cached, source: "cache" }
  }

  const indexUrls = await fetchRobotsSitemaps(options.robotsUrl, options.http, options.signal)
  if (indexUrls.length === 0) {
    throw new Error(`No Sitemap directive in ${options.robotsUrl}`)
  }
  const urls = new Set<string>()
  for (const [index, indexUrl] of indexUrls.entries()) {
    throwIfAborted(options.signal)
    for (const loc of await fetchSitemapIndex(indexUrl, options.http, options.signal)) {
      urls.add(loc)
    }
    options.onIndexFetched?.(index + 1, indexUrls.length, indexUrl)
  }

  await writeShardUrlCache(options.cacheFile, urls)
  return { urls, source: "live" }
}
