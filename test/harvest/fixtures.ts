import { mkdtemp, rm } from "node:fs/promises"
import { tmpdir } from "node:os"
import { join } from "node:path"
import { gzipSync } from "node:zlib"

import type { ShardDownloader } from "../../src/harvest/types.js"

export const PRODUCT_PREFIX = "https://store.example.com/store/apps"
export const SHARD_BASE = "https://static.example.com/sitemaps"

export const shardUrl = (name: string): string => `${SHARD_BASE}/${name}`

export const makeTempDir = async (): Promise<string> =>
  mkdtemp(join(tmpdir(), "app-catalog-harvester-"))

export const cleanTempDir = async (dir: string): Promise<void> => {
  await rm(dir, { recursive: true, force: true })
}

/** A sitemap part with one `<url>` per id and an alternate-language link for each. */
export const shardXml = (ids: readonly string[]): string => {
  const entries = ids
    .map(
      (id) => `
  <url>
    <loc>${PRODUCT_PREFIX}/details?id=${id}</loc>
    <xhtml:link rel="alternate" hreflang="en" href="${PRODUCT_PREFIX}/details?id=${id}&amp;hl=en"/>
    <xhtml:link rel="alternate" hreflang="fr" href="${PRODUCT_PREFIX}/details?id=${id}&amp;hl=fr"/>
  </url>`,
    )
    .join("")
  return `<?xml version="1.0" encoding="UTF-8"?>
<urlset xmlns="http://www.sitemaps.org/schemas/sitemap/0.9" xmlns:xhtml="http://www.w3.org/1999/xhtml">${entries}
</urlset>
`
}

export const gzipText = (text: string): Uint8Array => new Uint8Array(gzipSync(text))

export class StubDownloader implements ShardDownloader {
  readonly requested: string[] = []
  private readonly payloads = new Map<string, Uint8Array | Error>()

  set(url: string, payload: Uint8Array | Error): this {
    this.payloads.set(url, payload)
    return this
  }

  download(url: string): Promise<Uint8Array> {
    this.requested.push(url)
    const payload = this.payloads.get(url)
    if (payload === undefined) {
      return Promise.reject(new Error(`HTTP 404 on GET ${url}`))
    }
    if (payload instanceof Error) {
      return Promise.reject(payload)
    }
    return Promise.resolve(payload)
  }
}
