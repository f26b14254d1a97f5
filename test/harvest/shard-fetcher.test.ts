import { existsSync } from "node:fs"
import { readdir, readFile, writeFile } from "node:fs/promises"
import { join } from "node:path"

import { afterEach, beforeEach, describe, expect, it } from "vitest"

import type { ShardFetchErrorKind } from "../../src/harvest/errors.js"
import { ShardFetcher } from "../../src/harvest/shard-fetcher.js"
import type { MalformedEntryPolicy, ShardResult } from "../../src/harvest/types.js"
import {
  cleanTempDir,
  gzipText,
  makeTempDir,
  PRODUCT_PREFIX,
  shardUrl,
  shardXml,
  StubDownloader,
} from "./fixtures.js"

const makeFetcher = (downloader: StubDownloader, malformedEntries: MalformedEntryPolicy = "fail") =>
  new ShardFetcher({ downloader, productPrefix: PRODUCT_PREFIX, malformedEntries })

const expectFailureKind = (result: ShardResult, kind: ShardFetchErrorKind): void => {
  expect(result.ok).toBe(false)
  if (!result.ok) {
    expect(result.error.kind).toBe(kind)
  }
}

describe("ShardFetcher", () => {
  let cacheDir: string

  beforeEach(async () => {
    cacheDir = await makeTempDir()
  })

  afterEach(async () => {
    await cleanTempDir(cacheDir)
  })

  it("writes one id per line to the shard record", async () => {
    const url = shardUrl("A.xml.gz")
    const downloader = new StubDownloader().set(url, gzipText(shardXml(["100", "200"])))

    const result = await makeFetcher(downloader).fetch(url, cacheDir)

    expect(result).toEqual({ ok: true, url, key: "A.xml.gz", idCount: 2, skippedEntries: 0 })
    expect(await readFile(join(cacheDir, "A.xml.gz.txt"), "utf-8")).toBe("100\n200\n")
    expect(await readdir(cacheDir)).toEqual(["A.xml.gz.txt"])
  })

  it("writes an empty record for a shard without product links", async () => {
    const url = shardUrl("empty.xml.gz")
    const downloader = new StubDownloader().set(url, gzipText(shardXml([])))

    const result = await makeFetcher(downloader).fetch(url, cacheDir)

    expect(result.ok).toBe(true)
    expect(await readFile(join(cacheDir, "empty.xml.gz.txt"), "utf-8")).toBe("")
  })

  it("overwrites an existing record", async () => {
    const url = shardUrl("A.xml.gz")
    await writeFile(join(cacheDir, "A.xml.gz.txt"), "stale\n", "utf-8")
    const downloader = new StubDownloader().set(url, gzipText(shardXml(["100"])))

    await makeFetcher(downloader).fetch(url, cacheDir)

    expect(await readFile(join(cacheDir, "A.xml.gz.txt"), "utf-8")).toBe("100\n")
  })

  it("makes a single download attempt", async () => {
    const url = shardUrl("A.xml.gz")
    const downloader = new StubDownloader().set(url, new Error("socket hang up"))

    const result = await makeFetcher(downloader).fetch(url, cacheDir)

    expectFailureKind(result, "network")
    expect(downloader.requested).toEqual([url])
  })

  it.each<[string, Uint8Array, ShardFetchErrorKind]>([
    ["decompress", new TextEncoder().encode(shardXml(["100"])), "decompress"],
    ["parse", gzipText("<urlset><url></urlset>"), "parse"],
    [
      "malformed-entry",
      gzipText(`<urlset><url><link href="${PRODUCT_PREFIX}/details?id=1"/><link href="${PRODUCT_PREFIX}/details?hl=en"/></url></urlset>`),
      "malformed-entry",
    ],
  ])("reports a %s failure and leaves no record", async (_label, payload, kind) => {
    const url = shardUrl("C.xml.gz")
    const downloader = new StubDownloader().set(url, payload)

    const result = await makeFetcher(downloader).fetch(url, cacheDir)

    expectFailureKind(result, kind)
    expect(await readdir(cacheDir)).toEqual([])
  })

  it("removes a previous record when a refetch fails", async () => {
    const url = shardUrl("A.xml.gz")
    await writeFile(join(cacheDir, "A.xml.gz.txt"), "100\n", "utf-8")
    const downloader = new StubDownloader().set(url, gzipText("not xml"))

    const result = await makeFetcher(downloader).fetch(url, cacheDir)

    expectFailureKind(result, "parse")
    expect(existsSync(join(cacheDir, "A.xml.gz.txt"))).toBe(false)
  })

  it("keeps the valid ids when malformed entries are skipped", async () => {
    const url = shardUrl("C.xml.gz")
    const xml = `<urlset>
      <link href="${PRODUCT_PREFIX}/details?id=1"/>
      <link href="${PRODUCT_PREFIX}/details?hl=en"/>
      <link href="${PRODUCT_PREFIX}/details?id=2"/>
    </urlset>`
    const downloader = new StubDownloader().set(url, gzipText(xml))

    const result = await makeFetcher(downloader, "skip").fetch(url, cacheDir)

    expect(result).toEqual({ ok: true, url, key: "C.xml.gz", idCount: 2, skippedEntries: 1 })
    expect(await readFile(join(cacheDir, "C.xml.gz.txt"), "utf-8")).toBe("1\n2\n")
  })

  it("reports a persist failure when the cache directory is unusable", async () => {
    const url = shardUrl("A.xml.gz")
    const notADirectory = join(cacheDir, "cache-file")
    await writeFile(notADirectory, "", "utf-8")
    const downloader = new StubDownloader().set(url, gzipText(shardXml(["100"])))

    const result = await makeFetcher(downloader).fetch(url, notADirectory)

    expectFailureKind(result, "persist")
    expect(existsSync(join(notADirectory, "A.xml.gz.txt"))).toBe(false)
  })

  it("rejects a URL without a shard key before downloading", async () => {
    const url = "https://static.example.com/sitemaps/"
    const downloader = new StubDownloader()

    const result = await makeFetcher(downloader).fetch(url, cacheDir)

    expectFailureKind(result, "invalid-url")
    expect(result.ok ? null : result.key).toBeNull()
    expect(downloader.requested).toEqual([])
  })
})
