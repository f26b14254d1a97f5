import { describe, expect, it } from "vitest"

import { InvalidShardUrlError } from "../../src/harvest/errors.js"
import {
  resolveShardKey,
  shardKeyFromFileName,
  shardRecordFileName,
  shardRecordPath,
} from "../../src/harvest/shard-name.js"

describe("resolveShardKey", () => {
  it("uses the final path segment", () => {
    expect(resolveShardKey("https://static.example.com/sitemaps/sitemaps-part-7.xml.gz")).toBe(
      "sitemaps-part-7.xml.gz",
    )
  })

  it("ignores query string and fragment", () => {
    expect(resolveShardKey("https://static.example.com/a/part-1.xml.gz?v=2#top")).toBe(
      "part-1.xml.gz",
    )
  })

  it("is deterministic and injective over distinct part names", () => {
    const urls = Array.from(
      { length: 50 },
      (_, idx) => `https://static.example.com/sitemaps/part-${idx}.xml.gz`,
    )
    const keys = urls.map((url) => resolveShardKey(url))
    expect(new Set(keys).size).toBe(urls.length)
    expect(urls.map((url) => resolveShardKey(url))).toEqual(keys)
  })

  it.each([
    ["not a url"],
    ["https://static.example.com"],
    ["https://static.example.com/"],
    ["https://static.example.com/sitemaps/"],
    ["https://static.example.com/sitemaps/.hidden.xml.gz"],
  ])("rejects %s", (url) => {
    expect(() => resolveShardKey(url)).toThrow(InvalidShardUrlError)
  })
})

describe("shard record file names", () => {
  it("round-trips a key through its file name", () => {
    const fileName = shardRecordFileName("part-1.xml.gz")
    expect(fileName).toBe("part-1.xml.gz.txt")
    expect(shardKeyFromFileName(fileName)).toBe("part-1.xml.gz")
  })

  it("places records in the cache directory", () => {
    expect(shardRecordPath("/tmp/cache", "A.xml.gz")).toBe("/tmp/cache/A.xml.gz.txt")
  })

  it.each([[".A.xml.gz.txt.partial"], [".A.txt"], ["notes.md"], [".txt"]])(
    "does not treat %s as a record",
    (fileName) => {
      expect(shardKeyFromFileName(fileName)).toBeNull()
    },
  )
})
