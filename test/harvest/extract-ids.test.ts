import { describe, expect, it } from "vitest"

import { collectHrefs, extractIds, MalformedEntryError } from "../../src/harvest/extract-ids.js"
import { loadXmlDocument, XmlParseError } from "../../src/utils/xml.js"
import { PRODUCT_PREFIX, shardXml } from "./fixtures.js"

describe("collectHrefs", () => {
  it("returns every href attribute in document order", () => {
    const $ = loadXmlDocument(`<root>
      <a href="https://one.example.com/"/>
      <group><b href="https://two.example.com/">text</b></group>
      <c src="https://ignored.example.com/"/>
      <d href="https://three.example.com/?x=1&amp;y=2"/>
    </root>`)
    expect(collectHrefs($)).toEqual([
      "https://one.example.com/",
      "https://two.example.com/",
      "https://three.example.com/?x=1&y=2",
    ])
  })

  it("reads namespaced link elements of a sitemap part", () => {
    const $ = loadXmlDocument(shardXml(["com.example.notes"]))
    expect(collectHrefs($)).toEqual([
      `${PRODUCT_PREFIX}/details?id=com.example.notes&hl=en`,
      `${PRODUCT_PREFIX}/details?id=com.example.notes&hl=fr`,
    ])
  })
})

describe("loadXmlDocument", () => {
  it.each([["<urlset><url></urlset>"], ["plain text, not markup"], [""]])(
    "rejects %j",
    (xml) => {
      expect(() => loadXmlDocument(xml)).toThrow(XmlParseError)
    },
  )
})

describe("extractIds", () => {
  const failOptions = { productPrefix: PRODUCT_PREFIX, malformedEntries: "fail" } as const

  it("keeps only product links and their first id value", () => {
    const result = extractIds(
      [
        "https://store.example.com/store/books/details?id=book-1",
        `${PRODUCT_PREFIX}/details?id=100&hl=en`,
        `${PRODUCT_PREFIX}/details?id=200&id=201`,
        "https://elsewhere.example.com/store/apps/details?id=999",
      ],
      failOptions,
    )
    expect(result).toEqual({ ids: ["100", "200"], skippedEntries: 0 })
  })

  it("keeps the first occurrence of a repeated id", () => {
    const result = extractIds(
      [
        `${PRODUCT_PREFIX}/details?id=300&hl=fr`,
        `${PRODUCT_PREFIX}/details?id=100&hl=en`,
        `${PRODUCT_PREFIX}/details?id=300&hl=de`,
      ],
      failOptions,
    )
    expect(result.ids).toEqual(["300", "100"])
  })

  it("decodes the id parameter", () => {
    const result = extractIds([`${PRODUCT_PREFIX}/details?id=com.example%2Bplus`], failOptions)
    expect(result.ids).toEqual(["com.example+plus"])
  })

  it.each([
    [`${PRODUCT_PREFIX}/details?hl=en`],
    [`${PRODUCT_PREFIX}/details?id=&hl=en`],
  ])("fails on a product link without an id: %s", (href) => {
    expect(() => extractIds([`${PRODUCT_PREFIX}/details?id=1`, href], failOptions)).toThrow(
      MalformedEntryError,
    )
  })

  it("skips malformed product links under the skip policy", () => {
    const result = extractIds(
      [
        `${PRODUCT_PREFIX}/details?id=1`,
        `${PRODUCT_PREFIX}/details?hl=en`,
        `${PRODUCT_PREFIX}/details?id=2`,
      ],
      { productPrefix: PRODUCT_PREFIX, malformedEntries: "skip" },
    )
    expect(result).toEqual({ ids: ["1", "2"], skippedEntries: 1 })
  })
})
