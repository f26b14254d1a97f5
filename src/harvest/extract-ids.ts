import type { CheerioAPI } from "cheerio"

import type { MalformedEntryPolicy } from "./types.js"

export const DEFAULT_PRODUCT_PREFIX = "https://play.google.com/store/apps"

export interface ExtractIdsOptions {
  productPrefix: string
  malformedEntries: MalformedEntryPolicy
}

export interface ExtractedIds {
  ids: string[]
  skippedEntries: number
}

export class MalformedEntryError extends Error {
  constructor(
    readonly href: string,
    reason: string,
  ) {
    super(`${reason}: ${href}`)
    this.name = "MalformedEntryError"
  }
}

/** Every `href` attribute in the document, in document order. */
export const collectHrefs = ($: CheerioAPI): string[] =>
  $("[href]")
    .toArray()
    .map((element) => $(element).attr("href"))
    .filter((href): href is string => typeof href === "string")

const readIdParam = (href: string): string => {
  let url: URL
  try {
    url = new URL(href)
  } catch {
    throw new MalformedEntryError(href, "Product link is not a URL")
  }
  const id = url.searchParams.get("id")
  if (!id) {
    throw new MalformedEntryError(href, "Product link has no id parameter")
  }
  return id
}

/**
 * Ids of product links, first occurrence wins. Alternate-language links of
 * one product repeat its id, so the same id is only kept once per shard.
 */
export const extractIds = (hrefs: readonly string[], options: ExtractIdsOptions): ExtractedIds => {
  const seen = new Set<string>()
  const ids: string[] = []
  let skippedEntries = 0

  for (const href of hrefs) {
    if (!href.startsWith(options.productPrefix)) {
      continue
    }
    let id: string
    try {
      id = readIdParam(href)
    } catch (error) {
      if (options.malformedEntries === "skip" && error instanceof MalformedEntryError) {
        skippedEntries += 1
        continue
      }
      throw error
    }
    if (!seen.has(id)) {
      seen.add(id)
      ids.push(id)
    }
  }

  return { ids, skippedEntries }
}
