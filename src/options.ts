import { Command } from "commander"
import { z } from "zod"

import type { EnvConfig } from "./config.js"
import { DEFAULT_PRODUCT_PREFIX } from "./harvest/extract-ids.js"
import { DEFAULT_CONCURRENCY } from "./harvest/scheduler.js"
import type { MalformedEntryPolicy } from "./harvest/types.js"
import { DEFAULT_ROBOTS_URL } from "./sitemap/robots.js"

export const DEFAULT_TIMEOUT_MS = 60_000
export const DEFAULT_USER_AGENT = "app-catalog-harvester/0.1"

export interface CliOptions {
  outputDir: string
  task: string
  concurrency: number
  robotsUrl: string
  productPrefix: string
  malformedEntries: MalformedEntryPolicy
  mergeWithFailures: boolean
  timeoutMs: number
  userAgent: string
  plain: boolean
  verbose: boolean
}

export const createProgram = (env: EnvConfig): Command => {
  const program = new Command()
  program
    .name("app-catalog-harvester")
    .description("Collect application ids from a sharded sitemap, resuming earlier runs")
    .option("--output-dir <path>", "Output directory", "output")
    .option("--task <name>", "Task name; selects the cache directory and output file", "main")
    .option("--concurrency <number>", "Number of shards fetched in parallel", String(DEFAULT_CONCURRENCY))
    .option("--robots-url <url>", "robots.txt listing the sitemap indexes", env.robotsUrl ?? DEFAULT_ROBOTS_URL)
    .option(
      "--product-prefix <prefix>",
      "Links starting with this prefix carry an app id",
      env.productPrefix ?? DEFAULT_PRODUCT_PREFIX,
    )
    .option("--malformed-entries <policy>", "fail: reject the shard, skip: drop the entry", "fail")
    .option(
      "--merge-with-failures",
      "Write the output even if some shards failed; the output is never rebuilt afterwards",
      false,
    )
    .option("--timeout-ms <number>", "HTTP timeout per request", String(DEFAULT_TIMEOUT_MS))
    .option("--user-agent <ua>", "User-Agent header", env.userAgent ?? DEFAULT_USER_AGENT)
    .option("--plain", "Plain console output (default when stdout is not a TTY)", false)
    .option("--verbose", "Log timings and every failed shard", false)
  return program
}

const absoluteUrl = (message: string) =>
  z.string().refine((value) => URL.canParse(value), { message })

const positiveInt = (max: number) =>
  z
    .union([z.string(), z.number()])
    .transform((v) => Number(v))
    .pipe(z.number().int().min(1).max(max))

export const cliOptionsSchema = z.object({
  outputDir: z.string().min(1),
  task: z.string().regex(/^[A-Za-z0-9_-]+$/, "Task name may only use letters, digits, - and _"),
  concurrency: positiveInt(64),
  robotsUrl: absoluteUrl("robots.txt URL must be absolute"),
  productPrefix: absoluteUrl("Product prefix must be an absolute URL"),
  malformedEntries: z.enum(["fail", "skip"]),
  mergeWithFailures: z.boolean(),
  timeoutMs: positiveInt(600_000),
  userAgent: z.string().min(1),
  plain: z.boolean(),
  verbose: z.boolean(),
})

export const parseOptions = (program: Command): CliOptions => {
  const opts = program.opts<Record<string, unknown>>()
  const parsed = cliOptionsSchema.safeParse({
    outputDir: opts["outputDir"],
    task: opts["task"],
    concurrency: opts["concurrency"],
    robotsUrl: opts["robotsUrl"],
    productPrefix: opts["productPrefix"],
    malformedEntries: opts["malformedEntries"],
    mergeWithFailures: opts["mergeWithFailures"] ?? false,
    timeoutMs: opts["timeoutMs"],
    userAgent: opts["userAgent"],
    plain: opts["plain"] ?? false,
    verbose: opts["verbose"] ?? false,
  })
  if (!parsed.success) {
    const issue = parsed.error.issues[0]
    const path = issue.path.join(".")
    throw new Error(`Invalid option${path ? ` (${path})` : ""}: ${issue.message}`)
  }
  return parsed.data
}
