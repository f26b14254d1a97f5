import type { MergeStep } from "../harvest/run.js"
import type { FetchSummary, ShardProgressEvent } from "../harvest/scheduler.js"

export type MessageTone = "ok" | "warn" | "error" | "info"

export interface SummaryLine {
  tone: MessageTone
  text: string
}

// Shared by both renderers so the wording stays identical in plain and interactive mode.
export const describeFetchSummary = (summary: FetchSummary): SummaryLine[] => {
  const lines: SummaryLine[] = []
  if (summary.dispatched === 0) {
    lines.push({
      tone: "info",
      text: `Nothing to fetch: all ${summary.alreadyCompleted} shard(s) already have records`,
    })
    return lines
  }
  if (summary.failed > 0) {
    lines.push({
      tone: "error",
      text: `${summary.failed} of ${summary.dispatched} shard(s) failed. Re-run to retry only the failed or missing shards.`,
    })
  } else if (summary.cancelled === 0) {
    lines.push({ tone: "ok", text: `All ${summary.dispatched} shard(s) fetched` })
  }
  if (summary.cancelled > 0) {
    lines.push({
      tone: "warn",
      text: `${summary.cancelled} shard(s) not started (interrupted); they stay pending for the next run`,
    })
  }
  return lines
}

export const describeMergeStep = (merge: MergeStep): SummaryLine => {
  switch (merge.status) {
    case "merged":
      return {
        tone: "ok",
        text: `Merged ${merge.recordCount} shard record(s) into ${merge.outputPath}`,
      }
    case "skipped":
      return { tone: "info", text: `${merge.outputPath} already exists, merge skipped` }
    case "deferred":
      return {
        tone: "warn",
        text:
          merge.reason === "failures"
            ? "Merge deferred until every shard has a record (or re-run with --merge-with-failures)"
            : "Merge deferred: run was interrupted",
      }
    case "failed":
      return { tone: "error", text: `Merge failed: ${merge.error.message}` }
  }
}

export const describeShardFailure = (event: ShardProgressEvent): string => {
  if (event.result === null || event.result.ok) {
    return `${event.url}: ${event.status}`
  }
  return `${event.url}: ${event.result.error.message}`
}
