import type { MergeStep } from "../harvest/run.js"
import type { FetchSummary, ShardProgressEvent } from "../harvest/scheduler.js"
import { describeFetchSummary, describeMergeStep, describeShardFailure } from "./messages.js"
import type { CliRenderer, ProgressTracker, RunHeader, SpinnerHandle } from "./types.js"

export class PlainRenderer implements CliRenderer {
  header(run: RunHeader): void {
    console.log("=== App Catalog Harvester ===")
    console.log(`Task:         ${run.taskName}`)
    console.log(`Cache dir:    ${run.cacheDir}`)
    console.log(`Output file:  ${run.outputPath}`)
    console.log(`Concurrency:  ${run.concurrency}`)
    console.log("")
  }

  step(title: string): void {
    console.log(`${title}...`)
  }

  createSpinner(text: string): SpinnerHandle {
    console.log(`Starting: ${text}`)
    let lastText = text
    return {
      update(nextText) {
        if (nextText !== lastText) {
          console.log(nextText)
          lastText = nextText
        }
      },
      succeed(finalText) {
        console.log(`Done: ${finalText}`)
      },
      fail(finalText) {
        console.log(`Failed: ${finalText}`)
      },
    }
  }

  createProgressTracker(label: string): ProgressTracker {
    let lastBucket = -1

    return {
      onShard(event) {
        // one line per 10% step
        const bucket = Math.floor((event.completed / event.total) * 10)
        if (bucket === lastBucket && event.completed < event.total) {
          return
        }
        lastBucket = bucket
        console.log(
          `[${label}] ${event.completed}/${event.total} ok=${event.succeeded} failed=${event.failed}`,
        )
      },
      stop() {
        // no-op
      },
    }
  }

  shardFailed(event: ShardProgressEvent): void {
    console.log(`[ERR] ${describeShardFailure(event)}`)
  }

  fetchSummary(summary: FetchSummary): void {
    for (const line of describeFetchSummary(summary)) {
      console.log(line.text)
    }
  }

  mergeResult(merge: MergeStep): void {
    console.log(describeMergeStep(merge).text)
  }

  logVerbose(scope: string, message: string, elapsedSec: number): void {
    console.log(`[+${elapsedSec.toFixed(2)}s] [${scope}] ${message}`)
  }

  runComplete(elapsedSeconds: number, outputPath: string): void {
    console.log("")
    console.log("=== Done ===")
    console.log(`Duration: ${elapsedSeconds}s`)
    console.log(`Output:   ${outputPath}`)
  }

  warn(message: string): void {
    console.warn(message)
  }

  error(message: string): void {
    console.error(message)
  }
}
