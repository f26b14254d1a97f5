import boxen from "boxen"
import chalk, { type ChalkInstance } from "chalk"
import cliProgress from "cli-progress"
import Table from "cli-table3"
import ora from "ora"

import type { MergeStep } from "../harvest/run.js"
import type { FetchSummary, ShardProgressEvent } from "../harvest/scheduler.js"
import {
  describeFetchSummary,
  describeMergeStep,
  describeShardFailure,
  type MessageTone,
} from "./messages.js"
import type { CliRenderer, ProgressTracker, RunHeader, SpinnerHandle } from "./types.js"

const TONE_COLORS: Record<MessageTone, ChalkInstance> = {
  ok: chalk.green,
  warn: chalk.yellow,
  error: chalk.red,
  info: chalk.cyan,
}

export class InteractiveRenderer implements CliRenderer {
  header(run: RunHeader): void {
    const body = [
      `${chalk.bold("Task")}          ${run.taskName}`,
      `${chalk.bold("Cache dir")}     ${run.cacheDir}`,
      `${chalk.bold("Output file")}   ${run.outputPath}`,
      `${chalk.bold("Concurrency")}   ${run.concurrency}`,
    ].join("\n")

    console.log(
      boxen(body, {
        title: chalk.bold("App Catalog Harvester"),
        borderColor: "blue",
        padding: 1,
      }),
    )
  }

  step(title: string): void {
    console.log(chalk.cyan(`→ ${title}`))
  }

  createSpinner(text: string): SpinnerHandle {
    const spinner = ora(text).start()
    return {
      update(nextText) {
        spinner.text = nextText
      },
      succeed(finalText) {
        spinner.succeed(finalText)
      },
      fail(finalText) {
        spinner.fail(finalText)
      },
    }
  }

  createProgressTracker(label: string): ProgressTracker {
    let bar: cliProgress.SingleBar | null = null

    return {
      onShard(event) {
        if (bar === null) {
          bar = new cliProgress.SingleBar(
            {
              format: `  {bar} {value}/{total} | ${label} | ok {succeeded} | failed {failed}`,
              hideCursor: true,
              clearOnComplete: false,
            },
            cliProgress.Presets.shades_classic,
          )
          bar.start(event.total, 0, { succeeded: 0, failed: 0 })
        }
        bar.update(event.completed, { succeeded: event.succeeded, failed: event.failed })
      },
      stop() {
        bar?.stop()
        bar = null
      },
    }
  }

  shardFailed(event: ShardProgressEvent): void {
    console.log(chalk.red(`[ERR] ${describeShardFailure(event)}`))
  }

  fetchSummary(summary: FetchSummary): void {
    const table = new Table({
      head: [chalk.bold("Shards"), chalk.bold("Count")],
    })
    table.push(
      ["total", String(summary.total)],
      ["already done", String(summary.alreadyCompleted)],
      ["fetched", chalk.green(String(summary.succeeded))],
      ["failed", summary.failed > 0 ? chalk.red(String(summary.failed)) : "0"],
      ["not started", summary.cancelled > 0 ? chalk.yellow(String(summary.cancelled)) : "0"],
    )
    console.log(table.toString())

    for (const line of describeFetchSummary(summary)) {
      console.log(TONE_COLORS[line.tone](line.text))
    }
  }

  mergeResult(merge: MergeStep): void {
    const line = describeMergeStep(merge)
    console.log(TONE_COLORS[line.tone](line.text))
  }

  logVerbose(scope: string, message: string, elapsedSec: number): void {
    console.log(chalk.gray(`[+${elapsedSec.toFixed(2)}s] [${scope}] ${message}`))
  }

  runComplete(elapsedSeconds: number, outputPath: string): void {
    console.log(
      boxen(`${chalk.bold("Duration")}    ${elapsedSeconds}s\n${chalk.bold("Output")}      ${outputPath}`, {
        title: chalk.green("Done"),
        borderColor: "green",
        padding: 1,
      }),
    )
  }

  warn(message: string): void {
    console.warn(chalk.yellow(message))
  }

  error(message: string): void {
    console.error(chalk.red(message))
  }
}
