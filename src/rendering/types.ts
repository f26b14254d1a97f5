import type { MergeStep } from "../harvest/run.js"
import type { FetchSummary, ShardProgressEvent } from "../harvest/scheduler.js"

export type VerboseLog = (scope: string, message: string) => void

export interface RunHeader {
  taskName: string
  cacheDir: string
  outputPath: string
  concurrency: number
}

export interface SpinnerHandle {
  update(text: string): void
  succeed(text: string): void
  fail(text: string): void
}

export interface ProgressTracker {
  onShard(event: ShardProgressEvent): void
  stop(): void
}

export interface CliRenderer {
  header(run: RunHeader): void
  step(title: string): void
  createSpinner(text: string): SpinnerHandle
  /** The bar is sized from the first event, so nothing shows for an empty batch. */
  createProgressTracker(label: string): ProgressTracker
  shardFailed(event: ShardProgressEvent): void
  fetchSummary(summary: FetchSummary): void
  mergeResult(merge: MergeStep): void
  logVerbose(scope: string, message: string, elapsedSec: number): void
  runComplete(elapsedSeconds: number, outputPath: string): void
  warn(message: string): void
  error(message: string): void
}
