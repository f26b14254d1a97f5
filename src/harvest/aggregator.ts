import { mkdir, open, readFile, rename, rm, type FileHandle } from "node:fs/promises"
import { basename, dirname, join } from "node:path"

import { getErrorMessage } from "../utils/errors.js"
import { pathExists } from "../utils/fs.js"
import { MergeError } from "./errors.js"
import { listShardRecordFiles } from "./resume-index.js"

export type MergeOutcome =
  | { status: "merged"; outputPath: string; recordCount: number }
  | { status: "skipped"; outputPath: string }

const temporaryOutputPath = (outputPath: string): string =>
  join(dirname(outputPath), `.${basename(outputPath)}.partial`)

/**
 * Concatenates every shard record, in file name order, into `outputPath`.
 * An existing output is left untouched. Records are appended one at a time to
 * a temporary file that is renamed over the output only once complete.
 */
export const mergeShardRecords = async (
  cacheDir: string,
  outputPath: string,
): Promise<MergeOutcome> => {
  if (await pathExists(outputPath)) {
    return { status: "skipped", outputPath }
  }

  const tempPath = temporaryOutputPath(outputPath)
  let handle: FileHandle | null = null
  try {
    const recordFiles = (await listShardRecordFiles(cacheDir)).sort()
    await mkdir(dirname(outputPath), { recursive: true })
    handle = await open(tempPath, "w")
    for (const fileName of recordFiles) {
      await handle.appendFile(await readFile(join(cacheDir, fileName)))
    }
    await handle.close()
    handle = null
    await rename(tempPath, outputPath)
    return { status: "merged", outputPath, recordCount: recordFiles.length }
  } catch (error) {
    const cleanup = await Promise.allSettled([handle?.close(), rm(tempPath, { force: true })])
    const cleanupFailures = cleanup
      .filter((entry): entry is PromiseRejectedResult => entry.status === "rejected")
      .map((entry) => getErrorMessage(entry.reason))
    const message = [getErrorMessage(error), ...cleanupFailures].join("; cleanup failed: ")
    throw new MergeError(outputPath, message, { cause: error })
  }
}
