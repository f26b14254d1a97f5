import { join } from "node:path"

export interface RunPaths {
  outputDir: string
  shardUrlCacheFile: string
  cacheDir: string
  outputPath: string
}

export const resolveRunPaths = (outputDir: string, taskName: string): RunPaths => ({
  outputDir,
  shardUrlCacheFile: join(outputDir, "sitemaps.txt"),
  cacheDir: join(outputDir, `app_ids_${taskName}`),
  outputPath: join(outputDir, `app_ids_${taskName}.txt`),
})
