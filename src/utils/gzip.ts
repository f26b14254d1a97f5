import { gunzip } from "node:zlib"
import { promisify } from "node:util"

const gunzipAsync = promisify(gunzip)

const GZIP_MAGIC = [0x1f, 0x8b] as const

export const isGzip = (bytes: Uint8Array): boolean =>
  bytes.length >= 2 && bytes[0] === GZIP_MAGIC[0] && bytes[1] === GZIP_MAGIC[1]

export const gunzipBytes = async (bytes: Uint8Array): Promise<Buffer> => gunzipAsync(bytes)

/**
 * Sitemap indexes are served either plain or gzip-compressed (with or without
 * a matching content-encoding), so sniff the payload instead of trusting headers.
 */
export const gunzipIfCompressed = async (bytes: Uint8Array): Promise<Buffer> =>
  isGzip(bytes) ? gunzipBytes(bytes) : Buffer.from(bytes)
