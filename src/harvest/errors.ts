export type ShardFetchErrorKind =
  | "invalid-url"
  | "network"
  | "decompress"
  | "parse"
  | "malformed-entry"
  | "persist"
  | "unexpected"

export class InvalidShardUrlError extends Error {
  constructor(
    readonly url: string,
    reason: string,
  ) {
    super(`Invalid shard URL ${url}: ${reason}`)
    this.name = "InvalidShardUrlError"
  }
}

export class ShardFetchError extends Error {
  constructor(
    readonly kind: ShardFetchErrorKind,
    readonly url: string,
    message: string,
    options?: ErrorOptions,
  ) {
    super(`[${kind}] ${message}`, options)
    this.name = "ShardFetchError"
  }
}

/** Two distinct shard URLs would write the same record file. */
export class ShardKeyCollisionError extends Error {
  constructor(
    readonly key: string,
    readonly urls: readonly [string, string],
  ) {
    super(`Shard key "${key}" is shared by ${urls[0]} and ${urls[1]}`)
    this.name = "ShardKeyCollisionError"
  }
}

export class MergeError extends Error {
  constructor(
    readonly outputPath: string,
    message: string,
    options?: ErrorOptions,
  ) {
    super(`Could not write ${outputPath}: ${message}`, options)
    this.name = "MergeError"
  }
}
