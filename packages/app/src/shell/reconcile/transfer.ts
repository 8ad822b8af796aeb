import { Clock, Effect, Either, Option, pipe, Ref } from "effect"

import { addBytes, emptyStats, increment, type StatsCounter, type TransferStats } from "../../core/stats.js"
import { type StorageAccess, type StorageError, storageError } from "../services/storage.js"
import type { ReconcileParams, TransferContext } from "./types.js"

export interface StatsTracker {
  readonly bump: (counter: StatsCounter, by?: number) => Effect.Effect<void>
  readonly addBytes: (bytes: number) => Effect.Effect<void>
  readonly snapshot: Effect.Effect<TransferStats>
}

/**
 * Mutable counters for one rule run. `snapshot` stamps the elapsed time since
 * the tracker was created.
 */
export const makeStatsTracker: Effect.Effect<StatsTracker> = Effect.gen(function*(_) {
  const startedAt = yield* _(Clock.currentTimeMillis)
  const ref = yield* _(Ref.make(emptyStats))
  return {
    bump: (counter, by = 1) => Ref.update(ref, (stats) => increment(stats, counter, by)),
    addBytes: (bytes) => Ref.update(ref, (stats) => addBytes(stats, bytes)),
    snapshot: Effect.gen(function*(_) {
      const now = yield* _(Clock.currentTimeMillis)
      const stats = yield* _(Ref.get(ref))
      return { ...stats, elapsedMs: now - startedAt }
    })
  }
})

export interface NameCache {
  readonly names: (directory: string) => Effect.Effect<ReadonlySet<string>>
  readonly add: (directory: string, name: string) => Effect.Effect<void>
}

/**
 * Names present in each destination directory. A directory is listed once;
 * names placed afterwards are recorded so previews see them too.
 */
export const makeNameCache = (access: StorageAccess): Effect.Effect<NameCache> =>
  Effect.gen(function*(_) {
    const ref = yield* _(Ref.make<ReadonlyMap<string, ReadonlySet<string>>>(new Map()))

    const names = (directory: string): Effect.Effect<ReadonlySet<string>> =>
      Effect.gen(function*(_) {
        const cached = (yield* _(Ref.get(ref))).get(directory)
        if (cached !== undefined) {
          return cached
        }
        const listed: ReadonlySet<string> = new Set(yield* _(access.list(directory)))
        yield* _(Ref.update(ref, (map) => new Map([...map, [directory, listed]])))
        return listed
      })

    const add = (directory: string, name: string): Effect.Effect<void> =>
      Effect.gen(function*(_) {
        const current = yield* _(names(directory))
        yield* _(Ref.update(ref, (map) => new Map([...map, [directory, new Set([...current, name])]])))
      })

    return { names, add }
  })

/**
 * Makes sure `address` is a directory; succeeds with true when it had to be
 * created (or, in a preview, would be).
 *
 * @invariant never mutates when context.dryRun
 */
export const ensureDirectory = (
  access: StorageAccess,
  address: string,
  context: TransferContext
): Effect.Effect<boolean, StorageError> =>
  Effect.gen(function*(_) {
    const info = yield* _(access.stat(address))
    if (Option.isSome(info)) {
      if (info.value.kind !== "directory") {
        return yield* _(Effect.fail(storageError(address, "Exists and is not a directory")))
      }
      return false
    }
    if (!context.dryRun) {
      yield* _(access.makeDirectory(address, true))
    }
    return true
  })

export interface TransferFailed {
  readonly _tag: "TransferFailed"
  readonly address: string
  readonly reason: string
}

const transferFailed = (address: string, reason: string): TransferFailed => ({
  _tag: "TransferFailed",
  address,
  reason
})

/**
 * How a finished copy is checked at the destination:
 * - `none`: the transport result is trusted
 * - `present`: a file with content, or any file when the source is empty
 * - `non-empty`: a file with content, whatever the source size
 */
export type Verification = "none" | "present" | "non-empty"

export interface FileTransfer {
  readonly sourceAddress: string
  readonly destinationAddress: string
  readonly size: number
  readonly overwrite: boolean
  /** Only meaningful for a local destination. */
  readonly verify: Verification
}

const EMPTY_DESTINATION = "Copy verification failed: destination missing or empty"

/**
 * Copies one file through the transport and checks the destination as
 * `transfer.verify` asks. Under `non-empty` a preview already fails a
 * zero-byte source, since the real copy could never pass.
 *
 * @effect StorageAccess of the transport and destination
 * @invariant a preview succeeds without touching either namespace
 */
export const transferFile = (
  params: ReconcileParams,
  transfer: FileTransfer
): Effect.Effect<void, TransferFailed> =>
  Effect.gen(function*(_) {
    if (params.context.dryRun) {
      if (transfer.verify === "non-empty" && transfer.size === 0) {
        return yield* _(Effect.fail(transferFailed(transfer.sourceAddress, EMPTY_DESTINATION)))
      }
      yield* _(Effect.logDebug(`would copy ${transfer.sourceAddress} -> ${transfer.destinationAddress}`))
      return
    }
    yield* _(
      pipe(
        params.transport.copyFile(transfer.sourceAddress, transfer.destinationAddress, transfer.overwrite),
        Effect.mapError((error) => transferFailed(transfer.sourceAddress, error.reason))
      )
    )
    if (transfer.verify !== "none") {
      const info = yield* _(params.destination.stat(transfer.destinationAddress))
      const emptyAllowed = transfer.verify === "present" && transfer.size === 0
      const verified = Option.exists(info, (entry) => entry.kind === "file" && (entry.size > 0 || emptyAllowed))
      if (!verified) {
        return yield* _(Effect.fail(transferFailed(transfer.sourceAddress, EMPTY_DESTINATION)))
      }
    }
    yield* _(Effect.logDebug(`copied ${transfer.sourceAddress} -> ${transfer.destinationAddress}`))
  })

/** Drops the outcome of a best-effort step, keeping a debug trace of failures. */
export const ignoreOutcome = <A, E>(
  outcome: Either.Either<A, E>,
  describe: (error: E) => string
): Effect.Effect<void> =>
  Either.match(outcome, {
    onLeft: (error) => Effect.logDebug(`ignored: ${describe(error)}`),
    onRight: () => Effect.void
  })
