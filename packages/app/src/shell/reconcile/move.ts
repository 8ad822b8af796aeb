import { Effect, Either, Ref } from "effect"

import type { ConflictExhausted } from "../../core/conflict.js"
import type { TransferStats } from "../../core/stats.js"
import type { StorageAccess, StorageError } from "../services/storage.js"
import { copyTree } from "./copy.js"
import { ignoreOutcome, type StatsTracker } from "./transfer.js"
import type { ReconcileParams } from "./types.js"
import { listEntries } from "./walker.js"

const forEach = Effect.forEach

const deleteSource = (
  params: ReconcileParams,
  tracker: StatsTracker,
  address: string
): Effect.Effect<void> =>
  Effect.gen(function*(_) {
    if (params.context.dryRun) {
      yield* _(Effect.logDebug(`would delete ${address}`))
      yield* _(tracker.bump("deleted"))
      return
    }
    const outcome = yield* _(Effect.either(params.source.remove(address)))
    if (Either.isLeft(outcome)) {
      yield* _(tracker.bump("errors"))
      yield* _(Effect.logWarning(`Failed to delete ${address}: ${outcome.left.reason}`))
      return
    }
    yield* _(Effect.logDebug(`deleted ${address}`))
    yield* _(tracker.bump("deleted"))
  })

/**
 * Removes every empty directory below `root`, deepest first. `root` itself stays.
 *
 * @invariant a directory is removed only after it lists as empty
 */
export const removeEmptySubdirectories = (access: StorageAccess, root: string): Effect.Effect<void> =>
  Effect.gen(function*(_) {
    const entries = yield* _(listEntries(access, root))
    yield* _(
      forEach(
        entries.filter((entry) => entry.kind === "directory"),
        (entry) =>
          Effect.gen(function*(_) {
            const address = access.child(root, entry.name)
            yield* _(removeEmptySubdirectories(access, address))
            const remaining = yield* _(access.list(address))
            if (remaining.length > 0) {
              return
            }
            const outcome = yield* _(Effect.either(access.remove(address)))
            yield* _(ignoreOutcome(outcome, (error: StorageError) => `${error.address}: ${error.reason}`))
          }),
        { discard: true }
      )
    )
  })

/**
 * Copies the source tree, then deletes each source file whose copy was verified,
 * one by one, and prunes the emptied source directories.
 *
 * A zero-byte source file is counted in `errors` and kept on the source.
 *
 * @invariant deleted <= copied; a file whose copy failed stays on the source
 */
export const reconcileMove = (
  params: ReconcileParams
): Effect.Effect<TransferStats, StorageError | ConflictExhausted> =>
  Effect.gen(function*(_) {
    const queue = yield* _(Ref.make<ReadonlyArray<string>>([]))
    const tracker = yield* _(
      copyTree(params, "non-empty", (address) => Ref.update(queue, (queued) => [...queued, address]))
    )
    const verified = yield* _(Ref.get(queue))
    yield* _(forEach(verified, (address) => deleteSource(params, tracker, address), { discard: true }))
    if (!params.context.dryRun) {
      yield* _(removeEmptySubdirectories(params.source, params.sourceRoot))
    }
    return yield* _(tracker.snapshot)
  })
