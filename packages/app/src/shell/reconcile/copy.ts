import { Effect, Either } from "effect"

import { type ConflictExhausted, resolveConflict } from "../../core/conflict.js"
import type { TransferStats } from "../../core/stats.js"
import type { TreeEntry } from "../../core/tree.js"
import type { StorageError } from "../services/storage.js"
import {
  ensureDirectory,
  makeNameCache,
  makeStatsTracker,
  type NameCache,
  type StatsTracker,
  transferFile,
  type Verification
} from "./transfer.js"
import type { ReconcileParams } from "./types.js"
import { listEntries } from "./walker.js"

const forEach = Effect.forEach

interface CopyRun {
  readonly params: ReconcileParams
  readonly tracker: StatsTracker
  readonly names: NameCache
  readonly verify: Verification
  readonly onCopied: (sourceAddress: string) => Effect.Effect<void>
}

const copyFileEntry = (
  run: CopyRun,
  entry: TreeEntry,
  sourceAddress: string,
  destinationDir: string
): Effect.Effect<void, ConflictExhausted> =>
  Effect.gen(function*(_) {
    const { names, params, tracker } = run
    const existing = yield* _(names.names(destinationDir))
    const resolution = yield* _(resolveConflict(existing, entry.name, true))
    if (resolution._tag === "Skip") {
      yield* _(tracker.bump("skipped"))
      return
    }
    if (resolution._tag === "Renamed") {
      yield* _(tracker.bump("renamed"))
      yield* _(Effect.logDebug(`renaming ${entry.name} -> ${resolution.name}`))
    }
    const outcome = yield* _(
      Effect.either(
        transferFile(params, {
          sourceAddress,
          destinationAddress: params.destination.child(destinationDir, resolution.name),
          size: entry.size,
          overwrite: false,
          verify: run.verify
        })
      )
    )
    if (Either.isLeft(outcome)) {
      yield* _(tracker.bump("errors"))
      yield* _(Effect.logWarning(`Failed to copy ${sourceAddress}: ${outcome.left.reason}`))
      return
    }
    yield* _(names.add(destinationDir, resolution.name))
    yield* _(tracker.bump("copied"))
    yield* _(tracker.addBytes(entry.size))
    yield* _(run.onCopied(sourceAddress))
  })

const copyDirectoryEntry = (
  run: CopyRun,
  entry: TreeEntry,
  sourceAddress: string,
  destinationDir: string
): Effect.Effect<void, ConflictExhausted> =>
  Effect.gen(function*(_) {
    const { names, params, tracker } = run
    const target = params.destination.child(destinationDir, entry.name)
    const created = yield* _(Effect.either(ensureDirectory(params.destination, target, params.context)))
    if (Either.isLeft(created)) {
      yield* _(tracker.bump("errors"))
      yield* _(Effect.logWarning(`Skipping ${sourceAddress}: ${created.left.reason}`))
      return
    }
    if (created.right) {
      yield* _(names.add(destinationDir, entry.name))
    }
    yield* _(tracker.bump("folders"))
    yield* _(copyLevel(run, sourceAddress, target))
  })

const copyLevel = (
  run: CopyRun,
  sourceDir: string,
  destinationDir: string
): Effect.Effect<void, ConflictExhausted> =>
  Effect.gen(function*(_) {
    const entries = yield* _(listEntries(run.params.source, sourceDir))
    yield* _(
      forEach(entries, (entry) => {
        const sourceAddress = run.params.source.child(sourceDir, entry.name)
        return entry.kind === "directory"
          ? copyDirectoryEntry(run, entry, sourceAddress, destinationDir)
          : copyFileEntry(run, entry, sourceAddress, destinationDir)
      }, { discard: true })
    )
  })

/**
 * Copies the source tree into the destination, renaming on name clashes.
 * `onCopied` sees the source address of every verified copy, in walk order.
 * Copies into the desktop are checked with `verify`.
 *
 * @effect StorageAccess of source, destination and transport
 * @invariant never removes anything from either namespace
 */
export const copyTree = (
  params: ReconcileParams,
  verify: Verification,
  onCopied: (sourceAddress: string) => Effect.Effect<void>
): Effect.Effect<StatsTracker, StorageError | ConflictExhausted> =>
  Effect.gen(function*(_) {
    const tracker = yield* _(makeStatsTracker)
    const names = yield* _(makeNameCache(params.destination))
    yield* _(ensureDirectory(params.destination, params.destinationRoot, params.context))
    yield* _(copyLevel({ params, tracker, names, verify, onCopied }, params.sourceRoot, params.destinationRoot))
    return tracker
  })

export const reconcileCopy = (
  params: ReconcileParams
): Effect.Effect<TransferStats, StorageError | ConflictExhausted> =>
  Effect.flatMap(copyTree(params, "present", () => Effect.void), (tracker) => tracker.snapshot)
