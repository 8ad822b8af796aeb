import { Effect, Either, Ref } from "effect"

import { resolveConflict } from "../../core/conflict.js"
import { remainingFiles } from "../../core/resume.js"
import type { TransferStats } from "../../core/stats.js"
import { relativeSegments, type TreeEntry } from "../../core/tree.js"
import type { StorageError } from "../services/storage.js"
import type { RuleStateStoreShape, StateError } from "../state/rule-state-store.js"
import { ensureDirectory, makeNameCache, makeStatsTracker, type NameCache, type StatsTracker, transferFile } from "./transfer.js"
import type { ReconcileParams } from "./types.js"
import { addressOf, walkFiles } from "./walker.js"

const forEach = Effect.forEach

interface ResumableRun {
  readonly params: ReconcileParams
  readonly store: RuleStateStoreShape
  readonly ruleId: string
  readonly tracker: StatsTracker
  readonly names: NameCache
  readonly failures: Ref.Ref<number>
}

const parentOf = (relativePath: string): string => relativeSegments(relativePath).slice(0, -1).join("/")

const backupFile = (run: ResumableRun, entry: TreeEntry): Effect.Effect<void, StateError> =>
  Effect.gen(function*(_) {
    const { names, params, store, tracker } = run
    const { context } = params
    const fail = (reason: string) =>
      Effect.gen(function*(_) {
        yield* _(tracker.bump("errors"))
        yield* _(Ref.update(run.failures, (count) => count + 1))
        yield* _(Effect.logWarning(`Failed to back up ${entry.relativePath}: ${reason}`))
        if (!context.dryRun) {
          yield* _(store.markFailed(run.ruleId, { path: entry.relativePath, error: reason }))
        }
      })

    const destinationDir = addressOf(params.destination, params.destinationRoot, parentOf(entry.relativePath))
    const prepared = yield* _(Effect.either(ensureDirectory(params.destination, destinationDir, context)))
    if (Either.isLeft(prepared)) {
      return yield* _(fail(prepared.left.reason))
    }

    const existing = yield* _(names.names(destinationDir))
    const resolution = resolveConflict(existing, entry.name, false)
    if (Either.isLeft(resolution) || resolution.right._tag !== "Unchanged") {
      yield* _(Effect.logDebug(`already present, skipping ${entry.relativePath}`))
      yield* _(tracker.bump("skipped"))
      return
    }

    const outcome = yield* _(
      Effect.either(
        transferFile(params, {
          sourceAddress: addressOf(params.source, params.sourceRoot, entry.relativePath),
          destinationAddress: params.destination.child(destinationDir, entry.name),
          size: entry.size,
          overwrite: false,
          verify: "present"
        })
      )
    )
    if (Either.isLeft(outcome)) {
      return yield* _(fail(outcome.left.reason))
    }
    yield* _(names.add(destinationDir, entry.name))
    yield* _(tracker.bump("copied"))
    yield* _(tracker.addBytes(entry.size))
    if (!context.dryRun) {
      yield* _(store.markCopied(run.ruleId, entry.relativePath))
    }
  })

/**
 * Copies device files to the desktop, recording each transferred file so an
 * interrupted run continues where it stopped.
 *
 * Files already recorded count as skipped, as do files whose name is already
 * taken at the destination (those are not recorded). A run that finishes with
 * no new failures deletes the rule's record.
 *
 * @effect StorageAccess of source, destination and transport; the progress store
 * @invariant a preview reads progress but never writes it
 */
export const reconcileResumable = (
  params: ReconcileParams,
  store: RuleStateStoreShape,
  ruleId: string
): Effect.Effect<TransferStats, StorageError | StateError> =>
  Effect.gen(function*(_) {
    const tracker = yield* _(makeStatsTracker)
    const names = yield* _(makeNameCache(params.destination))
    const failures = yield* _(Ref.make(0))
    const candidates = yield* _(walkFiles(params.source, params.sourceRoot))
    const state = yield* _(store.load(ruleId))
    const remaining = new Set(remainingFiles(candidates.map((entry) => entry.relativePath), state.copied))
    const pending = candidates.filter((entry) => remaining.has(entry.relativePath))

    yield* _(tracker.bump("skipped", candidates.length - pending.length))
    yield* _(Effect.logDebug(`${pending.length} of ${candidates.length} files remaining`))

    if (!params.context.dryRun) {
      yield* _(store.begin(ruleId, candidates.length))
    }
    yield* _(ensureDirectory(params.destination, params.destinationRoot, params.context))

    const run: ResumableRun = { params, store, ruleId, tracker, names, failures }
    yield* _(forEach(pending, (entry) => backupFile(run, entry), { discard: true }))

    const newFailures = yield* _(Ref.get(failures))
    if (!params.context.dryRun && newFailures === 0) {
      yield* _(store.complete(ruleId))
    }
    return yield* _(tracker.snapshot)
  })
