import * as FileSystem from "@effect/platform/FileSystem"
import * as Path from "@effect/platform/Path"
import * as Schema from "@effect/schema/Schema"
import { Clock, Context, Effect, Either, Layer, Option, pipe } from "effect"

import {
  beginJob,
  type FailedTransfer,
  fromRecord,
  markCopied,
  markFailed,
  type RuleState,
  type StateFile,
  toRecord
} from "../../core/resume.js"

export const STATE_FILE_NAME = "state.json"

export interface StateError {
  readonly _tag: "StateError"
  readonly path: string
  readonly reason: string
}

export const stateError = (pathValue: string, reason: string): StateError => ({
  _tag: "StateError",
  path: pathValue,
  reason
})

const StateFileSchema = Schema.Record({
  key: Schema.String,
  value: Schema.Struct({
    copied: Schema.Array(Schema.String),
    failed: Schema.Array(Schema.Struct({ path: Schema.String, error: Schema.String })),
    status: Schema.Literal("new", "in_progress", "completed"),
    last_run: Schema.NullOr(Schema.String),
    total_files: Schema.Number
  })
})

const decodeStateFile = Schema.decodeUnknownEither(Schema.parseJson(StateFileSchema))

export interface RuleStateStoreShape {
  readonly location: string
  readonly load: (ruleId: string) => Effect.Effect<RuleState>
  readonly begin: (ruleId: string, totalFiles: number) => Effect.Effect<void, StateError>
  readonly markCopied: (ruleId: string, relativePath: string) => Effect.Effect<void, StateError>
  readonly markFailed: (ruleId: string, failure: FailedTransfer) => Effect.Effect<void, StateError>
  readonly complete: (ruleId: string) => Effect.Effect<void, StateError>
  readonly entries: Effect.Effect<ReadonlyArray<readonly [string, RuleState]>>
}

export class RuleStateStore extends Context.Tag("RuleStateStore")<RuleStateStore, RuleStateStoreShape>() {}

const withoutRecord = (file: StateFile, ruleId: string): StateFile =>
  Object.fromEntries(Object.entries(file).filter(([key]) => key !== ruleId))

/**
 * Persists resumable progress in a single JSON document keyed by rule id.
 *
 * Every mutation reads the file, applies one change and writes it back through a
 * temporary file renamed over the previous document.
 *
 * @pure false - filesystem IO
 * @effect FileSystem, Path
 * @invariant an unreadable or malformed document loads as {}
 */
export const makeRuleStateStore = (
  stateDir: string
): Effect.Effect<RuleStateStoreShape, never, FileSystem.FileSystem | Path.Path> =>
  Effect.gen(function*(_) {
    const fs = yield* _(FileSystem.FileSystem)
    const path = yield* _(Path.Path)
    const location = path.join(stateDir, STATE_FILE_NAME)

    const readOutcome: Effect.Effect<Either.Either<StateFile, StateError>> = Effect.gen(function*(_) {
      const exists = yield* _(pipe(fs.exists(location), Effect.orElseSucceed(() => false)))
      if (!exists) {
        return Either.right<StateFile>({})
      }
      const text = yield* _(Effect.either(fs.readFileString(location)))
      return pipe(
        text,
        Either.mapLeft((error) => stateError(location, error.message)),
        Either.flatMap((content) =>
          pipe(
            decodeStateFile(content),
            Either.mapLeft((error) => stateError(location, error.message))
          )
        )
      )
    })

    const readAll: Effect.Effect<StateFile> = pipe(
      readOutcome,
      Effect.flatMap(Either.match({
        onLeft: (error) =>
          pipe(
            Effect.logWarning(`Ignoring unreadable state file ${error.path}: ${error.reason}`),
            Effect.as<StateFile>({})
          ),
        onRight: (file) => Effect.succeed(file)
      }))
    )

    const writeAll = (file: StateFile): Effect.Effect<void, StateError> => {
      const temporary = `${location}.tmp`
      return pipe(
        fs.makeDirectory(stateDir, { recursive: true }),
        Effect.zipRight(fs.writeFileString(temporary, `${JSON.stringify(file, null, 2)}\n`)),
        Effect.zipRight(fs.rename(temporary, location)),
        Effect.tapError(() =>
          pipe(
            fs.remove(temporary),
            Effect.catchAll((error) => Effect.logDebug(`Cannot remove ${temporary}: ${error.message}`))
          )
        ),
        Effect.mapError((error) => stateError(location, error.message))
      )
    }

    const update = (
      ruleId: string,
      change: (state: RuleState) => Option.Option<RuleState>
    ): Effect.Effect<void, StateError> =>
      Effect.gen(function*(_) {
        const file = yield* _(readAll)
        const next = change(fromRecord(file[ruleId]))
        const now = new Date(yield* _(Clock.currentTimeMillis)).toISOString()
        const updated = Option.match(next, {
          onNone: () => withoutRecord(file, ruleId),
          onSome: (state) => ({ ...file, [ruleId]: toRecord(state, now) })
        })
        yield* _(writeAll(updated))
      })

    return {
      location,
      load: (ruleId) => Effect.map(readAll, (file) => fromRecord(file[ruleId])),
      begin: (ruleId, totalFiles) => update(ruleId, (state) => Option.some(beginJob(state, totalFiles))),
      markCopied: (ruleId, relativePath) => update(ruleId, (state) => Option.some(markCopied(state, relativePath))),
      markFailed: (ruleId, failure) => update(ruleId, (state) => Option.some(markFailed(state, failure))),
      complete: (ruleId) => update(ruleId, () => Option.none()),
      entries: Effect.map(
        readAll,
        (file) => Object.keys(file).sort().map((ruleId) => [ruleId, fromRecord(file[ruleId])] as const)
      )
    }
  })

export const RuleStateStoreLive = (stateDir: string) => Layer.effect(RuleStateStore, makeRuleStateStore(stateDir))
