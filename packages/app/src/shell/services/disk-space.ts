import * as Path from "@effect/platform/Path"
import { Context, Effect, Layer, Option, pipe } from "effect"
import { statfs } from "node:fs/promises"

export class DiskSpace extends Context.Tag("DiskSpace")<
  DiskSpace,
  {
    readonly freeBytes: (pathValue: string) => Effect.Effect<Option.Option<number>>
  }
>() {}

const statFree = (pathValue: string): Effect.Effect<number, Error> =>
  Effect.tryPromise({
    try: () => statfs(pathValue),
    catch: (error) => error instanceof Error ? error : new Error(String(error))
  }).pipe(Effect.map((stats) => stats.bavail * stats.bsize))

/**
 * Free space on the filesystem holding `pathValue`. A destination that does not
 * exist yet is measured at its closest existing ancestor.
 *
 * @pure false - queries the filesystem
 * @invariant None only when no ancestor can be measured
 */
export const DiskSpaceLive = Layer.effect(
  DiskSpace,
  Effect.gen(function*(_) {
    const path = yield* _(Path.Path)

    const measure = (pathValue: string): Effect.Effect<Option.Option<number>> =>
      pipe(
        statFree(pathValue),
        Effect.map(Option.some),
        Effect.catchAll(() => {
          const parent = path.dirname(pathValue)
          return parent === pathValue ? Effect.succeed(Option.none<number>()) : measure(parent)
        })
      )

    return { freeBytes: (pathValue: string) => measure(path.resolve(pathValue)) }
  })
)
