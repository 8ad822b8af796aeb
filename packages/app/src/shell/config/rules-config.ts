import * as FileSystem from "@effect/platform/FileSystem"
import * as Schema from "@effect/schema/Schema"
import { Effect, Either, Option, pipe } from "effect"

import type { Profile, RuleMode } from "../../core/rule.js"

export interface ConfigError {
  readonly _tag: "ConfigError"
  readonly reason: string
}

export const configError = (reason: string): ConfigError => ({
  _tag: "ConfigError",
  reason
})

const RuleModeSchema = Schema.Literal("copy", "move", "sync", "resumable-backup")

// older rule files call the resumable mode "smart_copy"
const ModeSchema = Schema.transform(
  Schema.Literal("copy", "move", "sync", "resumable-backup", "smart_copy"),
  RuleModeSchema,
  {
    strict: true,
    decode: (mode): RuleMode => mode === "smart_copy" ? "resumable-backup" : mode,
    encode: (mode) => mode
  }
)

const RuleSchema = Schema.Struct({
  id: Schema.NonEmptyString,
  mode: ModeSchema,
  devicePath: Schema.propertySignature(Schema.String).pipe(Schema.fromKey("phone_path")),
  desktopPath: Schema.propertySignature(Schema.String).pipe(Schema.fromKey("desktop_path")),
  manualOnly: Schema.optionalWith(Schema.Boolean, { default: () => false }).pipe(Schema.fromKey("manual_only"))
})

const DeviceSchema = Schema.Struct({
  displayName: Schema.optionalWith(Schema.String, { default: () => "" }).pipe(Schema.fromKey("display_name")),
  activationUri: Schema.propertySignature(Schema.String).pipe(Schema.fromKey("activation_uri"))
})

const ProfileSchema = Schema.Struct({
  name: Schema.NonEmptyString,
  device: DeviceSchema,
  rules: Schema.Array(RuleSchema)
})

export const MirrorConfigSchema = Schema.Struct({
  version: Schema.optionalWith(Schema.Number, { default: () => 1 }),
  profiles: Schema.Array(ProfileSchema)
})

export type MirrorConfig = Schema.Schema.Type<typeof MirrorConfigSchema>

const decodeConfig = Schema.decodeUnknownEither(Schema.parseJson(MirrorConfigSchema))

const duplicateIds = (profile: Profile): ReadonlyArray<string> => {
  const seen = new Set<string>()
  const duplicates = new Set<string>()
  for (const rule of profile.rules) {
    if (seen.has(rule.id)) {
      duplicates.add(rule.id)
    }
    seen.add(rule.id)
  }
  return [...duplicates]
}

/**
 * Decodes the text of a rules file.
 *
 * @pure true
 * @invariant Right implies rule ids are unique inside each profile
 */
export const parseConfig = (text: string): Either.Either<MirrorConfig, ConfigError> =>
  pipe(
    decodeConfig(text),
    Either.mapLeft((error) => configError(`Invalid rules file: ${error.message}`)),
    Either.flatMap((config) => {
      for (const profile of config.profiles) {
        const duplicates = duplicateIds(profile)
        if (duplicates.length > 0) {
          return Either.left(
            configError(`Profile "${profile.name}" repeats rule id(s): ${duplicates.join(", ")}`)
          )
        }
      }
      return Either.right(config)
    })
  )

export const loadConfig = (
  configPath: string
): Effect.Effect<MirrorConfig, ConfigError, FileSystem.FileSystem> =>
  Effect.gen(function*(_) {
    const fs = yield* _(FileSystem.FileSystem)
    const exists = yield* _(pipe(fs.exists(configPath), Effect.orElseSucceed(() => false)))
    if (!exists) {
      return yield* _(Effect.fail(configError(`Rules file not found: ${configPath}`)))
    }
    const text = yield* _(
      pipe(
        fs.readFileString(configPath),
        Effect.mapError((error) => configError(`Cannot read ${configPath}: ${error.message}`))
      )
    )
    return yield* _(parseConfig(text))
  })

/**
 * Picks a profile by name, or the first one when no name is given.
 *
 * @pure true
 */
export const findProfile = (
  config: MirrorConfig,
  name: Option.Option<string>
): Either.Either<Profile, ConfigError> =>
  Option.match(name, {
    onNone: () =>
      Either.fromOption(
        Option.fromNullable(config.profiles[0]),
        () => configError("The rules file declares no profiles")
      ),
    onSome: (wanted) =>
      Either.fromOption(
        Option.fromNullable(config.profiles.find((profile) => profile.name === wanted)),
        () =>
          configError(
            `Unknown profile "${wanted}". Known profiles: ${
              config.profiles.map((profile) => profile.name).join(", ") || "none"
            }`
          )
      )
  })
