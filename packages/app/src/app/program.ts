import type * as FileSystem from "@effect/platform/FileSystem"
import { Console, Effect, Logger, LogLevel, Option, pipe } from "effect"
import { match } from "ts-pattern"

import { stateSummary } from "../core/resume.js"
import { type Profile, ruleEndpoints, selectRules } from "../core/rule.js"
import { type CliOptions, type Locations, readCliOptions, resolveLocations, usage } from "../shell/cli.js"
import { type ConfigError, configError, findProfile, loadConfig } from "../shell/config/rules-config.js"
import type { RuleEnv } from "../shell/reconcile/index.js"
import { failedRules, previewAndExecute, type PreviewBlocked, totals } from "../shell/runner.js"
import type { DiskSpace } from "../shell/services/disk-space.js"
import { RuntimeEnv } from "../shell/services/runtime-env.js"
import { RuleStateStore, RuleStateStoreLive } from "../shell/state/rule-state-store.js"

type CommandError = ConfigError | PreviewBlocked
type CommandEnv = RuleEnv | DiskSpace | FileSystem.FileSystem

const describeCommandError = (error: CommandError): string =>
  match(error)
    .with({ _tag: "ConfigError" }, (failure) => `Configuration error: ${failure.reason}`)
    .with(
      { _tag: "PreviewBlocked" },
      (failure) => `Preview found ${failure.blockers.length} blocker(s); nothing was changed.`
    )
    .exhaustive()

const loadProfile = (options: CliOptions, locations: Locations) =>
  Effect.gen(function*(_) {
    const config = yield* _(loadConfig(locations.configPath))
    return yield* _(findProfile(config, Option.fromNullable(options.profile)))
  })

const describeRule = (profile: Profile) =>
  profile.rules.map((rule) => {
    const { destination, source } = ruleEndpoints(rule.mode)
    const from = source === "device" ? rule.devicePath : rule.desktopPath
    const to = destination === "device" ? rule.devicePath : rule.desktopPath
    return `  [${rule.id}] ${rule.mode}: ${from} -> ${to}${rule.manualOnly ? " [manual]" : ""}`
  })

const listRules = (options: CliOptions, locations: Locations) =>
  Effect.gen(function*(_) {
    const profile = yield* _(loadProfile(options, locations))
    yield* _(Console.log(`Profile ${profile.name} (${profile.device.displayName})`))
    yield* _(Console.log(profile.rules.length === 0 ? "  no rules" : describeRule(profile).join("\n")))
  })

const showState = Effect.gen(function*(_) {
  const store = yield* _(RuleStateStore)
  const entries = yield* _(store.entries)
  if (entries.length === 0) {
    yield* _(Console.log("No saved progress"))
    return
  }
  yield* _(Console.log(`Progress file: ${store.location}`))
  yield* _(
    Console.log(entries.map(([ruleId, state]) => `  [${ruleId}] ${state.status}: ${stateSummary(state)}`).join("\n"))
  )
})

const runSelected = (options: CliOptions, locations: Locations) =>
  Effect.gen(function*(_) {
    const env = yield* _(RuntimeEnv)
    const profile = yield* _(loadProfile(options, locations))
    const selection = selectRules(profile.rules, {
      ruleIds: options.ruleIds,
      includeManual: options.includeManual
    })
    if (selection.missing.length > 0) {
      yield* _(Console.error(`Profile "${profile.name}" has no rule(s): ${selection.missing.join(", ")}`))
      yield* _(env.setExitCode(1))
    }
    if (selection.rules.length === 0) {
      yield* _(Console.log("No rules selected"))
      return
    }
    const deviceRoot = options.deviceUri ?? profile.device.activationUri
    if (deviceRoot.length === 0) {
      return yield* _(
        Effect.fail(configError(`Profile "${profile.name}" has no activation_uri; pass --device-uri`))
      )
    }
    yield* _(Console.log(`Profile ${profile.name}: ${profile.device.displayName} at ${deviceRoot}`))
    const outcomes = yield* _(previewAndExecute({ rules: selection.rules, deviceRoot, execute: options.execute }))
    if (selection.missing.length > 0 || failedRules(outcomes).length > 0 || totals(outcomes).errors > 0) {
      yield* _(env.setExitCode(1))
    }
  })

const dispatch = (options: CliOptions, locations: Locations): Effect.Effect<void, CommandError, CommandEnv> => {
  switch (options.command) {
    case "run":
      return runSelected(options, locations)
    case "rules":
      return listRules(options, locations)
    case "state":
      return showState
    case "help":
      return Console.log(usage)
  }
}

/**
 * Parses the command line and runs the selected command.
 *
 * @pure false - reads argv, touches both namespaces and the progress file
 * @effect RuntimeEnv, DeviceStorage, DesktopStorage, DiskSpace, FileSystem, Path
 * @invariant a command failure is printed and sets exit code 1
 */
export const program = Effect.gen(function*(_) {
  const options = yield* _(readCliOptions)
  const env = yield* _(RuntimeEnv)
  if (options.unknown.length > 0) {
    yield* _(Console.error(`Unknown arguments: ${options.unknown.join(" ")}\n\n${usage}`))
    yield* _(env.setExitCode(2))
    return
  }
  const locations = yield* _(resolveLocations(options))
  yield* _(
    pipe(
      dispatch(options, locations),
      Effect.catchAll((error: CommandError) =>
        pipe(
          Console.error(describeCommandError(error)),
          Effect.zipRight(env.setExitCode(1))
        )
      ),
      Effect.provide(RuleStateStoreLive(locations.stateDir)),
      Logger.withMinimumLogLevel(options.verbose ? LogLevel.Debug : LogLevel.Info)
    )
  )
})
