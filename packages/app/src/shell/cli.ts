import * as Path from "@effect/platform/Path"
import { Effect, Option } from "effect"

import { RuntimeEnv } from "./services/runtime-env.js"

export type CliCommand = "run" | "rules" | "state" | "help"

const commands: ReadonlyArray<CliCommand> = ["run", "rules", "state", "help"]

export interface CliOptions {
  readonly command: CliCommand
  readonly profile?: string
  readonly ruleIds: ReadonlyArray<string>
  readonly includeManual: boolean
  readonly execute: boolean
  readonly verbose: boolean
  readonly deviceUri?: string
  readonly configPath?: string
  readonly stateDir?: string
  readonly unknown: ReadonlyArray<string>
}

type ValueKey = "profile" | "deviceUri" | "configPath" | "stateDir"
type SwitchKey = "includeManual" | "execute" | "verbose"

const valueFlags = new Map<string, ValueKey>([
  ["--profile", "profile"],
  ["-p", "profile"],
  ["--device-uri", "deviceUri"],
  ["--config", "configPath"],
  ["--state-dir", "stateDir"]
])

const switchFlags = new Map<string, SwitchKey>([
  ["--include-manual", "includeManual"],
  ["--yes", "execute"],
  ["-y", "execute"],
  ["--verbose", "verbose"],
  ["-v", "verbose"]
])

const ruleFlags = new Set(["--rule", "-r"])

const isCommand = (value: string): value is CliCommand => commands.some((command) => command === value)

const emptyOptions: CliOptions = {
  command: "help",
  ruleIds: [],
  includeManual: false,
  execute: false,
  verbose: false,
  unknown: []
}

/**
 * Parses arguments after the executable name.
 *
 * @pure true
 * @invariant a value flag without a value is reported in `unknown`
 * @complexity O(n) where n = |args|
 */
export const parseArgs = (args: ReadonlyArray<string>): CliOptions => {
  let result = emptyOptions
  let sawCommand = false

  let index = 0
  while (index < args.length) {
    const arg = args[index]
    index += 1
    if (arg === undefined) {
      continue
    }

    const switchKey = switchFlags.get(arg)
    if (switchKey !== undefined) {
      result = { ...result, [switchKey]: true }
      continue
    }

    const valueKey = valueFlags.get(arg)
    const isRuleFlag = ruleFlags.has(arg)
    if (valueKey !== undefined || isRuleFlag) {
      const value = args[index]
      if (value === undefined) {
        result = { ...result, unknown: [...result.unknown, arg] }
        continue
      }
      index += 1
      result = valueKey === undefined
        ? { ...result, ruleIds: [...result.ruleIds, value] }
        : { ...result, [valueKey]: value }
      continue
    }

    if (!sawCommand && isCommand(arg)) {
      result = { ...result, command: arg }
      sawCommand = true
      continue
    }
    result = { ...result, unknown: [...result.unknown, arg] }
  }

  return result
}

/**
 * Reads CLI arguments from the process.
 *
 * @effect RuntimeEnv
 */
export const readCliOptions = Effect.gen(function*(_) {
  const env = yield* _(RuntimeEnv)
  const argv = yield* _(env.argv)
  return parseArgs(argv.slice(2))
})

export interface Locations {
  readonly configPath: string
  readonly stateDir: string
}

const nonEmpty = (value: Option.Option<string>): Option.Option<string> =>
  Option.filter(value, (text) => text.length > 0)

/**
 * Where the rules file and the progress state live: flags first, then the
 * environment, then the per-user defaults.
 *
 * @effect RuntimeEnv, Path
 * @invariant both paths are absolute
 */
export const resolveLocations = (
  options: CliOptions
): Effect.Effect<Locations, never, RuntimeEnv | Path.Path> =>
  Effect.gen(function*(_) {
    const env = yield* _(RuntimeEnv)
    const path = yield* _(Path.Path)
    const cwd = yield* _(env.cwd)
    const home = yield* _(env.homedir)
    const configFromEnv = nonEmpty(yield* _(env.envVar("DEVICE_MIRROR_CONFIG")))
    const dataHome = nonEmpty(yield* _(env.envVar("XDG_DATA_HOME")))

    const configPath = options.configPath ??
      Option.getOrElse(configFromEnv, () => path.join(home, ".config", "device-mirror", "config.json"))
    const stateDir = options.stateDir ??
      Option.match(dataHome, {
        onNone: () => path.join(home, ".local", "share", "device-mirror"),
        onSome: (root) => path.join(root, "device-mirror")
      })

    return { configPath: path.resolve(cwd, configPath), stateDir: path.resolve(cwd, stateDir) }
  })

export const usage = [
  "Usage: device-mirror <command> [options]",
  "",
  "Commands:",
  "  run      Preview the selected rules and, with --yes, apply them",
  "  rules    List the rules of a profile",
  "  state    Show saved progress of resumable backups",
  "  help     Show this message",
  "",
  "Options:",
  "  -p, --profile <name>   Profile to use (default: first profile)",
  "  -r, --rule <id>        Run only this rule (repeatable)",
  "      --include-manual   Include manual-only rules",
  "  -y, --yes              Apply changes after a safe preview",
  "  -v, --verbose          Log every file operation",
  "      --device-uri <uri> Override the profile's device address",
  "      --config <path>    Rules file",
  "      --state-dir <dir>  Directory for resumable progress"
].join("\n")
