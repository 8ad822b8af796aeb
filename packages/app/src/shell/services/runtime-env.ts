import { Context, Effect, Layer, Option } from "effect"

export type EnvLookup = (key: string) => string | undefined

export class RuntimeEnv extends Context.Tag("RuntimeEnv")<
  RuntimeEnv,
  {
    readonly argv: Effect.Effect<ReadonlyArray<string>>
    readonly cwd: Effect.Effect<string>
    readonly homedir: Effect.Effect<string>
    readonly envVar: (key: string) => Effect.Effect<Option.Option<string>>
    readonly envLookup: Effect.Effect<EnvLookup>
    readonly setExitCode: (code: number) => Effect.Effect<void>
  }
>() {}

const readProcess = (): NodeJS.Process | undefined => typeof process === "undefined" ? undefined : process

const readEnv = (): NodeJS.ProcessEnv => readProcess()?.env ?? {}

const resolveHomeDir = (env: NodeJS.ProcessEnv, cwdFallback: string): string => {
  const direct = env["HOME"] ?? env["USERPROFILE"]
  if (direct !== undefined) {
    return direct
  }

  const drive = env["HOMEDRIVE"]
  const path = env["HOMEPATH"]
  if (drive !== undefined && path !== undefined) {
    return `${drive}${path}`
  }

  return cwdFallback
}

/**
 * Process access behind a typed service: argv, cwd, home, environment and the
 * exit code.
 *
 * @pure false - reads process state
 * @invariant envLookup snapshots the environment when the effect runs
 */
export const RuntimeEnvLive = Layer.succeed(RuntimeEnv, {
  argv: Effect.sync(() => {
    const proc = readProcess()
    return proc === undefined ? [] : [...proc.argv]
  }),
  cwd: Effect.sync(() => readProcess()?.cwd() ?? "."),
  homedir: Effect.sync(() => {
    const proc = readProcess()
    const cwdFallback = proc?.cwd() ?? "."
    return resolveHomeDir(readEnv(), cwdFallback)
  }),
  envVar: (key) => Effect.sync(() => Option.fromNullable(readEnv()[key])),
  envLookup: Effect.sync(() => {
    const snapshot = { ...readEnv() }
    return (key: string) => snapshot[key]
  }),
  setExitCode: (code) =>
    Effect.sync(() => {
      const proc = readProcess()
      if (proc !== undefined) {
        proc.exitCode = code
      }
    })
})
