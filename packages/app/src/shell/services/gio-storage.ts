import * as Command from "@effect/platform/Command"
import * as CommandExecutor from "@effect/platform/CommandExecutor"
import { Duration, Effect, Layer, Option, pipe } from "effect"

import { encodeSegment } from "../../core/addressing.js"
import {
  DeviceStorage,
  type StorageAccess,
  type StorageEntryInfo,
  type StorageEntryKind,
  type StorageError,
  storageError
} from "./storage.js"

export interface GioOptions {
  readonly binary: string
  readonly probeTimeout: Duration.DurationInput
  readonly transferTimeout: Duration.DurationInput
}

export const defaultGioOptions: GioOptions = {
  binary: "gio",
  probeTimeout: Duration.seconds(30),
  transferTimeout: Duration.minutes(10)
}

const hasScheme = (address: string): boolean => /^[a-z][a-z0-9+.-]*:\/\//i.test(address)

// device listings return raw names; URI addresses need them escaped
export const childAddress = (parent: string, name: string): string => {
  const base = parent.endsWith("/") ? parent.slice(0, -1) : parent
  return hasScheme(parent) ? `${base}/${encodeSegment(name)}` : `${base}/${name}`
}

const kindFromType = (value: string | undefined): StorageEntryKind => {
  const normalized = (value ?? "").toLowerCase()
  if (normalized.includes("directory") || normalized === "2") {
    return "directory"
  }
  if (normalized.includes("regular") || normalized === "1") {
    return "file"
  }
  return "other"
}

/**
 * Parses `gio info` output into an entry description.
 *
 * @pure true
 * @invariant None when the output carries no standard::type attribute
 */
export const parseInfo = (output: string): Option.Option<StorageEntryInfo> => {
  const attributes = new Map<string, string>()
  for (const line of output.split("\n")) {
    const trimmed = line.trim()
    const separator = trimmed.indexOf(": ")
    if (separator > 0) {
      attributes.set(trimmed.slice(0, separator), trimmed.slice(separator + 2))
    }
  }
  const type = attributes.get("standard::type")
  if (type === undefined) {
    return Option.none()
  }
  const size = Number(attributes.get("standard::size") ?? "0")
  return Option.some({
    kind: attributes.get("standard::is-directory") === "TRUE" ? "directory" : kindFromType(type),
    size: Number.isFinite(size) ? size : 0
  })
}

export const parseListing = (output: string): ReadonlyArray<string> =>
  output
    .split("\n")
    .map((line) => line.trim())
    .filter((line) => line.length > 0)

/**
 * Builds StorageAccess over the `gio` command line tool, which reaches both
 * device URIs and local paths.
 *
 * @pure false - spawns processes
 * @effect CommandExecutor
 * @invariant every call is bounded by a timeout; a timed-out probe reads as absent
 */
export const makeGioStorage = (
  options: GioOptions = defaultGioOptions
): Effect.Effect<StorageAccess, never, CommandExecutor.CommandExecutor> =>
  Effect.gen(function*(_) {
    const executor = yield* _(CommandExecutor.CommandExecutor)
    const gio = (...args: ReadonlyArray<string>) => Command.make(options.binary, ...args)

    const probe = <A>(command: Command.Command, parse: (output: string) => A, fallback: A): Effect.Effect<A> =>
      pipe(
        Command.string(command),
        Effect.timeoutOption(options.probeTimeout),
        Effect.map(Option.match({ onNone: () => fallback, onSome: parse })),
        Effect.catchAll(() => Effect.succeed(fallback)),
        Effect.provideService(CommandExecutor.CommandExecutor, executor)
      )

    const mutate = (
      command: Command.Command,
      address: string,
      timeout: Duration.DurationInput,
      reason: string
    ): Effect.Effect<void, StorageError> =>
      pipe(
        Command.exitCode(command),
        Effect.mapError((error) => storageError(address, `${reason}: ${error.message}`)),
        Effect.timeoutFail({
          duration: timeout,
          onTimeout: () => storageError(address, `${reason}: timed out`)
        }),
        Effect.flatMap((exitCode) =>
          Number(exitCode) === 0
            ? Effect.void
            : Effect.fail(storageError(address, `${reason}: gio exited with ${exitCode}`))
        ),
        Effect.provideService(CommandExecutor.CommandExecutor, executor)
      )

    const list = (address: string) => probe(gio("list", address), parseListing, [])

    const stat = (address: string) =>
      probe(
        gio("info", "-a", "standard::type,standard::size,standard::is-directory", address),
        parseInfo,
        Option.none()
      )

    const copyFile = (source: string, destination: string, overwrite: boolean): Effect.Effect<void, StorageError> =>
      Effect.gen(function*(_) {
        if (!overwrite) {
          const existing = yield* _(stat(destination))
          if (Option.isSome(existing)) {
            return yield* _(Effect.fail(storageError(destination, "Destination already exists")))
          }
        }
        yield* _(mutate(gio("copy", source, destination), source, options.transferTimeout, "Cannot copy file"))
      })

    return {
      name: "device",
      child: childAddress,
      list,
      stat,
      copyFile,
      remove: (address) => mutate(gio("remove", address), address, options.probeTimeout, "Cannot remove"),
      makeDirectory: (address, createParents) =>
        mutate(
          createParents ? gio("mkdir", "-p", address) : gio("mkdir", address),
          address,
          options.probeTimeout,
          "Cannot create directory"
        )
    }
  })

export const DeviceStorageLive = (options: GioOptions = defaultGioOptions) =>
  Layer.effect(DeviceStorage, makeGioStorage(options))
