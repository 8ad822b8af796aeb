import { Context, type Effect, type Option } from "effect"

export type StorageEntryKind = "file" | "directory" | "other"

export interface StorageEntryInfo {
  readonly kind: StorageEntryKind
  readonly size: number
}

export interface StorageError {
  readonly _tag: "StorageError"
  readonly address: string
  readonly reason: string
}

export const storageError = (address: string, reason: string): StorageError => ({
  _tag: "StorageError",
  address,
  reason
})

/**
 * Filesystem primitives shared by both namespaces.
 *
 * Probes never fail: an unreadable, missing or timed-out location lists as
 * empty and stats as None. Mutations report failures in the error channel.
 */
export interface StorageAccess {
  readonly name: string
  readonly child: (parent: string, name: string) => string
  readonly list: (address: string) => Effect.Effect<ReadonlyArray<string>>
  readonly stat: (address: string) => Effect.Effect<Option.Option<StorageEntryInfo>>
  readonly copyFile: (
    source: string,
    destination: string,
    overwrite: boolean
  ) => Effect.Effect<void, StorageError>
  readonly remove: (address: string) => Effect.Effect<void, StorageError>
  readonly makeDirectory: (address: string, createParents: boolean) => Effect.Effect<void, StorageError>
}

/** The device namespace; its implementation also carries bytes between namespaces. */
export class DeviceStorage extends Context.Tag("DeviceStorage")<DeviceStorage, StorageAccess>() {}

export class DesktopStorage extends Context.Tag("DesktopStorage")<DesktopStorage, StorageAccess>() {}
