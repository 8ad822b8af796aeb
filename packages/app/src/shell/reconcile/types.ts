import { match } from "ts-pattern"

import type { ConflictExhausted } from "../../core/conflict.js"
import type { PreflightError } from "../../core/preflight.js"
import type { StorageAccess, StorageError } from "../services/storage.js"
import type { StateError } from "../state/rule-state-store.js"

/** Preview runs walk both trees but never mutate either one. */
export interface TransferContext {
  readonly dryRun: boolean
}

export interface ReconcileParams {
  readonly source: StorageAccess
  readonly destination: StorageAccess
  /** Carries bytes from the source namespace into the destination namespace. */
  readonly transport: StorageAccess
  readonly sourceRoot: string
  readonly destinationRoot: string
  readonly context: TransferContext
}

export type RuleError = StorageError | ConflictExhausted | StateError | PreflightError

export const describeRuleError = (error: RuleError): string =>
  match(error)
    .with({ _tag: "StorageError" }, (failure) => `${failure.reason} (${failure.address})`)
    .with(
      { _tag: "ConflictExhausted" },
      (failure) => `No free name for ${failure.name} after ${failure.probes} attempts`
    )
    .with({ _tag: "StateError" }, (failure) => `Cannot update progress file ${failure.path}: ${failure.reason}`)
    .with(
      { _tag: "PreflightError" },
      (failure) =>
        `Not enough free space: need ${failure.required} bytes plus headroom, ${failure.available} available`
    )
    .exhaustive()
