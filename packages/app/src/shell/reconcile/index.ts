import * as Path from "@effect/platform/Path"
import { Effect } from "effect"

import { expandDesktopPath, resolveDeviceAddress } from "../../core/addressing.js"
import { type Namespace, type Rule, ruleEndpoints } from "../../core/rule.js"
import type { TransferStats } from "../../core/stats.js"
import { RuntimeEnv } from "../services/runtime-env.js"
import { DesktopStorage, DeviceStorage, type StorageAccess } from "../services/storage.js"
import { RuleStateStore } from "../state/rule-state-store.js"
import { reconcileCopy } from "./copy.js"
import { reconcileMove } from "./move.js"
import { reconcileResumable } from "./resumable.js"
import { reconcileSync } from "./sync.js"
import type { RuleError, TransferContext } from "./types.js"

export interface RuleAddresses {
  readonly device: string
  readonly desktop: string
}

export type RuleEnv = DeviceStorage | DesktopStorage | RuleStateStore | RuntimeEnv | Path.Path

/**
 * Full addresses of both ends of a rule: the device URI under `deviceRoot` and
 * the absolute desktop path after `~` and variable expansion.
 *
 * @effect RuntimeEnv, Path
 */
export const resolveRuleAddresses = (
  rule: Rule,
  deviceRoot: string
): Effect.Effect<RuleAddresses, never, RuntimeEnv | Path.Path> =>
  Effect.gen(function*(_) {
    const env = yield* _(RuntimeEnv)
    const path = yield* _(Path.Path)
    const homedir = yield* _(env.homedir)
    const cwd = yield* _(env.cwd)
    const lookup = yield* _(env.envLookup)
    return {
      device: resolveDeviceAddress(deviceRoot, rule.devicePath),
      desktop: path.resolve(cwd, expandDesktopPath(rule.desktopPath, { homedir, env: lookup }))
    }
  })

/**
 * Executes (or previews) one rule and reports its counters.
 *
 * @param deviceRoot - Activation address of the device.
 * @returns Statistics of the run; rule-level failures end only this rule.
 *
 * @effect DeviceStorage, DesktopStorage, RuleStateStore, RuntimeEnv, Path
 * @invariant context.dryRun implies no mutation of either namespace or the state file
 */
export const runRule = (
  rule: Rule,
  deviceRoot: string,
  context: TransferContext
): Effect.Effect<TransferStats, RuleError, RuleEnv> =>
  Effect.gen(function*(_) {
    const device = yield* _(DeviceStorage)
    const desktop = yield* _(DesktopStorage)
    const addresses = yield* _(resolveRuleAddresses(rule, deviceRoot))
    const endpoints = ruleEndpoints(rule.mode)
    const access = (namespace: Namespace): StorageAccess => namespace === "device" ? device : desktop
    const root = (namespace: Namespace): string => namespace === "device" ? addresses.device : addresses.desktop
    const params = {
      source: access(endpoints.source),
      destination: access(endpoints.destination),
      transport: device,
      sourceRoot: root(endpoints.source),
      destinationRoot: root(endpoints.destination),
      context
    }
    yield* _(Effect.logDebug(`${rule.mode}: ${params.sourceRoot} -> ${params.destinationRoot}`))
    switch (rule.mode) {
      case "copy":
        return yield* _(reconcileCopy(params))
      case "move":
        return yield* _(reconcileMove(params))
      case "sync":
        return yield* _(reconcileSync(params))
      case "resumable-backup": {
        const store = yield* _(RuleStateStore)
        return yield* _(reconcileResumable(params, store, rule.id))
      }
    }
  }).pipe(Effect.annotateLogs("rule", rule.id))
