export type RuleMode = "copy" | "move" | "sync" | "resumable-backup"

export interface Rule {
  readonly id: string
  readonly mode: RuleMode
  readonly devicePath: string
  readonly desktopPath: string
  readonly manualOnly: boolean
}

export interface DeviceInfo {
  readonly displayName: string
  readonly activationUri: string
}

export interface Profile {
  readonly name: string
  readonly device: DeviceInfo
  readonly rules: ReadonlyArray<Rule>
}

export type Namespace = "device" | "desktop"

export interface RuleEndpoints {
  readonly source: Namespace
  readonly destination: Namespace
}

/**
 * Direction of a rule. Sync always mirrors the desktop onto the device; every
 * other mode pulls from the device.
 *
 * @pure true
 */
export const ruleEndpoints = (mode: RuleMode): RuleEndpoints =>
  mode === "sync"
    ? { source: "desktop", destination: "device" }
    : { source: "device", destination: "desktop" }

export const describeMode = (mode: RuleMode): string => {
  switch (mode) {
    case "copy":
      return "Copy to desktop, keep on device"
    case "move":
      return "Copy to desktop, then delete from device"
    case "sync":
      return "Mirror desktop to device (desktop is source of truth)"
    case "resumable-backup":
      return "Resumable copy to desktop with per-file progress"
  }
}

export interface RuleSelection {
  readonly ruleIds: ReadonlyArray<string>
  readonly includeManual: boolean
}

export interface SelectedRules {
  readonly rules: ReadonlyArray<Rule>
  readonly missing: ReadonlyArray<string>
}

/**
 * Picks the rules to run. Explicit ids win over the manual-only flag; without
 * ids, manual-only rules run only when includeManual is set.
 *
 * @pure true
 * @invariant rules keep profile order
 */
export const selectRules = (
  rules: ReadonlyArray<Rule>,
  selection: RuleSelection
): SelectedRules => {
  if (selection.ruleIds.length === 0) {
    return {
      rules: rules.filter((rule) => selection.includeManual || !rule.manualOnly),
      missing: []
    }
  }
  const known = new Set(rules.map((rule) => rule.id))
  return {
    rules: rules.filter((rule) => selection.ruleIds.includes(rule.id)),
    missing: selection.ruleIds.filter((id) => !known.has(id))
  }
}
