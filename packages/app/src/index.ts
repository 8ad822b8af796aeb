export * from "./core/addressing.js"
export * from "./core/analyzer.js"
export * from "./core/conflict.js"
export * from "./core/preflight.js"
export * from "./core/resume.js"
export * from "./core/rule.js"
export * from "./core/stats.js"
export * from "./core/tree.js"
export { type ConfigError, findProfile, loadConfig, type MirrorConfig, parseConfig } from "./shell/config/rules-config.js"
export { runRule, resolveRuleAddresses } from "./shell/reconcile/index.js"
export type { ReconcileParams, RuleError, TransferContext } from "./shell/reconcile/types.js"
export { listEntries, walkFiles, walkTree } from "./shell/reconcile/walker.js"
export { previewAndExecute, runRules } from "./shell/runner.js"
export { DiskSpace, DiskSpaceLive } from "./shell/services/disk-space.js"
export { DeviceStorageLive, makeGioStorage } from "./shell/services/gio-storage.js"
export { DesktopStorageLive, makeLocalStorage } from "./shell/services/local-storage.js"
export { RuntimeEnv, RuntimeEnvLive } from "./shell/services/runtime-env.js"
export { DesktopStorage, DeviceStorage, type StorageAccess, type StorageError } from "./shell/services/storage.js"
export { RuleStateStore, RuleStateStoreLive } from "./shell/state/rule-state-store.js"
