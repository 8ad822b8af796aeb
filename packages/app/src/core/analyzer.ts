import type { Rule, RuleMode } from "./rule.js"
import type { TransferStats } from "./stats.js"

export type Severity = "blocker" | "warning" | "info"

export interface Issue {
  readonly severity: Severity
  readonly ruleId: string
  readonly mode: RuleMode
  readonly message: string
}

export interface AnalysisResult {
  readonly blockers: ReadonlyArray<Issue>
  readonly warnings: ReadonlyArray<Issue>
  readonly info: ReadonlyArray<Issue>
  readonly isSafe: boolean
}

export interface RuleRun {
  readonly rule: Rule
  readonly stats: TransferStats
}

export const thresholds = {
  largeDelete: 100,
  massDelete: 1000,
  massDeleteMinCopied: 100,
  syncDeleteRatio: 5,
  syncDeleteRatioMaxCopied: 10,
  syncLargeDelete: 500
} as const

type Check = (rule: Rule, stats: TransferStats) => ReadonlyArray<Issue>

const issue = (severity: Severity, rule: Rule, message: string): Issue => ({
  severity,
  ruleId: rule.id,
  mode: rule.mode,
  message
})

const checkNonDeleting: Check = (rule, stats) => {
  if (rule.mode !== "copy" && rule.mode !== "resumable-backup") {
    return []
  }
  if (stats.deleted === 0) {
    return []
  }
  const label = rule.mode === "copy" ? "Copy" : "Resumable backup"
  return [
    issue(
      "blocker",
      rule,
      `SAFETY VIOLATION: ${label} mode deleted ${stats.deleted} files (should never delete)`
    )
  ]
}

const checkMove: Check = (rule, stats) => {
  if (rule.mode !== "move" || stats.deleted === stats.copied) {
    return []
  }
  const head = `SAFETY VIOLATION: Move copied ${stats.copied} files but deleted ${stats.deleted}`
  const message = stats.skipped > 0
    ? `${head} (expected ${stats.copied}). ${stats.skipped} files were skipped but should remain on the device.`
    : `${head} (must match exactly)`
  return [issue("blocker", rule, message)]
}

const checkSync: Check = (rule, stats) => {
  if (rule.mode !== "sync") {
    return []
  }
  const found: Array<Issue> = []
  if (
    stats.deleted > stats.copied * thresholds.syncDeleteRatio &&
    stats.copied < thresholds.syncDeleteRatioMaxCopied
  ) {
    found.push(
      issue(
        "warning",
        rule,
        `Sync will delete ${stats.deleted} files from the device but only copy ${stats.copied} new files. ` +
          "Verify the desktop source path is correct and its files were not moved."
      )
    )
  }
  if (stats.deleted > thresholds.syncLargeDelete) {
    found.push(
      issue(
        "warning",
        rule,
        `Large sync deletion: ${stats.deleted} files will be removed from the device. Ensure this is expected.`
      )
    )
  }
  return found
}

const checkLarge: Check = (rule, stats) => {
  const found: Array<Issue> = []
  if (stats.deleted > thresholds.massDelete && stats.copied < thresholds.massDeleteMinCopied) {
    found.push(
      issue(
        "warning",
        rule,
        `Mass deletion detected: ${stats.deleted} files will be deleted but only ${stats.copied} copied. Please review carefully.`
      )
    )
  }
  if (stats.deleted > thresholds.largeDelete && rule.mode !== "sync") {
    found.push(issue("warning", rule, `Large deletion: ${stats.deleted} files will be removed from the device.`))
  }
  return found
}

const checkIdle: Check = (rule, stats) => {
  if (stats.copied !== 0 || stats.deleted !== 0 || stats.renamed !== 0) {
    return []
  }
  const message = stats.skipped > 0
    ? `No changes needed: all ${stats.skipped} files already exist on the destination.`
    : "No changes needed: source is empty or already synchronized."
  return [issue("info", rule, message)]
}

const checks: ReadonlyArray<Check> = [checkNonDeleting, checkMove, checkSync, checkLarge, checkIdle]

/**
 * Audits the statistics of a batch of rule runs.
 *
 * @param batch - (rule, stats) pairs, usually from a preview.
 * @returns Issues grouped by severity, in batch order; isSafe iff there are no blockers.
 *
 * @pure true
 * @invariant analyze(b) deep-equals analyze(b)
 * @complexity O(n) where n = |batch|
 */
export const analyze = (batch: ReadonlyArray<RuleRun>): AnalysisResult => {
  const issues = batch.flatMap(({ rule, stats }) => checks.flatMap((check) => check(rule, stats)))
  const blockers = issues.filter((entry) => entry.severity === "blocker")
  return {
    blockers,
    warnings: issues.filter((entry) => entry.severity === "warning"),
    info: issues.filter((entry) => entry.severity === "info"),
    isSafe: blockers.length === 0
  }
}

const section = (title: string, issues: ReadonlyArray<Issue>): ReadonlyArray<string> =>
  issues.length === 0 ? [] : [title, ...issues.map((entry) => `  [${entry.ruleId}] ${entry.message}`)]

export const formatAnalysis = (result: AnalysisResult): string =>
  [
    ...section("BLOCKERS FOUND - execution will be aborted:", result.blockers),
    ...section("WARNINGS:", result.warnings),
    ...section("INFO:", result.info)
  ].join("\n")
