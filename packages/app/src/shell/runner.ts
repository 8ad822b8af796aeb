import type * as Path from "@effect/platform/Path"
import { Console, Effect, Either, Option, pipe } from "effect"

import { analyze, formatAnalysis, type Issue, type RuleRun } from "../core/analyzer.js"
import { validateSpace } from "../core/preflight.js"
import { describeMode, type Rule, ruleEndpoints } from "../core/rule.js"
import { countersLine, emptyStats, mergeStats, summaryLine, type TransferStats } from "../core/stats.js"
import { resolveRuleAddresses, type RuleEnv, runRule } from "./reconcile/index.js"
import { describeRuleError, type RuleError, type TransferContext } from "./reconcile/types.js"
import { DiskSpace } from "./services/disk-space.js"
import type { RuntimeEnv } from "./services/runtime-env.js"

export interface RuleOutcome {
  readonly rule: Rule
  readonly result: Either.Either<TransferStats, RuleError>
}

export interface PreviewBlocked {
  readonly _tag: "PreviewBlocked"
  readonly blockers: ReadonlyArray<Issue>
}

const previewBlocked = (blockers: ReadonlyArray<Issue>): PreviewBlocked => ({
  _tag: "PreviewBlocked",
  blockers
})

const report = (outcome: RuleOutcome): Effect.Effect<void> =>
  Either.match(outcome.result, {
    onLeft: (error) => Console.log(`  failed: ${describeRuleError(error)}`),
    onRight: (stats) => Console.log(`  ${countersLine(stats)}\n  ${summaryLine(stats)}`)
  })

const runOne = (
  rule: Rule,
  attempt: Effect.Effect<TransferStats, RuleError, RuleEnv | DiskSpace>
): Effect.Effect<RuleOutcome, never, RuleEnv | DiskSpace> =>
  Effect.gen(function*(_) {
    yield* _(Console.log(`\n==> [${rule.id}] ${describeMode(rule.mode)}`))
    const result = yield* _(Effect.either(attempt))
    const outcome: RuleOutcome = { rule, result }
    yield* _(report(outcome))
    return outcome
  })

// a rule whose preview failed was never audited; it keeps the preview's failure
const notExecuted = (previewed: RuleOutcome): Effect.Effect<RuleOutcome> =>
  Effect.as(
    Console.log(`\n==> [${previewed.rule.id}] not executed: its preview failed`),
    previewed
  )

/**
 * Runs rules one after another. A rule-level failure is recorded in its outcome
 * and the next rule still runs.
 *
 * @effect DeviceStorage, DesktopStorage, RuleStateStore, RuntimeEnv, Path
 * @invariant outcomes follow the order of `rules`
 */
export const runRules = (
  rules: ReadonlyArray<Rule>,
  deviceRoot: string,
  context: TransferContext
): Effect.Effect<ReadonlyArray<RuleOutcome>, never, RuleEnv | DiskSpace> =>
  Effect.forEach(rules, (rule) => runOne(rule, runRule(rule, deviceRoot, context)))

/**
 * Compares the bytes a preview would copy with the free space at the rule's
 * desktop destination. Rules that write to the device are not checked.
 *
 * @effect DiskSpace, RuntimeEnv, Path
 */
export const preflight = (
  rule: Rule,
  preview: TransferStats,
  deviceRoot: string
): Effect.Effect<void, RuleError, DiskSpace | RuntimeEnv | Path.Path> =>
  Effect.gen(function*(_) {
    if (ruleEndpoints(rule.mode).destination === "device") {
      yield* _(Effect.logWarning("Free space on the device is unknown; skipping the space check"))
      return
    }
    const disk = yield* _(DiskSpace)
    const addresses = yield* _(resolveRuleAddresses(rule, deviceRoot))
    const free = yield* _(disk.freeBytes(addresses.desktop))
    if (Option.isNone(free)) {
      yield* _(Effect.logWarning(`Cannot measure free space at ${addresses.desktop}; skipping the space check`))
      return
    }
    yield* _(validateSpace(preview.bytes, free.value))
  })

export const totals = (outcomes: ReadonlyArray<RuleOutcome>): TransferStats =>
  outcomes.reduce(
    (sum, outcome) => Either.match(outcome.result, { onLeft: () => sum, onRight: (stats) => mergeStats(sum, stats) }),
    emptyStats
  )

export const failedRules = (outcomes: ReadonlyArray<RuleOutcome>): ReadonlyArray<Rule> =>
  outcomes.filter((outcome) => Either.isLeft(outcome.result)).map((outcome) => outcome.rule)

const reportTotals = (title: string, outcomes: ReadonlyArray<RuleOutcome>): Effect.Effect<void> => {
  const sum = totals(outcomes)
  const failed = failedRules(outcomes)
  const lines = [
    `\n${title}: ${outcomes.length} rule(s), ${countersLine(sum)}`,
    `  ${summaryLine(sum)}`,
    ...(failed.length === 0 ? [] : [`  failed rules: ${failed.map((rule) => rule.id).join(", ")}`])
  ]
  return Console.log(lines.join("\n"))
}

export interface RunPlan {
  readonly rules: ReadonlyArray<Rule>
  readonly deviceRoot: string
  readonly execute: boolean
}

/**
 * Previews every rule, audits the preview and, when asked to and nothing
 * blocks it, executes the rules for real.
 *
 * @returns Outcomes of the execution, or of the preview when not executing.
 *
 * @effect DeviceStorage, DesktopStorage, RuleStateStore, DiskSpace, RuntimeEnv, Path
 * @invariant nothing is mutated unless the preview analysis is safe
 * @invariant only rules with a successful preview are executed
 */
export const previewAndExecute = (
  plan: RunPlan
): Effect.Effect<ReadonlyArray<RuleOutcome>, PreviewBlocked, RuleEnv | DiskSpace> =>
  Effect.gen(function*(_) {
    yield* _(Console.log("Preview (no changes are made)"))
    const preview = yield* _(runRules(plan.rules, plan.deviceRoot, { dryRun: true }))
    yield* _(reportTotals("Preview", preview))

    const batch: ReadonlyArray<RuleRun> = preview.flatMap((outcome) =>
      Either.match(outcome.result, {
        onLeft: () => [],
        onRight: (stats) => [{ rule: outcome.rule, stats }]
      })
    )
    const analysis = analyze(batch)
    const rendered = formatAnalysis(analysis)
    if (rendered.length > 0) {
      yield* _(Console.log(`\n${rendered}`))
    }
    if (!analysis.isSafe) {
      return yield* _(Effect.fail(previewBlocked(analysis.blockers)))
    }
    if (!plan.execute) {
      yield* _(Console.log("\nPreview only. Run again with --yes to apply these changes."))
      return preview
    }

    yield* _(Console.log("\nExecuting"))
    const executed = yield* _(
      Effect.forEach(preview, (previewed) =>
        Either.match(previewed.result, {
          onLeft: () => notExecuted(previewed),
          onRight: (stats) =>
            runOne(
              previewed.rule,
              pipe(
                preflight(previewed.rule, stats, plan.deviceRoot),
                Effect.zipRight(runRule(previewed.rule, plan.deviceRoot, { dryRun: false }))
              )
            )
        }))
    )
    yield* _(reportTotals("Done", executed))
    return executed
  })
