import { describe, expect, it } from "@effect/vitest"
import fc from "fast-check"

import { analyze, formatAnalysis, type RuleRun } from "../../src/core/analyzer.js"
import type { RuleMode } from "../../src/core/rule.js"
import { makeStats, type TransferStats } from "../../src/core/stats.js"

const run = (mode: RuleMode, stats: Partial<TransferStats>, id: string = mode): RuleRun => ({
  rule: { id, mode, devicePath: "~/is/DCIM", desktopPath: "~/Pictures", manualOnly: false },
  stats: makeStats(stats)
})

describe("analyze", () => {
  it("blocks a move whose deletions do not match its copies", () => {
    const result = analyze([run("move", { copied: 10, deleted: 12 })])
    expect(result.isSafe).toBe(false)
    expect(result.blockers).toHaveLength(1)
    expect(result.blockers[0]?.message).toContain("copied 10")
    expect(result.blockers[0]?.message).toContain("deleted 12")
  })

  it("explains skipped files in a move mismatch", () => {
    const [blocker] = analyze([run("move", { copied: 3, deleted: 1, skipped: 2 })]).blockers
    expect(blocker?.message).toBe(
      "SAFETY VIOLATION: Move copied 3 files but deleted 1 (expected 3). 2 files were skipped but should remain on the device."
    )
  })

  it("blocks any deletion by a copy", () => {
    const result = analyze([run("copy", { copied: 5, deleted: 1 })])
    expect(result.blockers).toHaveLength(1)
    expect(result.warnings).toHaveLength(0)
    expect(result.blockers[0]?.message).toBe(
      "SAFETY VIOLATION: Copy mode deleted 1 files (should never delete)"
    )
  })

  it("warns about a lopsided sync without blocking it", () => {
    const result = analyze([run("sync", { copied: 2, deleted: 50 })])
    expect(result.isSafe).toBe(true)
    expect(result.warnings.length).toBeGreaterThan(0)
    expect(result.warnings.some((issue) => issue.message.includes("50") && issue.message.includes("2"))).toBe(true)
  })

  it("applies the large and mass deletion thresholds", () => {
    const result = analyze([run("move", { copied: 1001, deleted: 1001 }), run("sync", { copied: 0, deleted: 1001 })])
    expect(result.warnings.map((issue) => `${issue.ruleId}: ${issue.message.split(":")[0]}`)).toEqual([
      "move: Large deletion",
      "sync: Sync will delete 1001 files from the device but only copy 0 new files. Verify the desktop source path is correct and its files were not moved.",
      "sync: Large sync deletion",
      "sync: Mass deletion detected"
    ])
  })

  it("reports idle rules as info", () => {
    const result = analyze([run("copy", { skipped: 4 }, "a"), run("copy", {}, "b")])
    expect(result.info.map((issue) => issue.message)).toEqual([
      "No changes needed: all 4 files already exist on the destination.",
      "No changes needed: source is empty or already synchronized."
    ])
  })

  it("is a pure function of the batch", () => {
    const counter = fc.nat({ max: 2000 })
    const mode = fc.constantFrom<RuleMode>("copy", "move", "sync", "resumable-backup")
    fc.assert(
      fc.property(fc.array(fc.tuple(mode, counter, counter, counter)), (rows) => {
        const batch = rows.map(([m, copied, deleted, skipped]) => run(m, { copied, deleted, skipped }))
        expect(analyze(batch)).toEqual(analyze(batch))
        expect(analyze(batch).isSafe).toBe(analyze(batch).blockers.length === 0)
      })
    )
  })
})

describe("formatAnalysis", () => {
  it("renders sections in severity order", () => {
    const text = formatAnalysis(analyze([run("copy", { copied: 1, deleted: 1 }, "photos"), run("sync", {}, "music")]))
    expect(text).toBe(
      [
        "BLOCKERS FOUND - execution will be aborted:",
        "  [photos] SAFETY VIOLATION: Copy mode deleted 1 files (should never delete)",
        "INFO:",
        "  [music] No changes needed: source is empty or already synchronized."
      ].join("\n")
    )
  })
})
