import { describe, expect, it } from "@effect/vitest"

import { describeRuleError } from "../../src/shell/reconcile/types.js"

describe("describeRuleError", () => {
  it("names the failing address or file", () => {
    expect(describeRuleError({ _tag: "StorageError", address: "/tmp/x", reason: "Cannot remove" })).toBe(
      "Cannot remove (/tmp/x)"
    )
    expect(describeRuleError({ _tag: "ConflictExhausted", name: "a.jpg", probes: 1000 })).toBe(
      "No free name for a.jpg after 1000 attempts"
    )
    expect(describeRuleError({ _tag: "StateError", path: "/state/state.json", reason: "EACCES" })).toBe(
      "Cannot update progress file /state/state.json: EACCES"
    )
  })

  it("reports the space a rule needs", () => {
    expect(describeRuleError({ _tag: "PreflightError", required: 30, available: 20, deficit: 11 })).toBe(
      "Not enough free space: need 30 bytes plus headroom, 20 available"
    )
  })
})
