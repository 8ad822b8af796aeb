export type JobStatus = "new" | "in_progress" | "completed"

export interface FailedTransfer {
  readonly path: string
  readonly error: string
}

export interface RuleState {
  readonly copied: ReadonlySet<string>
  readonly failed: ReadonlyArray<FailedTransfer>
  readonly status: JobStatus
  readonly lastRun: string | null
  readonly totalFiles: number
}

/** On-disk shape of one rule's record; keys are part of the state file contract. */
export interface RuleStateRecord {
  readonly copied: ReadonlyArray<string>
  readonly failed: ReadonlyArray<FailedTransfer>
  readonly status: JobStatus
  readonly last_run: string | null
  readonly total_files: number
}

export type StateFile = Readonly<Record<string, RuleStateRecord>>

export const newRuleState: RuleState = {
  copied: new Set(),
  failed: [],
  status: "new",
  lastRun: null,
  totalFiles: 0
}

export const fromRecord = (record: RuleStateRecord | undefined): RuleState =>
  record === undefined
    ? newRuleState
    : {
      copied: new Set(record.copied),
      failed: record.failed,
      status: record.status,
      lastRun: record.last_run,
      totalFiles: record.total_files
    }

export const toRecord = (state: RuleState, now: string): RuleStateRecord => ({
  copied: [...state.copied].sort(),
  failed: state.failed,
  status: state.status,
  last_run: now,
  total_files: state.totalFiles
})

/**
 * Files of the job that still need a transfer.
 *
 * @pure true
 * @invariant result ⊆ candidates, order preserved, result ∩ copied = ∅
 * @complexity O(n)
 */
export const remainingFiles = (
  candidates: ReadonlyArray<string>,
  copied: ReadonlySet<string>
): ReadonlyArray<string> => candidates.filter((candidate) => !copied.has(candidate))

export const beginJob = (state: RuleState, totalFiles: number): RuleState => ({
  ...state,
  status: "in_progress",
  totalFiles: state.status === "new" || state.totalFiles === 0 ? totalFiles : state.totalFiles
})

// copied only ever grows within a job
export const markCopied = (state: RuleState, relativePath: string): RuleState => ({
  ...state,
  copied: new Set([...state.copied, relativePath]),
  status: "in_progress"
})

export const markFailed = (state: RuleState, failure: FailedTransfer): RuleState => ({
  ...state,
  failed: state.failed.some((entry) => entry.path === failure.path && entry.error === failure.error)
    ? state.failed
    : [...state.failed, failure],
  status: "in_progress"
})

export const stateSummary = (state: RuleState): string => {
  const copied = state.copied.size
  const failed = state.failed.length
  if (copied === 0) {
    return "No previous progress"
  }
  if (state.totalFiles > 0) {
    const percent = ((copied / state.totalFiles) * 100).toFixed(1)
    return `${copied}/${state.totalFiles} files (${percent}%) - ${failed} failed`
  }
  return `${copied} files copied - ${failed} failed`
}
