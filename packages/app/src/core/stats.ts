export type StatsCounter = "copied" | "renamed" | "deleted" | "skipped" | "errors" | "folders"

export const statsCounters: ReadonlyArray<StatsCounter> = [
  "copied",
  "renamed",
  "deleted",
  "skipped",
  "errors",
  "folders"
]

export interface TransferStats {
  readonly copied: number
  readonly renamed: number
  readonly deleted: number
  readonly skipped: number
  readonly errors: number
  readonly folders: number
  readonly bytes: number
  readonly elapsedMs: number
}

export const emptyStats: TransferStats = {
  copied: 0,
  renamed: 0,
  deleted: 0,
  skipped: 0,
  errors: 0,
  folders: 0,
  bytes: 0,
  elapsedMs: 0
}

export const makeStats = (overrides: Partial<TransferStats>): TransferStats => ({ ...emptyStats, ...overrides })

export const increment = (stats: TransferStats, counter: StatsCounter, by = 1): TransferStats => ({
  ...stats,
  [counter]: stats[counter] + by
})

export const addBytes = (stats: TransferStats, bytes: number): TransferStats => ({
  ...stats,
  bytes: stats.bytes + bytes
})

export const mergeStats = (left: TransferStats, right: TransferStats): TransferStats => ({
  copied: left.copied + right.copied,
  renamed: left.renamed + right.renamed,
  deleted: left.deleted + right.deleted,
  skipped: left.skipped + right.skipped,
  errors: left.errors + right.errors,
  folders: left.folders + right.folders,
  bytes: left.bytes + right.bytes,
  elapsedMs: left.elapsedMs + right.elapsedMs
})

const KB = 1024
const MB = KB * 1024
const GB = MB * 1024

export const formatBytes = (bytes: number): string => {
  if (bytes >= GB) {
    return `${(bytes / GB).toFixed(2)} GB`
  }
  if (bytes >= MB) {
    return `${(bytes / MB).toFixed(1)} MB`
  }
  if (bytes >= KB) {
    return `${(bytes / KB).toFixed(1)} KB`
  }
  return `${bytes} B`
}

export const formatDuration = (elapsedMs: number): string => {
  if (elapsedMs <= 0) {
    return "0s"
  }
  const totalSeconds = Math.floor(elapsedMs / 1000)
  const hours = Math.floor(totalSeconds / 3600)
  const minutes = Math.floor((totalSeconds % 3600) / 60)
  const seconds = totalSeconds % 60
  if (hours > 0) {
    return `${hours}h ${minutes}m`
  }
  if (minutes > 0) {
    return `${minutes}m ${seconds}s`
  }
  return `${seconds}s`
}

// bytes per second; 0 until time has passed
export const throughput = (stats: TransferStats): number =>
  stats.elapsedMs <= 0 ? 0 : stats.bytes / (stats.elapsedMs / 1000)

export const formatThroughput = (stats: TransferStats): string => `${(throughput(stats) / MB).toFixed(1)} MB/s`

/**
 * One-line summary used after each rule.
 *
 * @pure true
 */
export const summaryLine = (stats: TransferStats): string => {
  const files = `${stats.copied} files, ${formatBytes(stats.bytes)}`
  if (stats.elapsedMs < 1000) {
    return files
  }
  return `${files} in ${formatDuration(stats.elapsedMs)} (avg ${formatThroughput(stats)})`
}

export const countersLine = (stats: TransferStats): string =>
  statsCounters
    .filter((counter) => counter === "copied" || stats[counter] > 0)
    .map((counter) => `${counter} ${stats[counter]}`)
    .join(", ")
