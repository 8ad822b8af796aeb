export type EntryKind = "file" | "directory"

export interface TreeEntry {
  readonly name: string
  readonly relativePath: string
  readonly kind: EntryKind
  readonly size: number
}

export const joinRelative = (parent: string, name: string): string => parent === "" ? name : `${parent}/${name}`

export const relativeSegments = (relativePath: string): ReadonlyArray<string> =>
  relativePath.split("/").filter((segment) => segment.length > 0)

const byName = (left: TreeEntry, right: TreeEntry): number => {
  const a = left.name.toLowerCase()
  const b = right.name.toLowerCase()
  if (a !== b) {
    return a < b ? -1 : 1
  }
  // tie-break on the raw name so "A.txt" and "a.txt" keep a stable order
  if (left.name === right.name) {
    return 0
  }
  return left.name < right.name ? -1 : 1
}

/**
 * Orders one directory level: directories first, then files, each group by name
 * ignoring case.
 *
 * @pure true
 * @invariant output is a permutation of input
 * @complexity O(n log n)
 */
export const sortEntries = (entries: ReadonlyArray<TreeEntry>): ReadonlyArray<TreeEntry> => [
  ...entries.filter((entry) => entry.kind === "directory").sort(byName),
  ...entries.filter((entry) => entry.kind === "file").sort(byName)
]
