import { Either } from "effect"

export const MAX_CONFLICT_PROBES = 1000

export type ConflictResolution =
  | { readonly _tag: "Unchanged"; readonly name: string }
  | { readonly _tag: "Renamed"; readonly name: string }
  | { readonly _tag: "Skip" }

export interface ConflictExhausted {
  readonly _tag: "ConflictExhausted"
  readonly name: string
  readonly probes: number
}

export const conflictExhausted = (name: string): ConflictExhausted => ({
  _tag: "ConflictExhausted",
  name,
  probes: MAX_CONFLICT_PROBES
})

export interface NameParts {
  readonly stem: string
  readonly extension: string
}

// "archive.tar.gz" -> { stem: "archive.tar", extension: "gz" }
export const splitName = (name: string): NameParts => {
  const dot = name.lastIndexOf(".")
  if (dot <= 0 || dot === name.length - 1) {
    return { stem: name, extension: "" }
  }
  return { stem: name.slice(0, dot), extension: name.slice(dot + 1) }
}

export const numberedName = ({ extension, stem }: NameParts, counter: number): string =>
  extension === "" ? `${stem} (${counter})` : `${stem} (${counter}).${extension}`

/**
 * Picks the destination name for `candidate` inside a directory whose entries are `existing`.
 *
 * @param existing - Names already present in the destination directory.
 * @param renameOnConflict - When false an existing name yields Skip.
 * @returns Unchanged | Renamed | Skip, or ConflictExhausted after MAX_CONFLICT_PROBES probes.
 *
 * @pure true
 * @invariant Renamed.name is absent from existing
 * @complexity O(k) where k = number of probes
 */
export const resolveConflict = (
  existing: ReadonlySet<string>,
  candidate: string,
  renameOnConflict: boolean
): Either.Either<ConflictResolution, ConflictExhausted> => {
  if (!existing.has(candidate)) {
    return Either.right({ _tag: "Unchanged", name: candidate })
  }
  if (!renameOnConflict) {
    return Either.right({ _tag: "Skip" })
  }
  const parts = splitName(candidate)
  for (let counter = 1; counter <= MAX_CONFLICT_PROBES; counter += 1) {
    const probe = numberedName(parts, counter)
    if (!existing.has(probe)) {
      return Either.right({ _tag: "Renamed", name: probe })
    }
  }
  return Either.left(conflictExhausted(candidate))
}
