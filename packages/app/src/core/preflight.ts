import { Either } from "effect"

export const DEFAULT_HEADROOM_PERCENT = 5

export interface PreflightError {
  readonly _tag: "PreflightError"
  readonly required: number
  readonly available: number
  readonly deficit: number
}

/**
 * Checks that `required` bytes fit into `available` while keeping a share of the
 * free space in reserve.
 *
 * @pure true
 * @invariant Right iff required + available * headroom / 100 <= available
 */
export const validateSpace = (
  required: number,
  available: number,
  headroomPercent: number = DEFAULT_HEADROOM_PERCENT
): Either.Either<number, PreflightError> => {
  const needed = required + (available * headroomPercent) / 100
  if (needed > available) {
    return Either.left({
      _tag: "PreflightError",
      required,
      available,
      deficit: needed - available
    })
  }
  return Either.right(available - required)
}
