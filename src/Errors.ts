/**
 * Error hierarchy for the zoo simulation.
 *
 * Every player-facing operation fails with one of a closed set of tagged
 * errors so callers can pattern match using `Effect.catchTag`. All of them are
 * recoverable rejections: the operation that raised one left the zoo and the
 * ledger exactly as they were.
 *
 * @since 0.1.0
 */

import { Data } from "effect"

/**
 * Raised when a debit exceeds the ledger balance and overdraft is not allowed.
 *
 * @category Errors
 * @since 0.1.0
 * @example
 * ```ts
 * const error = new InsufficientFundsError({ required: 150, balance: 100, reason: "Bought Koala" })
 * yield* Effect.fail(error)
 * ```
 */
export class InsufficientFundsError extends Data.TaggedError("InsufficientFundsError")<{
  readonly required: number
  readonly balance: number
  readonly reason: string
}> {
  override get message(): string {
    return `Insufficient funds for ${this.reason}: need $${this.required.toFixed(2)}, have $${this.balance.toFixed(2)}`
  }
}

/**
 * Raised when an animal would be placed into an enclosure that is already at
 * capacity.
 *
 * @category Errors
 * @since 0.1.0
 */
export class CapacityExceededError extends Data.TaggedError("CapacityExceededError")<{
  readonly enclosure: string
  readonly capacity: number
}> {
  override get message(): string {
    return `${this.enclosure} is full (capacity ${this.capacity})`
  }
}

/**
 * Raised for a species that does not belong in a habitat, or for a breeding
 * pair that cannot produce offspring.
 *
 * @category Errors
 * @since 0.1.0
 */
export class SpeciesIncompatibilityError extends Data.TaggedError("SpeciesIncompatibilityError")<{
  readonly reason: string
}> {
  override get message(): string {
    return this.reason
  }
}

/**
 * Raised for requests that make no sense in the current state: acting on a
 * dead or unknown animal, a non-positive quantity, an unknown species.
 *
 * @category Errors
 * @since 0.1.0
 */
export class InvalidActionError extends Data.TaggedError("InvalidActionError")<{
  readonly action: string
  readonly reason: string
}> {
  override get message(): string {
    return `Cannot ${this.action}: ${this.reason}`
  }
}

/**
 * Union of all zoo operation errors.
 *
 * @category Errors
 * @since 0.1.0
 */
export type ZooError =
  | InsufficientFundsError
  | CapacityExceededError
  | SpeciesIncompatibilityError
  | InvalidActionError
