import { describe, it, expect } from "@effect/vitest"
import { Effect } from "effect"
import {
  CapacityExceededError,
  InsufficientFundsError,
  InvalidActionError,
  SpeciesIncompatibilityError,
  type ZooError,
} from "../src/Errors.js"

describe("Zoo error hierarchy", () => {
  it("formats insufficient funds message", () => {
    const error = new InsufficientFundsError({ required: 150, balance: 100, reason: "Bought Emu" })

    expect(error.message).toBe("Insufficient funds for Bought Emu: need $150.00, have $100.00")
  })

  it("formats capacity message", () => {
    const error = new CapacityExceededError({ enclosure: "Small Pen", capacity: 2 })

    expect(error.message).toBe("Small Pen is full (capacity 2)")
  })

  it("uses the reason as the incompatibility message", () => {
    const error = new SpeciesIncompatibilityError({ reason: "Kiki and Joey are different species" })

    expect(error.message).toBe("Kiki and Joey are different species")
  })

  it("formats invalid action message", () => {
    const error = new InvalidActionError({ action: "feed", reason: "no animal with id 9" })

    expect(error.message).toBe("Cannot feed: no animal with id 9")
  })

  it.effect("supports catchTag across the union", () =>
    Effect.gen(function* () {
      const failing: Effect.Effect<string, ZooError> = Effect.fail(
        new CapacityExceededError({ enclosure: "Aviary", capacity: 6 }),
      )

      const handled = yield* failing.pipe(
        Effect.catchTag("CapacityExceededError", (error) => {
          expect(error.capacity).toBe(6)
          return Effect.succeed("handled")
        }),
        Effect.catchTag("InsufficientFundsError", () => Effect.succeed("wrong branch")),
      )

      expect(handled).toBe("handled")
    }),
  )

  it("exposes stable tags", () => {
    expect(new InvalidActionError({ action: "a", reason: "b" })._tag).toBe("InvalidActionError")
    expect(new InsufficientFundsError({ required: 1, balance: 0, reason: "x" })._tag).toBe("InsufficientFundsError")
  })
})
