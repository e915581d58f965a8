import { describe, it, expect } from "@effect/vitest"
import { Effect, Either, Layer } from "effect"
import { InsufficientFundsError, InvalidActionError } from "../src/Errors.js"
import { Finance, credit, debit, makeLedger } from "../src/Ledger.js"
import { ZooConfig } from "../src/Settings.js"

const financeLayer = (startingBalance: number, allowOverdraft = false) =>
  Finance.layer.pipe(Layer.provide(ZooConfig.layer({ startingBalance, allowOverdraft })))

describe("Ledger", () => {
  it("credits and debits with history", () => {
    const opened = makeLedger(500)
    const after = Either.flatMap(credit(opened, 120.5, "Tickets"), (ledger) => debit(ledger, 20, "Cleaning"))

    expect(Either.isRight(after)).toBe(true)
    if (Either.isRight(after)) {
      expect(after.right.balance).toBe(600.5)
      expect(after.right.transactions.map((t) => [t.kind, t.amount, t.reason])).toEqual([
        ["income", 120.5, "Tickets"],
        ["expense", 20, "Cleaning"],
      ])
    }
    expect(opened.balance).toBe(500)
  })

  it("rejects a debit beyond the balance without changing anything", () => {
    const ledger = makeLedger(100)

    const result = debit(ledger, 150, "Bought Emu")

    expect(Either.isLeft(result)).toBe(true)
    if (Either.isLeft(result)) {
      expect(result.left).toBeInstanceOf(InsufficientFundsError)
      expect(result.left.message).toBe("Insufficient funds for Bought Emu: need $150.00, have $100.00")
    }
    expect(ledger.balance).toBe(100)
    expect(ledger.transactions).toEqual([])
  })

  it("goes negative only with overdraft", () => {
    const result = debit(makeLedger(100, true), 150, "Bought Emu")

    expect(Either.isRight(result)).toBe(true)
    if (Either.isRight(result)) {
      expect(result.right.balance).toBe(-50)
    }
  })

  it("rejects negative and non-finite amounts", () => {
    const ledger = makeLedger(100)

    for (const amount of [-1, Number.NaN, Number.POSITIVE_INFINITY]) {
      const result = credit(ledger, amount, "Bad")
      expect(Either.isLeft(result)).toBe(true)
      if (Either.isLeft(result)) {
        expect(result.left).toBeInstanceOf(InvalidActionError)
      }
    }
  })
})

describe("Finance service", () => {
  it.effect("opens with the configured balance", () =>
    Effect.gen(function* () {
      const finance = yield* Finance
      expect(yield* finance.balance).toBe(100)
      expect(yield* finance.canAfford(100)).toBe(true)
      expect(yield* finance.canAfford(100.01)).toBe(false)
    }).pipe(Effect.provide(financeLayer(100))),
  )

  it.effect("fails an unaffordable debit and keeps the balance", () =>
    Effect.gen(function* () {
      const finance = yield* Finance
      const error = yield* finance.debit(150, "Bought Emu").pipe(Effect.flip)

      expect(error._tag).toBe("InsufficientFundsError")
      expect(yield* finance.balance).toBe(100)
      expect((yield* finance.ledger).transactions).toEqual([])
    }).pipe(Effect.provide(financeLayer(100))),
  )

  it.effect("stamps transactions with the open day", () =>
    Effect.gen(function* () {
      const finance = yield* Finance
      yield* finance.credit(50, "Tickets")
      yield* finance.openDay(2)
      yield* finance.debit(30, "Upkeep")

      const ledger = yield* finance.ledger
      expect(ledger.balance).toBe(1020)
      expect(ledger.onDay(1).map((t) => t.reason)).toEqual(["Tickets"])
      expect(ledger.onDay(2).map((t) => t.reason)).toEqual(["Upkeep"])
    }).pipe(Effect.provide(financeLayer(1000))),
  )

  it.effect("allows overdraft when configured", () =>
    Effect.gen(function* () {
      const finance = yield* Finance
      yield* finance.debit(250, "Bought Emu")
      expect(yield* finance.balance).toBe(-150)
      expect(yield* finance.canAfford(10_000)).toBe(true)
    }).pipe(Effect.provide(financeLayer(100, true))),
  )
})
