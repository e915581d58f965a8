/**
 * Finance ledger and the `Finance` service.
 *
 * The ledger is a plain immutable value with pure `credit`/`debit` helpers.
 * The `Finance` service owns the one ledger of a runtime behind a `Ref`, so
 * every purchase path in the zoo sees the same balance.
 *
 * @since 0.1.0
 */

import { Context, Effect, Either, Layer, Ref, Schema } from "effect"
import { InsufficientFundsError, InvalidActionError } from "./Errors.js"
import { ZooConfig } from "./Settings.js"
import { roundCurrency } from "./internal/pure.js"

/**
 * A single ledger movement.
 *
 * @since 0.1.0
 * @category Models
 */
export class Transaction extends Schema.Class<Transaction>("Transaction")({
  day: Schema.Int.pipe(Schema.positive()),
  kind: Schema.Literal("income", "expense"),
  amount: Schema.Number.pipe(Schema.nonNegative()),
  reason: Schema.String,
}) {}

/**
 * @since 0.1.0
 * @category Models
 */
export class Ledger extends Schema.Class<Ledger>("Ledger")({
  balance: Schema.Number.pipe(Schema.finite()),
  allowOverdraft: Schema.Boolean,
  day: Schema.Int.pipe(Schema.positive()),
  transactions: Schema.Array(Transaction),
}) {
  /**
   * Transactions recorded on a given day.
   */
  onDay(day: number): ReadonlyArray<Transaction> {
    return this.transactions.filter((entry) => entry.day === day)
  }
}

/**
 * @since 0.1.0
 * @category Constructors
 */
export const makeLedger = (openingBalance: number, allowOverdraft = false): Ledger =>
  new Ledger({ balance: roundCurrency(openingBalance), allowOverdraft, day: 1, transactions: [] })

const validateAmount = (
  action: string,
  amount: number,
): Either.Either<number, InvalidActionError> =>
  Number.isFinite(amount) && amount >= 0
    ? Either.right(roundCurrency(amount))
    : Either.left(new InvalidActionError({ action, reason: `amount must be a non-negative number, got ${amount}` }))

const record = (ledger: Ledger, kind: Transaction["kind"], amount: number, reason: string): Ledger =>
  new Ledger({
    ...ledger,
    balance: roundCurrency(kind === "income" ? ledger.balance + amount : ledger.balance - amount),
    transactions: [...ledger.transactions, new Transaction({ day: ledger.day, kind, amount, reason })],
  })

/**
 * Record income.
 *
 * @since 0.1.0
 */
export const credit = (
  ledger: Ledger,
  amount: number,
  reason: string,
): Either.Either<Ledger, InvalidActionError> =>
  Either.map(validateAmount("credit", amount), (value) => record(ledger, "income", value, reason))

/**
 * Record an expense. Fails without touching the ledger when the amount exceeds
 * the balance and overdraft is not allowed; there is no partial debit.
 *
 * @since 0.1.0
 */
export const debit = (
  ledger: Ledger,
  amount: number,
  reason: string,
): Either.Either<Ledger, InsufficientFundsError | InvalidActionError> =>
  Either.flatMap(validateAmount("debit", amount), (value) =>
    !ledger.allowOverdraft && value > ledger.balance
      ? Either.left(new InsufficientFundsError({ required: value, balance: ledger.balance, reason }))
      : Either.right(record(ledger, "expense", value, reason)),
  )

export interface FinanceService {
  readonly ledger: Effect.Effect<Ledger>
  readonly balance: Effect.Effect<number>
  readonly canAfford: (amount: number) => Effect.Effect<boolean>
  readonly credit: (amount: number, reason: string) => Effect.Effect<Ledger, InvalidActionError>
  readonly debit: (
    amount: number,
    reason: string,
  ) => Effect.Effect<Ledger, InsufficientFundsError | InvalidActionError>
  /**
   * Stamp subsequent transactions with `day`.
   */
  readonly openDay: (day: number) => Effect.Effect<void>
}

/**
 * Build a finance service around a fresh ledger.
 *
 * @since 0.1.0
 * @category Constructors
 */
export const makeFinance = (initial: Ledger): Effect.Effect<FinanceService> =>
  Effect.gen(function* () {
    const ledgerRef = yield* Ref.make(initial)
    const getLedger = Ref.get(ledgerRef)

    const apply = <E>(step: (current: Ledger) => Either.Either<Ledger, E>): Effect.Effect<Ledger, E> =>
      Ref.modify(ledgerRef, (current) => {
        const result = step(current)
        return [result, Either.getOrElse(result, () => current)] as const
      }).pipe(
        Effect.flatMap((result) =>
          Either.isRight(result) ? Effect.succeed(result.right) : Effect.fail(result.left),
        ),
      )

    const service: FinanceService = {
      ledger: getLedger,
      balance: Effect.map(getLedger, (ledger) => ledger.balance),
      canAfford: (amount) =>
        Effect.map(getLedger, (ledger) => ledger.allowOverdraft || roundCurrency(amount) <= ledger.balance),
      credit: (amount, reason) => apply((current) => credit(current, amount, reason)),
      debit: (amount, reason) => apply((current) => debit(current, amount, reason)),
      openDay: (day) => Ref.update(ledgerRef, (current) => new Ledger({ ...current, day })),
    }

    return service
  })

/**
 * The single finance manager of a runtime.
 *
 * @category Services
 * @since 0.1.0
 */
export class Finance extends Context.Tag("ozzoo/Finance")<Finance, FinanceService>() {
  /**
   * Ledger opened with the configured starting balance and overdraft policy.
   */
  static readonly layer = Layer.effect(
    this,
    Effect.gen(function* () {
      const settings = yield* ZooConfig
      return yield* makeFinance(makeLedger(settings.startingBalance, settings.allowOverdraft))
    }),
  )
}
