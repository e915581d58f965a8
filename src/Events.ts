/**
 * Random daily events.
 *
 * One roll per day is checked against the cumulative odds of the catalog
 * (heatwave, donation, escape). At most one event happens per day.
 *
 * @since 0.1.0
 */

import { Data, Effect, Either, Random } from "effect"
import { shiftLevels } from "./Animal.js"
import { soil } from "./Enclosure.js"
import { detectAlerts, type HealthAlert } from "./Health.js"
import { Finance } from "./Ledger.js"
import type { EventOdds, ZooSettings } from "./Settings.js"
import { SPECIES, type Species } from "./Species.js"
import { ZooState, removeAnimal, residentsOf } from "./State.js"
import { formatMoney, roundCurrency } from "./internal/pure.js"

/**
 * Stress a heatwave puts on every animal and enclosure.
 *
 * @since 0.1.0
 * @category Tuning
 */
export const HEATWAVE_TUNING = {
  hunger: 10,
  health: -5,
  happiness: -10,
  cleanlinessLoss: 15,
}

/**
 * @since 0.1.0
 * @category Models
 */
export type ZooEvent = Data.TaggedEnum<{
  Quiet: {}
  Heatwave: { readonly affected: number; readonly coolingCost: number; readonly coolingPaid: boolean }
  Donation: { readonly amount: number }
  Escape: { readonly animal: string; readonly species: Species; readonly enclosure: string }
}>

/**
 * @since 0.1.0
 * @category Constructors
 */
export const ZooEvent = Data.taggedEnum<ZooEvent>()

/**
 * @since 0.1.0
 * @category Models
 */
export type EventKind = ZooEvent["_tag"]

/**
 * Map a uniform roll in [0, 1) onto the catalog.
 *
 * @since 0.1.0
 * @example
 * ```ts
 * selectEvent(0.07, new EventOdds({})) // => "Donation"
 * ```
 */
export const selectEvent = (roll: number, odds: EventOdds): EventKind => {
  let threshold = odds.heatwave
  if (roll < threshold) {
    return "Heatwave"
  }
  threshold += odds.donation
  if (roll < threshold) {
    return "Donation"
  }
  threshold += odds.escape
  if (roll < threshold) {
    return "Escape"
  }
  return "Quiet"
}

/**
 * What an event did to the zoo.
 *
 * @since 0.1.0
 */
export interface EventOutcome {
  readonly state: ZooState
  readonly event: ZooEvent
  readonly alerts: ReadonlyArray<HealthAlert>
  readonly messages: ReadonlyArray<string>
}

const heatwave = (state: ZooState, settings: ZooSettings) =>
  Effect.gen(function* () {
    const finance = yield* Finance
    const alerts: Array<HealthAlert> = []
    const animals = state.animals.map((animal) => {
      const next = shiftLevels(animal, HEATWAVE_TUNING)
      alerts.push(...detectAlerts(animal, next, state.day))
      return next
    })
    const enclosures = state.enclosures.map((enclosure) => soil(enclosure, HEATWAVE_TUNING.cleanlinessLoss))
    const cost = settings.heatwaveCoolingCost
    const payment = yield* Effect.either(finance.debit(cost, "Emergency cooling"))
    const coolingPaid = Either.isRight(payment)
    const messages = [
      "Heatwave! Animals are stressed.",
      coolingPaid
        ? `Paid ${formatMoney(cost)} for emergency cooling.`
        : `Could not afford emergency cooling (${formatMoney(cost)}).`,
    ]
    return {
      state: new ZooState({ ...state, animals, enclosures }),
      event: ZooEvent.Heatwave({
        affected: state.livingAnimals.length,
        coolingCost: cost,
        coolingPaid,
      }),
      alerts,
      messages,
    } satisfies EventOutcome
  })

const donation = (state: ZooState, settings: ZooSettings) =>
  Effect.gen(function* () {
    const finance = yield* Finance
    if ((yield* finance.balance) <= settings.donationMinBalance) {
      return quiet(state)
    }
    const amount = roundCurrency(yield* Random.nextRange(settings.donationMin, settings.donationMax))
    yield* finance.credit(amount, "Donation").pipe(Effect.orDie)
    return {
      state,
      event: ZooEvent.Donation({ amount }),
      alerts: [],
      messages: [`A generous donor gave ${formatMoney(amount)}.`],
    } satisfies EventOutcome
  })

const pick = <A>(items: ReadonlyArray<A>): Effect.Effect<A | undefined> =>
  items.length === 0
    ? Effect.succeed(undefined)
    : Effect.map(Random.nextIntBetween(0, items.length), (index) => items[index])

const escape = (state: ZooState) =>
  Effect.gen(function* () {
    const occupied = state.enclosures.filter((enclosure) => residentsOf(state, enclosure).some((a) => a.alive))
    const enclosure = yield* pick(occupied)
    const animal = enclosure ? yield* pick(residentsOf(state, enclosure).filter((a) => a.alive)) : undefined
    if (!enclosure || !animal) {
      return quiet(state)
    }
    return {
      state: removeAnimal(state, animal.id),
      event: ZooEvent.Escape({ animal: animal.name, species: animal.species, enclosure: enclosure.name }),
      alerts: [],
      messages: [`${animal.name} the ${SPECIES[animal.species].label} escaped from ${enclosure.name}!`],
    } satisfies EventOutcome
  })

const quiet = (state: ZooState): EventOutcome => ({ state, event: ZooEvent.Quiet(), alerts: [], messages: [] })

/**
 * Roll for and apply the day's event.
 *
 * @since 0.1.0
 */
export const runEvent = (state: ZooState, settings: ZooSettings): Effect.Effect<EventOutcome, never, Finance> =>
  Effect.gen(function* () {
    const roll = yield* Random.next
    switch (selectEvent(roll, settings.eventOdds)) {
      case "Heatwave":
        return yield* heatwave(state, settings)
      case "Donation":
        return yield* donation(state, settings)
      case "Escape":
        return yield* escape(state)
      case "Quiet":
        return quiet(state)
    }
  })
