/**
 * The day tick.
 *
 * A day runs a fixed pipeline of systems over the zoo state: animals, health
 * alerts, births, enclosures, visitors, the random event, finance settlement and the
 * removal of dead animals. Each system takes the state and returns the next
 * one; money moves through the `Finance` service as it happens.
 *
 * @since 0.1.0
 */

import { Effect, Either, Schema } from "effect"
import { advanceAnimalDay, deliver, makeAnimal, randomSex, serveDailyRation, shiftLevels, type Animal } from "./Animal.js"
import { ENCLOSURE_TUNING, admit, decayCleanliness } from "./Enclosure.js"
import { runEvent, type ZooEvent } from "./Events.js"
import { HealthMonitor, detectAlerts, describeAlert, type HealthAlert } from "./Health.js"
import { Finance } from "./Ledger.js"
import { ZooConfig, type ZooSettings } from "./Settings.js"
import { SPECIES } from "./Species.js"
import { ZooState, appendLog, findEnclosure, logLine, putAnimal, putEnclosure, removeAnimal } from "./State.js"
import { AnimalId } from "./Types.js"
import { VisitorDay, attractiveness, simulateVisitors } from "./Visitors.js"
import { formatMoney, roundCurrency } from "./internal/pure.js"

/**
 * Upkeep debited during settlement.
 *
 * @since 0.1.0
 */
export interface UpkeepSettlement {
  readonly amount: number
  readonly paid: boolean
}

/**
 * Summary of one simulated day.
 *
 * @since 0.1.0
 * @category Models
 */
export interface DayReport {
  readonly day: number
  readonly visitors: VisitorDay
  readonly event: ZooEvent
  readonly alerts: ReadonlyArray<HealthAlert>
  readonly deaths: ReadonlyArray<string>
  readonly births: ReadonlyArray<Animal>
  readonly upkeep: UpkeepSettlement
  readonly messages: ReadonlyArray<string>
  readonly balance: number
}

interface SystemResult {
  readonly state: ZooState
  readonly alerts: ReadonlyArray<HealthAlert>
  readonly messages: ReadonlyArray<string>
}

/**
 * Feed every living animal its daily ration and advance it one day.
 *
 * @since 0.1.0
 * @category Systems
 */
export const systemAnimals = (state: ZooState): SystemResult => {
  let inventory = state.inventory
  const alerts: Array<HealthAlert> = []
  const messages: Array<string> = []
  const animals = state.animals.map((animal): Animal => {
    if (!animal.alive) {
      return animal
    }
    const ration = serveDailyRation(animal, inventory)
    inventory = ration.inventory
    if (!ration.fed) {
      messages.push(`No suitable food in stock for ${animal.name}.`)
    }
    const cleanliness = findEnclosure(state, animal.enclosure)?.cleanliness ?? 100
    const next = advanceAnimalDay(ration.animal, { fed: ration.fed, cleanliness })
    alerts.push(...detectAlerts(animal, next, state.day))
    return next
  })
  return { state: new ZooState({ ...state, animals, inventory }), alerts, messages }
}

const decodeAnimalId = Schema.decodeSync(AnimalId)

/**
 * Deliver the newborn of every mother at term. A newborn that does not fit in
 * its mother's enclosure is lost; the pregnancy ends either way.
 *
 * @since 0.1.0
 * @category Systems
 */
export const systemBirths = (state: ZooState, settings: ZooSettings) =>
  Effect.gen(function* () {
    let next = state
    const births: Array<Animal> = []
    const messages: Array<string> = []
    for (const mother of state.animals.filter((animal) => animal.alive && animal.isDue)) {
      next = putAnimal(next, deliver(mother))
      const label = SPECIES[mother.species].label
      const enclosure = findEnclosure(next, mother.enclosure)
      if (!enclosure) {
        continue
      }
      const newborn = makeAnimal({
        id: decodeAnimalId(next.nextAnimalId),
        species: mother.species,
        sex: yield* randomSex,
        enclosure: enclosure.id,
        health: settings.newbornHealth,
        happiness: settings.newbornHappiness,
      })
      const placed = admit(enclosure, newborn)
      if (Either.isLeft(placed)) {
        messages.push(`${mother.name}'s baby ${label} could not be placed in ${enclosure.name} and did not survive.`)
        continue
      }
      next = new ZooState({
        ...putAnimal(putEnclosure(next, placed.right), newborn),
        nextAnimalId: next.nextAnimalId + 1,
      })
      births.push(newborn)
      messages.push(`${mother.name} gave birth to a baby ${label}, ${newborn.name}, in ${enclosure.name}.`)
    }
    return { state: next, births, messages }
  })

/**
 * Decay cleanliness; residents of a dirty enclosure lose happiness and health.
 *
 * @since 0.1.0
 * @category Systems
 */
export const systemEnclosures = (state: ZooState): SystemResult => {
  const enclosures = state.enclosures.map(decayCleanliness)
  const alerts: Array<HealthAlert> = []
  const messages: Array<string> = []
  const animals = state.animals.map((animal) => {
    const enclosure = enclosures.find((candidate) => candidate.id === animal.enclosure)
    if (!animal.alive || !enclosure?.isDirty) {
      return animal
    }
    const next = shiftLevels(animal, {
      happiness: -ENCLOSURE_TUNING.dirtyHappinessLoss,
      health: -ENCLOSURE_TUNING.dirtyHealthLoss,
    })
    alerts.push(...detectAlerts(animal, next, state.day))
    return next
  })
  for (const enclosure of enclosures) {
    if (enclosure.isDirty && enclosure.occupancy > 0) {
      messages.push(`${enclosure.name} is dirty (${enclosure.cleanliness.toFixed(1)}).`)
    }
  }
  return { state: new ZooState({ ...state, enclosures, animals }), alerts, messages }
}

/**
 * Draw the day's visitors and credit their ticket and spending income.
 *
 * @since 0.1.0
 * @category Systems
 */
export const systemVisitors = (state: ZooState, settings: ZooSettings) =>
  Effect.gen(function* () {
    const finance = yield* Finance
    const score = attractiveness(state.enclosures, state.animals, settings.visitors)
    const visitors = yield* simulateVisitors(state.day, score, settings.visitors, settings.ticketPrice)
    if (visitors.total > 0) {
      yield* finance.credit(visitors.total, `Visitor income (${visitors.visitors} visitors)`).pipe(Effect.orDie)
    }
    return {
      state: new ZooState({ ...state, lastVisitors: visitors }),
      visitors,
      messages: [`${visitors.visitors} visitors spent ${formatMoney(visitors.total)}.`],
    }
  })

/**
 * Daily upkeep per living animal and per enclosure. Upkeep that cannot be
 * afforded is recorded as unpaid; nothing is partially debited.
 *
 * @since 0.1.0
 * @category Systems
 */
export const systemSettlement = (state: ZooState, settings: ZooSettings) =>
  Effect.gen(function* () {
    const finance = yield* Finance
    const amount = roundCurrency(
      settings.upkeepPerAnimal * state.livingAnimals.length + settings.upkeepPerEnclosure * state.enclosures.length,
    )
    if (amount === 0) {
      return { upkeep: { amount, paid: true }, messages: [] }
    }
    const payment = yield* Effect.either(finance.debit(amount, "Daily upkeep"))
    const paid = Either.isRight(payment)
    return {
      upkeep: { amount, paid },
      messages: [paid ? `Paid ${formatMoney(amount)} upkeep.` : `Could not pay ${formatMoney(amount)} upkeep.`],
    }
  })

/**
 * Remove dead animals from the roster and their enclosures.
 *
 * @since 0.1.0
 * @category Systems
 */
export const systemReaper = (state: ZooState): { readonly state: ZooState; readonly deaths: ReadonlyArray<string> } => {
  const dead = state.animals.filter((animal) => !animal.alive)
  return {
    state: dead.reduce((current, animal) => removeAnimal(current, animal.id), state),
    deaths: dead.map((animal) => animal.name),
  }
}

/**
 * Run one day and return the next state with its report. A day never fails:
 * unaffordable costs are recorded rather than raised.
 *
 * @since 0.1.0
 */
export const runDay = (
  initial: ZooState,
): Effect.Effect<{ readonly state: ZooState; readonly report: DayReport }, never, Finance | HealthMonitor | ZooConfig> =>
  Effect.gen(function* () {
    const settings = yield* ZooConfig
    const finance = yield* Finance
    const monitor = yield* HealthMonitor
    const day = initial.day
    yield* finance.openDay(day)

    const animals = systemAnimals(initial)
    yield* monitor.notify(animals.alerts)
    const births = yield* systemBirths(animals.state, settings)
    const enclosures = systemEnclosures(births.state)
    yield* monitor.notify(enclosures.alerts)
    const visitors = yield* systemVisitors(enclosures.state, settings)
    const event = yield* runEvent(visitors.state, settings)
    yield* monitor.notify(event.alerts)
    const settlement = yield* systemSettlement(event.state, settings)
    const reaped = systemReaper(event.state)

    const alerts = [...animals.alerts, ...enclosures.alerts, ...event.alerts]
    const messages = [
      ...animals.messages,
      ...alerts.map(describeAlert),
      ...births.messages,
      ...enclosures.messages,
      ...visitors.messages,
      ...event.messages,
      ...settlement.messages,
      ...reaped.deaths.map((name) => `${name} has died and was removed.`),
    ]
    yield* Effect.forEach(messages, (message) => Effect.logInfo(message), { discard: true }).pipe(
      Effect.annotateLogs("day", day),
    )

    const state = new ZooState({
      ...appendLog(reaped.state, messages.map((message) => logLine(day, message))),
      day: day + 1,
    })
    return {
      state,
      report: {
        day,
        visitors: visitors.visitors,
        event: event.event,
        alerts,
        deaths: reaped.deaths,
        births: births.births,
        upkeep: settlement.upkeep,
        messages,
        balance: yield* finance.balance,
      },
    }
  })
