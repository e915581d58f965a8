/**
 * The zoo orchestrator.
 *
 * `Zoo` owns the zoo state and exposes the player commands and the day tick.
 * Commands and ticks are serialized through one permit, so there is exactly
 * one mutator at a time, and each runs uninterruptibly. A command validates
 * everything before it debits, so a failure leaves both the state and the
 * ledger untouched.
 *
 * @since 0.1.0
 */

import { Context, Effect, Layer, Random, Ref, Schema } from "effect"
import type { ParseError } from "effect/ParseResult"
import {
  type Animal,
  conceive,
  conceptionChance,
  feedAnimal,
  isBreedingFit,
  makeAnimal,
  medicateAnimal,
  randomSex,
  relocate,
  shiftLevels,
} from "./Animal.js"
import {
  ENCLOSURE_TUNING,
  Enclosure,
  admit,
  checkPlacement,
  clean,
  cleaningCost,
  release,
  upgrade,
  upgradeCost,
} from "./Enclosure.js"
import { InsufficientFundsError, InvalidActionError, SpeciesIncompatibilityError, type ZooError } from "./Errors.js"
import { HealthMonitor } from "./Health.js"
import { Finance } from "./Ledger.js"
import { type GeneratedReport, type ReportFormat, buildReport, generateReport } from "./Report.js"
import { ZooConfig, type ZooSettings, type ZooSettingsInput } from "./Settings.js"
import { SPECIES, type Species } from "./Species.js"
import {
  FOODS,
  type FoodType,
  type Inventory,
  MEDICINES,
  type MedicineType,
  adjustFood,
  adjustMedicine,
} from "./Supplies.js"
import { type DayReport, runDay } from "./Tick.js"
import { AnimalId, EnclosureId, type Sex } from "./Types.js"
import {
  ZooState,
  appendLog,
  findAnimal,
  findEnclosure,
  logLine,
  putAnimal,
  putEnclosure,
  removeAnimal,
  residentsOf,
} from "./State.js"
import { formatMoney, roundCurrency } from "./internal/pure.js"

const decodeAnimalId = Schema.decodeSync(AnimalId)
const decodeEnclosureId = Schema.decodeSync(EnclosureId)

/**
 * Result of a successful command: the entity it produced or changed and the
 * line recorded in the event log.
 *
 * @since 0.1.0
 * @category Models
 */
export interface Outcome<A> {
  readonly value: A
  readonly message: string
}

/**
 * @since 0.1.0
 * @category Models
 */
export interface BuyAnimalOptions {
  readonly name?: string | undefined
  readonly sex?: Sex | undefined
}

/**
 * @since 0.1.0
 * @category Services
 */
export interface ZooService {
  readonly snapshot: Effect.Effect<ZooState>
  readonly advanceDay: Effect.Effect<DayReport>
  readonly advanceDays: (days: number) => Effect.Effect<ReadonlyArray<DayReport>, InvalidActionError>
  readonly feed: (animal: number, food: FoodType) => Effect.Effect<Outcome<Animal>, ZooError>
  readonly medicate: (animal: number, medicine?: MedicineType) => Effect.Effect<Outcome<Animal>, ZooError>
  readonly breed: (first: number, second: number) => Effect.Effect<Outcome<Animal>, ZooError>
  readonly buyFood: (food: FoodType, quantity: number) => Effect.Effect<Outcome<Inventory>, ZooError>
  readonly buyMedicine: (medicine: MedicineType, quantity: number) => Effect.Effect<Outcome<Inventory>, ZooError>
  readonly buyAnimal: (
    species: Species,
    enclosure: number,
    options?: BuyAnimalOptions,
  ) => Effect.Effect<Outcome<Animal>, ZooError>
  readonly clean: (enclosure: number) => Effect.Effect<Outcome<Enclosure>, ZooError>
  readonly upgrade: (enclosure: number) => Effect.Effect<Outcome<Enclosure>, ZooError>
  readonly sell: (animal: number) => Effect.Effect<Outcome<number>, ZooError>
  readonly move: (animal: number, enclosure: number) => Effect.Effect<Outcome<Animal>, ZooError>
  readonly report: (format: ReportFormat) => Effect.Effect<GeneratedReport>
}

const requireAnimal = (state: ZooState, id: number, action: string) =>
  Effect.gen(function* () {
    const animal = findAnimal(state, id)
    if (!animal) {
      return yield* new InvalidActionError({ action, reason: `no animal with id ${id}` })
    }
    if (!animal.alive) {
      return yield* new InvalidActionError({ action, reason: `${animal.name} is dead` })
    }
    return animal
  })

const requireEnclosure = (state: ZooState, id: number, action: string) =>
  Effect.gen(function* () {
    const enclosure = findEnclosure(state, id)
    if (!enclosure) {
      return yield* new InvalidActionError({ action, reason: `no enclosure with id ${id}` })
    }
    return enclosure
  })

const requireQuantity = (quantity: number, action: string) =>
  Number.isInteger(quantity) && quantity > 0
    ? Effect.succeed(quantity)
    : Effect.fail(new InvalidActionError({ action, reason: `quantity must be a positive whole number, got ${quantity}` }))

/**
 * Build the opening state from the configured starter enclosures, animals and
 * inventory.
 *
 * @since 0.1.0
 * @category Constructors
 */
export const openingState = (settings: ZooSettings): Effect.Effect<ZooState, ZooError> =>
  Effect.gen(function* () {
    let state = new ZooState({
      day: 1,
      enclosures: settings.enclosures.map(
        (blueprint, index) =>
          new Enclosure({
            id: decodeEnclosureId(index + 1),
            name: blueprint.name,
            habitat: blueprint.habitat,
            capacity: blueprint.capacity,
            cleanliness: blueprint.cleanliness,
            upgradeLevel: 1,
            decayResistance: 0,
            residents: [],
          }),
      ),
      animals: [],
      inventory: settings.inventory,
      lastVisitors: undefined,
      eventLog: [],
      nextAnimalId: 1,
    })
    for (const blueprint of settings.animals) {
      const enclosure = state.enclosures[blueprint.enclosure]
      if (!enclosure) {
        return yield* new InvalidActionError({
          action: "open the zoo",
          reason: `starter ${SPECIES[blueprint.species].label} refers to missing enclosure #${blueprint.enclosure + 1}`,
        })
      }
      const animal = makeAnimal({
        id: decodeAnimalId(state.nextAnimalId),
        species: blueprint.species,
        sex: blueprint.sex,
        name: blueprint.name,
        ageDays: blueprint.ageYears * 365,
        health: blueprint.health,
        happiness: blueprint.happiness,
        enclosure: enclosure.id,
      })
      const housed = yield* admit(enclosure, animal)
      state = new ZooState({ ...putAnimal(putEnclosure(state, housed), animal), nextAnimalId: state.nextAnimalId + 1 })
    }
    return state
  })

/**
 * Build a zoo service around an opening state.
 *
 * @since 0.1.0
 * @category Constructors
 */
export const makeZoo = (
  initial: ZooState,
): Effect.Effect<ZooService, never, Finance | HealthMonitor | ZooConfig> =>
  Effect.gen(function* () {
    const context = yield* Effect.context<Finance | HealthMonitor | ZooConfig>()
    const settings = yield* ZooConfig
    const finance = yield* Finance
    const stateRef = yield* Ref.make(initial)
    const lock = yield* Effect.makeSemaphore(1)

    const transact = <A, E>(
      step: (state: ZooState) => Effect.Effect<readonly [Outcome<A>, ZooState], E>,
    ): Effect.Effect<Outcome<A>, E> =>
      lock.withPermits(1)(
        Effect.uninterruptible(
          Effect.gen(function* () {
            const current = yield* Ref.get(stateRef)
            const [outcome, next] = yield* step(current)
            yield* Ref.set(stateRef, appendLog(next, [logLine(current.day, outcome.message)]))
            yield* Effect.logInfo(outcome.message).pipe(Effect.annotateLogs("day", current.day))
            return outcome
          }),
        ),
      )

    const advanceDay: Effect.Effect<DayReport> = lock.withPermits(1)(
      Effect.uninterruptible(
        Effect.gen(function* () {
          const current = yield* Ref.get(stateRef)
          const { report, state } = yield* runDay(current).pipe(Effect.provide(context))
          yield* Ref.set(stateRef, state)
          return report
        }),
      ),
    )

    const feed = (id: number, food: FoodType) =>
      transact((state) =>
        Effect.gen(function* () {
          const animal = yield* requireAnimal(state, id, "feed")
          const inStock = state.inventory.foodUnits(food) > 0
          if (!inStock) {
            yield* finance.debit(FOODS[food].unitPrice, `Bought 1 ${food} for ${animal.name}`)
          }
          const inventory = inStock ? adjustFood(state.inventory, food, -1) : state.inventory
          const fed = feedAnimal(animal, food)
          const message = inStock
            ? fed.message
            : `${fed.message} (bought for ${formatMoney(FOODS[food].unitPrice)})`
          return [{ value: fed.animal, message }, putAnimal(new ZooState({ ...state, inventory }), fed.animal)] as const
        }),
      )

    const medicate = (id: number, medicine: MedicineType = "basic_med") =>
      transact((state) =>
        Effect.gen(function* () {
          const animal = yield* requireAnimal(state, id, "give medicine")
          const definition = MEDICINES[medicine]
          const inStock = state.inventory.medicineUnits(medicine) > 0
          if (!inStock) {
            yield* finance.debit(definition.unitPrice, `Bought 1 ${medicine} for ${animal.name}`)
          }
          const inventory = inStock ? adjustMedicine(state.inventory, medicine, -1) : state.inventory
          const treated = medicateAnimal(animal, definition.healing)
          const message = `${animal.name} received ${definition.label} (+${definition.healing} health).`
          return [{ value: treated, message }, putAnimal(new ZooState({ ...state, inventory }), treated)] as const
        }),
      )

    const breed = (firstId: number, secondId: number) =>
      transact((state) =>
        Effect.gen(function* () {
          if (firstId === secondId) {
            return yield* new InvalidActionError({ action: "breed", reason: "an animal cannot breed with itself" })
          }
          const first = yield* requireAnimal(state, firstId, "breed")
          const second = yield* requireAnimal(state, secondId, "breed")
          if (first.species !== second.species) {
            return yield* new SpeciesIncompatibilityError({
              reason: `${first.name} (${SPECIES[first.species].label}) and ${second.name} (${SPECIES[second.species].label}) are different species`,
            })
          }
          if (first.sex === second.sex) {
            return yield* new SpeciesIncompatibilityError({
              reason: `${first.name} and ${second.name} are both ${first.sex === "M" ? "male" : "female"}`,
            })
          }
          const unfit = [first, second].find((animal) => !isBreedingFit(animal))
          if (unfit) {
            return yield* new InvalidActionError({
              action: "breed",
              reason: `${unfit.name} is not healthy and happy enough`,
            })
          }
          if (first.enclosure !== second.enclosure) {
            return yield* new InvalidActionError({
              action: "breed",
              reason: `${first.name} and ${second.name} do not share an enclosure`,
            })
          }
          const expecting = [first, second].find((animal) => animal.pregnant)
          if (expecting) {
            return yield* new InvalidActionError({ action: "breed", reason: `${expecting.name} is already pregnant` })
          }
          const enclosure = yield* requireEnclosure(state, first.enclosure, "breed")
          yield* checkPlacement(enclosure, first.species)
          const roll = yield* Random.next
          const mother = first.sex === "F" ? first : second
          if (roll >= conceptionChance(first, second)) {
            const message = `${first.name} and ${second.name} did not conceive this time.`
            return [{ value: mother, message }, state] as const
          }
          const pregnant = conceive(mother)
          const traits = SPECIES[mother.species]
          const message =
            `${first.name} and ${second.name} are expecting: ${mother.name} will have a baby ${traits.label} ` +
            `in ${traits.gestationDays} days.`
          return [{ value: pregnant, message }, putAnimal(state, pregnant)] as const
        }),
      )

    const buyFood = (food: FoodType, quantity: number) =>
      transact((state) =>
        Effect.gen(function* () {
          const units = yield* requireQuantity(quantity, "buy food")
          const cost = roundCurrency(FOODS[food].unitPrice * units)
          yield* finance.debit(cost, `Bought ${units} ${food}`)
          const inventory = adjustFood(state.inventory, food, units)
          const message = `Bought ${units} ${food} for ${formatMoney(cost)}.`
          return [{ value: inventory, message }, new ZooState({ ...state, inventory })] as const
        }),
      )

    const buyMedicine = (medicine: MedicineType, quantity: number) =>
      transact((state) =>
        Effect.gen(function* () {
          const units = yield* requireQuantity(quantity, "buy medicine")
          const cost = roundCurrency(MEDICINES[medicine].unitPrice * units)
          yield* finance.debit(cost, `Bought ${units} ${medicine}`)
          const inventory = adjustMedicine(state.inventory, medicine, units)
          const message = `Bought ${units} ${medicine} for ${formatMoney(cost)}.`
          return [{ value: inventory, message }, new ZooState({ ...state, inventory })] as const
        }),
      )

    const buyAnimal = (species: Species, enclosureId: number, options: BuyAnimalOptions = {}) =>
      transact((state) =>
        Effect.gen(function* () {
          const enclosure = yield* requireEnclosure(state, enclosureId, "buy animal")
          const traits = SPECIES[species]
          const ledger = yield* finance.ledger
          if (!ledger.allowOverdraft && traits.price > ledger.balance) {
            return yield* new InsufficientFundsError({
              required: traits.price,
              balance: ledger.balance,
              reason: `Bought ${traits.label}`,
            })
          }
          yield* checkPlacement(enclosure, species)
          const sex = options.sex ?? (yield* randomSex)
          const animal = makeAnimal({
            id: decodeAnimalId(state.nextAnimalId),
            species,
            sex,
            name: options.name,
            enclosure: enclosure.id,
          })
          const housed = yield* admit(enclosure, animal)
          yield* finance.debit(traits.price, `Bought ${traits.label}`)
          const next = new ZooState({
            ...putAnimal(putEnclosure(state, housed), animal),
            nextAnimalId: state.nextAnimalId + 1,
          })
          const message = `Bought ${animal.name} the ${traits.label} for ${formatMoney(traits.price)} into ${enclosure.name}.`
          return [{ value: animal, message }, next] as const
        }),
      )

    const cleanEnclosure = (id: number) =>
      transact((state) =>
        Effect.gen(function* () {
          const enclosure = yield* requireEnclosure(state, id, "clean")
          const cost = roundCurrency(cleaningCost(enclosure))
          yield* finance.debit(cost, `Cleaned ${enclosure.name}`)
          const cleaned = clean(enclosure)
          const message = `Cleaned ${enclosure.name} for ${formatMoney(cost)}.`
          return [{ value: cleaned, message }, putEnclosure(state, cleaned)] as const
        }),
      )

    const upgradeEnclosure = (id: number) =>
      transact((state) =>
        Effect.gen(function* () {
          const enclosure = yield* requireEnclosure(state, id, "upgrade")
          const cost = roundCurrency(upgradeCost(enclosure))
          yield* finance.debit(cost, `Upgraded ${enclosure.name}`)
          const upgraded = upgrade(enclosure)
          const next = residentsOf(state, enclosure).reduce(
            (current, animal) => putAnimal(current, shiftLevels(animal, { happiness: ENCLOSURE_TUNING.upgradeHappinessGain })),
            putEnclosure(state, upgraded),
          )
          const message = `Upgraded ${enclosure.name} to level ${upgraded.upgradeLevel} for ${formatMoney(cost)}.`
          return [{ value: upgraded, message }, next] as const
        }),
      )

    const sell = (id: number) =>
      transact((state) =>
        Effect.gen(function* () {
          const animal = yield* requireAnimal(state, id, "sell")
          const refund = roundCurrency(SPECIES[animal.species].price * settings.saleRefundRate)
          yield* finance.credit(refund, `Sold ${animal.name}`)
          const message = `Sold ${animal.name} for ${formatMoney(refund)}.`
          return [{ value: refund, message }, removeAnimal(state, animal.id)] as const
        }),
      )

    const move = (id: number, enclosureId: number) =>
      transact((state) =>
        Effect.gen(function* () {
          const animal = yield* requireAnimal(state, id, "move")
          const target = yield* requireEnclosure(state, enclosureId, "move")
          if (target.id === animal.enclosure) {
            return yield* new InvalidActionError({
              action: "move",
              reason: `${animal.name} already lives in ${target.name}`,
            })
          }
          const housed = yield* admit(target, animal)
          const source = findEnclosure(state, animal.enclosure)
          const moved = relocate(animal, target.id)
          const vacated = source ? putEnclosure(state, release(source, animal.id)) : state
          const next = putAnimal(putEnclosure(vacated, housed), moved)
          const message = `Moved ${animal.name} to ${target.name}.`
          return [{ value: moved, message }, next] as const
        }),
      )

    const report = (format: ReportFormat) =>
      Effect.gen(function* () {
        const [state, ledger] = yield* lock.withPermits(1)(Effect.zip(Ref.get(stateRef), finance.ledger))
        const generated = generateReport(buildReport(settings.zooName, state, ledger), format)
        if (generated.notice) {
          yield* Effect.logWarning(generated.notice)
        }
        return generated
      })

    const service: ZooService = {
      snapshot: lock.withPermits(1)(Ref.get(stateRef)),
      advanceDay,
      advanceDays: (days) =>
        Number.isInteger(days) && days > 0 && days <= settings.maxAdvanceDays
          ? Effect.replicateEffect(advanceDay, days)
          : Effect.fail(
              new InvalidActionError({
                action: "advance",
                reason: `days must be a whole number from 1 to ${settings.maxAdvanceDays}, got ${days}`,
              }),
            ),
      feed,
      medicate,
      breed,
      buyFood,
      buyMedicine,
      buyAnimal,
      clean: cleanEnclosure,
      upgrade: upgradeEnclosure,
      sell,
      move,
      report,
    }
    return service
  })

/**
 * @category Services
 * @since 0.1.0
 */
export class Zoo extends Context.Tag("ozzoo/Zoo")<Zoo, ZooService>() {
  /**
   * Zoo opened from the configured settings. Requires the finance, health
   * and settings services.
   */
  static readonly layer = Layer.effect(
    this,
    Effect.gen(function* () {
      const settings = yield* ZooConfig
      const initial = yield* openingState(settings)
      return yield* makeZoo(initial)
    }),
  )

  /**
   * A complete zoo runtime: settings decoded from `overrides`, one ledger, the
   * logging health monitor and the zoo itself.
   */
  static live(
    overrides: ZooSettingsInput = {},
  ): Layer.Layer<Zoo | Finance | HealthMonitor | ZooConfig, ZooError | ParseError> {
    return this.layer.pipe(
      Layer.provideMerge(Layer.mergeAll(Finance.layer, HealthMonitor.layer)),
      Layer.provideMerge(ZooConfig.layer(overrides)),
    )
  }
}
