/**
 * Animal model.
 *
 * Animals are immutable snapshots; every transition returns a new `Animal`.
 * All levels stay inside 0..100 and an animal whose health reaches zero is
 * marked dead and never revived.
 *
 * @since 0.1.0
 */

import { Effect, Random, Schema } from "effect"
import { SPECIES, Species, type SpeciesTraits } from "./Species.js"
import { DAILY_RATION_NUTRITION, FOODS, type FoodType, type Inventory, adjustFood } from "./Supplies.js"
import { AnimalId, EnclosureId, Level, Sex } from "./Types.js"
import { clampLevel } from "./internal/pure.js"

const DAYS_PER_YEAR = 365

/**
 * Fixed constants of the daily animal transition.
 *
 * @since 0.1.0
 * @category Tuning
 */
export const ANIMAL_TUNING = {
  unfedHungerPenalty: 5,
  hungerUnhappyThreshold: 50,
  hungerUnhappyRate: 0.1,
  hungerStarvingThreshold: 80,
  hungerStarvingRate: 0.5,
  wellFedHungerMax: 30,
  wellFedHappinessMin: 60,
  wellFedHealthRegen: 0.5,
  contentCleanlinessMin: 70,
  contentHappinessGain: 1,
  oldAgeHealthLoss: 1,
  refusedFoodHunger: 5,
  refusedFoodHappiness: 5,
  criticalHealth: 30,
}

/**
 * A single zoo animal.
 *
 * @since 0.1.0
 * @category Models
 */
export class Animal extends Schema.Class<Animal>("Animal")({
  id: AnimalId,
  name: Schema.NonEmptyTrimmedString,
  species: Species,
  sex: Sex,
  ageDays: Schema.Int.pipe(Schema.nonNegative()),
  hunger: Level,
  health: Level,
  happiness: Level,
  alive: Schema.Boolean,
  enclosure: EnclosureId,
  pregnant: Schema.optionalWith(Schema.Boolean, { default: () => false }),
  daysPregnant: Schema.optionalWith(Schema.Int.pipe(Schema.nonNegative()), { default: () => 0 }),
}) {
  get traits(): SpeciesTraits {
    return SPECIES[this.species]
  }

  get ageYears(): number {
    return this.ageDays / DAYS_PER_YEAR
  }

  accepts(food: FoodType): boolean {
    return this.traits.acceptedFoods.includes(food)
  }

  /** Pregnant and at or past the species' gestation period. */
  get isDue(): boolean {
    return this.pregnant && this.daysPregnant >= this.traits.gestationDays
  }
}

/**
 * Options accepted by the animal factory.
 *
 * @since 0.1.0
 * @category Constructors
 */
export interface AnimalSpec {
  readonly id: AnimalId
  readonly species: Species
  readonly sex: Sex
  readonly enclosure: EnclosureId
  readonly name?: string | undefined
  readonly ageDays?: number | undefined
  readonly hunger?: number | undefined
  readonly health?: number | undefined
  readonly happiness?: number | undefined
}

/**
 * Animal factory keyed on species.
 *
 * @category Constructors
 * @since 0.1.0
 * @example
 * ```ts
 * const joey = makeAnimal({ id, species: "Kangaroo", sex: "M", enclosure })
 * joey.name // => "Kangaroo-1"
 * ```
 */
export const makeAnimal = (input: AnimalSpec): Animal => {
  const name = input.name?.trim()
  const health = clampLevel(input.health ?? 100)
  return new Animal({
    id: input.id,
    name: name && name.length > 0 ? name : `${SPECIES[input.species].label}-${input.id}`,
    species: input.species,
    sex: input.sex,
    ageDays: Math.max(0, Math.round(input.ageDays ?? 0)),
    hunger: clampLevel(input.hunger ?? 0),
    health,
    happiness: clampLevel(input.happiness ?? 100),
    alive: health > 0,
    enclosure: input.enclosure,
  })
}

/**
 * Level changes applied to an animal. Missing fields keep their value.
 *
 * @since 0.1.0
 */
export interface LevelChanges {
  readonly hunger?: number
  readonly health?: number
  readonly happiness?: number
}

/**
 * Apply level changes, clamping each level and marking the animal dead once
 * health reaches zero. Dead animals are returned unchanged.
 *
 * @since 0.1.0
 * @category Transitions
 */
export const withLevels = (animal: Animal, changes: LevelChanges): Animal => {
  if (!animal.alive) {
    return animal
  }
  const health = clampLevel(changes.health ?? animal.health)
  return new Animal({
    ...animal,
    hunger: clampLevel(changes.hunger ?? animal.hunger),
    health,
    happiness: clampLevel(changes.happiness ?? animal.happiness),
    alive: health > 0,
  })
}

/**
 * Shift levels by the given deltas.
 *
 * @since 0.1.0
 * @category Transitions
 */
export const shiftLevels = (animal: Animal, deltas: LevelChanges): Animal =>
  withLevels(animal, {
    hunger: animal.hunger + (deltas.hunger ?? 0),
    health: animal.health + (deltas.health ?? 0),
    happiness: animal.happiness + (deltas.happiness ?? 0),
  })

/**
 * Move an animal into another enclosure.
 *
 * @since 0.1.0
 */
export const relocate = (animal: Animal, enclosure: EnclosureId): Animal =>
  new Animal({ ...animal, enclosure })

/**
 * Outcome of feeding a single unit of food.
 *
 * @since 0.1.0
 */
export interface FeedingOutcome {
  readonly animal: Animal
  readonly accepted: boolean
  readonly message: string
}

/**
 * Feed one unit of food. Accepted food reduces hunger by its nutrition and
 * lifts mood and health a little; refused food only takes the edge off hunger.
 *
 * @since 0.1.0
 * @category Transitions
 */
export const feedAnimal = (animal: Animal, food: FoodType): FeedingOutcome => {
  if (!animal.accepts(food)) {
    return {
      animal: shiftLevels(animal, {
        hunger: -ANIMAL_TUNING.refusedFoodHunger,
        happiness: -ANIMAL_TUNING.refusedFoodHappiness,
      }),
      accepted: false,
      message: `${animal.name} refused some of the ${food}.`,
    }
  }
  const nutrition = FOODS[food].nutrition
  return {
    animal: shiftLevels(animal, {
      hunger: -nutrition,
      happiness: Math.min(10, nutrition * 0.3),
      health: Math.min(5, nutrition * 0.1),
    }),
    accepted: true,
    message: `${animal.name} ate ${food} (-${nutrition.toFixed(1)} hunger).`,
  }
}

/**
 * Give medicine restoring `healing` health.
 *
 * @since 0.1.0
 * @category Transitions
 */
export const medicateAnimal = (animal: Animal, healing: number): Animal =>
  shiftLevels(animal, { health: healing })

/**
 * @since 0.1.0
 */
export interface RationOutcome {
  readonly animal: Animal
  readonly inventory: Inventory
  readonly fed: boolean
}

/**
 * Serve the automatic daily ration: one unit of the first accepted food that
 * is in stock.
 *
 * @since 0.1.0
 * @category Transitions
 */
export const serveDailyRation = (animal: Animal, inventory: Inventory): RationOutcome => {
  const food = animal.traits.acceptedFoods.find((type) => inventory.foodUnits(type) > 0)
  if (food === undefined) {
    return { animal, inventory, fed: false }
  }
  return {
    animal: shiftLevels(animal, { hunger: -DAILY_RATION_NUTRITION }),
    inventory: adjustFood(inventory, food, -1),
    fed: true,
  }
}

/**
 * Context an animal's day depends on.
 *
 * @since 0.1.0
 */
export interface AnimalDayContext {
  readonly fed: boolean
  readonly cleanliness: number
}

/**
 * Advance an animal by one day: hunger grows, hunger drives happiness and
 * health, old age wears health down, and age increments.
 *
 * @since 0.1.0
 * @category Transitions
 */
export const advanceAnimalDay = (animal: Animal, context: AnimalDayContext): Animal => {
  if (!animal.alive) {
    return animal
  }
  const t = ANIMAL_TUNING
  const hunger = clampLevel(
    animal.hunger + animal.traits.hungerPerDay + (context.fed ? 0 : t.unfedHungerPenalty),
  )

  let happiness = animal.happiness
  if (hunger > t.hungerUnhappyThreshold) {
    happiness -= (hunger - t.hungerUnhappyThreshold) * t.hungerUnhappyRate
  } else if (hunger < t.hungerUnhappyThreshold && context.cleanliness >= t.contentCleanlinessMin) {
    happiness += t.contentHappinessGain
  }
  happiness = clampLevel(happiness)

  let health = animal.health
  if (hunger > t.hungerStarvingThreshold) {
    health -= (hunger - t.hungerStarvingThreshold) * t.hungerStarvingRate
  } else if (context.fed && hunger < t.wellFedHungerMax && happiness > t.wellFedHappinessMin) {
    health += t.wellFedHealthRegen
  }
  if (animal.ageYears >= animal.traits.lifeExpectancyYears) {
    health -= t.oldAgeHealthLoss
  }

  const aged = new Animal({
    ...animal,
    ageDays: animal.ageDays + 1,
    daysPregnant: animal.pregnant ? animal.daysPregnant + 1 : 0,
  })
  return withLevels(aged, { hunger, health, happiness })
}

/**
 * Whether an animal is fit to breed.
 *
 * @since 0.1.0
 */
export const isBreedingFit = (animal: Animal): boolean =>
  animal.alive && animal.health >= 60 && animal.happiness >= 50

/**
 * @since 0.1.0
 */
export const randomSex: Effect.Effect<Sex> = Effect.map(Random.nextBoolean, (female) => (female ? "F" : "M"))

/**
 * Chance that a fit pair conceives: the mean of their happiness, as a
 * fraction.
 *
 * @since 0.1.0
 */
export const conceptionChance = (first: Animal, second: Animal): number =>
  (first.happiness + second.happiness) / 200

/**
 * @since 0.1.0
 * @category Transitions
 */
export const conceive = (mother: Animal): Animal => new Animal({ ...mother, pregnant: true, daysPregnant: 0 })

/**
 * End a pregnancy, whether or not the newborn survives.
 *
 * @since 0.1.0
 * @category Transitions
 */
export const deliver = (mother: Animal): Animal => new Animal({ ...mother, pregnant: false, daysPregnant: 0 })
