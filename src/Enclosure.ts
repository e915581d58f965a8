/**
 * Enclosure model.
 *
 * An enclosure holds references to the animals living in it; the animals
 * themselves live in the zoo roster so they can be moved or sold without the
 * enclosure owning their lifetime.
 *
 * @since 0.1.0
 */

import { Either, Schema } from "effect"
import { CapacityExceededError, SpeciesIncompatibilityError } from "./Errors.js"
import { SPECIES, livesIn, type Species } from "./Species.js"
import { AnimalId, EnclosureId, Habitat, Level } from "./Types.js"
import { clamp, clampLevel } from "./internal/pure.js"

/**
 * Fixed constants for cleanliness decay, cleaning and upgrades.
 *
 * @since 0.1.0
 * @category Tuning
 */
export const ENCLOSURE_TUNING = {
  baseDecay: 2,
  decayPerResident: 0.5,
  dirtyThreshold: 30,
  dirtyHappinessLoss: 1,
  dirtyHealthLoss: 0.3,
  cleaningBaseCost: 20,
  upgradeBaseCost: 200,
  upgradeCapacityGain: 2,
  upgradeResistanceGain: 0.1,
  maxDecayResistance: 0.5,
  upgradeHappinessGain: 5,
}

/**
 * @since 0.1.0
 * @category Models
 */
export class Enclosure extends Schema.Class<Enclosure>("Enclosure")({
  id: EnclosureId,
  name: Schema.NonEmptyTrimmedString,
  habitat: Habitat,
  capacity: Schema.Int.pipe(Schema.positive()),
  cleanliness: Level,
  upgradeLevel: Schema.Int.pipe(Schema.greaterThanOrEqualTo(1)),
  decayResistance: Schema.Number.pipe(Schema.between(0, ENCLOSURE_TUNING.maxDecayResistance)),
  residents: Schema.Array(AnimalId),
}) {
  get occupancy(): number {
    return this.residents.length
  }

  get isFull(): boolean {
    return this.residents.length >= this.capacity
  }

  get isDirty(): boolean {
    return this.cleanliness < ENCLOSURE_TUNING.dirtyThreshold
  }

  houses(animal: number): boolean {
    return this.residents.some((resident) => resident === animal)
  }
}

/**
 * Check that a species may live in an enclosure and that there is room for
 * one more animal, without changing anything.
 *
 * @since 0.1.0
 */
export const checkPlacement = (
  enclosure: Enclosure,
  species: Species,
): Either.Either<Enclosure, CapacityExceededError | SpeciesIncompatibilityError> => {
  if (enclosure.isFull) {
    return Either.left(new CapacityExceededError({ enclosure: enclosure.name, capacity: enclosure.capacity }))
  }
  if (!livesIn(species, enclosure.habitat)) {
    return Either.left(
      new SpeciesIncompatibilityError({
        reason: `${SPECIES[species].label} cannot live in the ${enclosure.habitat} habitat of ${enclosure.name}`,
      }),
    )
  }
  return Either.right(enclosure)
}

/**
 * Add an animal to an enclosure, failing with `CapacityExceededError` when it
 * is full or `SpeciesIncompatibilityError` when the habitat does not suit the
 * species.
 *
 * @since 0.1.0
 */
export const admit = (
  enclosure: Enclosure,
  animal: { readonly id: AnimalId; readonly species: Species },
): Either.Either<Enclosure, CapacityExceededError | SpeciesIncompatibilityError> =>
  Either.map(checkPlacement(enclosure, animal.species), (current) =>
    current.houses(animal.id)
      ? current
      : new Enclosure({ ...current, residents: [...current.residents, animal.id] }),
  )

/**
 * Remove an animal reference. Unknown ids leave the enclosure unchanged.
 *
 * @since 0.1.0
 */
export const release = (enclosure: Enclosure, animal: number): Enclosure =>
  enclosure.houses(animal)
    ? new Enclosure({ ...enclosure, residents: enclosure.residents.filter((resident) => resident !== animal) })
    : enclosure

/**
 * Daily cleanliness decay, reduced by the enclosure's decay resistance.
 *
 * @since 0.1.0
 */
export const dailyDecay = (enclosure: Enclosure): number =>
  (ENCLOSURE_TUNING.baseDecay + ENCLOSURE_TUNING.decayPerResident * enclosure.occupancy) *
  (1 - enclosure.decayResistance)

/**
 * @since 0.1.0
 */
export const decayCleanliness = (enclosure: Enclosure): Enclosure =>
  soil(enclosure, dailyDecay(enclosure))

/**
 * Lower cleanliness by a fixed amount.
 *
 * @since 0.1.0
 */
export const soil = (enclosure: Enclosure, amount: number): Enclosure =>
  new Enclosure({ ...enclosure, cleanliness: clampLevel(enclosure.cleanliness - amount) })

/**
 * @since 0.1.0
 */
export const cleaningCost = (enclosure: Enclosure): number =>
  ENCLOSURE_TUNING.cleaningBaseCost * (1 + enclosure.occupancy / 2)

/**
 * @since 0.1.0
 */
export const clean = (enclosure: Enclosure): Enclosure => new Enclosure({ ...enclosure, cleanliness: 100 })

/**
 * @since 0.1.0
 */
export const upgradeCost = (enclosure: Enclosure): number =>
  ENCLOSURE_TUNING.upgradeBaseCost * enclosure.upgradeLevel

/**
 * Raise the upgrade level: more capacity and slower cleanliness decay.
 *
 * @since 0.1.0
 */
export const upgrade = (enclosure: Enclosure): Enclosure =>
  new Enclosure({
    ...enclosure,
    upgradeLevel: enclosure.upgradeLevel + 1,
    capacity: enclosure.capacity + ENCLOSURE_TUNING.upgradeCapacityGain,
    decayResistance: clamp(
      Math.round((enclosure.decayResistance + ENCLOSURE_TUNING.upgradeResistanceGain) * 100) / 100,
      0,
      ENCLOSURE_TUNING.maxDecayResistance,
    ),
  })
