/**
 * Visitor simulation.
 *
 * Visitors are not individuals: each day produces one `VisitorDay` summary
 * derived from the zoo's attractiveness score plus bounded noise.
 *
 * @since 0.1.0
 */

import { Effect, Random, Schema } from "effect"
import type { Animal } from "./Animal.js"
import type { Enclosure } from "./Enclosure.js"
import type { VisitorTuning } from "./Settings.js"
import { ALL_SPECIES } from "./Species.js"
import { clamp, mean, roundCurrency } from "./internal/pure.js"

/**
 * @since 0.1.0
 * @category Models
 */
export class VisitorDay extends Schema.Class<VisitorDay>("VisitorDay")({
  day: Schema.Int.pipe(Schema.positive()),
  visitors: Schema.Int.pipe(Schema.nonNegative()),
  attractiveness: Schema.Number.pipe(Schema.between(0, 1)),
  ticketIncome: Schema.Number.pipe(Schema.nonNegative()),
  spending: Schema.Number.pipe(Schema.nonNegative()),
}) {
  get total(): number {
    return roundCurrency(this.ticketIncome + this.spending)
  }
}

/**
 * Attractiveness in 0..1 from average enclosure cleanliness, species variety
 * among living animals and their average happiness. A zoo without enclosures
 * scores zero cleanliness; one without animals counts as half happy.
 *
 * @since 0.1.0
 */
export const attractiveness = (
  enclosures: ReadonlyArray<Enclosure>,
  animals: ReadonlyArray<Animal>,
  tuning: VisitorTuning,
): number => {
  const living = animals.filter((animal) => animal.alive)
  const cleanliness = mean(enclosures.map((enclosure) => enclosure.cleanliness), 0) / 100
  const diversity = Math.min(1, new Set(living.map((animal) => animal.species)).size / ALL_SPECIES.length)
  const happiness = mean(living.map((animal) => animal.happiness), 50) / 100
  return clamp(
    tuning.cleanlinessWeight * cleanliness + tuning.diversityWeight * diversity + tuning.happinessWeight * happiness,
    0,
    1,
  )
}

/**
 * Expected visitor count before noise.
 *
 * @since 0.1.0
 */
export const expectedVisitors = (score: number, tuning: VisitorTuning): number =>
  tuning.baselineVisitors + tuning.attractionVisitors * score

/**
 * Draw a day of visitors. Each visitor pays the ticket price and spends a
 * uniform amount in the configured range scaled by attractiveness.
 *
 * @since 0.1.0
 */
export const simulateVisitors = (
  day: number,
  score: number,
  tuning: VisitorTuning,
  ticketPrice: number,
): Effect.Effect<VisitorDay> =>
  Effect.gen(function* () {
    const noise = yield* Random.nextRange(tuning.noiseMin, tuning.noiseMax)
    const visitors = Math.max(0, Math.round(expectedVisitors(score, tuning) * noise))
    const spends = yield* Effect.replicateEffect(Random.nextRange(tuning.spendMin, tuning.spendMax), visitors)
    const spending = spends.reduce((total, spend) => total + spend * score, 0)
    return new VisitorDay({
      day,
      visitors,
      attractiveness: score,
      ticketIncome: roundCurrency(visitors * ticketPrice),
      spending: roundCurrency(spending),
    })
  })
