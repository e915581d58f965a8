/**
 * Zoo settings.
 *
 * Every tuning constant of the game lives in `ZooSettings`, with a default for
 * each field. Callers override the fields they care about through
 * `ZooConfig.layer`, which decodes the overrides with Schema so a bad value
 * fails layer construction instead of surfacing mid-game.
 *
 * @since 0.1.0
 */

import { Context, Effect, Layer, Schema } from "effect"
import type { ParseError } from "effect/ParseResult"
import { Species } from "./Species.js"
import { Inventory } from "./Supplies.js"
import { Habitat, Level, Sex } from "./Types.js"

const Probability = Schema.Number.pipe(Schema.between(0, 1))
const Money = Schema.Number.pipe(Schema.finite(), Schema.nonNegative())

/**
 * Daily odds of each random event. The roll is checked cumulatively in the
 * order heatwave, donation, escape.
 *
 * @since 0.1.0
 * @category Settings
 */
export class EventOdds extends Schema.Class<EventOdds>("EventOdds")({
  heatwave: Schema.optionalWith(Probability, { default: () => 0.06 }),
  donation: Schema.optionalWith(Probability, { default: () => 0.06 }),
  escape: Schema.optionalWith(Probability, { default: () => 0.06 }),
}) {}

/**
 * @since 0.1.0
 * @category Settings
 */
export class VisitorTuning extends Schema.Class<VisitorTuning>("VisitorTuning")({
  baselineVisitors: Schema.optionalWith(Schema.Number.pipe(Schema.nonNegative()), { default: () => 5 }),
  attractionVisitors: Schema.optionalWith(Schema.Number.pipe(Schema.nonNegative()), { default: () => 45 }),
  noiseMin: Schema.optionalWith(Schema.Number.pipe(Schema.nonNegative()), { default: () => 0.8 }),
  noiseMax: Schema.optionalWith(Schema.Number.pipe(Schema.nonNegative()), { default: () => 1.2 }),
  spendMin: Schema.optionalWith(Money, { default: () => 5 }),
  spendMax: Schema.optionalWith(Money, { default: () => 25 }),
  cleanlinessWeight: Schema.optionalWith(Probability, { default: () => 0.4 }),
  diversityWeight: Schema.optionalWith(Probability, { default: () => 0.4 }),
  happinessWeight: Schema.optionalWith(Probability, { default: () => 0.2 }),
}) {}

/**
 * An enclosure built when the zoo opens.
 *
 * @since 0.1.0
 * @category Settings
 */
export class EnclosureBlueprint extends Schema.Class<EnclosureBlueprint>("EnclosureBlueprint")({
  name: Schema.NonEmptyTrimmedString,
  habitat: Habitat,
  capacity: Schema.Int.pipe(Schema.positive()),
  cleanliness: Schema.optionalWith(Level, { default: () => 100 }),
}) {}

/**
 * An animal present when the zoo opens. `enclosure` is the position of its
 * enclosure in `ZooSettings.enclosures`.
 *
 * @since 0.1.0
 * @category Settings
 */
export class AnimalBlueprint extends Schema.Class<AnimalBlueprint>("AnimalBlueprint")({
  species: Species,
  sex: Sex,
  enclosure: Schema.Int.pipe(Schema.nonNegative()),
  name: Schema.optional(Schema.NonEmptyTrimmedString),
  ageYears: Schema.optionalWith(Schema.Number.pipe(Schema.nonNegative()), { default: () => 0 }),
  health: Schema.optionalWith(Level, { default: () => 100 }),
  happiness: Schema.optionalWith(Level, { default: () => 100 }),
}) {}

/**
 * @since 0.1.0
 * @category Settings
 */
export const DEFAULT_ENCLOSURES: ReadonlyArray<EnclosureBlueprint> = [
  new EnclosureBlueprint({ name: "Forest Enclosure", habitat: "forest", capacity: 4 }),
  new EnclosureBlueprint({ name: "Grassland Enclosure", habitat: "grassland", capacity: 5 }),
  new EnclosureBlueprint({ name: "Aviary", habitat: "aviary", capacity: 6 }),
]

/**
 * @since 0.1.0
 * @category Settings
 */
export const DEFAULT_ANIMALS: ReadonlyArray<AnimalBlueprint> = [
  new AnimalBlueprint({ species: "Koala", name: "Kiki", sex: "F", ageYears: 2, enclosure: 0 }),
  new AnimalBlueprint({ species: "Koala", name: "Koko", sex: "M", ageYears: 3, enclosure: 0 }),
  new AnimalBlueprint({ species: "Kangaroo", name: "Joey", sex: "M", ageYears: 4, enclosure: 1 }),
  new AnimalBlueprint({ species: "WedgeTailedEagle", name: "Aerie", sex: "F", ageYears: 5, enclosure: 2 }),
]

/**
 * @since 0.1.0
 * @category Settings
 */
export const DEFAULT_INVENTORY = new Inventory({
  food: { eucalyptus: 20, herbivore_food: 30, seeds: 20, meaty_food: 10, general_food: 25 },
  medicine: { basic_med: 5, vet_kit: 0 },
})

/**
 * Tuning for one game.
 *
 * @since 0.1.0
 * @category Settings
 */
export class ZooSettings extends Schema.Class<ZooSettings>("ZooSettings")({
  zooName: Schema.optionalWith(Schema.NonEmptyTrimmedString, { default: () => "OzZoo" }),
  startingBalance: Schema.optionalWith(Schema.Number.pipe(Schema.finite()), { default: () => 2000 }),
  allowOverdraft: Schema.optionalWith(Schema.Boolean, { default: () => false }),
  ticketPrice: Schema.optionalWith(Money, { default: () => 25 }),
  tickIntervalMillis: Schema.optionalWith(Schema.Int.pipe(Schema.positive()), { default: () => 2500 }),
  maxAdvanceDays: Schema.optionalWith(Schema.Int.pipe(Schema.positive()), { default: () => 365 }),
  upkeepPerAnimal: Schema.optionalWith(Money, { default: () => 4 }),
  upkeepPerEnclosure: Schema.optionalWith(Money, { default: () => 10 }),
  heatwaveCoolingCost: Schema.optionalWith(Money, { default: () => 200 }),
  donationMin: Schema.optionalWith(Money, { default: () => 100 }),
  donationMax: Schema.optionalWith(Money, { default: () => 500 }),
  /** Donors only give while the balance is above this. */
  donationMinBalance: Schema.optionalWith(Schema.Number.pipe(Schema.finite()), { default: () => 1000 }),
  newbornHealth: Schema.optionalWith(Level, { default: () => 80 }),
  newbornHappiness: Schema.optionalWith(Level, { default: () => 80 }),
  saleRefundRate: Schema.optionalWith(Probability, { default: () => 0.5 }),
  eventOdds: Schema.optionalWith(EventOdds, { default: () => new EventOdds({}) }),
  visitors: Schema.optionalWith(VisitorTuning, { default: () => new VisitorTuning({}) }),
  enclosures: Schema.optionalWith(Schema.Array(EnclosureBlueprint), { default: () => DEFAULT_ENCLOSURES }),
  animals: Schema.optionalWith(Schema.Array(AnimalBlueprint), { default: () => DEFAULT_ANIMALS }),
  inventory: Schema.optionalWith(Inventory, { default: () => DEFAULT_INVENTORY }),
}) {}

/**
 * Plain-object overrides accepted by `ZooConfig.layer`; every field is
 * optional and nested settings fill their own defaults.
 *
 * @since 0.1.0
 * @category Settings
 */
export type ZooSettingsInput = typeof ZooSettings.Encoded

/**
 * @since 0.1.0
 * @category Settings
 */
export const decodeSettings = (input: ZooSettingsInput): Effect.Effect<ZooSettings, ParseError> =>
  Schema.decodeUnknown(ZooSettings)(input)

/**
 * The active settings of a runtime.
 *
 * @category Services
 * @since 0.1.0
 */
export class ZooConfig extends Context.Tag("ozzoo/ZooConfig")<ZooConfig, ZooSettings>() {
  static layer(overrides: ZooSettingsInput = {}): Layer.Layer<ZooConfig, ParseError> {
    return Layer.effect(this, decodeSettings(overrides))
  }
}
