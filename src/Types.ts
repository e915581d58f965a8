/**
 * Type Foundations & Branded IDs
 *
 * Animals and enclosures are addressed by positive integer ids. Branding keeps
 * an `AnimalId` from being passed where an `EnclosureId` is expected.
 *
 * @since 0.1.0
 */

import { Schema } from "effect"

/**
 * Branded id for animals. Ids are allocated sequentially by the zoo and never
 * reused within a run.
 *
 * @since 0.1.0
 * @category IDs
 */
export const AnimalId = Schema.Int.pipe(Schema.positive(), Schema.brand("AnimalId"))

/**
 * @since 0.1.0
 * @category IDs
 */
export type AnimalId = typeof AnimalId.Type

/**
 * Branded id for enclosures.
 *
 * @since 0.1.0
 * @category IDs
 */
export const EnclosureId = Schema.Int.pipe(Schema.positive(), Schema.brand("EnclosureId"))

/**
 * @since 0.1.0
 * @category IDs
 */
export type EnclosureId = typeof EnclosureId.Type

/**
 * A 0..100 gauge (hunger, health, happiness, cleanliness).
 *
 * @since 0.1.0
 * @category Levels
 */
export const Level = Schema.Number.pipe(Schema.between(0, 100))

/**
 * Habitat classification deciding which species an enclosure accepts.
 *
 * @since 0.1.0
 * @category Habitats
 */
export const Habitat = Schema.Literal("forest", "grassland", "aviary", "wetland")

/**
 * @since 0.1.0
 * @category Habitats
 */
export type Habitat = typeof Habitat.Type

/**
 * Breeding role. Two animals breed only when their sexes differ.
 *
 * @since 0.1.0
 */
export const Sex = Schema.Literal("M", "F")

/**
 * @since 0.1.0
 */
export type Sex = typeof Sex.Type
