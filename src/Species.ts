/**
 * Species catalog.
 *
 * Each species is a tag in the `Species` literal union carrying a row of
 * traits. Shared transition logic in `Animal.ts` is parameterized by these
 * traits instead of by a subclass per species.
 *
 * @since 0.1.0
 */

import { Schema } from "effect"
import type { FoodType } from "./Supplies.js"
import type { Habitat } from "./Types.js"

/**
 * @since 0.1.0
 * @category Species
 */
export const Species = Schema.Literal("Koala", "Kangaroo", "Wombat", "WedgeTailedEagle", "Emu", "Platypus")

/**
 * @since 0.1.0
 * @category Species
 */
export type Species = typeof Species.Type

/**
 * @since 0.1.0
 * @category Species
 */
export type Lineage = "marsupial" | "monotreme" | "bird"

/**
 * @since 0.1.0
 * @category Species
 */
export interface SpeciesTraits {
  readonly id: Species
  readonly label: string
  readonly lineage: Lineage
  readonly acceptedFoods: ReadonlyArray<FoodType>
  /** Hunger gained every day before feeding. */
  readonly hungerPerDay: number
  readonly lifeExpectancyYears: number
  readonly gestationDays: number
  readonly price: number
  readonly habitats: ReadonlyArray<Habitat>
  readonly aliases: ReadonlyArray<string>
}

/**
 * @since 0.1.0
 * @category Species
 */
export const SPECIES: Record<Species, SpeciesTraits> = {
  Koala: {
    id: "Koala",
    label: "Koala",
    lineage: "marsupial",
    acceptedFoods: ["eucalyptus"],
    hungerPerDay: 8,
    lifeExpectancyYears: 18,
    gestationDays: 34,
    price: 400,
    habitats: ["forest"],
    aliases: ["koala"],
  },
  Kangaroo: {
    id: "Kangaroo",
    label: "Kangaroo",
    lineage: "marsupial",
    acceptedFoods: ["herbivore_food", "general_food"],
    hungerPerDay: 10,
    lifeExpectancyYears: 18,
    gestationDays: 30,
    price: 350,
    habitats: ["grassland"],
    aliases: ["kangaroo", "roo"],
  },
  Wombat: {
    id: "Wombat",
    label: "Wombat",
    lineage: "marsupial",
    acceptedFoods: ["herbivore_food", "general_food"],
    hungerPerDay: 9,
    lifeExpectancyYears: 15,
    gestationDays: 35,
    price: 300,
    habitats: ["forest", "grassland"],
    aliases: ["wombat"],
  },
  WedgeTailedEagle: {
    id: "WedgeTailedEagle",
    label: "Wedge-tailed Eagle",
    lineage: "bird",
    acceptedFoods: ["meaty_food"],
    hungerPerDay: 11,
    lifeExpectancyYears: 15,
    gestationDays: 20,
    price: 500,
    habitats: ["aviary"],
    aliases: ["wedgetailedeagle", "eagle", "wedgetail"],
  },
  Emu: {
    id: "Emu",
    label: "Emu",
    lineage: "bird",
    acceptedFoods: ["seeds", "general_food"],
    hungerPerDay: 10,
    lifeExpectancyYears: 15,
    gestationDays: 20,
    price: 250,
    habitats: ["grassland"],
    aliases: ["emu"],
  },
  Platypus: {
    id: "Platypus",
    label: "Platypus",
    lineage: "monotreme",
    acceptedFoods: ["meaty_food"],
    hungerPerDay: 12,
    lifeExpectancyYears: 17,
    gestationDays: 60,
    price: 600,
    habitats: ["wetland"],
    aliases: ["platypus"],
  },
}

/**
 * Every species in catalog order.
 *
 * @since 0.1.0
 * @category Species
 */
export const ALL_SPECIES: ReadonlyArray<Species> = Species.literals

const normalizeName = (name: string): string => name.toLowerCase().replace(/[^a-z]/g, "")

/**
 * Resolve a free-form species name ("Wedge-tailed Eagle", "roo", "KOALA").
 *
 * @since 0.1.0
 * @category Species
 */
export const resolveSpecies = (name: string): Species | undefined => {
  const normalized = normalizeName(name)
  if (normalized.length === 0) {
    return undefined
  }
  return ALL_SPECIES.find((species) => {
    const traits = SPECIES[species]
    return normalizeName(traits.id) === normalized || traits.aliases.includes(normalized)
  })
}

/**
 * @since 0.1.0
 * @category Species
 */
export const livesIn = (species: Species, habitat: Habitat): boolean =>
  SPECIES[species].habitats.includes(habitat)
