import { describe, it, expect } from "vitest"
import { Either, Schema } from "effect"
import { AnimalId, EnclosureId, Habitat, Level } from "../src/Types.js"
import { ALL_SPECIES, SPECIES, livesIn, resolveSpecies } from "../src/Species.js"
import { DEFAULT_INVENTORY } from "../src/Settings.js"
import { adjustFood, adjustMedicine, parseFoodType, parseMedicineType } from "../src/Supplies.js"

describe("Branded ids", () => {
  it("accepts positive integers", () => {
    expect(Schema.decodeSync(AnimalId)(3)).toBe(3)
    expect(Schema.decodeSync(EnclosureId)(1)).toBe(1)
  })

  it("rejects zero, negatives and fractions", () => {
    const decode = Schema.decodeUnknownEither(AnimalId)
    expect(Either.isLeft(decode(0))).toBe(true)
    expect(Either.isLeft(decode(-2))).toBe(true)
    expect(Either.isLeft(decode(1.5))).toBe(true)
  })
})

describe("Levels and habitats", () => {
  it("bounds levels to 0..100", () => {
    const decode = Schema.decodeUnknownEither(Level)
    expect(Either.isRight(decode(0))).toBe(true)
    expect(Either.isRight(decode(100))).toBe(true)
    expect(Either.isLeft(decode(100.1))).toBe(true)
  })

  it("knows the habitat list", () => {
    expect(Habitat.literals).toEqual(["forest", "grassland", "aviary", "wetland"])
  })
})

describe("Species catalog", () => {
  it("has a trait row for every species", () => {
    for (const species of ALL_SPECIES) {
      expect(SPECIES[species].id).toBe(species)
      expect(SPECIES[species].acceptedFoods.length).toBeGreaterThan(0)
      expect(SPECIES[species].habitats.length).toBeGreaterThan(0)
    }
  })

  it("resolves names, labels and aliases", () => {
    expect(resolveSpecies("koala")).toBe("Koala")
    expect(resolveSpecies("Wedge-tailed Eagle")).toBe("WedgeTailedEagle")
    expect(resolveSpecies("ROO")).toBe("Kangaroo")
    expect(resolveSpecies("eagle")).toBe("WedgeTailedEagle")
    expect(resolveSpecies("dragon")).toBeUndefined()
    expect(resolveSpecies("  ")).toBeUndefined()
  })

  it("checks habitat compatibility", () => {
    expect(livesIn("Koala", "forest")).toBe(true)
    expect(livesIn("Koala", "grassland")).toBe(false)
    expect(livesIn("Wombat", "grassland")).toBe(true)
    expect(livesIn("Platypus", "wetland")).toBe(true)
  })
})

describe("Supplies", () => {
  it("parses food and medicine names", () => {
    expect(parseFoodType("Eucalyptus")).toBe("eucalyptus")
    expect(parseFoodType("pizza")).toBeUndefined()
    expect(parseMedicineType("VET_KIT")).toBe("vet_kit")
    expect(parseMedicineType("aspirin")).toBeUndefined()
  })

  it("adjusts stock without going negative", () => {
    const fewer = adjustFood(DEFAULT_INVENTORY, "meaty_food", -3)
    expect(fewer.foodUnits("meaty_food")).toBe(7)
    expect(fewer.foodUnits("seeds")).toBe(20)
    expect(adjustFood(DEFAULT_INVENTORY, "seeds", -50).foodUnits("seeds")).toBe(0)
    expect(adjustMedicine(DEFAULT_INVENTORY, "vet_kit", 2).medicineUnits("vet_kit")).toBe(2)
    expect(DEFAULT_INVENTORY.foodUnits("meaty_food")).toBe(10)
  })
})
