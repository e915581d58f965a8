import { describe, it, expect } from "vitest"
import { Either, Schema } from "effect"
import {
  Enclosure,
  admit,
  checkPlacement,
  clean,
  cleaningCost,
  dailyDecay,
  decayCleanliness,
  release,
  upgrade,
  upgradeCost,
} from "../src/Enclosure.js"
import { CapacityExceededError, SpeciesIncompatibilityError } from "../src/Errors.js"
import { AnimalId, EnclosureId } from "../src/Types.js"

const decodeAnimalId = Schema.decodeSync(AnimalId)
const decodeEnclosureId = Schema.decodeSync(EnclosureId)

const pen = (fields: Partial<ConstructorParameters<typeof Enclosure>[0]> = {}) =>
  new Enclosure({
    id: decodeEnclosureId(1),
    name: "Small Pen",
    habitat: "grassland",
    capacity: 2,
    cleanliness: 100,
    upgradeLevel: 1,
    decayResistance: 0,
    residents: [],
    ...fields,
  })

describe("Enclosure placement", () => {
  it("admits compatible animals", () => {
    const result = admit(pen(), { id: decodeAnimalId(1), species: "Kangaroo" })

    expect(Either.isRight(result)).toBe(true)
    if (Either.isRight(result)) {
      expect(result.right.residents).toEqual([1])
      expect(result.right.occupancy).toBe(1)
    }
  })

  it("rejects a third animal in a capacity-2 enclosure", () => {
    const full = pen({ residents: [decodeAnimalId(1), decodeAnimalId(2)] })

    const result = admit(full, { id: decodeAnimalId(3), species: "Kangaroo" })

    expect(Either.isLeft(result)).toBe(true)
    if (Either.isLeft(result)) {
      expect(result.left).toBeInstanceOf(CapacityExceededError)
      expect(result.left.message).toBe("Small Pen is full (capacity 2)")
    }
    expect(full.residents).toEqual([1, 2])
  })

  it("rejects species that do not live in the habitat", () => {
    const result = checkPlacement(pen(), "Koala")

    expect(Either.isLeft(result)).toBe(true)
    if (Either.isLeft(result)) {
      expect(result.left).toBeInstanceOf(SpeciesIncompatibilityError)
      expect(result.left.message).toBe("Koala cannot live in the grassland habitat of Small Pen")
    }
  })

  it("releases residents and ignores unknown ids", () => {
    const housed = pen({ residents: [decodeAnimalId(1), decodeAnimalId(2)] })

    expect(release(housed, 1).residents).toEqual([2])
    expect(release(housed, 9)).toBe(housed)
  })
})

describe("Cleanliness", () => {
  it("decays with occupancy and decay resistance", () => {
    const housed = pen({ residents: [decodeAnimalId(1), decodeAnimalId(2)] })

    expect(dailyDecay(housed)).toBe(3)
    expect(dailyDecay(pen({ residents: housed.residents, decayResistance: 0.5 }))).toBe(1.5)
    expect(decayCleanliness(housed).cleanliness).toBe(97)
  })

  it("never drops below zero", () => {
    expect(decayCleanliness(pen({ cleanliness: 1 })).cleanliness).toBe(0)
  })

  it("flags dirty enclosures below 30", () => {
    expect(pen({ cleanliness: 29.9 }).isDirty).toBe(true)
    expect(pen({ cleanliness: 30 }).isDirty).toBe(false)
  })

  it("cleaning costs more with more residents and resets cleanliness", () => {
    const housed = pen({ cleanliness: 12, residents: [decodeAnimalId(1), decodeAnimalId(2)] })

    expect(cleaningCost(pen())).toBe(20)
    expect(cleaningCost(housed)).toBe(40)
    expect(clean(housed).cleanliness).toBe(100)
  })
})

describe("Upgrades", () => {
  it("adds capacity, resistance and a level", () => {
    const upgraded = upgrade(pen())

    expect(upgradeCost(pen())).toBe(200)
    expect(upgraded.upgradeLevel).toBe(2)
    expect(upgraded.capacity).toBe(4)
    expect(upgraded.decayResistance).toBe(0.1)
    expect(upgradeCost(upgraded)).toBe(400)
  })

  it("caps decay resistance at 0.5", () => {
    let enclosure = pen()
    for (let i = 0; i < 7; i++) {
      enclosure = upgrade(enclosure)
    }

    expect(enclosure.upgradeLevel).toBe(8)
    expect(enclosure.decayResistance).toBe(0.5)
  })
})
