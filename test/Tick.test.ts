import { describe, it, expect } from "@effect/vitest"
import { Effect, Layer } from "effect"
import { Animal } from "../src/Animal.js"
import { HealthMonitor } from "../src/Health.js"
import { Finance } from "../src/Ledger.js"
import { ZooConfig, type ZooSettingsInput } from "../src/Settings.js"
import { putAnimal, type ZooState } from "../src/State.js"
import { systemBirths, systemEnclosures, systemReaper, runDay } from "../src/Tick.js"
import { openingState } from "../src/Zoo.js"

const tickLayer = (overrides: ZooSettingsInput) =>
  Layer.mergeAll(Finance.layer, HealthMonitor.silent).pipe(Layer.provideMerge(ZooConfig.layer(overrides)))

const fixedDay = {
  eventOdds: { heatwave: 0, donation: 0, escape: 0 },
  visitors: { noiseMin: 1, noiseMax: 1, spendMin: 10, spendMax: 10 },
  enclosures: [{ name: "Pen", habitat: "grassland", capacity: 4 }],
  animals: [],
} satisfies ZooSettingsInput

describe("runDay", () => {
  it.effect("credits visitors and debits upkeep for an empty zoo", () =>
    Effect.gen(function* () {
      const settings = yield* ZooConfig
      const finance = yield* Finance
      const { report, state } = yield* runDay(yield* openingState(settings))

      // attractiveness: 0.4 * 0.98 + 0.4 * 0 + 0.2 * 0.5 = 0.492
      expect(report.visitors.visitors).toBe(27)
      expect(report.visitors.ticketIncome).toBe(675)
      expect(report.visitors.spending).toBe(132.84)
      expect(report.upkeep).toEqual({ amount: 10, paid: true })
      expect(report.messages).toEqual(["27 visitors spent $807.84.", "Paid $10.00 upkeep."])
      expect(report.balance).toBe(2797.84)
      expect(yield* finance.balance).toBe(2797.84)
      expect(state.day).toBe(2)
      expect(state.eventLog).toEqual(["Day 1: 27 visitors spent $807.84.", "Day 1: Paid $10.00 upkeep."])
    }).pipe(Effect.provide(tickLayer(fixedDay))),
  )

  it.effect("records upkeep it cannot pay", () =>
    Effect.gen(function* () {
      const settings = yield* ZooConfig
      const { report } = yield* runDay(yield* openingState(settings))

      expect(report.upkeep).toEqual({ amount: 10, paid: false })
      expect(report.messages).toEqual(["0 visitors spent $0.00.", "Could not pay $10.00 upkeep."])
    }).pipe(
      Effect.provide(
        tickLayer({
          ...fixedDay,
          startingBalance: 0,
          visitors: { baselineVisitors: 0, attractionVisitors: 0 },
        }),
      ),
    ),
  )
})

describe("systemEnclosures", () => {
  it.effect("dirty enclosures wear on their residents", () =>
    Effect.gen(function* () {
      const settings = yield* ZooConfig
      const opened = yield* openingState(settings)
      const { state, messages } = systemEnclosures(opened)

      expect(state.enclosures[0]?.cleanliness).toBe(17.5)
      expect(state.animals[0]?.happiness).toBe(99)
      expect(state.animals[0]?.health).toBe(99.7)
      expect(messages).toEqual(["Pen is dirty (17.5)."])
    }).pipe(
      Effect.provide(
        ZooConfig.layer({
          enclosures: [{ name: "Pen", habitat: "grassland", capacity: 4, cleanliness: 20 }],
          animals: [{ species: "Emu", sex: "F", enclosure: 0 }],
        }),
      ),
    ),
  )
})

describe("systemBirths", () => {
  const emuPair = (capacity: number) =>
    ZooConfig.layer({
      enclosures: [{ name: "Pen", habitat: "grassland", capacity }],
      animals: [
        { species: "Emu", sex: "F", enclosure: 0, name: "Edna" },
        { species: "Emu", sex: "M", enclosure: 0, name: "Eddie" },
      ],
    })

  const withDueMother = (state: ZooState) => {
    const [mother] = state.animals
    return mother ? putAnimal(state, new Animal({ ...mother, pregnant: true, daysPregnant: 20 })) : state
  }

  it.effect("places the newborn beside its mother", () =>
    Effect.gen(function* () {
      const settings = yield* ZooConfig
      const opened = withDueMother(yield* openingState(settings))
      const { state, births, messages } = yield* systemBirths(opened, settings)

      expect(births.map((a) => [a.id, a.name, a.species, a.health, a.happiness])).toEqual([
        [3, "Emu-3", "Emu", 80, 80],
      ])
      expect(messages).toEqual(["Edna gave birth to a baby Emu, Emu-3, in Pen."])
      expect(state.enclosures[0]?.residents).toEqual([1, 2, 3])
      expect(state.animals[0]?.pregnant).toBe(false)
      expect(state.nextAnimalId).toBe(4)
    }).pipe(Effect.provide(emuPair(3))),
  )

  it.effect("loses the newborn when the enclosure is full", () =>
    Effect.gen(function* () {
      const settings = yield* ZooConfig
      const opened = withDueMother(yield* openingState(settings))
      const { state, births, messages } = yield* systemBirths(opened, settings)

      expect(births).toEqual([])
      expect(messages).toEqual(["Edna's baby Emu could not be placed in Pen and did not survive."])
      expect(state.animals.map((a) => [a.name, a.pregnant])).toEqual([
        ["Edna", false],
        ["Eddie", false],
      ])
      expect(state.nextAnimalId).toBe(3)
    }).pipe(Effect.provide(emuPair(2))),
  )

  it.effect("leaves mothers before term alone", () =>
    Effect.gen(function* () {
      const settings = yield* ZooConfig
      const opened = yield* openingState(settings)
      const { state, births } = yield* systemBirths(opened, settings)

      expect(births).toEqual([])
      expect(state).toBe(opened)
    }).pipe(Effect.provide(emuPair(3))),
  )
})

describe("systemReaper", () => {
  it.effect("leaves a living zoo alone", () =>
    Effect.gen(function* () {
      const settings = yield* ZooConfig
      const opened = yield* openingState(settings)
      const reaped = systemReaper(opened)

      expect(reaped.deaths).toEqual([])
      expect(reaped.state.animals).toHaveLength(4)
    }).pipe(Effect.provide(ZooConfig.layer())),
  )
})
