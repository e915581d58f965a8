import { describe, it, expect } from "@effect/vitest"
import { Effect, Exit } from "effect"
import { ZooConfig, ZooSettings, decodeSettings } from "../src/Settings.js"

describe("ZooSettings", () => {
  it("carries a default for every tuning constant", () => {
    const settings = new ZooSettings({})

    expect(settings.startingBalance).toBe(2000)
    expect(settings.allowOverdraft).toBe(false)
    expect(settings.ticketPrice).toBe(25)
    expect(settings.tickIntervalMillis).toBe(2500)
    expect(settings.maxAdvanceDays).toBe(365)
    expect(settings.donationMinBalance).toBe(1000)
    expect(settings.eventOdds.heatwave).toBe(0.06)
    expect(settings.visitors.baselineVisitors).toBe(5)
    expect(settings.enclosures.map((e) => [e.name, e.habitat, e.capacity])).toEqual([
      ["Forest Enclosure", "forest", 4],
      ["Grassland Enclosure", "grassland", 5],
      ["Aviary", "aviary", 6],
    ])
    expect(settings.animals.map((a) => a.name)).toEqual(["Kiki", "Koko", "Joey", "Aerie"])
    expect(settings.inventory.foodUnits("eucalyptus")).toBe(20)
    expect(settings.inventory.medicineUnits("basic_med")).toBe(5)
  })

  it.effect("merges nested overrides over defaults", () =>
    Effect.gen(function* () {
      const settings = yield* decodeSettings({ startingBalance: 100, visitors: { noiseMin: 1, noiseMax: 1 } })

      expect(settings.startingBalance).toBe(100)
      expect(settings.visitors.noiseMin).toBe(1)
      expect(settings.visitors.spendMax).toBe(25)
      expect(settings.ticketPrice).toBe(25)
    }),
  )

  it.effect("rejects invalid settings when the layer is built", () =>
    Effect.gen(function* () {
      const exit = yield* Effect.exit(ZooConfig.pipe(Effect.provide(ZooConfig.layer({ ticketPrice: -5 }))))

      expect(Exit.isFailure(exit)).toBe(true)
    }),
  )

  it.effect("rejects probabilities outside 0..1", () =>
    Effect.gen(function* () {
      const error = yield* decodeSettings({ eventOdds: { escape: 1.5 } }).pipe(Effect.flip)

      expect(error._tag).toBe("ParseError")
    }),
  )
})
