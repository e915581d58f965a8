import { describe, it, expect } from "@effect/vitest"
import { Effect, Either } from "effect"
import { credit, makeLedger } from "../src/Ledger.js"
import { RECENT_ENTRIES, buildReport, generateReport, renderText } from "../src/Report.js"
import { AnimalBlueprint, EnclosureBlueprint, ZooSettings } from "../src/Settings.js"
import { appendLog, logLine } from "../src/State.js"
import { openingState } from "../src/Zoo.js"

const settings = new ZooSettings({
  enclosures: [new EnclosureBlueprint({ name: "Forest Enclosure", habitat: "forest", capacity: 4 })],
  animals: [new AnimalBlueprint({ species: "Koala", name: "Kiki", sex: "F", ageYears: 2, enclosure: 0 })],
})

const ledger = Either.getOrThrow(credit(makeLedger(1000), 234.5, "Donation"))

describe("Report", () => {
  it.effect("renders every section", () =>
    Effect.gen(function* () {
      const state = yield* openingState(settings)
      const text = renderText(buildReport("OzZoo", state, ledger))

      expect(text).toBe(
        [
          "OzZoo Report - Day 1",
          "Balance: $1,234.50",
          "",
          "Animals:",
          "- #1 Kiki (Koala, F, 2.0y) in Forest Enclosure: hunger 0.0, health 100.0, happiness 100.0",
          "",
          "Enclosures Summary:",
          "- #1 Forest Enclosure: 1/4 animals, Cleanliness 100.0, Level 1",
          "",
          "Visitors:",
          "- (none)",
          "",
          "Recent Transactions:",
          "- Day 1: +$234.50 Donation",
          "",
          "Recent Events:",
          "- (none)",
        ].join("\n"),
      )
    }),
  )

  it.effect("keeps only the most recent log lines", () =>
    Effect.gen(function* () {
      const opened = yield* openingState(settings)
      const state = appendLog(
        opened,
        Array.from({ length: 12 }, (_, i) => logLine(1, `entry ${i + 1}`)),
      )
      const report = buildReport("OzZoo", state, ledger)

      expect(report.events).toHaveLength(RECENT_ENTRIES)
      expect(report.events[0]).toBe("Day 1: entry 3")
    }),
  )

  it.effect("only text is produced", () =>
    Effect.gen(function* () {
      const state = yield* openingState(settings)
      const report = buildReport("OzZoo", state, ledger)

      expect(generateReport(report, "text").notice).toBeUndefined()
      expect(generateReport(report, "pdf")).toMatchObject({ requested: "pdf", format: "text" })
    }),
  )
})
