import { describe, it, expect } from "@effect/vitest"
import { Effect, Layer, TestClock } from "effect"
import { GameLoop } from "../src/GameLoop.js"
import { Zoo } from "../src/Zoo.js"

const layer = GameLoop.layer.pipe(
  Layer.provideMerge(Zoo.live({ tickIntervalMillis: 1000, eventOdds: { heatwave: 0, donation: 0, escape: 0 } })),
)

describe("GameLoop", () => {
  it.effect("advances a day every interval while running", () =>
    Effect.gen(function* () {
      const loop = yield* GameLoop
      const zoo = yield* Zoo

      expect(yield* loop.status).toBe("Idle")
      expect(yield* loop.start).toBe(true)
      expect(yield* loop.status).toBe("Running")

      yield* TestClock.adjust("3 seconds")
      expect((yield* zoo.snapshot).day).toBe(4)

      expect(yield* loop.pause).toBe(true)
      expect(yield* loop.status).toBe("Paused")

      yield* TestClock.adjust("5 seconds")
      expect((yield* zoo.snapshot).day).toBe(4)
    }).pipe(Effect.provide(layer)),
  )

  it.effect("ignores start while running and pause while stopped", () =>
    Effect.gen(function* () {
      const loop = yield* GameLoop

      expect(yield* loop.pause).toBe(false)
      yield* loop.start
      expect(yield* loop.start).toBe(false)
      yield* loop.pause
      expect(yield* loop.pause).toBe(false)
      expect(yield* loop.start).toBe(true)
    }).pipe(Effect.provide(layer)),
  )

  it.effect("advance runs a day regardless of status", () =>
    Effect.gen(function* () {
      const loop = yield* GameLoop
      const zoo = yield* Zoo
      const report = yield* loop.advance

      expect(report.day).toBe(1)
      expect((yield* zoo.snapshot).day).toBe(2)
      expect(yield* loop.status).toBe("Idle")
    }).pipe(Effect.provide(layer)),
  )
})
