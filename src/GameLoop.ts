/**
 * Auto-advance loop.
 *
 * The loop is Idle until started, Running while a background fiber advances
 * a day every interval, and Paused once that fiber is stopped. Stopping waits
 * for a tick in flight, since ticks are uninterruptible. The fiber lives in the
 * layer's scope and is interrupted when the layer is released.
 *
 * @since 0.1.0
 */

import { Context, Duration, Effect, Fiber, Layer, Ref } from "effect"
import { ZooConfig } from "./Settings.js"
import type { DayReport } from "./Tick.js"
import { Zoo } from "./Zoo.js"

/**
 * @since 0.1.0
 * @category Models
 */
export type LoopStatus = "Idle" | "Running" | "Paused"

export interface GameLoopService {
  readonly status: Effect.Effect<LoopStatus>
  /**
   * Begin auto-advancing. Returns `false` when already running.
   */
  readonly start: Effect.Effect<boolean>
  /**
   * Stop auto-advancing. Returns `false` when not running.
   */
  readonly pause: Effect.Effect<boolean>
  /**
   * Advance one day now, whatever the status.
   */
  readonly advance: Effect.Effect<DayReport>
}

interface LoopState {
  readonly status: LoopStatus
  readonly fiber: Fiber.RuntimeFiber<never> | undefined
}

/**
 * @category Services
 * @since 0.1.0
 */
export class GameLoop extends Context.Tag("ozzoo/GameLoop")<GameLoop, GameLoopService>() {
  static readonly layer = Layer.scoped(
    this,
    Effect.gen(function* () {
      const zoo = yield* Zoo
      const settings = yield* ZooConfig
      const scope = yield* Effect.scope
      const interval = Duration.millis(settings.tickIntervalMillis)
      const stateRef = yield* Ref.make<LoopState>({ status: "Idle", fiber: undefined })
      const lock = yield* Effect.makeSemaphore(1)

      const loop = Effect.forever(Effect.zipRight(Effect.sleep(interval), zoo.advanceDay))

      const start = lock.withPermits(1)(
        Effect.gen(function* () {
          const current = yield* Ref.get(stateRef)
          if (current.status === "Running") {
            return false
          }
          const fiber = yield* Effect.forkIn(loop, scope)
          yield* Ref.set(stateRef, { status: "Running", fiber })
          yield* Effect.logInfo(`Auto mode started (every ${Duration.format(interval)})`)
          return true
        }),
      )

      const pause = lock.withPermits(1)(
        Effect.gen(function* () {
          const current = yield* Ref.get(stateRef)
          if (current.status !== "Running" || current.fiber === undefined) {
            return false
          }
          yield* Fiber.interrupt(current.fiber)
          yield* Ref.set(stateRef, { status: "Paused", fiber: undefined })
          yield* Effect.logInfo("Auto mode paused")
          return true
        }),
      )

      return {
        status: Effect.map(Ref.get(stateRef), (current) => current.status),
        start,
        pause,
        advance: zoo.advanceDay,
      }
    }),
  )
}
