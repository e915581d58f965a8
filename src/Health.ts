/**
 * Health alerts.
 *
 * The `HealthMonitor` keeps an explicit list of subscribed callbacks. After
 * every animal update the zoo compares the animal before and after and
 * notifies subscribers of each alert, in subscription order.
 *
 * @since 0.1.0
 */

import { Context, Data, Effect, Layer, Ref } from "effect"
import { ANIMAL_TUNING, type Animal } from "./Animal.js"

/**
 * @since 0.1.0
 * @category Models
 */
export type HealthAlert = Data.TaggedEnum<{
  /** Health fell below the critical threshold while the animal lives. */
  Critical: { readonly animal: Animal; readonly day: number }
  Died: { readonly animal: Animal; readonly day: number }
}>

/**
 * @since 0.1.0
 * @category Constructors
 */
export const HealthAlert = Data.taggedEnum<HealthAlert>()

/**
 * One line describing an alert.
 *
 * @since 0.1.0
 */
export const describeAlert = HealthAlert.$match({
  Critical: ({ animal }) => `${animal.name}: health critical (${animal.health.toFixed(1)})`,
  Died: ({ animal }) => `${animal.name}: has died`,
})

/**
 * Alerts raised by an animal update. Critical fires once, on the day health
 * crosses below the threshold; death fires on the day the animal dies.
 *
 * @since 0.1.0
 */
export const detectAlerts = (before: Animal, after: Animal, day: number): ReadonlyArray<HealthAlert> => {
  if (!before.alive) {
    return []
  }
  if (!after.alive) {
    return [HealthAlert.Died({ animal: after, day })]
  }
  if (before.health >= ANIMAL_TUNING.criticalHealth && after.health < ANIMAL_TUNING.criticalHealth) {
    return [HealthAlert.Critical({ animal: after, day })]
  }
  return []
}

/**
 * @since 0.1.0
 * @category Models
 */
export type HealthListener = (alert: HealthAlert) => Effect.Effect<void>

export interface HealthMonitorService {
  /**
   * Register a listener. The returned effect unsubscribes it.
   */
  readonly subscribe: (listener: HealthListener) => Effect.Effect<Effect.Effect<void>>
  readonly notify: (alerts: ReadonlyArray<HealthAlert>) => Effect.Effect<void>
  readonly listenerCount: Effect.Effect<number>
}

/**
 * Listener that writes every alert to the log at warning level.
 *
 * @since 0.1.0
 */
export const logAlert: HealthListener = (alert) =>
  Effect.logWarning(`[ALERT] ${describeAlert(alert)}`).pipe(Effect.annotateLogs("day", alert.day))

interface Subscription {
  readonly key: number
  readonly listener: HealthListener
}

/**
 * @since 0.1.0
 * @category Constructors
 */
export const makeHealthMonitor = (
  initial: ReadonlyArray<HealthListener>,
): Effect.Effect<HealthMonitorService> =>
  Effect.gen(function* () {
    const nextKey = yield* Ref.make(initial.length)
    const subscriptions = yield* Ref.make<ReadonlyArray<Subscription>>(
      initial.map((listener, key) => ({ key, listener })),
    )

    return {
      subscribe: (listener) =>
        Effect.gen(function* () {
          const key = yield* Ref.getAndUpdate(nextKey, (n) => n + 1)
          yield* Ref.update(subscriptions, (current) => [...current, { key, listener }])
          return Ref.update(subscriptions, (current) => current.filter((entry) => entry.key !== key))
        }),
      notify: (alerts) =>
        Effect.gen(function* () {
          const current = yield* Ref.get(subscriptions)
          yield* Effect.forEach(alerts, (alert) => Effect.forEach(current, ({ listener }) => listener(alert)), {
            discard: true,
          })
        }),
      listenerCount: Effect.map(Ref.get(subscriptions), (current) => current.length),
    }
  })

/**
 * @category Services
 * @since 0.1.0
 */
export class HealthMonitor extends Context.Tag("ozzoo/HealthMonitor")<HealthMonitor, HealthMonitorService>() {
  /**
   * Monitor with the logging listener subscribed.
   */
  static readonly layer = Layer.effect(this, makeHealthMonitor([logAlert]))

  /**
   * Monitor with no listeners.
   */
  static readonly silent = Layer.effect(this, makeHealthMonitor([]))
}
