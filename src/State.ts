/**
 * Zoo state snapshot and the lookups the systems and commands share.
 *
 * @since 0.1.0
 */

import { Data } from "effect"
import type { Animal } from "./Animal.js"
import { release, type Enclosure } from "./Enclosure.js"
import type { Inventory } from "./Supplies.js"
import type { VisitorDay } from "./Visitors.js"

/**
 * Everything the zoo owns apart from the ledger, which the `Finance` service
 * holds. `day` is the day about to be simulated.
 *
 * @since 0.1.0
 * @category Models
 */
export class ZooState extends Data.Class<{
  readonly day: number
  readonly enclosures: ReadonlyArray<Enclosure>
  readonly animals: ReadonlyArray<Animal>
  readonly inventory: Inventory
  readonly lastVisitors: VisitorDay | undefined
  readonly eventLog: ReadonlyArray<string>
  readonly nextAnimalId: number
}> {
  get livingAnimals(): ReadonlyArray<Animal> {
    return this.animals.filter((animal) => animal.alive)
  }
}

/**
 * @since 0.1.0
 */
export const findAnimal = (state: ZooState, id: number): Animal | undefined =>
  state.animals.find((animal) => animal.id === id)

/**
 * @since 0.1.0
 */
export const findEnclosure = (state: ZooState, id: number): Enclosure | undefined =>
  state.enclosures.find((enclosure) => enclosure.id === id)

/**
 * Animals housed in an enclosure, in arrival order.
 *
 * @since 0.1.0
 */
export const residentsOf = (state: ZooState, enclosure: Enclosure): ReadonlyArray<Animal> =>
  enclosure.residents.flatMap((id) => {
    const animal = findAnimal(state, id)
    return animal ? [animal] : []
  })

/**
 * @since 0.1.0
 */
export const putAnimal = (state: ZooState, animal: Animal): ZooState =>
  new ZooState({
    ...state,
    animals: state.animals.some((current) => current.id === animal.id)
      ? state.animals.map((current) => (current.id === animal.id ? animal : current))
      : [...state.animals, animal],
  })

/**
 * @since 0.1.0
 */
export const putEnclosure = (state: ZooState, enclosure: Enclosure): ZooState =>
  new ZooState({
    ...state,
    enclosures: state.enclosures.map((current) => (current.id === enclosure.id ? enclosure : current)),
  })

/**
 * Drop an animal from the roster and from whichever enclosure houses it.
 *
 * @since 0.1.0
 */
export const removeAnimal = (state: ZooState, id: number): ZooState =>
  new ZooState({
    ...state,
    animals: state.animals.filter((animal) => animal.id !== id),
    enclosures: state.enclosures.map((enclosure) => release(enclosure, id)),
  })

/**
 * Event log line for the given day.
 *
 * @since 0.1.0
 */
export const logLine = (day: number, text: string): string => `Day ${day}: ${text}`

/**
 * @since 0.1.0
 */
export const appendLog = (state: ZooState, lines: ReadonlyArray<string>): ZooState =>
  lines.length === 0 ? state : new ZooState({ ...state, eventLog: [...state.eventLog, ...lines] })
