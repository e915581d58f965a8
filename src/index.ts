/**
 * OzZoo: a zoo management simulation built on Effect.
 *
 * @since 0.1.0
 */

export * from "./Types.js"
export * from "./Errors.js"
export * from "./Species.js"
export * from "./Supplies.js"
export * from "./Animal.js"
export * from "./Enclosure.js"
export * from "./Settings.js"
export * from "./Ledger.js"
export * from "./Health.js"
export * from "./Visitors.js"
export * from "./Events.js"
export * from "./State.js"
export * from "./Tick.js"
export * from "./Report.js"
export * from "./Zoo.js"
export * from "./GameLoop.js"
export * from "./Commands.js"
