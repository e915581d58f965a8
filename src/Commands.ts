/**
 * Console commands.
 *
 * A line of text is parsed into a `Command` and executed against the zoo and
 * the game loop. `execute` is the error boundary of the game: every rejected
 * command comes back as a failed `CommandResult` carrying the error message,
 * so nothing a player types can stop the process.
 *
 * @since 0.1.0
 */

import { Effect, Either } from "effect"
import { GameLoop, type LoopStatus } from "./GameLoop.js"
import { Finance } from "./Ledger.js"
import { SPECIES } from "./Species.js"
import { FoodType, MedicineType, type Inventory } from "./Supplies.js"
import { ZooEvent } from "./Events.js"
import type { ZooState } from "./State.js"
import type { DayReport } from "./Tick.js"
import { Zoo } from "./Zoo.js"
import { Command } from "./internal/commands/Ast.js"
import { CommandParseError } from "./internal/commands/Diagnostic.js"
import { parseCommandEither } from "./internal/commands/Parser.js"
import { formatMoney } from "./internal/pure.js"

export { Command, CommandParseError }
export type { CommandDiagnostic, CommandErrorCode } from "./internal/commands/Diagnostic.js"

/**
 * @since 0.1.0
 * @category Models
 */
export interface CommandResult {
  readonly ok: boolean
  readonly command: Command["_tag"] | undefined
  readonly message: string
}

/**
 * Parse one console line.
 *
 * @since 0.1.0
 * @category Parsing
 * @example
 * ```ts
 * parseCommand("buy food eucalyptus 10")
 * // => Either.right(Command.BuyFood({ food: "eucalyptus", quantity: 10 }))
 * ```
 */
export const parseCommand = (line: string): Either.Either<Command, CommandParseError> => parseCommandEither(line)

/**
 * @since 0.1.0
 */
export const HELP_TEXT = [
  "Commands:",
  "  start                              start auto mode",
  "  pause                              pause auto mode",
  "  advance [days]                     advance one or more days now",
  "  feed <animal> <food>               feed one unit of food",
  "  medicine <animal> [medicine]       give one unit of medicine",
  "  breed <animal> <animal>            breed two animals",
  "  buy food <food> <qty>              buy food",
  "  buy medicine <medicine> <qty>      buy medicine",
  "  buy animal <species> <enclosure>   buy an animal into an enclosure",
  "  clean <enclosure>                  clean an enclosure",
  "  upgrade <enclosure>                upgrade an enclosure",
  "  sell <animal>                      sell an animal",
  "  move <animal> <enclosure>          move an animal",
  "  report [text|pdf]                  generate a report",
  "  status                             show the zoo",
  "  help                               show this help",
  `Foods: ${FoodType.literals.join(", ")}`,
  `Medicines: ${MedicineType.literals.join(", ")}`,
].join("\n")

/**
 * Short description of a day's event.
 *
 * @since 0.1.0
 */
export const describeEvent = ZooEvent.$match({
  Quiet: () => "a quiet day",
  Heatwave: ({ coolingPaid }) => (coolingPaid ? "a heatwave" : "a heatwave without cooling"),
  Donation: ({ amount }) => `a donation of ${formatMoney(amount)}`,
  Escape: ({ animal }) => `${animal} escaped`,
})

/**
 * @since 0.1.0
 */
export const describeDay = (report: DayReport): string =>
  `Day ${report.day}: ${report.visitors.visitors} visitors, ${describeEvent(report.event)}, ` +
  `balance ${formatMoney(report.balance)}`

const describeInventory = (inventory: Inventory): string =>
  [
    ...FoodType.literals.map((food) => `${food} ${inventory.foodUnits(food)}`),
    ...MedicineType.literals.map((medicine) => `${medicine} ${inventory.medicineUnits(medicine)}`),
  ].join(", ")

/**
 * Multi-line status of the zoo.
 *
 * @since 0.1.0
 */
export const renderStatus = (state: ZooState, balance: number, loop: LoopStatus): string =>
  [
    `Day ${state.day} | Balance ${formatMoney(balance)} | Auto mode: ${loop}`,
    "Enclosures:",
    ...state.enclosures.map(
      (e) =>
        `  #${e.id} ${e.name} (${e.habitat}): ${e.occupancy}/${e.capacity}, cleanliness ${e.cleanliness.toFixed(1)}`,
    ),
    "Animals:",
    ...(state.animals.length === 0
      ? ["  (none)"]
      : state.animals.map(
          (a) =>
            `  #${a.id} ${a.name} (${SPECIES[a.species].label}, ${a.sex}): hunger ${a.hunger.toFixed(1)}, ` +
            `health ${a.health.toFixed(1)}, happiness ${a.happiness.toFixed(1)}`,
        )),
    `Inventory: ${describeInventory(state.inventory)}`,
  ].join("\n")

const succeed = (command: Command, message: string): CommandResult => ({ ok: true, command: command._tag, message })

const run = (command: Command) =>
  Effect.gen(function* () {
    const zoo = yield* Zoo
    const loop = yield* GameLoop
    const finance = yield* Finance
    const done = (message: string) => succeed(command, message)
    switch (command._tag) {
      case "Start":
        return done((yield* loop.start) ? "Auto mode started." : "Auto mode is already running.")
      case "Pause":
        return done((yield* loop.pause) ? "Auto mode paused." : "Auto mode is not running.")
      case "Advance": {
        const reports = yield* zoo.advanceDays(command.days)
        return done(reports.map(describeDay).join("\n"))
      }
      case "Feed":
        return done((yield* zoo.feed(command.animal, command.food)).message)
      case "Medicine":
        return done((yield* zoo.medicate(command.animal, command.medicine)).message)
      case "Breed":
        return done((yield* zoo.breed(command.first, command.second)).message)
      case "BuyFood":
        return done((yield* zoo.buyFood(command.food, command.quantity)).message)
      case "BuyMedicine":
        return done((yield* zoo.buyMedicine(command.medicine, command.quantity)).message)
      case "BuyAnimal":
        return done((yield* zoo.buyAnimal(command.species, command.enclosure)).message)
      case "Clean":
        return done((yield* zoo.clean(command.enclosure)).message)
      case "Upgrade":
        return done((yield* zoo.upgrade(command.enclosure)).message)
      case "Sell":
        return done((yield* zoo.sell(command.animal)).message)
      case "Move":
        return done((yield* zoo.move(command.animal, command.enclosure)).message)
      case "Report": {
        const generated = yield* zoo.report(command.format)
        return done(generated.notice ? `${generated.notice}\n${generated.content}` : generated.content)
      }
      case "Status":
        return done(renderStatus(yield* zoo.snapshot, yield* finance.balance, yield* loop.status))
      case "Help":
        return done(HELP_TEXT)
    }
  })

/**
 * Run a parsed command. Zoo errors become failed results.
 *
 * @since 0.1.0
 * @category Execution
 */
export const execute = (command: Command): Effect.Effect<CommandResult, never, Zoo | GameLoop | Finance> =>
  run(command).pipe(
    Effect.catchAll((error) =>
      Effect.as(Effect.logWarning(`${command._tag} rejected: ${error.message}`), {
        ok: false,
        command: command._tag,
        message: error.message,
      }),
    ),
  )

/**
 * Parse and run one console line.
 *
 * @since 0.1.0
 * @category Execution
 */
export const executeLine = (line: string): Effect.Effect<CommandResult, never, Zoo | GameLoop | Finance> =>
  Either.match(parseCommand(line), {
    onLeft: (error) => Effect.succeed<CommandResult>({ ok: false, command: undefined, message: error.message }),
    onRight: execute,
  })
