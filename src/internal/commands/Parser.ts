import { Either } from "effect"
import type { IToken, TokenType } from "chevrotain"
import { ALL_SPECIES, SPECIES, resolveSpecies } from "../../Species.js"
import { FoodType, MedicineType, parseFoodType, parseMedicineType } from "../../Supplies.js"
import type { ReportFormat } from "../../Report.js"
import { Command } from "./Ast.js"
import { CommandParseError, type CommandDiagnostic } from "./Diagnostic.js"
import {
  Advance,
  AnimalKw,
  Breed,
  Buy,
  Clean,
  CommandLexer,
  Feed,
  Food,
  Help,
  Medicine,
  Move,
  NumberLiteral,
  Pause,
  Pdf,
  Report,
  Sell,
  Start,
  Status,
  Text,
  Upgrade,
} from "./tokens.js"

const fail = (
  source: string,
  code: CommandDiagnostic["code"],
  message: string,
  token?: IToken,
  hints?: ReadonlyArray<string>,
): never => {
  const column = token?.startColumn
  const diagnostic: CommandDiagnostic = {
    code,
    message,
    ...(column !== undefined ? { column } : {}),
    ...(hints ? { hints } : {}),
  }
  throw new CommandParseError({ input: source, diagnostic })
}

class TokenStream {
  readonly #tokens: ReadonlyArray<IToken>
  readonly #source: string
  #index = 0

  constructor(tokens: ReadonlyArray<IToken>, source: string) {
    this.#tokens = tokens
    this.#source = source
  }

  peek(): IToken | undefined {
    return this.#tokens[this.#index]
  }

  match(tokenType: TokenType): boolean {
    if (this.peek()?.tokenType === tokenType) {
      this.#index += 1
      return true
    }
    return false
  }

  expect(tokenType: TokenType, what: string): IToken {
    const token = this.peek()
    if (!token) {
      return fail(this.#source, "MissingArgument", `Missing ${what}`)
    }
    if (token.tokenType !== tokenType) {
      return fail(this.#source, "UnexpectedToken", `Expected ${what} but found "${token.image}"`, token)
    }
    this.#index += 1
    return token
  }

  /**
   * Any single word, keywords included: food and medicine names are free text.
   */
  word(what: string): IToken {
    const token = this.peek()
    if (!token) {
      return fail(this.#source, "MissingArgument", `Missing ${what}`)
    }
    if (token.tokenType === NumberLiteral) {
      return fail(this.#source, "UnexpectedToken", `Expected ${what} but found "${token.image}"`, token)
    }
    this.#index += 1
    return token
  }

  get done(): boolean {
    return this.#index >= this.#tokens.length
  }
}

const FOOD_NAMES = FoodType.literals.join(", ")
const MEDICINE_NAMES = MedicineType.literals.join(", ")
const SPECIES_NAMES = ALL_SPECIES.map((species) => SPECIES[species].label).join(", ")

class CommandParser {
  readonly #stream: TokenStream
  readonly #source: string

  constructor(tokens: ReadonlyArray<IToken>, source: string) {
    this.#stream = new TokenStream(tokens, source)
    this.#source = source
  }

  parse(): Command {
    const head = this.#stream.peek()
    if (!head) {
      return fail(this.#source, "EmptyInput", "Enter a command (type 'help' for a list)")
    }
    const command = this.#command(head)
    const rest = this.#stream.peek()
    if (rest) {
      return fail(this.#source, "TrailingInput", `Unexpected "${rest.image}" after the command`, rest)
    }
    return command
  }

  #command(head: IToken): Command {
    const s = this.#stream
    s.word("a command")
    switch (head.tokenType) {
      case Start:
        return Command.Start()
      case Pause:
        return Command.Pause()
      case Advance:
        return Command.Advance({ days: s.done ? 1 : this.#number("number of days") })
      case Feed:
        return Command.Feed({ animal: this.#number("animal id"), food: this.#food() })
      case Medicine:
        return Command.Medicine({
          animal: this.#number("animal id"),
          medicine: s.done ? "basic_med" : this.#medicine(),
        })
      case Breed:
        return Command.Breed({ first: this.#number("first animal id"), second: this.#number("second animal id") })
      case Buy:
        return this.#buy()
      case Clean:
        return Command.Clean({ enclosure: this.#number("enclosure id") })
      case Upgrade:
        return Command.Upgrade({ enclosure: this.#number("enclosure id") })
      case Sell:
        return Command.Sell({ animal: this.#number("animal id") })
      case Move:
        return Command.Move({ animal: this.#number("animal id"), enclosure: this.#number("enclosure id") })
      case Report:
        return Command.Report({ format: this.#reportFormat() })
      case Status:
        return Command.Status()
      case Help:
        return Command.Help()
      default:
        return fail(this.#source, "UnknownCommand", `Unknown command "${head.image}"`, head, [
          "type 'help' for a list of commands",
        ])
    }
  }

  #buy(): Command {
    const s = this.#stream
    if (s.match(Food)) {
      return Command.BuyFood({ food: this.#food(), quantity: this.#number("quantity") })
    }
    if (s.match(Medicine)) {
      return Command.BuyMedicine({ medicine: this.#medicine(), quantity: this.#number("quantity") })
    }
    if (s.match(AnimalKw)) {
      const words: Array<IToken> = []
      while (!s.done && s.peek()?.tokenType !== NumberLiteral) {
        words.push(s.word("species"))
      }
      const first = words[0]
      if (!first) {
        return fail(this.#source, "MissingArgument", "Missing species", s.peek())
      }
      const name = words.map((token) => token.image).join(" ")
      const species = resolveSpecies(name)
      if (!species) {
        return fail(this.#source, "UnknownSpecies", `Unknown species "${name}"`, first, [
          `available species: ${SPECIES_NAMES}`,
        ])
      }
      return Command.BuyAnimal({ species, enclosure: this.#number("enclosure id") })
    }
    const token = s.peek()
    return token
      ? fail(this.#source, "UnexpectedToken", `Expected food, medicine or animal but found "${token.image}"`, token)
      : fail(this.#source, "MissingArgument", "Missing what to buy (food, medicine or animal)")
  }

  #number(what: string): number {
    const token = this.#stream.expect(NumberLiteral, what)
    const value = Number(token.image)
    if (!Number.isInteger(value) || value <= 0) {
      return fail(
        this.#source,
        "InvalidNumber",
        `Expected ${what} to be a positive whole number but found "${token.image}"`,
        token,
      )
    }
    return value
  }

  #reportFormat(): ReportFormat {
    if (this.#stream.match(Pdf)) {
      return "pdf"
    }
    this.#stream.match(Text)
    return "text"
  }

  #food() {
    const token = this.#stream.word("food type")
    const food = parseFoodType(token.image)
    return food ?? fail(this.#source, "UnknownFood", `Unknown food "${token.image}"`, token, [`foods: ${FOOD_NAMES}`])
  }

  #medicine() {
    const token = this.#stream.word("medicine type")
    const medicine = parseMedicineType(token.image)
    return (
      medicine ??
      fail(this.#source, "UnknownMedicine", `Unknown medicine "${token.image}"`, token, [
        `medicines: ${MEDICINE_NAMES}`,
      ])
    )
  }
}

/**
 * Parse one console line, throwing `CommandParseError` on invalid input.
 */
export const parseCommandAst = (source: string): Command => {
  const result = CommandLexer.tokenize(source)
  const lexError = result.errors[0]
  if (lexError) {
    const character = source.charAt(lexError.offset)
    throw new CommandParseError({
      input: source,
      diagnostic: {
        code: "UnexpectedCharacter",
        message: `Unexpected character "${character}" at column ${lexError.column ?? lexError.offset + 1}`,
        column: lexError.column ?? lexError.offset + 1,
      },
    })
  }
  return new CommandParser(result.tokens, source).parse()
}

export const parseCommandEither = (source: string): Either.Either<Command, CommandParseError> =>
  Either.try({
    try: () => parseCommandAst(source),
    catch: (error) =>
      error instanceof CommandParseError
        ? error
        : new CommandParseError({
            input: source,
            diagnostic: {
              code: "UnexpectedToken",
              message: error instanceof Error ? error.message : String(error),
            },
          }),
  })
