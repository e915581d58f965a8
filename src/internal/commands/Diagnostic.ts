import { Data } from "effect"

export type CommandErrorCode =
  | "EmptyInput"
  | "UnknownCommand"
  | "UnexpectedCharacter"
  | "UnexpectedToken"
  | "MissingArgument"
  | "InvalidNumber"
  | "UnknownFood"
  | "UnknownMedicine"
  | "UnknownSpecies"
  | "TrailingInput"

export interface CommandDiagnostic {
  readonly code: CommandErrorCode
  readonly message: string
  /** 1-based column of the offending token, when there is one. */
  readonly column?: number
  readonly hints?: ReadonlyArray<string>
}

/**
 * Raised for console input that does not form a valid command.
 */
export class CommandParseError extends Data.TaggedError("CommandParseError")<{
  readonly input: string
  readonly diagnostic: CommandDiagnostic
}> {
  override get message(): string {
    return this.diagnostic.message
  }
}
