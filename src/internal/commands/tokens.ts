import { Lexer, createToken, type TokenType } from "chevrotain"

/**
 * Token definitions for the console command language. Keywords match
 * case-insensitively and fall back to `Word` when they are only the prefix of
 * a longer word ("starter", "feeding").
 */
export const WhiteSpace = createToken({ name: "WhiteSpace", pattern: /\s+/, group: Lexer.SKIPPED })

export const NumberLiteral = createToken({ name: "NumberLiteral", pattern: /-?\d+(?:\.\d+)?/ })

export const Word = createToken({ name: "Word", pattern: /[A-Za-z][A-Za-z0-9_'-]*/ })

const keyword = (name: string, word: string): TokenType =>
  createToken({ name, pattern: new RegExp(word, "i"), longer_alt: Word })

export const Start = keyword("Start", "start")
export const Pause = keyword("Pause", "pause")
export const Advance = keyword("Advance", "advance")
export const Feed = keyword("Feed", "feed")
export const Medicine = keyword("Medicine", "medicine")
export const Breed = keyword("Breed", "breed")
export const Buy = keyword("Buy", "buy")
export const Food = keyword("Food", "food")
export const AnimalKw = keyword("Animal", "animal")
export const Clean = keyword("Clean", "clean")
export const Upgrade = keyword("Upgrade", "upgrade")
export const Sell = keyword("Sell", "sell")
export const Move = keyword("Move", "move")
export const Report = keyword("Report", "report")
export const Status = keyword("Status", "status")
export const Help = keyword("Help", "help")
export const Text = keyword("Text", "text")
export const Pdf = keyword("Pdf", "pdf")

export const allTokens: ReadonlyArray<TokenType> = [
  WhiteSpace,
  NumberLiteral,
  Start,
  Pause,
  Advance,
  Feed,
  Medicine,
  Breed,
  Buy,
  Food,
  AnimalKw,
  Clean,
  Upgrade,
  Sell,
  Move,
  Report,
  Status,
  Help,
  Text,
  Pdf,
  Word,
]

export const CommandLexer = new Lexer([...allTokens], { ensureOptimizations: false })
