import { createInterface } from "node:readline/promises"
import { Console, Effect, Layer } from "effect"
import { executeLine } from "../src/Commands.js"
import { GameLoop } from "../src/GameLoop.js"
import { Zoo } from "../src/Zoo.js"

const layer = GameLoop.layer.pipe(Layer.provideMerge(Zoo.live()))

const QUIT = new Set(["quit", "exit"])

const prompt = Effect.acquireRelease(
  Effect.sync(() => createInterface({ input: process.stdin, output: process.stdout })),
  (rl) => Effect.sync(() => rl.close()),
)

const program = Effect.gen(function* () {
  const rl = yield* prompt
  yield* Console.log("Welcome to OzZoo. Type 'help' for commands, 'quit' to leave.")
  while (true) {
    // stdin closing (Ctrl-D) rejects the pending question; treat it as quit
    const line = yield* Effect.tryPromise(() => rl.question("ozzoo> ")).pipe(
      Effect.catchAll(() => Effect.succeed("quit")),
    )
    if (QUIT.has(line.trim().toLowerCase())) {
      break
    }
    const result = yield* executeLine(line)
    yield* Console.log(result.message)
  }
  yield* Console.log("Goodbye!")
}).pipe(Effect.scoped, Effect.provide(layer))

Effect.runPromise(program).catch((error) => {
  console.error("OzZoo stopped unexpectedly", error)
  process.exitCode = 1
})
