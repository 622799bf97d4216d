import { handlers } from "./commands"
import { buildProgram } from "./lib/args"

buildProgram(handlers)
  .parseAsync(process.argv)
  .catch((e: unknown) => {
    console.error(`ERROR: ${e instanceof Error ? e.message : String(e)}`)
    process.exitCode = 1
  })
