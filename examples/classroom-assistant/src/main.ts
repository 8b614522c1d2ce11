import { run } from "./run"

run().catch((err: unknown) => {
  console.error(err)
  process.exitCode = 1
})
