import type { IdGenerator } from "../../ports/id-generator"

/** Predictable ids (`local_1`, `local_2`, ...) for tests and fixtures. */
export const sequentialIds = (prefix: string): IdGenerator => {
  let next = 0

  return {
    generate: () => `${prefix}_${++next}`,
  }
}
