import { nanoid } from "nanoid"
import type { IdGenerator } from "../../ports/id-generator"

export const nanoidIds = (size?: number): IdGenerator => ({
  generate: () => nanoid(size),
})

/** `local_V1StGXR8_Z5jdHi6B-myT` */
export const prefixedIds = (prefix: string, inner: IdGenerator): IdGenerator => ({
  generate: () => `${prefix}_${inner.generate()}`,
})
