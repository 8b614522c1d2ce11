import type { CallPolicy } from "../../ports/remote-call"

export const passthroughPolicy: CallPolicy = (_key, call, signal) => call(signal)
