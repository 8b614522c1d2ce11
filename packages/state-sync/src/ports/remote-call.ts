/**
 * A call to a remote service. Implementations should stop work once `signal` aborts.
 */
export type RemoteCall<T> = (signal: AbortSignal) => Promise<T>

/**
 * Wraps every remote call a container issues. `key` names the operation
 * (screen key, cache key or tier) for logs and errors.
 */
export type CallPolicy = <T>(key: string, call: RemoteCall<T>, signal: AbortSignal) => Promise<T>
