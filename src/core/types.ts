/**
 * Minimal logger surface used by the core services. At run time this is the
 * Fastify (pino) logger.
 */
export interface Logger {
  info(obj: unknown, msg?: string): void
  warn(obj: unknown, msg?: string): void
  error(obj: unknown, msg?: string): void
}

export type Outcome<T, F extends string> = { ok: true; value: T } | { ok: false; reason: F }

export type LoginFailure = 'unauthorized' | 'token-creation-failed'
export type SetSecretFailure = 'no-token' | 'invalid-token' | 'store-failed'
export type FetchSecretFailure = 'no-token' | 'invalid-token' | 'not-found'

export interface ProcessResult {
  exitCode: number | null
  error?: string
}
