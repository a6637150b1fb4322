/** Typed error codes for the failures that abort the caller's control flow */
export type DatabaseErrorCode = 'OPEN_FAILED' | 'VALUE_DUPLICATION_FAILED' | 'CONFIG_INVALID'

/**
 * Base class for thrown errors.
 *
 * Only unrecoverable conditions are thrown. Operational failures (compile,
 * bind, step) are returned as `false` and reported on the diagnostic channel.
 */
export class DatabaseError extends Error {
  readonly code: DatabaseErrorCode

  constructor(code: DatabaseErrorCode, message: string) {
    super(message)
    this.name = 'DatabaseError'
    this.code = code
  }
}

/** The engine refused to open the connection. Carries the engine's error text. */
export class DatabaseOpenError extends DatabaseError {
  constructor(
    public readonly filename: string,
    message: string,
  ) {
    super('OPEN_FAILED', message)
    this.name = 'DatabaseOpenError'
  }
}

/**
 * A column value could not be duplicated into an owned snapshot.
 *
 * There is no way to represent "no value" for a column that was already
 * fetched, so this is a precondition violation rather than a status.
 */
export class ValueDuplicationError extends DatabaseError {
  constructor(message: string) {
    super('VALUE_DUPLICATION_FAILED', message)
    this.name = 'ValueDuplicationError'
  }
}

/** Extract the message from an unknown thrown value. */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err)
}
