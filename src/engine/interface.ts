/**
 * Snapshot of one value as the engine stores it. The `type` is the
 * engine's storage class.
 */
export type EngineValue =
  | { type: 'null' }
  | { type: 'integer'; value: bigint }
  | { type: 'real'; value: number }
  | { type: 'text'; value: string }
  | { type: 'blob'; value: Uint8Array }

/** Outcome of advancing a compiled statement by one step. */
export type StepResult = 'row' | 'done' | 'error'

/** Options applied when the engine opens a connection. */
export interface OpenOptions {
  readonly: boolean
  fileMustExist: boolean
}

/**
 * A compiled statement handle.
 *
 * Mirrors the engine's procedural statement surface: bind by 1-based
 * position, step, read the current row's columns, reset, finalize.
 * Failures are reported through the return value; the error text is read
 * from the owning connection.
 */
export interface EngineStatement {
  /** Bind one parameter slot. The engine copies the value immediately. */
  bind(index: number, value: EngineValue): boolean

  /** Set every bound slot back to null. */
  clearBindings(): void

  step(): StepResult

  /** Number of result columns (0 for statements that return no data). */
  columnCount(): number

  /** Column label, or undefined when the index is out of range. */
  columnName(index: number): string | undefined

  /**
   * Value of a column in the current row. A null value when there is no
   * current row or the index is out of range; undefined when the engine
   * could not produce a snapshot at all.
   */
  columnValue(index: number): EngineValue | undefined

  /** Rewind to before the first row, keeping bindings. */
  reset(): void

  /** Release the handle. Must be called at most once. */
  finalize(): void

  /** SQL text the statement was compiled from. */
  sql(): string
}

/** An open connection handle. */
export interface EngineConnection {
  readonly filename: string
  readonly open: boolean

  /** Run one or more statements without binding or result capture. */
  exec(sql: string): boolean

  /**
   * Compile `sql`, which must hold exactly one statement; text with
   * several statements fails to compile. Undefined on failure.
   */
  prepare(sql: string): EngineStatement | undefined

  /** Row id of the most recent successful insert on this connection. */
  lastInsertRowid(): bigint

  /** Error text describing the most recent call on this connection. */
  errorMessage(): string

  close(): void
}

/** Entry point of an engine: opens connections. Throws when opening fails. */
export interface SqlEngine {
  open(filename: string, options: OpenOptions): EngineConnection
}
