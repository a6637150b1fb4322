import { resolveConnectionOptions } from '../config/loader.js'
import { stderrReporter, type DiagnosticReporter } from '../diagnostics/reporter.js'
import { betterSqliteEngine } from '../engine/better-sqlite3.js'
import type { EngineConnection, SqlEngine } from '../engine/interface.js'
import { DatabaseOpenError, errorMessage } from '../errors.js'
import { Statement } from '../statement/statement.js'
import type { ConnectionOptions, Row } from '../types/index.js'

/** Options for opening a Database. */
export interface DatabaseOptions extends Partial<ConnectionOptions> {
  /** Receives diagnostics for operational failures. Defaults to stderr. */
  reporter?: DiagnosticReporter
  /** Engine to open the connection with. Defaults to better-sqlite3. */
  engine?: SqlEngine
}

/**
 * How `Database.query` ended.
 *
 * - `completed`: every row was handed to the callback
 * - `stopped`: the callback returned false
 * - `failed`: the query did not compile, or a step hit an engine error
 */
export type QueryOutcome = 'completed' | 'stopped' | 'failed'

/** Return false to stop iterating. */
export type RowCallback = (row: Row) => boolean | void

function openConnection(engine: SqlEngine, filename: string, options: ConnectionOptions): EngineConnection {
  let connection: EngineConnection
  try {
    connection = engine.open(filename, {
      readonly: options.readonly,
      fileMustExist: options.fileMustExist,
    })
  } catch (err) {
    throw new DatabaseOpenError(filename, errorMessage(err))
  }

  const pragmas: string[] = []
  if (options.journalMode !== undefined) pragmas.push(`PRAGMA journal_mode = ${options.journalMode}`)
  if (options.foreignKeys !== undefined) pragmas.push(`PRAGMA foreign_keys = ${options.foreignKeys ? 'ON' : 'OFF'}`)

  for (const pragma of pragmas) {
    if (!connection.exec(pragma)) {
      const message = connection.errorMessage()
      connection.close()
      throw new DatabaseOpenError(filename, message)
    }
  }
  return connection
}

/**
 * One open connection.
 *
 * The connection opens in the constructor and stays open until `close()`.
 * Only this class builds Statements, and every Statement it builds must be
 * finished with before the Database is closed.
 *
 * Calls are synchronous and block until the engine returns. A Database
 * must have a single logical owner at a time; callers that share one
 * across asynchronous tasks serialize access themselves, including around
 * `lastInsertId()`.
 */
export class Database {
  readonly filename: string
  private readonly connection: EngineConnection
  private readonly report: DiagnosticReporter
  private closed = false

  /**
   * @param filename - Database file path, or ':memory:' for an in-memory database
   * @throws DatabaseOpenError with the engine's error text when opening fails
   * @throws ConfigError when the connection options are invalid
   */
  constructor(filename: string, options: DatabaseOptions = {}) {
    const { reporter = stderrReporter, engine = betterSqliteEngine, ...connectionOptions } = options
    this.filename = filename
    this.report = reporter
    this.connection = openConnection(engine, filename, resolveConnectionOptions(connectionOptions))
  }

  /** True until `close()` is called. */
  get open(): boolean {
    return !this.closed && this.connection.open
  }

  /** Run one or more semicolon-separated statements, discarding any results. */
  exec(sql: string): boolean {
    if (!this.connection.exec(sql)) {
      this.report(`Database exec failed: ${this.connection.errorMessage()}`)
      return false
    }
    return true
  }

  /**
   * Compile one statement. Never throws: on failure the diagnostic is
   * reported and an inert Statement is returned, so check `valid`.
   * SQL holding more than one statement does not compile; use `exec` for
   * scripts.
   */
  prepare(sql: string): Statement {
    const handle = this.connection.prepare(sql)
    if (handle === undefined) {
      this.report(`Database prepare failed: ${this.connection.errorMessage()}`)
    }
    return new Statement(handle, this.connection, this.report)
  }

  /**
   * Prepare `sql` and hand each row to `callback`.
   *
   * The same Row object is refilled for every call; copy it to keep it.
   * The engine computes the whole result set on the first fetch, so a
   * callback that stops early still pays for every row, and the rows are
   * held in memory until the statement is finalized.
   */
  query(sql: string, callback: RowCallback): QueryOutcome {
    const statement = this.prepare(sql)
    if (!statement.valid) return 'failed'

    try {
      const row: Row = new Map()
      while (statement.fetch(row)) {
        if (callback(row) === false) return 'stopped'
      }
      return statement.state === 'failed' ? 'failed' : 'completed'
    } finally {
      statement.finalize()
    }
  }

  /** Row id generated by the most recent successful insert on this connection. */
  lastInsertId(): bigint {
    return this.connection.lastInsertRowid()
  }

  /** Close the connection. Later calls do nothing. */
  close(): void {
    if (this.closed) return
    this.closed = true
    this.connection.close()
  }
}
