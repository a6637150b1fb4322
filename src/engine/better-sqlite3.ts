import Database from 'better-sqlite3'
import { errorMessage } from '../errors.js'
import type {
  EngineConnection,
  EngineStatement,
  EngineValue,
  OpenOptions,
  SqlEngine,
  StepResult,
} from './interface.js'

// Engine status strings, as the SQLite C API reports them after a call.
const MESSAGE_OK = 'not an error'
const MESSAGE_ROW = 'another row available'
const MESSAGE_DONE = 'no more rows available'
const MESSAGE_RANGE = 'column index out of range'

// Highest parameter number the engine accepts by default.
const MAX_PARAMETERS = 32766

type Bindable = null | bigint | number | string | Buffer

type BindProbe = 'exact' | 'tooFew' | 'tooMany' | 'other'

function probeBind(statement: Database.Statement, count: number): BindProbe {
  try {
    statement.bind(...new Array<null>(count).fill(null))
    return 'exact'
  } catch (err) {
    const message = errorMessage(err)
    if (message.startsWith('Too few parameter values')) return 'tooFew'
    if (message.startsWith('Too many parameter values')) return 'tooMany'
    return 'other'
  }
}

/**
 * Number of positional parameters in a compiled statement.
 *
 * better-sqlite3 has no parameter count, but it checks the count on
 * `bind()` without running anything, so a spare copy of the statement is
 * bound with nulls: doubling while too few, then bisecting. Undefined when
 * the statement uses named parameters.
 */
function countParameters(probe: Database.Statement): number | undefined {
  let low = 0
  let high = MAX_PARAMETERS
  let guess = 0
  while (low <= high) {
    const result = probeBind(probe, guess)
    if (result === 'exact') return guess
    if (result === 'other') return undefined
    if (result === 'tooFew') {
      low = guess + 1
    } else {
      high = guess - 1
    }
    guess =
      result === 'tooFew' && high === MAX_PARAMETERS
        ? Math.min(high, low * 2)
        : Math.floor((low + high) / 2)
  }
  return undefined
}

/**
 * Convert a value returned by better-sqlite3 into a snapshot.
 * Statements run with safe integers on, so INTEGER columns arrive as bigint.
 */
function toEngineValue(raw: unknown): EngineValue | undefined {
  if (raw === null || raw === undefined) return { type: 'null' }
  if (typeof raw === 'bigint') return { type: 'integer', value: raw }
  if (typeof raw === 'number') return { type: 'real', value: raw }
  if (typeof raw === 'string') return { type: 'text', value: raw }
  if (raw instanceof Uint8Array) return { type: 'blob', value: raw }
  return undefined
}

/** Copy a snapshot into the form better-sqlite3 binds. */
function toBindable(value: EngineValue): Bindable {
  switch (value.type) {
    case 'null':
      return null
    case 'integer':
      return value.value
    case 'real':
      return value.value
    case 'text':
      return value.value
    case 'blob':
      return Buffer.from(value.value)
  }
}

/**
 * Connection over a better-sqlite3 Database.
 *
 * better-sqlite3 reports failures by throwing; every call here catches and
 * keeps the text so the statement layer can read it back, the way the C
 * API's last-error slot works.
 */
class BetterSqliteConnection implements EngineConnection {
  private lastMessage = MESSAGE_OK

  constructor(private readonly db: Database.Database) {}

  get filename(): string {
    return this.db.name
  }

  get open(): boolean {
    return this.db.open
  }

  setMessage(message: string): void {
    this.lastMessage = message
  }

  errorMessage(): string {
    return this.lastMessage
  }

  exec(sql: string): boolean {
    try {
      this.db.exec(sql)
      this.lastMessage = MESSAGE_OK
      return true
    } catch (err) {
      this.lastMessage = errorMessage(err)
      return false
    }
  }

  prepare(sql: string): EngineStatement | undefined {
    try {
      const compiled = this.db.prepare(sql)
      const parameterCount = countParameters(this.db.prepare(sql))
      const statement = new BetterSqliteStatement(this, compiled, parameterCount)
      this.lastMessage = MESSAGE_OK
      return statement
    } catch (err) {
      this.lastMessage = errorMessage(err)
      return undefined
    }
  }

  lastInsertRowid(): bigint {
    try {
      const rowid: unknown = this.db.prepare('SELECT last_insert_rowid()').pluck().safeIntegers().get()
      return typeof rowid === 'bigint' ? rowid : 0n
    } catch (err) {
      this.lastMessage = errorMessage(err)
      return 0n
    }
  }

  close(): void {
    if (this.db.open) this.db.close()
  }
}

/**
 * Statement over a better-sqlite3 prepared statement.
 *
 * better-sqlite3 takes all parameters at execution time, so bindings are
 * collected here and handed over on the first step, with every slot that
 * was never bound sent as null. Reader statements materialize their
 * result set on that first step and hand rows out one per step afterwards; this keeps the connection free for other statements
 * while a caller holds a half-read statement.
 */
class BetterSqliteStatement implements EngineStatement {
  private readonly params = new Map<number, Bindable>()
  private rows: unknown[][] | undefined
  private cursor = -1
  private readonly names: string[]

  constructor(
    private readonly connection: BetterSqliteConnection,
    private readonly statement: Database.Statement,
    private readonly parameterCount: number | undefined,
  ) {
    statement.safeIntegers(true)
    if (statement.reader) {
      statement.raw(true)
      this.names = statement.columns().map((column) => column.name)
    } else {
      this.names = []
    }
  }

  bind(index: number, value: EngineValue): boolean {
    if (!Number.isInteger(index) || index < 1 || index > (this.parameterCount ?? MAX_PARAMETERS)) {
      this.connection.setMessage(MESSAGE_RANGE)
      return false
    }
    this.params.set(index, toBindable(value))
    this.connection.setMessage(MESSAGE_OK)
    return true
  }

  clearBindings(): void {
    this.params.clear()
  }

  private boundValues(): Bindable[] {
    const length = this.parameterCount ?? Math.max(0, ...this.params.keys())
    return Array.from({ length }, (_, i) => this.params.get(i + 1) ?? null)
  }

  step(): StepResult {
    try {
      if (!this.statement.reader) {
        this.statement.run(...this.boundValues())
        this.connection.setMessage(MESSAGE_DONE)
        return 'done'
      }

      if (this.rows === undefined) {
        const rows: unknown[][] = []
        for (const row of this.statement.all(...this.boundValues())) {
          if (Array.isArray(row)) rows.push(row)
        }
        this.rows = rows
      }

      this.cursor = Math.min(this.cursor + 1, this.rows.length)
      if (this.cursor < this.rows.length) {
        this.connection.setMessage(MESSAGE_ROW)
        return 'row'
      }
      this.connection.setMessage(MESSAGE_DONE)
      return 'done'
    } catch (err) {
      this.connection.setMessage(errorMessage(err))
      return 'error'
    }
  }

  columnCount(): number {
    return this.names.length
  }

  columnName(index: number): string | undefined {
    return this.names[index]
  }

  columnValue(index: number): EngineValue | undefined {
    const row = this.rows?.[this.cursor]
    if (row === undefined || !Number.isInteger(index) || index < 0 || index >= row.length) {
      return { type: 'null' }
    }
    return toEngineValue(row[index])
  }

  reset(): void {
    this.rows = undefined
    this.cursor = -1
  }

  finalize(): void {
    this.reset()
    this.params.clear()
    this.connection.setMessage(MESSAGE_OK)
  }

  sql(): string {
    return this.statement.source
  }
}

/** Engine backed by better-sqlite3. Throws the engine's error when opening fails. */
export const betterSqliteEngine: SqlEngine = {
  open(filename: string, options: OpenOptions): EngineConnection {
    const db = new Database(filename, {
      readonly: options.readonly,
      fileMustExist: options.fileMustExist,
    })
    return new BetterSqliteConnection(db)
  },
}
