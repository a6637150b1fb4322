/**
 * FakeEngine: scripted in-process engine for paths the real engine cannot
 * reach on demand (open failures, broken value snapshots, exact step counts).
 *
 * Each prepared SQL string maps to a fixed result: a list of column names
 * and the rows to hand out, one per step. SQL with no script fails to
 * compile with "no such query: <sql>".
 */

import type {
  EngineConnection,
  EngineStatement,
  EngineValue,
  OpenOptions,
  SqlEngine,
  StepResult,
} from '../../src/engine/interface.js'

export interface FakeResult {
  columns: string[]
  /** `undefined` cells make `columnValue` report a failed snapshot. */
  rows: Array<Array<EngineValue | undefined>>
  /** Fail the step that would produce this 0-based row. */
  failAtRow?: number
}

export interface FakeEngineOptions {
  results?: Record<string, FakeResult>
  openError?: string
  /** SQL strings `exec` rejects, with the error text to report. */
  execErrors?: Record<string, string>
}

export class FakeEngine implements SqlEngine {
  /** Total number of `step()` calls across all statements. */
  steps = 0
  readonly opened: Array<{ filename: string; options: OpenOptions }> = []
  readonly executed: string[] = []
  closed = 0

  constructor(private readonly options: FakeEngineOptions = {}) {}

  open(filename: string, options: OpenOptions): EngineConnection {
    if (this.options.openError !== undefined) throw new Error(this.options.openError)
    this.opened.push({ filename, options })
    return new FakeConnection(this, filename, this.options)
  }
}

class FakeConnection implements EngineConnection {
  open = true
  message = 'not an error'

  constructor(
    readonly engine: FakeEngine,
    readonly filename: string,
    private readonly options: FakeEngineOptions,
  ) {}

  exec(sql: string): boolean {
    this.engine.executed.push(sql)
    const error = this.options.execErrors?.[sql]
    if (error !== undefined) {
      this.message = error
      return false
    }
    this.message = 'not an error'
    return true
  }

  prepare(sql: string): EngineStatement | undefined {
    const result = this.options.results?.[sql]
    if (result === undefined) {
      this.message = `no such query: ${sql}`
      return undefined
    }
    return new FakeStatement(this, sql, result)
  }

  lastInsertRowid(): bigint {
    return 0n
  }

  errorMessage(): string {
    return this.message
  }

  close(): void {
    this.open = false
    this.engine.closed++
  }
}

class FakeStatement implements EngineStatement {
  private cursor = -1
  readonly bound = new Map<number, EngineValue>()

  constructor(
    private readonly connection: FakeConnection,
    private readonly text: string,
    private readonly result: FakeResult,
  ) {}

  bind(index: number, value: EngineValue): boolean {
    if (index < 1) {
      this.connection.message = 'column index out of range'
      return false
    }
    this.bound.set(index, value)
    return true
  }

  clearBindings(): void {
    this.bound.clear()
  }

  step(): StepResult {
    this.connection.engine.steps++
    const next = this.cursor + 1
    if (this.result.failAtRow === next) {
      this.connection.message = `fake failure at row ${next}`
      return 'error'
    }
    this.cursor = Math.min(next, this.result.rows.length)
    if (this.cursor < this.result.rows.length) {
      this.connection.message = 'another row available'
      return 'row'
    }
    this.connection.message = 'no more rows available'
    return 'done'
  }

  columnCount(): number {
    return this.result.columns.length
  }

  columnName(index: number): string | undefined {
    return this.result.columns[index]
  }

  columnValue(index: number): EngineValue | undefined {
    const row = this.result.rows[this.cursor]
    if (row === undefined || index < 0 || index >= row.length) return { type: 'null' }
    return row[index]
  }

  reset(): void {
    this.cursor = -1
  }

  finalize(): void {
    this.cursor = -1
  }

  sql(): string {
    return this.text
  }
}
