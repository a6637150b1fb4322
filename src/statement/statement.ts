import type { EngineConnection, EngineStatement, StepResult } from '../engine/interface.js'
import type { DiagnosticReporter } from '../diagnostics/reporter.js'
import type { Row } from '../types/index.js'
import { Value } from '../value/value.js'
import { encodeParam, toParam, type BindValue } from './params.js'

/**
 * Lifecycle of a statement.
 *
 * - `unbound`: no compiled handle (compile failed, or finalized)
 * - `ready`: compiled and positioned before the first row
 * - `row`: a row is available for the column accessors
 * - `exhausted`: stepping reported completion
 * - `failed`: stepping stopped on an engine error
 */
export type StatementState = 'unbound' | 'ready' | 'row' | 'exhausted' | 'failed'

/**
 * A compiled query.
 *
 * Built only by `Database.prepare`. Holds a plain reference to the
 * connection it was compiled against, used to read error text after a
 * failed call; a Statement must not be used after its Database is closed.
 *
 * When compilation failed the statement is inert: `valid` is false and
 * every method returns false, an empty result, or a null value.
 */
export class Statement {
  private handle: EngineStatement | undefined
  private current: StatementState

  /** @internal Use `Database.prepare`. */
  constructor(
    handle: EngineStatement | undefined,
    private readonly connection: EngineConnection,
    private readonly report: DiagnosticReporter,
  ) {
    this.handle = handle
    this.current = handle === undefined ? 'unbound' : 'ready'
  }

  /** False exactly when there is no compiled handle. */
  get valid(): boolean {
    return this.handle !== undefined
  }

  get state(): StatementState {
    return this.current
  }

  /** Rewind to before the first row. Bound parameters are kept. */
  reset(): void {
    if (this.handle === undefined) return
    this.handle.reset()
    this.current = 'ready'
  }

  /**
   * Bind a value to a 1-based parameter slot.
   *
   * Only a statement in the `ready` state takes bindings; call `reset()`
   * first once it has been stepped.
   */
  bind(index: number, value: BindValue): boolean {
    if (this.handle === undefined) return false

    if (this.current !== 'ready') {
      this.report(`Statement bind failed: statement must be reset before binding (${this.current})`)
      return false
    }

    const encoded = encodeParam(toParam(value))
    if (!encoded.ok) {
      this.report(`Statement bind failed: ${encoded.error}`)
      return false
    }

    if (!this.handle.bind(index, encoded.value)) {
      this.report(`Statement bind failed: ${this.connection.errorMessage()}`)
      return false
    }
    return true
  }

  /** Set every bound parameter back to null. */
  clearBindings(): void {
    this.handle?.clearBindings()
  }

  /**
   * Reset, bind `values` at positions 1..N, and step once.
   *
   * True only when the step completes without producing a row, so this
   * fits INSERT, UPDATE, DELETE and DDL; a SELECT reports false.
   */
  execute(...values: BindValue[]): boolean {
    if (this.handle === undefined) return false

    this.reset()
    for (let i = 0; i < values.length; i++) {
      if (!this.bind(i + 1, values[i])) return false
    }

    if (this.step() !== 'done') {
      this.report(`Statement execution failed: ${this.connection.errorMessage()}`)
      return false
    }
    return true
  }

  /**
   * Step once and fill `row` with the produced record.
   *
   * `row` is cleared first and stays empty when no row is produced. Once
   * the statement is exhausted this keeps returning false until `reset()`.
   *
   * The first fetch after a reset runs the query to completion and buffers
   * its rows; later fetches hand them out one at a time.
   */
  fetch(row: Row): boolean {
    if (this.handle === undefined) return false

    row.clear()
    const previous = this.current
    const result = this.step()
    if (result === 'error' && previous !== 'failed') {
      this.report(`Statement fetch failed: ${this.connection.errorMessage()}`)
    }
    if (result !== 'row') return false

    const count = this.colCount()
    for (let i = 0; i < count; i++) {
      const name = this.colName(i)
      if (name !== undefined && !row.has(name)) row.set(name, this.colValue(i))
    }
    return true
  }

  /** Fetch every remaining row, each into its own Row. */
  fetchAll(): Row[] {
    const rows: Row[] = []
    if (this.handle === undefined) return rows

    let row: Row = new Map()
    while (this.fetch(row)) {
      rows.push(row)
      row = new Map()
    }
    return rows
  }

  colCount(): number {
    return this.handle?.columnCount() ?? 0
  }

  /** Engine-reported label of a 0-based column. */
  colName(index: number): string | undefined {
    return this.handle?.columnName(index)
  }

  /** Copy of a 0-based column of the current row. Null when there is no row. */
  colValue(index: number): Value {
    if (this.handle === undefined) return new Value({ type: 'null' })
    return new Value(this.handle.columnValue(index))
  }

  colSize(index: number): number {
    return this.colValue(index).size()
  }

  /** SQL text the statement was compiled from. */
  queryString(): string {
    return this.handle?.sql() ?? ''
  }

  /** Release the compiled handle. The statement is inert afterwards. */
  finalize(): void {
    if (this.handle === undefined) return
    this.handle.finalize()
    this.handle = undefined
    this.current = 'unbound'
  }

  private step(): StepResult {
    if (this.handle === undefined) return 'error'
    if (this.current === 'exhausted') return 'done'
    if (this.current === 'failed') return 'error'

    const result = this.handle.step()
    this.current = result === 'row' ? 'row' : result === 'done' ? 'exhausted' : 'failed'
    return result
  }
}
