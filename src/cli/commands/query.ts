import type { Command } from 'commander'
import { errorMessage } from '../../errors.js'
import type { BindValue } from '../../statement/params.js'
import type { Statement } from '../../statement/statement.js'
import type { Row } from '../../types/index.js'
import type { Value } from '../../value/value.js'
import { withDatabase } from '../connect.js'
import { output } from '../output.js'
import { parseParams } from '../params.js'

/** Render one value as a table cell. */
export function formatCell(value: Value): string {
  switch (value.type()) {
    case 'null':
      return 'NULL'
    case 'blob':
      return `x'${Buffer.from(value.blob().data).toString('hex')}'`
    default:
      return value.text()
  }
}

function parseLimit(limit: string | undefined): number | undefined {
  if (limit === undefined) return undefined
  const parsed = Number(limit)
  if (!Number.isInteger(parsed) || parsed < 0) {
    throw new Error(`Invalid limit: ${limit}`)
  }
  return parsed
}

function printRows(statement: Statement, params: BindValue[], limit: number | undefined): boolean {
  for (let i = 0; i < params.length; i++) {
    if (!statement.bind(i + 1, params[i])) return false
  }

  const columns = Array.from({ length: statement.colCount() }, (_, i) => statement.colName(i) ?? '')
  const rows: string[][] = []
  const row: Row = new Map()
  while ((limit === undefined || rows.length < limit) && statement.fetch(row)) {
    rows.push(columns.map((_, i) => formatCell(statement.colValue(i))))
  }
  if (statement.state === 'failed') return false

  if (columns.length > 0) output.table(columns, rows)
  output.info(`(${rows.length} ${rows.length === 1 ? 'row' : 'rows'})`)
  return true
}

/**
 * Register the `query` command on the Commander program.
 *
 * Prepares one statement, binds the given parameters, and prints the
 * result rows as a text table.
 */
export function registerQueryCommand(program: Command): void {
  program
    .command('query')
    .description('Run a query and print its rows')
    .argument('<sql>', 'SQL text of a single statement')
    .option('-p, --param <json...>', 'parameter values as JSON, bound in order')
    .option('-l, --limit <count>', 'maximum number of rows to print')
    .option('-d, --database <path>', 'database file path (default: config database.path, else :memory:)')
    .option('-c, --config <path>', 'configuration file path')
    .action(
      (
        sql: string,
        options: { database?: string; param?: string[]; limit?: string; config?: string },
      ) => {
        let params: BindValue[]
        let limit: number | undefined
        try {
          params = parseParams(options.param ?? [])
          limit = parseLimit(options.limit)
        } catch (err) {
          output.error(errorMessage(err))
          process.exit(1)
          return
        }

        withDatabase(options.database, options.config, (db) => {
          const statement = db.prepare(sql)
          if (!statement.valid) return false
          try {
            return printRows(statement, params, limit)
          } finally {
            statement.finalize()
          }
        })
      },
    )
}
