import type { Command } from 'commander'
import { errorMessage } from '../../errors.js'
import type { BindValue } from '../../statement/params.js'
import { withDatabase } from '../connect.js'
import { output } from '../output.js'
import { parseParams } from '../params.js'

/**
 * Register the `run` command on the Commander program.
 *
 * Prepares one statement, executes it with the given parameters, and
 * prints the connection's last insert id.
 */
export function registerRunCommand(program: Command): void {
  program
    .command('run')
    .description('Execute one statement with parameters')
    .argument('<sql>', 'SQL text of a single statement')
    .option('-p, --param <json...>', 'parameter values as JSON, bound in order')
    .option('-d, --database <path>', 'database file path (default: config database.path, else :memory:)')
    .option('-c, --config <path>', 'configuration file path')
    .action((sql: string, options: { database?: string; param?: string[]; config?: string }) => {
      let params: BindValue[]
      try {
        params = parseParams(options.param ?? [])
      } catch (err) {
        output.error(errorMessage(err))
        process.exit(1)
        return
      }

      withDatabase(options.database, options.config, (db) => {
        const statement = db.prepare(sql)
        try {
          if (!statement.execute(...params)) return false
        } finally {
          statement.finalize()
        }
        output.success(`last insert id ${db.lastInsertId()}`)
        return true
      })
    })
}
