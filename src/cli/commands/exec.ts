import type { Command } from 'commander'
import { withDatabase } from '../connect.js'
import { output } from '../output.js'

/**
 * Register the `exec` command on the Commander program.
 *
 * Runs one or more semicolon-separated statements with no parameters.
 */
export function registerExecCommand(program: Command): void {
  program
    .command('exec')
    .description('Run SQL statements without parameters or results')
    .argument('<sql>', 'SQL text, may hold several statements')
    .option('-d, --database <path>', 'database file path (default: config database.path, else :memory:)')
    .option('-c, --config <path>', 'configuration file path')
    .action((sql: string, options: { database?: string; config?: string }) => {
      withDatabase(options.database, options.config, (db) => {
        if (!db.exec(sql)) return false
        output.success('executed')
        return true
      })
    })
}
