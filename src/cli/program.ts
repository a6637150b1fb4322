import { Command } from 'commander'
import { registerExecCommand } from './commands/exec.js'
import { registerRunCommand } from './commands/run.js'
import { registerQueryCommand } from './commands/query.js'

/** Build the Commander program with every command registered. */
export function createProgram(): Command {
  const program = new Command()

  program
    .name('sqlite-facade')
    .description('Run SQL against a SQLite database file')
    .version('0.1.0')

  registerExecCommand(program)
  registerRunCommand(program)
  registerQueryCommand(program)

  return program
}
