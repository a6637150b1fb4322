import { loadConfig } from '../config/loader.js'
import { Database } from '../database/database.js'
import { errorMessage } from '../errors.js'
import type { ConnectionOptions } from '../types/config.js'
import { output } from './output.js'

/**
 * Open `database` with options from an optional config file. Without a
 * positional path the config's `database.path` is used.
 */
export function openDatabase(database: string | undefined, configPath?: string): Database {
  let path = database
  let options: Partial<ConnectionOptions> = {}
  if (configPath !== undefined) {
    const { path: configuredPath, ...connection } = loadConfig(configPath).database
    path ??= configuredPath
    options = connection
  }
  return new Database(path ?? ':memory:', {
    ...options,
    reporter: (message) => output.error(message),
  })
}

/**
 * Open the database, run `action`, and close it again. Exits with status 1
 * when opening throws or `action` returns false; the library has already
 * reported the operational failure by then.
 */
export function withDatabase(
  database: string | undefined,
  configPath: string | undefined,
  action: (db: Database) => boolean,
): void {
  let db: Database
  try {
    db = openDatabase(database, configPath)
  } catch (err) {
    output.error(errorMessage(err))
    process.exit(1)
    return
  }

  let ok: boolean
  try {
    ok = action(db)
  } finally {
    db.close()
  }
  if (!ok) process.exit(1)
}
