export { Database } from './database.js'
export type { DatabaseOptions, QueryOutcome, RowCallback } from './database.js'
