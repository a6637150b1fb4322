export type {
  EngineConnection,
  EngineStatement,
  EngineValue,
  OpenOptions,
  SqlEngine,
  StepResult,
} from './interface.js'
export { betterSqliteEngine } from './better-sqlite3.js'
