export { Database } from './database/index.js'
export type { DatabaseOptions, QueryOutcome, RowCallback } from './database/index.js'
export { Statement, param, toParam } from './statement/index.js'
export type { StatementState, Param, BindValue } from './statement/index.js'
export { Value } from './value/index.js'
export type { Blob, Row, ValueType, ConnectionOptions, FacadeConfig, JournalMode } from './types/index.js'
export { DatabaseError, DatabaseOpenError, ValueDuplicationError } from './errors.js'
export type { DatabaseErrorCode } from './errors.js'
export { ConfigError, loadConfig, resolveConnectionOptions } from './config/index.js'
export { stderrReporter, silentReporter, createBufferReporter } from './diagnostics/index.js'
export type { DiagnosticReporter, BufferReporter } from './diagnostics/index.js'
export { betterSqliteEngine } from './engine/index.js'
export type {
  EngineConnection,
  EngineStatement,
  EngineValue,
  OpenOptions,
  SqlEngine,
  StepResult,
} from './engine/index.js'
