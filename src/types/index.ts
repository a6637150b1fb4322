// Values and rows
export type { Blob, Row, ValueType } from './value.js'

// Configuration
export {
  ConnectionOptionsSchema,
  ConnectionConfigSchema,
  FacadeConfigSchema,
  JournalMode,
} from './config.js'
export type {
  ConnectionOptions,
  ConnectionConfig,
  FacadeConfig,
} from './config.js'
