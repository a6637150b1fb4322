import type { ConnectionOptions, FacadeConfig } from '../types/config.js'

/** Default connection options matching TypeBox schema defaults */
export const DEFAULT_CONNECTION_OPTIONS: ConnectionOptions = {
  readonly: false,
  fileMustExist: false,
}

/** Default configuration file contents */
export const DEFAULT_CONFIG: FacadeConfig = {
  database: {
    path: ':memory:',
    ...DEFAULT_CONNECTION_OPTIONS,
  },
}
