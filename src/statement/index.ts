export { Statement } from './statement.js'
export type { StatementState } from './statement.js'
export { param, toParam, encodeParam } from './params.js'
export type { Param, BindValue, EncodedParam } from './params.js'
