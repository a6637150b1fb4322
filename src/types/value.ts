import type { Value } from '../value/value.js'

/** Storage class of a value. */
export type ValueType = 'null' | 'integer' | 'real' | 'text' | 'blob'

/**
 * Non-owning view over raw bytes: binary input when binding, binary output
 * when reading. Valid only while its source is; copy `data` to keep it.
 */
export interface Blob {
  data: Uint8Array
  size: number
}

/**
 * One fetched record, keyed by the engine-reported column label.
 * When two columns share a label, the first one is kept.
 */
export type Row = Map<string, Value>
