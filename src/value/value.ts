import { ValueDuplicationError } from '../errors.js'
import type { EngineValue } from '../engine/interface.js'
import type { Blob, ValueType } from '../types/index.js'
import {
  decodeText,
  encodeText,
  formatReal,
  realToInteger,
  textToInteger,
  textToReal,
  toInt32,
} from './coerce.js'

/**
 * Deep-copy a snapshot. Blob bytes are copied so the result shares nothing
 * with the engine's row buffer or the caller's array.
 */
function duplicate(source: EngineValue | undefined): EngineValue {
  if (source === undefined) {
    throw new ValueDuplicationError('Engine returned no value snapshot')
  }
  switch (source.type) {
    case 'null':
      return { type: 'null' }
    case 'integer':
      if (typeof source.value === 'bigint') return { type: 'integer', value: source.value }
      break
    case 'real':
      if (typeof source.value === 'number') return { type: 'real', value: source.value }
      break
    case 'text':
      if (typeof source.value === 'string') return { type: 'text', value: source.value }
      break
    case 'blob':
      if (source.value instanceof Uint8Array) return { type: 'blob', value: source.value.slice() }
      break
  }
  throw new ValueDuplicationError(`Unrecognized value snapshot of type "${String(source.type)}"`)
}

/**
 * An owned snapshot of one column value.
 *
 * Immutable once built, and independent of the statement and row that
 * produced it. Accessors never fail: reading through a mismatched type
 * applies the engine's coercion and falls back to a zero value.
 */
export class Value {
  private readonly snapshot: EngineValue

  /**
   * @param source - Engine snapshot or another Value; always duplicated
   * @throws ValueDuplicationError when the source is not a usable snapshot
   */
  constructor(source: EngineValue | Value | undefined) {
    this.snapshot = duplicate(source instanceof Value ? source.snapshot : source)
  }

  /** Storage class of the snapshot. */
  type(): ValueType {
    return this.snapshot.type
  }

  isNull(): boolean {
    return this.snapshot.type === 'null'
  }

  /** Signed 32-bit interpretation. */
  integer(): number {
    return toInt32(this.bigInteger())
  }

  /** Signed 64-bit interpretation. */
  bigInteger(): bigint {
    const snapshot = this.snapshot
    switch (snapshot.type) {
      case 'null':
        return 0n
      case 'integer':
        return snapshot.value
      case 'real':
        return realToInteger(snapshot.value)
      case 'text':
        return textToInteger(snapshot.value)
      case 'blob':
        return textToInteger(decodeText(snapshot.value))
    }
  }

  real(): number {
    const snapshot = this.snapshot
    switch (snapshot.type) {
      case 'null':
        return 0
      case 'integer':
        return Number(snapshot.value)
      case 'real':
        return snapshot.value
      case 'text':
        return textToReal(snapshot.value)
      case 'blob':
        return textToReal(decodeText(snapshot.value))
    }
  }

  /**
   * Pointer tag attached by pointer binding. Values read back from result
   * columns never carry one, so this is undefined for every fetched value.
   */
  pointer(): object | undefined {
    return undefined
  }

  /** Text form. Numbers render in canonical decimal, null as ''. */
  text(): string {
    const snapshot = this.snapshot
    switch (snapshot.type) {
      case 'null':
        return ''
      case 'integer':
        return snapshot.value.toString()
      case 'real':
        return formatReal(snapshot.value)
      case 'text':
        return snapshot.value
      case 'blob':
        return decodeText(snapshot.value)
    }
  }

  /**
   * View over the raw bytes. For a blob this is the Value's own buffer and
   * must not be modified; other types give the bytes of their text form.
   */
  blob(): Blob {
    const snapshot = this.snapshot
    const data = snapshot.type === 'blob' ? snapshot.value.subarray() : encodeText(this.text())
    return { data, size: data.byteLength }
  }

  /** Byte length of the blob or text representation. */
  size(): number {
    const snapshot = this.snapshot
    switch (snapshot.type) {
      case 'null':
        return 0
      case 'blob':
        return snapshot.value.byteLength
      default:
        return Buffer.byteLength(this.text(), 'utf-8')
    }
  }
}
