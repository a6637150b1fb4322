import type { EngineValue } from '../engine/interface.js'
import type { Blob } from '../types/index.js'

/** A parameter value tagged with the engine type it binds as. */
export type Param =
  | { kind: 'blob'; value: Blob }
  | { kind: 'real'; value: number }
  | { kind: 'integer'; value: number }
  | { kind: 'bigInteger'; value: bigint }
  | { kind: 'null' }
  | { kind: 'text'; value: string }

/**
 * Anything `bind` and `execute` accept: a tagged Param, or a plain value
 * mapped to one by `toParam`.
 */
export type BindValue = Param | Blob | Uint8Array | string | number | bigint | null

const INT32_MIN = -(2 ** 31)
const INT32_MAX = 2 ** 31 - 1
const INT64_MIN = -9223372036854775808n
const INT64_MAX = 9223372036854775807n

/** Constructors for tagged parameters. */
export const param = {
  blob(data: Uint8Array | Blob): Param {
    return { kind: 'blob', value: data instanceof Uint8Array ? { data, size: data.byteLength } : data }
  },
  real(value: number): Param {
    return { kind: 'real', value }
  },
  integer(value: number): Param {
    return { kind: 'integer', value }
  },
  bigInteger(value: bigint): Param {
    return { kind: 'bigInteger', value }
  },
  null(): Param {
    return { kind: 'null' }
  },
  text(value: string): Param {
    return { kind: 'text', value }
  },
}

function isInt32(value: number): boolean {
  return Number.isInteger(value) && value >= INT32_MIN && value <= INT32_MAX
}

/**
 * Map a plain value to a tagged parameter.
 *
 * Numbers are ambiguous in JavaScript: integral numbers inside the 32-bit
 * range bind as `integer`, other safe integers as `bigInteger`, everything
 * else as `real`. Tag the value explicitly to force a type.
 */
export function toParam(value: BindValue): Param {
  if (value === null) return param.null()
  if (typeof value === 'string') return param.text(value)
  if (typeof value === 'bigint') return param.bigInteger(value)
  if (typeof value === 'number') {
    if (isInt32(value)) return param.integer(value)
    if (Number.isSafeInteger(value)) return param.bigInteger(BigInt(value))
    return param.real(value)
  }
  if (value instanceof Uint8Array) return param.blob(value)
  if ('kind' in value) return value
  return param.blob(value)
}

/** Result of encoding a parameter for the engine. */
export type EncodedParam = { ok: true; value: EngineValue } | { ok: false; error: string }

/**
 * Check a parameter against its tag and produce the engine value to bind.
 * Blob bytes are copied, so the caller's buffer need not outlive the call.
 */
export function encodeParam(p: Param): EncodedParam {
  switch (p.kind) {
    case 'null':
      return { ok: true, value: { type: 'null' } }
    case 'text':
      return { ok: true, value: { type: 'text', value: p.value } }
    case 'real':
      return { ok: true, value: { type: 'real', value: p.value } }
    case 'integer':
      if (!isInt32(p.value)) {
        return { ok: false, error: `integer parameter is not a 32-bit integer: ${p.value}` }
      }
      return { ok: true, value: { type: 'integer', value: BigInt(p.value) } }
    case 'bigInteger':
      if (p.value < INT64_MIN || p.value > INT64_MAX) {
        return { ok: false, error: `bigInteger parameter is outside the 64-bit range: ${p.value}` }
      }
      return { ok: true, value: { type: 'integer', value: p.value } }
    case 'blob': {
      const { data, size } = p.value
      if (!Number.isInteger(size) || size < 0 || size > data.byteLength) {
        return { ok: false, error: `blob size ${size} does not fit a ${data.byteLength}-byte buffer` }
      }
      return { ok: true, value: { type: 'blob', value: data.slice(0, size) } }
    }
  }
}
