import { describe, it, expect } from 'vitest'
import { encodeParam, param, toParam } from './params.js'

describe('toParam', () => {
  it('should map plain values to tagged parameters', () => {
    expect(toParam(null)).toEqual({ kind: 'null' })
    expect(toParam('Ada')).toEqual({ kind: 'text', value: 'Ada' })
    expect(toParam(7n)).toEqual({ kind: 'bigInteger', value: 7n })
    expect(toParam(1.5)).toEqual({ kind: 'real', value: 1.5 })
  })

  it('should pick integer, bigInteger or real for numbers by range', () => {
    expect(toParam(2147483647)).toEqual({ kind: 'integer', value: 2147483647 })
    expect(toParam(2147483648)).toEqual({ kind: 'bigInteger', value: 2147483648n })
    expect(toParam(2 ** 60)).toEqual({ kind: 'real', value: 2 ** 60 })
  })

  it('should wrap byte arrays and Blob views as blob parameters', () => {
    const bytes = new Uint8Array([1, 2, 3])
    expect(toParam(bytes)).toEqual({ kind: 'blob', value: { data: bytes, size: 3 } })
    expect(toParam({ data: bytes, size: 2 })).toEqual({ kind: 'blob', value: { data: bytes, size: 2 } })
  })

  it('should pass tagged parameters through unchanged', () => {
    const tagged = param.real(2)
    expect(toParam(tagged)).toBe(tagged)
  })
})

describe('encodeParam', () => {
  it('should encode integers as 64-bit engine integers', () => {
    expect(encodeParam(param.integer(12))).toEqual({ ok: true, value: { type: 'integer', value: 12n } })
  })

  it('should reject integer parameters outside 32 bits', () => {
    const encoded = encodeParam(param.integer(2 ** 31))
    expect(encoded).toEqual({ ok: false, error: 'integer parameter is not a 32-bit integer: 2147483648' })
  })

  it('should reject fractional integer parameters', () => {
    expect(encodeParam(param.integer(1.5)).ok).toBe(false)
  })

  it('should reject bigInteger parameters outside 64 bits', () => {
    expect(encodeParam(param.bigInteger(2n ** 63n)).ok).toBe(false)
    expect(encodeParam(param.bigInteger(-(2n ** 63n)))).toEqual({
      ok: true,
      value: { type: 'integer', value: -(2n ** 63n) },
    })
  })

  it('should copy only the first size bytes of a blob', () => {
    const bytes = new Uint8Array([1, 2, 3, 4])
    const encoded = encodeParam(param.blob({ data: bytes, size: 2 }))
    expect(encoded).toEqual({ ok: true, value: { type: 'blob', value: new Uint8Array([1, 2]) } })
    bytes[0] = 9
    expect(encoded).toEqual({ ok: true, value: { type: 'blob', value: new Uint8Array([1, 2]) } })
  })

  it('should reject a blob size larger than its buffer', () => {
    const encoded = encodeParam(param.blob({ data: new Uint8Array(2), size: 3 }))
    expect(encoded).toEqual({ ok: false, error: 'blob size 3 does not fit a 2-byte buffer' })
  })
})
