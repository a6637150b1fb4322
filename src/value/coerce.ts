/**
 * Conversions between storage classes, following the engine's rules for
 * reading a value through an accessor of a different type.
 */

const INT64_MAX = 9223372036854775807n
const INT64_MIN = -9223372036854775808n

// Doubles at or beyond these saturate when converted to a 64-bit integer.
const REAL_INT64_MAX = 2 ** 63
const REAL_INT64_MIN = -(2 ** 63)

const LEADING_INTEGER = /^\s*([+-]?)(\d+)/
const LEADING_REAL = /^\s*[+-]?(?:\d+(?:\.\d*)?|\.\d+)(?:[eE][+-]?\d+)?/

function clampInt64(value: bigint): bigint {
  if (value > INT64_MAX) return INT64_MAX
  if (value < INT64_MIN) return INT64_MIN
  return value
}

/** Longest leading integer prefix of `text`, clamped to 64 bits. "12abc" reads as 12. */
export function textToInteger(text: string): bigint {
  const match = LEADING_INTEGER.exec(text)
  if (!match) return 0n
  const magnitude = BigInt(match[2])
  return clampInt64(match[1] === '-' ? -magnitude : magnitude)
}

/** Longest leading decimal prefix of `text`, with optional exponent. */
export function textToReal(text: string): number {
  const match = LEADING_REAL.exec(text)
  if (!match) return 0
  return Number(match[0].trim())
}

/** Truncate toward zero, saturating at the 64-bit bounds. NaN reads as 0. */
export function realToInteger(value: number): bigint {
  if (Number.isNaN(value)) return 0n
  if (value <= REAL_INT64_MIN) return INT64_MIN
  if (value >= REAL_INT64_MAX) return INT64_MAX
  return BigInt(Math.trunc(value))
}

/** Low 32 bits of a 64-bit integer, as a signed number. */
export function toInt32(value: bigint): number {
  return Number(BigInt.asIntN(32, value))
}

function trimFraction(digits: string): string {
  if (!digits.includes('.')) return digits
  return digits.replace(/0+$/, '').replace(/\.$/, '')
}

function withFraction(digits: string): string {
  return digits.includes('.') ? digits : `${digits}.0`
}

/**
 * Canonical text form of a real: 15 significant digits, exponent form
 * outside 1e-4 <= |x| < 1e15, and always a fractional part so the text
 * reads back as a real ("2.0", "1.0e+20").
 */
export function formatReal(value: number): string {
  if (Number.isNaN(value)) return ''
  if (!Number.isFinite(value)) return value > 0 ? 'Inf' : '-Inf'
  if (value === 0) return '0.0'

  const [mantissa, exponentText] = value.toExponential(14).split('e')
  const exponent = Number(exponentText)
  if (exponent < -4 || exponent >= 15) {
    const sign = exponent < 0 ? '-' : '+'
    const magnitude = String(Math.abs(exponent)).padStart(2, '0')
    return `${withFraction(trimFraction(mantissa))}e${sign}${magnitude}`
  }
  return withFraction(trimFraction(value.toFixed(14 - exponent)))
}

/** UTF-8 encoding of `text`. */
export function encodeText(text: string): Uint8Array {
  return new Uint8Array(Buffer.from(text, 'utf-8'))
}

/** UTF-8 decoding of raw bytes. */
export function decodeText(bytes: Uint8Array): string {
  return Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength).toString('utf-8')
}
