import { Type, type Static } from '@sinclair/typebox'
import { Value } from '@sinclair/typebox/value'
import { param, type BindValue } from '../statement/params.js'

/**
 * Parameter values as written on the command line, one JSON document each:
 * `null`, a number, a string, `{"blob":"<hex>"}` or `{"bigint":"<digits>"}`.
 */
export const CliParamSchema = Type.Union([
  Type.Null(),
  Type.Number(),
  Type.String(),
  Type.Object({ blob: Type.String({ pattern: '^([0-9a-fA-F]{2})*$' }) }, { additionalProperties: false }),
  Type.Object({ bigint: Type.String({ pattern: '^-?[0-9]+$' }) }, { additionalProperties: false }),
])

export type CliParam = Static<typeof CliParamSchema>

/** Error for a parameter that does not parse or match the schema. */
export class ParamParseError extends Error {
  constructor(
    public readonly position: number,
    message: string,
  ) {
    super(message)
    this.name = 'ParamParseError'
  }
}

function toBindValue(value: CliParam): BindValue {
  if (value === null || typeof value === 'number' || typeof value === 'string') return value
  if ('blob' in value) return param.blob(new Uint8Array(Buffer.from(value.blob, 'hex')))
  return param.bigInteger(BigInt(value.bigint))
}

/**
 * Parse `--param` arguments into bind values, in order.
 *
 * @throws ParamParseError naming the 1-based position of the bad argument
 */
export function parseParams(args: string[]): BindValue[] {
  return args.map((arg, i) => {
    let parsed: unknown
    try {
      parsed = JSON.parse(arg)
    } catch {
      throw new ParamParseError(i + 1, `Parameter ${i + 1} is not valid JSON: ${arg}`)
    }
    if (!Value.Check(CliParamSchema, parsed)) {
      throw new ParamParseError(i + 1, `Parameter ${i + 1} is not a supported value: ${arg}`)
    }
    return toBindValue(parsed)
  })
}
