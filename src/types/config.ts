import { Type, type Static } from '@sinclair/typebox'

/** Journal modes accepted by the journal_mode pragma */
export const JournalMode = Type.Union([
  Type.Literal('delete'),
  Type.Literal('truncate'),
  Type.Literal('persist'),
  Type.Literal('memory'),
  Type.Literal('wal'),
  Type.Literal('off'),
])

/** Connection options applied when a Database opens */
export const ConnectionOptionsSchema = Type.Object(
  {
    readonly: Type.Boolean({ default: false }),
    fileMustExist: Type.Boolean({ default: false }),
    journalMode: Type.Optional(JournalMode),
    foreignKeys: Type.Optional(Type.Boolean()),
  },
  { additionalProperties: false },
)

/** Connection entry of a configuration file: options plus the database path */
export const ConnectionConfigSchema = Type.Object(
  {
    path: Type.String({ minLength: 1, default: ':memory:' }),
    ...ConnectionOptionsSchema.properties,
  },
  { additionalProperties: false },
)

/** Configuration file schema */
export const FacadeConfigSchema = Type.Object({
  database: ConnectionConfigSchema,
})

export type JournalMode = Static<typeof JournalMode>
export type ConnectionOptions = Static<typeof ConnectionOptionsSchema>
export type ConnectionConfig = Static<typeof ConnectionConfigSchema>
export type FacadeConfig = Static<typeof FacadeConfigSchema>
