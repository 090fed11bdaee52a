/**
 * Record schemas: ordered, named, typed fields
 */
import * as Schema from "effect/Schema"

export const PRIMITIVE_TYPES = [
  "null",
  "boolean",
  "int",
  "long",
  "float",
  "double",
  "bytes",
  "string",
  "array",
  "map",
] as const

export type PrimitiveType = (typeof PRIMITIVE_TYPES)[number]

/**
 * A field type is either a primitive or a union of primitives.
 * `["string", "null"]` is a nullable string.
 */
export type FieldType = PrimitiveType | readonly PrimitiveType[]

export interface SchemaField {
  readonly name: string
  readonly type: FieldType
}

export interface RecordSchema {
  readonly name: string
  readonly fields: readonly SchemaField[]
}

const PrimitiveTypeSchema = Schema.Literal(...PRIMITIVE_TYPES)

/**
 * Validation schema for a record schema declared in configuration
 */
export const RecordSchemaSchema = Schema.Struct({
  name: Schema.optionalWith(Schema.String, { default: () => "record" }),
  fields: Schema.Array(
    Schema.Struct({
      name: Schema.String.pipe(Schema.minLength(1)),
      type: Schema.Union(
        PrimitiveTypeSchema,
        Schema.Array(PrimitiveTypeSchema).pipe(Schema.minItems(1))
      ),
    })
  ),
})

export type RecordSchemaInput = Schema.Schema.Encoded<typeof RecordSchemaSchema>

/**
 * Look up a field by name
 */
export const getField = (
  schema: RecordSchema,
  name: string
): SchemaField | undefined => schema.fields.find((field) => field.name === name)

export const isNullable = (type: FieldType): boolean =>
  typeof type !== "string" && type.includes("null")

/**
 * Unwrap a nullable union to its single non-null member.
 * Anything else is returned as declared.
 */
export const nonNullable = (type: FieldType): FieldType => {
  if (typeof type === "string") {
    return type
  }
  const members = type.filter((member) => member !== "null")
  if (members.length === 1) {
    return members[0]
  }
  return members.length === 0 ? "null" : members
}

export const formatFieldType = (type: FieldType): string =>
  typeof type === "string" ? type : `union<${type.join(",")}>`

/**
 * Build a schema from the shape of a plain value map.
 * Used when an input has no declared schema.
 */
export const inferSchema = (
  name: string,
  values: Readonly<Record<string, unknown>>
): RecordSchema => ({
  name,
  fields: Object.entries(values).map(([fieldName, value]) => ({
    name: fieldName,
    type: inferFieldType(value),
  })),
})

const inferFieldType = (value: unknown): PrimitiveType => {
  if (value === null || value === undefined) return "null"
  switch (typeof value) {
    case "string":
      return "string"
    case "boolean":
      return "boolean"
    case "bigint":
      return "long"
    case "number":
      return Number.isInteger(value) ? "long" : "double"
  }
  if (value instanceof Uint8Array) return "bytes"
  return Array.isArray(value) ? "array" : "map"
}
