/**
 * Structured records: a schema plus the values of its fields
 */
import type { RecordSchema } from "./schema.js"

export interface StructuredRecord {
  readonly schema: RecordSchema
  readonly values: Readonly<Record<string, unknown>>
}

export const createRecord = (
  schema: RecordSchema,
  values: Readonly<Record<string, unknown>>
): StructuredRecord => ({ schema, values })

export const hasValue = (record: StructuredRecord, field: string): boolean =>
  Object.prototype.hasOwnProperty.call(record.values, field)

/**
 * Values in schema-declared order, restricted to declared fields.
 * Fields without a value are left out.
 */
export const orderedValues = (
  record: StructuredRecord
): Record<string, unknown> =>
  Object.fromEntries(
    record.schema.fields
      .filter((field) => hasValue(record, field.name))
      .map((field) => [field.name, record.values[field.name]])
  )
