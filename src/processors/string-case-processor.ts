/**
 * String Case Processor - Transforms configured string fields to upper or lower case
 */
import { Effect, Option } from "effect";
import * as Schema from "effect/Schema";
import type { Processor, Message } from "../core/types.js";
import {
  type RecordSchema,
  getField,
  nonNullable,
  formatFieldType,
} from "../core/schema.js";
import {
  type StructuredRecord,
  createRecord,
  hasValue,
} from "../core/record.js";
import { ConfigurationError, TransformError } from "../core/errors.js";
import { validate, FieldList } from "../core/validation.js";
import {
  MetricsAccumulator,
  emitStageMetrics,
  type StageMetrics,
} from "../core/metrics.js";

export interface StringCaseProcessorConfig {
  readonly upperFields?: string | readonly string[] | null;
  readonly lowerFields?: string | readonly string[] | null;
}

/**
 * Validation schema for String Case Processor configuration
 */
export const StringCaseProcessorConfigSchema = Schema.Struct({
  upperFields: Schema.optional(Schema.NullOr(FieldList)),
  lowerFields: Schema.optional(Schema.NullOr(FieldList)),
});

/**
 * Parsed configuration, built once and never re-parsed per record
 */
export interface StringCaseConfig {
  readonly upperFields: ReadonlySet<string>;
  readonly lowerFields: ReadonlySet<string>;
}

export interface CaseTransformResult {
  readonly record: StructuredRecord;
  readonly transformedFields: readonly string[];
}

const SPLIT_ON = /\s*,\s*/;

/**
 * Parse a comma separated list of field names into a set.
 * Absent, empty and whitespace-only input yield an empty set.
 */
export const parseFieldList = (
  raw: string | readonly string[] | null | undefined,
): ReadonlySet<string> => {
  const fields = new Set<string>();
  if (raw === null || raw === undefined) {
    return fields;
  }

  const parts = typeof raw === "string" ? [raw] : raw;
  for (const part of parts) {
    for (const name of part.trim().split(SPLIT_ON)) {
      if (name.length > 0) {
        fields.add(name);
      }
    }
  }
  return fields;
};

export const parseStringCaseConfig = (
  config: StringCaseProcessorConfig,
): Effect.Effect<StringCaseConfig, ConfigurationError> =>
  validate(
    StringCaseProcessorConfigSchema,
    config,
    "string case configuration",
  ).pipe(
    Effect.map((valid) => ({
      upperFields: parseFieldList(valid.upperFields),
      lowerFields: parseFieldList(valid.lowerFields),
    })),
    Effect.mapError(
      (error) => new ConfigurationError(error.message, undefined, error),
    ),
  );

const validateFieldIsString = (
  schema: RecordSchema,
  fieldName: string,
): Effect.Effect<void, ConfigurationError> => {
  const field = getField(schema, fieldName);
  if (!field) {
    return Effect.fail(
      new ConfigurationError(
        `Field '${fieldName}' not found in input schema '${schema.name}'`,
        fieldName,
      ),
    );
  }

  const fieldType = nonNullable(field.type);
  if (fieldType !== "string") {
    return Effect.fail(
      new ConfigurationError(
        `Field '${fieldName}' is of illegal type ${formatFieldType(fieldType)}, must be string`,
        fieldName,
      ),
    );
  }

  return Effect.void;
};

/**
 * Check every configured field against a statically known input schema.
 * When the schema is only known at runtime there is nothing to check.
 * The output schema is always the input schema.
 */
export const validateSchema = (
  config: StringCaseConfig,
  schema: Option.Option<RecordSchema>,
): Effect.Effect<Option.Option<RecordSchema>, ConfigurationError> =>
  Option.match(schema, {
    onNone: () => Effect.succeed(Option.none<RecordSchema>()),
    onSome: (inputSchema) =>
      Effect.forEach(
        [...config.upperFields, ...config.lowerFields],
        (fieldName) => validateFieldIsString(inputSchema, fieldName),
        { discard: true },
      ).pipe(Effect.as(Option.some(inputSchema))),
  });

const toText = (
  value: unknown,
  fieldName: string,
): Effect.Effect<string, TransformError> => {
  if (value === null || value === undefined) {
    return Effect.fail(
      new TransformError(`Field '${fieldName}' has no value to convert`, fieldName),
    );
  }

  switch (typeof value) {
    case "string":
      return Effect.succeed(value);
    case "number":
    case "bigint":
    case "boolean":
      return Effect.succeed(String(value));
    default:
      return Effect.fail(
        new TransformError(
          `Field '${fieldName}' holds a value of type ${Array.isArray(value) ? "array" : typeof value} that cannot be converted to text`,
          fieldName,
        ),
      );
  }
};

/**
 * Transform one record, also reporting which fields were changed
 */
export const caseTransform = (
  config: StringCaseConfig,
  record: StructuredRecord,
): Effect.Effect<CaseTransformResult, TransformError> =>
  Effect.gen(function* () {
    const { schema } = record;

    // Only reachable when the schema was not validated up front
    for (const fieldName of [...config.upperFields, ...config.lowerFields]) {
      if (!getField(schema, fieldName)) {
        return yield* Effect.fail(
          new TransformError(
            `Field '${fieldName}' not found in record schema '${schema.name}'`,
            fieldName,
          ),
        );
      }
    }

    // Entries, not assignment, so a field named "__proto__" stays an own key
    const entries: Array<[string, unknown]> = [];
    const transformedFields: string[] = [];

    for (const field of schema.fields) {
      const fieldName = field.name;
      const mode = config.upperFields.has(fieldName)
        ? "upper"
        : config.lowerFields.has(fieldName)
          ? "lower"
          : undefined;

      if (mode === undefined) {
        if (hasValue(record, fieldName)) {
          entries.push([fieldName, record.values[fieldName]]);
        }
        continue;
      }

      const fieldType = nonNullable(field.type);
      if (fieldType !== "string") {
        return yield* Effect.fail(
          new TransformError(
            `Field '${fieldName}' is of illegal type ${formatFieldType(fieldType)}, must be string`,
            fieldName,
          ),
        );
      }

      const text = yield* toText(record.values[fieldName], fieldName);
      entries.push([
        fieldName,
        mode === "upper" ? text.toUpperCase() : text.toLowerCase(),
      ]);
      transformedFields.push(fieldName);
    }

    return {
      record: createRecord(schema, Object.fromEntries(entries)),
      transformedFields,
    };
  });

/**
 * Transform one record: configured fields change case, every other field is
 * copied as is. Upper case wins for a field named in both sets.
 */
export const transformRecord = (
  config: StringCaseConfig,
  record: StructuredRecord,
): Effect.Effect<StructuredRecord, TransformError> =>
  caseTransform(config, record).pipe(Effect.map((result) => result.record));

/**
 * String Case Processor instance with access to its parsed configuration
 */
export interface StringCaseProcessor extends Processor<TransformError> {
  readonly config: StringCaseConfig;
  readonly configure: (
    schema: Option.Option<RecordSchema>,
  ) => Effect.Effect<Option.Option<RecordSchema>, ConfigurationError>;
  readonly getMetrics: () => StageMetrics;
}

/**
 * Create a string case processor
 *
 * @example
 * ```typescript
 * const processor = createStringCaseProcessor({
 *   upperFields: "name, country",
 *   lowerFields: "email",
 * })
 * ```
 */
export const createStringCaseProcessor = (
  config: StringCaseProcessorConfig = {},
): StringCaseProcessor => {
  // Validate configuration synchronously
  const caseConfig = Effect.runSync(
    parseStringCaseConfig(config).pipe(Effect.orDie),
  );

  const overlap = [...caseConfig.upperFields].filter((field) =>
    caseConfig.lowerFields.has(field),
  );
  if (overlap.length > 0) {
    Effect.runSync(
      Effect.logWarning(
        `Fields configured for both upper and lower case, upper case wins: ${overlap.join(", ")}`,
      ),
    );
  }

  const metrics = new MetricsAccumulator("string-case-processor");

  return {
    name: "string-case-processor",
    config: caseConfig,

    configure: (schema) => validateSchema(caseConfig, schema),

    process: (msg: Message): Effect.Effect<Message, TransformError> =>
      caseTransform(caseConfig, msg.record).pipe(
        Effect.tap((result) =>
          Effect.sync(() =>
            metrics.recordTransformed(result.transformedFields.length),
          ),
        ),
        Effect.tapError(() => Effect.sync(() => metrics.recordError())),
        Effect.map((result) => ({
          ...msg,
          record: result.record,
          metadata: {
            ...msg.metadata,
            caseTransformedFields: result.transformedFields,
          },
        })),
      ),

    getMetrics: () => metrics.getMetrics(),

    close: () => emitStageMetrics(metrics.getMetrics()),
  };
};
