import { z } from "zod";

/** Record shapes handed to storage. Key order is the column order. */
export type RecordSchema = z.AnyZodObject;

/** Any schema a model result is validated against, typed by what it yields. */
export type StructuredSchema<T> = z.ZodType<T, z.ZodTypeDef, unknown>;

/** Wraps an item schema in the `{ data: [...] }` envelope the extractor asks the model for. */
export function responseFormat<E>(item: StructuredSchema<E>) {
  return z
    .object({
      data: z.array(item).describe("Every matching entry found in the letter, in order of appearance."),
    })
    .strict();
}

export function columnsOf(schema: RecordSchema): string[] {
  return Object.keys(schema.shape);
}

function unwrap(type: z.ZodTypeAny): z.ZodTypeAny {
  if (type instanceof z.ZodOptional || type instanceof z.ZodNullable) return unwrap(type.unwrap());
  if (type instanceof z.ZodDefault) return unwrap(type.removeDefault());
  return type;
}

function typeName(type: z.ZodTypeAny): string {
  const inner = unwrap(type);
  if (inner instanceof z.ZodString) return "string";
  if (inner instanceof z.ZodNumber) return inner.isInt ? "integer" : "number";
  if (inner instanceof z.ZodBoolean) return "boolean";
  if (inner instanceof z.ZodArray) return `array of ${typeName(inner.element)}`;
  if (inner instanceof z.ZodObject) return "object";
  return "value";
}

function describeFields(schema: RecordSchema, indent: string): string[] {
  const shape: z.ZodRawShape = schema.shape;
  return Object.entries(shape).flatMap(([name, type]) => {
    const description = type.description ? `: ${type.description}` : "";
    const line = `${indent}- "${name}" (${typeName(type)})${description}`;
    const inner = unwrap(type);
    const element = inner instanceof z.ZodArray ? unwrap(inner.element) : inner;
    if (element instanceof z.ZodObject) {
      return [line, ...describeFields(element, `${indent}  `)];
    }
    return [line];
  });
}

/**
 * Renders the schema as the JSON contract appended to a system prompt.
 */
export function describeSchema(schema: z.ZodTypeAny): string {
  const inner = unwrap(schema);
  if (!(inner instanceof z.ZodObject)) {
    return `Return strict JSON: a single ${typeName(inner)}. Do not include markdown or commentary.`;
  }
  return [
    "Return strict JSON: one object with exactly these fields, in this order, and no others:",
    ...describeFields(inner, ""),
    "Use the declared types. Do not include markdown or commentary.",
  ].join("\n");
}
