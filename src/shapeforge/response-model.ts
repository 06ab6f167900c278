import { z } from "zod";
import { zodToJsonSchema } from "zod-to-json-schema";

import type { ResponseModelKind } from "./types.js";

export const DEFAULT_VALUE_DESCRIPTION =
  "JSON schema the response should adhere to.";

// Validates the wrapper's shape; the value itself is checked by the target schema.
const ValueEnvelope = z.object({ value: z.unknown() });

// Refinements and transforms keep the shape of the schema they wrap.
function isObjectSchema(schema: z.ZodTypeAny): boolean {
  let inner = schema;
  while (inner instanceof z.ZodEffects) {
    inner = inner.innerType();
  }
  return inner instanceof z.ZodObject;
}

/**
 * The validatable form of a caller's response schema.
 *
 * Object schemas, refined or transformed ones included, are used as they are.
 * Any other schema (a primitive, an array,
 * a union, ...) is wrapped in a one-field object whose `value` field holds it,
 * since the model is always asked for a JSON object. Parsing a wrapped schema
 * returns the `value` field rather than the wrapper.
 */
export class ResponseModel<T> {
  readonly kind: ResponseModelKind;
  /** The schema candidates are validated against and described to the model. */
  readonly schema: z.ZodTypeAny;
  /** JSON Schema text of `schema`, rendered into prompts. */
  readonly jsonSchema: string;

  constructor(readonly target: z.ZodType<T, z.ZodTypeDef, unknown>) {
    if (isObjectSchema(target)) {
      this.kind = "structured";
      this.schema = target;
    } else {
      this.kind = "value";
      this.schema = z.object({
        value: target.description
          ? target
          : target.describe(DEFAULT_VALUE_DESCRIPTION),
      });
    }

    this.jsonSchema = JSON.stringify(zodToJsonSchema(this.schema));
  }

  /**
   * Validate parsed JSON against the adapted schema and unwrap the result.
   */
  safeParse(data: unknown): z.SafeParseReturnType<unknown, T> {
    if (this.kind === "structured") {
      return this.target.safeParse(data);
    }

    const envelope = ValueEnvelope.safeParse(data);
    if (!envelope.success) {
      return {
        success: false,
        error: new z.ZodError<unknown>(envelope.error.issues),
      };
    }
    return this.target.safeParse(envelope.data.value, { path: ["value"] });
  }
}
