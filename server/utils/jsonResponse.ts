import type { z, ZodTypeAny } from "zod";
import { fromZodError } from "zod-validation-error";

export type ParsedModelJson<T> =
  | { success: true; data: T }
  | { success: false; error: string };

export function stripCodeFences(content: string): string {
  return content.replace(/^```(?:json)?\s*\n?/i, "").replace(/\n?```\s*$/i, "").trim();
}

/**
 * Strict parse of a model's JSON answer. Anything that is not valid JSON or
 * does not match the schema is reported as a failure, never thrown.
 */
export function parseModelJson<S extends ZodTypeAny>(
  content: string,
  schema: S,
): ParsedModelJson<z.infer<S>> {
  const jsonStr = stripCodeFences(content);
  if (!jsonStr) {
    return { success: false, error: "empty response" };
  }

  let raw: unknown;
  try {
    raw = JSON.parse(jsonStr);
  } catch (error) {
    return { success: false, error: `invalid JSON: ${error instanceof Error ? error.message : String(error)}` };
  }

  const result = schema.safeParse(raw);
  if (!result.success) {
    return { success: false, error: fromZodError(result.error).message };
  }
  return { success: true, data: result.data };
}
