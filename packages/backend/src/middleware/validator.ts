import type { ZodError, ZodTypeAny, z } from "zod";
import { InvalidArgumentError } from "../errors.js";

export function formatIssues(error: ZodError): Array<{ path: string; message: string }> {
  return error.issues.map((issue) => ({
    path: issue.path.join("."),
    message: issue.message
  }));
}

/**
 * Parses request input against a schema. Failures surface as
 * InvalidArgumentError so the error middleware renders a 400.
 */
export function parseWith<S extends ZodTypeAny>(
  schema: S,
  input: unknown,
  message = "Validation failed"
): z.output<S> {
  const result = schema.safeParse(input);
  if (!result.success) {
    const details = formatIssues(result.error);
    const first = details[0];
    const summary = first
      ? `${message}: ${first.path ? `${first.path}: ` : ""}${first.message}`
      : message;
    throw new InvalidArgumentError(summary, details);
  }

  return result.data;
}
