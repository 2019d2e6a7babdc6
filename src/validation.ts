// Shared zod helpers: issue formatting and argument parsing that fails with ValidationError.

import type { z } from "zod";
import { ValidationError } from "./errors.js";

export function formatZodIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const location = issue.path.length > 0 ? issue.path.join(".") : "arguments";
    return `${location}: ${issue.message}`;
  });
}

export function parseArguments<S extends z.ZodTypeAny>(
  schema: S,
  input: unknown,
  label: string,
): z.output<S> {
  const result = schema.safeParse(input ?? {});
  if (!result.success) {
    const issues = formatZodIssues(result.error);
    throw new ValidationError(`Invalid arguments for ${label}: ${issues.join("; ")}`, issues);
  }
  return result.data;
}
