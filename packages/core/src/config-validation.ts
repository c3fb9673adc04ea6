import type { ZodError, ZodTypeAny, output } from "zod";

/**
 * Raised when operator-supplied configuration fails schema validation.
 */
export class ConfigValidationError extends Error {
  constructor(
    message: string,
    public readonly issues: string[]
  ) {
    super(message);
    this.name = "ConfigValidationError";
  }
}

export function formatZodIssues(error: ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.length > 0 ? issue.path.join(".") : "(root)";
    return `${path}: ${issue.message}`;
  });
}

export function parseConfig<Schema extends ZodTypeAny>(
  schema: Schema,
  input: unknown,
  label: string
): output<Schema> {
  const result = schema.safeParse(input);
  if (!result.success) {
    const issues = formatZodIssues(result.error);
    throw new ConfigValidationError(`Invalid ${label}: ${issues.join("; ")}`, issues);
  }
  return result.data;
}
