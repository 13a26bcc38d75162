import { z } from "zod";

export type PowerCalculationErrorKind = "invalid_input" | "parameter_range" | "sizing_table";

export interface PowerCalculationIssue {
  path: string;
  message: string;
}

/**
 * Thrown by the calculation stages and the parameter constructors. Every
 * failure is deterministic for its inputs, so callers should report it rather
 * than retry.
 */
export class PowerCalculationError extends Error {
  readonly kind: PowerCalculationErrorKind;
  readonly issues: PowerCalculationIssue[];

  constructor(kind: PowerCalculationErrorKind, message: string, issues: PowerCalculationIssue[] = []) {
    super(message);
    this.name = "PowerCalculationError";
    this.kind = kind;
    this.issues = issues;
  }
}

export function issuesFromZod(error: z.ZodError): PowerCalculationIssue[] {
  return error.errors.map((issue) => ({
    path: issue.path.join("."),
    message: issue.message,
  }));
}

/**
 * Parses a record against its schema, converting zod failures into a
 * PowerCalculationError of the given kind.
 */
export function parseOrThrow<S extends z.ZodTypeAny>(
  schema: S,
  input: unknown,
  kind: PowerCalculationErrorKind,
  label: string,
): z.output<S> {
  const parsed = schema.safeParse(input);
  if (!parsed.success) {
    const issues = issuesFromZod(parsed.error);
    const detail = issues.map((i) => `${i.path || "(root)"}: ${i.message}`).join("; ");
    throw new PowerCalculationError(kind, `Invalid ${label}: ${detail}`, issues);
  }
  return parsed.data;
}
