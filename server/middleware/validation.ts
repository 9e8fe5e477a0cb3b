/**
 * Request Validation Middleware
 * Request body and path parameter validation using Zod schemas
 */

import { z } from "zod";
import { AppValidationError } from "@shared/errors";

/**
 * Validate a value against a Zod schema
 *
 * @throws {AppValidationError} listing every failing path
 */
export function validateRequest<S extends z.ZodTypeAny>(schema: S, body: unknown): z.infer<S> {
  const result = schema.safeParse(body);
  if (!result.success) {
    const issues = result.error.errors.map((err) => ({
      path: err.path.join("."),
      message: err.message,
    }));
    const errorMessage = issues
      .map((issue) => (issue.path ? `${issue.path}: ${issue.message}` : issue.message))
      .join(", ");
    throw new AppValidationError(
      `Validation failed: ${errorMessage}`,
      issues[0]?.path || undefined,
      ["schema"],
      { issues }
    );
  }
  return result.data;
}

const idParamSchema = z.coerce.number().int().positive();

/**
 * Parse a numeric path parameter such as `:id` or `:jobId`
 *
 * @throws {AppValidationError} when the value is not a positive integer
 */
export function parseIdParam(value: string | undefined, name: string): number {
  const result = idParamSchema.safeParse(value);
  if (!result.success) {
    throw AppValidationError.invalidFormat(name, "positive integer");
  }
  return result.data;
}
