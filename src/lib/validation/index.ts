/**
 * Validation wrapper — thin abstraction over Zod that returns
 * Result<T, ValidationError>.
 *
 * Form payloads are shape-checked here before the calculator sees them.
 * Domain code imports `z` from this module rather than from "zod".
 */

import { z } from "zod";
import { ErrorKind, KellyError } from "../../shared/errors.js";
import { err, ok } from "../../shared/result.js";
import type { Result } from "../../shared/result.js";

export { z };

/** A single validation failure with the path to the invalid field and a message. */
export interface ValidationIssue {
	readonly path: readonly (string | number)[];
	readonly message: string;
}

/** Malformed input payload; carries every Zod issue. */
export class ValidationError extends KellyError {
	readonly issues: readonly ValidationIssue[];

	constructor(message: string, issues: readonly ValidationIssue[]) {
		super(message, "VALIDATION_FAILED", ErrorKind.InvalidInput, {
			fields: issues.map((i) => i.path.join(".")),
		});
		this.name = "ValidationError";
		this.issues = issues;
	}
}

/** Validate data against a Zod schema, returning a Result instead of throwing. */
export function validate<T>(schema: z.ZodType<T>, data: unknown): Result<T, ValidationError> {
	const result = schema.safeParse(data);
	if (result.success) {
		return ok(result.data);
	}
	const issues: ValidationIssue[] = result.error.issues.map((i) => ({
		path: i.path.filter((p): p is string | number => typeof p !== "symbol"),
		message: i.message,
	}));
	const fields = issues.map((i) => i.path.join(".")).join(", ");
	return err(new ValidationError(`Malformed fields: ${fields}`, issues));
}
