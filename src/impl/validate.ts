import type {z} from "zod";
import {ValidationError} from "./errors.js";

/**
 * Validate data against a zod schema.
 *
 * Issues are grouped by field path (["references", "table"] ->
 * "references.table"); root-level issues go under "_root".
 *
 * @throws ValidationError
 */
export function validate<S extends z.ZodTypeAny>(
	schema: S,
	data: unknown,
	label: string,
): z.output<S> {
	const result = schema.safeParse(data);
	if (result.success) {
		return result.data;
	}

	const fieldErrors: Record<string, string[]> = {};
	for (const issue of result.error.issues) {
		const path = issue.path.length > 0 ? issue.path.map(String).join(".") : "_root";
		(fieldErrors[path] ??= []).push(issue.message);
	}
	const summary = Object.entries(fieldErrors)
		.map(([path, messages]) => `${path}: ${messages.join("; ")}`)
		.join(", ");
	throw new ValidationError(`Invalid ${label} (${summary})`, fieldErrors, {
		cause: result.error,
	});
}
