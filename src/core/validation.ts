import { z } from "zod";
import { ValidationError } from "./errors.ts";

const id = z.number().int().positive().safe();

export const addAssigneeSchema = z.object({
	workItemId: id,
	principalId: id,
});

export const removeAssigneeSchema = addAssigneeSchema;

export const listAssigneesSchema = z.object({
	workItemId: id,
	callerId: id,
	search: z.string().optional(),
	page: z.number().int().optional(),
	perPage: z.number().int().nonnegative().optional(),
});

export const replaceAssigneesSchema = z.object({
	workItemId: id,
	principalIds: z.array(id),
});

export const listAssigneesForWorkItemsSchema = z.object({
	workItemIds: z.array(id),
});

export function parseRequest<T>(schema: z.ZodType<T>, input: unknown): T {
	const result = schema.safeParse(input);
	if (!result.success) {
		throw new ValidationError(
			result.error.issues.map(
				(issue) => `${issue.path.join(".")}: ${issue.message}`,
			),
		);
	}
	return result.data;
}
