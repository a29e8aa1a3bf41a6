import { Result, err, ok } from 'neverthrow';
import { z } from 'zod/v4';
import { TemplateErrors, type TemplateError } from './errors.js';

/**
 * Device group as listed in a template. Fields beyond `id` and
 * `displayName` (conditions, etc.) are passed through to the store untouched.
 */
export const GroupSchema = z.looseObject({
	id: z.string().min(1),
	displayName: z.string(),
});

/**
 * Alert rule as listed in a template. `groupId` must name one of the
 * template's groups (checked by {@link validateTemplate}, not the schema).
 */
export const RuleSchema = z.looseObject({
	id: z.string().min(1),
	description: z.string(),
	groupId: z.string(),
});

/** Simulation payload, opaque apart from its optional id. */
export const SimulationSchema = z.looseObject({
	id: z.string().min(1).optional(),
});

export const TemplateSchema = z.object({
	groups: z
		.array(GroupSchema)
		.nullish()
		.transform((items) => items ?? []),
	rules: z
		.array(RuleSchema)
		.nullish()
		.transform((items) => items ?? []),
	simulations: z
		.array(SimulationSchema)
		.nullish()
		.transform((items) => items ?? []),
});

export type Group = z.infer<typeof GroupSchema>;
export type Rule = z.infer<typeof RuleSchema>;
export type Simulation = z.infer<typeof SimulationSchema>;
export type Template = z.infer<typeof TemplateSchema>;

/**
 * Data-quality findings. None of these stop a seed.
 */
export type TemplateWarning =
	| { type: 'duplicate_group_ids'; ids: string[] }
	| { type: 'duplicate_rule_ids'; ids: string[] }
	| { type: 'dangling_group_reference'; rules: Array<{ id: string; groupId: string }> };

const parseJson = Result.fromThrowable(
	(content: string): unknown => JSON.parse(content),
	(error) => error,
);

/**
 * Parse template file content. Nothing is returned unless the whole
 * document is valid.
 */
export function parseTemplate(templateName: string, content: string): Result<Template, TemplateError> {
	return parseJson(content)
		.mapErr((cause) => TemplateErrors.invalidInput(templateName, 'Failed to parse template', cause))
		.andThen((raw) => {
			const parsed = TemplateSchema.safeParse(raw);
			if (!parsed.success) {
				return err(
					TemplateErrors.invalidInput(
						templateName,
						'Failed to parse template',
						new Error(z.prettifyError(parsed.error)),
					),
				);
			}
			return ok(parsed.data);
		});
}

/**
 * Ids that occur more than once, each reported once in first-seen order.
 */
function findDuplicates(ids: readonly string[]): string[] {
	const seen = new Set<string>();
	const duplicates = new Set<string>();
	for (const id of ids) {
		if (seen.has(id)) {
			duplicates.add(id);
		}
		seen.add(id);
	}
	return [...duplicates];
}

/**
 * Check group/rule consistency.
 */
export function validateTemplate(template: Template): TemplateWarning[] {
	const warnings: TemplateWarning[] = [];

	const duplicateGroups = findDuplicates(template.groups.map((g) => g.id));
	if (duplicateGroups.length > 0) {
		warnings.push({ type: 'duplicate_group_ids', ids: duplicateGroups });
	}

	const duplicateRules = findDuplicates(template.rules.map((r) => r.id));
	if (duplicateRules.length > 0) {
		warnings.push({ type: 'duplicate_rule_ids', ids: duplicateRules });
	}

	const groupIds = new Set(template.groups.map((g) => g.id));
	const dangling = template.rules
		.filter((r) => !groupIds.has(r.groupId))
		.map((r) => ({ id: r.id, groupId: r.groupId }));
	if (dangling.length > 0) {
		warnings.push({ type: 'dangling_group_reference', rules: dangling });
	}

	return warnings;
}
