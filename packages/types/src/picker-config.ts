/**
 * Picker configuration schema.
 *
 * The engine consumes an already-validated PickerConfig; hosts build one from
 * their own flags or files with parsePickerConfig().
 */

import { z } from "zod"

export const DEFAULT_DEBOUNCE_MS = 200
export const DEFAULT_BATCH_SIZE = 250
// Same as the classic stdio BUFSIZ.
export const DEFAULT_BUFFER_CAPACITY = 8192

export const pickerConfigSchema = z.object({
	/** Splits raw input into items */
	inputSeparator: z.string().min(1).default("\n"),
	/** Joins submitted items in the query; null disables multi-item queries */
	outputSeparator: z.string().min(1).nullable().default(null),
	/** Quiet period before a refilter pass runs */
	debounceMs: z.number().int().nonnegative().default(DEFAULT_DEBOUNCE_MS),
	/** Maximum characters handed to a single feed() call */
	batchSize: z.number().int().positive().default(DEFAULT_BATCH_SIZE),
	/** Longest item, in characters, the ingestion buffer accepts */
	ingestionBufferCapacity: z.number().int().positive().default(DEFAULT_BUFFER_CAPACITY),
	/** Put the first item into an empty query, fully selected */
	seedFirstItem: z.boolean().default(false),
	/** Present items in natural order instead of arrival order */
	sortItems: z.boolean().default(false),
})

export type PickerConfig = z.infer<typeof pickerConfigSchema>
export type PickerConfigInput = z.input<typeof pickerConfigSchema>

export class PickerConfigError extends Error {
	readonly issues: z.ZodIssue[]

	constructor(issues: z.ZodIssue[]) {
		super(`Invalid picker configuration:\n${formatConfigIssues(issues)}`)
		this.name = "PickerConfigError"
		this.issues = issues
	}
}

export function formatConfigIssues(issues: z.ZodIssue[]): string {
	return issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`).join("\n")
}

/**
 * Validate raw input and fill in defaults.
 *
 * @throws {PickerConfigError} When any field is invalid
 */
export function parsePickerConfig(input: PickerConfigInput = {}): PickerConfig {
	const result = pickerConfigSchema.safeParse(input)

	if (!result.success) {
		throw new PickerConfigError(result.error.issues)
	}

	return result.data
}
