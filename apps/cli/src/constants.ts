import type { PickerOutcome } from "@linepick/types"

/**
 * Process exit codes. The engine only reports the outcome; the CLI owns the
 * mapping.
 */
export const EXIT_SUBMITTED = 0
export const EXIT_CANCELLED = 1
export const EXIT_FATAL = 2
export const EXIT_USAGE = 2

export const DEFAULT_MAX_VISIBLE = 10
export const DEFAULT_PROMPT = "> "

export function exitCodeFor(outcome: PickerOutcome): number {
	switch (outcome.kind) {
		case "submitted":
			return EXIT_SUBMITTED
		case "cancelled":
			return EXIT_CANCELLED
		case "fatal-ingestion-error":
			return EXIT_FATAL
	}
}
