import { InvalidArgumentError } from "commander"

import { type PickerConfig, parsePickerConfig } from "@linepick/types"

export interface CliOptions {
	separator: string
	outputSeparator?: string
	multi: boolean
	debounce: number
	batchSize: number
	bufferCapacity: number
	selectFirst: boolean
	sort: boolean
	maxVisible: number
	prompt: string
	debug: boolean
}

export class CliUsageError extends Error {
	constructor(message: string) {
		super(message)
		this.name = "CliUsageError"
	}
}

const ESCAPES: Record<string, string> = {
	n: "\n",
	t: "\t",
	r: "\r",
	"0": "\0",
	"\\": "\\",
}

/**
 * Expand the backslash escapes a shell user can type: \n \t \r \0 and \\.
 * Any other backslash is kept as written.
 */
export function unescapeSeparator(value: string): string {
	return value.replace(/\\([ntr0\\])/g, (_match, code: string) => ESCAPES[code] ?? code)
}

/**
 * Commander argument parser for non-negative integer options.
 */
export function parseInteger(value: string): number {
	if (!/^\d+$/.test(value)) {
		throw new InvalidArgumentError("Expected a non-negative integer.")
	}

	return Number.parseInt(value, 10)
}

/**
 * Map parsed flags onto a validated picker configuration.
 *
 * @throws {CliUsageError} When flags contradict each other
 * @throws {PickerConfigError} When a value is out of range
 */
export function toPickerConfig(options: CliOptions): PickerConfig {
	const outputSeparator = options.outputSeparator === undefined ? null : unescapeSeparator(options.outputSeparator)

	if (options.multi && outputSeparator === null) {
		throw new CliUsageError("--multi needs an --output-separator to join the marked items with")
	}

	return parsePickerConfig({
		inputSeparator: unescapeSeparator(options.separator),
		outputSeparator,
		debounceMs: options.debounce,
		batchSize: options.batchSize,
		ingestionBufferCapacity: options.bufferCapacity,
		seedFirstItem: options.selectFirst,
		sortItems: options.sort,
	})
}
