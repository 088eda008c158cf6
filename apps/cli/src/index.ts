/**
 * linepick - pick lines from standard input
 *
 *   find . -name '*.ts' | linepick
 *   git branch --format='%(refname:short)' | linepick --select-first | xargs git switch
 */

import { Command } from "commander"
import { createRequire } from "module"

import { DebugLogger } from "@linepick/core/debug-log"
import {
	DEFAULT_BATCH_SIZE,
	DEFAULT_BUFFER_CAPACITY,
	DEFAULT_DEBOUNCE_MS,
	type PickerConfig,
	type PickerOutcome,
	PickerConfigError,
} from "@linepick/types"

import { DEFAULT_MAX_VISIBLE, DEFAULT_PROMPT, EXIT_FATAL, EXIT_USAGE, exitCodeFor } from "./constants.js"
import { openTerminalInput } from "./host/terminal.js"
import { type CliOptions, CliUsageError, parseInteger, toPickerConfig } from "./options.js"
import { runPicker } from "./run-picker.js"

// Read version from package.json
const require = createRequire(import.meta.url)
const packageJson: { version: string } = require("../package.json")

const program = new Command()

program
	.name("linepick")
	.description("Pick lines from standard input with incremental filtering and inline completion")
	.version(packageJson.version)

program
	.option("-s, --separator <sep>", "Separator between input items (escapes: \\n \\t \\r \\0 \\\\)", "\\n")
	.option("-o, --output-separator <sep>", "Separator between items picked into the query")
	.option("-m, --multi", "Mark several items with Tab (requires --output-separator)", false)
	.option("--debounce <ms>", "Quiet period before the list is refiltered", parseInteger, DEFAULT_DEBOUNCE_MS)
	.option("--batch-size <bytes>", "Largest input slice read per event-loop turn", parseInteger, DEFAULT_BATCH_SIZE)
	.option("--buffer-capacity <chars>", "Longest item accepted before giving up", parseInteger, DEFAULT_BUFFER_CAPACITY)
	.option("--select-first", "Put the first item into the query, selected", false)
	.option("--sort", "List items in natural order instead of arrival order", false)
	.option("--max-visible <rows>", "Rows of items to show", parseInteger, DEFAULT_MAX_VISIBLE)
	.option("-p, --prompt <text>", "Prompt shown before the query", DEFAULT_PROMPT)
	.option("-d, --debug", "Write a debug log to ~/.linepick/debug.log", false)
	.action(async (options: CliOptions) => {
		const logger = new DebugLogger({ enabled: options.debug || undefined })

		// The log is written through a stream; flush it before leaving.
		const exit = async (code: number): Promise<never> => {
			await logger.close()
			process.exit(code)
		}

		let config: PickerConfig
		try {
			config = toPickerConfig(options)
		} catch (error) {
			if (error instanceof CliUsageError || error instanceof PickerConfigError) {
				console.error(`[linepick] Error: ${error.message}`)
				return exit(EXIT_USAGE)
			}

			throw error
		}

		if (process.stdin.isTTY) {
			console.error("[linepick] Error: items are read from standard input; pipe something in")
			console.error("[linepick] Usage: <command> | linepick [options]")
			return exit(EXIT_USAGE)
		}

		let outcome: PickerOutcome
		try {
			outcome = await runPicker({
				config,
				input: process.stdin,
				keys: openTerminalInput(),
				screen: process.stderr,
				multi: options.multi,
				maxVisible: options.maxVisible,
				prompt: options.prompt,
				logger,
			})
		} catch (error) {
			console.error("[linepick] Error:", error instanceof Error ? error.message : String(error))

			if (options.debug && error instanceof Error) {
				console.error(error.stack)
			}

			return exit(EXIT_FATAL)
		}

		switch (outcome.kind) {
			case "submitted": {
				// Verbatim: no trailing newline is added.
				const { text } = outcome
				await new Promise<void>((resolve) => process.stdout.write(text, () => resolve()))
				break
			}
			case "cancelled":
				break
			case "fatal-ingestion-error":
				console.error(`[linepick] Error: ${outcome.message}`)
				break
		}

		return exit(exitCodeFor(outcome))
	})

await program.parseAsync()
