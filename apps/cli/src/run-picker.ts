/**
 * Wires one pick together: session, stdin pump, and the ink UI.
 */

import type { Readable } from "stream"
import type tty from "tty"
import { createElement } from "react"

import { type IPickerLogger, NullLogger, PickerSession } from "@linepick/core"
import type { PickerConfig, PickerOutcome } from "@linepick/types"

import { StreamSource } from "./host/stream-source.js"
import { createPickerStore, createStoreQueryAccessor } from "./ui/store.js"

export interface RunPickerOptions {
	config: PickerConfig
	/** Item source, usually process.stdin */
	input: Readable
	/** Key source, usually the controlling terminal */
	keys: tty.ReadStream
	/** Where the UI is drawn, usually process.stderr */
	screen: NodeJS.WriteStream
	multi: boolean
	maxVisible: number
	prompt: string
	logger?: IPickerLogger
}

export async function runPicker(options: RunPickerOptions): Promise<PickerOutcome> {
	const logger = options.logger ?? new NullLogger()
	const store = createPickerStore()
	const session = new PickerSession({ config: options.config, queries: createStoreQueryAccessor(store), logger })
	const source = new StreamSource(options.input, session, { batchSize: options.config.batchSize, logger })

	// Input may still be arriving when the user decides.
	session.once("outcome", () => source.stop())

	const { render } = await import("ink")
	const { App } = await import("./ui/App.js")

	const app = render(
		createElement(App, {
			session,
			store,
			multi: options.multi,
			maxVisible: options.maxVisible,
			prompt: options.prompt,
		}),
		{
			stdin: options.keys,
			stdout: options.screen,
			exitOnCtrlC: false, // Ctrl+C cancels through the keymap
		},
	)

	const reading = source.start()

	try {
		const outcome = await session.waitForOutcome()
		await reading
		return outcome
	} finally {
		app.unmount()
		app.cleanup()
		session.dispose()
	}
}
