/**
 * Ingestion Pipeline
 *
 * Turns raw input slices into items. The host hands over whatever bytes are
 * ready, at most one batch per call; the pipeline never reads on its own, so
 * every call returns as soon as the slice is split.
 */

import type { ItemView } from "@linepick/types"

import { ContractViolationError, IngestionOverflowError } from "./errors.js"
import type { IPickerLogger } from "./interfaces.js"
import { NullLogger } from "./interfaces.js"
import type { ItemStore } from "./item-store.js"
import { matchesTokens } from "./token-matcher.js"

// =============================================================================
// Types
// =============================================================================

export type IngestionState = "open" | "ended" | "failed"

export interface IngestionPipelineOptions {
	/** Separator between items in the raw input */
	inputSeparator: string
	/** Longest item, in characters, that may accumulate without a separator */
	capacity: number
	/** Logger instance (optional, defaults to NullLogger) */
	logger?: IPickerLogger
}

export interface IngestionHooks {
	/** FilterText that decides the initial visibility of each new item */
	filterText(): string
	/** Called after an item has been appended to the store */
	onItem?(item: ItemView): void
	/** Called once when an item overflows the buffer */
	onFatal?(error: IngestionOverflowError): void
}

// =============================================================================
// IngestionPipeline Class
// =============================================================================

export class IngestionPipeline {
	private readonly separator: string
	private readonly capacity: number
	private readonly logger: IPickerLogger
	private readonly decoder = new TextDecoder("utf-8")

	/** Input received since the last separator */
	private buffer = ""
	/** Offset in `buffer` where the next separator search starts */
	private scanFrom = 0
	private state: IngestionState = "open"
	private failure: IngestionOverflowError | null = null

	constructor(
		private readonly store: ItemStore,
		private readonly hooks: IngestionHooks,
		options: IngestionPipelineOptions,
	) {
		if (options.inputSeparator.length === 0) {
			throw new ContractViolationError("Input separator must not be empty")
		}

		this.separator = options.inputSeparator
		this.capacity = options.capacity
		this.logger = options.logger ?? new NullLogger()
	}

	// ===========================================================================
	// Public API
	// ===========================================================================

	/**
	 * Append a slice of input and split off every complete item.
	 *
	 * @returns Number of items appended by this call
	 * @throws {ContractViolationError} After end-of-stream or a fatal overflow
	 */
	feed(chunk: string | Uint8Array): number {
		if (this.state !== "open") {
			throw new ContractViolationError(`Cannot feed input after ingestion has ${this.state}`)
		}

		const text = typeof chunk === "string" ? chunk : this.decoder.decode(chunk, { stream: true })
		this.buffer += text

		const appended = this.drain()
		this.logger.debug("Ingestion", `Fed ${text.length} chars, appended ${appended} (total ${this.store.size})`)
		return appended
	}

	/**
	 * Signal end-of-stream. A non-empty trailing partial item becomes the
	 * final item. Calling it again, or after a failure, does nothing.
	 *
	 * @returns Number of items appended by this call
	 */
	end(): number {
		if (this.state !== "open") {
			return 0
		}

		this.buffer += this.decoder.decode()
		let appended = this.drain()

		if (this.state !== "open") {
			return appended
		}

		const rest = this.buffer

		// Without the rest of its separator, a held-back prefix counts as text.
		if (rest.length > this.capacity) {
			this.fail(rest.length)
			return appended
		}

		this.buffer = ""
		this.scanFrom = 0
		this.state = "ended"

		if (rest.length > 0) {
			this.append(rest)
			appended++
		}

		this.logger.info("Ingestion", `End of input, ${this.store.size} items`)
		return appended
	}

	getState(): IngestionState {
		return this.state
	}

	getFailure(): IngestionOverflowError | null {
		return this.failure
	}

	/**
	 * Characters buffered for the item that has not seen its separator yet.
	 */
	pendingLength(): number {
		return this.buffer.length
	}

	// ===========================================================================
	// Private Methods
	// ===========================================================================

	private drain(): number {
		const { separator, capacity } = this
		let appended = 0
		let start = 0
		let index = this.buffer.indexOf(separator, this.scanFrom)

		while (index !== -1) {
			const text = this.buffer.slice(start, index)

			if (text.length > capacity) {
				this.fail(text.length)
				return appended
			}

			if (text.length > 0) {
				this.append(text)
				appended++
			}

			start = index + separator.length
			index = this.buffer.indexOf(separator, start)
		}

		this.buffer = this.buffer.slice(start)

		// The start of a separator at the end of the buffer is not item text yet.
		const pending = this.buffer.length - partialSeparatorLength(this.buffer, separator)

		if (pending > capacity) {
			this.fail(pending)
			return appended
		}

		// A separator may straddle two slices.
		this.scanFrom = Math.max(0, this.buffer.length - separator.length + 1)
		return appended
	}

	private append(text: string): void {
		const visible = matchesTokens(text, this.hooks.filterText())
		const id = this.store.append(text, visible)
		this.hooks.onItem?.(this.store.get(id))
	}

	private fail(received: number): void {
		const error = new IngestionOverflowError(this.capacity, received)

		this.state = "failed"
		this.failure = error
		this.buffer = ""
		this.scanFrom = 0

		this.logger.error("Ingestion", error.message, { capacity: this.capacity, received })
		this.hooks.onFatal?.(error)
	}
}

/**
 * Length of the longest proper prefix of the separator that ends the buffer.
 */
function partialSeparatorLength(buffer: string, separator: string): number {
	for (let length = Math.min(separator.length - 1, buffer.length); length > 0; length--) {
		if (buffer.endsWith(separator.slice(0, length))) {
			return length
		}
	}

	return 0
}
