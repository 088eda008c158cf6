/**
 * Picker Session
 *
 * One interactive pick, from the first input byte to the outcome. Composes
 * the item store, ingestion pipeline, filter, completion and selection
 * merger over the host's collaborators.
 *
 * State transitions:
 *   running -> submitted (on accept)
 *   running -> cancelled (on cancel)
 *   running -> failed    (on ingestion overflow)
 *
 * Terminal states are final. The session is single-threaded: operations must
 * not be called from inside another operation (for example from a "change"
 * listener that is still running synchronously inside one); doing so is a
 * contract violation.
 *
 * Events:
 *   "change"  - items or query changed
 *   "outcome" - emitted once with the PickerOutcome
 */

import { EventEmitter } from "events"

import {
	type ItemView,
	type PickerConfig,
	type PickerOutcome,
	type PickerOutcomeKind,
	type PickerStatus,
	type QueryState,
	hasSelection,
} from "@linepick/types"

import { CompletionEngine } from "./completion-engine.js"
import { createEngineState } from "./engine-state.js"
import { ContractViolationError, type IngestionOverflowError, assertContract } from "./errors.js"
import { FilterEngine, type FilterPassResult } from "./filter-engine.js"
import { IngestionPipeline, type IngestionState } from "./ingestion-pipeline.js"
import type { IPickerLogger, IQueryAccessor, IScheduler } from "./interfaces.js"
import { MemoryQueryAccessor, NullLogger } from "./interfaces.js"
import { ItemStore } from "./item-store.js"
import { sortNaturally } from "./natural-order.js"
import { assertValidQuery, caretAt, deriveFilterText, selectTail } from "./query.js"
import { SelectionMerger } from "./selection-merger.js"

// =============================================================================
// Types
// =============================================================================

export interface PickerSessionOptions {
	config: PickerConfig
	/** Where the query lives (optional, defaults to an in-memory query) */
	queries?: IQueryAccessor
	/** Timer source for the debounce (optional, defaults to setTimeout) */
	scheduler?: IScheduler
	/** Logger instance (optional, defaults to NullLogger) */
	logger?: IPickerLogger
}

export interface ToggleOptions {
	/** Schedule a refilter after merging (default: true) */
	refilter?: boolean
}

type EditKind = "insert" | "delete" | "navigate"

const STATUS_BY_OUTCOME: Record<PickerOutcomeKind, PickerStatus> = {
	submitted: "submitted",
	cancelled: "cancelled",
	"fatal-ingestion-error": "failed",
}

// =============================================================================
// PickerSession Class
// =============================================================================

export class PickerSession extends EventEmitter {
	readonly config: PickerConfig

	private readonly store = new ItemStore()
	private readonly state = createEngineState()
	private readonly queries: IQueryAccessor
	private readonly logger: IPickerLogger
	private readonly pipeline: IngestionPipeline
	private readonly filter: FilterEngine
	private readonly completion: CompletionEngine
	private readonly merger: SelectionMerger

	private status: PickerStatus = "running"
	private outcome: PickerOutcome | null = null
	private outcomeEmitted = false
	private disposed = false
	private busy = false
	private dirty = false
	/** Set by the first user edit; stops the first item from seeding the query */
	private touched = false

	constructor(options: PickerSessionOptions) {
		super()

		const { config } = options
		this.config = config
		this.queries = options.queries ?? new MemoryQueryAccessor()
		this.logger = options.logger ?? new NullLogger()

		const { outputSeparator } = config
		const logger = this.logger

		this.filter = new FilterEngine(this.store, this.queries, this.state, {
			outputSeparator,
			debounceMs: config.debounceMs,
			scheduler: options.scheduler,
			logger,
			onPass: (result) => this.afterPass(result),
		})
		this.completion = new CompletionEngine(this.store, this.queries, this.state, { outputSeparator, logger })
		this.merger = new SelectionMerger(this.queries, { outputSeparator, logger })
		this.pipeline = new IngestionPipeline(
			this.store,
			{
				filterText: () => this.filter.currentFilterText(),
				onItem: (item) => this.afterIngest(item),
				onFatal: (error) => this.fail(error),
			},
			{ inputSeparator: config.inputSeparator, capacity: config.ingestionBufferCapacity, logger },
		)
	}

	// ===========================================================================
	// Ingestion
	// ===========================================================================

	/**
	 * Hand one input slice to the pipeline. Hosts keep slices within
	 * `config.batchSize` and return to their event loop between calls.
	 */
	feed(chunk: string | Uint8Array): void {
		this.exclusive("feed", () => {
			this.assertRunning("feed")
			this.pipeline.feed(chunk)
		})
	}

	/**
	 * Signal end-of-stream. Ignored once the session has terminated, since
	 * input may keep arriving after the user has already decided.
	 */
	endOfStream(): void {
		this.exclusive("endOfStream", () => {
			if (this.status !== "running" || this.disposed) {
				return
			}

			this.pipeline.end()
			this.dirty = true
		})
	}

	isInputComplete(): boolean {
		return this.pipeline.getState() === "ended"
	}

	ingestionState(): IngestionState {
		return this.pipeline.getState()
	}

	// ===========================================================================
	// Editing
	// ===========================================================================

	/**
	 * Insert text at the caret, replacing the selection if there is one.
	 */
	insertText(text: string): void {
		this.edit("insertText", "insert", (query) => {
			if (text.length === 0) {
				return null
			}

			const [start, end] = selectionRange(query)
			return caretAt(query.text.slice(0, start) + text + query.text.slice(end), start + text.length)
		})
	}

	/**
	 * Delete the selection, or the character before the caret.
	 */
	deleteBackward(): void {
		this.edit("deleteBackward", "delete", (query) => {
			const [start, end] = selectionRange(query)

			if (start !== end) {
				return caretAt(query.text.slice(0, start) + query.text.slice(end), start)
			}

			if (start === 0) {
				return null
			}

			const from = previousBoundary(query.text, start)
			return caretAt(query.text.slice(0, from) + query.text.slice(start), from)
		})
	}

	/**
	 * Delete the selection, or the character after the caret.
	 */
	deleteForward(): void {
		this.edit("deleteForward", "delete", (query) => {
			const [start, end] = selectionRange(query)

			if (start !== end) {
				return caretAt(query.text.slice(0, start) + query.text.slice(end), start)
			}

			if (start === query.text.length) {
				return null
			}

			return caretAt(query.text.slice(0, start) + query.text.slice(nextBoundary(query.text, start)), start)
		})
	}

	/**
	 * Move the caret by a number of characters, collapsing any selection.
	 */
	moveCursor(offset: number): void {
		this.edit("moveCursor", "navigate", (query) => {
			let index = query.cursor

			for (let step = 0; step < Math.abs(offset); step++) {
				index = offset < 0 ? previousBoundary(query.text, index) : nextBoundary(query.text, index)
			}

			return caretAt(query.text, index)
		})
	}

	moveCursorTo(index: number): void {
		this.edit("moveCursorTo", "navigate", (query) => caretAt(query.text, index))
	}

	/**
	 * Select `text.slice(start, end)` with the caret at `end`.
	 */
	setSelection(start: number, end: number): void {
		this.edit("setSelection", "navigate", (query) => ({
			text: query.text,
			cursor: end,
			selectionStart: Math.min(start, end),
			selectionEnd: Math.max(start, end),
		}))
	}

	selectAll(): void {
		this.edit("selectAll", "navigate", (query) => selectTail(query.text, 0))
	}

	clear(): void {
		this.edit("clear", "delete", (query) => (query.text.length === 0 ? null : caretAt("", 0)))
	}

	/**
	 * Merge the host's selected item texts into the query.
	 */
	toggleItems(selectedTexts: readonly string[], options: ToggleOptions = {}): void {
		this.exclusive("toggleItems", () => {
			this.assertRunning("toggleItems")

			const next = this.merger.onItemsToggled(selectedTexts)
			this.touched = true

			if (hasSelection(next)) {
				this.completion.disable()
			}

			if (options.refilter ?? true) {
				this.filter.scheduleDebounced()
			}

			this.dirty = true
		})
	}

	// ===========================================================================
	// Outcome
	// ===========================================================================

	/**
	 * Submit the query text as it stands, separators included.
	 */
	accept(): PickerOutcome {
		return this.exclusive("accept", () => {
			this.assertRunning("accept")
			return this.finish({ kind: "submitted", text: this.queries.getQuery().text })
		})
	}

	cancel(): PickerOutcome {
		return this.exclusive("cancel", () => {
			this.assertRunning("cancel")
			return this.finish({ kind: "cancelled" })
		})
	}

	getStatus(): PickerStatus {
		return this.status
	}

	getOutcome(): PickerOutcome | null {
		return this.outcome
	}

	/**
	 * Resolve with the outcome once the session terminates.
	 */
	waitForOutcome(): Promise<PickerOutcome> {
		const { outcome } = this
		if (outcome) {
			return Promise.resolve(outcome)
		}

		return new Promise((resolve) => {
			this.once("outcome", resolve)
		})
	}

	/**
	 * Cancel the pending filter pass and stop emitting events. Idempotent.
	 */
	dispose(): void {
		if (this.disposed) {
			return
		}

		this.disposed = true
		this.filter.cancel()
		this.store.close()
		this.removeAllListeners()
	}

	// ===========================================================================
	// Views
	// ===========================================================================

	getQuery(): QueryState {
		return this.queries.getQuery()
	}

	getFilterText(): string {
		return deriveFilterText(this.queries.getQuery(), this.config.outputSeparator)
	}

	/**
	 * Visible items in presentation order.
	 */
	visibleItems(): ItemView[] {
		const items = this.store.visibleItems()
		return this.config.sortItems ? sortNaturally(items) : items
	}

	getItem(id: number): ItemView {
		return this.store.get(id)
	}

	itemCount(): number {
		return this.store.size
	}

	visibleCount(): number {
		return this.store.visibleSize
	}

	isCompletionEnabled(): boolean {
		return this.completion.isEnabled()
	}

	hasPendingFilter(): boolean {
		return this.filter.hasPending()
	}

	supportsMultiSelect(): boolean {
		return this.merger.supportsMultiSelect()
	}

	/**
	 * Run the pending filter pass now, if there is one.
	 */
	flush(): FilterPassResult | null {
		return this.exclusive("flush", () => (this.status === "running" ? this.filter.flush() : null))
	}

	// ===========================================================================
	// Private Methods
	// ===========================================================================

	private edit(operation: string, kind: EditKind, transform: (query: QueryState) => QueryState | null): void {
		this.exclusive(operation, () => {
			this.assertRunning(operation)

			const next = transform(this.queries.getQuery())
			if (next === null) {
				return
			}

			assertValidQuery(next)
			this.queries.setQuery(next)

			if (kind === "insert") {
				this.completion.enable()
			} else if (kind === "delete") {
				this.completion.disable()
			}

			if (hasSelection(next)) {
				this.completion.disable()
			}

			if (kind !== "navigate") {
				this.touched = true
			}

			// Never filter synchronously on an edit.
			this.filter.scheduleDebounced()
			this.dirty = true
		})
	}

	private afterPass(result: FilterPassResult): void {
		if (this.status !== "running") {
			return
		}

		const completed = this.completion.complete()

		if (result.mode !== "noop" || completed !== null) {
			this.dirty = true
		}

		if (!this.busy) {
			this.notify()
		}
	}

	private afterIngest(item: ItemView): void {
		this.dirty = true

		if (item.position === 0 && this.config.seedFirstItem && !this.touched) {
			if (this.queries.getQuery().text.length === 0) {
				this.queries.setQuery(selectTail(item.text, 0))
				this.completion.disable()
				this.logger.debug("PickerSession", "Seeded query with the first item")
				return
			}
		}

		this.completion.completeAfterIngest(item)
	}

	private fail(error: IngestionOverflowError): void {
		this.finish({ kind: "fatal-ingestion-error", capacity: error.capacity, message: error.message })
	}

	private finish(outcome: PickerOutcome): PickerOutcome {
		this.status = STATUS_BY_OUTCOME[outcome.kind]
		this.outcome = outcome
		this.filter.cancel()
		this.store.close()
		this.dirty = true

		this.logger.info("PickerSession", `Session ${this.status}`, outcome)
		return outcome
	}

	private assertRunning(operation: string): void {
		assertContract(!this.disposed, `Cannot ${operation}: session has been disposed`)
		assertContract(this.status === "running", `Cannot ${operation}: session is already ${this.status}`)
	}

	/**
	 * Run an operation with re-entrance detection, then emit pending events.
	 */
	private exclusive<T>(operation: string, fn: () => T): T {
		if (this.busy) {
			throw new ContractViolationError(`Re-entrant call to ${operation} while another session operation is running`)
		}

		this.busy = true

		try {
			return fn()
		} finally {
			this.busy = false
			this.notify()
		}
	}

	private notify(): void {
		if (this.disposed) {
			return
		}

		if (this.dirty) {
			this.dirty = false
			this.emit("change")
		}

		const { outcome } = this
		if (outcome && !this.outcomeEmitted) {
			this.outcomeEmitted = true
			this.emit("outcome", outcome)
		}
	}
}

// =============================================================================
// Helpers
// =============================================================================

function selectionRange(query: QueryState): [number, number] {
	if (hasSelection(query)) {
		return [Math.min(query.selectionStart, query.selectionEnd), Math.max(query.selectionStart, query.selectionEnd)]
	}

	return [query.cursor, query.cursor]
}

function isLowSurrogate(code: number): boolean {
	return code >= 0xdc00 && code <= 0xdfff
}

function isHighSurrogate(code: number): boolean {
	return code >= 0xd800 && code <= 0xdbff
}

function previousBoundary(text: string, index: number): number {
	if (index <= 0) {
		return 0
	}

	if (index >= 2 && isLowSurrogate(text.charCodeAt(index - 1)) && isHighSurrogate(text.charCodeAt(index - 2))) {
		return index - 2
	}

	return index - 1
}

function nextBoundary(text: string, index: number): number {
	if (index >= text.length) {
		return text.length
	}

	if (isHighSurrogate(text.charCodeAt(index)) && isLowSurrogate(text.charCodeAt(index + 1))) {
		return index + 2
	}

	return index + 1
}
