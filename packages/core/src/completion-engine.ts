/**
 * Completion Engine
 *
 * Inline completion: when the caret sits at the end of the query and the
 * first visible item (in store order) extends the FilterText, append the
 * rest of that item and select it. Typing replaces the suggestion, accepting
 * keeps it.
 */

import { type ItemView, type QueryState, hasSelection } from "@linepick/types"

import type { EngineState } from "./engine-state.js"
import type { IPickerLogger, IQueryAccessor } from "./interfaces.js"
import { NullLogger } from "./interfaces.js"
import type { ItemStore } from "./item-store.js"
import { deriveFilterText, selectTail } from "./query.js"
import { startsWithIgnoreCase } from "./token-matcher.js"

export interface CompletionResult {
	/** Id of the item that supplied the suggestion */
	itemId: number
	/** Text inserted after the caret (and selected) */
	suffix: string
}

export interface CompletionEngineOptions {
	outputSeparator: string | null
	/** Logger instance (optional, defaults to NullLogger) */
	logger?: IPickerLogger
}

export class CompletionEngine {
	private readonly outputSeparator: string | null
	private readonly logger: IPickerLogger
	/** FilterText the last full scan found no candidate for */
	private exhaustedFor: string | null = null

	constructor(
		private readonly store: ItemStore,
		private readonly queries: IQueryAccessor,
		private readonly state: EngineState,
		options: CompletionEngineOptions,
	) {
		this.outputSeparator = options.outputSeparator
		this.logger = options.logger ?? new NullLogger()
	}

	/**
	 * Try every visible item in store order; the first candidate wins.
	 */
	complete(): CompletionResult | null {
		this.exhaustedFor = null

		const query = this.queries.getQuery()
		const filterText = this.completableFilterText(query)

		if (filterText === null) {
			return null
		}

		for (const item of this.store.iterateInOrder()) {
			if (item.visible && isCompletionOf(item.text, filterText)) {
				return this.apply(query, filterText, item)
			}
		}

		this.exhaustedFor = filterText
		return null
	}

	/**
	 * Completion after `item` was appended to the store. Same result as
	 * complete(); the full scan is skipped when the last one found nothing for
	 * this FilterText, since only the new item can change that.
	 */
	completeAfterIngest(item: ItemView): CompletionResult | null {
		const query = this.queries.getQuery()
		const filterText = this.completableFilterText(query)

		if (filterText === null) {
			return null
		}

		if (filterText !== this.exhaustedFor) {
			return this.complete()
		}

		if (!item.visible || !isCompletionOf(item.text, filterText)) {
			return null
		}

		return this.apply(query, filterText, item)
	}

	/**
	 * Re-arm completion after a plain insertion.
	 */
	enable(): void {
		this.exhaustedFor = null
		this.state.completeEnabled = true
	}

	/**
	 * Disable completion after a deletion or an explicit selection.
	 */
	disable(): void {
		this.exhaustedFor = null
		this.state.completeEnabled = false
	}

	isEnabled(): boolean {
		return this.state.completeEnabled
	}

	/**
	 * FilterText to complete, or null when the preconditions do not hold.
	 */
	private completableFilterText(query: QueryState): string | null {
		if (!this.state.completeEnabled || hasSelection(query) || query.cursor !== query.text.length) {
			return null
		}

		const filterText = deriveFilterText(query, this.outputSeparator)
		return filterText.length > 0 ? filterText : null
	}

	private apply(query: QueryState, filterText: string, item: ItemView): CompletionResult {
		const suffix = item.text.slice(filterText.length)
		const text = query.text + suffix

		this.exhaustedFor = null
		this.queries.setQuery(selectTail(text, query.text.length))
		// The suggestion is now selected, which suspends completion until the next insertion.
		this.state.completeEnabled = false

		this.logger.debug("Completion", `Completed "${filterText}" with item ${item.position}`, { suffix })
		return { itemId: item.position, suffix }
	}
}

function isCompletionOf(text: string, prefix: string): boolean {
	return text.length > prefix.length && startsWithIgnoreCase(text, prefix)
}
