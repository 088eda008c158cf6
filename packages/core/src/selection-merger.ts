/**
 * Selection Merger
 *
 * Writes the host's selected items into the query. Items already submitted
 * (everything up to the last output separator) stay; the item being typed is
 * replaced by the selected texts joined with the output separator.
 *
 *   "foo, bar" + ["baz", "qux"]  ->  "foo, baz, qux"   (separator ", ")
 */

import type { QueryState } from "@linepick/types"

import type { IPickerLogger, IQueryAccessor } from "./interfaces.js"
import { NullLogger } from "./interfaces.js"
import { currentSegmentStart, selectTail } from "./query.js"

export interface SelectionMergerOptions {
	outputSeparator: string | null
	/** Logger instance (optional, defaults to NullLogger) */
	logger?: IPickerLogger
}

export class SelectionMerger {
	private readonly outputSeparator: string | null
	private readonly logger: IPickerLogger

	constructor(
		private readonly queries: IQueryAccessor,
		options: SelectionMergerOptions,
	) {
		this.outputSeparator = options.outputSeparator
		this.logger = options.logger ?? new NullLogger()
	}

	/**
	 * Without an output separator texts are simply concatenated, so hosts
	 * should only offer multi-select when this returns true.
	 */
	supportsMultiSelect(): boolean {
		return this.outputSeparator !== null
	}

	/**
	 * Replace the in-progress segment with the selected texts and select the
	 * inserted part.
	 */
	onItemsToggled(selectedTexts: readonly string[]): QueryState {
		const query = this.queries.getQuery()
		const start = currentSegmentStart(query, this.outputSeparator)
		const merged = selectedTexts.join(this.outputSeparator ?? "")
		const next = selectTail(query.text.slice(0, start) + merged, start)

		this.queries.setQuery(next)
		this.logger.debug("SelectionMerger", `Merged ${selectedTexts.length} item(s) at offset ${start}`)
		return next
	}
}
