/**
 * Filter Engine
 *
 * Recomputes item visibility after the query settles. Edits only schedule a
 * pass; the pass itself runs from a single debounce timer, so a burst of
 * keystrokes costs one scan of the store.
 *
 * Pass modes:
 *   noop   - FilterText is unchanged since the last pass
 *   narrow - FilterText extends the last one; only visible items can change
 *   full   - anything else (shorter, same length but different, unrelated)
 */

import type { QueryState } from "@linepick/types"

import type { EngineState } from "./engine-state.js"
import type { IPickerLogger, IQueryAccessor, IScheduler } from "./interfaces.js"
import { NullLogger } from "./interfaces.js"
import type { ItemStore } from "./item-store.js"
import { deriveFilterText } from "./query.js"
import { timerScheduler } from "./scheduler.js"
import { matchesTokens } from "./token-matcher.js"

// =============================================================================
// Types
// =============================================================================

export type FilterPassMode = "noop" | "narrow" | "full"

export interface FilterPassResult {
	mode: FilterPassMode
	filterText: string
	/** Items whose visibility was recomputed */
	evaluated: number
	/** Items whose visibility flipped */
	changed: number
}

export interface FilterEngineOptions {
	outputSeparator: string | null
	debounceMs: number
	/** Timer source (optional, defaults to setTimeout) */
	scheduler?: IScheduler
	/** Logger instance (optional, defaults to NullLogger) */
	logger?: IPickerLogger
	/** Called after each debounced pass has run */
	onPass?: (result: FilterPassResult) => void
}

// =============================================================================
// FilterEngine Class
// =============================================================================

export class FilterEngine {
	private readonly outputSeparator: string | null
	private readonly debounceMs: number
	private readonly scheduler: IScheduler
	private readonly logger: IPickerLogger
	private readonly onPass: ((result: FilterPassResult) => void) | undefined

	constructor(
		private readonly store: ItemStore,
		private readonly queries: IQueryAccessor,
		private readonly state: EngineState,
		options: FilterEngineOptions,
	) {
		this.outputSeparator = options.outputSeparator
		this.debounceMs = options.debounceMs
		this.scheduler = options.scheduler ?? timerScheduler
		this.logger = options.logger ?? new NullLogger()
		this.onPass = options.onPass
	}

	// ===========================================================================
	// Debounce
	// ===========================================================================

	/**
	 * Schedule a pass after the debounce delay, replacing any pending one.
	 */
	scheduleDebounced(): void {
		this.cancel()
		this.state.pendingTimer = this.scheduler.scheduleOnce(this.debounceMs, () => {
			this.state.pendingTimer = null
			this.runPass()
		})
	}

	hasPending(): boolean {
		return this.state.pendingTimer !== null
	}

	/**
	 * Run the pending pass now instead of waiting for its timer.
	 *
	 * @returns The pass result, or null when nothing was pending
	 */
	flush(): FilterPassResult | null {
		if (!this.hasPending()) {
			return null
		}

		this.cancel()
		return this.runPass()
	}

	/**
	 * Drop the pending pass, if any.
	 */
	cancel(): void {
		if (this.state.pendingTimer !== null) {
			this.scheduler.cancel(this.state.pendingTimer)
			this.state.pendingTimer = null
		}
	}

	// ===========================================================================
	// Filtering
	// ===========================================================================

	/**
	 * Bring visibility in line with the given query.
	 */
	onQueryChanged(query: QueryState): FilterPassResult {
		const filterText = deriveFilterText(query, this.outputSeparator)
		const last = this.state.lastFilterText

		if (filterText === last) {
			return { mode: "noop", filterText, evaluated: 0, changed: 0 }
		}

		const mode: FilterPassMode = filterText.length > last.length && filterText.startsWith(last) ? "narrow" : "full"
		// Narrowing never reveals a hidden item.
		const candidates = mode === "narrow" ? this.store.visibleIds() : this.allIds()
		let changed = 0

		for (const id of candidates) {
			const visible = matchesTokens(this.store.textOf(id), filterText)

			if (this.store.setVisible(id, visible)) {
				changed++
			}
		}

		this.state.lastFilterText = filterText

		this.logger.debug("FilterEngine", `${mode} pass for "${filterText}"`, {
			evaluated: candidates.length,
			changed,
			visible: this.store.visibleSize,
		})

		return { mode, filterText, evaluated: candidates.length, changed }
	}

	/**
	 * FilterText as of the last completed pass.
	 */
	currentFilterText(): string {
		return this.state.lastFilterText
	}

	private runPass(): FilterPassResult {
		const result = this.onQueryChanged(this.queries.getQuery())
		this.onPass?.(result)
		return result
	}

	private allIds(): number[] {
		return Array.from({ length: this.store.size }, (_, id) => id)
	}
}
