import type { TimerHandle } from "./interfaces.js"

/**
 * Mutable state shared by the filter and completion engines of one session.
 */
export interface EngineState {
	/** Cleared by deletions and selections, re-armed by insertions */
	completeEnabled: boolean
	/** FilterText used by the last completed filter pass */
	lastFilterText: string
	/** The single pending debounce timer, if any */
	pendingTimer: TimerHandle | null
}

export function createEngineState(): EngineState {
	return {
		completeEnabled: true,
		lastFilterText: "",
		pendingTimer: null,
	}
}
