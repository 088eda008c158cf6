/**
 * Picker Interfaces
 *
 * Collaborators the engine talks to. Hosts supply real implementations
 * (a UI store, a timer source, a log file); tests supply in-memory ones.
 */

import type { QueryState } from "@linepick/types"

// =============================================================================
// Logger Interface
// =============================================================================

/**
 * Interface for engine logging.
 * Allows for different logging implementations (file, mock for tests).
 */
export interface IPickerLogger {
	/**
	 * Log an info message.
	 */
	info(component: string, message: string, data?: unknown): void

	/**
	 * Log a debug message.
	 */
	debug(component: string, message: string, data?: unknown): void

	/**
	 * Log a warning message.
	 */
	warn(component: string, message: string, data?: unknown): void

	/**
	 * Log an error message.
	 */
	error(component: string, message: string, data?: unknown): void
}

// =============================================================================
// Query Accessor Interface
// =============================================================================

/**
 * Shared query state. The engine reads and writes the query only through
 * this accessor and assumes no concurrent writer.
 */
export interface IQueryAccessor {
	getQuery(): QueryState
	setQuery(query: QueryState): void
}

// =============================================================================
// Scheduler Interface
// =============================================================================

/**
 * Opaque handle returned by a scheduler.
 */
export type TimerHandle = unknown

/**
 * One-shot timer source.
 */
export interface IScheduler {
	scheduleOnce(delayMs: number, callback: () => void): TimerHandle
	cancel(handle: TimerHandle): void
}

// =============================================================================
// Default Implementations
// =============================================================================

/**
 * Null logger that discards all messages.
 */
export class NullLogger implements IPickerLogger {
	info(_component: string, _message: string, _data?: unknown): void {}
	debug(_component: string, _message: string, _data?: unknown): void {}
	warn(_component: string, _message: string, _data?: unknown): void {}
	error(_component: string, _message: string, _data?: unknown): void {}
}

/**
 * Query accessor backed by a plain field.
 */
export class MemoryQueryAccessor implements IQueryAccessor {
	private query: QueryState

	constructor(initial?: Partial<QueryState>) {
		const text = initial?.text ?? ""
		const cursor = initial?.cursor ?? text.length
		this.query = {
			text,
			cursor,
			selectionStart: initial?.selectionStart ?? cursor,
			selectionEnd: initial?.selectionEnd ?? cursor,
		}
	}

	getQuery(): QueryState {
		return { ...this.query }
	}

	setQuery(query: QueryState): void {
		this.query = { ...query }
	}
}
