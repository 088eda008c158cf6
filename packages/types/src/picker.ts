/**
 * Shared picker data model.
 *
 * Used by the engine in @linepick/core and by hosts that render it.
 */

/**
 * One candidate string. `position` is the insertion order and doubles as the id.
 */
export interface Item {
	readonly position: number
	readonly text: string
	visible: boolean
}

/**
 * Read-only view of an item handed to hosts.
 */
export type ItemView = Readonly<Item>

/**
 * The text the user is editing, with caret and selection.
 * `selectionStart === selectionEnd` means there is no selection.
 */
export interface QueryState {
	text: string
	cursor: number
	selectionStart: number
	selectionEnd: number
}

export const EMPTY_QUERY: Readonly<QueryState> = {
	text: "",
	cursor: 0,
	selectionStart: 0,
	selectionEnd: 0,
}

export function hasSelection(query: QueryState): boolean {
	return query.selectionStart !== query.selectionEnd
}

export type PickerStatus = "running" | "submitted" | "cancelled" | "failed"

/**
 * How a session ended.
 */
export type PickerOutcome =
	| { kind: "submitted"; text: string }
	| { kind: "cancelled" }
	| { kind: "fatal-ingestion-error"; capacity: number; message: string }

export type PickerOutcomeKind = PickerOutcome["kind"]
