/**
 * Query helpers shared by the engines.
 */

import { type QueryState, hasSelection } from "@linepick/types"

import { assertContract } from "./errors.js"

/**
 * The part of the query used to decide visibility: the text before the
 * selection (or caret), minus everything up to the last output separator.
 */
export function deriveFilterText(query: QueryState, outputSeparator: string | null): string {
	const end = hasSelection(query) ? Math.min(query.selectionStart, query.selectionEnd) : query.cursor
	const typed = query.text.slice(0, end)

	if (!outputSeparator) {
		return typed
	}

	const last = typed.lastIndexOf(outputSeparator)
	return last === -1 ? typed : typed.slice(last + outputSeparator.length)
}

/**
 * Start offset of the item currently being typed: the text after the last
 * output separator that precedes the selection, or 0.
 */
export function currentSegmentStart(query: QueryState, outputSeparator: string | null): number {
	if (!outputSeparator) {
		return 0
	}

	const end = hasSelection(query) ? Math.min(query.selectionStart, query.selectionEnd) : query.text.length
	const last = query.text.slice(0, end).lastIndexOf(outputSeparator)
	return last === -1 ? 0 : last + outputSeparator.length
}

export function caretAt(text: string, index: number): QueryState {
	return { text, cursor: index, selectionStart: index, selectionEnd: index }
}

/**
 * Query with `text.slice(start)` selected and the caret at the end.
 */
export function selectTail(text: string, start: number): QueryState {
	return { text, cursor: text.length, selectionStart: start, selectionEnd: text.length }
}

export function assertValidQuery(query: QueryState): void {
	const { text, cursor, selectionStart, selectionEnd } = query
	const inRange = (n: number) => Number.isInteger(n) && n >= 0 && n <= text.length

	assertContract(inRange(cursor), `Cursor ${cursor} is outside the query (length ${text.length})`)
	assertContract(
		inRange(selectionStart) && inRange(selectionEnd),
		`Selection ${selectionStart}..${selectionEnd} is outside the query (length ${text.length})`,
	)
}
