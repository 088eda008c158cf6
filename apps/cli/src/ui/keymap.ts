/**
 * Keymap
 *
 * Turns one ink key press into session operations. Kept free of React so the
 * bindings can be exercised without rendering.
 *
 *   printable      insert at the caret (replaces the selection)
 *   Backspace/Del  delete backward (terminals send either for Backspace)
 *   Ctrl+D         delete forward
 *   Left/Right     move the caret
 *   Ctrl+A         select the whole query
 *   Ctrl+U         clear the query
 *   Up/Down        move the highlight
 *   Tab            mark the highlighted item (multi) or copy it (single)
 *   Enter          submit the query text
 *   Esc/Ctrl+C     cancel
 */

import type { Key } from "ink"

import type { PickerSession } from "@linepick/core"

import type { PickerStore } from "./store.js"

export type KeyPress = Partial<
	Pick<
		Key,
		| "upArrow"
		| "downArrow"
		| "leftArrow"
		| "rightArrow"
		| "return"
		| "escape"
		| "ctrl"
		| "meta"
		| "tab"
		| "backspace"
		| "delete"
	>
>

export interface KeymapContext {
	session: PickerSession
	store: PickerStore
	/** Tab marks items instead of copying the highlighted one */
	multi: boolean
}

export type KeyAction =
	| "cancel"
	| "submit"
	| "highlight"
	| "mark"
	| "copy"
	| "delete-backward"
	| "delete-forward"
	| "move-left"
	| "move-right"
	| "select-all"
	| "clear"
	| "insert"
	| "ignored"

/**
 * Handle a key press and report which binding fired.
 */
export function handleKey(input: string, key: KeyPress, context: KeymapContext): KeyAction {
	const { session, store } = context

	if (session.getStatus() !== "running") {
		return "ignored"
	}

	if (key.escape || (key.ctrl && input === "c")) {
		session.cancel()
		return "cancel"
	}

	if (key.return) {
		session.accept()
		return "submit"
	}

	if (key.upArrow || key.downArrow) {
		store.getState().moveHighlight(key.upArrow ? -1 : 1)

		// Single-select follows the highlight, like clicking through a list.
		if (!context.multi) {
			copyHighlighted(context)
		}

		return "highlight"
	}

	if (key.tab) {
		return context.multi ? markHighlighted(context) : copyHighlighted(context) ? "copy" : "ignored"
	}

	if (key.backspace || key.delete) {
		session.deleteBackward()
		return "delete-backward"
	}

	if (key.leftArrow || key.rightArrow) {
		session.moveCursor(key.leftArrow ? -1 : 1)
		return key.leftArrow ? "move-left" : "move-right"
	}

	if (key.ctrl) {
		switch (input) {
			case "a":
				session.selectAll()
				return "select-all"
			case "u":
				session.clear()
				return "clear"
			case "d":
				session.deleteForward()
				return "delete-forward"
			default:
				return "ignored"
		}
	}

	if (key.meta) {
		return "ignored"
	}

	// Pasted text may carry line breaks; a query is a single line.
	const text = input.replace(/[\r\n]/g, "")

	if (text.length === 0) {
		return "ignored"
	}

	session.insertText(text)
	return "insert"
}

function copyHighlighted({ session, store }: KeymapContext): boolean {
	const { highlightedId } = store.getState()

	if (highlightedId === null) {
		return false
	}

	// Browsing does not refilter; the list stays as it was.
	session.toggleItems([session.getItem(highlightedId).text], { refilter: false })
	return true
}

function markHighlighted({ session, store }: KeymapContext): KeyAction {
	const { highlightedId } = store.getState()

	if (highlightedId === null) {
		return "ignored"
	}

	const marked = store.getState().toggleMarked(highlightedId)
	session.toggleItems(marked.map((id) => session.getItem(id).text))
	return "mark"
}
