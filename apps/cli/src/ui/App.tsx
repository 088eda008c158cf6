import { Box, useInput } from "ink"

import type { PickerSession } from "@linepick/core"

import { ItemList } from "./components/ItemList.js"
import { QueryInput } from "./components/QueryInput.js"
import { StatusLine } from "./components/StatusLine.js"
import { usePickerSession } from "./hooks/usePickerSession.js"
import { handleKey } from "./keymap.js"
import type { PickerStore } from "./store.js"

export interface AppProps {
	session: PickerSession
	/** Store the session's query accessor writes to */
	store: PickerStore
	multi: boolean
	maxVisible: number
	prompt: string
	/** Whether key presses reach the keymap (default: true) */
	isActive?: boolean
}

export function App({ session, store, multi, maxVisible, prompt, isActive = true }: AppProps) {
	usePickerSession({ session, store })

	const query = store((state) => state.query)
	const items = store((state) => state.items)
	const totalCount = store((state) => state.totalCount)
	const inputComplete = store((state) => state.inputComplete)
	const highlightedId = store((state) => state.highlightedId)
	const markedIds = store((state) => state.markedIds)

	const canMark = multi && session.supportsMultiSelect()

	useInput(
		(input, key) => {
			handleKey(input, key, { session, store, multi: canMark })
		},
		{ isActive },
	)

	return (
		<Box flexDirection="column">
			<QueryInput query={query} prompt={prompt} />
			<ItemList
				items={items}
				highlightedId={highlightedId}
				markedIds={canMark ? markedIds : undefined}
				maxVisible={maxVisible}
			/>
			<StatusLine
				visibleCount={items.length}
				totalCount={totalCount}
				inputComplete={inputComplete}
				markedCount={canMark ? markedIds.length : 0}
			/>
		</Box>
	)
}
