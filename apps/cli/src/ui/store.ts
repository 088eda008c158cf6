import { create } from "zustand"

import type { IQueryAccessor } from "@linepick/core"
import { EMPTY_QUERY, type ItemView, type PickerOutcome, type QueryState } from "@linepick/types"

/**
 * What the list needs from the session after each "change" event.
 */
export interface SessionSnapshot {
	items: ItemView[]
	totalCount: number
	inputComplete: boolean
	outcome: PickerOutcome | null
}

/**
 * Picker UI state.
 *
 * The query lives here rather than in the session: the session reads and
 * writes it through `createStoreQueryAccessor`, so the input line re-renders
 * as soon as an edit, completion or merge lands.
 */
interface PickerState {
	query: QueryState

	// Visible items in presentation order
	items: ItemView[]
	totalCount: number
	inputComplete: boolean

	// Highlighted row, tracked by item id so it survives refiltering
	highlightedId: number | null

	// Marked item ids in the order they were marked (multi-select only)
	markedIds: number[]

	outcome: PickerOutcome | null
}

interface PickerActions {
	setQuery: (query: QueryState) => void
	syncFromSession: (snapshot: SessionSnapshot) => void
	/** Move the highlight by `delta` rows, wrapping at both ends */
	moveHighlight: (delta: number) => void
	setHighlightedId: (id: number | null) => void
	/** Mark or unmark an item and return the marked ids afterwards */
	toggleMarked: (id: number) => number[]
	reset: () => void
}

export type PickerStoreState = PickerState & PickerActions

const initialState: PickerState = {
	query: EMPTY_QUERY,
	items: [],
	totalCount: 0,
	inputComplete: false,
	highlightedId: null,
	markedIds: [],
	outcome: null,
}

export function createPickerStore() {
	return create<PickerStoreState>((set, get) => ({
		...initialState,

		setQuery: (query) => set({ query }),

		syncFromSession: (snapshot) =>
			set((state) => {
				const { items } = snapshot
				const stillVisible = items.some((item) => item.position === state.highlightedId)

				return {
					items,
					totalCount: snapshot.totalCount,
					inputComplete: snapshot.inputComplete,
					outcome: snapshot.outcome,
					highlightedId: stillVisible ? state.highlightedId : (items[0]?.position ?? null),
				}
			}),

		moveHighlight: (delta) =>
			set((state) => {
				const count = state.items.length

				if (count === 0) {
					return state
				}

				const current = state.items.findIndex((item) => item.position === state.highlightedId)
				const start = current === -1 ? 0 : current
				const next = (((start + delta) % count) + count) % count

				return { highlightedId: state.items[next]?.position ?? null }
			}),

		setHighlightedId: (id) => set({ highlightedId: id }),

		toggleMarked: (id) => {
			const { markedIds } = get()
			const next = markedIds.includes(id) ? markedIds.filter((marked) => marked !== id) : [...markedIds, id]
			set({ markedIds: next })
			return next
		},

		reset: () => set(initialState),
	}))
}

export type PickerStore = ReturnType<typeof createPickerStore>

/**
 * Query accessor backed by the UI store.
 */
export function createStoreQueryAccessor(store: PickerStore): IQueryAccessor {
	return {
		getQuery: () => ({ ...store.getState().query }),
		setQuery: (query) => store.getState().setQuery({ ...query }),
	}
}
