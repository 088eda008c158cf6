import { PickerSession } from "@linepick/core"
import { parsePickerConfig } from "@linepick/types"

import { SYNC_INTERVAL_MS, subscribeSession } from "../ui/hooks/usePickerSession.js"
import { createPickerStore, createStoreQueryAccessor } from "../ui/store.js"

function setup(sortItems = false) {
	const store = createPickerStore()
	const session = new PickerSession({
		config: parsePickerConfig({ sortItems }),
		queries: createStoreQueryAccessor(store),
	})

	return { store, session }
}

describe("subscribeSession", () => {
	beforeEach(() => {
		vi.useFakeTimers()
	})

	afterEach(() => {
		vi.useRealTimers()
		vi.restoreAllMocks()
	})

	it("should sync items that arrived before subscribing", () => {
		const { store, session } = setup()
		session.feed("a\nb\n")

		const unsubscribe = subscribeSession(session, store)

		expect(store.getState().items.map((item) => item.text)).toEqual(["a", "b"])
		expect(store.getState().totalCount).toBe(2)
		unsubscribe()
	})

	it("should take one snapshot for a burst of ingested slices", () => {
		const { store, session } = setup(true)
		const unsubscribe = subscribeSession(session, store)
		const visibleItems = vi.spyOn(session, "visibleItems")

		for (let i = 0; i < 50; i++) {
			session.feed(`item${50 - i}\n`)
		}

		expect(visibleItems).not.toHaveBeenCalled()
		expect(store.getState().totalCount).toBe(0)

		vi.advanceTimersByTime(SYNC_INTERVAL_MS)

		expect(visibleItems).toHaveBeenCalledTimes(1)
		expect(store.getState().totalCount).toBe(50)
		expect(store.getState().items[0]?.text).toBe("item1")
		unsubscribe()
	})

	it("should sync the outcome without waiting for the interval", () => {
		const { store, session } = setup()
		const unsubscribe = subscribeSession(session, store)
		session.feed("a\n")

		session.cancel()

		expect(store.getState().outcome).toEqual({ kind: "cancelled" })
		expect(store.getState().totalCount).toBe(1)
		expect(vi.getTimerCount()).toBe(0)
		unsubscribe()
	})

	it("should drop a pending sync on unsubscribe", () => {
		const { store, session } = setup()
		const unsubscribe = subscribeSession(session, store)
		session.feed("a\n")

		unsubscribe()
		vi.advanceTimersByTime(SYNC_INTERVAL_MS)

		expect(store.getState().totalCount).toBe(0)
		expect(session.listenerCount("change")).toBe(0)
		expect(session.listenerCount("outcome")).toBe(0)
	})
})
