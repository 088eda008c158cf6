import { PickerSession } from "@linepick/core"
import { type PickerConfigInput, parsePickerConfig } from "@linepick/types"

import { snapshotSession } from "../ui/hooks/usePickerSession.js"
import { type KeyPress, type KeymapContext, handleKey } from "../ui/keymap.js"
import { createPickerStore, createStoreQueryAccessor } from "../ui/store.js"

function setup(config: PickerConfigInput = {}, multi = false) {
	const store = createPickerStore()
	const session = new PickerSession({ config: parsePickerConfig(config), queries: createStoreQueryAccessor(store) })
	session.on("change", () => store.getState().syncFromSession(snapshotSession(session)))

	const context: KeymapContext = { session, store, multi }
	const press = (input: string, key: KeyPress = {}) => handleKey(input, key, context)

	return { store, session, press }
}

describe("handleKey", () => {
	beforeEach(() => {
		vi.useFakeTimers()
	})

	afterEach(() => {
		vi.useRealTimers()
	})

	describe("editing", () => {
		it("should insert typed text and complete it after the debounce", () => {
			const { store, session, press } = setup()
			session.feed("alpha\nbeta\ngamma\n")

			expect(press("b")).toBe("insert")
			expect(store.getState().query.text).toBe("b")

			vi.advanceTimersByTime(200)

			expect(store.getState().query).toEqual({ text: "beta", cursor: 4, selectionStart: 1, selectionEnd: 4 })
			expect(store.getState().items.map((item) => item.text)).toEqual(["beta"])
			expect(store.getState().highlightedId).toBe(1)
		})

		it("should remove the suggested suffix on backspace and not complete again", () => {
			const { store, session, press } = setup()
			session.feed("alpha\nbeta\ngamma\n")
			press("b")
			vi.advanceTimersByTime(200)

			expect(press("", { backspace: true })).toBe("delete-backward")
			vi.advanceTimersByTime(200)

			expect(store.getState().query).toEqual({ text: "b", cursor: 1, selectionStart: 1, selectionEnd: 1 })
		})

		it("should treat the delete key as backspace", () => {
			const { store, press } = setup()
			press("ab")

			expect(press("", { delete: true })).toBe("delete-backward")
			expect(store.getState().query.text).toBe("a")
		})

		it("should delete forward on Ctrl+D", () => {
			const { store, press } = setup()
			press("ab")
			press("", { leftArrow: true })

			expect(press("d", { ctrl: true })).toBe("delete-forward")
			expect(store.getState().query).toEqual({ text: "a", cursor: 1, selectionStart: 1, selectionEnd: 1 })
		})

		it("should move the caret with the arrow keys", () => {
			const { store, press } = setup()
			press("ab")

			expect(press("", { leftArrow: true })).toBe("move-left")
			expect(store.getState().query.cursor).toBe(1)

			expect(press("", { rightArrow: true })).toBe("move-right")
			expect(store.getState().query.cursor).toBe(2)
		})

		it("should select everything on Ctrl+A and clear on Ctrl+U", () => {
			const { store, press } = setup()
			press("gam")

			expect(press("a", { ctrl: true })).toBe("select-all")
			expect(store.getState().query).toEqual({ text: "gam", cursor: 3, selectionStart: 0, selectionEnd: 3 })

			expect(press("u", { ctrl: true })).toBe("clear")
			expect(store.getState().query).toEqual({ text: "", cursor: 0, selectionStart: 0, selectionEnd: 0 })
		})

		it("should strip line breaks from pasted text", () => {
			const { store, press } = setup()

			expect(press("a\nb\r")).toBe("insert")
			expect(store.getState().query.text).toBe("ab")
		})

		it("should ignore meta chords, unknown control chords and empty input", () => {
			const { store, press } = setup()

			expect(press("x", { meta: true })).toBe("ignored")
			expect(press("x", { ctrl: true })).toBe("ignored")
			expect(press("\n")).toBe("ignored")
			expect(store.getState().query.text).toBe("")
		})
	})

	describe("single-select", () => {
		it("should copy the highlighted item into the query when moving down", () => {
			const { store, session, press } = setup()
			session.feed("alpha\nbeta\ngamma\n")

			expect(press("", { downArrow: true })).toBe("highlight")

			expect(store.getState().highlightedId).toBe(1)
			expect(store.getState().query).toEqual({ text: "beta", cursor: 4, selectionStart: 0, selectionEnd: 4 })
			expect(session.hasPendingFilter()).toBe(false)
		})

		it("should wrap to the last item when moving up from the first", () => {
			const { store, session, press } = setup()
			session.feed("alpha\nbeta\ngamma\n")

			press("", { upArrow: true })

			expect(store.getState().highlightedId).toBe(2)
			expect(store.getState().query.text).toBe("gamma")
		})

		it("should copy the highlighted item on Tab", () => {
			const { store, session, press } = setup()
			session.feed("alpha\nbeta\n")

			expect(press("", { tab: true })).toBe("copy")
			expect(store.getState().query).toEqual({ text: "alpha", cursor: 5, selectionStart: 0, selectionEnd: 5 })
		})

		it("should ignore Tab when nothing is listed", () => {
			const { press } = setup()

			expect(press("", { tab: true })).toBe("ignored")
		})
	})

	describe("multi-select", () => {
		it("should join marked items with the output separator", () => {
			const { store, session, press } = setup({ outputSeparator: ", " }, true)
			session.feed("alpha\nbeta\ngamma\n")

			expect(press("", { tab: true })).toBe("mark")
			expect(store.getState().query.text).toBe("alpha")

			press("", { downArrow: true })
			press("", { tab: true })

			expect(store.getState().markedIds).toEqual([0, 1])
			expect(store.getState().query).toEqual({
				text: "alpha, beta",
				cursor: 11,
				selectionStart: 0,
				selectionEnd: 11,
			})
		})

		it("should drop an item from the query when it is unmarked", () => {
			const { store, session, press } = setup({ outputSeparator: ", " }, true)
			session.feed("alpha\nbeta\ngamma\n")
			press("", { tab: true })
			press("", { downArrow: true })
			press("", { tab: true })

			press("", { tab: true })

			expect(store.getState().markedIds).toEqual([0])
			expect(store.getState().query.text).toBe("alpha")
		})

		it("should not copy items while moving the highlight", () => {
			const { store, session, press } = setup({ outputSeparator: ", " }, true)
			session.feed("alpha\nbeta\n")

			press("", { downArrow: true })

			expect(store.getState().query.text).toBe("")
		})
	})

	describe("outcome", () => {
		it("should submit the query text on Enter", () => {
			const { session, press } = setup()
			press("x")

			expect(press("", { return: true })).toBe("submit")
			expect(session.getOutcome()).toEqual({ kind: "submitted", text: "x" })
		})

		it("should cancel on Escape", () => {
			const { session, press } = setup()

			expect(press("", { escape: true })).toBe("cancel")
			expect(session.getOutcome()).toEqual({ kind: "cancelled" })
		})

		it("should cancel on Ctrl+C", () => {
			const { session, press } = setup()

			expect(press("c", { ctrl: true })).toBe("cancel")
			expect(session.getStatus()).toBe("cancelled")
		})

		it("should ignore keys once the session has finished", () => {
			const { store, press } = setup()
			press("", { escape: true })

			expect(press("a")).toBe("ignored")
			expect(store.getState().query.text).toBe("")
		})
	})
})
