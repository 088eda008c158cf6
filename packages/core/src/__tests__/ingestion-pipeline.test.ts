/**
 * Tests for IngestionPipeline
 *
 * Splitting, end-of-stream flushing and the fatal overflow path.
 */

import { ContractViolationError, IngestionOverflowError } from "../errors.js"
import { IngestionPipeline, type IngestionHooks } from "../ingestion-pipeline.js"
import { ItemStore } from "../item-store.js"

function texts(store: ItemStore): string[] {
	return [...store.iterateInOrder()].map((item) => item.text)
}

describe("IngestionPipeline", () => {
	let store: ItemStore
	let filterText: string
	let hooks: IngestionHooks & { onItem: ReturnType<typeof vi.fn>; onFatal: ReturnType<typeof vi.fn> }

	const createPipeline = (inputSeparator = "\n", capacity = 8192) =>
		new IngestionPipeline(store, hooks, { inputSeparator, capacity })

	beforeEach(() => {
		store = new ItemStore()
		filterText = ""
		hooks = {
			filterText: () => filterText,
			onItem: vi.fn(),
			onFatal: vi.fn(),
		}
	})

	describe("splitting", () => {
		it("should hold back the trailing partial item until end-of-stream", () => {
			const pipeline = createPipeline()

			expect(pipeline.feed("a\nb\nc")).toBe(2)
			expect(texts(store)).toEqual(["a", "b"])
			expect(pipeline.pendingLength()).toBe(1)

			expect(pipeline.end()).toBe(1)
			expect(texts(store)).toEqual(["a", "b", "c"])
			expect(pipeline.getState()).toBe("ended")
		})

		it("should join items split across slices", () => {
			const pipeline = createPipeline()

			pipeline.feed("hel")
			pipeline.feed("lo\nwor")
			pipeline.feed("ld\n")

			expect(texts(store)).toEqual(["hello", "world"])
			expect(pipeline.pendingLength()).toBe(0)
		})

		it("should find a multi-character separator that straddles two slices", () => {
			const pipeline = createPipeline("\r\n")

			pipeline.feed("one\r")
			pipeline.feed("\ntwo\r\n")

			expect(texts(store)).toEqual(["one", "two"])
		})

		it("should skip empty items", () => {
			const pipeline = createPipeline()

			pipeline.feed("a\n\n\nb\n")
			pipeline.end()

			expect(texts(store)).toEqual(["a", "b"])
		})

		it("should not add an item at end-of-stream when nothing is pending", () => {
			const pipeline = createPipeline()

			pipeline.feed("a\n")

			expect(pipeline.end()).toBe(0)
			expect(texts(store)).toEqual(["a"])
		})

		it("should decode UTF-8 sequences split across byte slices", () => {
			const pipeline = createPipeline()
			const bytes = new TextEncoder().encode("é\n")

			pipeline.feed(bytes.subarray(0, 1))
			pipeline.feed(bytes.subarray(1))

			expect(texts(store)).toEqual(["é"])
		})

		it("should honour a custom separator", () => {
			const pipeline = createPipeline("\0")

			pipeline.feed("a b\0c\nd\0")

			expect(texts(store)).toEqual(["a b", "c\nd"])
		})
	})

	describe("visibility and hooks", () => {
		it("should set initial visibility from the current filter text", () => {
			filterText = "b"
			const pipeline = createPipeline()

			pipeline.feed("abc\nxyz\n")

			expect([...store.iterateInOrder()].map((item) => item.visible)).toEqual([true, false])
		})

		it("should report each appended item", () => {
			const pipeline = createPipeline()

			pipeline.feed("a\nb\n")

			expect(hooks.onItem.mock.calls).toEqual([
				[{ position: 0, text: "a", visible: true }],
				[{ position: 1, text: "b", visible: true }],
			])
		})
	})

	describe("end-of-stream", () => {
		it("should be idempotent", () => {
			const pipeline = createPipeline()

			pipeline.feed("a")
			pipeline.end()

			expect(pipeline.end()).toBe(0)
			expect(texts(store)).toEqual(["a"])
		})

		it("should reject input after end-of-stream", () => {
			const pipeline = createPipeline()
			pipeline.end()

			expect(() => pipeline.feed("a\n")).toThrow(ContractViolationError)
		})
	})

	describe("buffer overflow", () => {
		it("should fail without appending when a pending item exceeds the capacity", () => {
			const pipeline = createPipeline("\n", 4)

			expect(pipeline.feed("abcdefg")).toBe(0)

			expect(texts(store)).toEqual([])
			expect(pipeline.getState()).toBe("failed")
			expect(pipeline.getFailure()).toBeInstanceOf(IngestionOverflowError)
			expect(pipeline.getFailure()?.capacity).toBe(4)
			expect(pipeline.getFailure()?.received).toBe(7)
			expect(hooks.onFatal).toHaveBeenCalledTimes(1)
		})

		it("should accept an item exactly at the capacity", () => {
			const pipeline = createPipeline("\n", 3)

			pipeline.feed("abc")
			pipeline.end()

			expect(pipeline.getState()).toBe("ended")
			expect(texts(store)).toEqual(["abc"])
		})

		it("should not count a separator split across slices against the capacity", () => {
			const pipeline = createPipeline("\r\n", 3)

			expect(pipeline.feed("abc\r")).toBe(0)
			expect(pipeline.getState()).toBe("open")

			expect(pipeline.feed("\n")).toBe(1)
			expect(texts(store)).toEqual(["abc"])
			expect(hooks.onFatal).not.toHaveBeenCalled()
		})

		it("should fail when a held-back separator prefix turns out to be item text", () => {
			const pipeline = createPipeline("\r\n", 3)
			pipeline.feed("abc\r")

			expect(pipeline.feed("x")).toBe(0)

			expect(pipeline.getState()).toBe("failed")
			expect(pipeline.getFailure()?.received).toBe(5)
		})

		it("should fail at end-of-stream when the trailing item with its separator prefix exceeds the capacity", () => {
			const pipeline = createPipeline("\r\n", 3)
			pipeline.feed("abc\r")

			expect(pipeline.end()).toBe(0)

			expect(pipeline.getState()).toBe("failed")
			expect(pipeline.getFailure()?.received).toBe(4)
			expect(texts(store)).toEqual([])
		})

		it("should fail on an oversized item even when its separator is in the same slice", () => {
			const pipeline = createPipeline("\n", 3)

			expect(pipeline.feed("ab\nabcdef\nxy\n")).toBe(1)

			expect(texts(store)).toEqual(["ab"])
			expect(pipeline.getFailure()?.received).toBe(6)
		})

		it("should stop accepting input after failing", () => {
			const pipeline = createPipeline("\n", 2)
			pipeline.feed("abc")

			expect(() => pipeline.feed("\n")).toThrow(ContractViolationError)
			expect(pipeline.end()).toBe(0)
			expect(texts(store)).toEqual([])
		})
	})

	it("should reject an empty separator", () => {
		expect(() => createPipeline("")).toThrow(ContractViolationError)
	})
})
