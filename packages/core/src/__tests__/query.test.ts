import { ContractViolationError } from "../errors.js"
import { assertValidQuery, currentSegmentStart, deriveFilterText } from "../query.js"

describe("deriveFilterText", () => {
	it("should use the text before the caret", () => {
		expect(deriveFilterText({ text: "abcdef", cursor: 3, selectionStart: 3, selectionEnd: 3 }, null)).toBe("abc")
	})

	it("should stop at the selection start", () => {
		expect(deriveFilterText({ text: "apricot", cursor: 7, selectionStart: 2, selectionEnd: 7 }, null)).toBe("ap")
	})

	it("should drop everything up to the last output separator", () => {
		const query = { text: "foo, bar, ba", cursor: 12, selectionStart: 12, selectionEnd: 12 }

		expect(deriveFilterText(query, ", ")).toBe("ba")
		expect(deriveFilterText(query, null)).toBe("foo, bar, ba")
	})

	it("should be empty right after a separator", () => {
		expect(deriveFilterText({ text: "foo, ", cursor: 5, selectionStart: 5, selectionEnd: 5 }, ", ")).toBe("")
	})
})

describe("currentSegmentStart", () => {
	it("should point after the last separator", () => {
		expect(currentSegmentStart({ text: "foo, bar", cursor: 8, selectionStart: 8, selectionEnd: 8 }, ", ")).toBe(5)
	})

	it("should look only before the selection", () => {
		const query = { text: "foo, baz, qux", cursor: 13, selectionStart: 5, selectionEnd: 13 }

		expect(currentSegmentStart(query, ", ")).toBe(5)
	})

	it("should be 0 without a separator", () => {
		expect(currentSegmentStart({ text: "foo, bar", cursor: 8, selectionStart: 8, selectionEnd: 8 }, null)).toBe(0)
	})
})

describe("assertValidQuery", () => {
	it("should reject positions outside the text", () => {
		expect(() => assertValidQuery({ text: "ab", cursor: 3, selectionStart: 3, selectionEnd: 3 })).toThrow(
			ContractViolationError,
		)
		expect(() => assertValidQuery({ text: "ab", cursor: 1, selectionStart: -1, selectionEnd: 1 })).toThrow(
			ContractViolationError,
		)
	})

	it("should accept a caret at the end", () => {
		expect(() => assertValidQuery({ text: "ab", cursor: 2, selectionStart: 2, selectionEnd: 2 })).not.toThrow()
	})
})
