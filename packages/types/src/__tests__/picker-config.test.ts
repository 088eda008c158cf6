import { PickerConfigError, parsePickerConfig, formatConfigIssues } from "../picker-config.js"

describe("parsePickerConfig", () => {
	it("should fill in defaults for an empty input", () => {
		expect(parsePickerConfig()).toEqual({
			inputSeparator: "\n",
			outputSeparator: null,
			debounceMs: 200,
			batchSize: 250,
			ingestionBufferCapacity: 8192,
			seedFirstItem: false,
			sortItems: false,
		})
	})

	it("should keep provided values", () => {
		const config = parsePickerConfig({ inputSeparator: "\0", outputSeparator: ", ", debounceMs: 0 })

		expect(config.inputSeparator).toBe("\0")
		expect(config.outputSeparator).toBe(", ")
		expect(config.debounceMs).toBe(0)
	})

	it("should reject an empty input separator", () => {
		expect(() => parsePickerConfig({ inputSeparator: "" })).toThrow(PickerConfigError)
	})

	it("should report every invalid field", () => {
		try {
			parsePickerConfig({ debounceMs: -1, batchSize: 1.5 })
			expect.fail("expected PickerConfigError")
		} catch (error) {
			expect(error).toBeInstanceOf(PickerConfigError)
			const issues = error instanceof PickerConfigError ? error.issues : []
			expect(issues.map((issue) => issue.path.join("."))).toEqual(["debounceMs", "batchSize"])
		}
	})
})

describe("formatConfigIssues", () => {
	it("should print one line per issue prefixed with its path", () => {
		const text = formatConfigIssues([
			{ code: "custom", path: ["batchSize"], message: "too small" },
			{ code: "custom", path: [], message: "bad" },
		])

		expect(text).toBe("batchSize: too small\n(root): bad")
	})
})
