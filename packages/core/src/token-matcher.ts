/**
 * Token Matcher
 *
 * Ordered, case-insensitive token containment. The needle is split on single
 * spaces; every token must appear contiguously in the haystack, and the
 * tokens must appear in needle order, with anything in between.
 *
 *   matchTokens("open source project", "sour proj") === 5
 *
 * Each space retries the rest of the needle at every later haystack offset,
 * so the worst case is exponential in the number of tokens. Needles are typed
 * queries, not data, which keeps that in check.
 */

/**
 * Find the first haystack offset where the needle matches.
 *
 * @param maxLen - Number of needle characters that must match before the
 *   attempt counts as a success. Defaults to the whole needle; hosts pass a
 *   smaller value to leave a selected suffix out of the comparison.
 * @returns The offset of the first token's match, or null
 */
export function matchTokens(haystack: string, needle: string, maxLen: number = needle.length): number | null {
	return matchFrom(haystack, 0, needle, 0, maxLen)
}

/**
 * Convenience wrapper for visibility checks.
 */
export function matchesTokens(haystack: string, needle: string): boolean {
	return matchTokens(haystack, needle) !== null
}

function matchFrom(haystack: string, hayStart: number, needle: string, needleStart: number, max: number): number | null {
	if (needleStart >= needle.length) {
		return hayStart
	}

	for (let h = hayStart; h < haystack.length; h++) {
		let consumed = 0
		let hh = h
		let nn = needleStart

		while (hh < haystack.length && nn < needle.length && consumed < max) {
			const expected = needle.charAt(nn)

			if (expected === " ") {
				if (matchFrom(haystack, hh, needle, nn + 1, max - consumed) !== null) {
					return h
				}
				break
			}

			if (!sameChar(haystack.charAt(hh), expected)) {
				break
			}

			consumed++
			hh++
			nn++
		}

		if (nn >= needle.length || consumed === max) {
			return h
		}
	}

	return null
}

function sameChar(a: string, b: string): boolean {
	return a === b || a.toLowerCase() === b.toLowerCase()
}

/**
 * Case-insensitive "text starts with prefix" used by inline completion.
 */
export function startsWithIgnoreCase(text: string, prefix: string): boolean {
	if (prefix.length > text.length) {
		return false
	}

	for (let i = 0; i < prefix.length; i++) {
		if (!sameChar(text.charAt(i), prefix.charAt(i))) {
			return false
		}
	}

	return true
}
