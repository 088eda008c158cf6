import type { ItemView } from "@linepick/types"

const collator = new Intl.Collator(undefined, { numeric: true, sensitivity: "base" })

/**
 * Natural ("file2" before "file10"), case-insensitive ordering for display.
 * Ties keep insertion order. Returns a new array; the store is untouched.
 */
export function sortNaturally(items: readonly ItemView[]): ItemView[] {
	return [...items].sort((a, b) => collator.compare(a.text, b.text) || a.position - b.position)
}
