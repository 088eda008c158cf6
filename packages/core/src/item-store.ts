/**
 * Item Store
 *
 * Append-only list of candidates. Positions are assigned on insertion and
 * never change; the visibility flag is the only mutable field.
 */

import type { Item, ItemView } from "@linepick/types"

import { assertContract } from "./errors.js"

export class ItemStore {
	private readonly items: Item[] = []
	private visibleCount = 0
	private closed = false

	/**
	 * Append an item and return its id (its position).
	 */
	append(text: string, visible: boolean = true): number {
		this.assertOpen("append")

		const position = this.items.length
		this.items.push({ position, text, visible })

		if (visible) {
			this.visibleCount++
		}

		return position
	}

	/**
	 * Set the visibility of an item.
	 *
	 * @returns true when the flag actually changed
	 */
	setVisible(id: number, visible: boolean): boolean {
		this.assertOpen("setVisible")
		const item = this.lookup(id)

		if (item.visible === visible) {
			return false
		}

		item.visible = visible
		this.visibleCount += visible ? 1 : -1
		return true
	}

	get(id: number): ItemView {
		return { ...this.lookup(id) }
	}

	textOf(id: number): string {
		return this.lookup(id).text
	}

	isVisible(id: number): boolean {
		return this.lookup(id).visible
	}

	/**
	 * Iterate over all items in insertion order.
	 */
	*iterateInOrder(): IterableIterator<ItemView> {
		for (const item of this.items) {
			yield { ...item }
		}
	}

	/**
	 * Ids of the items that are currently visible, in insertion order.
	 */
	visibleIds(): number[] {
		const ids: number[] = []

		for (const item of this.items) {
			if (item.visible) {
				ids.push(item.position)
			}
		}

		return ids
	}

	visibleItems(): ItemView[] {
		return this.items.filter((item) => item.visible).map((item) => ({ ...item }))
	}

	get size(): number {
		return this.items.length
	}

	get visibleSize(): number {
		return this.visibleCount
	}

	close(): void {
		this.closed = true
	}

	isClosed(): boolean {
		return this.closed
	}

	private lookup(id: number): Item {
		const item = Number.isInteger(id) ? this.items[id] : undefined
		assertContract(item !== undefined, `Item id ${id} is out of range (store has ${this.items.length} items)`)
		return item
	}

	private assertOpen(operation: string): void {
		assertContract(!this.closed, `Cannot ${operation} on a closed item store`)
	}
}
