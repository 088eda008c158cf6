import { useMemo } from "react"
import { Box, Text } from "ink"

import type { ItemView } from "@linepick/types"

import * as theme from "../utils/theme.js"

export interface ListWindow {
	offset: number
	end: number
}

/**
 * Rows to draw so the highlighted one stays visible, centred when the list
 * is long enough.
 */
export function computeWindow(total: number, highlightedIndex: number, maxVisible: number): ListWindow {
	if (total <= maxVisible) {
		return { offset: 0, end: total }
	}

	const idealOffset = Math.max(0, highlightedIndex - Math.floor(maxVisible / 2))
	const offset = Math.min(idealOffset, total - maxVisible)

	return { offset, end: offset + maxVisible }
}

export interface ItemListProps {
	items: ItemView[]
	highlightedId: number | null
	markedIds?: readonly number[]
	maxVisible?: number
	emptyMessage?: string
}

export function ItemList({
	items,
	highlightedId,
	markedIds = [],
	maxVisible = 10,
	emptyMessage = "No matching items",
}: ItemListProps) {
	const highlightedIndex = items.findIndex((item) => item.position === highlightedId)

	const { offset, end } = useMemo(
		() => computeWindow(items.length, Math.max(0, highlightedIndex), maxVisible),
		[items.length, highlightedIndex, maxVisible],
	)

	if (items.length === 0) {
		return (
			<Box paddingLeft={2}>
				<Text dimColor>{emptyMessage}</Text>
			</Box>
		)
	}

	const marked = new Set(markedIds)

	return (
		<Box flexDirection="column">
			{offset > 0 && (
				<Box paddingLeft={2}>
					<Text color={theme.scrollHintColor}>↑ {offset} more</Text>
				</Box>
			)}
			{items.slice(offset, end).map((item) => {
				const isHighlighted = item.position === highlightedId
				const isMarked = marked.has(item.position)

				return (
					<Box key={item.position}>
						<Text color={theme.highlightColor}>{isHighlighted ? "›" : " "}</Text>
						<Text color={theme.markedColor}>{isMarked ? "●" : " "}</Text>
						<Text color={isHighlighted ? theme.highlightColor : theme.itemText} bold={isHighlighted}>
							{item.text}
						</Text>
					</Box>
				)
			})}
			{end < items.length && (
				<Box paddingLeft={2}>
					<Text color={theme.scrollHintColor}>↓ {items.length - end} more</Text>
				</Box>
			)}
		</Box>
	)
}
