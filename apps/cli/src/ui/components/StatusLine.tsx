import { Box, Text } from "ink"

import * as theme from "../utils/theme.js"

export interface StatusLineProps {
	visibleCount: number
	totalCount: number
	inputComplete: boolean
	markedCount?: number
}

export function StatusLine({ visibleCount, totalCount, inputComplete, markedCount = 0 }: StatusLineProps) {
	return (
		<Box>
			<Text color={theme.countText}>
				{visibleCount}/{totalCount}
			</Text>
			{!inputComplete && <Text color={theme.loadingColor}> reading…</Text>}
			{markedCount > 0 && <Text color={theme.markedColor}> ({markedCount} marked)</Text>}
		</Box>
	)
}
