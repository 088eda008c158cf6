import { Box, Text } from "ink"

import { type QueryState, hasSelection } from "@linepick/types"

import * as theme from "../utils/theme.js"

export interface QuerySegments {
	before: string
	/** Selected text, or the character under the caret */
	marked: string
	after: string
}

/**
 * Split the query around the selection. Without a selection the caret is
 * drawn as an inverted cell, a space when it sits at the end.
 */
export function splitQuery(query: QueryState): QuerySegments {
	const { text } = query

	if (hasSelection(query)) {
		return {
			before: text.slice(0, query.selectionStart),
			marked: text.slice(query.selectionStart, query.selectionEnd),
			after: text.slice(query.selectionEnd),
		}
	}

	const caret = text.slice(query.cursor, query.cursor + 1)

	return {
		before: text.slice(0, query.cursor),
		marked: caret === "" ? " " : caret,
		after: text.slice(query.cursor + 1),
	}
}

export interface QueryInputProps {
	query: QueryState
	prompt: string
}

export function QueryInput({ query, prompt }: QueryInputProps) {
	const { before, marked, after } = splitQuery(query)

	return (
		<Box>
			<Text color={theme.promptColor}>{prompt}</Text>
			<Text color={theme.queryText}>
				{before}
				<Text inverse>{marked}</Text>
				{after}
			</Text>
		</Box>
	)
}
