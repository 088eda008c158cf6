/**
 * Theme configuration for the linepick TUI
 * Using Catppuccin Mocha color scheme
 */

// Catppuccin Mocha palette (the subset the picker draws with)
const catppuccin = {
	red: "#f38ba8",
	peach: "#fab387",
	green: "#a6e3a1",
	blue: "#89b4fa",
	mauve: "#cba6f7",
	lavender: "#b4befe",

	text: "#cdd6f4",
	subtext0: "#a6adc8",
	overlay1: "#7f849c",
	overlay0: "#6c7086",
}

// Query line
export const promptColor = catppuccin.blue
export const queryText = catppuccin.text

// Item list
export const itemText = catppuccin.text
export const highlightColor = catppuccin.lavender // Highlighted row
export const markedColor = catppuccin.mauve // Marked rows in multi-select
export const scrollHintColor = catppuccin.overlay0

// Status line
export const dimText = catppuccin.overlay1
export const countText = catppuccin.subtext0
export const loadingColor = catppuccin.peach
export const successColor = catppuccin.green
export const errorColor = catppuccin.red
