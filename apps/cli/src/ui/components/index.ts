export { QueryInput, splitQuery } from "./QueryInput.js"
export { ItemList, computeWindow } from "./ItemList.js"
export { StatusLine } from "./StatusLine.js"

export type { QueryInputProps, QuerySegments } from "./QueryInput.js"
export type { ItemListProps, ListWindow } from "./ItemList.js"
export type { StatusLineProps } from "./StatusLine.js"
