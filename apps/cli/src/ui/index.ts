export { App } from "./App.js"
export { createPickerStore, createStoreQueryAccessor } from "./store.js"
export { handleKey } from "./keymap.js"

export type { AppProps } from "./App.js"
export type { PickerStore, PickerStoreState, SessionSnapshot } from "./store.js"
export type { KeyAction, KeyPress, KeymapContext } from "./keymap.js"
