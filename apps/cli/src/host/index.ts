export { StreamSource } from "./stream-source.js"
export { openTerminalInput, TERMINAL_DEVICE } from "./terminal.js"

export type { IngestionSink, StreamSourceOptions } from "./stream-source.js"
