export { usePickerSession, snapshotSession, subscribeSession, SYNC_INTERVAL_MS } from "./usePickerSession.js"

export type { UsePickerSessionOptions } from "./usePickerSession.js"
