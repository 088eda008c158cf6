export * from "./completion-engine.js"
export * from "./engine-state.js"
export * from "./errors.js"
export * from "./filter-engine.js"
export * from "./ingestion-pipeline.js"
export * from "./interfaces.js"
export * from "./item-store.js"
export * from "./natural-order.js"
export * from "./picker-session.js"
export * from "./query.js"
export * from "./scheduler.js"
export * from "./selection-merger.js"
export * from "./token-matcher.js"
