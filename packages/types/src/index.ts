export * from "./picker.js"
export * from "./picker-config.js"
