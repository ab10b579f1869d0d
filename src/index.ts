/**
 * @since 0.1.0
 */
export * from "./Errors.js"
export * from "./Types.js"
export * from "./Units.js"
export * from "./Backend.js"
export * from "./Quantity.js"
export * from "./Precedence.js"
export * from "./Operations.js"
export * from "./Settings.js"
export * from "./Dispatcher.js"
export { defaultOperationTable } from "./internal/operations/index.js"
