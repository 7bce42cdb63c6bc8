/**
 * @module typebridge/core/descriptor
 */

export * from "./types.js"
export * from "./naming.js"
export * as T from "./constructors.js"
export * as Wire from "./wire.js"
