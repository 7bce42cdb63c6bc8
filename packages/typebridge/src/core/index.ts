/**
 * @module typebridge/core
 */

export * as Atom from "./atom/Atom.js"
export type { AtomConfig, OverflowStrategy } from "./atom/Atom.js"
export * from "./descriptor/index.js"
export * from "./registry/index.js"
export * from "./rpc/index.js"
export * from "./server/index.js"
