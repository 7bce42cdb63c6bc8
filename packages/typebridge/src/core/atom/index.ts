/**
 * @module typebridge/core/atom
 */

export * from "./Atom.js"
