/**
 * @module typebridge/core/rpc
 *
 * Wire contract: envelopes, error codes, query strings and event framing.
 */

export * from "./errors.js"
export * as Query from "./query.js"
export * as Sse from "./sse.js"
