/**
 * @module typebridge/core/registry
 */

export * as Endpoint from "./Endpoint.js"
export type { Endpoint as AnyEndpoint, HttpVerb, MethodKind, Primitive, StreamingEndpoint, UnaryEndpoint } from "./Endpoint.js"
export * as Registry from "./Registry.js"
export type { MethodDescriptor, RegisteredMethod, Registry as MethodRegistry, ServiceRegistrar } from "./Registry.js"
