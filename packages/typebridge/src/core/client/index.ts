/**
 * @module typebridge/client
 *
 * Runtime for generated clients. Generated `client.ts` files import from
 * here.
 *
 * @since 0.1.0
 */

export * as ClientRuntime from "./ClientRuntime.js"
export type { LiveHandle, ServiceRegistry } from "./ClientRuntime.js"
export * as HttpTransport from "./HttpTransport.js"
export { Transport } from "./Transport.js"
export type { MethodMeta, TransportService } from "./Transport.js"
export { isClientError, isRpcError, isTransportError, RpcError, TransportError } from "../rpc/errors.js"
export type { ClientError, ErrorCode, ErrorDetails } from "../rpc/errors.js"
