/**
 * @module typebridge/core/client/Transport
 *
 * The seam between generated clients and the network. A transport receives
 * wire-shaped requests and returns wire-shaped results; envelope handling and
 * error mapping live behind it.
 *
 * @since 0.1.0
 */

import * as Context from "effect/Context"
import type * as Effect from "effect/Effect"
import type * as Stream from "effect/Stream"
import type { HttpVerb, MethodKind, Primitive } from "../registry/Endpoint.js"
import type { ClientError } from "../rpc/errors.js"

/**
 * Routing metadata for one method, as emitted in the generated manifest.
 *
 * @since 0.1.0
 * @category models
 */
export interface MethodMeta {
  readonly path: string
  readonly httpMethod: HttpVerb
  readonly kind: MethodKind
  readonly primitive?: Primitive
}

/**
 * @since 0.1.0
 * @category models
 */
export interface TransportService {
  readonly call: (key: string, meta: MethodMeta, request: unknown) => Effect.Effect<unknown, ClientError>
  readonly live: (key: string, meta: MethodMeta, request: unknown) => Stream.Stream<unknown, ClientError>
}

/**
 * @since 0.1.0
 * @category tags
 */
export class Transport extends Context.Tag("typebridge/Transport")<Transport, TransportService>() {}
