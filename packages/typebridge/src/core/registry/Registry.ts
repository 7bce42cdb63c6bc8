/**
 * @module typebridge/core/registry/Registry
 *
 * The explicit method registry. Services register endpoints under
 * `Service.Method` keys; the generator and the dispatcher both read from the
 * same registry value. Once frozen, no further registration is accepted.
 *
 * @example
 * ```ts
 * const program = Effect.gen(function* () {
 *   const registry = yield* Registry.make({ fieldCase: "snake" })
 *   const users = registry.service("Users")
 *   yield* users.register("Get", Endpoint.query({ request: GetUserRequest, response: User, handler }))
 * })
 * ```
 *
 * @since 0.1.0
 */

import * as Arr from "effect/Array"
import * as Effect from "effect/Effect"
import * as HashMap from "effect/HashMap"
import * as Option from "effect/Option"
import * as Order from "effect/Order"
import * as Ref from "effect/Ref"
import { RegistrationError } from "../../errors/index.js"
import { defaultWireFormat, type WireFormat } from "../descriptor/naming.js"
import type { TypeRef } from "../descriptor/types.js"
import { kindOf, verbOf, type Endpoint, type HttpVerb, type MethodKind, type Primitive } from "./Endpoint.js"

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Everything the generator needs to know about one registered method.
 *
 * @since 0.1.0
 * @category models
 */
export interface MethodDescriptor {
  readonly service: string
  readonly method: string
  /** `Service.Method` */
  readonly key: string
  /** `/Service/Method` */
  readonly path: string
  readonly kind: MethodKind
  readonly primitive: Primitive
  readonly httpMethod: HttpVerb
  readonly request: TypeRef
  readonly response: TypeRef
}

export interface RegisteredMethod {
  readonly descriptor: MethodDescriptor
  readonly endpoint: Endpoint
}

export interface ServiceRegistrar {
  readonly name: string
  readonly register: (method: string, endpoint: Endpoint) => Effect.Effect<MethodDescriptor, RegistrationError>
}

/**
 * @since 0.1.0
 * @category models
 */
export interface Registry {
  /** Field naming and optional-field style shared by codec and generator. */
  readonly wire: WireFormat
  readonly register: (
    service: string,
    method: string,
    endpoint: Endpoint,
  ) => Effect.Effect<MethodDescriptor, RegistrationError>
  readonly service: (name: string) => ServiceRegistrar
  readonly freeze: Effect.Effect<void>
  readonly isFrozen: Effect.Effect<boolean>
  /** Every registered method, sorted by key. */
  readonly methods: Effect.Effect<ReadonlyArray<MethodDescriptor>>
  readonly lookup: (key: string) => Effect.Effect<Option.Option<RegisteredMethod>>
}

interface State {
  readonly frozen: boolean
  readonly entries: HashMap.HashMap<string, RegisteredMethod>
}

const NAME_PATTERN = /^[A-Za-z][A-Za-z0-9_]*$/

export const byKey: Order.Order<MethodDescriptor> = Order.mapInput(Order.string, (d: MethodDescriptor) => d.key)

// ─────────────────────────────────────────────────────────────────────────────
// Constructor
// ─────────────────────────────────────────────────────────────────────────────

/**
 * @since 0.1.0
 * @category constructors
 */
export const make = (wire: Partial<WireFormat> = {}): Effect.Effect<Registry> =>
  Effect.map(
    Ref.make<State>({ frozen: false, entries: HashMap.empty() }),
    (state): Registry => {
      const register = (
        service: string,
        method: string,
        endpoint: Endpoint,
      ): Effect.Effect<MethodDescriptor, RegistrationError> => {
        const key = `${service}.${method}`
        if (!NAME_PATTERN.test(service) || !NAME_PATTERN.test(method)) {
          return Effect.fail(new RegistrationError({ key, reason: "InvalidName" }))
        }
        const descriptor: MethodDescriptor = {
          service,
          method,
          key,
          path: `/${service}/${method}`,
          kind: kindOf(endpoint),
          primitive: endpoint.primitive,
          httpMethod: verbOf(endpoint.primitive),
          request: endpoint.request,
          response: endpoint.response,
        }
        return Ref.modify(state, (current): [Option.Option<RegistrationError>, State] => {
          if (current.frozen) {
            return [Option.some(new RegistrationError({ key, reason: "Frozen" })), current]
          }
          if (HashMap.has(current.entries, key)) {
            return [Option.some(new RegistrationError({ key, reason: "Duplicate" })), current]
          }
          return [
            Option.none(),
            { ...current, entries: HashMap.set(current.entries, key, { descriptor, endpoint }) },
          ]
        }).pipe(
          Effect.flatMap(Option.match({
            onNone: () => Effect.succeed(descriptor),
            onSome: Effect.fail,
          })),
        )
      }

      return {
        wire: { ...defaultWireFormat, ...wire },
        register,
        service: (name) => ({
          name,
          register: (method, endpoint) => register(name, method, endpoint),
        }),
        freeze: Ref.update(state, (current) => ({ ...current, frozen: true })),
        isFrozen: Effect.map(Ref.get(state), (current) => current.frozen),
        methods: Effect.map(Ref.get(state), (current) =>
          Arr.sort(Arr.map(Arr.fromIterable(HashMap.values(current.entries)), (entry) => entry.descriptor), byKey)),
        lookup: (key) => Effect.map(Ref.get(state), (current) => HashMap.get(current.entries, key)),
      }
    },
  )
