/**
 * @module typebridge/generator/resolve
 *
 * Collision Resolver. Gives every discovered type its emitted name.
 *
 * With strip prefix `P`:
 * 1. a type declared in module `P` keeps its declared name;
 * 2. a type declared under `P/rest` is named `rest_Name`;
 * 3. any other type is named after its full module path, `path_Name`.
 *
 * Module paths are sanitized (`/`, `.`, `-` and the like become `_`). Two
 * types that still end up with the same name fail generation; nothing is
 * renamed behind the user's back.
 *
 * @since 0.1.0
 */

import * as Either from "effect/Either"
import { formatOrigin, originKey, type Origin } from "../core/descriptor/types.js"
import { CollisionError } from "../errors/index.js"
import type { TypeNode } from "./extract.js"
import { escapeReserved, sanitize } from "./identifier.js"

/**
 * @since 0.1.0
 * @category models
 */
export interface ResolvedNames {
  readonly nameOf: (origin: Origin) => string
}

/**
 * Trailing separators are ignored, so `pkg/api/` and `pkg/api` mean the same.
 */
export const normalizePrefix = (prefix: string): string => prefix.replace(/\/+$/, "")

/**
 * The name a type would get, before collisions are checked.
 *
 * @since 0.1.0
 */
export const candidateName = (origin: Origin, stripPrefix: string): string => {
  const prefix = normalizePrefix(stripPrefix)
  const name = sanitize(origin.name)
  if (prefix !== "" && origin.module === prefix) {
    return escapeReserved(name)
  }
  const qualifier = prefix !== "" && origin.module.startsWith(`${prefix}/`)
    ? sanitize(origin.module.slice(prefix.length + 1))
    : sanitize(origin.module)
  return qualifier === "" ? escapeReserved(name) : `${qualifier}_${name}`
}

/**
 * Resolve every node. `nodes` must be in canonical order (see `byOrigin`),
 * which fixes which origin is reported first in a collision.
 *
 * @since 0.1.0
 */
export const resolve = (
  nodes: ReadonlyArray<TypeNode>,
  stripPrefix: string,
): Either.Either<ResolvedNames, CollisionError> => {
  const byName = new Map<string, Origin>()
  const byOrigin = new Map<string, string>()
  for (const node of nodes) {
    const name = candidateName(node.origin, stripPrefix)
    const taken = byName.get(name)
    if (taken !== undefined) {
      return Either.left(new CollisionError({ name, first: formatOrigin(taken), second: formatOrigin(node.origin) }))
    }
    byName.set(name, node.origin)
    byOrigin.set(node.key, name)
  }
  return Either.right({
    nameOf: (origin) => byOrigin.get(originKey(origin)) ?? candidateName(origin, stripPrefix),
  })
}
