/**
 * @module typebridge/errors
 *
 * Generation-time errors, following the Schema.TaggedError pattern.
 * Every error in this module is fatal to the generation run it occurs in:
 * nothing is written when one is raised.
 *
 * - {@link ExtractionError} an unsupported or opaque type is reachable from a method
 * - {@link CollisionError} two origins resolve to the same emitted name
 * - {@link ConfigurationError} invalid option values or combinations
 * - {@link RegistrationError} a method cannot be added to the registry
 */

import * as Schema from "effect/Schema"
import * as Predicate from "effect/Predicate"

// ─────────────────────────────────────────────────────────────────────────────
// Type Identification
// ─────────────────────────────────────────────────────────────────────────────

export const TypeId: unique symbol = Symbol.for("typebridge/GenerationError")
export type TypeId = typeof TypeId

export const isGenerationError = (u: unknown): u is GenerationError =>
  Predicate.hasProperty(u, TypeId)

// ─────────────────────────────────────────────────────────────────────────────
// Extraction Error
// ─────────────────────────────────────────────────────────────────────────────

/**
 * A type reachable from a registered method cannot be represented on the wire.
 *
 * `path` is the chain from the method to the offending type, e.g.
 * `Users.Create.request.profile.onChange`.
 *
 * @since 0.1.0
 * @category errors
 */
export class ExtractionError extends Schema.TaggedError<ExtractionError>()(
  "ExtractionError",
  {
    path: Schema.String,
    reason: Schema.String,
  },
) {
  readonly [TypeId]: TypeId = TypeId

  override get message(): string {
    return `Cannot extract ${this.path}: ${this.reason}`
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Collision Error
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Two distinct origin types were assigned the same emitted name.
 *
 * @since 0.1.0
 * @category errors
 */
export class CollisionError extends Schema.TaggedError<CollisionError>()(
  "CollisionError",
  {
    name: Schema.String,
    first: Schema.String,
    second: Schema.String,
  },
) {
  readonly [TypeId]: TypeId = TypeId

  override get message(): string {
    return `Type name "${this.name}" is produced by both ${this.first} and ${this.second}; adjust the strip prefix or rename one of them`
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Configuration Error
// ─────────────────────────────────────────────────────────────────────────────

/**
 * @since 0.1.0
 * @category errors
 */
export class ConfigurationError extends Schema.TaggedError<ConfigurationError>()(
  "ConfigurationError",
  {
    option: Schema.String,
    reason: Schema.String,
  },
) {
  readonly [TypeId]: TypeId = TypeId

  override get message(): string {
    return `Invalid generator option "${this.option}": ${this.reason}`
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Registration Error
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Raised when a method is registered twice, under an invalid name, or after
 * the registry was frozen.
 *
 * @since 0.1.0
 * @category errors
 */
export class RegistrationError extends Schema.TaggedError<RegistrationError>()(
  "RegistrationError",
  {
    key: Schema.String,
    reason: Schema.Literal("Duplicate", "InvalidName", "Frozen"),
  },
) {
  readonly [TypeId]: TypeId = TypeId

  override get message(): string {
    switch (this.reason) {
      case "Duplicate":
        return `Method ${this.key} is already registered`
      case "InvalidName":
        return `Method ${this.key} must be named Service.Method with identifier segments`
      case "Frozen":
        return `Cannot register ${this.key}: the registry is frozen`
    }
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Union Type
// ─────────────────────────────────────────────────────────────────────────────

/**
 * @since 0.1.0
 * @category errors
 */
export type GenerationError =
  | ExtractionError
  | CollisionError
  | ConfigurationError
  | RegistrationError

export const isExtractionError = (u: unknown): u is ExtractionError =>
  Predicate.isTagged(u, "ExtractionError") && isGenerationError(u)

export const isCollisionError = (u: unknown): u is CollisionError =>
  Predicate.isTagged(u, "CollisionError") && isGenerationError(u)

export const isConfigurationError = (u: unknown): u is ConfigurationError =>
  Predicate.isTagged(u, "ConfigurationError") && isGenerationError(u)

export const isRegistrationError = (u: unknown): u is RegistrationError =>
  Predicate.isTagged(u, "RegistrationError") && isGenerationError(u)
