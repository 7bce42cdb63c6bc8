/**
 * @module typebridge
 *
 * Typed clients from an explicit method registry.
 *
 * @example
 * ```ts
 * import { Effect } from "effect"
 * import { Endpoint, Generator, Registry, T } from "typebridge"
 *
 * const User: T.Struct = T.struct({ module: "acme/api", name: "User" }, () => [
 *   T.field("id", T.int),
 *   T.field("name", T.string),
 * ])
 * const GetUserRequest = T.struct({ module: "acme/api", name: "GetUserRequest" }, () => [
 *   T.field("id", T.int),
 * ])
 *
 * const program = Effect.gen(function* () {
 *   const registry = yield* Registry.make()
 *   yield* registry.service("Users").register(
 *     "Get",
 *     Endpoint.query<{ id: number }, { id: number; name: string }>({
 *       request: GetUserRequest,
 *       response: User,
 *       handler: ({ id }) => Effect.succeed({ id, name: "Ada" }),
 *     }),
 *   )
 *   return yield* Generator.fromRegistry(registry).stripPrefix("acme/api").generate()
 * })
 * ```
 */

// ─────────────────────────────────────────────────────────────────────────────
// Core
// ─────────────────────────────────────────────────────────────────────────────

export * from "./core/index.js"

// ─────────────────────────────────────────────────────────────────────────────
// Generator
// ─────────────────────────────────────────────────────────────────────────────

export {
  generate,
  generateToDir,
  Generator,
  writeFiles,
  type GeneratedFile,
  type GenerateResult,
} from "./generator/generate.js"

export {
  EnumStyle,
  Flavor,
  GeneratorConfigSchema,
  ImportExtension,
  resolveConfig,
  type GeneratorConfig,
  type GeneratorOptions,
} from "./generator/config.js"

export type { GenerationWarning } from "./generator/emit/declarations.js"
export type { DiscoveryDocument } from "./generator/emit/manifest.js"
export type { TypeGraph, TypeNode } from "./generator/extract.js"

// ─────────────────────────────────────────────────────────────────────────────
// Errors
// ─────────────────────────────────────────────────────────────────────────────

export {
  CollisionError,
  ConfigurationError,
  ExtractionError,
  isCollisionError,
  isConfigurationError,
  isExtractionError,
  isGenerationError,
  isRegistrationError,
  RegistrationError,
  TypeId as GenerationErrorTypeId,
  type GenerationError,
} from "./errors/index.js"

// ─────────────────────────────────────────────────────────────────────────────
// Logging
// ─────────────────────────────────────────────────────────────────────────────

export {
  type BridgeLogEvent,
  type BridgeLoggerConfig,
  type BridgeLoggerService,
  type LogCategory,
  BridgeLogger,
  BridgeLoggerDev,
  BridgeLoggerLive,
  BridgeLoggerSilent,
  defaultConfig as defaultLoggerConfig,
  generateRequestId,
  logCall,
  logEvent,
  makeBridgeLoggerLayer,
  redactSensitiveData,
} from "./shared/logging.js"
