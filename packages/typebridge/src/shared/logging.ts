/**
 * @module shared/logging
 *
 * Structured logging for typebridge.
 *
 * - **Generation**: start, completion with file counts and timing, warnings,
 *   failures
 * - **Calls**: unary dispatch lifecycle with timing
 * - **Live**: streaming subscription lifecycle
 *
 * Components look the logger up with `Effect.serviceOption`, so nothing is
 * logged unless a layer is provided.
 *
 * ## Quick Start
 *
 * ```typescript
 * import { Effect, Logger } from "effect"
 * import { BridgeLoggerDev } from "typebridge"
 *
 * const program = generate(registry, { outDir: "src/gen" }).pipe(
 *   Effect.provide(BridgeLoggerDev),
 *   Effect.provide(Logger.pretty),
 * )
 * ```
 *
 * @since 0.1.0
 */

import * as Clock from "effect/Clock"
import * as Context from "effect/Context"
import * as Effect from "effect/Effect"
import * as Layer from "effect/Layer"
import * as LogLevel from "effect/LogLevel"
import * as Option from "effect/Option"
import * as Predicate from "effect/Predicate"

// ─────────────────────────────────────────────────────────────────────────────
// Configuration Types
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Log categories that can be individually enabled/disabled.
 *
 * @since 0.1.0
 */
export type LogCategory = "generate" | "call" | "live"

/**
 * @since 0.1.0
 */
export interface BridgeLoggerConfig {
  /**
   * Minimum log level. Logs below this level are filtered.
   * @default LogLevel.Info
   */
  readonly level: LogLevel.LogLevel

  /**
   * Whether to include request payloads in call logs.
   * @default true outside production
   */
  readonly includeInput: boolean

  /**
   * Whether to include response payloads in call logs.
   * @default false
   */
  readonly includeOutput: boolean

  /**
   * Keys whose values are replaced with "[REDACTED]". Matched
   * case-insensitively as substrings.
   */
  readonly redactFields: ReadonlyArray<string>

  /** @default 3 */
  readonly maxDepth: number

  /** @default 200 */
  readonly maxStringLength: number

  /**
   * Categories to enable. Empty means all enabled.
   * @default []
   */
  readonly enabledCategories: ReadonlyArray<LogCategory>

  /**
   * Categories to disable. Takes precedence over enabledCategories.
   * @default []
   */
  readonly disabledCategories: ReadonlyArray<LogCategory>
}

/**
 * @since 0.1.0
 */
export const defaultConfig: BridgeLoggerConfig = {
  level: LogLevel.Info,
  includeInput: process.env["NODE_ENV"] !== "production",
  includeOutput: false,
  redactFields: ["password", "token", "secret", "apiKey", "authorization", "cookie"],
  maxDepth: 3,
  maxStringLength: 200,
  enabledCategories: [],
  disabledCategories: [],
}

// ─────────────────────────────────────────────────────────────────────────────
// Events
// ─────────────────────────────────────────────────────────────────────────────

/**
 * @since 0.1.0
 */
export type BridgeLogEvent =
  | GenerateStartEvent
  | GenerateCompleteEvent
  | GenerateWarningEvent
  | GenerateFailedEvent
  | CallStartEvent
  | CallSuccessEvent
  | CallErrorEvent
  | LiveStartEvent
  | LiveEndEvent

interface GenerateStartEvent {
  readonly _tag: "GenerateStart"
  readonly methods: number
}

interface GenerateCompleteEvent {
  readonly _tag: "GenerateComplete"
  readonly files: ReadonlyArray<string>
  readonly types: number
  readonly durationMs: number
}

interface GenerateWarningEvent {
  readonly _tag: "GenerateWarning"
  readonly code: string
  readonly message: string
}

interface GenerateFailedEvent {
  readonly _tag: "GenerateFailed"
  readonly error: unknown
}

interface CallStartEvent {
  readonly _tag: "CallStart"
  readonly method: string
  readonly input: unknown
  readonly requestId: string
}

interface CallSuccessEvent {
  readonly _tag: "CallSuccess"
  readonly method: string
  readonly output: unknown
  readonly durationMs: number
  readonly requestId: string
}

interface CallErrorEvent {
  readonly _tag: "CallError"
  readonly method: string
  readonly error: unknown
  readonly durationMs: number
  readonly requestId: string
}

interface LiveStartEvent {
  readonly _tag: "LiveStart"
  readonly method: string
  readonly subscriptionId: string
}

interface LiveEndEvent {
  readonly _tag: "LiveEnd"
  readonly method: string
  readonly subscriptionId: string
  readonly messages: number
  readonly durationMs: number
  readonly reason: "complete" | "interrupted" | "error"
}

/**
 * @since 0.1.0
 */
export interface BridgeLoggerService {
  readonly log: (event: BridgeLogEvent) => Effect.Effect<void>

  /**
   * Log a unary call around `effect` (start, then success or error).
   */
  readonly logCall: <A, E, R>(
    method: string,
    input: unknown,
    effect: Effect.Effect<A, E, R>,
  ) => Effect.Effect<A, E, R>

  readonly getConfig: () => Effect.Effect<BridgeLoggerConfig>
}

/**
 * @since 0.1.0
 */
export class BridgeLogger extends Context.Tag("typebridge/BridgeLogger")<BridgeLogger, BridgeLoggerService>() {}

// ─────────────────────────────────────────────────────────────────────────────
// Data Sanitization
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Redact sensitive fields and truncate long values.
 *
 * @since 0.1.0
 */
export const redactSensitiveData = (
  data: unknown,
  redactFields: ReadonlyArray<string>,
  maxDepth: number,
  maxStringLength: number,
  currentDepth = 0,
): unknown => {
  if (currentDepth >= maxDepth) {
    return "[MAX_DEPTH]"
  }
  if (data === null || data === undefined || typeof data === "number" || typeof data === "boolean") {
    return data
  }
  if (typeof data === "string") {
    return data.length > maxStringLength
      ? data.slice(0, maxStringLength) + `... [truncated ${data.length - maxStringLength} chars]`
      : data
  }
  if (typeof data === "bigint") {
    return data.toString() + "n"
  }
  if (Array.isArray(data)) {
    const items = data.length > 100 ? data.slice(0, 10) : data
    const redacted = items.map((item) => redactSensitiveData(item, redactFields, maxDepth, maxStringLength, currentDepth + 1))
    return data.length > 100 ? [...redacted, `... [${data.length - 10} more items]`] : redacted
  }
  if (Predicate.isRecord(data)) {
    const result: Record<string, unknown> = {}
    for (const [key, value] of Object.entries(data)) {
      const lowerKey = key.toLowerCase()
      result[key] = redactFields.some((field) => lowerKey.includes(field.toLowerCase()))
        ? "[REDACTED]"
        : redactSensitiveData(value, redactFields, maxDepth, maxStringLength, currentDepth + 1)
    }
    return result
  }
  if (typeof data === "function") {
    return `[Function: ${data.name || "anonymous"}]`
  }
  return `[${typeof data}]`
}

// ─────────────────────────────────────────────────────────────────────────────
// Request ID Generation
// ─────────────────────────────────────────────────────────────────────────────

let requestCounter = 0

/**
 * Generate a unique request ID for tracing.
 *
 * @since 0.1.0
 */
export const generateRequestId = (): string => {
  const timestamp = Date.now().toString(36)
  const counter = (requestCounter++).toString(36).padStart(4, "0")
  if (requestCounter >= 0x7fffffff) requestCounter = 0
  return `${timestamp}-${counter}`
}

// ─────────────────────────────────────────────────────────────────────────────
// Event Formatting
// ─────────────────────────────────────────────────────────────────────────────

export const categoryFromEvent = (event: BridgeLogEvent): LogCategory => {
  switch (event._tag) {
    case "GenerateStart":
    case "GenerateComplete":
    case "GenerateWarning":
    case "GenerateFailed":
      return "generate"
    case "CallStart":
    case "CallSuccess":
    case "CallError":
      return "call"
    case "LiveStart":
    case "LiveEnd":
      return "live"
  }
}

export const levelFromEvent = (event: BridgeLogEvent): LogLevel.LogLevel => {
  switch (event._tag) {
    case "GenerateFailed":
    case "CallError":
      return LogLevel.Error
    case "GenerateWarning":
      return LogLevel.Warning
    case "CallStart":
    case "LiveStart":
      return LogLevel.Debug
    case "LiveEnd":
      return event.reason === "error" ? LogLevel.Error : LogLevel.Info
    default:
      return LogLevel.Info
  }
}

export const formatEventMessage = (event: BridgeLogEvent): string => {
  switch (event._tag) {
    case "GenerateStart":
      return `Generating client for ${event.methods} methods`
    case "GenerateComplete":
      return `Generated ${event.files.length} files, ${event.types} types (${event.durationMs}ms)`
    case "GenerateWarning":
      return `[${event.code}] ${event.message}`
    case "GenerateFailed":
      return "Generation failed"
    case "CallStart":
      return `Call ${event.method}`
    case "CallSuccess":
      return `Call ${event.method} ok (${event.durationMs}ms)`
    case "CallError":
      return `Call ${event.method} failed (${event.durationMs}ms)`
    case "LiveStart":
      return `Live ${event.method} subscribed [${event.subscriptionId}]`
    case "LiveEnd":
      return `Live ${event.method} ended (${event.reason}, ${event.messages} msgs, ${event.durationMs}ms)`
  }
}

const eventToAnnotations = (event: BridgeLogEvent, config: BridgeLoggerConfig): Record<string, unknown> => {
  const redact = (data: unknown) =>
    redactSensitiveData(data, config.redactFields, config.maxDepth, config.maxStringLength)
  const base = {
    category: categoryFromEvent(event),
    eventType: event._tag,
  }

  switch (event._tag) {
    case "GenerateStart":
      return { ...base, methods: event.methods }
    case "GenerateComplete":
      return { ...base, files: event.files, types: event.types, durationMs: event.durationMs }
    case "GenerateWarning":
      return { ...base, code: event.code }
    case "GenerateFailed":
      return { ...base, error: redact(event.error) }
    case "CallStart":
      return {
        ...base,
        ...(config.includeInput ? { input: redact(event.input) } : {}),
        method: event.method,
        requestId: event.requestId,
      }
    case "CallSuccess":
      return {
        ...base,
        ...(config.includeOutput ? { output: redact(event.output) } : {}),
        method: event.method,
        requestId: event.requestId,
        durationMs: event.durationMs,
      }
    case "CallError":
      return {
        ...base,
        error: redact(event.error),
        method: event.method,
        requestId: event.requestId,
        durationMs: event.durationMs,
      }
    case "LiveStart":
      return { ...base, method: event.method, subscriptionId: event.subscriptionId }
    case "LiveEnd":
      return {
        ...base,
        method: event.method,
        subscriptionId: event.subscriptionId,
        messages: event.messages,
        durationMs: event.durationMs,
        reason: event.reason,
      }
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Service Implementation
// ─────────────────────────────────────────────────────────────────────────────

const makeBridgeLoggerService = (config: BridgeLoggerConfig): BridgeLoggerService => {
  const isCategoryEnabled = (category: LogCategory): boolean => {
    if (config.disabledCategories.includes(category)) {
      return false
    }
    return config.enabledCategories.length === 0 || config.enabledCategories.includes(category)
  }

  const logEvent = (event: BridgeLogEvent): Effect.Effect<void> => {
    if (!isCategoryEnabled(categoryFromEvent(event))) {
      return Effect.void
    }
    const eventLevel = levelFromEvent(event)
    if (LogLevel.lessThan(eventLevel, config.level)) {
      return Effect.void
    }
    const message = formatEventMessage(event)
    const logEffect = eventLevel === LogLevel.Error
      ? Effect.logError(message)
      : eventLevel === LogLevel.Warning
      ? Effect.logWarning(message)
      : eventLevel === LogLevel.Debug
      ? Effect.logDebug(message)
      : Effect.logInfo(message)
    return logEffect.pipe(Effect.annotateLogs(eventToAnnotations(event, config)))
  }

  return {
    log: logEvent,

    logCall: (method, input, effect) =>
      Effect.flatMap(Clock.currentTimeMillis, (startTime) => {
        const requestId = generateRequestId()
        return logEvent({ _tag: "CallStart", method, input, requestId }).pipe(
          Effect.zipRight(Effect.exit(effect)),
          Effect.flatMap((exit) =>
            Effect.flatMap(Clock.currentTimeMillis, (endTime) => {
              const durationMs = Number(endTime - startTime)
              return exit._tag === "Success"
                ? Effect.as(logEvent({ _tag: "CallSuccess", method, output: exit.value, durationMs, requestId }), exit.value)
                : Effect.zipRight(
                  logEvent({ _tag: "CallError", method, error: exit.cause, durationMs, requestId }),
                  Effect.failCause(exit.cause),
                )
            })
          ),
        )
      }),

    getConfig: () => Effect.succeed(config),
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Layers
// ─────────────────────────────────────────────────────────────────────────────

/**
 * @since 0.1.0
 */
export const makeBridgeLoggerLayer = (config: Partial<BridgeLoggerConfig> = {}): Layer.Layer<BridgeLogger> =>
  Layer.succeed(BridgeLogger, makeBridgeLoggerService({ ...defaultConfig, ...config }))

/**
 * @since 0.1.0
 */
export const BridgeLoggerLive: Layer.Layer<BridgeLogger> = makeBridgeLoggerLayer()

/**
 * Verbose output, including payloads.
 *
 * @since 0.1.0
 */
export const BridgeLoggerDev: Layer.Layer<BridgeLogger> = makeBridgeLoggerLayer({
  level: LogLevel.Debug,
  includeInput: true,
  includeOutput: true,
})

/**
 * Logs nothing. Useful for testing.
 *
 * @since 0.1.0
 */
export const BridgeLoggerSilent: Layer.Layer<BridgeLogger> = makeBridgeLoggerLayer({
  level: LogLevel.None,
})

// ─────────────────────────────────────────────────────────────────────────────
// Convenience Functions
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Log `event` if a BridgeLogger is provided.
 *
 * @since 0.1.0
 */
export const logEvent = (event: BridgeLogEvent): Effect.Effect<void> =>
  Effect.flatMap(Effect.serviceOption(BridgeLogger), (logger) =>
    Option.isSome(logger) ? logger.value.log(event) : Effect.void)

/**
 * Wrap a call in CallStart/CallSuccess/CallError events if a BridgeLogger is
 * provided.
 *
 * @since 0.1.0
 */
export const logCall = <A, E, R>(method: string, input: unknown, effect: Effect.Effect<A, E, R>): Effect.Effect<A, E, R> =>
  Effect.flatMap(Effect.serviceOption(BridgeLogger), (logger) =>
    Option.isSome(logger) ? logger.value.logCall(method, input, effect) : effect)
