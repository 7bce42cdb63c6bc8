/**
 * @module typebridge/core/rpc/sse
 *
 * Server-sent event framing for streaming methods. Every event carries one
 * JSON envelope on a single `data:` line; comment lines keep the connection
 * alive and are ignored by readers.
 *
 * @since 0.1.0
 */

import * as Option from "effect/Option"
import * as Stream from "effect/Stream"
import type { Envelope } from "./errors.js"

/**
 * @since 0.1.0
 */
export const contentType = "text/event-stream"

/**
 * @since 0.1.0
 */
export const heartbeat = ": heartbeat\n\n"

/**
 * Frame one envelope as an event.
 *
 * @since 0.1.0
 */
export const formatEvent = (envelope: Envelope): string => `data: ${JSON.stringify(envelope)}\n\n`

/**
 * Parser state: `data:` lines collected for the event in progress.
 *
 * @since 0.1.0
 * @category models
 */
export type ParserState = ReadonlyArray<string>

export const initialState: ParserState = []

/**
 * Feed one line (without its terminator). Returns the next state and, when
 * the line ends an event, the event's data.
 *
 * @since 0.1.0
 */
export const feedLine = (state: ParserState, line: string): readonly [ParserState, Option.Option<string>] => {
  if (line === "") {
    return state.length === 0 ? [state, Option.none()] : [initialState, Option.some(state.join("\n"))]
  }
  if (line.startsWith(":")) {
    return [state, Option.none()]
  }
  if (line === "data" || line.startsWith("data:")) {
    const value = line.slice(5)
    return [[...state, value.startsWith(" ") ? value.slice(1) : value], Option.none()]
  }
  // `event:`, `id:` and `retry:` carry nothing we use.
  return [state, Option.none()]
}

/**
 * Turn a stream of lines into a stream of event data payloads. A trailing
 * event without its blank line is dropped.
 *
 * @since 0.1.0
 */
export const events = <E, R>(lines: Stream.Stream<string, E, R>): Stream.Stream<string, E, R> =>
  lines.pipe(
    Stream.mapAccum(initialState, feedLine),
    Stream.filterMap((data) => data),
  )

/**
 * Parse a complete SSE body. Used by tests and in-process transports.
 *
 * @since 0.1.0
 */
export const parseAll = (body: string): ReadonlyArray<string> => {
  let state = initialState
  const out: Array<string> = []
  for (const line of body.split(/\r?\n/)) {
    const [next, data] = feedLine(state, line)
    state = next
    if (Option.isSome(data)) {
      out.push(data.value)
    }
  }
  return out
}
