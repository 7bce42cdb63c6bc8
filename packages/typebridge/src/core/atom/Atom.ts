/**
 * @module typebridge/core/atom/Atom
 *
 * A value cell that broadcasts every new value to its current subscribers.
 * Atoms back live-value endpoints: a handler updates the atom, every open
 * client subscription receives the result.
 *
 * - `get` never waits on writers.
 * - Writes (`update`, `updateEffect`, `set`) run one at a time; each sees the
 *   value the previous one installed.
 * - A subscriber first receives the value current when it attached, then every
 *   later value in the order the writes ran.
 * - Each subscriber owns a bounded queue whose overflow behaviour is set by
 *   {@link OverflowStrategy}. A slow subscriber never stalls writers.
 *
 * @example
 * ```ts
 * import * as Effect from "effect/Effect"
 * import * as Atom from "typebridge/atom"
 *
 * const program = Effect.gen(function* () {
 *   const counter = yield* Atom.make({ count: 0 })
 *   yield* counter.update((s) => ({ count: s.count + 1 }))
 *   return yield* counter.get
 * })
 * ```
 *
 * @since 0.1.0
 */

import * as Duration from "effect/Duration"
import * as Effect from "effect/Effect"
import * as HashMap from "effect/HashMap"
import * as Option from "effect/Option"
import * as Queue from "effect/Queue"
import * as Ref from "effect/Ref"
import type * as Scope from "effect/Scope"
import * as Stream from "effect/Stream"

// ─────────────────────────────────────────────────────────────────────────────
// Configuration
// ─────────────────────────────────────────────────────────────────────────────

/**
 * What happens when a subscriber's queue is full.
 *
 * - `sliding`: the oldest queued value is dropped.
 * - `dropping`: the new value is dropped for that subscriber.
 * - `suspend`: values wait in an unbounded inbox and are moved into the
 *   queue in order; once a move waits longer than `offerTimeout` the
 *   subscriber is evicted and its stream ends.
 *
 * @since 0.1.0
 * @category Configuration
 */
export type OverflowStrategy = "sliding" | "dropping" | "suspend"

/**
 * @since 0.1.0
 * @category Configuration
 */
export interface AtomConfig {
  /**
   * Per-subscriber queue capacity.
   * Default: 16
   */
  readonly capacity: number

  /**
   * Default: "sliding"
   */
  readonly strategy: OverflowStrategy

  /**
   * How long a `suspend` subscriber may keep its queue full before it is evicted.
   * Default: 1 second
   */
  readonly offerTimeout: Duration.DurationInput
}

/**
 * @since 0.1.0
 * @category Configuration
 */
export const defaultAtomConfig: AtomConfig = {
  capacity: 16,
  strategy: "sliding",
  offerTimeout: Duration.seconds(1),
}

// ─────────────────────────────────────────────────────────────────────────────
// Model
// ─────────────────────────────────────────────────────────────────────────────

/**
 * @since 0.1.0
 * @category models
 */
export interface Atom<A> {
  /** The current value. */
  readonly get: Effect.Effect<A>

  /** Apply a pure transition and broadcast the result. Returns the new value. */
  readonly update: (f: (current: A) => A) => Effect.Effect<A>

  /**
   * Like `update`, for transitions that can fail. A failed transition leaves
   * the value unchanged and broadcasts nothing.
   */
  readonly updateEffect: <E, R>(f: (current: A) => Effect.Effect<A, E, R>) => Effect.Effect<A, E, R>

  readonly set: (value: A) => Effect.Effect<void>

  /**
   * Attach a subscriber for the lifetime of the scope. The returned queue
   * already holds the current value. Closing the scope detaches it.
   */
  readonly subscribe: Effect.Effect<Queue.Dequeue<A>, never, Scope.Scope>

  /** A stream of the current value followed by every later one. */
  readonly changes: Stream.Stream<A>

  readonly subscriberCount: Effect.Effect<number>
}

// ─────────────────────────────────────────────────────────────────────────────
// Implementation
// ─────────────────────────────────────────────────────────────────────────────

// Writers offer to `inbox`; consumers read `queue`. They are the same queue
// unless the strategy is `suspend`.
interface Subscriber<A> {
  readonly inbox: Queue.Queue<A>
  readonly queue: Queue.Queue<A>
}

const makeQueue = <A>(config: AtomConfig): Effect.Effect<Queue.Queue<A>> => {
  switch (config.strategy) {
    case "sliding":
      return Queue.sliding<A>(config.capacity)
    case "dropping":
      return Queue.dropping<A>(config.capacity)
    case "suspend":
      return Queue.bounded<A>(config.capacity)
  }
}

/**
 * Create an atom holding `initial`.
 *
 * @since 0.1.0
 * @category constructors
 */
export const make = <A>(initial: A, config: Partial<AtomConfig> = {}): Effect.Effect<Atom<A>> =>
  Effect.gen(function* () {
    const finalConfig: AtomConfig = { ...defaultAtomConfig, ...config }
    if (!Number.isInteger(finalConfig.capacity) || finalConfig.capacity < 1) {
      return yield* Effect.dieMessage(`Atom capacity must be a positive integer, got ${finalConfig.capacity}`)
    }

    const value = yield* Ref.make(initial)
    const subscribers = yield* Ref.make(HashMap.empty<number, Subscriber<A>>())
    const nextId = yield* Ref.make(0)
    // One permit: writes and subscriber-set changes are serialized.
    const lock = yield* Effect.makeSemaphore(1)
    const suspending = finalConfig.strategy === "suspend"

    const evict = (id: number, subscriber: Subscriber<A>): Effect.Effect<void> =>
      lock.withPermits(1)(
        Ref.update(subscribers, HashMap.remove(id)).pipe(
          Effect.zipRight(Queue.shutdown(subscriber.inbox)),
          Effect.zipRight(Queue.shutdown(subscriber.queue)),
        ),
      ).pipe(
        Effect.zipRight(Effect.logWarning("Atom subscriber evicted: queue stayed full").pipe(
          Effect.annotateLogs({ subscriberId: id }),
        )),
      )

    // Moves values from the inbox to the bounded queue, outside the lock.
    const forward = (id: number, subscriber: Subscriber<A>): Effect.Effect<void> => {
      const move = Queue.take(subscriber.inbox).pipe(
        Effect.flatMap((next) => Effect.timeoutOption(Queue.offer(subscriber.queue, next), finalConfig.offerTimeout)),
      )
      return Effect.repeat(move, { while: (delivered: Option.Option<boolean>) => Option.isSome(delivered) }).pipe(
        Effect.zipRight(evict(id, subscriber)),
      )
    }

    // Runs while holding the lock, so the snapshot and the enqueue order match
    // the write order. Inbox offers never wait.
    const install = (next: A): Effect.Effect<void> =>
      Effect.gen(function* () {
        yield* Ref.set(value, next)
        const snapshot = yield* Ref.get(subscribers)
        yield* Effect.forEach(snapshot, ([, subscriber]) => Queue.offer(subscriber.inbox, next), { discard: true })
      })

    const updateEffect = <E, R>(f: (current: A) => Effect.Effect<A, E, R>): Effect.Effect<A, E, R> =>
      lock.withPermits(1)(
        Ref.get(value).pipe(
          Effect.flatMap(f),
          Effect.tap(install),
        ),
      )

    const update = (f: (current: A) => A): Effect.Effect<A> =>
      updateEffect((current) => Effect.sync(() => f(current)))

    const attach = lock.withPermits(1)(
      Effect.gen(function* () {
        const queue = yield* makeQueue<A>(finalConfig)
        yield* Queue.offer(queue, yield* Ref.get(value))
        const inbox = suspending ? yield* Queue.unbounded<A>() : queue
        const id = yield* Ref.getAndUpdate(nextId, (n) => n + 1)
        const subscriber: Subscriber<A> = { inbox, queue }
        yield* Ref.update(subscribers, HashMap.set(id, subscriber))
        return { id, subscriber } as const
      }),
    )

    const detach = ({ id, subscriber }: { readonly id: number; readonly subscriber: Subscriber<A> }) =>
      lock.withPermits(1)(
        Ref.update(subscribers, HashMap.remove(id)).pipe(
          Effect.zipRight(Queue.shutdown(subscriber.inbox)),
          Effect.zipRight(Queue.shutdown(subscriber.queue)),
        ),
      )

    const subscribe: Effect.Effect<Queue.Dequeue<A>, never, Scope.Scope> = Effect.acquireRelease(attach, detach).pipe(
      Effect.tap(({ id, subscriber }) => (suspending ? Effect.asVoid(Effect.forkScoped(forward(id, subscriber))) : Effect.void)),
      Effect.map(({ subscriber }) => subscriber.queue),
    )

    return {
      get: Ref.get(value),
      update,
      updateEffect,
      set: (next) => Effect.asVoid(update(() => next)),
      subscribe,
      changes: Stream.unwrapScoped(Effect.map(subscribe, (queue) => Stream.fromQueue(queue))),
      subscriberCount: Effect.map(Ref.get(subscribers), HashMap.size),
    }
  })
