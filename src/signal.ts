/**
 * cuekit Signals
 * ==============
 *
 * Multi-subscriber notification with per-subscriber delivery modes. Every
 * change made to a property object leaves through a `Signal`; UI code and
 * persistence layers connect to those signals instead of polling.
 *
 * --- DELIVERY MODES ---
 * - `Connection.Direct`: the subscriber runs synchronously inside `emit`.
 * - `Connection.Async`: the subscriber runs on the microtask queue.
 * - `Connection.Queued(context)`: the delivery is posted to a
 *   `DispatchContext` (for example the `TaskQueue` pumped by a UI loop) and
 *   runs when that context gets to it.
 *
 * A subscriber that throws never stops delivery to the others; the failure is
 * handed to the error channel configured with `configure({ onError })`.
 *
 * --- ACTIVE CONTEXT ---
 * `TaskQueue.run` makes a queue the active dispatch context (tracked with
 * `unctx`). `Connection.Queued()` without an argument binds to whichever queue
 * is active when the subscriber connects, so code running on a UI queue gets
 * its notifications delivered back on that queue.
 */

import { getContext } from 'unctx'
import { reportSignalError } from './errors'

// =============================================================================
// TYPES
// =============================================================================

/**
 * A subscriber callback.
 * @template TArgs The argument tuple carried by the signal.
 */
export type Slot<TArgs extends unknown[]> = (...args: TArgs) => void

/**
 * An execution context able to run deliveries later.
 */
export interface DispatchContext {
  post(task: () => void): void
}

export type ConnectionKind = 'direct' | 'async' | 'queued'

export type ConnectionMode =
  | { readonly kind: 'direct' }
  | { readonly kind: 'async' | 'queued'; readonly context: DispatchContext }

/**
 * Handle returned by `Signal.connect`.
 */
export interface Subscription {
  /** False once the subscription has been removed (or a `once` subscriber has fired). */
  readonly connected: boolean
  disconnect(): void
}

// =============================================================================
// DISPATCH CONTEXTS
// =============================================================================

const dispatchContext = getContext<DispatchContext>('cuekit-dispatch-context')

/**
 * Runs deliveries on the microtask queue.
 */
export const microtaskContext: DispatchContext = {
  post: (task) => queueMicrotask(task)
}

/**
 * The dispatch context made active by `TaskQueue.run`, if any.
 */
export function currentDispatchContext(): DispatchContext | undefined {
  return dispatchContext.tryUse() ?? undefined
}

/**
 * A dispatch context that holds deliveries until its owner pumps it.
 * Host loops (a UI frame callback, an audio scheduler tick) call `flush`.
 *
 * @example
 * ```ts
 * const ui = new TaskQueue('ui')
 * cue.changed('name').connect(label.update, Connection.Queued(ui))
 * cue.name = 'Intro'   // nothing delivered yet
 * ui.flush()           // label.update('Intro')
 * ```
 */
export class TaskQueue implements DispatchContext {
  readonly name: string | undefined
  private tasks: Array<() => void> = []

  constructor(name?: string) {
    this.name = name
  }

  /** Number of tasks waiting for the next flush. */
  get pending(): number {
    return this.tasks.length
  }

  post(task: () => void): void {
    this.tasks.push(task)
  }

  /**
   * Run `fn` with this queue as the active dispatch context.
   * Runs on two different queues cannot be nested.
   */
  run<R>(fn: () => R): R {
    if (dispatchContext.tryUse() === this) return fn()
    return dispatchContext.call(this, fn)
  }

  /**
   * Run every pending task, including tasks posted while flushing.
   * @returns The number of tasks that ran.
   */
  flush(): number {
    return this.run(() => {
      let count = 0
      let task = this.tasks.shift()
      while (task !== undefined) {
        task()
        count++
        task = this.tasks.shift()
      }
      return count
    })
  }

  /** Drop pending tasks without running them. */
  clear(): void {
    this.tasks = []
  }
}

// =============================================================================
// CONNECTION MODES
// =============================================================================

const direct: ConnectionMode = { kind: 'direct' }
const async: ConnectionMode = { kind: 'async', context: microtaskContext }

export const Connection = {
  /** Synchronous delivery inside `emit`. */
  Direct: direct,
  /** Delivery on the microtask queue. */
  Async: async,
  /**
   * Delivery posted to `context`. Without an argument, the dispatch context
   * active at connection time is used, or the microtask queue when none is.
   */
  Queued(context?: DispatchContext): ConnectionMode {
    return { kind: 'queued', context: context ?? currentDispatchContext() ?? microtaskContext }
  }
} as const

// =============================================================================
// SIGNAL
// =============================================================================

class SlotConnection<TArgs extends unknown[]> implements Subscription {
  connected = true
  /** A `once` connection already handed an emission to its context. */
  fired = false

  constructor(
    readonly slot: Slot<TArgs>,
    readonly mode: ConnectionMode,
    readonly once: boolean,
    private readonly detach: (connection: SlotConnection<TArgs>) => void
  ) {}

  disconnect(): void {
    if (!this.connected) return
    this.connected = false
    this.detach(this)
  }
}

/**
 * A typed event source.
 *
 * @template TArgs The arguments passed to every subscriber.
 *
 * @example
 * ```ts
 * const levelChanged = new Signal<[channel: number, level: number]>('levelChanged')
 * const subscription = levelChanged.connect((channel, level) => meter.draw(channel, level))
 * levelChanged.emit(2, -6)
 * subscription.disconnect()
 * ```
 */
export class Signal<TArgs extends unknown[] = []> {
  readonly name: string | undefined
  private connections: SlotConnection<TArgs>[] = []

  constructor(name?: string) {
    this.name = name
  }

  /** Number of live subscribers. */
  get size(): number {
    return this.connections.length
  }

  isConnected(slot: Slot<TArgs>): boolean {
    return this.connections.some(connection => connection.slot === slot)
  }

  /**
   * Subscribe `slot`. Connecting a slot that is already connected returns the
   * existing subscription and keeps its original mode.
   */
  connect(slot: Slot<TArgs>, mode: ConnectionMode = Connection.Direct): Subscription {
    return this.add(slot, mode, false)
  }

  /**
   * Subscribe `slot` for a single delivery.
   */
  once(slot: Slot<TArgs>, mode: ConnectionMode = Connection.Direct): Subscription {
    return this.add(slot, mode, true)
  }

  /**
   * Remove a subscriber, given either the callback or its subscription.
   * With no argument every subscriber is removed. Unknown targets are ignored.
   */
  disconnect(target?: Slot<TArgs> | Subscription): void {
    if (target === undefined) {
      for (const connection of [...this.connections]) connection.disconnect()
      return
    }

    const connection = typeof target === 'function'
      ? this.connections.find(c => c.slot === target)
      : this.connections.find(c => c === target)
    connection?.disconnect()
  }

  /**
   * Deliver `args` to every subscriber, in connection order.
   */
  emit(...args: TArgs): void {
    for (const connection of [...this.connections]) {
      // Removed by an earlier subscriber of this same emission
      if (!connection.connected || connection.fired) continue
      if (connection.once) connection.fired = true
      this.dispatch(connection, args)
    }
  }

  private add(slot: Slot<TArgs>, mode: ConnectionMode, once: boolean): Subscription {
    const existing = this.connections.find(connection => connection.slot === slot)
    if (existing) return existing

    const connection = new SlotConnection(slot, mode, once, c => this.detach(c))
    this.connections.push(connection)
    return connection
  }

  private detach(connection: SlotConnection<TArgs>): void {
    const index = this.connections.indexOf(connection)
    if (index !== -1) this.connections.splice(index, 1)
  }

  private dispatch(connection: SlotConnection<TArgs>, args: TArgs): void {
    const { mode } = connection
    if (mode.kind === 'direct') {
      this.invoke(connection, args)
      return
    }

    mode.context.post(() => {
      if (connection.connected) this.invoke(connection, args)
    })
  }

  private invoke(connection: SlotConnection<TArgs>, args: TArgs): void {
    // Stays listed until delivery, so it can still be disconnected while queued
    if (connection.once) connection.disconnect()
    try {
      connection.slot(...args)
    } catch (error) {
      reportSignalError(error, { signal: this.name, mode: connection.mode.kind })
    }
  }
}
