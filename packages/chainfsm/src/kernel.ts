/**
 * Notification Kernel
 *
 * A synchronous event kernel with:
 * - Priority-based listener ordering
 * - Wildcard patterns (`fsm:enter:*`, `*:transition`)
 * - once / predicate-once listeners and AbortSignal unbinding
 * - Error boundary so a failing listener never breaks the emitter
 *
 * Delivery is synchronous on purpose: the state machine publishes notices
 * from inside its own run-to-completion operations, and listeners may call
 * back into the machine.
 */

import { KernelEvent } from './kernel-event.js';
import { findMatchingPatterns } from './wildcard.js';
import { toError } from './types.js';
import type {
  EventMap,
  ListenerEntry,
  ListenerFunction,
  ListenerOptions,
  KernelOptions,
  UnbindFunction,
} from './types.js';

interface ResolvedKernelOptions {
  delimiter: string;
  wildcard: boolean;
  maxListeners: number;
  debug: boolean;
  errorBoundary: boolean;
  onError: (error: Error, event: KernelEvent<unknown>) => void;
}

/**
 * Error collected during the last emit
 */
export interface ExecutionError {
  listenerId: string;
  error: Error;
  timestamp: number;
  eventName: string;
}

export class Kernel<Events extends EventMap = EventMap> {
  private listeners = new Map<string, ListenerEntry<Events[keyof Events]>[]>();
  private options: ResolvedKernelOptions;
  private listenerIdCounter = 0;
  private sequenceCounter = 0;
  private executionErrors: ExecutionError[] = [];

  constructor(options: KernelOptions = {}) {
    this.options = {
      delimiter: options.delimiter ?? ':',
      wildcard: options.wildcard ?? true,
      maxListeners: options.maxListeners ?? Infinity,
      debug: options.debug ?? false,
      errorBoundary: options.errorBoundary ?? true,
      onError:
        options.onError ??
        ((error: Error) => {
          console.error('Kernel error:', error);
        }),
    };

    if (this.options.debug) {
      console.debug('[ChainFSM] Kernel initialized', {
        delimiter: this.options.delimiter,
        wildcard: this.options.wildcard,
        maxListeners: this.options.maxListeners,
        errorBoundary: this.options.errorBoundary,
      });
    }
  }

  /**
   * Register a listener for a notice name or wildcard pattern
   * Returns an unbind function
   */
  on<K extends keyof Events & string>(
    eventName: K,
    listener: ListenerFunction<Events[K]>,
    options: ListenerOptions<Events[K]> = {}
  ): UnbindFunction {
    if (options.signal?.aborted) {
      if (this.options.debug) {
        console.debug('[ChainFSM] Listener not added (signal already aborted)', { event: eventName });
      }
      return () => {};
    }

    const id = options.id ?? `listener_${++this.listenerIdCounter}`;
    const once = options.once ?? false;

    const entry: ListenerEntry<Events[K]> = {
      id,
      priority: options.priority ?? 0,
      sequence: this.sequenceCounter++,
      original: listener,
      signal: options.signal,
      once: once === true,
      removed: false,
      callback: listener,
      shouldRemove: typeof once === 'function' ? once : () => false,
    };
    if (options.signal) {
      entry.abortListener = () => this.off(eventName, listener);
    }

    const entries = this.listeners.get(eventName) ?? [];
    entries.push(entry);
    entries.sort(byPriority);
    this.listeners.set(eventName, entries);

    if (this.options.debug) {
      console.debug('[ChainFSM] Listener added', {
        event: eventName,
        listenerId: id,
        priority: entry.priority,
        totalListeners: entries.length,
      });
    }

    if (entries.length > this.options.maxListeners) {
      console.warn(
        `MaxListenersExceeded: Event "${eventName}" has ${entries.length} listeners (limit: ${this.options.maxListeners})`
      );
    }

    if (options.signal && entry.abortListener) {
      options.signal.addEventListener('abort', entry.abortListener, { once: true });
    }

    return () => this.off(eventName, listener);
  }

  /**
   * Register a listener removed after its first delivery
   */
  once<K extends keyof Events & string>(
    eventName: K,
    listener: ListenerFunction<Events[K]>,
    options: Omit<ListenerOptions<Events[K]>, 'once'> = {}
  ): UnbindFunction {
    return this.on(eventName, listener, { ...options, once: true });
  }

  /**
   * Remove a listener, or every listener of the name when none is given
   */
  off(eventName: string, listener?: ListenerFunction<never>): void {
    const entries = this.listeners.get(eventName);
    if (!entries) {
      return;
    }

    const removed = listener ? entries.filter((entry) => entry.original === listener) : entries;
    for (const entry of removed) {
      entry.removed = true;
      if (entry.signal && entry.abortListener) {
        entry.signal.removeEventListener('abort', entry.abortListener);
      }
    }

    const remaining = listener ? entries.filter((entry) => entry.original !== listener) : [];
    if (remaining.length === 0) {
      this.listeners.delete(eventName);
    } else {
      this.listeners.set(eventName, remaining);
    }

    if (this.options.debug && removed.length > 0) {
      console.debug('[ChainFSM] Listener removed', {
        event: eventName,
        removed: removed.length,
        remaining: remaining.length,
      });
    }
  }

  /**
   * Deliver a notice to every matching listener, synchronously
   *
   * With errorBoundary (default) listener errors go to onError and delivery
   * continues; without it the first error is rethrown.
   *
   * A once listener is removed before it runs, a predicate-once listener
   * right after. Listeners removed while a delivery is running are skipped.
   */
  emit<K extends keyof Events & string>(eventName: K, data: Events[K]): void {
    const patterns = this.options.wildcard
      ? findMatchingPatterns(eventName, this.listeners.keys(), this.options.delimiter)
      : this.listeners.has(eventName)
        ? [eventName]
        : [];

    const matched: Array<[string, ListenerEntry<Events[keyof Events]>]> = [];
    for (const pattern of patterns) {
      for (const entry of this.listeners.get(pattern) ?? []) {
        matched.push([pattern, entry]);
      }
    }

    if (matched.length === 0) {
      if (this.options.debug) {
        console.debug('[ChainFSM] Event emitted (no listeners)', { event: eventName });
      }
      return;
    }

    matched.sort(([, a], [, b]) => byPriority(a, b));

    const event = new KernelEvent<Events[keyof Events]>(eventName, data);
    const errors: ExecutionError[] = [];

    if (this.options.debug) {
      console.debug('[ChainFSM] Event emitted', { event: eventName, listenerCount: matched.length });
    }

    // Listeners may emit again; entries are retired before a nested emit can see them
    let failure: Error | undefined;
    for (const [pattern, entry] of matched) {
      if (event.isPropagationStopped) {
        if (this.options.debug) {
          console.debug('[ChainFSM] Listener skipped (propagation stopped)', { listenerId: entry.id });
        }
        break;
      }
      if (entry.removed) {
        continue;
      }
      if (entry.once) {
        this.off(pattern, entry.original);
      }
      try {
        entry.callback(event);
        if (!entry.removed && entry.shouldRemove(event)) {
          this.off(pattern, entry.original);
        }
      } catch (thrown) {
        const error = toError(thrown);
        errors.push({
          listenerId: entry.id,
          error,
          timestamp: Date.now(),
          eventName,
        });
        if (!this.options.errorBoundary) {
          failure = error;
          break;
        }
        this.options.onError(error, event);
      }
    }

    this.executionErrors = errors;

    if (failure) {
      throw failure;
    }
  }

  /**
   * Number of listeners for one name (exact registration key) or in total
   */
  listenerCount(eventName?: string): number {
    if (eventName === undefined) {
      let total = 0;
      for (const entries of this.listeners.values()) {
        total += entries.length;
      }
      return total;
    }
    return this.listeners.get(eventName)?.length ?? 0;
  }

  eventNames(): string[] {
    return Array.from(this.listeners.keys());
  }

  /**
   * Remove all listeners, or all listeners of one name
   */
  offAll(eventName?: string): void {
    if (eventName !== undefined) {
      this.off(eventName);
      return;
    }
    for (const name of this.eventNames()) {
      this.off(name);
    }
  }

  debug(enabled: boolean): void {
    this.options.debug = enabled;
    console.debug(`[ChainFSM] Kernel debug mode ${enabled ? 'enabled' : 'disabled'}`);
  }

  /**
   * Errors collected by the last emit that reached a listener.
   * An emit nested in a listener finishes first, so the outer emit's errors win.
   */
  getExecutionErrors(): ReadonlyArray<ExecutionError> {
    return this.executionErrors;
  }

  clearExecutionErrors(): void {
    this.executionErrors = [];
  }
}

const byPriority = <T>(a: ListenerEntry<T>, b: ListenerEntry<T>): number =>
  b.priority - a.priority || a.sequence - b.sequence;

export const createKernel = <Events extends EventMap = EventMap>(
  options?: KernelOptions
): Kernel<Events> => {
  return new Kernel<Events>(options);
};
