/**
 * Type definitions for the notification kernel
 *
 * The kernel is the observation channel of the state machine: every
 * transition, dispatch and policy decision is published on it as a
 * named notice. Listeners run synchronously in priority order.
 */

import type { KernelEvent } from './kernel-event.js';

// ============================================================================
// Event Data Types
// ============================================================================

export type EventName = string;

/**
 * Type map for notifications - maps names (or name templates) to payload types
 * @example
 * ```ts
 * type Notices = {
 *   [key: `${string}:enter:${string}`]: { state: string };
 *   'app:ready': undefined;
 * };
 * ```
 */
export type EventMap = Record<EventName, unknown>;

// ============================================================================
// Listener Types
// ============================================================================

export type ListenerFunction<T = unknown> = (event: KernelEvent<T>) => void;

/**
 * Predicate for conditional once listeners, evaluated AFTER the listener ran
 */
export type PredicateFunction<T = unknown> = (event: KernelEvent<T>) => boolean;

export interface ListenerOptions<T = unknown> {
  /** Identifier reported in debug output and errors */
  id?: string;

  /** Higher values run earlier; equal priorities keep registration order */
  priority?: number;

  /** Remove after the first delivery, or once the predicate returns true */
  once?: boolean | PredicateFunction<T>;

  /** Unbind the listener when the signal aborts */
  signal?: AbortSignal;
}

/**
 * Listener as stored by the kernel
 * @internal
 */
export interface ListenerEntry<T = unknown> {
  id: string;
  priority: number;
  sequence: number;
  original: ListenerFunction<never>;
  signal?: AbortSignal;
  abortListener?: () => void;
  /** Removed before its first delivery */
  once: boolean;
  /** Set once the entry left the kernel; skipped by deliveries still running */
  removed: boolean;
  callback(event: KernelEvent<T>): void;
  /** Predicate-once check, run right after each delivery */
  shouldRemove(event: KernelEvent<T>): boolean;
}

// ============================================================================
// Kernel Options
// ============================================================================

export interface KernelOptions {
  /** Name delimiter used by wildcard patterns (default: ':') */
  delimiter?: string;

  /** Enable wildcard pattern matching (default: true) */
  wildcard?: boolean;

  /** Warn when a name has more listeners than this (default: Infinity) */
  maxListeners?: number;

  /** Handler for listener exceptions caught by the error boundary */
  onError?: (error: Error, event: KernelEvent<unknown>) => void;

  /** Debug mode - traces registrations and deliveries */
  debug?: boolean;

  /** Keep delivering to the remaining listeners when one throws (default: true) */
  errorBoundary?: boolean;
}

export type UnbindFunction = () => void;

// ============================================================================
// Helpers
// ============================================================================

/**
 * Normalize anything thrown into an Error instance
 */
export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}
