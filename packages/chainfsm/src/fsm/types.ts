/**
 * FSM Types for ChainFSM
 *
 * States are application classes registered under a string identity.
 * Events are the keys of an application event map; at most one payload
 * per event kind is buffered per state.
 */

import type { Kernel } from '../kernel.js';
import type { EventMap } from '../types.js';
import type { StateContext } from './state-context.js';

/**
 * Identity of a state slot, unique within one machine
 */
export type StateId = string;

/**
 * Event identity: a string key of the application event map
 */
export type EventKey<Events extends EventMap> = keyof Events & string;

/**
 * Construction parameters shared by every state of one machine
 */
export type StateParams = readonly unknown[];

/**
 * Application state type. The first constructor argument is the state's
 * own context; the rest is the machine-wide parameter tuple.
 *
 * @example
 * ```ts
 * class CleanState {
 *   constructor(private readonly ctx: StateContext<RobotEvents, [Log]>, log: Log) {}
 *   onEvent(): void {
 *     const clean = this.ctx.takeEvent('clean');
 *     // ...
 *     this.ctx.advance(this.log);
 *   }
 * }
 * ```
 */
export type StateConstructor<Events extends EventMap, TParams extends StateParams> = new (
  ctx: StateContext<Events, TParams>,
  ...params: TParams
) => object;

/**
 * Capability: a state that consumes buffered events
 */
export interface EventHandlingState {
  onEvent(): void;
}

/**
 * Capability: a state that releases resources when the engine drops it
 */
export interface DisposableState {
  dispose(): void;
}

/**
 * Buffered event payload
 */
export interface PendingEvent<T> {
  readonly name: string;
  readonly data: T;
  readonly postedAt: number;
}

/**
 * Per-state buffer: one pending payload per event kind
 */
export type PendingEvents<Events extends EventMap> = {
  [K in keyof Events]?: PendingEvent<Events[K]>;
};

/**
 * Runtime payload checks applied when a state takes an event
 */
export type EventGuards<Events extends EventMap> = {
  [K in keyof Events]?: (payload: unknown) => payload is Events[K];
};

/**
 * Interruption policy outcome for an event posted while a state is active
 */
export type Verdict = 'accept' | 'reject' | 'defer';

export type ListKind = 'whitelist' | 'blacklist' | 'deferlist';

/**
 * Interruption lists of one state, in evaluation order
 */
export interface InterruptionLists {
  readonly whitelist: ReadonlySet<string>;
  readonly blacklist: ReadonlySet<string>;
  readonly deferlist: ReadonlySet<string>;
}

/**
 * What caused a transition
 */
export type TransitionTrigger = 'enter' | 'advance' | 'post';

/**
 * Notice payload published on the machine kernel
 */
export interface MachineNotice {
  /** Machine prefix */
  machine: string;

  /** Active state after the operation (null when none) */
  state: StateId | null;

  /** Previous state, for transition notices */
  from?: StateId | null;

  /** Target state of a transition or of a routed event */
  to?: StateId;

  /** Event kind, for event notices and event-triggered transitions */
  event?: string;

  /** Interruption verdict that applied */
  verdict?: Verdict;

  /** What caused the transition */
  trigger?: TransitionTrigger;
}

/**
 * Notices emitted by a machine
 *
 * Pattern: {prefix}:{kind}[:{state}]
 * - {prefix}:transition
 * - {prefix}:enter:{state} / {prefix}:leave:{state}
 * - {prefix}:event:dispatched | rejected | deferred | dropped
 * - {prefix}:destroyed
 */
export type MachineNotices = Record<string, MachineNotice>;

/**
 * Origin of an error thrown by application state code
 */
export type LifecyclePhase = 'construct' | 'event' | 'dispose';

/**
 * Machine configuration
 */
export interface MachineOptions<Events extends EventMap> {
  /** Notice prefix (default: 'fsm') */
  prefix?: string;

  /** Number of construction parameters every state receives (default: 0) */
  arity?: number;

  /** Kernel the machine publishes notices on (default: a new kernel) */
  kernel?: Kernel<MachineNotices>;

  /** Payload guards used by takeEvent */
  eventGuards?: EventGuards<Events>;

  /** Trace every decision with console.debug */
  debug?: boolean;

  /** Catch errors thrown by state code and report them to onError (default: true) */
  errorBoundary?: boolean;

  /** Receives caught and reported errors (default: console.error) */
  onError?: (error: Error) => void;
}

export interface WaitForOptions {
  /** Reject with WaitTimeoutError after this many milliseconds */
  timeout?: number;

  /** Reject with an AbortError when the signal aborts */
  signal?: AbortSignal;
}

// ============================================================================
// Type Guards
// ============================================================================

export function hasEventHandler(value: object): value is EventHandlingState {
  return 'onEvent' in value && typeof value.onEvent === 'function';
}

export function isDisposable(value: object): value is DisposableState {
  return 'dispose' in value && typeof value.dispose === 'function';
}

// ============================================================================
// Errors
// ============================================================================

/**
 * Construction parameters did not match the declared arity.
 * Reported through onError; the construction is skipped.
 */
export class ArityMismatchError extends Error {
  readonly state: StateId;
  readonly expected: number;
  readonly received: number;

  constructor(state: StateId, expected: number, received: number) {
    super(`State "${state}" expects ${expected} construction parameter(s), received ${received}`);
    this.name = 'ArityMismatchError';
    this.state = state;
    this.expected = expected;
    this.received = received;
  }
}

/**
 * Application state code threw during construction, event handling or disposal
 */
export class StateLifecycleError extends Error {
  readonly state: StateId;
  readonly phase: LifecyclePhase;

  constructor(state: StateId, phase: LifecyclePhase, cause: Error) {
    super(`State "${state}" failed during ${phase}: ${cause.message}`, { cause });
    this.name = 'StateLifecycleError';
    this.state = state;
    this.phase = phase;
  }
}

/**
 * waitFor() did not observe the state before its timeout
 */
export class WaitTimeoutError extends Error {
  readonly state: StateId;
  readonly timeout: number;

  constructor(state: StateId, timeout: number) {
    super(`Timed out after ${timeout}ms waiting for state "${state}"`);
    this.name = 'WaitTimeoutError';
    this.state = state;
    this.timeout = timeout;
  }
}
