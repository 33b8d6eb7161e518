/**
 * ChainFSM - event-driven finite state machine engine
 *
 * - States chained into sequences that advance on their own
 * - Typed events routed to the active state or to a transition
 * - Whitelist / blacklist / deferlist interruption policies
 * - Re-entrant: states may drive transitions from their constructor
 * - Every decision published on a synchronous notification kernel
 * - Zero runtime dependencies
 */

export const VERSION = '1.0.0';

// Notification kernel
export { KernelEvent } from './kernel-event.js';
export { Kernel, createKernel } from './kernel.js';
export type { ExecutionError } from './kernel.js';

export type {
  EventName,
  EventMap,
  ListenerFunction,
  PredicateFunction,
  ListenerOptions,
  KernelOptions,
  UnbindFunction,
} from './types.js';

export { toError } from './types.js';

export { matchesPattern, findMatchingPatterns, clearPatternCache } from './wildcard.js';

// FSM
export * from './fsm/index.js';
