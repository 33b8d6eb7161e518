/**
 * StateMachine - transition coordinator
 *
 * Routes posted events either to the active state or to a transition, lets
 * states step down voluntarily along their chain, and lets interruption
 * policies reject or defer events.
 *
 * Every operation has two phases:
 * 1. bookkeeping - read/swap the active slot, push/pop the deferred queue.
 *    Synchronous and never calls application code.
 * 2. side effects - leave/enter/dispatch and notices. Application code runs
 *    here and may call back into the machine; nested calls observe the
 *    active state already published by phase 1.
 * Entering and leaving are therefore not atomic with the identity swap.
 */

import { Kernel } from '../kernel.js';
import { toError, type EventMap } from '../types.js';
import { hasWildcard } from '../wildcard.js';
import { decide } from './interruption-policy.js';
import { Registry } from './registry.js';
import type { SlotHost, StateSlot } from './state-slot.js';
import {
  StateLifecycleError,
  WaitTimeoutError,
  type EventGuards,
  type EventKey,
  type LifecyclePhase,
  type MachineNotice,
  type MachineNotices,
  type MachineOptions,
  type StateConstructor,
  type StateId,
  type StateParams,
  type TransitionTrigger,
  type WaitForOptions,
} from './types.js';

interface ResolvedMachineOptions<Events extends EventMap> {
  prefix: string;
  arity: number;
  eventGuards: EventGuards<Events>;
  debug: boolean;
  errorBoundary: boolean;
  onError: (error: Error) => void;
}

type NoticeDetails = Omit<MachineNotice, 'machine' | 'state'>;

/**
 * Event-driven state machine
 *
 * @typeParam Events - event map: event identity -> payload type
 * @typeParam TParams - construction parameters shared by every state
 *
 * @example
 * ```ts
 * const fsm = new StateMachine<RobotEvents, [Log]>({ arity: 1 });
 *
 * fsm
 *   .registerState('ready', ReadyState)
 *   .registerState('clean', CleanState)
 *   .registerState('recharge', RechargeState)
 *   .registerChain('clean', 'recharge')
 *   .registerEventRoute('clean', 'clean')
 *   .setBlacklist('recharge', 'clean');
 *
 * fsm.enter('ready', log);
 * fsm.post('clean', { id: 1, x: 10, y: 20 }, log);
 * ```
 */
export class StateMachine<Events extends EventMap = EventMap, TParams extends StateParams = []> {
  /** Kernel the machine publishes its notices on */
  readonly kernel: Kernel<MachineNotices>;

  readonly prefix: string;

  private readonly options: ResolvedMachineOptions<Events>;
  private readonly registry: Registry<Events, TParams>;
  private readonly deferred: StateId[] = [];
  private active: StateSlot<Events, TParams> | null = null;
  private pendingOps = 0;
  private finalized = false;
  private tornDown = false;

  constructor(options: MachineOptions<Events> = {}) {
    const onError =
      options.onError ??
      ((error: Error) => {
        console.error('ChainFSM error:', error);
      });

    this.options = {
      prefix: options.prefix ?? 'fsm',
      arity: options.arity ?? 0,
      eventGuards: options.eventGuards ?? {},
      debug: options.debug ?? false,
      errorBoundary: options.errorBoundary ?? true,
      onError,
    };
    this.prefix = this.options.prefix;
    this.kernel =
      options.kernel ??
      new Kernel<MachineNotices>({
        debug: this.options.debug,
        errorBoundary: this.options.errorBoundary,
        onError,
      });

    const host: SlotHost<Events, TParams> = {
      eventGuards: this.options.eventGuards,
      advance: (caller: StateId, ...params: TParams) => this.advance(caller, ...params),
      post: <K extends EventKey<Events>>(event: K, payload: Events[K], ...params: TParams) =>
        this.post(event, payload, ...params),
      isActive: (state: StateId) => this.isActive(state),
      runStateCode: <T>(state: StateId, phase: LifecyclePhase, fn: () => T) =>
        this.runStateCode(state, phase, fn),
      reportError: (error: Error) => this.reportError(error),
      trace: (message: string, details: Record<string, unknown>) => this.trace(message, details),
    };
    this.registry = new Registry<Events, TParams>(this.options.arity, host);

    this.trace('Machine initialized', {
      prefix: this.prefix,
      arity: this.options.arity,
      errorBoundary: this.options.errorBoundary,
    });
  }

  // ==========================================================================
  // Registration
  // ==========================================================================

  /**
   * Register a state class under `id`. Registering an identity that already
   * has a class is a no-op.
   */
  registerState(id: StateId, stateClass: StateConstructor<Events, TParams>): this {
    if (this.rejectSetup('registerState')) {
      return this;
    }
    if (!this.registry.register(id).bind(stateClass)) {
      this.trace('State already registered', { state: id });
    }
    return this;
  }

  /**
   * Chain states: when `ids[i]` steps down with nothing deferred, `ids[i + 1]` follows
   */
  registerChain(...ids: StateId[]): this {
    if (!this.rejectSetup('registerChain')) {
      this.registry.bindChain(ids);
    }
    return this;
  }

  /**
   * Posting any of `events` transitions to `target` (subject to interruption policy)
   */
  registerEventRoute(target: StateId, ...events: EventKey<Events>[]): this {
    if (!this.rejectSetup('registerEventRoute')) {
      for (const event of events) {
        this.registry.bindEvent(event, target);
      }
    }
    return this;
  }

  /**
   * While `id` is active, only these events may interrupt it
   */
  setWhitelist(id: StateId, ...events: EventKey<Events>[]): this {
    if (!this.rejectSetup('setWhitelist')) {
      this.registry.setList(id, 'whitelist', events);
    }
    return this;
  }

  /**
   * While `id` is active, these events are dropped
   */
  setBlacklist(id: StateId, ...events: EventKey<Events>[]): this {
    if (!this.rejectSetup('setBlacklist')) {
      this.registry.setList(id, 'blacklist', events);
    }
    return this;
  }

  /**
   * While `id` is active, these events wait until it steps down
   */
  setDeferlist(id: StateId, ...events: EventKey<Events>[]): this {
    if (!this.rejectSetup('setDeferlist')) {
      this.registry.setList(id, 'deferlist', events);
    }
    return this;
  }

  /**
   * Keep the instances of these states alive across leave/enter
   */
  setReuse(...ids: StateId[]): this {
    if (!this.rejectSetup('setReuse')) {
      for (const id of ids) {
        this.registry.register(id).reuse = true;
      }
    }
    return this;
  }

  // ==========================================================================
  // Coordination
  // ==========================================================================

  /**
   * Make `id` the active state, leaving the current one.
   * No-op when `id` is already active or unknown.
   */
  enter(id: StateId, ...params: TParams): void {
    if (this.finalized) {
      this.trace('enter() ignored (machine destroyed)', { state: id });
      return;
    }
    const target = this.registry.lookup(id);
    if (!target) {
      this.trace('enter() ignored (unknown state)', { state: id });
      return;
    }
    const previous = this.active;
    this.track(() => this.switchTo(previous, target, params, 'enter'));
  }

  /**
   * Voluntary step-down, called by the active state itself.
   * Goes to the oldest deferred target, else to the chain successor.
   * Ignored unless `caller` is the active state.
   */
  advance(caller: StateId, ...params: TParams): void {
    if (this.finalized) {
      return;
    }
    const current = this.active;
    if (!current || current.id !== caller) {
      this.trace('Stale advance() ignored', { caller, active: current?.id ?? null });
      return;
    }

    const targetId = this.deferred.length > 0 ? this.deferred.shift() : current.next;
    if (targetId === undefined) {
      this.trace('advance() without successor', { state: caller });
      return;
    }
    const target = this.registry.lookup(targetId);
    if (!target) {
      return;
    }
    this.track(() => this.switchTo(current, target, params, 'advance'));
  }

  /**
   * Post an event.
   *
   * Routed to the active state (or unrouted): buffered and dispatched there.
   * Routed elsewhere: the active state's interruption policy decides between
   * an immediate transition, a deferred one, or dropping the event.
   */
  post<K extends EventKey<Events>>(event: K, payload: Events[K], ...params: TParams): void {
    if (this.finalized) {
      return;
    }
    const targetId = this.registry.route(event);
    const current = this.active;

    if (targetId === undefined || targetId === current?.id) {
      if (!current) {
        this.trace('Event dropped (no route, no active state)', { event });
        this.notify('event:dropped', { event });
        return;
      }
      current.bufferEvent(event, payload);
      this.track(() => {
        current.dispatchEvent();
        this.notify('event:dispatched', { event, to: current.id });
      });
      return;
    }

    const target = this.registry.lookup(targetId);
    if (!target) {
      return;
    }

    const verdict = current ? decide(current, event) : 'accept';
    this.trace('Interruption decided', { event, active: current?.id ?? null, target: targetId, verdict });

    if (verdict === 'reject') {
      this.notify('event:rejected', { event, to: targetId, verdict });
      return;
    }

    target.bufferEvent(event, payload);

    if (verdict === 'defer') {
      this.deferred.push(targetId);
      this.notify('event:deferred', { event, to: targetId, verdict });
      return;
    }

    this.track(() => this.switchTo(current, target, params, 'post', event));
  }

  // ==========================================================================
  // Inspection
  // ==========================================================================

  isActive(id: StateId): boolean {
    return this.active !== null && this.active.id === id;
  }

  activeState(): StateId | null {
    return this.active?.id ?? null;
  }

  /**
   * Live instance of a state; with `type`, only if it is an instance of it
   */
  getInstance(id: StateId): object | undefined;
  getInstance<T extends object>(id: StateId, type: abstract new (...args: never[]) => T): T | undefined;
  getInstance<T extends object>(
    id: StateId,
    type?: abstract new (...args: never[]) => T
  ): object | undefined {
    const instance = this.registry.lookup(id)?.getInstance();
    if (!instance || !type) {
      return instance;
    }
    return instance instanceof type ? instance : undefined;
  }

  hasStates(...ids: StateId[]): boolean {
    return ids.every((id) => this.registry.hasState(id));
  }

  hasRoutes(...events: EventKey<Events>[]): boolean {
    return events.every((event) => this.registry.hasRoute(event));
  }

  /**
   * Event kinds currently buffered on a state
   */
  pendingEvents(id: StateId): string[] {
    return this.registry.lookup(id)?.pendingKinds() ?? [];
  }

  /**
   * Deferred targets, oldest first
   */
  deferredTargets(): readonly StateId[] {
    return [...this.deferred];
  }

  /**
   * Number of operations currently running (nested calls included)
   */
  inFlight(): number {
    return this.pendingOps;
  }

  isDestroyed(): boolean {
    return this.finalized;
  }

  /**
   * Resolve with the enter notice of `id`, or at once when it is already active.
   * Ids containing a wildcard segment are rejected.
   */
  waitFor(id: StateId, options: WaitForOptions = {}): Promise<MachineNotice> {
    if (hasWildcard(id)) {
      return Promise.reject(new TypeError(`State id "${id}" contains a wildcard and cannot be awaited`));
    }
    if (this.finalized) {
      return Promise.reject(new Error(`State machine "${this.prefix}" is destroyed`));
    }
    if (this.isActive(id)) {
      return Promise.resolve({ machine: this.prefix, state: id });
    }

    const { timeout, signal } = options;

    return new Promise<MachineNotice>((resolve, reject) => {
      let timer: ReturnType<typeof setTimeout> | undefined;

      const cleanup = (): void => {
        offEnter();
        offDestroyed();
        if (timer !== undefined) {
          clearTimeout(timer);
        }
        signal?.removeEventListener('abort', onAbort);
      };

      const onAbort = (): void => {
        cleanup();
        reject(abortReason(signal));
      };

      const offEnter = this.kernel.once(`${this.prefix}:enter:${id}`, (event) => {
        cleanup();
        resolve(event.data);
      });
      const offDestroyed = this.kernel.once(`${this.prefix}:destroyed`, () => {
        cleanup();
        reject(new Error(`State machine "${this.prefix}" destroyed while waiting for "${id}"`));
      });

      if (signal) {
        if (signal.aborted) {
          onAbort();
          return;
        }
        signal.addEventListener('abort', onAbort, { once: true });
      }

      if (timeout !== undefined) {
        timer = setTimeout(() => {
          cleanup();
          reject(new WaitTimeoutError(id, timeout));
        }, timeout);
      }
    });
  }

  debug(enabled: boolean): void {
    this.options.debug = enabled;
    console.debug(`[ChainFSM] Machine debug mode ${enabled ? 'enabled' : 'disabled'}`, { prefix: this.prefix });
  }

  // ==========================================================================
  // Lifecycle
  // ==========================================================================

  /**
   * Finalize the machine.
   *
   * Later operations, including nested ones from code still running, become
   * no-ops at once. Instances are disposed when the last running operation
   * returns (immediately when none is running).
   */
  destroy(): void {
    if (this.finalized) {
      return;
    }
    this.finalized = true;
    this.active = null;
    this.deferred.length = 0;
    this.registry.clearRoutes();
    this.trace('Machine finalized', { inFlight: this.pendingOps });

    if (this.pendingOps === 0) {
      this.teardown();
    }
  }

  // ==========================================================================
  // Internals
  // ==========================================================================

  private switchTo(
    previous: StateSlot<Events, TParams> | null,
    next: StateSlot<Events, TParams>,
    params: TParams,
    trigger: TransitionTrigger,
    event?: string
  ): void {
    if (previous === next) {
      this.trace('Transition skipped (already active)', { state: next.id });
      return;
    }

    this.active = next;
    this.trace('Transition', { from: previous?.id ?? null, to: next.id, trigger, event });
    this.notify('transition', { from: previous?.id ?? null, to: next.id, trigger, event });

    if (previous) {
      previous.leave();
      this.notify(`leave:${previous.id}`, { from: previous.id, to: next.id, trigger, event });
    }

    // Nested calls above may already have moved on
    if (this.active !== next) {
      this.trace('Entry skipped (superseded)', { state: next.id, active: this.active?.id ?? null });
      return;
    }
    this.notify(`enter:${next.id}`, { from: previous?.id ?? null, to: next.id, trigger, event });
    if (this.active !== next) {
      return;
    }
    next.enter(params);
  }

  /**
   * Count an operation in flight; the last one out runs a pending teardown
   */
  private track(operation: () => void): void {
    this.pendingOps++;
    try {
      operation();
    } finally {
      this.pendingOps--;
      if (this.pendingOps === 0 && this.finalized) {
        this.teardown();
      }
    }
  }

  private teardown(): void {
    if (this.tornDown) {
      return;
    }
    this.tornDown = true;
    for (const slot of this.registry.all()) {
      slot.teardown();
    }
    this.registry.clear();
    this.trace('Machine destroyed', {});
    this.notify('destroyed', {});
  }

  private runStateCode<T>(state: StateId, phase: LifecyclePhase, fn: () => T): T | undefined {
    try {
      return fn();
    } catch (thrown) {
      const error = thrown instanceof StateLifecycleError ? thrown : new StateLifecycleError(state, phase, toError(thrown));
      if (!this.options.errorBoundary) {
        throw error;
      }
      this.reportError(error);
      return undefined;
    }
  }

  private reportError(error: Error): void {
    this.trace('Error reported', { error: error.message });
    this.options.onError(error);
  }

  private rejectSetup(operation: string): boolean {
    if (this.finalized) {
      this.trace(`${operation}() ignored (machine destroyed)`, {});
    }
    return this.finalized;
  }

  private notify(kind: string, details: NoticeDetails): void {
    this.kernel.emit(`${this.prefix}:${kind}`, {
      machine: this.prefix,
      state: this.active?.id ?? null,
      ...details,
    });
  }

  private trace(message: string, details: Record<string, unknown>): void {
    if (this.options.debug) {
      console.debug(`[ChainFSM] ${message}`, details);
    }
  }
}

const abortReason = (signal: AbortSignal | undefined): Error => {
  if (signal?.reason instanceof Error) {
    return signal.reason;
  }
  const error = new Error('The operation was aborted');
  error.name = 'AbortError';
  return error;
};

/**
 * Factory function to create a StateMachine instance
 */
export const createStateMachine = <Events extends EventMap = EventMap, TParams extends StateParams = []>(
  options?: MachineOptions<Events>
): StateMachine<Events, TParams> => {
  return new StateMachine<Events, TParams>(options);
};
