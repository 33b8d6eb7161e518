/**
 * FSM Module - chained states, routed events and interruption policies
 *
 * @example
 * ```ts
 * import { StateMachine, type StateContext } from 'chainfsm/fsm';
 *
 * type Events = { clean: { room: string } };
 *
 * class Idle {}
 * class Cleaning {
 *   constructor(private readonly ctx: StateContext<Events, []>) {}
 *   onEvent(): void {
 *     console.log('cleaning', this.ctx.takeEvent('clean')?.data.room);
 *     this.ctx.advance();
 *   }
 * }
 *
 * const fsm = new StateMachine<Events>()
 *   .registerState('idle', Idle)
 *   .registerState('cleaning', Cleaning)
 *   .registerChain('cleaning', 'idle')
 *   .registerEventRoute('cleaning', 'clean');
 *
 * fsm.kernel.on('fsm:enter:*', (e) => console.log('entered', e.data.to));
 * fsm.enter('idle');
 * fsm.post('clean', { room: 'kitchen' }); // cleaning -> idle
 * ```
 */

export { StateMachine, createStateMachine } from './state-machine.js';
export { StateContext } from './state-context.js';
export type { StateContextMachine, StateContextInbox } from './state-context.js';
export { decide } from './interruption-policy.js';

export type {
  StateId,
  EventKey,
  StateParams,
  StateConstructor,
  EventHandlingState,
  DisposableState,
  PendingEvent,
  PendingEvents,
  EventGuards,
  Verdict,
  ListKind,
  InterruptionLists,
  TransitionTrigger,
  MachineNotice,
  MachineNotices,
  LifecyclePhase,
  MachineOptions,
  WaitForOptions,
} from './types.js';

export {
  hasEventHandler,
  isDisposable,
  ArityMismatchError,
  StateLifecycleError,
  WaitTimeoutError,
} from './types.js';
