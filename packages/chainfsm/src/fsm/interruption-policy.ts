/**
 * Interruption policy: may an incoming event preempt the active state?
 *
 * Evaluation order matters more than list disjointness: an event listed in
 * both the whitelist and the deferlist is deferred, an event listed in both
 * the blacklist and the deferlist is rejected.
 */

import type { InterruptionLists, Verdict } from './types.js';

/**
 * Decide what happens to `event` while a state with `lists` is active
 *
 * 1. non-empty whitelist without the event -> reject
 * 2. blacklisted -> reject
 * 3. deferlisted -> defer
 * 4. otherwise -> accept
 */
export function decide(lists: InterruptionLists, event: string): Verdict {
  if (lists.whitelist.size > 0 && !lists.whitelist.has(event)) {
    return 'reject';
  }
  if (lists.blacklist.has(event)) {
    return 'reject';
  }
  if (lists.deferlist.has(event)) {
    return 'defer';
  }
  return 'accept';
}
