/**
 * Tests for the notification kernel
 *
 * Registration, priority ordering, synchronous delivery, wildcards,
 * once/predicate listeners, AbortSignal unbinding and the error boundary.
 */

import { describe, it, expect, vi, afterEach } from 'vitest';
import { Kernel, createKernel } from './kernel.js';
import { KernelEvent } from './kernel-event.js';

type TestEvents = {
  'test:simple': { value: number };
  'test:string': string;
  'fsm:enter:clean': { state: string };
  'fsm:enter:*': { state: string };
  'fsm:**': { state: string };
};

describe('Kernel', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe('createKernel factory', () => {
    it('should create a Kernel instance', () => {
      expect(createKernel()).toBeInstanceOf(Kernel);
      expect(createKernel<TestEvents>()).toBeInstanceOf(Kernel);
    });
  });

  describe('on()', () => {
    it('should register a listener and return an unbind function', () => {
      const kernel = createKernel<TestEvents>();

      const off = kernel.on('test:simple', vi.fn());

      expect(typeof off).toBe('function');
      expect(kernel.listenerCount('test:simple')).toBe(1);

      off();
      expect(kernel.listenerCount('test:simple')).toBe(0);
    });

    it('should run higher priorities first', () => {
      const kernel = createKernel<TestEvents>();
      const order: number[] = [];

      kernel.on('test:simple', () => order.push(1), { priority: 10 });
      kernel.on('test:simple', () => order.push(2), { priority: 50 });
      kernel.on('test:simple', () => order.push(3), { priority: 30 });

      kernel.emit('test:simple', { value: 1 });

      expect(order).toEqual([2, 3, 1]);
    });

    it('should keep registration order for equal priorities', () => {
      const kernel = createKernel<TestEvents>();
      const order: string[] = [];

      kernel.on('test:simple', () => order.push('a'));
      kernel.on('test:simple', () => order.push('b'));
      kernel.on('test:simple', () => order.push('c'));

      kernel.emit('test:simple', { value: 1 });

      expect(order).toEqual(['a', 'b', 'c']);
    });

    it('should warn when maxListeners is exceeded', () => {
      const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
      const kernel = createKernel<TestEvents>({ maxListeners: 1 });

      kernel.on('test:simple', vi.fn());
      kernel.on('test:simple', vi.fn());

      expect(warn).toHaveBeenCalledTimes(1);
      expect(warn).toHaveBeenCalledWith('MaxListenersExceeded: Event "test:simple" has 2 listeners (limit: 1)');
    });
  });

  describe('emit()', () => {
    it('should deliver a KernelEvent synchronously', () => {
      const kernel = createKernel<TestEvents>();
      const listener = vi.fn();
      kernel.on('test:simple', listener);

      kernel.emit('test:simple', { value: 42 });

      expect(listener).toHaveBeenCalledTimes(1);
      const event = listener.mock.calls[0][0];
      expect(event).toBeInstanceOf(KernelEvent);
      expect(event.name).toBe('test:simple');
      expect(event.data).toEqual({ value: 42 });
      expect(typeof event.timestamp).toBe('number');
    });

    it('should do nothing without listeners', () => {
      const kernel = createKernel<TestEvents>();

      expect(() => kernel.emit('test:string', 'nobody')).not.toThrow();
    });

    it('should stop delivery after stopPropagation()', () => {
      const kernel = createKernel<TestEvents>();
      const late = vi.fn();
      kernel.on('test:simple', (event) => event.stopPropagation(), { priority: 10 });
      kernel.on('test:simple', late);

      kernel.emit('test:simple', { value: 1 });

      expect(late).not.toHaveBeenCalled();
    });
  });

  describe('off()', () => {
    it('should remove one listener', () => {
      const kernel = createKernel<TestEvents>();
      const kept = vi.fn();
      const removed = vi.fn();
      kernel.on('test:simple', kept);
      kernel.on('test:simple', removed);

      kernel.off('test:simple', removed);
      kernel.emit('test:simple', { value: 1 });

      expect(kept).toHaveBeenCalledTimes(1);
      expect(removed).not.toHaveBeenCalled();
    });

    it('should remove every listener of a name', () => {
      const kernel = createKernel<TestEvents>();
      kernel.on('test:simple', vi.fn());
      kernel.on('test:simple', vi.fn());
      kernel.on('test:string', vi.fn());

      kernel.off('test:simple');

      expect(kernel.listenerCount('test:simple')).toBe(0);
      expect(kernel.eventNames()).toEqual(['test:string']);
    });

    it('should remove everything with offAll()', () => {
      const kernel = createKernel<TestEvents>();
      kernel.on('test:simple', vi.fn());
      kernel.on('test:string', vi.fn());

      kernel.offAll();

      expect(kernel.listenerCount()).toBe(0);
    });
  });

  describe('once', () => {
    it('should remove a once listener after its first delivery', () => {
      const kernel = createKernel<TestEvents>();
      const listener = vi.fn();
      kernel.once('test:simple', listener);

      kernel.emit('test:simple', { value: 1 });
      kernel.emit('test:simple', { value: 2 });

      expect(listener).toHaveBeenCalledTimes(1);
      expect(kernel.listenerCount('test:simple')).toBe(0);
    });

    it('should remove a predicate listener once the predicate holds', () => {
      const kernel = createKernel<TestEvents>();
      const listener = vi.fn();
      kernel.on('test:simple', listener, { once: (event) => event.data.value >= 2 });

      kernel.emit('test:simple', { value: 1 });
      kernel.emit('test:simple', { value: 2 });
      kernel.emit('test:simple', { value: 3 });

      expect(listener).toHaveBeenCalledTimes(2);
    });

    it('should deliver a once listener a single time when it emits again', () => {
      const kernel = createKernel<TestEvents>();
      const listener = vi.fn((event: KernelEvent<{ value: number }>) => {
        kernel.emit('test:simple', { value: event.data.value + 1 });
      });
      kernel.once('test:simple', listener);

      kernel.emit('test:simple', { value: 1 });

      expect(listener).toHaveBeenCalledTimes(1);
      expect(kernel.listenerCount('test:simple')).toBe(0);
    });

    it('should remove a predicate listener before a later listener emits again', () => {
      const kernel = createKernel<TestEvents>();
      const predicated = vi.fn();
      const relay = vi.fn((event: KernelEvent<{ value: number }>) => {
        if (event.data.value === 1) {
          kernel.emit('test:simple', { value: 2 });
        }
      });
      kernel.on('test:simple', predicated, { priority: 10, once: (event) => event.data.value >= 1 });
      kernel.on('test:simple', relay);

      kernel.emit('test:simple', { value: 1 });

      expect(predicated).toHaveBeenCalledTimes(1);
      expect(relay).toHaveBeenCalledTimes(2);
    });

    it('should skip a listener unbound earlier in the same delivery', () => {
      const kernel = createKernel<TestEvents>();
      const late = vi.fn();
      kernel.on('test:simple', () => offLate(), { priority: 10 });
      const offLate = kernel.on('test:simple', late);

      kernel.emit('test:simple', { value: 1 });

      expect(late).not.toHaveBeenCalled();
    });
  });

  describe('AbortSignal', () => {
    it('should unbind when the signal aborts', () => {
      const kernel = createKernel<TestEvents>();
      const controller = new AbortController();
      kernel.on('test:simple', vi.fn(), { signal: controller.signal });

      controller.abort();

      expect(kernel.listenerCount('test:simple')).toBe(0);
    });

    it('should not register with an already aborted signal', () => {
      const kernel = createKernel<TestEvents>();
      const controller = new AbortController();
      controller.abort();
      const listener = vi.fn();

      kernel.on('test:simple', listener, { signal: controller.signal });
      kernel.emit('test:simple', { value: 1 });

      expect(kernel.listenerCount('test:simple')).toBe(0);
      expect(listener).not.toHaveBeenCalled();
    });
  });

  describe('wildcards', () => {
    it('should deliver to matching patterns with the concrete name', () => {
      const kernel = createKernel<TestEvents>();
      const names: string[] = [];
      kernel.on('fsm:enter:*', (event) => names.push(`single:${event.name}`));
      kernel.on('fsm:**', (event) => names.push(`multi:${event.name}`));

      kernel.emit('fsm:enter:clean', { state: 'clean' });

      expect(names).toEqual(['single:fsm:enter:clean', 'multi:fsm:enter:clean']);
    });

    it('should order exact and pattern listeners by priority together', () => {
      const kernel = createKernel<TestEvents>();
      const order: string[] = [];
      kernel.on('fsm:enter:clean', () => order.push('exact'));
      kernel.on('fsm:**', () => order.push('pattern'), { priority: 5 });

      kernel.emit('fsm:enter:clean', { state: 'clean' });

      expect(order).toEqual(['pattern', 'exact']);
    });

    it('should remove a once pattern listener after delivery', () => {
      const kernel = createKernel<TestEvents>();
      const listener = vi.fn();
      kernel.once('fsm:**', listener);

      kernel.emit('fsm:enter:clean', { state: 'clean' });
      kernel.emit('fsm:enter:clean', { state: 'clean' });

      expect(listener).toHaveBeenCalledTimes(1);
      expect(kernel.listenerCount('fsm:**')).toBe(0);
    });

    it('should match names literally when wildcards are disabled', () => {
      const kernel = createKernel<TestEvents>({ wildcard: false });
      const pattern = vi.fn();
      const exact = vi.fn();
      kernel.on('fsm:enter:*', pattern);
      kernel.on('fsm:enter:clean', exact);

      kernel.emit('fsm:enter:clean', { state: 'clean' });

      expect(pattern).not.toHaveBeenCalled();
      expect(exact).toHaveBeenCalledTimes(1);
    });
  });

  describe('error boundary', () => {
    it('should report listener errors and keep delivering', () => {
      const onError = vi.fn();
      const kernel = createKernel<TestEvents>({ onError });
      const after = vi.fn();
      kernel.on('test:simple', () => {
        throw new Error('listener failed');
      }, { id: 'failing', priority: 1 });
      kernel.on('test:simple', after);

      kernel.emit('test:simple', { value: 1 });

      expect(after).toHaveBeenCalledTimes(1);
      expect(onError).toHaveBeenCalledTimes(1);
      expect(onError.mock.calls[0][0].message).toBe('listener failed');
      expect(onError.mock.calls[0][1]).toBeInstanceOf(KernelEvent);
      expect(kernel.getExecutionErrors().map((e) => e.listenerId)).toEqual(['failing']);

      kernel.clearExecutionErrors();
      expect(kernel.getExecutionErrors()).toEqual([]);
    });

    it('should keep the errors of the outer emit after a nested one', () => {
      const kernel = createKernel<TestEvents>({ onError: vi.fn() });
      kernel.on('test:string', () => {
        throw new Error('inner failed');
      }, { id: 'inner' });
      kernel.on('test:simple', () => {
        kernel.emit('test:string', 'nested');
        throw new Error('outer failed');
      }, { id: 'outer' });

      kernel.emit('test:simple', { value: 1 });

      expect(kernel.getExecutionErrors().map((e) => e.listenerId)).toEqual(['outer']);
    });

    it('should normalize non-Error throws', () => {
      const onError = vi.fn();
      const kernel = createKernel<TestEvents>({ onError });
      kernel.on('test:simple', () => {
        throw 'plain string';
      });

      kernel.emit('test:simple', { value: 1 });

      expect(onError.mock.calls[0][0]).toBeInstanceOf(Error);
      expect(onError.mock.calls[0][0].message).toBe('plain string');
    });

    it('should log to console.error by default', () => {
      const consoleError = vi.spyOn(console, 'error').mockImplementation(() => {});
      const kernel = createKernel<TestEvents>();
      const error = new Error('listener failed');
      kernel.on('test:simple', () => {
        throw error;
      });

      kernel.emit('test:simple', { value: 1 });

      expect(consoleError).toHaveBeenCalledWith('Kernel error:', error);
    });

    it('should rethrow and stop delivering without the boundary', () => {
      const kernel = createKernel<TestEvents>({ errorBoundary: false });
      const first = vi.fn();
      const after = vi.fn();
      kernel.once('test:simple', first, { priority: 10 });
      kernel.on('test:simple', () => {
        throw new Error('listener failed');
      }, { priority: 5 });
      kernel.on('test:simple', after);

      expect(() => kernel.emit('test:simple', { value: 1 })).toThrow('listener failed');
      expect(first).toHaveBeenCalledTimes(1);
      expect(after).not.toHaveBeenCalled();
      expect(kernel.listenerCount('test:simple')).toBe(2);
    });
  });

  describe('debug mode', () => {
    it('should trace initialization and deliveries', () => {
      const debug = vi.spyOn(console, 'debug').mockImplementation(() => {});
      const kernel = createKernel<TestEvents>({ debug: true });
      kernel.on('test:simple', vi.fn());

      kernel.emit('test:simple', { value: 1 });

      expect(debug).toHaveBeenCalledWith('[ChainFSM] Kernel initialized', {
        delimiter: ':',
        wildcard: true,
        maxListeners: Infinity,
        errorBoundary: true,
      });
      expect(debug).toHaveBeenCalledWith('[ChainFSM] Event emitted', { event: 'test:simple', listenerCount: 1 });
    });

    it('should toggle tracing at runtime', () => {
      const debug = vi.spyOn(console, 'debug').mockImplementation(() => {});
      const kernel = createKernel<TestEvents>();

      kernel.emit('test:string', 'quiet');
      expect(debug).not.toHaveBeenCalled();

      kernel.debug(true);
      kernel.emit('test:string', 'loud');

      expect(debug).toHaveBeenCalledWith('[ChainFSM] Kernel debug mode enabled');
      expect(debug).toHaveBeenCalledWith('[ChainFSM] Event emitted (no listeners)', { event: 'test:string' });
    });
  });
});
