import { afterEach, describe, expect, it, jest } from '@jest/globals';
import {
  createInterruptContext,
  installInterruptHandler,
  INTERRUPTED_EXIT_CODE,
} from '../../src/workflows/interrupt.js';
import type { InvocationPlan } from '../../src/workflows/types.js';
import { createFakeEngine, createMemoryLogger, makeConfig } from '../helpers/fakes.js';

function planOf(...parallel: boolean[]): InvocationPlan {
  return { mode: 'directives', runs: parallel.map((value) => makeConfig({ parallel: value })) };
}

describe('createInterruptContext', () => {
  it('is parallel when any planned run is parallel', () => {
    expect(createInterruptContext(planOf(false, true))).toEqual({ parallel: true });
    expect(createInterruptContext(planOf(false, false))).toEqual({ parallel: false });
  });

  it('cannot be changed after setup', () => {
    expect(Object.isFrozen(createInterruptContext(planOf(true)))).toBe(true);
  });
});

describe('installInterruptHandler', () => {
  let uninstall: (() => void) | undefined;

  afterEach(() => {
    uninstall?.();
    uninstall = undefined;
  });

  it('forwards the received signal for sequential runs and exits', () => {
    const { engine, interrupt } = createFakeEngine();
    const { logger, messages } = createMemoryLogger();
    const exit = jest.fn((_code: number): void => undefined);

    uninstall = installInterruptHandler({ parallel: false }, engine, { logger, exit });
    process.emit('SIGINT', 'SIGINT');

    expect(interrupt).toHaveBeenCalledWith('SIGINT');
    expect(exit).toHaveBeenCalledWith(INTERRUPTED_EXIT_CODE);
    expect(messages('warn')).toEqual(['Received SIGINT. Stopping running workflows...']);
  });

  it('terminates every process of a parallel run', () => {
    const { engine, interrupt } = createFakeEngine();
    const { logger } = createMemoryLogger();
    const exit = jest.fn((_code: number): void => undefined);

    uninstall = installInterruptHandler({ parallel: true }, engine, { logger, exit });
    process.emit('SIGINT', 'SIGINT');

    expect(interrupt).toHaveBeenCalledWith('SIGTERM');
  });

  it('handles only the first signal', () => {
    const { engine, interrupt } = createFakeEngine();
    const { logger } = createMemoryLogger();
    const exit = jest.fn((_code: number): void => undefined);

    uninstall = installInterruptHandler({ parallel: false }, engine, { logger, exit });
    process.emit('SIGTERM', 'SIGTERM');
    process.emit('SIGINT', 'SIGINT');

    expect(interrupt).toHaveBeenCalledTimes(1);
    expect(exit).toHaveBeenCalledTimes(1);
  });

  it('removes its listeners', () => {
    const { engine } = createFakeEngine();
    const { logger } = createMemoryLogger();
    const before = process.listenerCount('SIGINT');

    const remove = installInterruptHandler({ parallel: false }, engine, { logger, exit: () => undefined });
    expect(process.listenerCount('SIGINT')).toBe(before + 1);

    remove();
    expect(process.listenerCount('SIGINT')).toBe(before);
  });
});
