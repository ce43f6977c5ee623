import { beforeEach, describe, expect, it } from 'vitest';
import {
  gracefulCleanup,
  registerCleanupResource,
  resetCleanupState,
} from '../../src/core/process-handlers.js';

describe('gracefulCleanup', () => {
  beforeEach(() => {
    resetCleanupState();
  });

  it('should close the server before the store, once', async () => {
    const order: string[] = [];
    registerCleanupResource('server', {
      close: (callback) => {
        order.push('server');
        callback?.();
      },
    });
    registerCleanupResource('store', {
      close: async () => {
        order.push('store');
      },
    });

    await gracefulCleanup('test');
    await gracefulCleanup('again');

    expect(order).toEqual(['server', 'store']);
  });

  it('should still close the store when the server fails to close', async () => {
    const order: string[] = [];
    registerCleanupResource('server', {
      close: (callback) => {
        callback?.(new Error('already closed'));
      },
    });
    registerCleanupResource('store', {
      close: async () => {
        order.push('store');
      },
    });

    await gracefulCleanup('test');

    expect(order).toEqual(['store']);
  });
});
