/**
 * Mutex tests.
 */
import { describe, it, expect } from 'vitest';
import { wait } from '@logosdx/utils';

import { Mutex } from '../../../src/core/mutex/index.js';
import { LockTimeoutError } from '../../../src/core/lock/index.js';
import { observer } from '../../../src/core/observer.js';
import { deferred, Overlap } from '../../utils/fakes.js';

describe('mutex: Mutex', () => {

    it('should return the function result', async () => {

        const mutex = new Mutex('test');

        const result = await mutex.lock(async () => 42);

        expect(result).toBe(42);
        expect(mutex.locked).toBe(false);

    });

    it('should hold the lock while the function runs', async () => {

        const mutex = new Mutex('test');
        const gate = deferred();

        const held = mutex.lock(() => gate.promise);

        expect(mutex.locked).toBe(true);

        gate.resolve();
        await held;

        expect(mutex.locked).toBe(false);

    });

    it('should never run two functions at once', async () => {

        const mutex = new Mutex('test');
        const overlap = new Overlap();

        await Promise.all(
            Array.from({ length: 5 }, () => mutex.lock(() => overlap.run(() => wait(2)))),
        );

        expect(overlap.max).toBe(1);

    });

    it('should grant waiters in FIFO order', async () => {

        const mutex = new Mutex('test');
        const gate = deferred();
        const order: number[] = [];

        const first = mutex.lock(() => gate.promise);
        const waiters = [1, 2, 3].map((n) => mutex.lock(async () => {

            order.push(n);

        }));

        expect(mutex.pending).toBe(3);

        gate.resolve();
        await Promise.all([first, ...waiters]);

        expect(order).toEqual([1, 2, 3]);
        expect(mutex.pending).toBe(0);

    });

    it('should release when the function throws', async () => {

        const mutex = new Mutex('test');

        await expect(mutex.lock(async () => {

            throw new Error('boom');

        })).rejects.toThrow('boom');

        expect(mutex.locked).toBe(false);
        await expect(mutex.lock(async () => 'next')).resolves.toBe('next');

    });

    describe('timeout', () => {

        it('should reject with LockTimeoutError and never call the function', async () => {

            const mutex = new Mutex('writer');
            const gate = deferred();
            let called = false;

            const held = mutex.lock(() => gate.promise);

            const err = await mutex.lock(async () => {

                called = true;

            }, { timeout: 10 }).catch((e: unknown) => e);

            expect(err).toBeInstanceOf(LockTimeoutError);
            expect(err).toMatchObject({ mode: 'exclusive', timeout: 10, lockName: 'writer' });
            expect(called).toBe(false);
            expect(mutex.pending).toBe(0);

            gate.resolve();
            await held;

        });

        it('should emit lock:timeout when giving up', async () => {

            const mutex = new Mutex('reader-3');
            const gate = deferred();
            const timeouts: Array<{ mode: string; timeout: number }> = [];

            const stop = observer.on('lock:timeout', ({ name, mode, timeout }) => {

                if (name === 'reader-3') {

                    timeouts.push({ mode, timeout });

                }

            });

            const held = mutex.lock(() => gate.promise);

            await expect(mutex.lock(async () => {}, { timeout: 10 })).rejects.toBeInstanceOf(LockTimeoutError);
            await expect(mutex.lock(async () => {}, { timeout: 0 })).rejects.toBeInstanceOf(LockTimeoutError);

            stop();

            expect(timeouts).toEqual([
                { mode: 'exclusive', timeout: 10 },
                { mode: 'exclusive', timeout: 0 },
            ]);

            gate.resolve();
            await held;

        });

        it('should acquire a free mutex even with a zero timeout', async () => {

            const mutex = new Mutex('test');

            await expect(mutex.lock(async () => 'ok', { timeout: 0 })).resolves.toBe('ok');

        });

        it('should fail a zero timeout at once when held', async () => {

            const mutex = new Mutex('test');
            const gate = deferred();

            const held = mutex.lock(() => gate.promise);

            await expect(mutex.lock(async () => 'late', { timeout: 0 }))
                .rejects.toBeInstanceOf(LockTimeoutError);

            gate.resolve();
            await held;

        });

        it('should pass the lock to the next waiter after a timed-out one', async () => {

            const mutex = new Mutex('test');
            const gate = deferred();

            const held = mutex.lock(() => gate.promise);
            const timedOut = mutex.lock(async () => 'never', { timeout: 5 });
            const patient = mutex.lock(async () => 'patient');

            await expect(timedOut).rejects.toBeInstanceOf(LockTimeoutError);

            gate.resolve();
            await held;

            await expect(patient).resolves.toBe('patient');

        });

    });

});
