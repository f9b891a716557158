/**
 * Lock arbiter tests.
 */
import { describe, it, expect, afterEach } from 'vitest';

import {
    LockArbiter,
    LockNotHeldError,
    LockTimeoutError,
} from '../../../src/core/lock/index.js';
import { observer } from '../../../src/core/observer.js';

/**
 * Flush pending promise callbacks.
 */
async function settle(): Promise<void> {

    await new Promise((resolve) => setImmediate(resolve));

}

describe('lock: LockArbiter', () => {

    const cleanups: Array<() => void> = [];

    afterEach(() => {

        for (const cleanup of cleanups.splice(0)) {

            cleanup();

        }

    });

    describe('shared grants', () => {

        it('should start unlocked', () => {

            const arbiter = new LockArbiter('main');

            expect(arbiter.state).toEqual({ status: 'unlocked' });
            expect(arbiter.pending).toBe(0);

        });

        it('should let shared holders coexist', async () => {

            const arbiter = new LockArbiter('main');

            await arbiter.acquire('a', 'shared');
            await arbiter.acquire('b', 'shared');

            expect(arbiter.state).toEqual({ status: 'shared', holders: 2 });

        });

        it('should count repeated grants to one holder', async () => {

            const arbiter = new LockArbiter('main');

            await arbiter.acquire('a', 'shared');
            await arbiter.acquire('a', 'shared');

            arbiter.release('a');
            expect(arbiter.state).toEqual({ status: 'shared', holders: 1 });

            arbiter.release('a');
            expect(arbiter.state).toEqual({ status: 'unlocked' });

        });

    });

    describe('exclusive grants', () => {

        it('should grant exclusive only from unlocked', async () => {

            const arbiter = new LockArbiter('main');
            let granted = false;

            await arbiter.acquire('reader', 'shared');

            const write = arbiter.acquire('writer', 'exclusive').then(() => {

                granted = true;

            });

            await settle();
            expect(granted).toBe(false);
            expect(arbiter.pending).toBe(1);

            arbiter.release('reader');
            await write;

            expect(granted).toBe(true);
            expect(arbiter.state).toEqual({ status: 'exclusive', holder: 'writer' });

        });

        it('should wait for both shared holders before granting exclusive', async () => {

            const arbiter = new LockArbiter('main');
            let granted = false;

            await arbiter.acquire(1, 'shared');
            await arbiter.acquire(2, 'shared');

            const write = arbiter.acquire(3, 'exclusive').then(() => {

                granted = true;

            });

            arbiter.release(1);
            await settle();
            expect(granted).toBe(false);

            arbiter.release(2);
            await write;
            expect(granted).toBe(true);

        });

        it('should block shared requests while exclusive is held', async () => {

            const arbiter = new LockArbiter('main');
            let granted = false;

            await arbiter.acquire('writer', 'exclusive');

            const read = arbiter.acquire('reader', 'shared').then(() => {

                granted = true;

            });

            await settle();
            expect(granted).toBe(false);

            arbiter.release('writer');
            await read;

            expect(arbiter.state).toEqual({ status: 'shared', holders: 1 });

        });

    });

    describe('fairness', () => {

        it('should hold back shared requests queued behind an exclusive one', async () => {

            const arbiter = new LockArbiter('main');
            const order: string[] = [];

            await arbiter.acquire('r1', 'shared');

            const write = arbiter.acquire('w', 'exclusive').then(() => order.push('w'));
            const lateRead = arbiter.acquire('r2', 'shared').then(() => order.push('r2'));

            await settle();
            expect(order).toEqual([]);

            arbiter.release('r1');
            await write;

            arbiter.release('w');
            await lateRead;

            expect(order).toEqual(['w', 'r2']);

        });

        it('should wake consecutive shared waiters together', async () => {

            const arbiter = new LockArbiter('main');

            await arbiter.acquire('w', 'exclusive');

            const reads = Promise.all([
                arbiter.acquire('r1', 'shared'),
                arbiter.acquire('r2', 'shared'),
                arbiter.acquire('r3', 'shared'),
            ]);

            arbiter.release('w');
            await reads;

            expect(arbiter.state).toEqual({ status: 'shared', holders: 3 });

        });

    });

    describe('timeouts', () => {

        it('should reject with LockTimeoutError and leave the queue', async () => {

            const arbiter = new LockArbiter('main');

            await arbiter.acquire('w', 'exclusive');

            const err = await arbiter.acquire('r', 'shared', { timeout: 10 }).catch((e: unknown) => e);

            expect(err).toBeInstanceOf(LockTimeoutError);
            expect(err).toMatchObject({ mode: 'shared', timeout: 10, lockName: 'main' });
            expect(arbiter.pending).toBe(0);
            expect(arbiter.state).toEqual({ status: 'exclusive', holder: 'w' });

        });

        it('should fail a zero timeout at once when the grant is unavailable', async () => {

            const arbiter = new LockArbiter('main');

            await arbiter.acquire('r', 'shared');

            await expect(arbiter.acquire('w', 'exclusive', { timeout: 0 }))
                .rejects.toBeInstanceOf(LockTimeoutError);
            expect(arbiter.pending).toBe(0);

        });

        it('should release shared waiters held back by a timed-out exclusive request', async () => {

            const arbiter = new LockArbiter('main');

            await arbiter.acquire('r1', 'shared');

            const write = arbiter.acquire('w', 'exclusive', { timeout: 10 });
            const read = arbiter.acquire('r2', 'shared');

            await expect(write).rejects.toBeInstanceOf(LockTimeoutError);
            await read;

            expect(arbiter.state).toEqual({ status: 'shared', holders: 2 });

        });

    });

    describe('release', () => {

        it('should throw LockNotHeldError for a holder without a grant', () => {

            const arbiter = new LockArbiter('main');

            expect(() => arbiter.release('nobody')).toThrow(LockNotHeldError);

        });

        it('should not let a shared holder release an exclusive grant', async () => {

            const arbiter = new LockArbiter('main');

            await arbiter.acquire('w', 'exclusive');

            expect(() => arbiter.release('other')).toThrow(LockNotHeldError);
            expect(arbiter.state).toEqual({ status: 'exclusive', holder: 'w' });

        });

    });

    describe('releaseAll', () => {

        it('should drop every grant and queued request of a holder', async () => {

            const arbiter = new LockArbiter('main');
            const gone = new Error('gone');

            await arbiter.acquire(1, 'shared');
            await arbiter.acquire(1, 'shared');
            await arbiter.acquire(2, 'shared');

            const queued = arbiter.acquire(1, 'exclusive').catch((e: unknown) => e);

            const released = arbiter.releaseAll(1, gone);

            expect(released).toBe(2);
            expect(await queued).toBe(gone);
            expect(arbiter.state).toEqual({ status: 'shared', holders: 1 });
            expect(arbiter.pending).toBe(0);

        });

        it('should hand an abandoned exclusive grant to the next waiter', async () => {

            const arbiter = new LockArbiter('main');

            await arbiter.acquire(1, 'exclusive');

            const next = arbiter.acquire(2, 'exclusive');

            expect(arbiter.releaseAll(1, new Error('gone'))).toBe(1);
            await next;

            expect(arbiter.state).toEqual({ status: 'exclusive', holder: 2 });

        });

    });

    describe('withLock', () => {

        it('should release after the function throws', async () => {

            const arbiter = new LockArbiter('main');

            await expect(arbiter.withLock('w', 'exclusive', async () => {

                throw new Error('boom');

            })).rejects.toThrow('boom');

            expect(arbiter.state).toEqual({ status: 'unlocked' });

        });

    });

    describe('events', () => {

        it('should emit acquired and released', async () => {

            const arbiter = new LockArbiter('events-arbiter');
            const events: string[] = [];

            cleanups.push(observer.on('lock:acquired', (data) => {

                if (data.name === 'events-arbiter') {

                    events.push(`acquired:${data.mode}`);

                }

            }));
            cleanups.push(observer.on('lock:released', (data) => {

                if (data.name === 'events-arbiter') {

                    events.push(`released:${data.mode}`);

                }

            }));

            await arbiter.withLock('w', 'exclusive', async () => {});

            expect(events).toEqual(['acquired:exclusive', 'released:exclusive']);

        });

        it('should emit lock:timeout', async () => {

            const arbiter = new LockArbiter('timeout-arbiter');
            const timeouts: number[] = [];

            cleanups.push(observer.on('lock:timeout', (data) => {

                if (data.name === 'timeout-arbiter') {

                    timeouts.push(data.timeout);

                }

            }));

            await arbiter.acquire('w', 'exclusive');
            await arbiter.acquire('r', 'shared', { timeout: 5 }).catch(() => undefined);

            expect(timeouts).toEqual([5]);

        });

    });

});
