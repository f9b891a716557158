/**
 * Connection pool tests.
 *
 * Run against in-memory engines so that how many connections get opened,
 * and which callbacks overlap, can be observed exactly.
 */
import { describe, it, expect, afterEach } from 'vitest';
import { wait } from '@logosdx/utils';

import { ConnectionPool } from '../../../src/core/pool/index.js';
import { DatabaseClosedError, LockTimeoutError } from '../../../src/core/lock/index.js';
import { observer } from '../../../src/core/observer.js';
import { countdown, deferred, FakeFactory, Overlap } from '../../utils/fakes.js';

function makePool(maxReaders: number, lockTimeout?: number) {

    const factory = new FakeFactory();
    const pool = new ConnectionPool({ factory, maxReaders, debugName: 'pool', lockTimeout });

    return { pool, factory };

}

describe('pool: ConnectionPool', () => {

    const cleanups: Array<() => void> = [];

    afterEach(() => {

        for (const cleanup of cleanups.splice(0)) {

            cleanup();

        }

    });

    describe('options', () => {

        it('should reject a pool without readers', () => {

            expect(() => makePool(0)).toThrow(RangeError);
            expect(() => makePool(1.5)).toThrow('maxReaders must be a whole number of at least 1, got 1.5');

        });

    });

    describe('write connection', () => {

        it('should open the write connection on first write and reuse it', async () => {

            const { pool, factory } = makePool(2);

            expect(pool.hasWriter).toBe(false);

            await pool.writeLock(async () => {});
            await pool.writeLock(async () => {});

            expect(pool.hasWriter).toBe(true);
            expect(factory.writers).toHaveLength(1);

        });

        it('should never overlap write callbacks', async () => {

            const { pool } = makePool(2);
            const overlap = new Overlap();

            await Promise.all(
                Array.from({ length: 5 }, () => pool.writeLock(() => overlap.run(() => wait(2)))),
            );

            expect(overlap.max).toBe(1);

        });

        it('should time out a second write while the first is in flight', async () => {

            const { pool } = makePool(2);
            const gate = deferred();
            const entered = deferred();
            let secondRan = false;

            const first = pool.writeLock(async () => {

                entered.resolve();
                await gate.promise;

                return 'A';

            });

            await entered.promise;

            const err = await pool.writeLock(async () => {

                secondRan = true;

            }, { timeout: 10 }).catch((e: unknown) => e);

            expect(err).toBeInstanceOf(LockTimeoutError);
            expect(secondRan).toBe(false);

            gate.resolve();

            await expect(first).resolves.toBe('A');
            await expect(pool.writeLock(async () => 'C')).resolves.toBe('C');

        });

        it('should apply the pool lock timeout when a call passes none', async () => {

            const { pool } = makePool(2, 10);
            const gate = deferred();
            const entered = deferred();

            const first = pool.writeLock(async () => {

                entered.resolve();
                await gate.promise;

            });

            await entered.promise;

            await expect(pool.writeLock(async () => {})).rejects.toBeInstanceOf(LockTimeoutError);

            gate.resolve();
            await first;

        });

    });

    describe('read connections', () => {

        it('should let reads overlap each other', async () => {

            const { pool } = makePool(2);
            const gate = deferred();
            const inside = countdown(2);
            const overlap = new Overlap();

            const reads = Promise.all([1, 2].map(() => pool.readLock(() => overlap.run(async () => {

                inside.arrive();
                await gate.promise;

            }))));

            await inside.done;

            expect(overlap.active).toBe(2);

            gate.resolve();
            await reads;

        });

        it('should never run a read while a write holds the database', async () => {

            const { pool } = makePool(2);
            const gate = deferred();
            const entered = deferred();
            const events: string[] = [];

            const write = pool.writeLock(async () => {

                events.push('write-start');
                entered.resolve();
                await gate.promise;
                events.push('write-end');

            });

            await entered.promise;

            const read = pool.readLock(async () => {

                events.push('read');

            });

            await wait(10);
            expect(events).toEqual(['write-start']);

            gate.resolve();
            await Promise.all([write, read]);

            expect(events).toEqual(['write-start', 'write-end', 'read']);

        });

        it('should open exactly two readers for three concurrent reads with maxReaders=2', async () => {

            const { pool, factory } = makePool(2);
            let ran = 0;

            await Promise.all([1, 2, 3].map(() => pool.readLock(async () => {

                ran++;
                await wait(2);

            })));

            expect(ran).toBe(3);
            expect(factory.readers).toHaveLength(2);
            expect(pool.readerCount).toBe(2);

        });

        it('should never open more than maxReaders readers', async () => {

            const { pool, factory } = makePool(3);

            await Promise.all(
                Array.from({ length: 10 }, () => pool.readLock(() => wait(3))),
            );

            expect(factory.readers).toHaveLength(3);

        });

        it('should reuse an idle reader instead of opening another', async () => {

            const { pool, factory } = makePool(4);

            await pool.readLock(async () => {});
            await pool.readLock(async () => {});
            await pool.readLock(async () => {});

            expect(factory.readers).toHaveLength(1);

        });

        it('should run each read callback exactly once', async () => {

            const { pool } = makePool(3);
            const calls: number[] = [];

            await Promise.all([0, 1, 2, 3, 4].map((n) => pool.readLock(async () => {

                calls.push(n);
                await wait(1);

            })));

            expect(calls.sort()).toEqual([0, 1, 2, 3, 4]);

        });

        it('should time out when every read attempt times out', async () => {

            const { pool } = makePool(2);
            const gate = deferred();
            const inside = countdown(2);
            let ran = false;

            const busy = Promise.all([1, 2].map(() => pool.readLock(async () => {

                inside.arrive();
                await gate.promise;

            })));

            await inside.done;

            const err = await pool.readLock(async () => {

                ran = true;

            }, { timeout: 10 }).catch((e: unknown) => e);

            expect(err).toBeInstanceOf(LockTimeoutError);
            expect(err).toMatchObject({ mode: 'shared', timeout: 10, lockName: 'pool' });
            expect(ran).toBe(false);

            gate.resolve();
            await busy;

        });

        it('should ignore a losing attempt timing out when another attempt wins', async () => {

            const { pool, factory } = makePool(2);
            const gate = deferred();
            const entered = deferred();
            const timedOut: string[] = [];

            cleanups.push(observer.on('lock:timeout', ({ name }) => {

                timedOut.push(name);

            }));

            const held = pool.readLock(async () => {

                entered.resolve();
                await gate.promise;

            });

            await entered.promise;

            const result = await pool.readLock(async () => {

                await wait(20);

                return 'won';

            }, { timeout: 10 });

            expect(result).toBe('won');
            expect(timedOut).toEqual(['pool-reader-1']);
            expect(factory.readers).toHaveLength(2);

            gate.resolve();
            await held;

        });

        it('should make the requesting read wait for the reader it opened', async () => {

            const { pool, factory } = makePool(1);
            const seen: string[] = [];

            factory.openDelay = 20;

            const first = pool.readLock(async () => {

                seen.push(`first:${factory.readers.length}`);

            });

            await wait(5);

            expect(pool.readerCount).toBe(1);
            expect(factory.readers).toHaveLength(0);
            expect(seen).toEqual([]);

            const second = pool.readLock(async () => {

                seen.push(`second:${factory.readers.length}`);

            });

            await Promise.all([first, second]);

            expect(seen.sort()).toEqual(['first:1', 'second:1']);
            expect(factory.opened).toHaveLength(1);

        });

        it('should stay within maxReaders while readers are still opening', async () => {

            const { pool, factory } = makePool(2);
            const seen: number[] = [];

            factory.openDelay = 20;

            await Promise.all(Array.from({ length: 5 }, () => pool.readLock(async () => {

                seen.push(factory.readers.length);

            })));

            expect(seen).toHaveLength(5);
            expect(Math.min(...seen)).toBeGreaterThanOrEqual(1);
            expect(factory.readers).toHaveLength(2);
            expect(pool.readerCount).toBe(2);

        });

        it('should propagate the winning callback error unchanged', async () => {

            const { pool } = makePool(2);
            const boom = new Error('boom');

            await expect(pool.readLock(async () => {

                throw boom;

            })).rejects.toBe(boom);

        });

        it('should drop a reader that failed to open', async () => {

            const { pool, factory } = makePool(2);

            factory.failNext = new Error('cannot open');

            await expect(pool.readLock(async () => 'x')).rejects.toThrow('cannot open');
            expect(pool.readerCount).toBe(0);

            await expect(pool.readLock(async () => 'y')).resolves.toBe('y');
            expect(pool.readerCount).toBe(1);

        });

        it('should emit pool:grow as readers are added', async () => {

            const { pool } = makePool(2);
            const sizes: number[] = [];

            cleanups.push(observer.on('pool:grow', ({ name, readers }) => {

                if (name === 'pool') {

                    sizes.push(readers);

                }

            }));

            await Promise.all([1, 2].map(() => pool.readLock(() => wait(2))));

            expect(sizes).toEqual([1, 2]);

        });

    });

    describe('getAutoCommit', () => {

        it('should be true before any write', async () => {

            const { pool } = makePool(2);

            await expect(pool.getAutoCommit()).resolves.toBe(true);

        });

        it('should ask the write connection', async () => {

            const { pool, factory } = makePool(2);

            await pool.writeLock(async () => {});

            const writer = factory.writers[0];

            if (writer) {

                writer.autoCommit = false;

            }

            await expect(pool.getAutoCommit()).resolves.toBe(false);

        });

    });

    describe('close', () => {

        it('should dispose every connection', async () => {

            const { pool, factory } = makePool(2);

            await pool.writeLock(async () => {});
            await pool.readLock(async () => {});

            await pool.close();

            expect(factory.opened.map((engine) => engine.disposed)).toEqual([true, true]);
            expect(pool.closed).toBe(true);
            expect(pool.readerCount).toBe(0);

        });

        it('should reject lock calls after close', async () => {

            const { pool } = makePool(2);

            await pool.close();

            await expect(pool.readLock(async () => {})).rejects.toBeInstanceOf(DatabaseClosedError);
            await expect(pool.writeLock(async () => {})).rejects.toBeInstanceOf(DatabaseClosedError);

        });

    });

});
