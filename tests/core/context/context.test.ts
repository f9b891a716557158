/**
 * Read/write context tests.
 */
import { describe, it, expect } from 'vitest';

import {
    CardinalityError,
    ContextClosedError,
    ScopedReadContext,
    ScopedWriteContext,
    withContext,
    type ReadContext,
} from '../../../src/core/context/index.js';
import { FakeEngine } from '../../utils/fakes.js';

function owner(closed = false): { closed: boolean } {

    return { closed };

}

describe('context: ScopedReadContext', () => {

    describe('get', () => {

        it('should return the single row unchanged', async () => {

            const engine = new FakeEngine(true, 'reader');
            engine.rows = [{ id: 1, title: 'milk' }];

            const tx = new ScopedReadContext(engine, owner());

            await expect(tx.get('SELECT * FROM todos')).resolves.toEqual({ id: 1, title: 'milk' });

        });

        it('should throw CardinalityError on zero rows', async () => {

            const tx = new ScopedReadContext(new FakeEngine(true, 'reader'), owner());

            const err = await tx.get('SELECT * FROM todos').catch((e: unknown) => e);

            expect(err).toBeInstanceOf(CardinalityError);
            expect(err).toMatchObject({ expected: 'exactly one', actual: 0, sql: 'SELECT * FROM todos' });

        });

        it('should throw CardinalityError on two rows', async () => {

            const engine = new FakeEngine(true, 'reader');
            engine.rows = [{ id: 1 }, { id: 2 }];

            const tx = new ScopedReadContext(engine, owner());

            const err = await tx.get('SELECT id FROM todos').catch((e: unknown) => e);

            expect(err).toBeInstanceOf(CardinalityError);
            expect((err instanceof Error) ? err.message : '').toBe('Expected exactly one row, got 2');

        });

    });

    describe('getOptional', () => {

        it('should return null on zero rows', async () => {

            const tx = new ScopedReadContext(new FakeEngine(true, 'reader'), owner());

            await expect(tx.getOptional('SELECT * FROM todos')).resolves.toBeNull();

        });

        it('should return the single row unchanged', async () => {

            const engine = new FakeEngine(true, 'reader');
            engine.rows = [{ id: 3 }];

            const tx = new ScopedReadContext(engine, owner());

            await expect(tx.getOptional('SELECT id FROM todos')).resolves.toEqual({ id: 3 });

        });

        it('should throw CardinalityError on more than one row', async () => {

            const engine = new FakeEngine(true, 'reader');
            engine.rows = [{ id: 1 }, { id: 2 }, { id: 3 }];

            const tx = new ScopedReadContext(engine, owner());

            await expect(tx.getOptional('SELECT id FROM todos')).rejects.toMatchObject({
                name: 'CardinalityError',
                expected: 'at most one',
                actual: 3,
            });

        });

    });

    describe('getAll', () => {

        it('should return every row', async () => {

            const engine = new FakeEngine(true, 'reader');
            engine.rows = [{ id: 1 }, { id: 2 }];

            const tx = new ScopedReadContext(engine, owner());

            await expect(tx.getAll('SELECT id FROM todos')).resolves.toEqual([{ id: 1 }, { id: 2 }]);

        });

    });

    describe('closing', () => {

        it('should reject every operation once marked closed', async () => {

            const engine = new FakeEngine(true, 'reader');
            const tx = new ScopedReadContext(engine, owner(), 'load-todos');

            tx.markClosed();

            expect(tx.closed).toBe(true);
            await expect(tx.getAll('SELECT 1')).rejects.toBeInstanceOf(ContextClosedError);
            await expect(tx.get('SELECT 1')).rejects.toBeInstanceOf(ContextClosedError);
            await expect(tx.getOptional('SELECT 1')).rejects.toBeInstanceOf(ContextClosedError);
            await expect(tx.getAutoCommit()).rejects.toBeInstanceOf(ContextClosedError);
            expect(engine.statements).toEqual([]);

        });

        it('should name the debug context in the error', async () => {

            const tx = new ScopedReadContext(new FakeEngine(true, 'reader'), owner(), 'load-todos');

            tx.markClosed();

            await expect(tx.getAll('SELECT 1')).rejects.toThrow(
                "Context 'load-todos' is closed: its lock was released or its database was closed",
            );

        });

        it('should be closed when its owner is closed', async () => {

            const parent = owner();
            const tx = new ScopedReadContext(new FakeEngine(true, 'reader'), parent);

            expect(tx.closed).toBe(false);

            parent.closed = true;

            expect(tx.closed).toBe(true);
            await expect(tx.getAll('SELECT 1')).rejects.toBeInstanceOf(ContextClosedError);

        });

    });

});

describe('context: ScopedWriteContext', () => {

    it('should run execute and executeBatch on the engine', async () => {

        const engine = new FakeEngine(false, 'writer');
        const tx = new ScopedWriteContext(engine, owner());

        await tx.execute('DELETE FROM todos');
        await tx.executeBatch('INSERT INTO todos (title) VALUES (?)', [['a'], ['b']]);

        expect(engine.statements).toEqual([
            'DELETE FROM todos',
            'INSERT INTO todos (title) VALUES (?)',
            'INSERT INTO todos (title) VALUES (?)',
        ]);

    });

    it('should reject writes once closed', async () => {

        const tx = new ScopedWriteContext(new FakeEngine(false, 'writer'), owner());

        tx.markClosed();

        await expect(tx.execute('DELETE FROM todos')).rejects.toBeInstanceOf(ContextClosedError);
        await expect(tx.executeBatch('DELETE FROM todos', [[]])).rejects.toBeInstanceOf(ContextClosedError);

    });

});

describe('context: withContext', () => {

    it('should close the context after the callback returns', async () => {

        const tx = new ScopedReadContext(new FakeEngine(true, 'reader'), owner());
        let leaked: ReadContext | null = null;

        const result = await withContext(tx, async (context) => {

            leaked = context;
            return context.closed;

        });

        expect(result).toBe(false);
        expect(tx.closed).toBe(true);
        expect(leaked).toBe(tx);

    });

    it('should close the context after the callback throws', async () => {

        const tx = new ScopedReadContext(new FakeEngine(true, 'reader'), owner());

        await expect(withContext(tx, async () => {

            throw new Error('boom');

        })).rejects.toThrow('boom');

        expect(tx.closed).toBe(true);

    });

});
