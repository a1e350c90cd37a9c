import { describe, it, expect } from 'vitest';
import { KeyedMutex } from '../locks.js';

describe('KeyedMutex', () => {
    it('serializes work on one key and lets other keys run alongside', async () => {
        const locks = new KeyedMutex();
        const order: string[] = [];
        let releaseFirst: () => void = () => undefined;
        const gate = new Promise<void>((resolve) => {
            releaseFirst = resolve;
        });

        const first = locks.runExclusive('a', async () => {
            order.push('a1 start');
            await gate;
            order.push('a1 end');
        });
        const second = locks.runExclusive('a', async () => {
            order.push('a2');
        });
        const other = locks.runExclusive('b', async () => {
            order.push('b');
        });

        await other;
        expect(locks.isLocked('a')).toBe(true);
        releaseFirst();
        await Promise.all([first, second]);

        expect(order).toEqual(['a1 start', 'b', 'a1 end', 'a2']);
    });

    it('drops idle keys, including after a failure', async () => {
        const locks = new KeyedMutex();
        await locks.runExclusive('a', async () => 1);
        await expect(locks.runExclusive('b', async () => { throw new Error('boom'); })).rejects.toThrow('boom');
        expect(locks.size).toBe(0);
        expect(locks.isLocked('a')).toBe(false);
    });
});
