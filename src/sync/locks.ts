import { Mutex } from 'async-mutex';

/**
 * One mutex per key, created on demand and dropped once nobody holds or waits
 * on it. Serializes work on the same document inside this process.
 */
export class KeyedMutex {
    private readonly locks = new Map<string, { mutex: Mutex; users: number }>();

    async runExclusive<T>(key: string, fn: () => Promise<T>): Promise<T> {
        let entry = this.locks.get(key);
        if (!entry) {
            entry = { mutex: new Mutex(), users: 0 };
            this.locks.set(key, entry);
        }
        entry.users += 1;
        try {
            return await entry.mutex.runExclusive(fn);
        } finally {
            entry.users -= 1;
            if (entry.users === 0) this.locks.delete(key);
        }
    }

    isLocked(key: string): boolean {
        return this.locks.get(key)?.mutex.isLocked() ?? false;
    }

    get size(): number {
        return this.locks.size;
    }
}
