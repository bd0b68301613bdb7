type Mode = 'read' | 'write';

interface Waiter {
    mode: Mode;
    grant: () => void;
}

/**
 * Asynchronous reader/writer lock. Readers share the lock, writers hold it alone. Waiters are
 * granted in arrival order: once a writer is queued, readers arriving after it wait behind it.
 */
export class ReadWriteLock {
    private readers = 0;
    private writing = false;
    private readonly waiters: Waiter[] = [];

    get activeReaders(): number {
        return this.readers;
    }

    get isWriting(): boolean {
        return this.writing;
    }

    get pending(): number {
        return this.waiters.length;
    }

    async read<T>(task: () => T | Promise<T>): Promise<T> {
        await this.acquire('read');
        try {
            return await task();
        } finally {
            this.release('read');
        }
    }

    async write<T>(task: () => T | Promise<T>): Promise<T> {
        await this.acquire('write');
        try {
            return await task();
        } finally {
            this.release('write');
        }
    }

    private acquire(mode: Mode): Promise<void> {
        if (this.waiters.length === 0 && this.available(mode)) {
            this.take(mode);
            return Promise.resolve();
        }
        return new Promise((resolve) => {
            this.waiters.push({ mode, grant: resolve });
        });
    }

    private available(mode: Mode): boolean {
        if (mode === 'read') {
            return !this.writing;
        } else {
            return !this.writing && this.readers === 0;
        }
    }

    private take(mode: Mode) {
        if (mode === 'read') {
            this.readers += 1;
        } else {
            this.writing = true;
        }
    }

    private release(mode: Mode) {
        if (mode === 'read') {
            this.readers -= 1;
        } else {
            this.writing = false;
        }
        let next: Waiter | undefined;
        while ((next = this.waiters[0]) !== undefined && this.available(next.mode)) {
            this.waiters.shift();
            this.take(next.mode);
            next.grant();
        }
    }
}
