import { LockTimeoutError } from '../errors.js';

interface Waiter {
    wake: () => void;
    timer: NodeJS.Timeout;
}

/**
 * Exclusive async mutex guarding pipeline state.
 *
 * Waiters are served strictly in arrival order. On release ownership passes
 * straight to the head waiter, so a caller arriving between release and
 * wake-up cannot jump the queue.
 */
export class AsyncMutex {
    private owned = false;
    private readonly waiters: Waiter[] = [];

    constructor(private readonly resource: string = 'pipeline state') { }

    acquire(timeoutMs: number = 5000): Promise<void> {
        if (!this.owned) {
            this.owned = true;
            return Promise.resolve();
        }

        return new Promise<void>((resolve, reject) => {
            const waiter: Waiter = {
                wake: resolve,
                timer: setTimeout(() => {
                    const at = this.waiters.indexOf(waiter);
                    if (at === -1) return;
                    this.waiters.splice(at, 1);
                    reject(new LockTimeoutError(this.resource, timeoutMs));
                }, timeoutMs)
            };
            this.waiters.push(waiter);
        });
    }

    release(): void {
        const next = this.waiters.shift();
        if (!next) {
            this.owned = false;
            return;
        }
        clearTimeout(next.timer);
        next.wake();
    }

    /**
     * Run `fn` while holding the mutex; released whether it returns or throws.
     */
    async withExclusive<T>(fn: () => T | Promise<T>, timeoutMs?: number): Promise<T> {
        await this.acquire(timeoutMs);
        try {
            return await fn();
        } finally {
            this.release();
        }
    }

    get locked(): boolean {
        return this.owned;
    }

    get waiting(): number {
        return this.waiters.length;
    }
}
