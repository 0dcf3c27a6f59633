import { OperationCancelled, OperationInProgress } from '../errors';

interface Waiter {
    owner: string;
    grant: () => void;
}

class WriteLock {
    private holder: string | undefined;
    private readonly waiters: Waiter[] = [];

    get owner(): string | undefined {
        return this.holder;
    }

    get queued(): string[] {
        return this.waiters.map((waiter) => waiter.owner);
    }

    tryAcquire(owner: string): boolean {
        if (this.holder !== undefined) {
            return false;
        }
        this.holder = owner;
        return true;
    }

    acquireOrFail(owner: string): void {
        if (!this.tryAcquire(owner)) {
            throw new OperationInProgress(this.holder);
        }
    }

    acquire(owner: string, signal?: AbortSignal): Promise<void> {
        if (signal?.aborted) {
            return Promise.reject(new OperationCancelled());
        }
        if (this.tryAcquire(owner)) {
            return Promise.resolve();
        }
        return new Promise<void>((resolve, reject) => {
            const onAbort = () => {
                const index = this.waiters.indexOf(waiter);
                if (index >= 0) {
                    this.waiters.splice(index, 1);
                    reject(new OperationCancelled());
                }
            };
            const waiter: Waiter = {
                owner,
                grant: () => {
                    signal?.removeEventListener('abort', onAbort);
                    resolve();
                },
            };
            signal?.addEventListener('abort', onAbort, { once: true });
            this.waiters.push(waiter);
        });
    }

    release(owner: string): void {
        if (this.holder !== owner) {
            return;
        }
        const next = this.waiters.shift();
        this.holder = next?.owner;
        next?.grant();
    }
}

export { WriteLock };
