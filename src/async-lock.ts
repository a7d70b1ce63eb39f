/* Copyright (c) 2021-25 MIT 6.102/6.031 course staff, all rights reserved.
 * Redistribution of original or derived work requires permission of course staff.
 */

import { makeDeferred } from './deferred.js';

/**
 * Mutual exclusion for async critical sections, granted in FIFO order.
 */
export class AsyncLock {

    // Rep invariant:
    //   - queue is empty whenever locked is false
    //   - every queue entry hands the lock to exactly one waiting caller
    // Safety from rep exposure:
    //   - both fields are private; callers only see run()
    private readonly queue: Array<() => void> = [];
    private locked = false;

    /**
     * Execute `section` while holding the lock. The lock is released after
     * `section` settles; its rejection propagates out of run().
     *
     * @param section critical section; must not call run() on the same lock
     * @returns the result of `section`
     */
    public async run<T>(section: () => T | Promise<T>): Promise<T> {
        await this.acquire();
        try {
            return await section();
        } finally {
            this.release();
        }
    }

    /** @returns true iff some caller holds the lock */
    public get held(): boolean {
        return this.locked;
    }

    private acquire(): Promise<void> {
        if (!this.locked) {
            this.locked = true;
            return Promise.resolve();
        }
        const { promise, resolve } = makeDeferred<void>();
        this.queue.push(() => resolve());
        return promise;
    }

    private release(): void {
        const next = this.queue.shift();
        if (next) {
            // ownership passes straight to the next caller; locked stays true
            next();
        } else {
            this.locked = false;
        }
    }
}
