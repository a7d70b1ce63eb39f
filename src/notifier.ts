/* Copyright (c) 2021-25 MIT 6.102/6.031 course staff, all rights reserved.
 * Redistribution of original or derived work requires permission of course staff.
 */

import { makeDeferred, type Deferred } from './deferred.js';
import { AbortedError } from './errors.js';

/**
 * Broadcast condition for "the board changed".
 *
 * wait() registers a waiter; notifyAll() releases every registered waiter at
 * once. A woken party learns only that something changed and must re-check
 * its own condition. Waiters hold no resources, so abandoning one through an
 * AbortSignal simply forgets it.
 */
export class ChangeNotifier {

    // Rep invariant:
    //   - every entry's deferred is unsettled
    //   - every entry's detach removes the abort listener it installed, if any
    private readonly waiters = new Set<Waiter>();
    private closedWith: Error | undefined;

    /**
     * @param signal optional cancellation; aborting rejects the returned promise
     *               with AbortedError and unregisters the waiter
     * @returns a promise that fulfills at the next notifyAll(), or rejects if
     *          the notifier is closed or `signal` aborts first
     */
    public wait(signal?: AbortSignal): Promise<void> {
        if (this.closedWith !== undefined) {
            return Promise.reject(this.closedWith);
        }
        if (signal?.aborted) {
            return Promise.reject(new AbortedError());
        }
        const deferred: Deferred<void> = makeDeferred<void>();
        const waiter: Waiter = { deferred, detach: () => {} };
        if (signal !== undefined) {
            const onAbort = (): void => {
                if (this.waiters.delete(waiter)) {
                    deferred.reject(new AbortedError());
                }
            };
            signal.addEventListener('abort', onAbort, { once: true });
            waiter.detach = () => signal.removeEventListener('abort', onAbort);
        }
        this.waiters.add(waiter);
        return deferred.promise;
    }

    /**
     * Release every outstanding waiter.
     *
     * @returns how many waiters were released
     */
    public notifyAll(): number {
        const released = [...this.waiters];
        this.waiters.clear();
        for (const { deferred, detach } of released) {
            detach();
            deferred.resolve();
        }
        return released.length;
    }

    /**
     * Reject every outstanding waiter with `reason`, and every later wait() too.
     */
    public close(reason: Error): void {
        this.closedWith = reason;
        const rejected = [...this.waiters];
        this.waiters.clear();
        for (const { deferred, detach } of rejected) {
            detach();
            deferred.reject(reason);
        }
    }

    /** @returns number of waiters currently registered */
    public get size(): number {
        return this.waiters.size;
    }
}

interface Waiter {
    readonly deferred: Deferred<void>;
    detach: () => void;
}
