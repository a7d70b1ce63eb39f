/* Copyright (c) 2021-25 MIT 6.102/6.031 course staff, all rights reserved.
 * Redistribution of original or derived work requires permission of course staff.
 */

/**
 * A promise together with the functions that settle it.
 * Node 20 has no Promise.withResolvers, so this is the factory used instead.
 */
export interface Deferred<T> {
    readonly promise: Promise<T>;
    readonly resolve: (value: T) => void;
    readonly reject: (reason: unknown) => void;
}

/**
 * @returns a fresh unsettled deferred
 */
export function makeDeferred<T>(): Deferred<T> {
    let resolve: (value: T) => void = () => {};
    let reject: (reason: unknown) => void = () => {};
    const promise = new Promise<T>((res, rej) => {
        resolve = res;
        reject = rej;
    });
    return { promise, resolve, reject };
}

/**
 * @param milliseconds duration to wait
 * @returns a promise that fulfills no less than `milliseconds` after timeout() was called
 */
export async function timeout(milliseconds: number): Promise<void> {
    const { promise, resolve } = makeDeferred<void>();
    setTimeout(resolve, milliseconds);
    return promise;
}
