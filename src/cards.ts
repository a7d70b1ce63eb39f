/* Copyright (c) 2021-25 MIT 6.102/6.031 course staff, all rights reserved.
 * Redistribution of original or derived work requires permission of course staff.
 */

/** Cards of the 4x4 game started when no board file is given. */
export const DEFAULT_CARDS: readonly string[] = ['🦄', '🌈', '🎨', '⭐', '🎪', '🎭', '🎬', '🎸'];

export const DEFAULT_WIDTH = 4;
export const DEFAULT_HEIGHT = 4;

/**
 * Labels are produced lazily, so a board that rejects its dimensions never
 * generates them.
 *
 * @param count number of labels, a non-negative integer
 * @returns the distinct labels Card0, Card1, ..., Card{count-1}
 */
export function* generatedCards(count: number): Generator<string> {
    for (let i = 0; i < count; ++i) {
        yield `Card${i}`;
    }
}
