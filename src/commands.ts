/* Copyright (c) 2021-25 MIT 6.102/6.031 course staff, all rights reserved.
 * Redistribution of original or derived work requires permission of course staff.
 */

import { GameError, type GameErrorCode } from './errors.js';
import type { BoardView, Session } from './session.js';

/**
 * Commands the web server runs against a game. Each returns a plain object
 * that can be sent as JSON.
 */

export type FlipResponse =
    | { readonly ok: true; readonly message: string; readonly card: string; readonly matched?: boolean }
    | { readonly ok: false; readonly message: string; readonly error: GameErrorCode };

// failures that are the requester's to handle: bad coordinates, removed or contested cards
const REPORTED: ReadonlySet<GameErrorCode> = new Set<GameErrorCode>(['OutOfBounds', 'NoCard', 'Contested', 'InvalidPlayer']);

/**
 * Looks at the current state of the board.
 *
 * @param session a game
 * @param playerId ID of player looking at the board;
 *                 must be a nonempty string of alphanumeric or underscore characters
 * @returns the board and scores from the perspective of playerId
 */
export async function look(session: Session, playerId: string): Promise<BoardView> {
    return session.look(playerId);
}

/**
 * Tries to flip over a card on the board, following the rules of the game.
 * Under the `wait` policy the promise does not settle while another player
 * controls the card.
 *
 * @param session a game
 * @param playerId ID of player making the flip
 * @param x column of the card
 * @param y row of the card
 * @param signal aborts a waiting flip
 * @returns `ok` with the card and match result, or `ok: false` with the
 *          reason if the flip was refused
 * @throws AbortedError, GameClosedError, and any defect
 */
export async function flip(session: Session, playerId: string, x: number, y: number,
                           signal?: AbortSignal): Promise<FlipResponse> {
    try {
        const { card, matched, message } = await session.flip(playerId, x, y, signal);
        return matched === undefined ? { ok: true, message, card } : { ok: true, message, card, matched };
    } catch (err) {
        if (err instanceof GameError && REPORTED.has(err.code)) {
            return { ok: false, message: err.message, error: err.code };
        }
        throw err;
    }
}

/**
 * Modifies board by replacing every card with f(card), without affecting
 * other state of the game.
 *
 * @param session a game
 * @param playerId ID of player applying the map
 * @param f mathematical function from cards to cards, applied to distinct cards only
 * @returns the board from the perspective of playerId after the replacement
 */
export async function map(session: Session, playerId: string,
                          f: (card: string) => Promise<string>): Promise<BoardView> {
    return session.map(playerId, f);
}

/**
 * Watches the board for a change, waiting until any cards turn face up or
 * face down, are removed from the board, or change from one string to another.
 *
 * @param session a game
 * @param playerId ID of player watching the board
 * @param signal aborts the wait
 * @returns the board from the perspective of playerId after the change
 */
export async function watch(session: Session, playerId: string, signal?: AbortSignal): Promise<BoardView> {
    return session.watch(playerId, signal);
}
