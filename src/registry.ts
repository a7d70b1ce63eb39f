/* Copyright (c) 2021-25 MIT 6.102/6.031 course staff, all rights reserved.
 * Redistribution of original or derived work requires permission of course staff.
 */

import type { Board } from './board.js';
import { GameNotFoundError } from './errors.js';
import { logger } from './log.js';
import { Session, type ContentionPolicy } from './session.js';

export { DEFAULT_GAME_ID } from './session.js';

const log = logger('registry');

/**
 * The games hosted by one server process, by game id. Each game's Session
 * is owned here; callers hold it only for the duration of a request.
 */
export class GameRegistry {

    private readonly sessions = new Map<string, Session>();

    /**
     * @param contention contention policy given to every game created here
     */
    public constructor(public readonly contention: ContentionPolicy = 'wait') {}

    /**
     * Start a game on `board` under `gameId`. An existing game with that id is
     * closed, which fails its suspended flips and watches, and replaced.
     *
     * @returns the new game
     */
    public create(gameId: string, board: Board): Session {
        const previous = this.sessions.get(gameId);
        const session = new Session(board, { gameId, contention: this.contention });
        this.sessions.set(gameId, session);
        if (previous !== undefined) {
            previous.close();
            log.debug(`replaced game ${gameId} with a new ${board.width}x${board.height} board`);
        } else {
            log.debug(`created game ${gameId} with a ${board.width}x${board.height} board`);
        }
        return session;
    }

    public get(gameId: string): Session | undefined {
        return this.sessions.get(gameId);
    }

    /**
     * @throws GameNotFoundError if there is no game `gameId`
     */
    public require(gameId: string): Session {
        const session = this.sessions.get(gameId);
        if (session === undefined) {
            throw new GameNotFoundError(gameId);
        }
        return session;
    }

    /**
     * Close and forget game `gameId`.
     *
     * @returns true iff the game existed
     */
    public delete(gameId: string): boolean {
        const session = this.sessions.get(gameId);
        if (session === undefined) {
            return false;
        }
        this.sessions.delete(gameId);
        session.close();
        log.debug(`deleted game ${gameId}`);
        return true;
    }

    /** @returns ids of all hosted games, in creation order */
    public ids(): string[] {
        return [...this.sessions.keys()];
    }
}
