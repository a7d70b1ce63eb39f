/* Copyright (c) 2021-25 MIT 6.102/6.031 course staff, all rights reserved.
 * Redistribution of original or derived work requires permission of course staff.
 */

import { AsyncLock } from './async-lock.js';
import type { Board, Space } from './board.js';
import {
    AbortedError, ContestedError, GameClosedError, InvalidCardSetError, InvalidPlayerError,
    NoCardError, invariant,
} from './errors.js';
import { logger, type Logger } from './log.js';
import { ChangeNotifier } from './notifier.js';

/**
 * What a flip does when another player controls the card:
 * `wait` suspends until the board changes and tries again,
 * `reject` fails at once with ContestedError.
 */
export type ContentionPolicy = 'wait' | 'reject';

export interface SessionOptions {
    readonly gameId?: string;
    readonly contention?: ContentionPolicy;
}

/** How a position looks to one player. */
export type CellState = 'none' | 'down' | 'up' | 'my';

export interface CellView {
    /** label of a face-up card, null when face down or removed */
    readonly card: string | null;
    readonly faceUp: boolean;
    readonly controlledBy: string | null;
    readonly state: CellState;
}

export interface BoardView {
    /** board[y][x] */
    readonly board: CellView[][];
    readonly width: number;
    readonly height: number;
    readonly scores: Record<string, number>;
}

export interface FlipOutcome {
    readonly card: string;
    /** set when the flip completed a pair attempt */
    readonly matched?: boolean;
    readonly message: string;
}

/** A card a player has turned up and not yet resolved. */
export interface PendingCard {
    readonly x: number;
    readonly y: number;
    readonly card: string;
}

export const DEFAULT_GAME_ID = 'default';

/**
 * @returns true iff `playerId` is a nonempty string of alphanumeric or underscore characters
 */
export function isValidPlayerId(playerId: string): boolean {
    return /^\w+$/.test(playerId);
}

/**
 * One game of Memory Scramble played on a Board by any number of concurrent players.
 *
 * A player's turn is two flips. The first flip turns a card face up and
 * gives the player control of it. The second flip turns up another card and
 * resolves the pair in the same atomic step: equal labels are removed and
 * score a point, different labels are both turned face down again. A player
 * who flips a card they control turns it back face down.
 *
 * A flip on a card controlled by someone else is contested. Under the `wait`
 * policy a player holding no card suspends until the board next changes and
 * then re-evaluates the flip from scratch; a player already holding a card
 * never suspends (so two players cannot wait on each other) and is refused
 * with ContestedError, as is everyone under the `reject` policy.
 *
 * Concurrency: every mutation runs inside one AsyncLock section and one
 * Board batch, so the cells, pending selections and scores of a transition
 * commit together. look() reads a copy-on-write snapshot and never waits.
 * Suspended flips and watches wait on a ChangeNotifier outside the lock; it
 * is broadcast after every mutation, once the lock is released.
 */
export class Session {

    public readonly gameId: string;
    public readonly contention: ContentionPolicy;

    private readonly lock = new AsyncLock();
    private readonly changes = new ChangeNotifier();
    private readonly scores = new Map<string, number>();
    private readonly pending = new Map<string, ReadonlyArray<PendingCard>>();
    private readonly log: Logger;
    private closed = false;

    // Abstraction function:
    //   AF(board, scores, pending, closed) = a game on `board` in which player p
    //     has matched scores.get(p) pairs and has turned up the cards
    //     pending.get(p) during the current turn; no moves are accepted once closed
    // Representation invariant:
    //   - every pending selection has 0 or 1 entries between transitions
    //   - for every entry (x, y, card) of pending.get(p), the board space at
    //     (x, y) holds card, is face up and is controlled by p
    //   - every space controlled by p appears in pending.get(p)
    //   - scores values are non-negative integers
    // Safety from rep exposure:
    //   - all fields are private; look() builds fresh views, selection()
    //     returns an immutable array of immutable entries

    /**
     * @param board board owned by this session from now on
     */
    public constructor(private readonly board: Board, options: SessionOptions = {}) {
        this.gameId = options.gameId ?? DEFAULT_GAME_ID;
        this.contention = options.contention ?? 'wait';
        this.log = logger(`game ${this.gameId}`);
        this.log.debug(`created ${board.width}x${board.height} game, contention=${this.contention}`);
    }

    public get width(): number {
        return this.board.width;
    }

    public get height(): number {
        return this.board.height;
    }

    /**
     * @returns the board and scores as seen by `playerId`; labels of face-down
     *          cards are never included
     * @throws InvalidPlayerError
     */
    public look(playerId: string): BoardView {
        requirePlayer(playerId);
        const spaces = this.board.snapshot();
        const board: CellView[][] = [];
        for (let y = 0; y < this.height; ++y) {
            const row: CellView[] = [];
            for (let x = 0; x < this.width; ++x) {
                const space = spaces[y * this.width + x];
                invariant(space !== undefined, `snapshot is missing (${x}, ${y})`);
                row.push(viewOf(space, playerId));
            }
            board.push(row);
        }
        return { board, width: this.width, height: this.height, scores: Object.fromEntries(this.scores) };
    }

    /**
     * Flip the card at (x, y) on behalf of `playerId`.
     *
     * @param signal aborts a suspended flip; the board is left as it was
     * @returns the flipped card's label and, on a second card, whether the pair matched
     * @throws OutOfBoundsError, NoCardError, InvalidPlayerError for bad requests
     * @throws ContestedError if another player controls the card and this flip may not wait
     * @throws AbortedError if `signal` aborts, GameClosedError if the game is closed
     */
    public async flip(playerId: string, x: number, y: number, signal?: AbortSignal): Promise<FlipOutcome> {
        requirePlayer(playerId);
        for (;;) {
            if (signal?.aborted) {
                throw new AbortedError();
            }
            const attempt = await this.lock.run(() => this.tryFlip(playerId, x, y, signal));
            if (attempt.kind === 'done') {
                this.changes.notifyAll();
                return attempt.outcome;
            }
            this.log.debug(`${playerId} waits for (${x}, ${y})`);
            await attempt.wakeup;
        }
    }

    /**
     * Wait for the next change to the board.
     *
     * @param signal aborts the wait
     * @returns the board as seen by `playerId` after the change
     * @throws AbortedError if `signal` aborts, GameClosedError if the game is closed
     */
    public async watch(playerId: string, signal?: AbortSignal): Promise<BoardView> {
        requirePlayer(playerId);
        await this.changes.wait(signal);
        return this.look(playerId);
    }

    /**
     * Replace every card label c on the board with `await transform(c)`.
     * `transform` is called once per distinct label, outside the lock, and all
     * replacements are then applied in one atomic step, so both cards of a
     * pair always carry the same label. Face-up state, control, pending
     * selections and scores are unaffected apart from the labels.
     *
     * @param transform must map distinct labels still on the board to distinct valid labels
     * @returns the board as seen by `playerId` afterwards
     * @throws InvalidCardSetError if the replacement would merge pairs or
     *         produce an invalid label; nothing is replaced in that case
     */
    public async map(playerId: string, transform: (card: string) => Promise<string>): Promise<BoardView> {
        requirePlayer(playerId);
        const replacements = new Map<string, string>();
        for (const card of labelsOf(this.board.snapshot())) {
            replacements.set(card, await transform(card));
        }

        const relabelled = await this.lock.run(() => {
            this.requireOpen();
            const spaces = this.board.snapshot();
            const results = new Set<string>();
            for (const card of labelsOf(spaces)) {
                const next = replacements.get(card) ?? card;
                if (results.has(next)) {
                    throw new InvalidCardSetError(`replacement gives two different pairs the label '${next}'`);
                }
                results.add(next);
            }
            const count = this.board.batch(() => {
                let written = 0;
                spaces.forEach((space, index) => {
                    const next = space.card === null ? null : replacements.get(space.card);
                    if (next !== undefined && next !== null && next !== space.card) {
                        this.board.relabel(index % this.width, Math.floor(index / this.width), next);
                        ++written;
                    }
                });
                return written;
            });
            for (const [player, selection] of this.pending) {
                this.pending.set(player, selection.map(entry => ({ ...entry, card: replacements.get(entry.card) ?? entry.card })));
            }
            return count;
        });

        if (relabelled > 0) {
            this.log.debug(`${playerId} relabelled ${relabelled} cards`);
            this.changes.notifyAll();
        }
        return this.look(playerId);
    }

    /**
     * Turn every card `playerId` has pending back face down, e.g. when the
     * player leaves. Does nothing if the player holds no card.
     *
     * @returns the board as seen by `playerId` afterwards
     * @throws GameClosedError if the game is closed
     */
    public async relinquish(playerId: string): Promise<BoardView> {
        requirePlayer(playerId);
        const released = await this.lock.run(() => {
            this.requireOpen();
            const selection = this.pending.get(playerId) ?? [];
            this.board.batch(() => {
                for (const { x, y } of selection) {
                    this.board.flip(x, y);
                }
            });
            this.pending.set(playerId, []);
            return selection.length;
        });
        if (released > 0) {
            this.log.debug(`${playerId} released ${released} card(s)`);
            this.changes.notifyAll();
        }
        return this.look(playerId);
    }

    /**
     * @returns the cards `playerId` has turned up in the current turn, in flip order
     */
    public selection(playerId: string): ReadonlyArray<PendingCard> {
        return this.pending.get(playerId) ?? [];
    }

    /** @returns number of suspended flips and watches */
    public get waiting(): number {
        return this.changes.size;
    }

    /** @returns true iff every pair has been matched */
    public isFinished(): boolean {
        return this.board.remainingPairs() === 0;
    }

    /**
     * End this game: suspended and future flips and watches fail with GameClosedError.
     */
    public close(): void {
        if (this.closed) {
            return;
        }
        this.closed = true;
        this.changes.close(new GameClosedError(this.gameId));
        this.log.debug('closed');
    }

    // must be called while holding the lock; performs no await
    private tryFlip(playerId: string, x: number, y: number, signal: AbortSignal | undefined): FlipAttempt {
        this.requireOpen();
        const space = this.board.get(x, y);
        if (space.card === null) {
            throw new NoCardError(x, y);
        }
        const card = space.card;
        const selection = this.selection(playerId);
        invariant(selection.length < 2, `${playerId} has an unresolved pair`);

        if (space.controller === playerId) {
            this.board.flip(x, y);
            this.pending.set(playerId, selection.filter(entry => entry.x !== x || entry.y !== y));
            this.log.debug(`${playerId} turned ${card} at (${x}, ${y}) back down`);
            return { kind: 'done', outcome: { card, message: `Turned ${card} at (${x}, ${y}) face down` } };
        }

        if (space.controller !== null) {
            if (this.contention === 'reject' || selection.length > 0) {
                throw new ContestedError(x, y);
            }
            // registered before the lock is released, so no change can be missed
            return { kind: 'wait', wakeup: this.changes.wait(signal) };
        }

        const turn = [...selection, { x, y, card }];
        const outcome = this.board.batch((): FlipOutcome => {
            if (!space.faceUp) {
                this.board.flip(x, y);
            }
            this.board.setControl(x, y, playerId);
            const [first, second] = turn;
            if (first === undefined || second === undefined) {
                return { card, message: `Flipped ${card} at (${x}, ${y})` };
            }
            return this.resolvePair(first, second);
        });

        this.pending.set(playerId, outcome.matched === undefined ? turn : []);
        this.scores.set(playerId, (this.scores.get(playerId) ?? 0) + (outcome.matched ? 1 : 0));
        this.log.debug(`${playerId}: ${outcome.message}`);
        if (outcome.matched && this.isFinished()) {
            this.log.info(`all pairs matched; final scores ${JSON.stringify(Object.fromEntries(this.scores))}`);
        }
        return { kind: 'done', outcome };
    }

    // must be called inside a board batch: removes or hides both cards
    private resolvePair(first: PendingCard, second: PendingCard): FlipOutcome {
        const where = `(${first.x}, ${first.y}) and (${second.x}, ${second.y})`;
        if (first.card === second.card) {
            for (const { x, y } of [first, second]) {
                this.board.clearControl(x, y);
                this.board.remove(x, y);
            }
            return { card: second.card, matched: true, message: `Matched ${second.card} at ${where}` };
        }
        for (const { x, y } of [first, second]) {
            // turning face down releases control
            this.board.flip(x, y);
        }
        return {
            card: second.card,
            matched: false,
            message: `No match: ${first.card} and ${second.card} at ${where}`,
        };
    }

    private requireOpen(): void {
        if (this.closed) {
            throw new GameClosedError(this.gameId);
        }
    }
}

type FlipAttempt =
    | { readonly kind: 'done'; readonly outcome: FlipOutcome }
    | { readonly kind: 'wait'; readonly wakeup: Promise<void> };

function requirePlayer(playerId: string): void {
    if (!isValidPlayerId(playerId)) {
        throw new InvalidPlayerError(playerId);
    }
}

function labelsOf(spaces: ReadonlyArray<Space>): Set<string> {
    const labels = new Set<string>();
    for (const { card } of spaces) {
        if (card !== null) {
            labels.add(card);
        }
    }
    return labels;
}

function viewOf(space: Space, viewer: string): CellView {
    if (space.card === null) {
        return { card: null, faceUp: false, controlledBy: null, state: 'none' };
    }
    if (!space.faceUp) {
        return { card: null, faceUp: false, controlledBy: null, state: 'down' };
    }
    return {
        card: space.card,
        faceUp: true,
        controlledBy: space.controller,
        state: space.controller === viewer ? 'my' : 'up',
    };
}
