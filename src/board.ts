/* Copyright (c) 2021-25 MIT 6.102/6.031 course staff, all rights reserved.
 * Redistribution of original or derived work requires permission of course staff.
 */

import fs from 'node:fs';
import {
    InvalidCardSetError, InvalidDimensionsError, InvalidPlayerError, NoCardError,
    NotFaceUpError, OutOfBoundsError, invariant,
} from './errors.js';

/**
 * State of one position on the board. Spaces are frozen; the board replaces
 * a Space wholesale whenever the position changes, so a Space obtained from
 * the board never changes under its holder.
 */
export interface Space {
    /** card label, or null once the card has been removed */
    readonly card: string | null;
    readonly faceUp: boolean;
    /** player who currently controls the card, or null */
    readonly controller: string | null;
}

/** Options for loading a board from the board file format. */
export interface ParseOptions {
    /** shuffle the cards instead of keeping the file's layout */
    readonly shuffle?: boolean;
    /** source of randomness in [0,1) for shuffling */
    readonly random?: () => number;
}

const EMPTY: Space = makeSpace(null, false, null);

/** Largest number of positions a board may have. */
export const MAX_BOARD_SPACES = 10_000;

/**
 * Memory Scramble board ADT.
 *
 * A mutable width x height grid of positions addressed by (x, y), where x is
 * the column and y the row. Each position holds a card (a non-empty label
 * without whitespace) or is empty because its card was removed; a card is
 * face up or face down, and a face-up card may be controlled by a player.
 * Every label still on the board appears on exactly two positions.
 *
 * The board checks its invariant after every mutation and restores the
 * previous state if the check fails, so a failed mutation is never observed.
 * Transitions that are only valid together (retiring both cards of a pair,
 * relabelling both cards of a pair) go through batch(), which checks once at
 * the end and rolls back every position written in the batch on failure.
 *
 * The board does no locking of its own: mutators are synchronous, and
 * callers that interleave async work (Session) serialize them with a lock.
 */
export class Board {

    public readonly width: number;
    public readonly height: number;

    // cells[y * width + x] is the Space at (x, y)
    private readonly cells: Space[];

    // positions written in the open batch with their previous Spaces, or
    // undefined when no batch is open
    private journal: Array<{ readonly index: number; readonly previous: Space }> | undefined;

    // Abstraction function:
    //   AF(width, height, cells) = the board with `width` columns and `height`
    //     rows whose position (x, y) holds card cells[y*width+x].card (empty
    //     if null), is face up iff cells[y*width+x].faceUp, and is controlled
    //     by cells[y*width+x].controller (nobody if null)
    // Representation invariant:
    //   - width and height are positive integers
    //   - cells.length === width * height
    //   - every Space is frozen
    //   - card === null implies !faceUp and controller === null
    //   - controller !== null implies faceUp and controller is non-empty
    //   - every non-null card is a non-empty string without whitespace
    //   - every non-null card occurs in exactly two cells
    //   (checked whenever journal is undefined)
    // Safety from rep exposure:
    //   - cells and journal are private; get() returns frozen Spaces and
    //     snapshot() returns a fresh array of frozen Spaces
    //   - the constructor copies the layout it is given

    /**
     * Make a board from an explicit layout, every card face down.
     *
     * @param width number of columns, a positive integer
     * @param height number of rows, a positive integer
     * @param layout card labels in row-major order; must have width*height
     *               entries in which every label occurs exactly twice
     * @throws InvalidDimensionsError if width or height is not a positive integer,
     *         or the board would exceed MAX_BOARD_SPACES positions
     * @throws InvalidCardSetError if the layout has the wrong size, an
     *         invalid label, or a label that does not occur exactly twice
     */
    public constructor(width: number, height: number, layout: readonly string[]) {
        checkDimensions(width, height);
        if (layout.length !== width * height) {
            throw new InvalidCardSetError(
                `expected ${width * height} cards for a ${width}x${height} board, got ${layout.length}`);
        }
        const counts = new Map<string, number>();
        for (const card of layout) {
            if (!isValidCard(card)) {
                throw new InvalidCardSetError(`invalid card identifier '${card}'`);
            }
            counts.set(card, (counts.get(card) ?? 0) + 1);
        }
        for (const [card, count] of counts) {
            if (count !== 2) {
                throw new InvalidCardSetError(`card '${card}' appears ${count} times, must appear exactly 2 times`);
            }
        }

        this.width = width;
        this.height = height;
        this.cells = layout.map(card => makeSpace(card, false, null));
        this.checkRep();
    }

    /**
     * Make a board holding two of each card in `cardSet`, shuffled uniformly.
     *
     * @param cardSet distinct card labels; must hold exactly width*height/2 labels
     * @param random source of randomness in [0,1)
     * @throws InvalidDimensionsError if width or height is not a positive integer,
     *         or the board would exceed MAX_BOARD_SPACES positions
     * @throws InvalidCardSetError if the labels are not distinct, not valid, or
     *         not the right number for the board
     */
    public static create(width: number, height: number, cardSet: Iterable<string>,
                         random: () => number = Math.random): Board {
        checkDimensions(width, height);
        const cards = [...cardSet];
        if (new Set(cards).size !== cards.length) {
            throw new InvalidCardSetError('card identifiers must be distinct');
        }
        for (const card of cards) {
            if (!isValidCard(card)) {
                throw new InvalidCardSetError(`invalid card identifier '${card}'`);
            }
        }
        if (cards.length * 2 !== width * height) {
            throw new InvalidCardSetError(
                `a ${width}x${height} board needs ${width * height} spaces but ${cards.length} cards fill ${cards.length * 2}`);
        }
        return new Board(width, height, shuffle(cards.flatMap(card => [card, card]), random));
    }

    /**
     * Parse the board file format: a first line "width height", then the card
     * labels separated by any whitespace (spread over any number of lines) in
     * row-major order. Blank lines are ignored.
     *
     * @throws InvalidDimensionsError if the header is missing or malformed
     * @throws InvalidCardSetError if the labels do not fill the board with pairs
     */
    public static parse(text: string, options: ParseOptions = {}): Board {
        const lines = text.split(/\r?\n/).filter(line => line.trim().length > 0);
        const header = lines[0];
        if (header === undefined) {
            throw new InvalidDimensionsError('empty board file');
        }
        const match = /^\s*(\d+)\s+(\d+)\s*$/.exec(header);
        if (!match) {
            throw new InvalidDimensionsError("first line must be 'width height'");
        }
        const width = Number(match[1]);
        const height = Number(match[2]);
        checkDimensions(width, height);

        const tokens = lines.slice(1).flatMap(line => line.trim().split(/\s+/));
        return new Board(width, height, options.shuffle ? shuffle(tokens, options.random) : tokens);
    }

    /**
     * Make a new board by parsing a file.
     *
     * @param filename path to a board file in the format accepted by parse()
     * @returns a new board with the size and cards from the file
     * @throws Error if the file cannot be read or is not a valid game board
     */
    public static async parseFromFile(filename: string, options: ParseOptions = {}): Promise<Board> {
        const text = await fs.promises.readFile(filename, { encoding: 'utf8' });
        return Board.parse(text, options);
    }

    /**
     * @returns the Space at (x, y)
     * @throws OutOfBoundsError unless 0 <= x < width and 0 <= y < height
     */
    public get(x: number, y: number): Space {
        return this.at(this.indexOf(x, y));
    }

    /**
     * @returns every Space in row-major order, as of this call
     */
    public snapshot(): ReadonlyArray<Space> {
        return [...this.cells];
    }

    /** @returns number of pairs still on the board */
    public remainingPairs(): number {
        return this.cells.filter(space => space.card !== null).length / 2;
    }

    /**
     * Turn the card at (x, y) over. Turning a card face down releases control of it.
     *
     * @returns the new Space at (x, y)
     * @throws OutOfBoundsError, NoCardError
     */
    public flip(x: number, y: number): Space {
        const { current, card } = this.occupied(x, y);
        const faceUp = !current.faceUp;
        return this.write(x, y, makeSpace(card, faceUp, faceUp ? current.controller : null));
    }

    /**
     * Give `playerId` control of the face-up card at (x, y).
     *
     * @throws OutOfBoundsError, NoCardError, NotFaceUpError, InvalidPlayerError
     */
    public setControl(x: number, y: number, playerId: string): Space {
        if (playerId.length === 0) {
            throw new InvalidPlayerError(playerId);
        }
        const { current, card } = this.occupied(x, y);
        if (!current.faceUp) {
            throw new NotFaceUpError(x, y);
        }
        return this.write(x, y, makeSpace(card, true, playerId));
    }

    /**
     * Release control of the card at (x, y), whoever holds it. Idempotent.
     *
     * @throws OutOfBoundsError, NoCardError
     */
    public clearControl(x: number, y: number): Space {
        const { current, card } = this.occupied(x, y);
        if (current.controller === null) {
            return current;
        }
        return this.write(x, y, makeSpace(card, current.faceUp, null));
    }

    /**
     * Take the face-up card at (x, y) off the board. Only valid inside a batch
     * that also removes the other card of the pair: a lone removal breaks the
     * pair invariant and is rolled back.
     *
     * @throws OutOfBoundsError, NoCardError, NotFaceUpError
     * @throws InvariantViolationError if called outside a batch
     */
    public remove(x: number, y: number): Space {
        const { current } = this.occupied(x, y);
        if (!current.faceUp) {
            throw new NotFaceUpError(x, y);
        }
        return this.write(x, y, EMPTY);
    }

    /**
     * Replace the label of the card at (x, y), keeping whether it is face up
     * and who controls it. Like remove(), only valid inside a batch that
     * relabels both cards of the pair.
     *
     * @throws OutOfBoundsError, NoCardError, InvalidCardSetError
     */
    public relabel(x: number, y: number, newCard: string): Space {
        if (!isValidCard(newCard)) {
            throw new InvalidCardSetError(`invalid card identifier '${newCard}'`);
        }
        const { current } = this.occupied(x, y);
        return this.write(x, y, makeSpace(newCard, current.faceUp, current.controller));
    }

    /**
     * Apply several mutations as one atomic transition. The invariant is
     * checked once `mutations` returns; if `mutations` throws or the check
     * fails, every position it wrote is restored and the error is rethrown.
     * A batch opened inside another batch joins the outer one.
     *
     * @param mutations synchronous function calling this board's mutators
     * @returns the result of `mutations`
     */
    public batch<T>(mutations: () => T): T {
        if (this.journal !== undefined) {
            return mutations();
        }
        const journal: Array<{ readonly index: number; readonly previous: Space }> = [];
        this.journal = journal;
        try {
            const result = mutations();
            this.checkRep();
            return result;
        } catch (err) {
            for (const { index, previous } of journal.reverse()) {
                this.cells[index] = previous;
            }
            throw err;
        } finally {
            this.journal = undefined;
        }
    }

    /**
     * @returns the board in the file format accepted by parse()
     * @throws InvalidCardSetError if cards have been removed, since an empty
     *         position has no label to write
     */
    public serialize(): string {
        const lines = [`${this.width} ${this.height}`];
        for (let y = 0; y < this.height; ++y) {
            const row: string[] = [];
            for (let x = 0; x < this.width; ++x) {
                const { card } = this.get(x, y);
                if (card === null) {
                    throw new InvalidCardSetError(`cannot serialize removed card at (${x}, ${y})`);
                }
                row.push(card);
            }
            lines.push(row.join(' '));
        }
        return lines.join('\n') + '\n';
    }

    /**
     * @returns a human-readable grid for debugging: face-down cards as [??? ],
     *          controlled cards marked with *, removed cards blank
     */
    public toString(): string {
        const lines = [`Board(${this.width}x${this.height}):`];
        for (let y = 0; y < this.height; ++y) {
            const row: string[] = [];
            for (let x = 0; x < this.width; ++x) {
                const { card, faceUp, controller } = this.get(x, y);
                if (card === null) {
                    row.push('[    ]');
                } else if (!faceUp) {
                    row.push('[??? ]');
                } else {
                    const label = [...card].slice(0, 3);
                    row.push(`[${' '.repeat(3 - label.length)}${label.join('')}${controller === null ? ' ' : '*'}]`);
                }
            }
            lines.push('  ' + row.join(' '));
        }
        return lines.join('\n');
    }

    private checkRep(): void {
        invariant(Number.isInteger(this.width) && this.width > 0, `width ${this.width} must be a positive integer`);
        invariant(Number.isInteger(this.height) && this.height > 0, `height ${this.height} must be a positive integer`);
        invariant(this.cells.length === this.width * this.height,
            `grid has ${this.cells.length} spaces, expected ${this.width * this.height}`);

        const counts = new Map<string, number>();
        this.cells.forEach((space, index) => {
            const where = `(${index % this.width}, ${Math.floor(index / this.width)})`;
            invariant(Object.isFrozen(space), `space at ${where} must be frozen`);
            if (space.card === null) {
                invariant(!space.faceUp && space.controller === null,
                    `removed space at ${where} must be face down and uncontrolled`);
                return;
            }
            invariant(isValidCard(space.card), `invalid card '${space.card}' at ${where}`);
            if (space.controller !== null) {
                invariant(space.controller.length > 0, `controller at ${where} must be non-empty`);
                invariant(space.faceUp, `controlled card at ${where} must be face up`);
            }
            counts.set(space.card, (counts.get(space.card) ?? 0) + 1);
        });
        for (const [card, count] of counts) {
            invariant(count === 2, `card '${card}' appears ${count} times on the board, must appear exactly 2 times`);
        }
    }

    private indexOf(x: number, y: number): number {
        if (!Number.isInteger(x) || !Number.isInteger(y) || x < 0 || x >= this.width || y < 0 || y >= this.height) {
            throw new OutOfBoundsError(x, y, this.width, this.height);
        }
        return y * this.width + x;
    }

    private at(index: number): Space {
        const space = this.cells[index];
        invariant(space !== undefined, `no space at index ${index}`);
        return space;
    }

    private occupied(x: number, y: number): { current: Space; card: string } {
        const current = this.get(x, y);
        if (current.card === null) {
            throw new NoCardError(x, y);
        }
        return { current, card: current.card };
    }

    private write(x: number, y: number, next: Space): Space {
        const index = this.indexOf(x, y);
        const previous = this.at(index);
        this.cells[index] = next;
        if (this.journal !== undefined) {
            this.journal.push({ index, previous });
            return next;
        }
        try {
            this.checkRep();
        } catch (err) {
            this.cells[index] = previous;
            throw err;
        }
        return next;
    }
}

/**
 * @returns true iff `card` can label a card: non-empty, no whitespace
 */
export function isValidCard(card: string): boolean {
    return /^\S+$/u.test(card);
}

/**
 * @param items values to shuffle; not modified
 * @param random source of randomness in [0,1)
 * @returns a uniformly random permutation of `items`
 */
export function shuffle<T>(items: readonly T[], random: () => number = Math.random): T[] {
    const result = [...items];
    // Fisher-Yates
    for (let i = result.length - 1; i > 0; --i) {
        const j = Math.min(Math.floor(random() * (i + 1)), i);
        const picked = result[j];
        const current = result[i];
        invariant(picked !== undefined && current !== undefined, `shuffle index ${j} or ${i} out of range`);
        result[i] = picked;
        result[j] = current;
    }
    return result;
}

function makeSpace(card: string | null, faceUp: boolean, controller: string | null): Space {
    return Object.freeze({ card, faceUp, controller });
}

function checkDimensions(width: number, height: number): void {
    if (!Number.isInteger(width) || !Number.isInteger(height) || width <= 0 || height <= 0) {
        throw new InvalidDimensionsError(`board dimensions must be positive integers, got ${width}x${height}`);
    }
    if (width * height > MAX_BOARD_SPACES) {
        throw new InvalidDimensionsError(`a ${width}x${height} board exceeds the limit of ${MAX_BOARD_SPACES} spaces`);
    }
}
