/* Copyright (c) 2021-25 MIT 6.102/6.031 course staff, all rights reserved.
 * Redistribution of original or derived work requires permission of course staff.
 */

/**
 * Machine-checkable kind of a failure raised by the game core.
 */
export type GameErrorCode =
    | 'InvalidDimensions'
    | 'InvalidCardSet'
    | 'OutOfBounds'
    | 'NoCard'
    | 'NotFaceUp'
    | 'InvalidPlayer'
    | 'Contested'
    | 'InvariantViolation'
    | 'Aborted'
    | 'GameClosed'
    | 'GameNotFound';

/**
 * Base class of every typed failure raised by the board, session and registry.
 * `message` is safe to show to a player; it never contains a stack trace.
 */
export abstract class GameError extends Error {
    public abstract readonly code: GameErrorCode;

    public constructor(message: string) {
        super(message);
        this.name = new.target.name;
    }
}

export class InvalidDimensionsError extends GameError {
    public readonly code = 'InvalidDimensions';
}

export class InvalidCardSetError extends GameError {
    public readonly code = 'InvalidCardSet';
}

export class OutOfBoundsError extends GameError {
    public readonly code = 'OutOfBounds';

    public constructor(x: number, y: number, width: number, height: number) {
        super(`position (${x}, ${y}) is outside the ${width}x${height} board`);
    }
}

export class NoCardError extends GameError {
    public readonly code = 'NoCard';

    public constructor(x: number, y: number) {
        super(`no card at (${x}, ${y})`);
    }
}

export class NotFaceUpError extends GameError {
    public readonly code = 'NotFaceUp';

    public constructor(x: number, y: number) {
        super(`card at (${x}, ${y}) is face down`);
    }
}

export class InvalidPlayerError extends GameError {
    public readonly code = 'InvalidPlayer';

    public constructor(playerId: string) {
        super(`invalid player id '${playerId}'`);
    }
}

/** Another player controls the requested card. Recoverable: look again or retry. */
export class ContestedError extends GameError {
    public readonly code = 'Contested';

    public constructor(x: number, y: number) {
        super(`card at (${x}, ${y}) is controlled by another player`);
    }
}

/** A representation invariant failed: a defect, never a caller mistake. */
export class InvariantViolationError extends GameError {
    public readonly code = 'InvariantViolation';
}

export class AbortedError extends GameError {
    public readonly code = 'Aborted';

    public constructor() {
        super('operation aborted');
    }
}

export class GameClosedError extends GameError {
    public readonly code = 'GameClosed';

    public constructor(gameId: string) {
        super(`game '${gameId}' was closed`);
    }
}

export class GameNotFoundError extends GameError {
    public readonly code = 'GameNotFound';

    public constructor(gameId: string) {
        super(`no game '${gameId}'`);
    }
}

/**
 * @throws InvariantViolationError with `message` unless `condition` holds
 */
export function invariant(condition: boolean, message: string): asserts condition {
    if (!condition) {
        throw new InvariantViolationError(message);
    }
}
