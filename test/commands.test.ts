import assert from 'node:assert';
import { Board } from '../src/board.js';
import { flip, look, map, watch } from '../src/commands.js';
import { GameClosedError } from '../src/errors.js';
import { Session } from '../src/session.js';

describe('commands', function() {

    // Testing strategy
    //   flip(): first card, matching pair, refused (off the board, contested, removed,
    //           invalid player), game closed
    //   look(), map(), watch(): pass through to the session

    // A A
    // B B
    const game = (): Session => new Session(new Board(2, 2, ['A', 'A', 'B', 'B']), { contention: 'reject' });

    it('flip reports the card and, on a second card, the match', async function() {
        const session = game();
        assert.deepStrictEqual(await flip(session, 'alice', 0, 0),
            { ok: true, message: 'Flipped A at (0, 0)', card: 'A' });
        assert.deepStrictEqual(await flip(session, 'alice', 1, 0),
            { ok: true, message: 'Matched A at (0, 0) and (1, 0)', card: 'A', matched: true });
    });

    it('flip reports refused flips instead of throwing', async function() {
        const session = game();
        assert.deepStrictEqual(await flip(session, 'alice', 5, 0),
            { ok: false, message: 'position (5, 0) is outside the 2x2 board', error: 'OutOfBounds' });
        assert.deepStrictEqual(await flip(session, 'no way', 0, 0),
            { ok: false, message: "invalid player id 'no way'", error: 'InvalidPlayer' });

        await flip(session, 'alice', 0, 1);
        assert.deepStrictEqual(await flip(session, 'bob', 0, 1),
            { ok: false, message: 'card at (0, 1) is controlled by another player', error: 'Contested' });

        await flip(session, 'alice', 1, 1);
        assert.deepStrictEqual(await flip(session, 'bob', 1, 1),
            { ok: false, message: 'no card at (1, 1)', error: 'NoCard' });
    });

    it('flip lets a closed game fail', async function() {
        const session = game();
        session.close();
        await assert.rejects(flip(session, 'alice', 0, 0), GameClosedError);
    });

    it('look, map and watch show the board to the player', async function() {
        const session = game();
        const watching = watch(session, 'bob');
        const mapped = await map(session, 'alice', async card => card === 'B' ? 'C' : card);
        assert.strictEqual(mapped.width, 2);
        assert.deepStrictEqual((await watching).board, mapped.board);

        await flip(session, 'alice', 1, 1);
        const view = await look(session, 'alice');
        assert.deepStrictEqual(view.board[1]?.[1], { card: 'C', faceUp: true, controlledBy: 'alice', state: 'my' });
    });
});
