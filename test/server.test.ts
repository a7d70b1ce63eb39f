import assert from 'node:assert';
import { Board } from '../src/board.js';
import { timeout } from '../src/deferred.js';
import { getLogLevel, setLogLevel, type LogLevel } from '../src/log.js';
import { DEFAULT_GAME_ID, GameRegistry } from '../src/registry.js';
import { WebServer, statusFor } from '../src/server.js';

/**
 * Tests for the HTTP routes, against a server on a random local port.
 */
describe('WebServer', function() {

    // Testing strategy
    //   game routes: look, flip (GET and POST, success, bad location, refused), replace,
    //                watch, leave, reset; on the default game and on a named game
    //   watch and flip: answered, abandoned by the client
    //   game management: create (default board, given size, bad size, too large), list, delete
    //   board files: inside the boards directory, missing, outside it
    //   errors: invalid player, unknown game, status code of each error kind

    let registry: GameRegistry;
    let server: WebServer;
    let base: string;
    let savedLevel: LogLevel;

    before(function() {
        savedLevel = getLogLevel();
        setLogLevel('warn');
    });

    after(function() {
        setLogLevel(savedLevel);
    });

    beforeEach(async function() {
        registry = new GameRegistry('reject');
        // A A
        // B B
        registry.create(DEFAULT_GAME_ID, new Board(2, 2, ['A', 'A', 'B', 'B']));
        server = new WebServer(registry, 0, { host: '127.0.0.1' });
        await server.start();
        base = `http://127.0.0.1:${server.port}`;
    });

    afterEach(async function() {
        await server.stop();
    });

    async function get(path: string, method = 'GET'): Promise<{ status: number; body: unknown }> {
        const response = await fetch(base + path, { method });
        return { status: response.status, body: await response.json() };
    }

    it('GET /look shows the board to the player', async function() {
        const response = await fetch(`${base}/look/alice`);
        assert.strictEqual(response.status, 200);
        assert.strictEqual(response.headers.get('access-control-allow-origin'), '*');
        const body = await response.json();
        assert.deepStrictEqual(body, {
            board: [
                [
                    { card: null, faceUp: false, controlledBy: null, state: 'down' },
                    { card: null, faceUp: false, controlledBy: null, state: 'down' },
                ],
                [
                    { card: null, faceUp: false, controlledBy: null, state: 'down' },
                    { card: null, faceUp: false, controlledBy: null, state: 'down' },
                ],
            ],
            width: 2,
            height: 2,
            scores: {},
        });
    });

    it('GET and POST /flip play a turn', async function() {
        assert.deepStrictEqual(await get('/flip/alice/0,0'),
            { status: 200, body: { ok: true, message: 'Flipped A at (0, 0)', card: 'A' } });
        assert.deepStrictEqual(await get('/flip/alice/1,0', 'POST'),
            { status: 200, body: { ok: true, message: 'Matched A at (0, 0) and (1, 0)', card: 'A', matched: true } });
    });

    it('/flip answers refused flips with 400 or 409', async function() {
        assert.deepStrictEqual(await get('/flip/alice/x,y'),
            { status: 400, body: { ok: false, message: 'location must be <x>,<y>' } });
        assert.deepStrictEqual(await get('/flip/alice/5,0'), {
            status: 400,
            body: { ok: false, message: 'position (5, 0) is outside the 2x2 board', error: 'OutOfBounds' },
        });
        await get('/flip/alice/0,0');
        assert.deepStrictEqual(await get('/flip/bob/0,0'), {
            status: 409,
            body: { ok: false, message: 'card at (0, 0) is controlled by another player', error: 'Contested' },
        });
    });

    it('rejects invalid player ids', async function() {
        assert.deepStrictEqual(await get('/look/bad-id'), {
            status: 400,
            body: { ok: false, message: "invalid player id 'bad-id'", error: 'InvalidPlayer' },
        });
    });

    it('GET /watch answers after the next change', async function() {
        const watching = get('/watch/bob');
        await timeout(50);
        await get('/flip/alice/1,1');
        const { status, body } = await watching;
        assert.strictEqual(status, 200);
        assert.deepStrictEqual(body, await get('/look/bob').then(response => response.body));
    });

    it('forgets a watch whose client disconnects', async function() {
        const session = registry.require(DEFAULT_GAME_ID);
        const before = session.look('bob');
        const controller = new AbortController();
        const watching = fetch(`${base}/watch/bob`, { signal: controller.signal }).then(() => 'answered', () => 'aborted');
        for (let tries = 0; session.waiting === 0 && tries < 50; ++tries) {
            await timeout(10);
        }
        assert.strictEqual(session.waiting, 1);

        controller.abort();
        assert.strictEqual(await watching, 'aborted');
        for (let tries = 0; session.waiting > 0 && tries < 50; ++tries) {
            await timeout(10);
        }
        assert.strictEqual(session.waiting, 0);
        assert.deepStrictEqual(session.look('bob'), before);
        // the server keeps serving
        assert.strictEqual((await get('/look/bob')).status, 200);
    });

    it('GET /replace relabels cards', async function() {
        const { status } = await get('/replace/alice/A/X');
        assert.strictEqual(status, 200);
        assert.deepStrictEqual(await get('/flip/alice/1,0'),
            { status: 200, body: { ok: true, message: 'Flipped X at (1, 0)', card: 'X' } });
    });

    it('GET /leave turns held cards back down', async function() {
        await get('/flip/alice/0,1');
        const { status } = await get('/leave/alice');
        assert.strictEqual(status, 200);
        assert.deepStrictEqual(registry.require(DEFAULT_GAME_ID).selection('alice'), []);
        assert.deepStrictEqual(await get('/flip/bob/0,1'),
            { status: 200, body: { ok: true, message: 'Flipped B at (0, 1)', card: 'B' } });
    });

    it('GET /reset loads a board file', async function() {
        assert.deepStrictEqual(await get('/reset'),
            { status: 400, body: { ok: false, message: 'missing filename query parameter' } });
        assert.deepStrictEqual(await get('/reset?filename=boards/letters.txt'),
            { status: 200, body: { ok: true, message: 'board reset' } });
        const session = registry.require(DEFAULT_GAME_ID);
        assert.strictEqual(session.width, 4);
        assert.strictEqual(session.height, 3);
    });

    it('hosts named games beside the default game', async function() {
        assert.deepStrictEqual(await get('/games/small?width=2&height=3', 'POST'),
            { status: 201, body: { ok: true, gameId: 'small', width: 2, height: 3 } });
        assert.deepStrictEqual(await get('/games'), { status: 200, body: { games: ['default', 'small'] } });
        assert.deepStrictEqual(await get('/health'), { status: 200, body: { status: 'ok', games: ['default', 'small'] } });

        const small = registry.require('small');
        assert.strictEqual(small.contention, 'reject');
        const { status } = await get('/games/small/flip/alice/0,0');
        assert.strictEqual(status, 200);
        assert.match(small.selection('alice')[0]?.card ?? '', /^Card[012]$/);
        // the default game is untouched
        assert.deepStrictEqual(registry.require(DEFAULT_GAME_ID).selection('alice'), []);

        assert.deepStrictEqual(await get('/games/small', 'DELETE'), { status: 200, body: { ok: true, gameId: 'small' } });
        assert.deepStrictEqual(await get('/games/small', 'DELETE'),
            { status: 404, body: { ok: false, message: "no game 'small'" } });
        assert.deepStrictEqual(await get('/games/small/look/alice'),
            { status: 404, body: { ok: false, message: "no game 'small'", error: 'GameNotFound' } });
    });

    it('refuses to create a board of odd size', async function() {
        const { status, body } = await get('/games/odd?width=3&height=3', 'POST');
        assert.strictEqual(status, 400);
        assert.deepStrictEqual(body,
            { ok: false, message: 'could not create board: a 3x3 board needs 9 spaces but 4 cards fill 8' });
        assert.deepStrictEqual(registry.ids(), ['default']);
    });

    it('refuses boards above the size limit without building them', async function() {
        const start = Date.now();
        const { status, body } = await get('/games/big?width=800&height=800', 'POST');
        assert.strictEqual(status, 400);
        assert.deepStrictEqual(body,
            { ok: false, message: 'could not create board: a 800x800 board exceeds the limit of 10000 spaces' });
        assert.ok(Date.now() - start < 1000, `took ${Date.now() - start}ms`);
        assert.deepStrictEqual(registry.ids(), ['default']);
    });

    it('only loads board files from the boards directory', async function() {
        const refused = { ok: false, message: 'could not create board: board file must be inside the boards directory' };
        for (const filename of ['/etc/hostname', 'package.json', 'boards/../package.json', 'boards']) {
            const query = `filename=${encodeURIComponent(filename)}`;
            assert.deepStrictEqual(await get(`/reset?${query}`), { status: 400, body: refused }, filename);
            assert.deepStrictEqual(await get(`/games/other?${query}`, 'POST'), { status: 400, body: refused }, filename);
        }
        assert.deepStrictEqual(registry.ids(), ['default']);
        assert.strictEqual(registry.require(DEFAULT_GAME_ID).width, 2);
    });

    it('does not reveal why a board file could not be read', async function() {
        assert.deepStrictEqual(await get('/reset?filename=boards/no-such-board.txt'),
            { status: 400, body: { ok: false, message: 'could not create board: cannot read board file' } });
    });

    it('maps each error kind to a status code', function() {
        assert.strictEqual(statusFor('OutOfBounds'), 400);
        assert.strictEqual(statusFor('InvalidCardSet'), 400);
        assert.strictEqual(statusFor('NoCard'), 409);
        assert.strictEqual(statusFor('Contested'), 409);
        assert.strictEqual(statusFor('GameNotFound'), 404);
        assert.strictEqual(statusFor('GameClosed'), 410);
        assert.strictEqual(statusFor('InvariantViolation'), 500);
    });
});
