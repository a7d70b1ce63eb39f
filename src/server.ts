/* Copyright (c) 2021-25 MIT 6.102/6.031 course staff, all rights reserved.
 * Redistribution of original or derived work requires permission of course staff.
 */

import type { Server } from 'node:http';
import https from 'node:https';
import path from 'node:path';
import express, { type Application, type NextFunction, type Request, type RequestHandler, type Response } from 'express';
import { StatusCodes } from 'http-status-codes';
import { Board } from './board.js';
import { DEFAULT_CARDS, DEFAULT_HEIGHT, DEFAULT_WIDTH, generatedCards } from './cards.js';
import { flip, look, map, watch } from './commands.js';
import { makeDeferred } from './deferred.js';
import { AbortedError, GameError, InvalidPlayerError, type GameErrorCode } from './errors.js';
import { logger } from './log.js';
import { DEFAULT_GAME_ID, type GameRegistry } from './registry.js';
import { isValidPlayerId, type Session } from './session.js';

const log = logger('server');

export interface WebServerOptions {
    /** interface to listen on; default all interfaces */
    readonly host?: string;
    /** key and certificate contents; HTTPS iff present */
    readonly tls?: { readonly key: Buffer; readonly cert: Buffer };
    /** shuffle boards loaded from files */
    readonly shuffle?: boolean;
    /** directory that every board file requested over HTTP must be inside; default `boards` */
    readonly boardsDir?: string;
}

/**
 * HTTP web game server.
 *
 * Every game route exists twice: at the root for the default game, and
 * under /games/<gameId> for a named game. Responses are JSON.
 */
export class WebServer {

    private readonly app: Application;
    private server: Server | undefined;

    /**
     * Make a new web game server for the games in `registry` that listens for
     * connections on port.
     *
     * @param registry games served; the server adds, replaces and deletes games in it
     * @param requestedPort server port number, 0 for any unused port
     */
    public constructor(
        private readonly registry: GameRegistry,
        private readonly requestedPort: number,
        private readonly options: WebServerOptions = {},
    ) {
        this.app = express();
        this.app.use((request: Request, response: Response, next: NextFunction) => {
            // allow requests from web pages hosted anywhere
            response.set('Access-Control-Allow-Origin', '*');
            next();
        });

        this.app.get('/health', (request: Request, response: Response) => {
            response.status(StatusCodes.OK).json({ status: 'ok', games: this.registry.ids() });
        });

        /*
         * GET /games
         * Response is the list of game ids.
         */
        this.app.get('/games', (request: Request, response: Response) => {
            response.status(StatusCodes.OK).json({ games: this.registry.ids() });
        });

        /*
         * POST /games/<gameId>[?width=<w>&height=<h>|?filename=<path>]
         * Starts (or restarts) game gameId on a w x h board of generated cards,
         * on the board in the given file, or on the built-in 4x4 board.
         */
        this.app.post('/games/:gameId', handle(async (request, response) => {
            const gameId = requireParam(request, 'gameId');
            const board = await this.loadBoard(request, response);
            if (board === undefined) {
                return;
            }
            this.registry.create(gameId, board);
            response.status(StatusCodes.CREATED)
                .json({ ok: true, gameId, width: board.width, height: board.height });
        }));

        /*
         * DELETE /games/<gameId>
         * Ends game gameId; its waiting flips and watches fail with 410 Gone.
         */
        this.app.delete('/games/:gameId', (request: Request, response: Response) => {
            const gameId = requireParam(request, 'gameId');
            if (this.registry.delete(gameId)) {
                response.status(StatusCodes.OK).json({ ok: true, gameId });
            } else {
                response.status(StatusCodes.NOT_FOUND).json({ ok: false, message: `no game '${gameId}'` });
            }
        });

        const game = this.gameRoutes();
        this.app.use('/games/:gameId', game);
        this.app.use('/', game);

        this.app.use((err: unknown, request: Request, response: Response, next: NextFunction) => {
            if (response.headersSent) {
                next(err);
                return;
            }
            if (err instanceof AbortedError) {
                // the client went away; nobody to answer
                return;
            }
            if (err instanceof GameError && err.code !== 'InvariantViolation') {
                response.status(statusFor(err.code)).json({ ok: false, message: err.message, error: err.code });
                return;
            }
            log.error(`${request.method} ${request.originalUrl} failed`, err);
            response.status(StatusCodes.INTERNAL_SERVER_ERROR).json({ ok: false, message: 'internal server error' });
        });
    }

    private gameRoutes(): express.Router {
        const router = express.Router({ mergeParams: true });

        /*
         * GET /look/<playerId>
         * playerId must be a nonempty string of alphanumeric or underscore characters
         *
         * Response is the board state from playerId's perspective.
         */
        router.get('/look/:playerId', handle(async (request, response) => {
            const boardState = await look(this.session(request), requirePlayer(request));
            response.status(StatusCodes.OK).json(boardState);
        }));

        /*
         * GET or POST /flip/<playerId>/<x>,<y>
         * x and y must be integers; 0 <= x,y < width,height of board (respectively)
         *
         * Response is the flip result: 200 on success, otherwise 400 (bad
         * coordinates) or 409 (no card there, or another player controls it).
         * Under the wait policy the response is delayed while the card is contested.
         */
        const flipCard = handle(async (request, response) => {
            const playerId = requirePlayer(request);
            const match = /^(-?\d+),(-?\d+)$/.exec(requireParam(request, 'location'));
            if (!match) {
                response.status(StatusCodes.BAD_REQUEST).json({ ok: false, message: 'location must be <x>,<y>' });
                return;
            }
            const x = parseInt(match[1] ?? '');
            const y = parseInt(match[2] ?? '');

            const result = await flip(this.session(request), playerId, x, y, abortOnClose(response));
            response.status(result.ok ? StatusCodes.OK : statusFor(result.error)).json(result);
        });
        router.get('/flip/:playerId/:location', flipCard);
        router.post('/flip/:playerId/:location', flipCard);

        /*
         * GET /replace/<playerId>/<oldcard>/<newcard>
         * Replaces all occurrences of oldcard with newcard (as card labels) on the board.
         *
         * Response is the state of the board after the replacement from the perspective of playerId.
         */
        router.get('/replace/:playerId/:fromCard/:toCard', handle(async (request, response) => {
            const playerId = requirePlayer(request);
            const fromCard = requireParam(request, 'fromCard');
            const toCard = requireParam(request, 'toCard');
            const boardState = await map(this.session(request), playerId,
                async (card: string) => card === fromCard ? toCard : card);
            response.status(StatusCodes.OK).json(boardState);
        }));

        /*
         * GET /watch/<playerId>
         * Waits until the next time the board changes (defined as any cards turning face up or face down,
         * being removed from the board, changing control, or changing from one string to a different string).
         *
         * Response is the new state of the board from the perspective of playerId.
         */
        router.get('/watch/:playerId', handle(async (request, response) => {
            const boardState = await watch(this.session(request), requirePlayer(request), abortOnClose(response));
            response.status(StatusCodes.OK).json(boardState);
        }));

        /*
         * GET /leave/<playerId>
         * Turns the cards playerId holds back face down.
         */
        router.get('/leave/:playerId', handle(async (request, response) => {
            const boardState = await this.session(request).relinquish(requirePlayer(request));
            response.status(StatusCodes.OK).json(boardState);
        }));

        /*
         * GET /reset?filename=<path>
         * Restart the game on the board in the given file, a path inside
         * the boards directory.
         */
        router.get('/reset', handle(async (request, response) => {
            if (queryString(request, 'filename') === undefined) {
                response.status(StatusCodes.BAD_REQUEST).json({ ok: false, message: 'missing filename query parameter' });
                return;
            }
            const board = await this.loadBoard(request, response);
            if (board === undefined) {
                return;
            }
            this.registry.create(gameIdOf(request), board);
            response.status(StatusCodes.OK).json({ ok: true, message: 'board reset' });
        }));

        return router;
    }

    private session(request: Request): Session {
        return this.registry.require(gameIdOf(request));
    }

    // answers 400 itself and returns undefined if the board cannot be made
    private async loadBoard(request: Request, response: Response): Promise<Board | undefined> {
        const filename = queryString(request, 'filename');
        const width = queryString(request, 'width');
        const height = queryString(request, 'height');
        if (filename !== undefined && !this.isBoardFile(filename)) {
            response.status(StatusCodes.BAD_REQUEST)
                .json({ ok: false, message: 'could not create board: board file must be inside the boards directory' });
            return undefined;
        }
        try {
            if (filename !== undefined) {
                return await Board.parseFromFile(filename, { shuffle: this.options.shuffle ?? false });
            }
            if (width === undefined && height === undefined) {
                return Board.create(DEFAULT_WIDTH, DEFAULT_HEIGHT, DEFAULT_CARDS);
            }
            const columns = Number(width);
            const rows = Number(height);
            return Board.create(columns, rows, generatedCards(Math.floor(columns * rows / 2)));
        } catch (err) {
            // file system errors are logged, not sent
            const message = err instanceof GameError ? err.message : 'cannot read board file';
            if (!(err instanceof GameError)) {
                log.debug(`${request.method} ${request.originalUrl}: could not load board`, err);
            }
            response.status(StatusCodes.BAD_REQUEST).json({ ok: false, message: `could not create board: ${message}` });
            return undefined;
        }
    }

    // filename is relative to the working directory and must lie inside boardsDir
    private isBoardFile(filename: string): boolean {
        const root = path.resolve(this.options.boardsDir ?? 'boards');
        return path.resolve(filename).startsWith(root + path.sep);
    }

    /**
     * Start this server.
     *
     * @returns (a promise that) resolves when the server is listening
     */
    public start(): Promise<void> {
        const { promise, resolve, reject } = makeDeferred<void>();
        const host = this.options.host ?? '0.0.0.0';
        const tls = this.options.tls;
        const server: Server = tls === undefined
            ? this.app.listen(this.requestedPort, host)
            : https.createServer({ key: tls.key, cert: tls.cert }, this.app).listen(this.requestedPort, host);
        this.server = server;
        server.once('error', reject);
        server.once('listening', () => {
            log.info(`server now listening at ${tls === undefined ? 'http' : 'https'}://${host}:${this.port}`);
            resolve();
        });
        return promise;
    }

    /**
     * @returns the actual port that server is listening at. (May be different
     *          than the requestedPort used in the constructor, since if
     *          requestedPort = 0 then an arbitrary available port is chosen.)
     *          Requires that start() has already been called and completed.
     */
    public get port(): number {
        const address = this.server?.address() ?? 'not connected';
        if (typeof address === 'string') {
            throw new Error('server is not listening at a port');
        }
        return address.port;
    }

    /**
     * Stop this server, dropping open connections such as waiting watches.
     * Once stopped, this server cannot be restarted.
     */
    public stop(): Promise<void> {
        const server = this.server;
        if (server === undefined) {
            return Promise.resolve();
        }
        const { promise, resolve, reject } = makeDeferred<void>();
        server.close(err => err === undefined ? resolve() : reject(err));
        server.closeAllConnections();
        log.info('server stopped');
        return promise;
    }
}

/**
 * @returns HTTP status for a failed request of kind `code`
 */
export function statusFor(code: GameErrorCode): StatusCodes {
    switch (code) {
        case 'InvalidDimensions':
        case 'InvalidCardSet':
        case 'OutOfBounds':
        case 'NotFaceUp':
        case 'InvalidPlayer':
            return StatusCodes.BAD_REQUEST;
        case 'NoCard':
        case 'Contested':
            return StatusCodes.CONFLICT;
        case 'GameNotFound':
            return StatusCodes.NOT_FOUND;
        case 'GameClosed':
            return StatusCodes.GONE;
        case 'Aborted':
        case 'InvariantViolation':
            return StatusCodes.INTERNAL_SERVER_ERROR;
    }
}

// express 4 does not catch rejections of async handlers
function handle(route: (request: Request, response: Response) => Promise<void>): RequestHandler {
    return (request: Request, response: Response, next: NextFunction) => {
        void route(request, response).catch(next);
    };
}

function requireParam(request: Request, name: string): string {
    const value = request.params[name];
    if (value === undefined) {
        throw new Error(`route is missing parameter ${name}`);
    }
    return value;
}

function requirePlayer(request: Request): string {
    const playerId = requireParam(request, 'playerId');
    if (!isValidPlayerId(playerId)) {
        throw new InvalidPlayerError(playerId);
    }
    return playerId;
}

function gameIdOf(request: Request): string {
    return request.params['gameId'] ?? DEFAULT_GAME_ID;
}

function queryString(request: Request, name: string): string | undefined {
    const value = request.query[name];
    return typeof value === 'string' ? value : undefined;
}

// aborts when the client disconnects before the response is sent
function abortOnClose(response: Response): AbortSignal {
    const controller = new AbortController();
    response.on('close', () => {
        if (!response.writableFinished) {
            controller.abort();
        }
    });
    return controller.signal;
}
