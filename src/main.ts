/* Copyright (c) 2021-25 MIT 6.102/6.031 course staff, all rights reserved.
 * Redistribution of original or derived work requires permission of course staff.
 */

import fs from 'node:fs';
import process from 'node:process';
import { Board } from './board.js';
import { DEFAULT_CARDS, DEFAULT_HEIGHT, DEFAULT_WIDTH } from './cards.js';
import { parseConfig } from './config.js';
import { logger, setLogLevel } from './log.js';
import { DEFAULT_GAME_ID, GameRegistry } from './registry.js';
import { WebServer, type WebServerOptions } from './server.js';

/**
 * Start a game server using the given arguments.
 *
 * Command-line usage:
 *     npm start PORT [FILENAME]
 * where:
 *
 *   - PORT is an integer that specifies the server's listening port number,
 *     0 specifies that a random unused port will be automatically chosen.
 *   - FILENAME is the path to a valid board file, which will be loaded as
 *     the starting board of the default game; without it the default game
 *     uses the built-in 4x4 board.
 *
 * For example, to start a web server on a randomly-chosen port using the
 * board in `boards/letters.txt`:
 *     npm start 0 boards/letters.txt
 *
 * See config.ts for the environment variables.
 *
 * @throws Error if an error occurs parsing a file or starting a server
 */
async function main(): Promise<void> {
    const config = parseConfig(process.argv.slice(2), process.env);
    setLogLevel(config.logLevel);
    const log = logger('main');

    const board = config.boardFile === undefined
        ? Board.create(DEFAULT_WIDTH, DEFAULT_HEIGHT, DEFAULT_CARDS)
        : await Board.parseFromFile(config.boardFile, { shuffle: config.shuffle });
    log.info(`loaded ${board.width}x${board.height} board from ${config.boardFile ?? 'built-in cards'}`);

    const registry = new GameRegistry(config.contention);
    registry.create(DEFAULT_GAME_ID, board);

    const options: WebServerOptions = {
        host: config.host,
        shuffle: config.shuffle,
        tls: config.tls === undefined ? undefined : {
            key: await fs.promises.readFile(config.tls.keyPath),
            cert: await fs.promises.readFile(config.tls.certPath),
        },
    };
    const server = new WebServer(registry, config.port, options);
    await server.start();

    const shutdown = (): void => {
        void server.stop().then(() => process.exit(0), (err: unknown) => {
            log.error('failed to stop server', err);
            process.exit(1);
        });
    };
    process.once('SIGINT', shutdown);
    process.once('SIGTERM', shutdown);
}

await main();
