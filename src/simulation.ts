/* Copyright (c) 2021-25 MIT 6.102/6.031 course staff, all rights reserved.
 * Redistribution of original or derived work requires permission of course staff.
 */

import process from 'node:process';
import { pathToFileURL } from 'node:url';
import { Board } from './board.js';
import { timeout } from './deferred.js';
import { GameError } from './errors.js';
import { logger, setLogLevel } from './log.js';
import { Session, type ContentionPolicy } from './session.js';

const log = logger('simulation');

export interface SimulationOptions {
    /** number of concurrent players */
    readonly players: number;
    /** flips attempted by each player */
    readonly tries: number;
    /** delay range before each flip, in milliseconds */
    readonly minDelayMs: number;
    readonly maxDelayMs: number;
    /** source of randomness in [0,1) */
    readonly random?: () => number;
}

export interface PlayerStats {
    attempts: number;
    successes: number;
    failures: number;
    matches: number;
    totalTimeMs: number;
}

/**
 * Play `session` with several concurrent players, each flipping random
 * positions after random delays. Refused flips (contested or removed cards,
 * which random play runs into constantly) are counted, not raised. A player
 * turns back any card it still holds when it finishes, so players waiting
 * on that card are released.
 *
 * @returns statistics per player id (p0, p1, ...)
 * @throws the first unexpected error any player hits
 */
export async function simulate(session: Session, options: SimulationOptions): Promise<Record<string, PlayerStats>> {
    const random = options.random ?? Math.random;
    const stats: Record<string, PlayerStats> = {};

    async function player(playerNumber: number): Promise<void> {
        const playerId = `p${playerNumber}`;
        const mine: PlayerStats = { attempts: 0, successes: 0, failures: 0, matches: 0, totalTimeMs: 0 };
        stats[playerId] = mine;

        for (let jj = 0; jj < options.tries; ++jj) {
            await timeout(randomDelay(options.minDelayMs, options.maxDelayMs, random));
            const x = randomInt(session.width, random);
            const y = randomInt(session.height, random);
            const start = Date.now();
            mine.attempts++;
            try {
                const outcome = await session.flip(playerId, x, y);
                mine.successes++;
                if (outcome.matched) {
                    mine.matches++;
                }
                log.debug(`${playerId} flip=(${x},${y}): ${outcome.message}`);
            } catch (err) {
                if (!(err instanceof GameError) || (err.code !== 'Contested' && err.code !== 'NoCard')) {
                    throw err;
                }
                mine.failures++;
                log.debug(`${playerId} flip=(${x},${y}) failed: ${err.message}`);
            } finally {
                mine.totalTimeMs += Date.now() - start;
            }
        }
        await session.relinquish(playerId);
    }

    // start up the players as concurrent asynchronous function calls and
    // wait for all of them to finish (unless one throws an exception)
    const playerPromises: Array<Promise<void>> = [];
    for (let ii = 0; ii < options.players; ++ii) {
        playerPromises.push(player(ii));
    }
    await Promise.all(playerPromises);
    return stats;
}

/**
 * Random non-negative integer generator
 *
 * @param max a positive integer which is the upper bound of the generated number
 * @returns a random integer >= 0 and < max
 */
function randomInt(max: number, random: () => number): number {
    return Math.min(Math.floor(random() * max), max - 1);
}

/**
 * @returns a delay uniformly distributed in [min, max)
 */
function randomDelay(min: number, max: number, random: () => number): number {
    return min + random() * (max - min);
}

/**
 * Run a simulation from the command line:
 *     npm run simulate [FILENAME]
 * Environment: PLAYERS (default 4), TRIES (default 100), MIN_DELAY and
 * MAX_DELAY in ms (default 0.1 and 2), FLIP_CONTENTION (wait|reject),
 * SIM_VERBOSE=1 to log every flip.
 */
async function simulationMain(): Promise<void> {
    const filename = process.argv[2] ?? 'boards/letters.txt';
    const contention: ContentionPolicy = process.env['FLIP_CONTENTION'] === 'reject' ? 'reject' : 'wait';
    if (process.env['SIM_VERBOSE'] === '1') {
        setLogLevel('debug');
    }
    const options: SimulationOptions = {
        players: Number(process.env['PLAYERS'] ?? 4),
        tries: Number(process.env['TRIES'] ?? 100),
        minDelayMs: Number(process.env['MIN_DELAY'] ?? 0.1),
        maxDelayMs: Number(process.env['MAX_DELAY'] ?? 2),
    };

    const session = new Session(await Board.parseFromFile(filename, { shuffle: true }), { contention });
    const stats = await simulate(session, options);

    log.info(`simulation finished: players=${options.players}, tries=${options.tries}, finished=${session.isFinished()}`);
    for (const [playerId, s] of Object.entries(stats)) {
        log.info(`player=${playerId} attempts=${s.attempts} successes=${s.successes} failures=${s.failures}`
            + ` matches=${s.matches} avgTime=${(s.totalTimeMs / Math.max(1, s.attempts)).toFixed(2)}ms`);
    }
    log.info(`scores ${JSON.stringify(session.look('observer').scores)}`);
}

const entry = process.argv[1];
if (entry !== undefined && import.meta.url === pathToFileURL(entry).href) {
    await simulationMain();
}
