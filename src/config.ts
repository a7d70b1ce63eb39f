/* Copyright (c) 2021-25 MIT 6.102/6.031 course staff, all rights reserved.
 * Redistribution of original or derived work requires permission of course staff.
 */

import { isLogLevel, type LogLevel } from './log.js';
import type { ContentionPolicy } from './session.js';

/**
 * Settings for one server process.
 */
export interface ServerConfig {
    /** listening port; 0 picks an unused port */
    readonly port: number;
    readonly host: string;
    /** board file for the default game, or undefined for the built-in cards */
    readonly boardFile: string | undefined;
    readonly shuffle: boolean;
    readonly contention: ContentionPolicy;
    readonly logLevel: LogLevel;
    /** key and certificate files, present iff the server speaks HTTPS */
    readonly tls: { readonly keyPath: string; readonly certPath: string } | undefined;
}

/**
 * Build the server configuration from command-line arguments and environment.
 *
 * Command-line usage:
 *     npm start PORT [FILENAME]
 * where PORT is a non-negative integer and FILENAME a board file.
 *
 * Environment: HOST (default 0.0.0.0), FLIP_CONTENTION (wait|reject, default
 * wait), SHUFFLE_BOARD (1|true), LOG_LEVEL (debug|info|warn|error, default
 * info), USE_HTTPS (1|true) with TLS_KEY and TLS_CERT (default
 * certs/key.pem and certs/cert.pem).
 *
 * @param args command-line arguments after the script name
 * @param env process environment
 * @throws Error describing the first invalid setting
 */
export function parseConfig(args: readonly string[], env: NodeJS.ProcessEnv): ServerConfig {
    const [portString, boardFile] = args;
    if (portString === undefined) { throw new Error('missing PORT'); }
    if (!/^\d+$/.test(portString)) { throw new Error(`invalid PORT '${portString}'`); }
    const port = parseInt(portString);
    if (port > 65535) { throw new Error(`invalid PORT '${portString}'`); }

    const contention = env['FLIP_CONTENTION'] ?? 'wait';
    if (contention !== 'wait' && contention !== 'reject') {
        throw new Error(`FLIP_CONTENTION must be 'wait' or 'reject', got '${contention}'`);
    }

    const logLevel = env['LOG_LEVEL'] ?? 'info';
    if (!isLogLevel(logLevel)) {
        throw new Error(`LOG_LEVEL must be debug, info, warn or error, got '${logLevel}'`);
    }

    const tls = flag(env['USE_HTTPS'])
        ? { keyPath: env['TLS_KEY'] || 'certs/key.pem', certPath: env['TLS_CERT'] || 'certs/cert.pem' }
        : undefined;

    return {
        port,
        host: env['HOST'] || '0.0.0.0',
        boardFile,
        shuffle: flag(env['SHUFFLE_BOARD']),
        contention,
        logLevel,
        tls,
    };
}

function flag(value: string | undefined): boolean {
    return value === '1' || value === 'true';
}
