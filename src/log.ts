/* Copyright (c) 2021-25 MIT 6.102/6.031 course staff, all rights reserved.
 * Redistribution of original or derived work requires permission of course staff.
 */

import process from 'node:process';

/**
 * Console logger with levels and a scope prefix.
 *
 *     const log = logger('game default');
 *     log.info('created 4x4 board');   // [game default] created 4x4 board
 *
 * The level starts from the LOG_LEVEL environment variable (default `info`)
 * and can be changed at start-up with setLogLevel().
 */

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error'] as const;

export type LogLevel = typeof LOG_LEVELS[number];

export interface Logger {
    debug(message: string, ...details: unknown[]): void;
    info(message: string, ...details: unknown[]): void;
    warn(message: string, ...details: unknown[]): void;
    error(message: string, ...details: unknown[]): void;
}

export function isLogLevel(value: string): value is LogLevel {
    return LOG_LEVELS.some(level => level === value);
}

const levelFromEnv = process.env['LOG_LEVEL'];
let currentLevel: LogLevel = levelFromEnv !== undefined && isLogLevel(levelFromEnv) ? levelFromEnv : 'info';

export function setLogLevel(level: LogLevel): void {
    currentLevel = level;
}

export function getLogLevel(): LogLevel {
    return currentLevel;
}

function enabled(level: LogLevel): boolean {
    return LOG_LEVELS.indexOf(level) >= LOG_LEVELS.indexOf(currentLevel);
}

/**
 * @param scope label printed in brackets before every message
 * @returns a logger whose output is filtered by the current level
 */
export function logger(scope: string): Logger {
    const prefix = `[${scope}]`;
    return {
        debug: (message, ...details) => {
            if (enabled('debug')) console.log(prefix, message, ...details);
        },
        info: (message, ...details) => {
            if (enabled('info')) console.log(prefix, message, ...details);
        },
        warn: (message, ...details) => {
            if (enabled('warn')) console.warn(prefix, message, ...details);
        },
        error: (message, ...details) => {
            if (enabled('error')) console.error(prefix, message, ...details);
        },
    };
}
