/**
 * Copyright 2026 Arm Limited
 *
 * Licensed under the Apache License, Version 2.0 (the "License");
 * you may not use this file except in compliance with the License.
 * You may obtain a copy of the License at
 *
 *     http://www.apache.org/licenses/LICENSE-2.0
 *
 * Unless required by applicable law or agreed to in writing, software
 * distributed under the License is distributed on an "AS IS" BASIS,
 * WITHOUT WARRANTIES OR CONDITIONS OF ANY KIND, either express or implied.
 * See the License for the specific language governing permissions and
 * limitations under the License.
 */

import winston from 'winston';

const { combine, timestamp, printf } = winston.format;

export const LOG_LEVELS = ['error', 'warn', 'info', 'debug'] as const;
export type LogLevel = typeof LOG_LEVELS[number];

export function isLogLevel(value: unknown): value is LogLevel {
    return LOG_LEVELS.some(level => level === value);
}

export const formatLogLine = (info: { level: string; message: unknown; [key: string]: unknown }): string =>
    `${String(info.timestamp ?? '')} [${info.level}]: ${String(info.message)}`;

const envLevel = process.env.MONITOR_LOG_LEVEL;

/** Console logger with the shared line format. Each monitor owns one. */
export function createLogger(level: LogLevel): winston.Logger {
    return winston.createLogger({
        level,
        silent: process.env.NODE_ENV === 'test',
        format: combine(
            timestamp(),
            printf(formatLogLine)
        ),
        transports: [
            new winston.transports.Console()
        ]
    });
}

export const logger = createLogger(isLogLevel(envLevel) ? envLevel : 'info');

export function setLogLevel(level: LogLevel): void {
    logger.level = level;
}

export interface ComponentLogger {
    error(message: string): void;
    warn(message: string): void;
    info(message: string): void;
    debug(message: string): void;
}

export function componentLogger(tag: string, base: winston.Logger = logger): ComponentLogger {
    return {
        error: (message) => base.error(`[${tag}] ${message}`),
        warn: (message) => base.warn(`[${tag}] ${message}`),
        info: (message) => base.info(`[${tag}] ${message}`),
        debug: (message) => base.debug(`[${tag}] ${message}`),
    };
}

export const expressionLogger = componentLogger('Expression');
export const watchpointLogger = componentLogger('Watchpoint');
