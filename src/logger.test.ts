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

import {
    componentLogger,
    createLogger,
    expressionLogger,
    formatLogLine,
    isLogLevel,
    logger,
    setLogLevel,
    watchpointLogger,
} from './logger';

describe('logger', () => {
    afterEach(() => {
        jest.restoreAllMocks();
        setLogLevel('info');
    });

    it('is silent while running tests', () => {
        expect(logger.silent).toBe(true);
    });

    it('prefixes component messages with their tag', () => {
        const info = jest.spyOn(logger, 'info').mockImplementation(() => logger);
        const warn = jest.spyOn(logger, 'warn').mockImplementation(() => logger);
        expressionLogger.info('tokens: 1 + 2');
        watchpointLogger.warn('pool exhausted');
        expect(info).toHaveBeenCalledWith('[Expression] tokens: 1 + 2');
        expect(warn).toHaveBeenCalledWith('[Watchpoint] pool exhausted');
    });

    it('creates independent loggers for tagged components', () => {
        const own = createLogger('debug');
        expect(own).not.toBe(logger);
        expect(own.level).toBe('debug');
        expect(logger.level).toBe('info');
        const debug = jest.spyOn(own, 'debug').mockImplementation(() => own);
        componentLogger('Monitor', own).debug('ready');
        expect(debug).toHaveBeenCalledWith('[Monitor] ready');
    });

    it('formats lines with timestamp and level', () => {
        expect(formatLogLine({ level: 'info', message: 'hello', timestamp: '2026-01-01T00:00:00.000Z' }))
            .toBe('2026-01-01T00:00:00.000Z [info]: hello');
    });

    it('validates and applies log levels', () => {
        expect(isLogLevel('debug')).toBe(true);
        expect(isLogLevel('verbose')).toBe(false);
        expect(isLogLevel(3)).toBe(false);
        setLogLevel('debug');
        expect(logger.level).toBe('debug');
    });
});
