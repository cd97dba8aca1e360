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

import { DEFAULT_WORD_BITS, type WordBits } from '../expression/word-math';
import type { LogLevel } from '../logger';
import { DEFAULT_EXPRESSION_MAX_LENGTH, DEFAULT_WATCHPOINT_CAPACITY } from '../watchpoints/watchpoint-pool';

export interface MonitorConfig {
    watchpointCapacity: number;
    expressionMaxLength: number;
    wordBits: WordBits;
    logLevel: LogLevel;
    perfStats: boolean;
}

export const DEFAULT_MONITOR_CONFIG: Readonly<MonitorConfig> = {
    watchpointCapacity: DEFAULT_WATCHPOINT_CAPACITY,
    expressionMaxLength: DEFAULT_EXPRESSION_MAX_LENGTH,
    wordBits: DEFAULT_WORD_BITS,
    logLevel: 'info',
    perfStats: false,
};

export function resolveMonitorConfig(overrides: Partial<MonitorConfig> = {}): MonitorConfig {
    return {
        watchpointCapacity: overrides.watchpointCapacity ?? DEFAULT_MONITOR_CONFIG.watchpointCapacity,
        expressionMaxLength: overrides.expressionMaxLength ?? DEFAULT_MONITOR_CONFIG.expressionMaxLength,
        wordBits: overrides.wordBits ?? DEFAULT_MONITOR_CONFIG.wordBits,
        logLevel: overrides.logLevel ?? DEFAULT_MONITOR_CONFIG.logLevel,
        perfStats: overrides.perfStats ?? DEFAULT_MONITOR_CONFIG.perfStats,
    };
}
