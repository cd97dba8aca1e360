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

import * as yaml from 'yaml';
import { isWordBits } from '../expression/word-math';
import { isLogLevel } from '../logger';
import { FileReader, NodeFileReader } from './file-reader';
import { MonitorConfig, resolveMonitorConfig } from './monitor-config';

const ROOT_NODE = 'monitor';

type YamlNode = Record<string, unknown>;

const isNode = (value: unknown): value is YamlNode =>
    typeof value === 'object' && value !== null && !Array.isArray(value);

const isPositiveInteger = (value: unknown): value is number =>
    typeof value === 'number' && Number.isInteger(value) && value > 0;

export class ConfigReader {
    constructor(private reader: FileReader = new NodeFileReader()) {}

    public async parse(filePath: string): Promise<MonitorConfig> {
        const fileContents = await this.reader.readFileToString(filePath);
        const fileRoot: unknown = yaml.parse(fileContents);
        const monitor = isNode(fileRoot) ? fileRoot[ROOT_NODE] : undefined;
        if (!isNode(monitor)) {
            throw new Error(`Invalid monitor configuration file: ${filePath}`);
        }

        const invalid = (key: string, value: unknown): Error =>
            new Error(`Invalid value for '${key}' in ${filePath}: ${String(value)}`);

        const overrides: Partial<MonitorConfig> = {};

        const watchpoints = monitor['watchpoints'];
        if (watchpoints !== undefined && watchpoints !== null) {
            if (!isNode(watchpoints)) {
                throw invalid('watchpoints', watchpoints);
            }
            const capacity = watchpoints['capacity'];
            if (capacity !== undefined) {
                if (!isPositiveInteger(capacity)) {
                    throw invalid('watchpoints.capacity', capacity);
                }
                overrides.watchpointCapacity = capacity;
            }
            const maxLength = watchpoints['expression-max-length'];
            if (maxLength !== undefined) {
                if (!isPositiveInteger(maxLength)) {
                    throw invalid('watchpoints.expression-max-length', maxLength);
                }
                overrides.expressionMaxLength = maxLength;
            }
        }

        const wordBits = monitor['word-bits'];
        if (wordBits !== undefined) {
            if (!isWordBits(wordBits)) {
                throw invalid('word-bits', wordBits);
            }
            overrides.wordBits = wordBits;
        }

        const logLevel = monitor['log-level'];
        if (logLevel !== undefined) {
            if (!isLogLevel(logLevel)) {
                throw invalid('log-level', logLevel);
            }
            overrides.logLevel = logLevel;
        }

        const perfStats = monitor['perf-stats'];
        if (perfStats !== undefined) {
            if (typeof perfStats !== 'boolean') {
                throw invalid('perf-stats', perfStats);
            }
            overrides.perfStats = perfStats;
        }

        return resolveMonitorConfig(overrides);
    }
}
