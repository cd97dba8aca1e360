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

import { toUnsigned, type WordBits } from '../expression/word-math';
import type { WatchpointInfo, WatchpointTrigger } from './watchpoint-pool';

const UNKNOWN_VALUE = '<unknown>';

export function formatValue(value: bigint | undefined, bits: WordBits): string {
    if (value === undefined) {
        return UNKNOWN_VALUE;
    }
    return `${value.toString()} (0x${toUnsigned(value, bits).toString(16)})`;
}

export function formatWatchpointList(list: readonly WatchpointInfo[], bits: WordBits): string {
    if (list.length === 0) {
        return 'No watchpoints.';
    }
    return list
        .map(wp => `Watchpoint ${wp.id}: ${wp.expression}, value = ${formatValue(wp.lastValue, bits)}`)
        .join('\n');
}

export function formatTrigger(trigger: WatchpointTrigger, bits: WordBits): string {
    return [
        `Watchpoint ${trigger.id} triggered: ${trigger.expression}`,
        `Old value = ${formatValue(trigger.oldValue, bits)}, New value = ${formatValue(trigger.newValue, bits)}`,
    ].join('\n');
}
