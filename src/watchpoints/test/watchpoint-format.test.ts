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

import { formatTrigger, formatValue, formatWatchpointList } from '../watchpoint-format';

describe('formatValue', () => {
    it.each([
        { value: 0n, bits: 32 as const, expected: '0 (0x0)' },
        { value: 26n, bits: 32 as const, expected: '26 (0x1a)' },
        { value: -1n, bits: 32 as const, expected: '-1 (0xffffffff)' },
        { value: -2147483648n, bits: 32 as const, expected: '-2147483648 (0x80000000)' },
        { value: -1n, bits: 64 as const, expected: '-1 (0xffffffffffffffff)' },
    ])('renders $value at $bits bits', ({ value, bits, expected }) => {
        expect(formatValue(value, bits)).toBe(expected);
    });

    it('renders the unknown sentinel', () => {
        expect(formatValue(undefined, 32)).toBe('<unknown>');
    });
});

describe('formatWatchpointList', () => {
    it('reports an empty pool', () => {
        expect(formatWatchpointList([], 32)).toBe('No watchpoints.');
    });

    it('renders one line per watchpoint in the given order', () => {
        const text = formatWatchpointList([
            { id: 2, expression: '$sp-4', lastValue: 4092n },
            { id: 0, expression: '10/$a0', lastValue: undefined },
        ], 32);
        expect(text).toBe([
            'Watchpoint 2: $sp-4, value = 4092 (0xffc)',
            'Watchpoint 0: 10/$a0, value = <unknown>',
        ].join('\n'));
    });
});

describe('formatTrigger', () => {
    it('renders the old and new values', () => {
        expect(formatTrigger({ id: 1, expression: '$a0', oldValue: 3n, newValue: -3n }, 32)).toBe(
            'Watchpoint 1 triggered: $a0\nOld value = 3 (0x3), New value = -3 (0xfffffffd)'
        );
    });

    it('renders an unknown old value', () => {
        expect(formatTrigger({ id: 0, expression: '1/$a0', oldValue: undefined, newValue: 1n }, 32)).toBe(
            'Watchpoint 0 triggered: 1/$a0\nOld value = <unknown>, New value = 1 (0x1)'
        );
    });
});
