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
    addWords,
    divWords,
    isWordBits,
    maskToBits,
    mulWords,
    negateWord,
    normalizeSigned,
    parseDecimalLiteral,
    parseHexLiteral,
    subWords,
    toUnsigned,
} from '../word-math';

describe('word-math', () => {
    it('masks and sign-extends to the word width', () => {
        expect(maskToBits(-1n, 8)).toBe(0xffn);
        expect(maskToBits(0x1234n, 0)).toBe(0x1234n);
        expect(normalizeSigned(0xffn, 8)).toBe(-1n);
        expect(normalizeSigned(0x7fn, 8)).toBe(127n);
        expect(normalizeSigned(0x1_0000_0005n, 32)).toBe(5n);
        expect(toUnsigned(-1n, 32)).toBe(0xffffffffn);
    });

    it('accepts 32 and 64 bit words only', () => {
        expect(isWordBits(32)).toBe(true);
        expect(isWordBits(64)).toBe(true);
        expect(isWordBits(16)).toBe(false);
        expect(isWordBits('32')).toBe(false);
    });

    it('parses decimal and hexadecimal literals', () => {
        expect(parseDecimalLiteral('42', 32)).toBe(42n);
        expect(parseDecimalLiteral('4x', 32)).toBeUndefined();
        expect(parseHexLiteral('0x1A', 32)).toBe(26n);
        expect(parseHexLiteral('0XfF', 32)).toBe(255n);
        expect(parseHexLiteral('1A', 32)).toBeUndefined();
        expect(parseHexLiteral('0x80000000', 32)).toBe(-2147483648n);
        expect(parseHexLiteral('0x80000000', 64)).toBe(2147483648n);
    });

    it('wraps arithmetic results', () => {
        expect(addWords(2147483647n, 1n, 32)).toBe(-2147483648n);
        expect(subWords(-2147483648n, 1n, 32)).toBe(2147483647n);
        expect(mulWords(0x10000n, 0x10000n, 32)).toBe(0n);
        expect(mulWords(0x10000n, 0x10000n, 64)).toBe(0x100000000n);
        expect(negateWord(-2147483648n, 32)).toBe(-2147483648n);
        expect(negateWord(5n, 64)).toBe(-5n);
    });

    it('divides toward zero and rejects zero divisors', () => {
        expect(divWords(7n, 2n, 32)).toBe(3n);
        expect(divWords(-7n, 2n, 32)).toBe(-3n);
        expect(divWords(7n, -2n, 32)).toBe(-3n);
        expect(divWords(1n, 0n, 32)).toBeUndefined();
    });
});
