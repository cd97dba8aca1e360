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

/**
 * Machine word arithmetic used by the evaluator. Values are bigint and kept
 * in two's complement signed form at the configured word width.
 */

export type WordBits = 32 | 64;

export const DEFAULT_WORD_BITS: WordBits = 32;

export function isWordBits(value: unknown): value is WordBits {
    return value === 32 || value === 64;
}

export function maskToBits(value: bigint, bits: number): bigint {
    if (bits <= 0) {
        return value;
    }
    const mask = (1n << BigInt(bits)) - 1n;
    return value & mask;
}

export function normalizeSigned(value: bigint, bits: number): bigint {
    const masked = maskToBits(value, bits);
    const signBit = 1n << BigInt(bits - 1);
    return (masked & signBit) !== 0n ? masked - (1n << BigInt(bits)) : masked;
}

/** Unsigned view of a word, as the target stores it. */
export function toUnsigned(value: bigint, bits: WordBits): bigint {
    return maskToBits(value, bits);
}

export function parseDecimalLiteral(text: string, bits: WordBits): bigint | undefined {
    if (!/^[0-9]+$/.test(text)) {
        return undefined;
    }
    return normalizeSigned(BigInt(text), bits);
}

export function parseHexLiteral(text: string, bits: WordBits): bigint | undefined {
    if (!/^0[xX][0-9a-fA-F]+$/.test(text)) {
        return undefined;
    }
    return normalizeSigned(BigInt(`0x${text.slice(2)}`), bits);
}

export function addWords(a: bigint, b: bigint, bits: WordBits): bigint {
    return normalizeSigned(a + b, bits);
}

export function subWords(a: bigint, b: bigint, bits: WordBits): bigint {
    return normalizeSigned(a - b, bits);
}

export function mulWords(a: bigint, b: bigint, bits: WordBits): bigint {
    return normalizeSigned(a * b, bits);
}

/** Signed division truncating toward zero; undefined for a zero divisor. */
export function divWords(a: bigint, b: bigint, bits: WordBits): bigint | undefined {
    if (b === 0n) {
        return undefined;
    }
    return normalizeSigned(a / b, bits);
}

export function negateWord(value: bigint, bits: WordBits): bigint {
    return normalizeSigned(-value, bits);
}
