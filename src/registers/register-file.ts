/**
 * Copyright 2025 Arm Limited
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

import { expressionLogger } from '../logger';
import { DEFAULT_WORD_BITS, maskToBits, type WordBits } from '../expression/word-math';

/** Register lookup consumed by the evaluator. `undefined` means no such register. */
export interface RegisterResolver {
    read(name: string): bigint | undefined;
}

function normalize(name: string): string {
    return name.trim().toUpperCase();
}

interface RegisterEntry {
    value: bigint;
    isValid: boolean;
}

/**
 * In-process register file. Names are case insensitive; only declared
 * registers can be read or written. Values are stored as unsigned words.
 */
export class RegisterFile implements RegisterResolver {
    private registers = new Map<string, RegisterEntry>();

    constructor(names: readonly string[] = [], private readonly bits: WordBits = DEFAULT_WORD_BITS) {
        names.forEach(name => this.define(name));
    }

    public define(name: string, value: bigint = 0n): void {
        this.registers.set(normalize(name), { value: maskToBits(value, this.bits), isValid: true });
    }

    public has(name: string): boolean {
        return this.registers.has(normalize(name));
    }

    public names(): string[] {
        return Array.from(this.registers.keys());
    }

    // -------- Public API --------
    public read(name: string): bigint | undefined {
        if (!name) {
            expressionLogger.error('RegisterFile: read: empty register name');
            return undefined;
        }
        const entry = this.registers.get(normalize(name));
        if (!entry) {
            return undefined;
        }
        return entry.isValid ? entry.value : undefined;
    }

    public write(name: string, value: bigint): bigint | undefined {
        if (!name) {
            expressionLogger.error('RegisterFile: write: empty register name');
            return undefined;
        }
        const entry = this.registers.get(normalize(name));
        if (!entry) {
            return undefined;
        }
        entry.value = maskToBits(value, this.bits);
        entry.isValid = true;
        return entry.value;
    }

    public invalidate(name: string): void {
        const entry = this.registers.get(normalize(name));
        if (entry) {
            entry.isValid = false;
        }
    }

    public clear(): void {
        this.registers.clear();
    }
}
