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

import { LexError } from './expression-errors';
import { LEX_RULES, type LexRule, type Token } from './tokens';

export type LexResult =
    | { ok: true; tokens: Token[] }
    | { ok: false; error: LexError };

function matchAt(rule: LexRule, expression: string, position: number): RegExpExecArray | null {
    rule.pattern.lastIndex = position;
    const match = rule.pattern.exec(expression);
    // zero-length matches would never advance the cursor
    if (!match || match[0].length === 0) {
        return null;
    }
    return match;
}

/**
 * Splits `expression` into tokens. Rules are tried in declaration order at
 * every position; whitespace is consumed without producing a token.
 * Returns a fresh array on every call.
 */
export function tokenize(expression: string): LexResult {
    const tokens: Token[] = [];
    let position = 0;

    while (position < expression.length) {
        let matched = false;
        for (const rule of LEX_RULES) {
            const match = matchAt(rule, expression, position);
            if (!match) {
                continue;
            }
            if (rule.kind !== undefined) {
                const text = rule.group !== undefined ? match[rule.group] : match[0];
                tokens.push({ kind: rule.kind, text: text ?? match[0], position });
            }
            position += match[0].length;
            matched = true;
            break;
        }
        if (!matched) {
            return { ok: false, error: new LexError(expression, position) };
        }
    }

    return { ok: true, tokens };
}
