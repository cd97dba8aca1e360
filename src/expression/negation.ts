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

import { TokenKind, isBinaryOperator, type Token } from './tokens';

function startsOperand(previous: Token | undefined): boolean {
    if (!previous) {
        return true;
    }
    return isBinaryOperator(previous.kind) || previous.kind === TokenKind.Negate || previous.kind === TokenKind.LParen;
}

/**
 * Reclassifies `Minus` as unary `Negate` where an operand is expected: at
 * the start, after an operator or after an opening parenthesis.
 * Mutates `tokens` in place and returns it.
 */
export function disambiguateNegation(tokens: Token[]): Token[] {
    tokens.forEach((token, index) => {
        if (token.kind === TokenKind.Minus && startsOperand(tokens[index - 1])) {
            token.kind = TokenKind.Negate;
        }
    });
    return tokens;
}
