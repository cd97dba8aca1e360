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

export enum TokenKind {
    Number = 'Number',
    Hex = 'Hex',
    Register = 'Register',
    Negate = 'Negate',
    Plus = 'Plus',
    Minus = 'Minus',
    Star = 'Star',
    Slash = 'Slash',
    LParen = 'LParen',
    RParen = 'RParen',
}

export interface Token {
    kind: TokenKind;
    // register tokens carry the name without the '$' sigil
    text: string;
    position: number;
}

export interface LexRule {
    pattern: RegExp;
    // undefined: match is skipped
    kind: TokenKind | undefined;
    // capture group holding the token text, whole match when absent
    group?: number;
}

/**
 * Lexer rules, tried in order at the scan position. The first rule that
 * matches wins, so hex literals must come before decimal digits.
 * Patterns are sticky and only match at `lastIndex`.
 */
export const LEX_RULES: readonly LexRule[] = [
    { pattern: /[ \t]+/y,                     kind: undefined },
    { pattern: /0[xX][0-9a-fA-F]+/y,          kind: TokenKind.Hex },
    { pattern: /[0-9]+/y,                     kind: TokenKind.Number },
    { pattern: /\+/y,                         kind: TokenKind.Plus },
    { pattern: /-/y,                          kind: TokenKind.Minus },
    { pattern: /\*/y,                         kind: TokenKind.Star },
    { pattern: /\//y,                         kind: TokenKind.Slash },
    { pattern: /\(/y,                         kind: TokenKind.LParen },
    { pattern: /\)/y,                         kind: TokenKind.RParen },
    { pattern: /\$([a-zA-Z][0-9a-zA-Z]*)/y,   kind: TokenKind.Register, group: 1 },
];

const OPERATOR_TEXT: Partial<Record<TokenKind, string>> = {
    [TokenKind.Negate]: 'neg',
    [TokenKind.Plus]: '+',
    [TokenKind.Minus]: '-',
    [TokenKind.Star]: '*',
    [TokenKind.Slash]: '/',
    [TokenKind.LParen]: '(',
    [TokenKind.RParen]: ')',
};

export function isBinaryOperator(kind: TokenKind): boolean {
    return kind === TokenKind.Plus || kind === TokenKind.Minus || kind === TokenKind.Star || kind === TokenKind.Slash;
}

export function isOperand(kind: TokenKind): boolean {
    return kind === TokenKind.Number || kind === TokenKind.Hex || kind === TokenKind.Register;
}

export function formatToken(token: Token): string {
    if (token.kind === TokenKind.Register) {
        return `$${token.text}`;
    }
    return OPERATOR_TEXT[token.kind] ?? token.text;
}

/** Space separated rendering of `tokens[start..end)`, used for debug output. */
export function formatTokens(tokens: readonly Token[], start = 0, end = tokens.length): string {
    return tokens.slice(start, end).map(formatToken).join(' ');
}
