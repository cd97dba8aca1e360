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

import { expressionLogger, type ComponentLogger } from '../logger';
import { perf as sharedPerf, type PerfStats } from '../perf-stats';
import type { RegisterResolver } from '../registers/register-file';
import {
    DivisionByZeroError,
    MalformedExpressionError,
    UnknownRegisterError,
    evalFail,
    evalOk,
    type EvalResult,
} from './expression-errors';
import { tokenize } from './lexer';
import { disambiguateNegation } from './negation';
import { TokenKind, formatTokens, type Token } from './tokens';
import {
    DEFAULT_WORD_BITS,
    addWords,
    divWords,
    mulWords,
    negateWord,
    normalizeSigned,
    parseDecimalLiteral,
    parseHexLiteral,
    subWords,
    type WordBits,
} from './word-math';

/* =============================================================================
 * Operator selection
 * ============================================================================= */

// higher binds looser; the major operator has the highest class
const OPERATOR_CLASS: Partial<Record<TokenKind, number>> = {
    [TokenKind.Negate]: 0,
    [TokenKind.Star]: 1,
    [TokenKind.Slash]: 1,
    [TokenKind.Plus]: 2,
    [TokenKind.Minus]: 2,
};

/**
 * True when `tokens[p..q]` is wrapped in one pair of parentheses. `(1)+(2)`
 * is not: the depth returns to zero before the last token.
 */
export function checkParentheses(tokens: readonly Token[], p: number, q: number): boolean {
    if (tokens[p]?.kind !== TokenKind.LParen || tokens[q]?.kind !== TokenKind.RParen) {
        return false;
    }
    let depth = 0;
    for (let i = p; i <= q; i++) {
        const kind = tokens[i]?.kind;
        if (kind === TokenKind.LParen) {
            depth++;
        } else if (kind === TokenKind.RParen) {
            depth--;
        }
        if (depth === 0 && i < q) {
            return false;
        }
    }
    return depth === 0;
}

/**
 * Index of the operator that splits `tokens[p..q]`: the rightmost top level
 * operator of the loosest class, which makes `+ - * /` left associative.
 * A unary negation is only chosen while no other operator has been seen.
 * Returns -1 for unbalanced parentheses or when there is no operator.
 */
export function findMajorOperator(tokens: readonly Token[], p: number, q: number): number {
    let major = -1;
    let majorClass = -1;
    let depth = 0;
    for (let i = p; i <= q; i++) {
        const kind = tokens[i]?.kind;
        if (kind === undefined) {
            return -1;
        }
        if (kind === TokenKind.LParen) {
            depth++;
            continue;
        }
        if (kind === TokenKind.RParen) {
            if (depth === 0) {
                return -1;
            }
            depth--;
            continue;
        }
        if (depth > 0) {
            continue;
        }
        const cls = OPERATOR_CLASS[kind];
        if (cls === undefined) {
            continue;
        }
        if (kind === TokenKind.Negate) {
            if (major < 0) {
                major = i;
                majorClass = cls;
            }
            continue;
        }
        if (cls >= majorClass) {
            major = i;
            majorClass = cls;
        }
    }
    return depth === 0 ? major : -1;
}

/* =============================================================================
 * Evaluator
 * ============================================================================= */

export interface EvaluatorOptions {
    registers: RegisterResolver;
    wordBits?: WordBits;
    log?: ComponentLogger;
    perf?: PerfStats;
}

export class Evaluator {
    private readonly registers: RegisterResolver;
    private readonly wordBits: WordBits;
    private readonly log: ComponentLogger;
    private readonly perf: PerfStats;

    constructor(options: EvaluatorOptions) {
        this.registers = options.registers;
        this.wordBits = options.wordBits ?? DEFAULT_WORD_BITS;
        this.log = options.log ?? expressionLogger;
        this.perf = options.perf ?? sharedPerf;
    }

    public get bits(): WordBits {
        return this.wordBits;
    }

    /** Tokenizes and evaluates `text`. Failures are returned, never thrown. */
    public evaluateExpression(text: string): EvalResult {
        const tokenizeStart = this.perf.start();
        const lexed = tokenize(text);
        this.perf.end(tokenizeStart, 'tokenizeMs', 'tokenizeCalls');
        if (!lexed.ok) {
            this.log.debug(lexed.error.describe());
            return evalFail(lexed.error);
        }
        const tokens = disambiguateNegation(lexed.tokens);
        this.log.debug(`tokens (${tokens.length}): ${formatTokens(tokens)}`);
        if (tokens.length === 0) {
            return evalFail(new MalformedExpressionError('empty expression'));
        }

        const evalStart = this.perf.start();
        const result = this.evaluate(tokens, 0, tokens.length - 1);
        this.perf.end(evalStart, 'evalMs', 'evalCalls');
        if (!result.ok) {
            this.log.debug(`'${text}': ${result.error.message}`);
        }
        return result;
    }

    /** Evaluates the inclusive token range `[p, q]`. */
    public evaluate(tokens: readonly Token[], p: number, q: number): EvalResult {
        if (p > q) {
            return evalFail(new MalformedExpressionError(`missing operand at token ${p}`));
        }
        if (p === q) {
            return this.evaluateOperand(tokens[p]);
        }
        if (checkParentheses(tokens, p, q)) {
            return this.evaluate(tokens, p + 1, q - 1);
        }

        const major = findMajorOperator(tokens, p, q);
        const operator = tokens[major];
        if (major < 0 || !operator) {
            return evalFail(new MalformedExpressionError(`no operator in '${formatTokens(tokens, p, q + 1)}'`));
        }

        if (operator.kind === TokenKind.Negate) {
            if (major !== p) {
                return evalFail(new MalformedExpressionError(`missing operator before '${formatTokens(tokens, major, q + 1)}'`));
            }
            const operand = this.evaluate(tokens, major + 1, q);
            return operand.ok ? evalOk(negateWord(operand.value, this.wordBits)) : operand;
        }

        const left = this.evaluate(tokens, p, major - 1);
        if (!left.ok) {
            return left;
        }
        const right = this.evaluate(tokens, major + 1, q);
        if (!right.ok) {
            return right;
        }
        return this.applyBinary(operator.kind, left.value, right.value);
    }

    private evaluateOperand(token: Token | undefined): EvalResult {
        if (!token) {
            return evalFail(new MalformedExpressionError('missing operand'));
        }
        switch (token.kind) {
            case TokenKind.Number:
            case TokenKind.Hex: {
                const value = token.kind === TokenKind.Number
                    ? parseDecimalLiteral(token.text, this.wordBits)
                    : parseHexLiteral(token.text, this.wordBits);
                return value !== undefined ? evalOk(value) : evalFail(new MalformedExpressionError(`bad literal '${token.text}'`));
            }
            case TokenKind.Register: {
                // resolvers may hand back unsigned words
                const value = this.registers.read(token.text);
                return value !== undefined
                    ? evalOk(normalizeSigned(value, this.wordBits))
                    : evalFail(new UnknownRegisterError(token.text));
            }
            default:
                return evalFail(new MalformedExpressionError(`unexpected '${formatTokens([token])}'`));
        }
    }

    private applyBinary(kind: TokenKind, a: bigint, b: bigint): EvalResult {
        switch (kind) {
            case TokenKind.Plus:
                return evalOk(addWords(a, b, this.wordBits));
            case TokenKind.Minus:
                return evalOk(subWords(a, b, this.wordBits));
            case TokenKind.Star:
                return evalOk(mulWords(a, b, this.wordBits));
            case TokenKind.Slash: {
                const quotient = divWords(a, b, this.wordBits);
                return quotient !== undefined ? evalOk(quotient) : evalFail(new DivisionByZeroError());
            }
            default:
                return evalFail(new MalformedExpressionError(`'${kind}' is not a binary operator`));
        }
    }
}
