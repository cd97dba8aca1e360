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

export class LexError extends Error {
    public readonly kind = 'lex';

    constructor(public readonly expression: string, public readonly position: number) {
        super(`no match at position ${position}`);
        this.name = 'LexError';
    }

    /** Message, expression and a caret under the offending character. */
    public describe(): string {
        return `${this.message}\n${this.expression}\n${' '.repeat(this.position)}^`;
    }
}

export class MalformedExpressionError extends Error {
    public readonly kind = 'malformed';

    constructor(public readonly detail: string) {
        super(`Malformed expression: ${detail}`);
        this.name = 'MalformedExpressionError';
    }
}

export class DivisionByZeroError extends Error {
    public readonly kind = 'division-by-zero';

    constructor() {
        super('Division by zero');
        this.name = 'DivisionByZeroError';
    }
}

export class UnknownRegisterError extends Error {
    public readonly kind = 'unknown-register';

    constructor(public readonly registerName: string) {
        super(`Unknown register '$${registerName}'`);
        this.name = 'UnknownRegisterError';
    }
}

export type ExpressionError = LexError | MalformedExpressionError | DivisionByZeroError | UnknownRegisterError;

export type EvalResult =
    | { ok: true; value: bigint }
    | { ok: false; error: ExpressionError };

export const evalOk = (value: bigint): EvalResult => ({ ok: true, value });
export const evalFail = (error: ExpressionError): EvalResult => ({ ok: false, error });
