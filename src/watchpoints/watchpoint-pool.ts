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

import type { EvalResult, ExpressionError } from '../expression/expression-errors';
import { watchpointLogger, type ComponentLogger } from '../logger';
import { perf as sharedPerf, type PerfStats } from '../perf-stats';
import { ExpressionTooLongError, PoolExhaustedError, WatchpointNotFoundError } from './watchpoint-errors';

export const DEFAULT_WATCHPOINT_CAPACITY = 32;
export const DEFAULT_EXPRESSION_MAX_LENGTH = 32;

/** Anything that turns expression text into a value, normally the `Evaluator`. */
export interface ExpressionSource {
    evaluateExpression(text: string): EvalResult;
}

export interface WatchpointInfo {
    id: number;
    expression: string;
    // undefined until the expression evaluated successfully once
    lastValue: bigint | undefined;
}

export interface WatchpointTrigger {
    id: number;
    expression: string;
    oldValue: bigint | undefined;
    newValue: bigint;
}

export interface WatchpointFailure {
    id: number;
    expression: string;
    error: ExpressionError;
}

export interface CheckResult {
    haltRequested: boolean;
    triggers: WatchpointTrigger[];
    failures: WatchpointFailure[];
}

export type AddWatchpointResult =
    | { ok: true; id: number; seed: EvalResult }
    | { ok: false; error: PoolExhaustedError | ExpressionTooLongError };

export type RemoveWatchpointResult =
    | { ok: true; id: number }
    | { ok: false; error: WatchpointNotFoundError };

export interface WatchpointPoolOptions {
    evaluator: ExpressionSource;
    capacity?: number;
    /** Longest accepted expression, in UTF-8 bytes. */
    expressionMaxLength?: number;
    log?: ComponentLogger;
    perf?: PerfStats;
}

interface WatchpointSlot {
    readonly id: number;
    active: boolean;
    expression: string;
    lastValue: bigint | undefined;
    // next slot in the active list
    next: number | undefined;
}

function checkPositiveInteger(name: string, value: number): number {
    if (!Number.isInteger(value) || value <= 0) {
        throw new RangeError(`${name} must be a positive integer, got ${value}`);
    }
    return value;
}

/**
 * Fixed pool of watchpoints. A slot's index is the watchpoint id. Active
 * slots are chained through `next` starting at `head`, newest first.
 */
export class WatchpointPool {
    private readonly slots: WatchpointSlot[];
    private readonly evaluator: ExpressionSource;
    private readonly maxLength: number;
    private readonly log: ComponentLogger;
    private readonly perf: PerfStats;
    private head: number | undefined;
    private activeCount = 0;

    constructor(options: WatchpointPoolOptions) {
        const capacity = checkPositiveInteger('capacity', options.capacity ?? DEFAULT_WATCHPOINT_CAPACITY);
        this.maxLength = checkPositiveInteger('expressionMaxLength', options.expressionMaxLength ?? DEFAULT_EXPRESSION_MAX_LENGTH);
        this.evaluator = options.evaluator;
        this.log = options.log ?? watchpointLogger;
        this.perf = options.perf ?? sharedPerf;
        this.slots = Array.from({ length: capacity }, (_, id) => ({
            id,
            active: false,
            expression: '',
            lastValue: undefined,
            next: undefined,
        }));
    }

    public get capacity(): number {
        return this.slots.length;
    }

    public get expressionMaxLength(): number {
        return this.maxLength;
    }

    public get size(): number {
        return this.activeCount;
    }

    /**
     * Allocates the lowest free slot and seeds it with the current value of
     * `expression`. A failed seed still creates the watchpoint, with an
     * unknown value.
     */
    public add(expression: string): AddWatchpointResult {
        const byteLength = Buffer.byteLength(expression, 'utf8');
        if (byteLength > this.maxLength) {
            return { ok: false, error: new ExpressionTooLongError(byteLength, this.maxLength) };
        }
        const slot = this.slots.find(s => !s.active);
        if (!slot) {
            this.log.debug(`pool exhausted (${this.capacity} slots)`);
            return { ok: false, error: new PoolExhaustedError(this.capacity) };
        }

        const seed = this.evaluator.evaluateExpression(expression);
        slot.active = true;
        slot.expression = expression;
        slot.lastValue = seed.ok ? seed.value : undefined;
        slot.next = this.head;
        this.head = slot.id;
        this.activeCount++;

        this.log.debug(`allocated slot ${slot.id} for '${expression}'`);
        return { ok: true, id: slot.id, seed };
    }

    public remove(id: number): RemoveWatchpointResult {
        const slot = this.activeSlot(id);
        if (!slot) {
            return { ok: false, error: new WatchpointNotFoundError(id) };
        }

        if (this.head === id) {
            this.head = slot.next;
        } else {
            let prev = this.head !== undefined ? this.slots[this.head] : undefined;
            while (prev && prev.next !== id) {
                prev = prev.next !== undefined ? this.slots[prev.next] : undefined;
            }
            if (prev) {
                prev.next = slot.next;
            }
        }

        slot.active = false;
        slot.expression = '';
        slot.lastValue = undefined;
        slot.next = undefined;
        this.activeCount--;

        this.log.debug(`released slot ${id}`);
        return { ok: true, id };
    }

    public clear(): void {
        for (const slot of this.slots) {
            slot.active = false;
            slot.expression = '';
            slot.lastValue = undefined;
            slot.next = undefined;
        }
        this.head = undefined;
        this.activeCount = 0;
    }

    public get(id: number): WatchpointInfo | undefined {
        const slot = this.activeSlot(id);
        return slot ? this.toInfo(slot) : undefined;
    }

    /** Active watchpoints, most recently created first. */
    public list(): WatchpointInfo[] {
        const out: WatchpointInfo[] = [];
        let cursor = this.head;
        while (cursor !== undefined) {
            const slot = this.slots[cursor];
            if (!slot) {
                break;
            }
            out.push(this.toInfo(slot));
            cursor = slot.next;
        }
        return out;
    }

    /**
     * Re-evaluates every active watchpoint in slot order. A failing
     * expression is reported and skipped; every changed value is stored and
     * reported, and any change requests a halt.
     */
    public checkAll(): CheckResult {
        const checkStart = this.perf.start();
        const triggers: WatchpointTrigger[] = [];
        const failures: WatchpointFailure[] = [];

        for (const slot of this.slots) {
            if (!slot.active) {
                continue;
            }
            const result = this.evaluator.evaluateExpression(slot.expression);
            if (!result.ok) {
                failures.push({ id: slot.id, expression: slot.expression, error: result.error });
                continue;
            }
            if (result.value !== slot.lastValue) {
                triggers.push({ id: slot.id, expression: slot.expression, oldValue: slot.lastValue, newValue: result.value });
                slot.lastValue = result.value;
            }
        }

        this.perf.end(checkStart, 'checkMs', 'checkCalls');
        this.perf.recordTriggers(triggers.length);
        return { haltRequested: triggers.length > 0, triggers, failures };
    }

    private activeSlot(id: number): WatchpointSlot | undefined {
        if (!Number.isInteger(id) || id < 0 || id >= this.slots.length) {
            return undefined;
        }
        const slot = this.slots[id];
        return slot?.active ? slot : undefined;
    }

    private toInfo(slot: WatchpointSlot): WatchpointInfo {
        return { id: slot.id, expression: slot.expression, lastValue: slot.lastValue };
    }
}
