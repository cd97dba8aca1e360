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

import { performance } from 'node:perf_hooks';

export type MonitorPerfStats = {
    tokenizeMs: number;
    tokenizeCalls: number;
    evalMs: number;
    evalCalls: number;
    checkMs: number;
    checkCalls: number;
    checkTriggers: number;
};

type PerfMsKey = 'tokenizeMs' | 'evalMs' | 'checkMs';
type PerfCallsKey = 'tokenizeCalls' | 'evalCalls' | 'checkCalls';

const emptyStats = (): MonitorPerfStats => ({
    tokenizeMs: 0,
    tokenizeCalls: 0,
    evalMs: 0,
    evalCalls: 0,
    checkMs: 0,
    checkCalls: 0,
    checkTriggers: 0,
});

export class PerfStats {
    private enabled = false;
    private stats: MonitorPerfStats = emptyStats();

    public setEnabled(value: boolean): void {
        this.enabled = value;
    }

    public isEnabled(): boolean {
        return this.enabled;
    }

    public now(): number {
        return this.enabled ? performance.now() : 0;
    }

    public start(): number {
        return this.now();
    }

    public end(start: number, msKey: PerfMsKey, callsKey: PerfCallsKey): void {
        if (!this.enabled || start === 0) {
            return;
        }
        this.stats[msKey] += performance.now() - start;
        this.stats[callsKey] += 1;
    }

    public recordTriggers(count: number): void {
        if (this.enabled) {
            this.stats.checkTriggers += count;
        }
    }

    public hasData(): boolean {
        return this.stats.tokenizeCalls > 0 || this.stats.evalCalls > 0 || this.stats.checkCalls > 0;
    }

    public getStats(): MonitorPerfStats {
        return { ...this.stats };
    }

    public reset(): void {
        this.stats = emptyStats();
    }

    public formatSummary(): string {
        if (!this.hasData()) {
            return '';
        }
        const ms = (value: number) => Math.max(0, Math.floor(value));
        const s = this.stats;
        return `[monitor][perf] tokenizeMs=${ms(s.tokenizeMs)} tokenizeCalls=${s.tokenizeCalls} evalMs=${ms(s.evalMs)} evalCalls=${s.evalCalls} checkMs=${ms(s.checkMs)} checkCalls=${s.checkCalls} checkTriggers=${s.checkTriggers}`;
    }
}

export const perf = new PerfStats();
