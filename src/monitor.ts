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

import type { Logger } from 'winston';
import { ConfigReader } from './config/config-reader';
import type { FileReader } from './config/file-reader';
import { MonitorConfig, resolveMonitorConfig } from './config/monitor-config';
import { Evaluator } from './expression/evaluator';
import type { EvalResult } from './expression/expression-errors';
import { componentLogger, createLogger, logger as sharedLogger, type ComponentLogger } from './logger';
import { PerfStats } from './perf-stats';
import type { RegisterResolver } from './registers/register-file';
import { formatTrigger, formatValue, formatWatchpointList } from './watchpoints/watchpoint-format';
import {
    AddWatchpointResult,
    CheckResult,
    RemoveWatchpointResult,
    WatchpointInfo,
    WatchpointPool,
} from './watchpoints/watchpoint-pool';

export interface ExpressionMonitorOptions {
    registers: RegisterResolver;
    config?: Partial<MonitorConfig>;
}

/**
 * Entry point for the command dispatcher and the stepping loop. Owns one
 * evaluator and one watchpoint pool bound to the given register file, and
 * its own logger and perf counters, so monitors do not share settings.
 */
export class ExpressionMonitor {
    public readonly logger: Logger;
    public readonly perf: PerfStats;
    private readonly config: MonitorConfig;
    private readonly log: ComponentLogger;
    private readonly evaluator: Evaluator;
    private readonly pool: WatchpointPool;

    constructor(options: ExpressionMonitorOptions) {
        this.config = resolveMonitorConfig(options.config);
        this.logger = createLogger(this.config.logLevel);
        this.log = componentLogger('Monitor', this.logger);
        this.perf = new PerfStats();
        this.perf.setEnabled(this.config.perfStats);
        this.evaluator = new Evaluator({
            registers: options.registers,
            wordBits: this.config.wordBits,
            log: componentLogger('Expression', this.logger),
            perf: this.perf,
        });
        this.pool = new WatchpointPool({
            evaluator: this.evaluator,
            capacity: this.config.watchpointCapacity,
            expressionMaxLength: this.config.expressionMaxLength,
            log: componentLogger('Watchpoint', this.logger),
            perf: this.perf,
        });
    }

    public static async fromConfigFile(
        registers: RegisterResolver,
        filePath: string,
        reader?: FileReader
    ): Promise<ExpressionMonitor> {
        const config = await new ConfigReader(reader).parse(filePath);
        sharedLogger.debug(`[Monitor] loaded configuration from ${filePath}`);
        return new ExpressionMonitor({ registers, config });
    }

    public get settings(): Readonly<MonitorConfig> {
        return this.config;
    }

    public evaluateExpression(text: string): EvalResult {
        const result = this.evaluator.evaluateExpression(text);
        if (result.ok) {
            this.log.debug(`${text} = ${formatValue(result.value, this.config.wordBits)}`);
        } else {
            this.log.warn(`cannot evaluate '${text}': ${result.error.message}`);
        }
        return result;
    }

    public addWatchpoint(text: string): AddWatchpointResult {
        const result = this.pool.add(text);
        if (!result.ok) {
            this.log.warn(`cannot watch '${text}': ${result.error.message}`);
            return result;
        }
        this.log.info(`Watchpoint ${result.id}: ${text}`);
        if (!result.seed.ok) {
            this.log.warn(`Watchpoint ${result.id}: initial value unknown: ${result.seed.error.message}`);
        }
        return result;
    }

    public deleteWatchpoint(id: number): RemoveWatchpointResult {
        const result = this.pool.remove(id);
        if (result.ok) {
            this.log.info(`Deleted watchpoint ${id}`);
        } else {
            this.log.warn(result.error.message);
        }
        return result;
    }

    public listWatchpoints(): WatchpointInfo[] {
        return this.pool.list();
    }

    /** Called once per executed instruction. */
    public checkWatchpoints(): CheckResult {
        const result = this.pool.checkAll();
        for (const trigger of result.triggers) {
            this.log.info(formatTrigger(trigger, this.config.wordBits));
        }
        for (const failure of result.failures) {
            this.log.warn(`Watchpoint ${failure.id}: cannot evaluate '${failure.expression}': ${failure.error.message}`);
        }
        return result;
    }

    public describeWatchpoints(): string {
        return formatWatchpointList(this.pool.list(), this.config.wordBits);
    }

    public describeTriggers(result: CheckResult): string {
        return result.triggers.map(trigger => formatTrigger(trigger, this.config.wordBits)).join('\n');
    }

    public perfSummary(): string {
        return this.perf.formatSummary();
    }
}
