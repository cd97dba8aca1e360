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

export * from './expression';
export * from './registers/register-file';
export * from './watchpoints/watchpoint-errors';
export * from './watchpoints/watchpoint-pool';
export * from './watchpoints/watchpoint-format';
export * from './config/file-reader';
export * from './config/monitor-config';
export * from './config/config-reader';
export { LOG_LEVELS, componentLogger, createLogger, isLogLevel, logger, setLogLevel } from './logger';
export type { ComponentLogger, LogLevel } from './logger';
export { PerfStats, perf } from './perf-stats';
export type { MonitorPerfStats } from './perf-stats';
export * from './monitor';
