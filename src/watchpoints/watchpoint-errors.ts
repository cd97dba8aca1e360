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

export class PoolExhaustedError extends Error {
    public readonly kind = 'pool-exhausted';

    constructor(public readonly capacity: number) {
        super(`No free watchpoint: all ${capacity} slots are in use`);
        this.name = 'PoolExhaustedError';
    }
}

export class WatchpointNotFoundError extends Error {
    public readonly kind = 'not-found';

    constructor(public readonly id: number) {
        super(`No watchpoint number ${id}`);
        this.name = 'WatchpointNotFoundError';
    }
}

export class ExpressionTooLongError extends Error {
    public readonly kind = 'too-long';

    constructor(public readonly length: number, public readonly maxLength: number) {
        super(`Expression is ${length} bytes long, the limit is ${maxLength}`);
        this.name = 'ExpressionTooLongError';
    }
}

export type WatchpointError = PoolExhaustedError | WatchpointNotFoundError | ExpressionTooLongError;
