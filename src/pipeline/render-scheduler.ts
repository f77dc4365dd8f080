/**
 * Fixed-period cooperative tick.
 *
 * Ticks never overlap: the next timer is armed only after the current tick has
 * settled, and a stop request takes effect at that boundary. A failing tick is
 * logged and counted; the following tick still runs.
 */

import { describeError } from '../errors.js';
import { resolveLogger, type StepwiseLogger } from '../logger.js';

export type TickHandler<T> = (tick: number) => T | Promise<T>;

export interface RenderSchedulerConfig {
    intervalMs?: number;
    logger?: StepwiseLogger | null;
}

export class RenderScheduler<T = void> {
    public static readonly DEFAULT_INTERVAL_MS = 50;

    readonly intervalMs: number;
    private readonly logger: StepwiseLogger | null;
    private timer: NodeJS.Timeout | null = null;
    private active = false;
    private generation = 0;
    // Serializes scheduled and manual ticks. Never rejects.
    private chain: Promise<unknown> = Promise.resolve();
    private _tickCount = 0;
    private _failedTicks = 0;

    constructor(private readonly onTick: TickHandler<T>, config: RenderSchedulerConfig = {}) {
        this.intervalMs = Math.max(1, config.intervalMs ?? RenderScheduler.DEFAULT_INTERVAL_MS);
        this.logger = resolveLogger(config.logger);
    }

    start(): void {
        if (this.active) return;
        this.active = true;
        this.arm(++this.generation);
    }

    /**
     * Cancel future ticks and wait for the in-flight one, if any.
     */
    async stop(): Promise<void> {
        this.active = false;
        if (this.timer) {
            clearTimeout(this.timer);
            this.timer = null;
        }
        await this.chain;
    }

    /**
     * Run one tick now, after any tick already in progress.
     * Resolves with the handler's result, or undefined when the handler failed.
     */
    tickNow(): Promise<T | undefined> {
        const run = this.chain.then(() => this.execute());
        this.chain = run;
        return run;
    }

    get running(): boolean {
        return this.active;
    }

    get tickCount(): number {
        return this._tickCount;
    }

    get failedTicks(): number {
        return this._failedTicks;
    }

    private arm(generation: number): void {
        this.timer = setTimeout(() => {
            this.timer = null;
            void this.tickNow().then(() => {
                // A stop/start pair while this tick ran has armed its own timer.
                if (this.active && generation === this.generation) this.arm(generation);
            });
        }, this.intervalMs);
    }

    private async execute(): Promise<T | undefined> {
        const tick = ++this._tickCount;
        try {
            return await this.onTick(tick);
        } catch (err) {
            this._failedTicks++;
            this.logger?.error?.(`Render tick ${tick} failed: ${describeError(err)}`);
            return undefined;
        }
    }
}
