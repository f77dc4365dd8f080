import { z } from 'zod';
import { ConfigError } from '../errors.js';
import { clamp } from '../stepwise-utils.js';
import { DEFAULT_DOWNSAMPLE_TARGET } from '../series/downsample.js';
import { SeriesStore } from '../series/series-store.js';

export const MIN_REFRESH_INTERVAL_MS = 10;
export const MAX_REFRESH_INTERVAL_MS = 1000;
export const DEFAULT_REFRESH_INTERVAL_MS = 50;
export const DEFAULT_LOCK_TIMEOUT_MS = 5000;

const pipelineConfigSchema = z.object({
    monitoredKeys: z
        .array(z.string())
        .transform((keys) => Array.from(new Set(keys.map((k) => k.trim()).filter((k) => k.length > 0))))
        .refine((keys) => keys.length > 0, 'at least one monitored key is required'),
    refreshIntervalMs: z
        .number()
        .finite()
        .default(DEFAULT_REFRESH_INTERVAL_MS)
        .transform((ms) => Math.round(clamp(ms, MIN_REFRESH_INTERVAL_MS, MAX_REFRESH_INTERVAL_MS))),
    maxPoints: z.number().int().positive().default(SeriesStore.DEFAULT_MAX_POINTS),
    downsampleTarget: z.number().int().positive().default(DEFAULT_DOWNSAMPLE_TARGET),
    /** Skip events older than the key's newest point instead of trusting producer order. */
    rejectOutOfOrder: z.boolean().default(false),
    lockTimeoutMs: z.number().int().positive().default(DEFAULT_LOCK_TIMEOUT_MS)
});

export type PipelineConfigInput = z.input<typeof pipelineConfigSchema>;
export type PipelineConfig = Readonly<z.output<typeof pipelineConfigSchema>>;

/**
 * Validate and normalize pipeline settings. The result is frozen.
 */
export function resolvePipelineConfig(input: PipelineConfigInput): PipelineConfig {
    const parsed = pipelineConfigSchema.safeParse(input);
    if (!parsed.success) {
        throw new ConfigError(
            'Invalid pipeline configuration',
            parsed.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
        );
    }
    Object.freeze(parsed.data.monitoredKeys);
    return Object.freeze(parsed.data);
}

function numberFromEnv(env: NodeJS.ProcessEnv, name: string): number | undefined {
    const raw = env[name];
    if (raw === undefined || raw.trim() === '') return undefined;
    const value = Number(raw);
    if (!Number.isFinite(value)) {
        throw new ConfigError(`${name} must be a number`, [`${name}=${raw}`]);
    }
    return value;
}

/**
 * Read settings from STEPWISE_* environment variables.
 * STEPWISE_KEYS is a comma-separated key list.
 */
export function configFromEnv(env: NodeJS.ProcessEnv = process.env): PipelineConfig {
    const rejectRaw = env.STEPWISE_REJECT_OUT_OF_ORDER?.trim().toLowerCase();
    return resolvePipelineConfig({
        monitoredKeys: (env.STEPWISE_KEYS ?? '').split(','),
        refreshIntervalMs: numberFromEnv(env, 'STEPWISE_REFRESH_MS'),
        maxPoints: numberFromEnv(env, 'STEPWISE_MAX_POINTS'),
        downsampleTarget: numberFromEnv(env, 'STEPWISE_DOWNSAMPLE_TARGET'),
        rejectOutOfOrder: rejectRaw === undefined ? undefined : rejectRaw === 'true' || rejectRaw === '1'
    });
}
