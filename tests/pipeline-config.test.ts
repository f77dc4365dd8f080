import { configFromEnv, resolvePipelineConfig } from '../src/pipeline/config.js';
import { ConfigError } from '../src/errors.js';

describe('resolvePipelineConfig', () => {
    it('applies defaults', () => {
        const config = resolvePipelineConfig({ monitoredKeys: ['NrInSystem'] });
        expect(config).toEqual({
            monitoredKeys: ['NrInSystem'],
            refreshIntervalMs: 50,
            maxPoints: 1000,
            downsampleTarget: 500,
            rejectOutOfOrder: false,
            lockTimeoutMs: 5000
        });
        expect(Object.isFrozen(config)).toBe(true);
    });

    it('clamps the refresh interval into [10, 1000]', () => {
        expect(resolvePipelineConfig({ monitoredKeys: ['k'], refreshIntervalMs: 1 }).refreshIntervalMs).toBe(10);
        expect(resolvePipelineConfig({ monitoredKeys: ['k'], refreshIntervalMs: 5000 }).refreshIntervalMs).toBe(1000);
        expect(resolvePipelineConfig({ monitoredKeys: ['k'], refreshIntervalMs: 250 }).refreshIntervalMs).toBe(250);
    });

    it('trims, drops blanks and de-duplicates keys in order', () => {
        const config = resolvePipelineConfig({ monitoredKeys: [' b ', 'a', '', 'b', '  '] });
        expect(config.monitoredKeys).toEqual(['b', 'a']);
    });

    it('requires at least one key', () => {
        expect(() => resolvePipelineConfig({ monitoredKeys: ['  '] })).toThrow(ConfigError);
        expect(() => resolvePipelineConfig({ monitoredKeys: [] })).toThrow(
            'Invalid pipeline configuration: monitoredKeys: at least one monitored key is required'
        );
    });

    it('rejects non-integer capacities', () => {
        const attempt = () => resolvePipelineConfig({ monitoredKeys: ['k'], maxPoints: 0, downsampleTarget: 1.5 });
        expect(attempt).toThrow(ConfigError);

        let issues: string[] = [];
        try {
            attempt();
        } catch (err) {
            if (err instanceof ConfigError) issues = err.issues;
        }
        expect(issues.map((i) => i.split(':')[0])).toEqual(['maxPoints', 'downsampleTarget']);
    });
});

describe('configFromEnv', () => {
    it('reads STEPWISE_* variables', () => {
        const config = configFromEnv({
            STEPWISE_KEYS: 'Server1.InputBuffer.Contents, NrInSystem',
            STEPWISE_REFRESH_MS: '100',
            STEPWISE_MAX_POINTS: '200',
            STEPWISE_DOWNSAMPLE_TARGET: '50',
            STEPWISE_REJECT_OUT_OF_ORDER: 'true'
        });

        expect(config.monitoredKeys).toEqual(['Server1.InputBuffer.Contents', 'NrInSystem']);
        expect(config.refreshIntervalMs).toBe(100);
        expect(config.maxPoints).toBe(200);
        expect(config.downsampleTarget).toBe(50);
        expect(config.rejectOutOfOrder).toBe(true);
    });

    it('falls back to defaults for unset variables', () => {
        const config = configFromEnv({ STEPWISE_KEYS: 'k' });
        expect(config.refreshIntervalMs).toBe(50);
        expect(config.rejectOutOfOrder).toBe(false);
    });

    it('rejects a non-numeric setting', () => {
        expect(() => configFromEnv({ STEPWISE_KEYS: 'k', STEPWISE_MAX_POINTS: 'lots' })).toThrow(
            'STEPWISE_MAX_POINTS must be a number: STEPWISE_MAX_POINTS=lots'
        );
    });
});
