import { describe, it, expect, beforeEach } from 'vitest';
import { healthHandler, type HealthOutput } from '../health.js';
import { renderFractalHandler, resetRenderStats } from '../render_fractal.js';

describe('health tool', () => {
    beforeEach(() => {
        resetRenderStats();
    });

    it('should return health status with all required fields', () => {
        const result = healthHandler(2);

        const expectedKeys: (keyof HealthOutput)[] = ['ok', 'version', 'uptimeSec', 'toolCount', 'renders'];
        expectedKeys.forEach((key) => {
            expect(result).toHaveProperty(key);
        });
        expect(result.ok).toBe(true);
        expect(typeof result.version).toBe('string');
        expect(result.version).not.toBe('');
        expect(result.uptimeSec).toBeGreaterThanOrEqual(0);
        expect(result.toolCount).toBe(2);
    });

    it('should report no renders after reset', () => {
        expect(healthHandler(2).renders).toEqual({ count: 0, lastDurationMs: null });
    });

    it('should reflect completed renders', async () => {
        await renderFractalHandler({ width: 1, height: 1, max_iter: 1 });

        const result = healthHandler(2);
        expect(result.renders.count).toBe(1);
        expect(result.renders.lastDurationMs).not.toBeNull();
    });
});
