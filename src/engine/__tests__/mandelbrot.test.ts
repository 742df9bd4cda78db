import { describe, it, expect } from 'vitest';
import { complex } from '../../lib/complex.js';
import { escapeTime, generateImage, mapScreenToComplex, pixelAt } from '../mandelbrot.js';

describe('Mandelbrot engine', () => {
    describe('mapScreenToComplex', () => {
        it('should map the origin pixel to (-1.5, -1.5)', () => {
            expect(mapScreenToComplex(0, 0, 1000, 1000)).toEqual({ re: -1.5, im: -1.5 });
        });

        it('should map the centre pixel to 0', () => {
            expect(mapScreenToComplex(500, 250, 1000, 500)).toEqual({ re: 0, im: 0 });
        });

        it('should approach (1.5, 1.5) at the last pixel', () => {
            const point = mapScreenToComplex(999, 999, 1000, 1000);
            expect(point.re).toBeCloseTo(1.497, 10);
            expect(point.im).toBeCloseTo(1.497, 10);
        });

        it('should keep every pixel inside [-1.5, 1.5]', () => {
            const width = 7;
            const height = 5;
            for (let y = 0; y < height; y++) {
                for (let x = 0; x < width; x++) {
                    const { re, im } = mapScreenToComplex(x, y, width, height);
                    expect(re).toBeGreaterThanOrEqual(-1.5);
                    expect(re).toBeLessThanOrEqual(1.5);
                    expect(im).toBeGreaterThanOrEqual(-1.5);
                    expect(im).toBeLessThanOrEqual(1.5);
                }
            }
        });

        it('should reject zero dimensions', () => {
            expect(() => mapScreenToComplex(0, 0, 0, 10)).toThrow('ERROR-FR-01');
            expect(() => mapScreenToComplex(0, 0, 10, 0)).toThrow('ERROR-FR-01');
        });
    });

    describe('escapeTime', () => {
        it('should classify the origin as bounded', () => {
            expect(escapeTime(complex(0, 0), 1)).toEqual({ kind: 'bounded' });
            expect(escapeTime(complex(0, 0), 1000)).toEqual({ kind: 'bounded' });
        });

        it('should classify the period-2 point -1 as bounded', () => {
            expect(escapeTime(complex(-1, 0), 500)).toEqual({ kind: 'bounded' });
        });

        it('should escape 2+2i at iteration 0', () => {
            const result = escapeTime(complex(2, 2), 10);
            expect(result.kind).toBe('escaped');
            if (result.kind !== 'escaped') return;

            // z1 = 2+2i, |z1|² = 8
            expect(result.iteration).toBe(0);
            expect(result.magnitude).toBeCloseTo(Math.sqrt(8), 12);
            expect(result.time).toBeCloseTo(0.9438, 4);
        });

        it('should not treat |z|² == 4 as an escape', () => {
            // c = 1: z1 = 1, z2 = 2 (|z|² = 4), z3 = 5
            expect(escapeTime(complex(1, 0), 2)).toEqual({ kind: 'bounded' });

            const result = escapeTime(complex(1, 0), 3);
            expect(result.kind).toBe('escaped');
            if (result.kind !== 'escaped') return;
            expect(result.iteration).toBe(2);
            expect(result.magnitude).toBe(5);
            expect(result.time).toBeCloseTo(2.3134, 4);
        });

        it('should reject a zero iteration budget', () => {
            expect(() => escapeTime(complex(0, 0), 0)).toThrow('ERROR-FR-01');
        });
    });

    describe('generateImage', () => {
        it('should produce pixels in row-major order', () => {
            const image = generateImage({ width: 2, height: 1, maxIter: 1 });

            // x = 0 -> c = -1.5-1.5i escapes immediately; x = 1 -> c = 0-1.5i stays bounded for one step
            expect([...image.pixels]).toEqual([12, 9, 7, 0, 0, 0]);
            expect(pixelAt(image, 0, 0)).toEqual({ r: 12, g: 9, b: 7 });
            expect(pixelAt(image, 1, 0)).toEqual({ r: 0, g: 0, b: 0 });
            expect(image.stats).toEqual({ boundedPixels: 1, escapedPixels: 1 });
        });

        it('should produce exactly width × height pixels', () => {
            const image = generateImage({ width: 5, height: 3, maxIter: 20 });
            expect(image.pixels).toBeInstanceOf(Uint8Array);
            expect(image.pixels).toHaveLength(15 * 3);
            expect(image.stats.boundedPixels + image.stats.escapedPixels).toBe(15);
        });

        it('should report progress after each row', () => {
            const calls: Array<[number, number]> = [];
            generateImage({ width: 3, height: 2, maxIter: 5 }, (completed, total) => {
                calls.push([completed, total]);
            });
            expect(calls).toEqual([
                [3, 6],
                [6, 6],
            ]);
        });

        it('should store three bytes per pixel', () => {
            const image = generateImage({ width: 512, height: 512, maxIter: 1 });
            expect(image.pixels.byteLength).toBe(512 * 512 * 3);
        });

        it('should not change output when progress is reported', () => {
            const params = { width: 8, height: 6, maxIter: 50 };
            const silent = generateImage(params);
            const observed = generateImage(params, () => undefined);
            expect(observed.pixels).toEqual(silent.pixels);
        });

        it('should be deterministic', () => {
            const params = { width: 9, height: 7, maxIter: 100 };
            expect(generateImage(params)).toEqual(generateImage(params));
        });

        it('should reject invalid parameters before computing', () => {
            let called = false;
            expect(() =>
                generateImage({ width: 3, height: 3, maxIter: 0 }, () => {
                    called = true;
                })
            ).toThrow('ERROR-FR-01');
            expect(called).toBe(false);
        });
    });
});
