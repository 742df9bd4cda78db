/**
 * Mandelbrot Escape-Time Engine
 * Maps pixels onto the complex plane, iterates z → z² + c and colours the result
 */

import { add, complex, magnitude, magnitudeSquared, square, type Complex } from "../lib/complex.js";
import { colorForEscape, type RGB } from "../lib/color/escape_palette.js";

/**
 * Visible region of the complex plane (both axes)
 */
export const REAL_INTERVAL: readonly [number, number] = [-1.5, 1.5];
export const IMAG_INTERVAL: readonly [number, number] = [-1.5, 1.5];

/**
 * |z|² threshold, i.e. escape radius 2
 */
export const ESCAPE_RADIUS_SQUARED = 4.0;

/**
 * Outcome of iterating a single point
 */
export type EscapeResult =
    | { kind: "bounded" }
    | {
          kind: "escaped";
          /** 0-indexed step at which |z|² first exceeded the threshold */
          iteration: number;
          /** |z| at the escaping step */
          magnitude: number;
          /** Smoothed escape time; NaN when magnitude <= 1 */
          time: number;
      };

export interface RenderParams {
    width: number;
    height: number;
    maxIter: number;
}

/**
 * Called with (pixels completed, pixels total)
 */
export type ProgressCallback = (completed: number, total: number) => void;

export interface GeneratedImage {
    width: number;
    height: number;
    /** Packed r, g, b bytes, row-major: width × height × 3 entries */
    pixels: Uint8Array;
    stats: {
        boundedPixels: number;
        escapedPixels: number;
    };
}

function assertPositiveInteger(name: string, value: number): void {
    if (!Number.isInteger(value) || value < 1) {
        throw new Error(`ERROR-FR-01: ${name} must be a positive integer, got ${value}`);
    }
}

/**
 * Maps screen plane coordinates to complex plane coordinates
 *
 * @param x - Pixel column (0 <= x < width)
 * @param y - Pixel row (0 <= y < height)
 * @throws Error (ERROR-FR-01) if width or height is not a positive integer
 */
export function mapScreenToComplex(x: number, y: number, width: number, height: number): Complex {
    assertPositiveInteger("width", width);
    assertPositiveInteger("height", height);

    const [reMin, reMax] = REAL_INTERVAL;
    const [imMin, imMax] = IMAG_INTERVAL;

    const re = (x / width) * (reMax - reMin) + reMin;
    const im = (y / height) * (imMax - imMin) + imMin;
    return complex(re, im);
}

/**
 * Iterates z₀ = 0, z_{n+1} = z_n² + c for at most maxIter steps.
 *
 * Escape at step n means |z_{n+1}|² > 4. The raw count is smoothed with
 * nu = ln(ln|z|) / ln 2, time = n + 1 - nu. For |z| <= 1 the inner logarithm is
 * not positive and time comes out as NaN; callers must accept that value.
 */
export function escapeTime(c: Complex, maxIter: number): EscapeResult {
    assertPositiveInteger("maxIter", maxIter);

    let z = complex(0, 0);
    for (let n = 0; n < maxIter; n++) {
        z = add(square(z), c);
        if (magnitudeSquared(z) > ESCAPE_RADIUS_SQUARED) {
            const zMag = magnitude(z);
            const nu = Math.log(Math.log(zMag)) / Math.LN2;
            return {
                kind: "escaped",
                iteration: n,
                magnitude: zMag,
                time: n + 1 - nu,
            };
        }
    }

    return { kind: "bounded" };
}

/**
 * Renders every pixel in row-major order (y outer, x inner).
 * Progress is reported after each row; it never affects the pixel data.
 */
export function generateImage(params: RenderParams, onProgress?: ProgressCallback): GeneratedImage {
    const { width, height, maxIter } = params;
    assertPositiveInteger("width", width);
    assertPositiveInteger("height", height);
    assertPositiveInteger("maxIter", maxIter);

    const total = width * height;
    const pixels = new Uint8Array(total * 3);
    let boundedPixels = 0;
    let index = 0;

    for (let y = 0; y < height; y++) {
        for (let x = 0; x < width; x++) {
            const result = escapeTime(mapScreenToComplex(x, y, width, height), maxIter);
            if (result.kind === "bounded") {
                boundedPixels++;
            }
            const { r, g, b } = colorForEscape(result);
            const offset = index++ * 3;
            pixels[offset] = r;
            pixels[offset + 1] = g;
            pixels[offset + 2] = b;
        }
        onProgress?.(index, total);
    }

    return {
        width,
        height,
        pixels,
        stats: {
            boundedPixels,
            escapedPixels: total - boundedPixels,
        },
    };
}

/**
 * Reads one pixel back out of a generated image
 */
export function pixelAt(image: GeneratedImage, x: number, y: number): RGB {
    const offset = (y * image.width + x) * 3;
    return {
        r: image.pixels[offset],
        g: image.pixels[offset + 1],
        b: image.pixels[offset + 2],
    };
}
