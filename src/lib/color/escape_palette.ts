/**
 * Escape-time colouring
 * Fixed linear palette: each channel is the smoothed escape time scaled and narrowed to 8 bits
 */

import type { EscapeResult } from "../../engine/mandelbrot.js";

/**
 * RGB color (0-255 range)
 */
export interface RGB {
    r: number;
    g: number;
    b: number;
}

export const BLACK: Readonly<RGB> = Object.freeze({ r: 0, g: 0, b: 0 });

const RED_SCALE = 9.0;
const GREEN_SCALE = 7.0;
const BLUE_SCALE = 5.0;

/**
 * Narrows a scaled value to an unsigned byte.
 * Truncates toward negative infinity and wraps modulo 256 (no clamping), so
 * 256 -> 0 and -1 -> 255. NaN and infinities become 0.
 */
export function toByte(value: number): number {
    if (!Number.isFinite(value)) {
        return 0;
    }
    return ((Math.floor(value) % 256) + 256) % 256;
}

/**
 * Converts a smoothed escape time to a color
 * @param time - Smoothed escape time, possibly NaN at the escape boundary
 */
export function colorForTime(time: number): RGB {
    return {
        r: toByte(time * RED_SCALE),
        g: toByte(time * GREEN_SCALE),
        b: toByte(time * BLUE_SCALE),
    };
}

/**
 * Bounded points are black; escaped points go through the linear palette
 */
export function colorForEscape(result: EscapeResult): RGB {
    if (result.kind === "bounded") {
        return { ...BLACK };
    }
    return colorForTime(result.time);
}
