/**
 * Complex number utilities
 * Immutable value type used by the escape-time engine
 */

/**
 * Point in the complex plane
 */
export interface Complex {
    readonly re: number;
    readonly im: number;
}

export function complex(re: number, im: number): Complex {
    return { re, im };
}

export function add(a: Complex, b: Complex): Complex {
    return { re: a.re + b.re, im: a.im + b.im };
}

/**
 * (a + bi)² = (a² - b²) + 2abi
 */
export function square(z: Complex): Complex {
    return {
        re: z.re * z.re - z.im * z.im,
        im: 2 * z.re * z.im,
    };
}

export function magnitudeSquared(z: Complex): number {
    return z.re * z.re + z.im * z.im;
}

export function magnitude(z: Complex): number {
    return Math.sqrt(magnitudeSquared(z));
}
