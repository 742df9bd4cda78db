/**
 * Binary PPM (P6) encoding and output
 */

import { mkdir, writeFile } from "fs/promises";
import { dirname, resolve } from "path";
import type { RGB } from "../color/escape_palette.js";

/**
 * Builds the ASCII header: magic, dimensions, max channel value
 */
export function ppmHeader(width: number, height: number): string {
    return `P6\n${width} ${height}\n255\n`;
}

/**
 * Serializes a row-major image as P6 bytes
 *
 * @param pixels - Either one color per pixel, or packed r, g, b bytes (3 per pixel)
 * @returns Header followed by three bytes (r, g, b) per pixel, no padding
 * @throws Error (ERROR-FR-02) if the buffer does not hold width × height valid colors
 */
export function encodePpm(width: number, height: number, pixels: Uint8Array | readonly RGB[]): Buffer {
    const pixelCount = pixels instanceof Uint8Array ? pixels.length / 3 : pixels.length;
    if (pixelCount !== width * height) {
        throw new Error(
            `ERROR-FR-02: Pixel buffer length ${pixelCount} does not match ${width}x${height}`
        );
    }

    const header = Buffer.from(ppmHeader(width, height), "ascii");
    const out = Buffer.alloc(header.length + width * height * 3);
    header.copy(out, 0);

    if (pixels instanceof Uint8Array) {
        out.set(pixels, header.length);
        return out;
    }

    let offset = header.length;
    for (const [i, pixel] of pixels.entries()) {
        for (const channel of [pixel.r, pixel.g, pixel.b]) {
            if (!Number.isInteger(channel) || channel < 0 || channel > 255) {
                throw new Error(`ERROR-FR-02: Pixel ${i} has channel value ${channel} outside 0-255`);
            }
            out[offset++] = channel;
        }
    }

    return out;
}

/**
 * Writes encoded bytes to disk, creating the parent directory if needed
 *
 * @returns Absolute path of the written file
 * @throws Error (ERROR-FR-03) if the write fails
 */
export async function writePpm(filePath: string, data: Uint8Array): Promise<string> {
    const resolvedPath = resolve(filePath);
    try {
        await mkdir(dirname(resolvedPath), { recursive: true });
        await writeFile(resolvedPath, data);
    } catch (error) {
        throw new Error(
            `ERROR-FR-03: Failed to write ${resolvedPath}: ${error instanceof Error ? error.message : "Unknown error"}`
        );
    }
    return resolvedPath;
}
