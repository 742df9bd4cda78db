/**
 * Render pipeline: escape-time image -> P6 bytes -> optional file
 * Shared by the CLI and the render_fractal MCP tool
 */

import { parseRenderOptions } from "../config.js";
import { generateImage, type ProgressCallback } from "../engine/mandelbrot.js";
import { encodePpm, writePpm } from "../lib/image/ppm.js";
import type { ToolDefinition } from "./index.js";

export interface RenderFractalInput {
    width?: number;
    height?: number;
    max_iter?: number;
    output_path?: string; // Written to disk when present
    include_base64?: boolean; // Default false
}

export interface RenderFractalOutput {
    ok: boolean;
    width?: number;
    height?: number;
    maxIter?: number;
    bytes?: number;
    boundedPixels?: number;
    escapedPixels?: number;
    outputPath?: string;
    ppmBase64?: string;
    durationMs?: number;
    error?: string;
}

export interface RenderResult {
    data: Buffer;
    width: number;
    height: number;
    maxIter: number;
    boundedPixels: number;
    escapedPixels: number;
}

/**
 * Module-level render statistics (read by the health tool)
 */
export const renderStats: { count: number; lastDurationMs: number | null } = {
    count: 0,
    lastDurationMs: null,
};

export function resetRenderStats(): void {
    renderStats.count = 0;
    renderStats.lastDurationMs = null;
}

/**
 * Computes and encodes a fractal without touching the filesystem
 */
export function renderPpm(
    params: { width: number; height: number; maxIter: number },
    onProgress?: ProgressCallback
): RenderResult {
    const image = generateImage(params, onProgress);
    return {
        data: encodePpm(image.width, image.height, image.pixels),
        width: image.width,
        height: image.height,
        maxIter: params.maxIter,
        boundedPixels: image.stats.boundedPixels,
        escapedPixels: image.stats.escapedPixels,
    };
}

/**
 * render_fractal handler
 * Validation failures and write failures are reported as { ok: false, error }
 */
export async function renderFractalHandler(input: RenderFractalInput): Promise<RenderFractalOutput> {
    const startedAt = Date.now();

    try {
        const options = parseRenderOptions({
            width: input.width,
            height: input.height,
            maxIter: input.max_iter,
        });

        const result = renderPpm(options);
        const outputPath = input.output_path ? await writePpm(input.output_path, result.data) : undefined;

        const durationMs = Date.now() - startedAt;
        renderStats.count++;
        renderStats.lastDurationMs = durationMs;

        return {
            ok: true,
            width: result.width,
            height: result.height,
            maxIter: result.maxIter,
            bytes: result.data.length,
            boundedPixels: result.boundedPixels,
            escapedPixels: result.escapedPixels,
            outputPath,
            ppmBase64: input.include_base64 ? result.data.toString("base64") : undefined,
            durationMs,
        };
    } catch (error) {
        if (error instanceof Error && error.message.startsWith("ERROR-FR-")) {
            return { ok: false, error: error.message };
        }
        throw error;
    }
}

/**
 * render_fractal tool definition for MCP
 */
export const renderFractalTool: ToolDefinition = {
    name: "render_fractal",
    description:
        "Renders the Mandelbrot set over [-1.5, 1.5] x [-1.5, 1.5] as a binary PPM (P6) image with smoothed escape-time coloring.",
    inputSchema: {
        type: "object",
        properties: {
            width: {
                type: "number",
                description: "Image width in pixels (default: 1000)",
                default: 1000,
            },
            height: {
                type: "number",
                description: "Image height in pixels (default: 1000)",
                default: 1000,
            },
            max_iter: {
                type: "number",
                description: "Iteration budget per pixel (default: 1000)",
                default: 1000,
            },
            output_path: {
                type: "string",
                description: "Optional file path to write the PPM to",
            },
            include_base64: {
                type: "boolean",
                description: "Return the encoded image as base64 (default: false)",
                default: false,
            },
        },
    },
};
