/**
 * Render configuration
 * Defaults and validation shared by the CLI and the MCP render tool
 */

import { z } from "zod";

/**
 * Largest accepted width or height. At 8192 × 8192 the packed pixel buffer
 * and its encoded copy take 384 MiB together.
 */
export const MAX_DIMENSION = 8192;

export const RENDER_DEFAULTS = {
    width: 1000,
    height: 1000,
    maxIter: 1000,
    output: "fractal.ppm",
} as const;

/**
 * Numeric fields accept strings so raw CLI values can be validated directly
 */
export const renderOptionsSchema = z.object({
    width: z.coerce.number().int().positive().max(MAX_DIMENSION).default(RENDER_DEFAULTS.width),
    height: z.coerce.number().int().positive().max(MAX_DIMENSION).default(RENDER_DEFAULTS.height),
    maxIter: z.coerce.number().int().positive().default(RENDER_DEFAULTS.maxIter),
    output: z.string().min(1).default(RENDER_DEFAULTS.output),
});

export type RenderOptions = z.infer<typeof renderOptionsSchema>;

/**
 * Validates raw render options and fills in defaults
 * @throws Error (ERROR-FR-01) describing the first invalid field
 */
export function parseRenderOptions(input: unknown): RenderOptions {
    const parseResult = renderOptionsSchema.safeParse(input);
    if (!parseResult.success) {
        const issue = parseResult.error.issues[0];
        const field = issue?.path.join(".") || "options";
        throw new Error(`ERROR-FR-01: Invalid ${field}: ${issue?.message ?? "invalid value"}`);
    }
    return parseResult.data;
}
