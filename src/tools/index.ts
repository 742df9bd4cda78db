/**
 * Tools aggregator - Exports all tool definitions
 */

import { healthTool } from "./health.js";
import { renderFractalTool } from "./render_fractal.js";

/**
 * Tool definition type
 */
export interface ToolDefinition {
    name: string;
    description: string;
    inputSchema: {
        type: "object";
        properties?: Record<string, unknown>;
        required?: string[];
    };
}

/**
 * All tool definitions
 */
export const tools: ToolDefinition[] = [healthTool, renderFractalTool];
