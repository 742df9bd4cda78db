/**
 * Health check tool - Returns server status and render metrics
 */

import { readFileSync } from "fs";
import { resolve } from "path";
import type { ToolDefinition } from "./index.js";
import { renderStats } from "./render_fractal.js";

export interface HealthOutput {
    ok: true;
    version: string;
    uptimeSec: number;
    toolCount: number;
    renders: {
        count: number;
        lastDurationMs: number | null;
    };
}

const startTime = Date.now();

/**
 * Version from VERSION, else package.json in the working directory
 */
function getVersion(): string {
    if (process.env.VERSION) {
        return process.env.VERSION;
    }

    try {
        const packagePath = resolve(process.cwd(), "package.json");
        const packageJson: unknown = JSON.parse(readFileSync(packagePath, "utf-8"));
        if (
            typeof packageJson === "object" &&
            packageJson !== null &&
            "version" in packageJson &&
            typeof packageJson.version === "string"
        ) {
            return packageJson.version;
        }
        return "unknown";
    } catch (error) {
        console.error("[health] Could not read package.json:", error instanceof Error ? error.message : error);
        return "unknown";
    }
}

/**
 * @param toolCount - Number of tools the server exposes
 */
export function healthHandler(toolCount: number): HealthOutput {
    return {
        ok: true,
        version: getVersion(),
        uptimeSec: Math.floor((Date.now() - startTime) / 1000),
        toolCount,
        renders: {
            count: renderStats.count,
            lastDurationMs: renderStats.lastDurationMs,
        },
    };
}

/**
 * Health tool definition for MCP
 */
export const healthTool: ToolDefinition = {
    name: "health",
    description: "Returns server health status including version, uptime, tool count and render statistics",
    inputSchema: {
        type: "object",
        properties: {},
    },
};
