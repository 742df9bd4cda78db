import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import type { Transport } from "@modelcontextprotocol/sdk/shared/transport.js";
import {
    CallToolRequestSchema,
    ErrorCode,
    ListToolsRequestSchema,
    McpError,
} from "@modelcontextprotocol/sdk/types.js";
import { z } from "zod";
import { MAX_DIMENSION } from "./config.js";
import { tools } from "./tools/index.js";
import { healthHandler } from "./tools/health.js";
import { renderFractalHandler } from "./tools/render_fractal.js";

function isTestEnvironment(): boolean {
    return process.env.NODE_ENV === "test" || typeof process.env.VITEST !== "undefined";
}

/**
 * Fractal MCP Server
 * Escape-time Mandelbrot renderer exposed over the Model Context Protocol
 */
export class FractalServer {
    private server: Server;

    constructor() {
        this.server = new Server(
            {
                name: "fractal-ppm",
                version: "1.0.0",
            },
            {
                capabilities: {
                    tools: {},
                },
            }
        );

        this.setupToolHandlers();

        this.server.onerror = (error) => console.error("[MCP Error]", error);

        if (!isTestEnvironment()) {
            process.on("SIGINT", () => {
                this.server
                    .close()
                    .catch((error: unknown) => console.error("[MCP Error] Failed to close server", error))
                    .finally(() => process.exit(0));
            });
        }
    }

    private setupToolHandlers() {
        this.server.setRequestHandler(ListToolsRequestSchema, async () => ({
            tools,
        }));

        this.server.setRequestHandler(CallToolRequestSchema, async (request) => {
            const toolName = request.params.name;

            if (toolName === "health") {
                const result = healthHandler(tools.length);
                return {
                    content: [
                        {
                            type: "text",
                            text: JSON.stringify(result, null, 2),
                        },
                    ],
                };
            }

            if (toolName === "render_fractal") {
                const schema = z.object({
                    width: z.number().int().positive().max(MAX_DIMENSION).optional(),
                    height: z.number().int().positive().max(MAX_DIMENSION).optional(),
                    max_iter: z.number().int().positive().optional(),
                    output_path: z.string().min(1).optional(),
                    include_base64: z.boolean().optional().default(false),
                });

                const parseResult = schema.safeParse(request.params.arguments ?? {});
                if (!parseResult.success) {
                    throw new McpError(
                        ErrorCode.InvalidParams,
                        "Invalid parameters for render_fractal"
                    );
                }

                try {
                    const result = await renderFractalHandler(parseResult.data);
                    return {
                        content: [
                            {
                                type: "text",
                                text: JSON.stringify(result, null, 2),
                            },
                        ],
                    };
                } catch (error) {
                    throw new McpError(
                        ErrorCode.InternalError,
                        `Failed to render fractal: ${error instanceof Error ? error.message : "Unknown error"}`
                    );
                }
            }

            throw new McpError(
                ErrorCode.MethodNotFound,
                `Unknown tool: ${toolName}`
            );
        });
    }

    async run(transport?: Transport) {
        const serverTransport = transport ?? new StdioServerTransport();
        await this.server.connect(serverTransport);
        if (!transport && !isTestEnvironment()) {
            console.error("Fractal MCP server running on stdio");
        }
    }

    getServer(): Server {
        return this.server;
    }
}
