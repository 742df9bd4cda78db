import { FractalServer } from "./server.js";

const server = new FractalServer();
server.run().catch((error: unknown) => {
    console.error("[MCP Error] Failed to start server", error);
    process.exitCode = 1;
});
