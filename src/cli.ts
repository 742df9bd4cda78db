/**
 * Command-line front end
 * fractal-ppm [--width N] [--height N] [--max-iter N] [--output PATH] [--quiet]
 */

import { parseArgs } from "util";
import { parseRenderOptions, RENDER_DEFAULTS, type RenderOptions } from "./config.js";
import { writePpm } from "./lib/image/ppm.js";
import { createProgressReporter, type ProgressSink } from "./lib/progress.js";
import { renderPpm } from "./tools/render_fractal.js";

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_USAGE = 2;

export const USAGE = `Usage: fractal-ppm [options]

Options:
  --width <n>      Image width in pixels (default: ${RENDER_DEFAULTS.width})
  --height <n>     Image height in pixels (default: ${RENDER_DEFAULTS.height})
  --max-iter <n>   Iteration budget per pixel (default: ${RENDER_DEFAULTS.maxIter})
  --output <path>  Output file (default: ${RENDER_DEFAULTS.output})
  --quiet          Do not display progress
  --help           Show this message
`;

export interface CliArgs {
    options: RenderOptions;
    quiet: boolean;
    help: boolean;
}

function readFlags(argv: string[]) {
    try {
        return parseArgs({
            args: argv,
            strict: true,
            allowPositionals: false,
            options: {
                width: { type: "string" },
                height: { type: "string" },
                "max-iter": { type: "string" },
                output: { type: "string" },
                quiet: { type: "boolean", default: false },
                help: { type: "boolean", default: false },
            },
        }).values;
    } catch (error) {
        throw new Error(`ERROR-FR-01: ${error instanceof Error ? error.message : "Invalid arguments"}`);
    }
}

/**
 * Parses and validates argv (without the node and script entries)
 * @throws Error (ERROR-FR-01) on unknown flags, missing values or invalid numbers
 */
export function parseCliArgs(argv: string[]): CliArgs {
    const values = readFlags(argv);

    return {
        options: parseRenderOptions({
            width: values.width,
            height: values.height,
            maxIter: values["max-iter"],
            output: values.output,
        }),
        quiet: values.quiet === true,
        help: values.help === true,
    };
}

/**
 * Runs one render and returns the process exit code
 */
export async function runCli(argv: string[], progressSink: ProgressSink = process.stderr): Promise<number> {
    let args: CliArgs;
    try {
        args = parseCliArgs(argv);
    } catch (error) {
        console.error(error instanceof Error ? error.message : error);
        console.error(USAGE);
        return EXIT_USAGE;
    }

    if (args.help) {
        console.error(USAGE);
        return EXIT_OK;
    }

    const { width, height, maxIter, output } = args.options;
    const onProgress = args.quiet ? undefined : createProgressReporter(progressSink);

    try {
        const result = renderPpm({ width, height, maxIter }, onProgress);
        const writtenPath = await writePpm(output, result.data);
        console.error(
            `Wrote ${writtenPath} (${width}x${height}, ${result.data.length} bytes, ${result.boundedPixels} bounded pixels)`
        );
        return EXIT_OK;
    } catch (error) {
        if (error instanceof Error && error.message.startsWith("ERROR-FR-")) {
            console.error(error.message);
            return EXIT_FAILURE;
        }
        throw error;
    }
}
