/**
 * Terminal progress display for long renders
 */

import type { ProgressCallback } from "../engine/mandelbrot.js";

/**
 * Anything that accepts text, e.g. process.stderr
 */
export interface ProgressSink {
    write(chunk: string): unknown;
}

/**
 * Creates a progress callback that redraws "<label>: <pct>%" in place.
 * Output is only written when the whole percentage changes; a newline
 * follows the final update.
 */
export function createProgressReporter(sink: ProgressSink, label = "Rendering"): ProgressCallback {
    let lastPercent = -1;

    return (completed, total) => {
        const percent = total > 0 ? Math.floor((completed / total) * 100) : 100;
        if (percent === lastPercent) {
            return;
        }
        lastPercent = percent;
        sink.write(`\r${label}: ${percent}%`);
        if (completed >= total) {
            sink.write("\n");
        }
    };
}
