/**
 * @fileoverview Logger contract
 *
 * Every component takes an optional logger through its options. The default
 * writes to the console with a level prefix.
 *
 * @module @access-insights/pipeline/contracts/PipelineLogger
 */

/**
 * Logger interface for pipeline components.
 */
export interface PipelineLogger {
    debug(message: string, data?: Record<string, unknown>): void;
    info(message: string, data?: Record<string, unknown>): void;
    warn(message: string, data?: Record<string, unknown>): void;
    error(message: string, data?: Record<string, unknown>): void;
}

/**
 * Default console logger.
 */
export const consoleLogger: PipelineLogger = {
    debug: (msg, data) => console.debug(`[DEBUG] ${msg}`, data ?? ""),
    info : (msg, data) => console.info(`[INFO] ${msg}`, data ?? ""),
    warn : (msg, data) => console.warn(`[WARN] ${msg}`, data ?? ""),
    error: (msg, data) => console.error(`[ERROR] ${msg}`, data ?? ""),
};

/**
 * Create a logger that prefixes messages with a scope and merges fixed
 * fields into every entry.
 *
 * @param parent - Logger to write to
 * @param scope - Prefix, e.g. "classifier"
 * @param fields - Fields added to every entry, e.g. the batch id
 */
export function createScopedLogger(
    parent: PipelineLogger,
    scope: string,
    fields: Record<string, unknown> = {}
): PipelineLogger {
    return {
        debug: (msg, data) => parent.debug(`[${scope}] ${msg}`, { ...data, ...fields }),
        info : (msg, data) => parent.info(`[${scope}] ${msg}`, { ...data, ...fields }),
        warn : (msg, data) => parent.warn(`[${scope}] ${msg}`, { ...data, ...fields }),
        error: (msg, data) => parent.error(`[${scope}] ${msg}`, { ...data, ...fields }),
    };
}

/**
 * Render an unknown thrown value for a log entry.
 */
export function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
