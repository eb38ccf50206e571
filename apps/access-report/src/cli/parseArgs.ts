/**
 * @fileoverview Command-line arguments
 *
 * Usage: access-report [--map raw=field]... [--top N] <file.csv>...
 *
 * @module cli/parseArgs
 */

export interface CliArgs {
    /** CSV uploads to process, in order */
    files: string[];

    /** Explicit mapping; the suggested mapping is used when absent */
    mapping?: Record<string, string>;

    /** Buckets listed per dimension */
    top: number;

    help: boolean;
}

export const USAGE = "Usage: access-report [--map raw=field]... [--top N] <file.csv>...";

/**
 * Parse arguments after the script name.
 *
 * @throws Error for a malformed option
 */
export function parseArgs(argv: readonly string[]): CliArgs {
    const files: string[] = [];
    const mapping = new Map<string, string>();
    let mapped = false;
    let top = 3;
    let help = false;

    for (let index = 0; index < argv.length; index++) {
        const arg = argv[index];

        if (arg === "--help" || arg === "-h") {
            help = true;
        }
        else if (arg === "--map") {
            const pair = argv[++index] ?? "";
            const separator = pair.lastIndexOf("=");
            const rawColumn = pair.slice(0, separator).trim();
            const field = pair.slice(separator + 1).trim();
            if (separator < 0 || !rawColumn || !field) {
                throw new Error(`Invalid --map value '${pair}': expected raw=field`);
            }
            mapping.set(rawColumn, field);
            mapped = true;
        }
        else if (arg === "--top") {
            const value = argv[++index] ?? "";
            top = Number(value);
            if (!/^\d+$/.test(value) || top < 1) {
                throw new Error(`Invalid --top value '${value}': expected a positive integer`);
            }
        }
        else if (arg.startsWith("--")) {
            throw new Error(`Unknown option '${arg}'`);
        }
        else {
            files.push(arg);
        }
    }

    return {
        files,
        ...(mapped && { mapping: Object.fromEntries(mapping) }),
        top,
        help,
    };
}
