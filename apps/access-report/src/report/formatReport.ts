/**
 * @fileoverview Report formatting
 *
 * Renders batch results as plain text lines for the terminal.
 *
 * @module report/formatReport
 */

import type {
    Aggregator,
    BatchResult,
    ColumnMapping,
    ParseError,
    StatsSnapshot,
} from "@access-insights/pipeline";

export interface ReportOptions {
    /** Buckets listed per dimension (default 3) */
    top?: number;

    /** Parse errors listed before truncating (default 10) */
    maxErrors?: number;
}

/**
 * Format one batch.
 *
 * @example
 * ```typescript
 * formatReport(result, orchestrator.aggregator);
 * // [
 * //   "Batch batch_1: complete",
 * //   "Rows: 2 of 3 processed (1 rejected)",
 * //   "Mapping:",
 * //   "  ts -> timestamp",
 * //   ...
 * // ]
 * ```
 */
export function formatReport(result: BatchResult, aggregator: Aggregator, options: ReportOptions = {}): string[] {
    const lines = [`Batch ${result.batchId}: ${result.status}`];

    if (result.status === "failed") {
        lines.push(`  ${result.configurationError.message}`);
        return lines;
    }

    const { summary } = result;
    lines.push(`Rows: ${summary.parsedRows} of ${summary.totalRows} processed (${summary.rejectedRows} rejected)`);
    lines.push(...formatMapping(result.mapping));
    lines.push(...formatSnapshot(result.snapshot, aggregator, options));

    if (result.errors.length > 0) {
        const maxErrors = options.maxErrors ?? 10;
        lines.push(`Errors (${result.errors.length}):`);
        lines.push(...result.errors.slice(0, maxErrors).map(formatParseError));
        if (result.errors.length > maxErrors) {
            lines.push(`  ... and ${result.errors.length - maxErrors} more`);
        }
    }

    return lines;
}

export function formatMapping(mapping: ColumnMapping): string[] {
    return [
        "Mapping:",
        ...Object.entries(mapping).map(([rawColumn, field]) => `  ${rawColumn} -> ${field}`),
    ];
}

/**
 * Label counts, busiest buckets per dimension, and anomaly flags.
 */
export function formatSnapshot(snapshot: StatsSnapshot, aggregator: Aggregator, options: ReportOptions = {}): string[] {
    const top = options.top ?? 3;
    const lines = [`Labels (${snapshot.total} rows):`];

    for (const [label, count] of Object.entries(snapshot.labels)) {
        lines.push(`  ${label}: ${count}`);
    }

    for (const dimension of aggregator.dimensions) {
        const busiest = aggregator.topBuckets(snapshot, dimension.name, top);
        if (busiest.length > 0) {
            lines.push(`Top ${dimension.name}: ${busiest.map(({ bucket, count }) => `${bucket} (${count})`).join(", ")}`);
        }
    }

    if (snapshot.anomalies.length > 0) {
        lines.push("Anomalies:");
        for (const flag of snapshot.anomalies) {
            lines.push(`  ${flag.ruleId}: ${flag.dimension} ${flag.bucket} has ${flag.count} ${flag.label} (threshold ${flag.threshold})`);
        }
    }

    return lines;
}

export function formatParseError(error: ParseError): string {
    const value = error.value === undefined ? "" : ` (got "${error.value}")`;
    return `  line ${error.line}, ${error.field ?? "row"}: ${error.reason}${value}`;
}
