/**
 * @fileoverview Configuration errors
 *
 * Raised for problems that make a batch impossible to run: bad schema or
 * rule definitions, invalid aggregation settings, or a column mapping with
 * unrecoverable defects. Per-row problems are `ParseError` data instead.
 *
 * @module @access-insights/pipeline/contracts/ConfigurationError
 */

import type { MappingIssue } from "./ColumnMapping.js";

export type ConfigurationIssue = string | MappingIssue;

/**
 * Error listing every configuration issue found, not just the first.
 *
 * @example
 * ```typescript
 * throw new ConfigurationError("Invalid rule set", [
 *     "Rule 'denied' reads unknown field 'result'",
 * ]);
 * ```
 */
export class ConfigurationError extends Error {
    readonly issues: readonly ConfigurationIssue[];

    constructor(message: string, issues: readonly ConfigurationIssue[] = []) {
        super(issues.length > 0 ? `${message}: ${describeIssues(issues)}` : message);
        this.name   = "ConfigurationError";
        this.issues = Object.freeze([...issues]);
    }
}

function describeIssues(issues: readonly ConfigurationIssue[]): string {
    return issues
        .map((issue) => (typeof issue === "string" ? issue : issue.message))
        .join("; ");
}
