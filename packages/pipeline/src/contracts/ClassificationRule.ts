/**
 * Classification Rule Contract
 *
 * Rules evaluate canonical rows and supply a label when their predicate
 * holds. The classifier evaluates rules in declared order and the first
 * match wins; rule authors rely on that ordering.
 *
 * Design principles:
 * - Pure: No side effects, no row mutation
 * - Deterministic: Same row produces the same answer
 * - Declared: A rule lists the fields it reads so authoring errors are
 *   caught when the rule set is built, not per row
 */

import type { CanonicalRow } from "./CanonicalRow.js";
import type { Scalar } from "./CanonicalField.js";

/**
 * Label assigned when no rule matches. Reserved: rules may not use it.
 */
export const UNCLASSIFIED_LABEL = "unclassified";

/**
 * Classification rule interface.
 *
 * @example
 * ```typescript
 * const deniedRule: ClassificationRule = {
 *     id      : "denied",
 *     label   : "access_denied",
 *     fields  : ["outcome"],
 *     metadata: { severity: "high" },
 *     matches(row) {
 *         return row.values.outcome === "DENY";
 *     },
 * };
 * ```
 */
export interface ClassificationRule {
    /**
     * Unique identifier for this rule.
     * Used for logging and recorded on every row the rule labels.
     */
    readonly id: string;

    /**
     * Label given to matching rows.
     */
    readonly label: string;

    /**
     * Optional description of what the rule detects.
     */
    readonly description?: string;

    /**
     * Canonical fields the predicate reads.
     * Checked against the schema at registration time.
     */
    readonly fields: readonly string[];

    /**
     * Metadata copied onto every row this rule labels.
     */
    readonly metadata?: Readonly<Record<string, Scalar>>;

    /**
     * Evaluate the predicate.
     *
     * @param row - The canonical row (read-only)
     * @returns true if the rule applies to the row
     */
    matches(row: CanonicalRow): boolean;
}

/**
 * A canonical row with its classification.
 */
export interface ClassifiedRow extends CanonicalRow {
    /** Exactly one label per row */
    readonly label: string;

    /** Rule that supplied the label, or null for `unclassified` */
    readonly ruleId: string | null;

    /** Rule-supplied metadata (empty when unclassified) */
    readonly metadata: Readonly<Record<string, Scalar>>;
}

/**
 * Type guard to check if an object is a ClassificationRule.
 *
 * @param obj - The object to check
 * @returns True if the object implements ClassificationRule
 */
export function isClassificationRule(obj: unknown): obj is ClassificationRule {
    return (
        typeof obj === "object" &&
        obj !== null &&
        "id" in obj &&
        typeof obj.id === "string" &&
        "label" in obj &&
        typeof obj.label === "string" &&
        "fields" in obj &&
        Array.isArray(obj.fields) &&
        "matches" in obj &&
        typeof obj.matches === "function"
    );
}
