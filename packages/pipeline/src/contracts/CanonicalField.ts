/**
 * CanonicalField Contract
 *
 * A named, typed slot in the fixed event schema. Every uploaded file is
 * mapped onto these fields before any rule or statistic sees it.
 *
 * Fields are defined once when the process loads its configuration and
 * are never mutated afterwards.
 */

/**
 * Value types a canonical field can hold.
 */
export type FieldType = "string" | "integer" | "timestamp" | "enum";

/**
 * Typed value stored in a canonical row.
 *
 * - `string` and `enum` fields hold a string
 * - `integer` fields hold a safe integer
 * - `timestamp` fields hold a Date (UTC)
 *
 * Rows and their `values` are frozen, but a Date stays mutable. The
 * classified row shares the parsed row's `values`, so rule predicates and
 * callers must treat a timestamp as read-only: copy it with
 * `new Date(value.getTime())` before calling any setter.
 */
export type FieldValue = string | number | Date;

/**
 * Scalar allowed in rule metadata.
 */
export type Scalar = string | number | boolean | null;

/**
 * Canonical field definition.
 *
 * @example
 * ```typescript
 * const outcome: CanonicalField = {
 *     name    : "outcome",
 *     label   : "Access Result",
 *     type    : "enum",
 *     required: true,
 *     values  : ["GRANT", "DENY"],
 *     aliases : ["result", "status", "access_result"],
 * };
 * ```
 */
export interface CanonicalField {
    /** Unique field name, used as the key in canonical rows */
    readonly name: string;

    /** Value type the raw cell is coerced to */
    readonly type: FieldType;

    /** Whether every canonical row must carry a value for this field */
    readonly required: boolean;

    /** Human-readable name shown next to mapping suggestions */
    readonly label?: string;

    /** Alternative header names used by the column mapper */
    readonly aliases?: readonly string[];

    /** Declared value set (enum fields only) */
    readonly values?: readonly string[];

    /**
     * Raw value used when the field is not mapped or the cell is empty.
     * A required field with a default can never be missing.
     */
    readonly default?: string;

    /** Whether the field may be used as an aggregation dimension */
    readonly groupable?: boolean;
}

/**
 * Check whether a value is a valid metadata scalar.
 */
export function isScalar(value: unknown): value is Scalar {
    return (
        value === null ||
        typeof value === "string" ||
        typeof value === "number" ||
        typeof value === "boolean"
    );
}
