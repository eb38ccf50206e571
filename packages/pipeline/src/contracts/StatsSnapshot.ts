/**
 * Stats Snapshot Contract
 *
 * Aggregate statistics for exactly one processed batch. A snapshot is never
 * updated in place; a new upload produces a new snapshot.
 */

/**
 * How a dimension turns a field value into a bucket key.
 *
 * - `value`: the value itself (ISO string for timestamps)
 * - `hour`: UTC hour of a timestamp, "00" to "23"
 * - `weekday`: UTC weekday of a timestamp, "Mon" to "Sun"
 * - `date`: UTC calendar date of a timestamp, "YYYY-MM-DD"
 */
export type BucketKind = "value" | "hour" | "weekday" | "date";

/**
 * A configured aggregation dimension.
 */
export interface Dimension {
    /** Dimension name, the key in `distributions` (defaults to the field name) */
    readonly name?: string;

    /** Canonical field the dimension reads */
    readonly field: string;

    /** Bucketing (default "value") */
    readonly bucket?: BucketKind;
}

/**
 * Flags every bucket of a dimension whose count for a label reaches a
 * threshold, e.g. "three or more denials for the same badge holder".
 */
export interface AnomalyRule {
    readonly id: string;
    readonly label: string;
    readonly dimension: string;
    readonly threshold: number;
    readonly description?: string;
}

export interface AnomalyFlag {
    readonly ruleId: string;
    readonly label: string;
    readonly dimension: string;
    readonly bucket: string;
    readonly count: number;
    readonly threshold: number;
}

/**
 * Bucket key used for rows that carry no value for a dimension's field.
 */
export const MISSING_BUCKET = "(none)";

/**
 * bucket → count
 */
export type Distribution = Readonly<Record<string, number>>;

export interface StatsSnapshot {
    /** Number of classified rows aggregated */
    readonly total: number;

    /** label → count; every known label is present, possibly at 0 */
    readonly labels: Readonly<Record<string, number>>;

    /** dimension → label → distribution */
    readonly distributions: Readonly<Record<string, Readonly<Record<string, Distribution>>>>;

    /** dimension → distribution across all labels */
    readonly totals: Readonly<Record<string, Distribution>>;

    readonly anomalies: readonly AnomalyFlag[];
}
