/**
 * Row Contracts
 *
 * Shapes that flow out of the ingestion parser: the ephemeral raw row read
 * from the upload, the typed canonical row built from it, and the per-row
 * error recorded when that fails.
 */

import type { FieldValue } from "./CanonicalField.js";

/**
 * A data row as read from the upload, before mapping.
 * Exists only while parsing.
 */
export interface RawRow {
    /** Zero-based index of the data row (header excluded) */
    readonly rowIndex: number;

    /** 1-based physical line the row starts on */
    readonly line: number;

    /** (raw column name, raw value) pairs in file order */
    readonly cells: readonly (readonly [string, string])[];

    /** Structural problem that rejects the whole row (extra cells, open quote) */
    readonly problem?: string;
}

/**
 * A successfully mapped and coerced row.
 *
 * Optional fields without a value are absent from `values`.
 */
export interface CanonicalRow {
    /** Back-reference to the originating data row */
    readonly rowIndex: number;

    /** Canonical field name → typed value */
    readonly values: Readonly<Record<string, FieldValue>>;
}

/**
 * A row-level failure. Collected, never thrown.
 */
export interface ParseError {
    readonly rowIndex: number;
    readonly line: number;

    /** Canonical field that failed, or null for a row-level problem */
    readonly field: string | null;

    readonly reason: string;

    /** The offending raw value, when there is one */
    readonly value?: string;
}

/**
 * Outcome of parsing one raw row. Rows are all-or-nothing.
 */
export type RowOutcome =
    | { readonly ok: true; readonly row: CanonicalRow }
    | { readonly ok: false; readonly rowIndex: number; readonly errors: readonly ParseError[] };

/**
 * Output of `IngestionParser.parse()`.
 */
export interface ParseResult {
    /** Header columns as read from the upload */
    readonly columns: readonly string[];

    readonly rows: readonly CanonicalRow[];
    readonly errors: readonly ParseError[];

    /** Number of data rows read, accepted or not */
    readonly totalRows: number;

    /** Number of data rows rejected */
    readonly rejectedRows: number;
}
