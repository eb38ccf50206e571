/**
 * Batch Result Contract
 *
 * The orchestrator's single output for one upload. Once returned it belongs
 * to the caller; the pipeline keeps no reference to it.
 */

import type { ColumnMapping } from "./ColumnMapping.js";
import type { CanonicalRow, ParseError } from "./CanonicalRow.js";
import type { ClassifiedRow } from "./ClassificationRule.js";
import type { StatsSnapshot } from "./StatsSnapshot.js";
import type { ConfigurationError } from "./ConfigurationError.js";

/**
 * Lifecycle of one batch.
 *
 * received → mapped → parsed → classified → aggregated → complete,
 * or mapped → failed when the mapping cannot be used.
 */
export type BatchState =
    | "received"
    | "mapped"
    | "parsed"
    | "classified"
    | "aggregated"
    | "complete"
    | "failed";

/**
 * Counts the presentation layer needs for "120 of 125 rows processed".
 */
export interface BatchSummary {
    readonly totalRows: number;
    readonly parsedRows: number;
    readonly rejectedRows: number;
    readonly errorCount: number;
}

interface BatchResultBase {
    readonly batchId: string;

    /** Every state the batch passed through, in order */
    readonly transitions: readonly BatchState[];

    /** Header columns of the upload */
    readonly columns: readonly string[];

    /** Mapping the batch was run with */
    readonly mapping: ColumnMapping;

    readonly rows: readonly CanonicalRow[];
    readonly classified: readonly ClassifiedRow[];
    readonly snapshot: StatsSnapshot;
    readonly errors: readonly ParseError[];
    readonly summary: BatchSummary;
}

export interface CompletedBatch extends BatchResultBase {
    readonly status: "complete";
    readonly state: "complete";
    readonly configurationError: null;
}

/**
 * A batch stopped before parsing. Rows, classified rows and errors are
 * empty and the snapshot has all-zero counts.
 */
export interface FailedBatch extends BatchResultBase {
    readonly status: "failed";
    readonly state: "failed";
    readonly configurationError: ConfigurationError;
}

export type BatchResult = CompletedBatch | FailedBatch;
