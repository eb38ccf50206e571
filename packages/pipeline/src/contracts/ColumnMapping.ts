/**
 * Column Mapping Contract
 *
 * Correspondence between the raw headers of one upload and the canonical
 * fields. A mapping is created per upload: the column mapper suggests one,
 * a user may confirm or edit it, and the ingestion parser applies it.
 */

/**
 * Raw column name → canonical field name.
 *
 * Keys are unique per upload. Raw columns that are not keys are ignored
 * during ingestion.
 */
export type ColumnMapping = Readonly<Record<string, string>>;

/**
 * Confidence band of a suggested pair, for display next to the suggestion.
 */
export type MappingConfidence = "high" | "medium" | "low";

/**
 * One suggested raw column → field pair.
 */
export interface MappingSuggestion {
    readonly rawColumn: string;
    readonly field: string;

    /** Match score between 0.0 and 1.0 */
    readonly score: number;

    readonly confidence: MappingConfidence;
}

/**
 * A defect found by `ColumnMapper.validate()`.
 *
 * Only `missing_required` can be recoverable: the field has a default the
 * parser falls back to. Every other kind makes the mapping unusable.
 */
export type MappingIssue =
    | {
        readonly kind: "missing_required";
        readonly field: string;
        readonly recoverable: boolean;
        readonly message: string;
    }
    | {
        readonly kind: "unknown_field";
        readonly rawColumn: string;
        readonly field: string;
        readonly message: string;
    }
    | {
        readonly kind: "duplicate_target";
        readonly field: string;
        readonly rawColumns: readonly string[];
        readonly message: string;
    }
    | {
        readonly kind: "unknown_column";
        readonly rawColumn: string;
        readonly message: string;
    }
    | {
        readonly kind: "ambiguous_column";
        readonly rawColumn: string;
        readonly message: string;
    };

export type MappingIssueKind = MappingIssue["kind"];

/**
 * Check whether a mapping issue prevents ingestion.
 */
export function isFatalMappingIssue(issue: MappingIssue): boolean {
    return issue.kind !== "missing_required" || !issue.recoverable;
}
