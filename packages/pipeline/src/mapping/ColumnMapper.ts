/**
 * @fileoverview Column Mapper
 *
 * Suggests which raw upload column feeds which canonical field, and checks
 * a (possibly user-edited) mapping before ingestion.
 *
 * Matching policy, applied to headers and aliases normalised by lower-casing
 * and dropping every non-alphanumeric character:
 *
 * | Match                                                   | Score |
 * | ------------------------------------------------------- | ----- |
 * | header equals the field name                            | 1.0   |
 * | header equals an alias or the field label               | 0.9   |
 * | a word of the header equals the name or an alias        | 0.6   |
 * | header starts with the name or an alias (4+ characters) | 0.4   |
 *
 * There is no fuzzy matching: anything below the minimum score is left
 * unmapped for the user to decide.
 *
 * Both operations are pure functions of their input and the schema.
 *
 * @module @access-insights/pipeline/mapping/ColumnMapper
 */

import type { CanonicalField } from "../contracts/CanonicalField.js";
import type {
    ColumnMapping,
    MappingConfidence,
    MappingIssue,
    MappingSuggestion,
} from "../contracts/ColumnMapping.js";
import type { SchemaRegistry } from "../schema/SchemaRegistry.js";

/**
 * Column mapper options.
 */
export interface ColumnMapperOptions {
    /** Lowest score that is still suggested (default 0.6) */
    readonly minScore?: number;
}

const kDEFAULT_MIN_SCORE = 0.6;
const kMIN_PREFIX_LENGTH = 4;

const kSCORE_NAME   = 1.0;
const kSCORE_ALIAS  = 0.9;
const kSCORE_WORD   = 0.6;
const kSCORE_PREFIX = 0.4;

interface Candidate {
    readonly rawColumn: string;
    readonly columnIndex: number;
    readonly field: string;
    readonly fieldIndex: number;
    readonly score: number;
}

/**
 * Normalise a header or alias for comparison.
 */
export function normalizeHeader(value: string): string {
    return value.toLowerCase().replace(/[^a-z0-9]/g, "");
}

/**
 * Split a header into normalised words on separators and camelCase
 * boundaries: "DoorName" and "door_name" both give ["door", "name"].
 */
export function headerWords(value: string): string[] {
    return value
        .replace(/([a-z0-9])([A-Z])/g, "$1 $2")
        .toLowerCase()
        .split(/[^a-z0-9]+/)
        .filter((word) => word.length > 0);
}

/**
 * Map a score to its display band.
 */
export function confidenceFor(score: number): MappingConfidence {
    if (score >= kSCORE_ALIAS) {
        return "high";
    }
    if (score >= kSCORE_WORD) {
        return "medium";
    }
    return "low";
}

/**
 * Column Mapper
 *
 * @example
 * ```typescript
 * const mapper = new ColumnMapper(schema);
 *
 * const mapping = mapper.suggest(["ts", "door", "user", "result"]);
 * // => { ts: "timestamp", door: "location", user: "actor", result: "outcome" }
 *
 * mapper.validate(mapping, ["ts", "door", "user", "result"]);
 * // => []
 * ```
 */
export class ColumnMapper {
    private readonly minScore: number;

    constructor(
        private readonly schema: SchemaRegistry,
        options: ColumnMapperOptions = {}
    ) {
        this.minScore = options.minScore ?? kDEFAULT_MIN_SCORE;
    }

    /**
     * Suggest a best-effort mapping. Partial: fields with no confident
     * match are left out, required or not.
     *
     * @param rawColumns - Header columns of the upload
     */
    suggest(rawColumns: readonly string[]): ColumnMapping {
        return Object.freeze(Object.fromEntries(
            this.explain(rawColumns).map((suggestion): [string, string] => [suggestion.rawColumn, suggestion.field]),
        ));
    }

    /**
     * Same assignment as `suggest()`, with the score and confidence band of
     * every pair, in schema field order.
     *
     * Assignment is greedy: highest score first, ties broken by schema field
     * order then column order. Each field and each column is used once.
     * Headers that occur more than once in the upload are never suggested.
     */
    explain(rawColumns: readonly string[]): MappingSuggestion[] {
        const occurrences = countOccurrences(rawColumns);
        const candidates: Candidate[] = [];

        this.schema.fields.forEach((field, fieldIndex) => {
            rawColumns.forEach((rawColumn, columnIndex) => {
                if ((occurrences.get(rawColumn) ?? 0) > 1) {
                    return;
                }
                const score = scoreHeader(rawColumn, field);
                if (score >= this.minScore && score > 0) {
                    candidates.push({ rawColumn, columnIndex, field: field.name, fieldIndex, score });
                }
            });
        });

        candidates.sort((a, b) =>
            b.score - a.score ||
            a.fieldIndex - b.fieldIndex ||
            a.columnIndex - b.columnIndex
        );

        const usedFields  = new Set<string>();
        const usedColumns = new Set<string>();
        const chosen: Candidate[] = [];

        for (const candidate of candidates) {
            if (usedFields.has(candidate.field) || usedColumns.has(candidate.rawColumn)) {
                continue;
            }
            usedFields.add(candidate.field);
            usedColumns.add(candidate.rawColumn);
            chosen.push(candidate);
        }

        return chosen
            .sort((a, b) => a.fieldIndex - b.fieldIndex)
            .map((candidate) => ({
                rawColumn : candidate.rawColumn,
                field     : candidate.field,
                score     : candidate.score,
                confidence: confidenceFor(candidate.score),
            }));
    }

    /**
     * Check a mapping. Never throws: every defect is returned as an issue.
     *
     * @param mapping - Mapping to check
     * @param rawColumns - Header columns of the upload; enables the
     *   `unknown_column` and `ambiguous_column` checks
     * @returns Issues found; empty when the mapping is usable as is
     */
    validate(mapping: ColumnMapping, rawColumns?: readonly string[]): MappingIssue[] {
        const issues: MappingIssue[] = [];
        const sources = new Map<string, string[]>();

        for (const [rawColumn, field] of Object.entries(mapping)) {
            if (!this.schema.has(field)) {
                issues.push({
                    kind   : "unknown_field",
                    rawColumn,
                    field,
                    message: `Column '${rawColumn}' is mapped to unknown field '${field}'`,
                });
                continue;
            }
            const columns = sources.get(field) ?? [];
            columns.push(rawColumn);
            sources.set(field, columns);
        }

        for (const [field, columns] of sources) {
            if (columns.length > 1) {
                issues.push({
                    kind      : "duplicate_target",
                    field,
                    rawColumns: columns,
                    message   : `Field '${field}' is mapped from more than one column: ${columns.join(", ")}`,
                });
            }
        }

        if (rawColumns) {
            const occurrences = countOccurrences(rawColumns);
            for (const rawColumn of Object.keys(mapping)) {
                const count = occurrences.get(rawColumn) ?? 0;
                if (count === 0) {
                    issues.push({
                        kind   : "unknown_column",
                        rawColumn,
                        message: `Mapped column '${rawColumn}' is not in the upload`,
                    });
                }
                else if (count > 1) {
                    issues.push({
                        kind   : "ambiguous_column",
                        rawColumn,
                        message: `Mapped column '${rawColumn}' appears more than once in the upload`,
                    });
                }
            }
        }

        for (const field of this.schema.requiredFields()) {
            if (sources.has(field.name)) {
                continue;
            }
            const recoverable = field.default !== undefined;
            issues.push({
                kind   : "missing_required",
                field  : field.name,
                recoverable,
                message: recoverable
                    ? `Required field '${field.name}' is not mapped; default '${field.default}' will be used`
                    : `Required field '${field.name}' is not mapped`,
            });
        }

        return issues;
    }
}

/**
 * Score one raw header against one field. See the module doc for the table.
 */
export function scoreHeader(rawColumn: string, field: CanonicalField): number {
    const normalized = normalizeHeader(rawColumn);
    if (!normalized) {
        return 0;
    }

    const name    = normalizeHeader(field.name);
    const aliases = [...(field.aliases ?? []), ...(field.label ? [field.label] : [])]
        .map(normalizeHeader)
        .filter((alias) => alias.length > 0);

    if (normalized === name) {
        return kSCORE_NAME;
    }
    if (aliases.includes(normalized)) {
        return kSCORE_ALIAS;
    }

    const terms = [name, ...aliases];
    const words = headerWords(rawColumn);
    if (words.some((word) => terms.includes(word))) {
        return kSCORE_WORD;
    }

    if (terms.some((term) => term.length >= kMIN_PREFIX_LENGTH && normalized.startsWith(term))) {
        return kSCORE_PREFIX;
    }

    return 0;
}

function countOccurrences(values: readonly string[]): Map<string, number> {
    const counts = new Map<string, number>();
    for (const value of values) {
        counts.set(value, (counts.get(value) ?? 0) + 1);
    }
    return counts;
}
