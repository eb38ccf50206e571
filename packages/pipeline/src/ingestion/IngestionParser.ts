/**
 * @fileoverview Ingestion Parser
 *
 * Applies a column mapping to an upload: each raw row either becomes a typed
 * canonical row or is rejected with one ParseError per failing field.
 *
 * Rules:
 * - Rows are all-or-nothing; a rejected row emits no canonical row
 * - Parsing never stops at an error; every row is attempted
 * - Unmapped raw columns are ignored
 * - An empty cell is a missing value; a field default replaces it
 *
 * @module @access-insights/pipeline/ingestion/IngestionParser
 */

import type { CanonicalField, FieldValue } from "../contracts/CanonicalField.js";
import type { ColumnMapping } from "../contracts/ColumnMapping.js";
import type {
    CanonicalRow,
    ParseError,
    ParseResult,
    RawRow,
    RowOutcome,
} from "../contracts/CanonicalRow.js";
import type { PipelineLogger } from "../contracts/PipelineLogger.js";
import { consoleLogger } from "../contracts/PipelineLogger.js";
import type { SchemaRegistry } from "../schema/SchemaRegistry.js";
import { coerceValue } from "./coerce.js";
import { readCsv, type CsvReadOptions, type CsvSource } from "./csvReader.js";

/**
 * Ingestion parser options.
 */
export interface IngestionParserOptions extends CsvReadOptions {
    /** Logger for parse summaries */
    readonly logger?: PipelineLogger;
}

/**
 * Where each canonical field reads its value from, for one mapping.
 */
interface FieldSource {
    readonly field: CanonicalField;
    readonly rawColumn: string | null;
}

/**
 * Ingestion Parser
 *
 * @example
 * ```typescript
 * const parser = new IngestionParser(schema);
 * const result = parser.parse(bytes, { ts: "timestamp", user: "actor" });
 *
 * result.rows.length;   // rows that mapped cleanly
 * result.errors;        // [{ rowIndex: 3, line: 5, field: "timestamp", reason: "..." }]
 * ```
 */
export class IngestionParser {
    private readonly logger: PipelineLogger;
    private readonly csvOptions: CsvReadOptions;

    constructor(
        private readonly schema: SchemaRegistry,
        options: IngestionParserOptions = {}
    ) {
        const { logger, ...csvOptions } = options;
        this.logger     = logger ?? consoleLogger;
        this.csvOptions = csvOptions;
    }

    /**
     * Parse a whole upload.
     *
     * @param rawBytes - Upload contents
     * @param mapping - Raw column → canonical field
     */
    parse(rawBytes: Uint8Array, mapping: ColumnMapping): ParseResult {
        return this.collect(this.open(rawBytes), mapping);
    }

    /**
     * Read the header of an upload without consuming its data rows.
     * Lets a caller choose a mapping from the columns first.
     */
    open(rawBytes: Uint8Array): CsvSource {
        return readCsv(rawBytes, this.csvOptions);
    }

    /**
     * Consume an opened upload's rows and collect the results.
     */
    collect(source: CsvSource, mapping: ColumnMapping): ParseResult {
        const rows: CanonicalRow[] = [];
        const errors: ParseError[] = [];
        let totalRows = 0;
        let rejectedRows = 0;

        for (const outcome of this.parseRows(source.rows, mapping)) {
            totalRows += 1;
            if (outcome.ok) {
                rows.push(outcome.row);
            }
            else {
                rejectedRows += 1;
                errors.push(...outcome.errors);
            }
        }

        this.logger.debug("Upload parsed", {
            columns: source.columns.length,
            totalRows,
            rejectedRows,
            errors : errors.length,
        });

        return {
            columns: source.columns,
            rows   : Object.freeze(rows),
            errors : Object.freeze(errors),
            totalRows,
            rejectedRows,
        };
    }

    /**
     * Lazily map raw rows, one outcome per row, in input order.
     */
    *parseRows(rawRows: Iterable<RawRow>, mapping: ColumnMapping): Generator<RowOutcome, void, undefined> {
        const sources = this.resolveSources(mapping);

        for (const raw of rawRows) {
            yield this.parseRow(raw, sources);
        }
    }

    private resolveSources(mapping: ColumnMapping): FieldSource[] {
        const entries = Object.entries(mapping);

        return this.schema.fields.map((field) => ({
            field,
            rawColumn: entries.find(([, target]) => target === field.name)?.[0] ?? null,
        }));
    }

    private parseRow(raw: RawRow, sources: readonly FieldSource[]): RowOutcome {
        const { rowIndex, line } = raw;

        if (raw.problem !== undefined) {
            return {
                ok    : false,
                rowIndex,
                errors: [{ rowIndex, line, field: null, reason: raw.problem }],
            };
        }

        // First occurrence wins for repeated headers
        const cells = new Map<string, string>();
        for (const [column, value] of raw.cells) {
            if (!cells.has(column)) {
                cells.set(column, value);
            }
        }

        const values: [string, FieldValue][] = [];
        const errors: ParseError[] = [];

        for (const { field, rawColumn } of sources) {
            let text = rawColumn === null ? "" : (cells.get(rawColumn) ?? "").trim();

            if (text === "" && field.default !== undefined) {
                text = field.default.trim();
            }

            if (text === "") {
                if (field.required) {
                    errors.push({
                        rowIndex,
                        line,
                        field : field.name,
                        reason: rawColumn === null ? "Required field is not mapped" : "Missing required value",
                    });
                }
                continue;
            }

            const result = coerceValue(field, text);
            if (result.ok) {
                values.push([field.name, result.value]);
            }
            else {
                errors.push({ rowIndex, line, field: field.name, reason: result.reason, value: text });
            }
        }

        if (errors.length > 0) {
            return { ok: false, rowIndex, errors };
        }

        return {
            ok : true,
            row: Object.freeze({ rowIndex, values: Object.freeze(Object.fromEntries(values)) }),
        };
    }
}
