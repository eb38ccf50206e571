/**
 * @fileoverview Streaming CSV reader
 *
 * Reads upload bytes into raw rows lazily. Bytes are decoded in fixed-size
 * chunks and each row is yielded as soon as its last character is read, so
 * peak memory is bounded by the longest row rather than the file.
 *
 * The row sequence is single-pass: once consumed it cannot be restarted.
 * Read the bytes again for a second pass.
 *
 * Supported:
 * - Delimiter detection between comma, semicolon and tab (header line)
 * - RFC 4180 quoting: quoted delimiters, line breaks and doubled quotes
 * - CRLF, LF and CR line endings; blank lines are skipped
 * - UTF-8 (leading BOM dropped) or latin1 input
 *
 * @module @access-insights/pipeline/ingestion/csvReader
 */

import type { RawRow } from "../contracts/CanonicalRow.js";

export type CsvEncoding = "utf-8" | "latin1";

/**
 * CSV reader options.
 */
export interface CsvReadOptions {
    /** Text encoding of the upload (default "utf-8") */
    readonly encoding?: CsvEncoding;

    /** Fixed delimiter; detected from the header line when omitted */
    readonly delimiter?: string;

    /** Bytes decoded per step (default 64 KiB) */
    readonly chunkSize?: number;
}

/**
 * An opened upload: header read, data rows pending.
 */
export interface CsvSource {
    /** Header columns; blank headers are named "Column N" */
    readonly columns: readonly string[];

    readonly delimiter: string;

    /** Data rows, lazily read, single pass */
    readonly rows: Generator<RawRow, void, undefined>;
}

interface CsvRecord {
    readonly fields: string[];
    readonly line: number;
    readonly unterminated: boolean;
}

const kDEFAULT_CHUNK_SIZE = 64 * 1024;
const kCANDIDATE_DELIMITERS = [",", ";", "\t"] as const;

/**
 * Open an upload for reading.
 *
 * The header is read immediately; data rows are read as `rows` is iterated.
 * An upload with no bytes has no columns and no rows.
 *
 * @example
 * ```typescript
 * const source = readCsv(Buffer.from("ts,door\n2024-03-01 08:00,Lobby\n"));
 * source.columns;          // ["ts", "door"]
 * [...source.rows][0].cells; // [["ts", "2024-03-01 08:00"], ["door", "Lobby"]]
 * ```
 */
export function readCsv(bytes: Uint8Array, options: CsvReadOptions = {}): CsvSource {
    const chunks = decodeChunks(bytes, options.encoding ?? "utf-8", options.chunkSize ?? kDEFAULT_CHUNK_SIZE);
    const { delimiter, text } = options.delimiter
        ? { delimiter: options.delimiter, text: chunks }
        : detectDelimiter(chunks);

    const records = tokenize(text, delimiter);
    const header = records.next();
    const columns = header.done ? [] : buildColumns(header.value.fields);

    return {
        columns: Object.freeze(columns),
        delimiter,
        rows   : toRawRows(records, columns),
    };
}

/**
 * Pick the delimiter that occurs most often on the header line.
 * Ties and lines without any candidate fall back to comma.
 */
export function pickDelimiter(headerLine: string): string {
    let best = ",";
    let bestCount = 0;

    for (const candidate of kCANDIDATE_DELIMITERS) {
        const count = headerLine.split(candidate).length - 1;
        if (count > bestCount) {
            best = candidate;
            bestCount = count;
        }
    }

    return best;
}

function* decodeChunks(bytes: Uint8Array, encoding: CsvEncoding, chunkSize: number): Generator<string> {
    // ignoreBOM: false strips a leading UTF-8 byte order mark
    const decoder = new TextDecoder(encoding, { ignoreBOM: false });

    for (let offset = 0; offset < bytes.length; offset += chunkSize) {
        const text = decoder.decode(bytes.subarray(offset, offset + chunkSize), { stream: true });
        if (text) {
            yield text;
        }
    }

    const tail = decoder.decode();
    if (tail) {
        yield tail;
    }
}

/**
 * Buffer chunks until the first line break to choose the delimiter, then
 * hand back a stream that replays the buffered chunks.
 */
function detectDelimiter(chunks: Generator<string>): { delimiter: string; text: Iterable<string> } {
    const buffered: string[] = [];

    // Pull by hand: breaking out of for...of would close the generator
    let next = chunks.next();
    while (!next.done) {
        buffered.push(next.value);
        if (/[\r\n]/.test(next.value)) {
            break;
        }
        next = chunks.next();
    }

    const headerLine = buffered.join("").split(/\r\n|\r|\n/)[0] ?? "";

    function* replay(): Generator<string> {
        yield* buffered;
        yield* chunks;
    }

    return { delimiter: pickDelimiter(headerLine), text: replay() };
}

/**
 * Split decoded text into records. Blank lines produce no record.
 */
function* tokenize(text: Iterable<string>, delimiter: string): Generator<CsvRecord> {
    let fields: string[] = [];
    let field = "";
    let fieldQuoted = false;
    let inQuotes = false;
    let quotePending = false;
    let afterCR = false;
    let line = 1;
    let recordLine = 1;

    const isBlank = (): boolean =>
        fields.length === 0 && !fieldQuoted && field.trim() === "";

    for (const chunk of text) {
        for (const ch of chunk) {
            if (inQuotes) {
                if (quotePending) {
                    quotePending = false;
                    if (ch === "\"") {
                        field += "\"";
                        continue;
                    }
                    // Closing quote: handle ch as unquoted text below
                    inQuotes = false;
                }
                else {
                    if (ch === "\"") {
                        quotePending = true;
                        afterCR = false;
                        continue;
                    }
                    if (ch === "\r" || (ch === "\n" && !afterCR)) {
                        line += 1;
                    }
                    afterCR = ch === "\r";
                    field += ch;
                    continue;
                }
            }

            if (ch === "\n" && afterCR) {
                afterCR = false;
                continue;
            }
            afterCR = false;

            if (ch === "\"" && field.length === 0 && !fieldQuoted) {
                inQuotes = true;
                fieldQuoted = true;
                continue;
            }

            if (ch === delimiter) {
                fields.push(field);
                field = "";
                fieldQuoted = false;
                continue;
            }

            if (ch === "\r" || ch === "\n") {
                if (!isBlank()) {
                    fields.push(field);
                    yield { fields, line: recordLine, unterminated: false };
                }
                fields = [];
                field = "";
                fieldQuoted = false;
                line += 1;
                recordLine = line;
                afterCR = ch === "\r";
                continue;
            }

            field += ch;
        }
    }

    if (!isBlank()) {
        fields.push(field);
        yield { fields, line: recordLine, unterminated: inQuotes && !quotePending };
    }
}

function buildColumns(rawHeaders: readonly string[]): string[] {
    return rawHeaders.map((header, index) => {
        const trimmed = header.trim();
        return trimmed ? trimmed : `Column ${index + 1}`;
    });
}

function* toRawRows(records: Generator<CsvRecord>, columns: readonly string[]): Generator<RawRow, void, undefined> {
    let rowIndex = 0;

    for (const record of records) {
        let problem: string | undefined;
        if (record.unterminated) {
            problem = "Unterminated quoted value";
        }
        else if (record.fields.length > columns.length) {
            problem = `Row has ${record.fields.length} values but the header has ${columns.length} columns`;
        }

        yield {
            rowIndex,
            line : record.line,
            cells: columns.map((column, index) => [column, record.fields[index] ?? ""] as const),
            ...(problem !== undefined && { problem }),
        };
        rowIndex += 1;
    }
}
