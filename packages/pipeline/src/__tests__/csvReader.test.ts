/**
 * @fileoverview Unit tests for the streaming CSV reader
 *
 * Tests cover:
 * - Header handling and delimiter detection
 * - Quoting, line endings and blank lines
 * - Structural row problems
 * - Encodings and chunk boundaries
 */

import { describe, it, expect } from "vitest";
import { readCsv, pickDelimiter } from "../ingestion/csvReader.js";
import { encode } from "./fixtures.js";

describe("readCsv", () => {
    describe("header", () => {
        // Scenario: Header read eagerly, rows lazily
        it("should read columns and yield rows with data row index and line", () => {
            const source = readCsv(encode("ts,door\n2024-03-01 08:00,Lobby\n"));

            expect(source.columns).toEqual(["ts", "door"]);
            expect(source.delimiter).toBe(",");
            expect([...source.rows]).toEqual([
                { rowIndex: 0, line: 2, cells: [["ts", "2024-03-01 08:00"], ["door", "Lobby"]] },
            ]);
        });

        // Scenario: Blank header cells get positional names; others are trimmed
        it("should name blank header cells by position", () => {
            const source = readCsv(encode(" a ,,c\n"));

            expect(source.columns).toEqual(["a", "Column 2", "c"]);
        });

        // Scenario: Zero-byte upload
        it("should give no columns and no rows for an empty upload", () => {
            const source = readCsv(new Uint8Array(0));

            expect(source.columns).toEqual([]);
            expect([...source.rows]).toEqual([]);
        });

        // Scenario: Header only
        it("should give no rows when only a header is present", () => {
            expect([...readCsv(encode("a,b\n")).rows]).toEqual([]);
        });
    });

    describe("delimiters", () => {
        // Scenario: Semicolon-separated export
        it("should detect a semicolon delimiter from the header", () => {
            const source = readCsv(encode("a;b;c\n1;2;3\n"));

            expect(source.delimiter).toBe(";");
            expect([...source.rows][0].cells).toEqual([["a", "1"], ["b", "2"], ["c", "3"]]);
        });

        // Scenario: Fixed delimiter and no trailing newline
        it("should use a fixed delimiter and read a final row without newline", () => {
            const source = readCsv(encode("a|b\n1|2"), { delimiter: "|" });

            expect(source.columns).toEqual(["a", "b"]);
            expect([...source.rows]).toEqual([{ rowIndex: 0, line: 2, cells: [["a", "1"], ["b", "2"]] }]);
        });
    });

    describe("quoting and line endings", () => {
        // Scenario: Quoted delimiters, doubled quotes and embedded newlines
        it("should unquote fields and keep physical line numbers", () => {
            const text = "id,note\n1,\"hello, \"\"world\"\"\"\n2,\"multi\nline\"\n3,last\n";
            const rows = [...readCsv(encode(text)).rows];

            expect(rows.map((row) => [row.rowIndex, row.line, row.cells[1][1]])).toEqual([
                [0, 2, "hello, \"world\""],
                [1, 3, "multi\nline"],
                [2, 5, "last"],
            ]);
        });

        // Scenario: CRLF endings with a blank line between rows
        it("should skip blank lines and treat CRLF as one line break", () => {
            const rows = [...readCsv(encode("a,b\r\n\r\n1,2\r\n")).rows];

            expect(rows).toEqual([{ rowIndex: 0, line: 3, cells: [["a", "1"], ["b", "2"]] }]);
        });
    });

    describe("row problems", () => {
        // Scenario: Too many cells rejects the row, too few pads with empty cells
        it("should flag rows with more cells than columns", () => {
            const rows = [...readCsv(encode("a,b\n1,2,3\n4\n")).rows];

            expect(rows).toEqual([
                {
                    rowIndex: 0,
                    line    : 2,
                    cells   : [["a", "1"], ["b", "2"]],
                    problem : "Row has 3 values but the header has 2 columns",
                },
                { rowIndex: 1, line: 3, cells: [["a", "4"], ["b", ""]] },
            ]);
        });

        // Scenario: Quote opened and never closed
        it("should flag an unterminated quoted value", () => {
            const rows = [...readCsv(encode("a,b\n1,\"open\n")).rows];

            expect(rows).toHaveLength(1);
            expect(rows[0].problem).toBe("Unterminated quoted value");
            expect(rows[0].line).toBe(2);
        });
    });

    describe("encodings and chunks", () => {
        // Scenario: UTF-8 byte order mark
        it("should drop a leading BOM", () => {
            const bytes = new Uint8Array([0xef, 0xbb, 0xbf, ...encode("id\n1\n")]);

            expect(readCsv(bytes).columns).toEqual(["id"]);
        });

        // Scenario: latin1 export
        it("should decode latin1 input", () => {
            const bytes = new Uint8Array([...encode("name\nJos"), 0xe9, 0x0a]);
            const rows = [...readCsv(bytes, { encoding: "latin1" }).rows];

            expect(rows[0].cells).toEqual([["name", "José"]]);
        });

        // Scenario: Multi-byte characters split across chunks
        it("should decode characters split across chunk boundaries", () => {
            const rows = [...readCsv(encode("door\nCafé Ω\n"), { chunkSize: 3 }).rows];

            expect(rows[0].cells).toEqual([["door", "Café Ω"]]);
        });

        // Scenario: Header spans several chunks
        it("should detect the delimiter when the header spans chunks", () => {
            const source = readCsv(encode("a;b;c\n1;2;3\n"), { chunkSize: 2 });

            expect(source.delimiter).toBe(";");
            expect(source.columns).toEqual(["a", "b", "c"]);
            expect([...source.rows][0].cells).toEqual([["a", "1"], ["b", "2"], ["c", "3"]]);
        });

        // Scenario: Rows are single-pass
        it("should yield nothing on a second pass", () => {
            const source = readCsv(encode("a\n1\n2\n"));

            expect([...source.rows]).toHaveLength(2);
            expect([...source.rows]).toEqual([]);
        });
    });
});

describe("pickDelimiter", () => {
    // Scenario: Most frequent candidate wins, ties fall back to comma
    it("should pick the most frequent candidate", () => {
        expect(pickDelimiter("a\tb\tc")).toBe("\t");
        expect(pickDelimiter("a,b;c")).toBe(",");
        expect(pickDelimiter("name")).toBe(",");
    });
});
