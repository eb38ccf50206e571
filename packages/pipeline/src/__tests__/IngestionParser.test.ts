/**
 * @fileoverview Unit tests for IngestionParser
 *
 * Tests cover:
 * - Mapping raw cells onto canonical fields with coercion
 * - Collected, per-field row errors
 * - Defaults, unmapped columns and repeated headers
 * - The lazy parseRows generator
 */

import { describe, it, expect, beforeEach } from "vitest";
import { IngestionParser } from "../ingestion/IngestionParser.js";
import type { ColumnMapping } from "../contracts/ColumnMapping.js";
import type { PipelineLogger } from "../contracts/PipelineLogger.js";
import { SchemaRegistry } from "../schema/SchemaRegistry.js";
import { createAccessSchema, createMockLogger, encode } from "./fixtures.js";

const kMAPPING: ColumnMapping = {
    ts    : "timestamp",
    door  : "location",
    user  : "actor",
    result: "outcome",
    floor : "floor",
};

describe("IngestionParser", () => {
    let logger: PipelineLogger;
    let parser: IngestionParser;

    beforeEach(() => {
        logger = createMockLogger();
        parser = new IngestionParser(createAccessSchema(), { logger });
    });

    describe("parse", () => {
        const upload = encode([
            "ts,door,user,result,floor,notes",
            "2024-03-01 08:00,Lobby,u1,GRANT,2,first",
            "2024-03-01 08:05,Lobby,,DENY,,",
            "2024-03-01 25:00,Vault,u2,deny,x,",
            "2024-03-01 09:00, Vault ,u3,deny,,",
        ].join("\n"));

        // Scenario: Clean rows become typed canonical rows
        it("should coerce mapped cells and apply defaults", () => {
            const result = parser.parse(upload, kMAPPING);

            expect(result.rows.map((row) => row.rowIndex)).toEqual([0, 3]);
            expect(result.rows[0].values).toEqual({
                timestamp     : new Date("2024-03-01T08:00:00.000Z"),
                location      : "Lobby",
                actor         : "u1",
                outcome       : "GRANT",
                floor         : 2,
                security_level: "LOW",
            });
            expect(result.rows[1].values).toEqual({
                timestamp     : new Date("2024-03-01T09:00:00.000Z"),
                location      : "Vault",
                actor         : "u3",
                outcome       : "DENY",
                security_level: "LOW",
            });
        });

        // Scenario: Every failing field of a rejected row is reported
        it("should collect one error per failing field without stopping", () => {
            const result = parser.parse(upload, kMAPPING);

            expect(result.errors).toEqual([
                { rowIndex: 1, line: 3, field: "actor", reason: "Missing required value" },
                {
                    rowIndex: 2,
                    line    : 4,
                    field   : "timestamp",
                    reason  : "Expected a timestamp formatted YYYY-MM-DD HH:MM[:SS]",
                    value   : "2024-03-01 25:00",
                },
                { rowIndex: 2, line: 4, field: "floor", reason: "Expected an integer", value: "x" },
            ]);
            expect(result.totalRows).toBe(4);
            expect(result.rejectedRows).toBe(2);
            expect(result.columns).toEqual(["ts", "door", "user", "result", "floor", "notes"]);
        });

        // Scenario: Output rows are immutable
        it("should freeze rows and their values", () => {
            const result = parser.parse(upload, kMAPPING);

            expect(Object.isFrozen(result.rows)).toBe(true);
            expect(Object.isFrozen(result.rows[0])).toBe(true);
            expect(Object.isFrozen(result.rows[0].values)).toBe(true);
        });

        // Scenario: Timestamps are per-row Date objects
        it("should give each row its own timestamp Date", () => {
            const [first, second] = parser.parse(upload, kMAPPING).rows;

            expect(first.values.timestamp).toBeInstanceOf(Date);
            expect(first.values.timestamp).not.toBe(second.values.timestamp);
            expect(Object.isFrozen(first.values.timestamp)).toBe(false);
        });

        // Scenario: Field named after an object built-in
        it("should keep a __proto__ field as an own value", () => {
            const protoParser = new IngestionParser(new SchemaRegistry([
                { name: "__proto__", type: "string", required: true },
            ]), { logger });

            const result = protoParser.parse(encode("tag\nalpha\n"), { tag: "__proto__" });

            expect(result.errors).toEqual([]);
            expect(Object.entries(result.rows[0].values)).toEqual([["__proto__", "alpha"]]);
        });

        // Scenario: Parse summary is logged
        it("should log a parse summary", () => {
            parser.parse(upload, kMAPPING);

            expect(logger.debug).toHaveBeenCalledWith("Upload parsed", {
                columns     : 6,
                totalRows   : 4,
                rejectedRows: 2,
                errors      : 3,
            });
        });

        // Scenario: Required field with no mapped column
        it("should reject every row when a required field is not mapped", () => {
            const result = parser.parse(encode("ts,door,user\n2024-03-01 08:00,Lobby,u1\n"), {
                ts  : "timestamp",
                door: "location",
                user: "actor",
            });

            expect(result.rows).toEqual([]);
            expect(result.errors).toEqual([
                { rowIndex: 0, line: 2, field: "outcome", reason: "Required field is not mapped" },
            ]);
        });

        // Scenario: Empty cell replaced by the field default
        it("should use the default for an empty mapped cell", () => {
            const result = parser.parse(
                encode("ts,door,user,result,level\n2024-03-01 08:00,Lobby,u1,GRANT,\n2024-03-01 08:01,Lab,u2,GRANT,high\n"),
                { ...kMAPPING, level: "security_level" }
            );

            expect(result.rows.map((row) => row.values.security_level)).toEqual(["LOW", "HIGH"]);
        });

        // Scenario: Repeated header, first occurrence wins
        it("should read the first of repeated columns", () => {
            const result = parser.parse(
                encode("door,door,ts,user,result\nLobby,Vault,2024-03-01 08:00,u1,GRANT\n"),
                { door: "location", ts: "timestamp", user: "actor", result: "outcome" }
            );

            expect(result.rows[0].values.location).toBe("Lobby");
        });

        // Scenario: Header with zero data rows
        it("should give no rows and no errors for a header-only upload", () => {
            const result = parser.parse(encode("ts,door,user,result\n"), kMAPPING);

            expect(result).toEqual({
                columns     : ["ts", "door", "user", "result"],
                rows        : [],
                errors      : [],
                totalRows   : 0,
                rejectedRows: 0,
            });
        });
    });

    describe("parseRows", () => {
        // Scenario: Structural problem becomes a row-level error
        it("should turn a row problem into an error without a field", () => {
            const outcomes = [...parser.parseRows([
                { rowIndex: 0, line: 2, cells: [], problem: "Row has 3 values but the header has 2 columns" },
            ], kMAPPING)];

            expect(outcomes).toEqual([{
                ok      : false,
                rowIndex: 0,
                errors  : [{ rowIndex: 0, line: 2, field: null, reason: "Row has 3 values but the header has 2 columns" }],
            }]);
        });

        // Scenario: Outcomes are produced one at a time
        it("should yield outcomes lazily in input order", () => {
            const outcomes = parser.parseRows([
                { rowIndex: 0, line: 2, cells: [["ts", "2024-03-01 08:00"], ["door", "A"], ["user", "u1"], ["result", "GRANT"]] },
                { rowIndex: 1, line: 3, cells: [["ts", "bad"], ["door", "A"], ["user", "u1"], ["result", "GRANT"]] },
            ], kMAPPING);

            const first = outcomes.next();
            expect(first.done).toBe(false);
            expect(first.value).toMatchObject({ ok: true, row: { rowIndex: 0 } });

            const second = outcomes.next();
            expect(second.value).toMatchObject({ ok: false, rowIndex: 1 });

            expect(outcomes.next().done).toBe(true);
        });
    });
});
