/**
 * @fileoverview Unit tests for Aggregator
 *
 * Tests cover:
 * - Label, distribution and total counts
 * - Order independence and merge additivity
 * - Buckets, missing values and anomaly flags
 * - Settings validation
 */

import { describe, it, expect, beforeEach } from "vitest";
import { Aggregator, bucketFor } from "../aggregation/Aggregator.js";
import type { ClassifiedRow } from "../contracts/ClassificationRule.js";
import type { CanonicalRow } from "../contracts/CanonicalRow.js";
import { ConfigurationError } from "../contracts/ConfigurationError.js";
import type { PipelineLogger } from "../contracts/PipelineLogger.js";
import type { AnomalyRule, Dimension } from "../contracts/StatsSnapshot.js";
import { accessRow, createAccessSchema, createMockLogger, createRow } from "./fixtures.js";

function classified(row: CanonicalRow, label: string): ClassifiedRow {
    return { ...row, label, ruleId: label === "unclassified" ? null : label, metadata: {} };
}

const kLABELS = ["access_denied", "unclassified"];

const kDIMENSIONS: Dimension[] = [
    { field: "location" },
    { field: "actor" },
    { name: "hour", field: "timestamp", bucket: "hour" },
];

const kANOMALIES: AnomalyRule[] = [
    { id: "repeat-denials", label: "access_denied", dimension: "actor", threshold: 2 },
];

const kROWS: ClassifiedRow[] = [
    classified(accessRow(0, "2024-03-01T08:10", "Lobby", "u1", "DENY"), "access_denied"),
    classified(accessRow(1, "2024-03-01T08:40", "Lobby", "u1", "DENY"), "access_denied"),
    classified(accessRow(2, "2024-03-01T09:05", "Vault", "u2", "GRANT"), "unclassified"),
    classified(accessRow(3, "2024-03-01T23:00", "Lobby", "u3", "GRANT"), "unclassified"),
];

function issuesOf(build: () => unknown): readonly unknown[] {
    try {
        build();
    }
    catch (error) {
        if (error instanceof ConfigurationError) {
            return error.issues;
        }
        throw error;
    }
    return [];
}

describe("Aggregator", () => {
    const schema = createAccessSchema();
    let logger: PipelineLogger;
    let aggregator: Aggregator;

    beforeEach(() => {
        logger = createMockLogger();
        aggregator = new Aggregator({ schema, labels: kLABELS, dimensions: kDIMENSIONS, anomalies: kANOMALIES, logger });
    });

    describe("aggregate", () => {
        // Scenario: Counts per label, dimension and bucket
        it("should count labels, distributions and totals", () => {
            const snapshot = aggregator.aggregate(kROWS);

            expect(snapshot.total).toBe(4);
            expect(snapshot.labels).toEqual({ access_denied: 2, unclassified: 2 });
            expect(snapshot.totals).toEqual({
                location: { Lobby: 3, Vault: 1 },
                actor   : { u1: 2, u2: 1, u3: 1 },
                hour    : { "08": 2, "09": 1, "23": 1 },
            });
            expect(snapshot.distributions.location).toEqual({
                access_denied: { Lobby: 2 },
                unclassified : { Lobby: 1, Vault: 1 },
            });
            expect(logger.debug).toHaveBeenCalledWith("Rows aggregated", { total: 4, dimensions: 3 });
        });

        // Scenario: Label counts add up to the total
        it("should have label counts summing to the total", () => {
            const snapshot = aggregator.aggregate(kROWS);
            const sum = Object.values(snapshot.labels).reduce((acc, count) => acc + count, 0);

            expect(sum).toBe(snapshot.total);
        });

        // Scenario: Input order does not matter
        it("should give the same snapshot for any row order", () => {
            const forward = aggregator.aggregate(kROWS);
            const reversed = aggregator.aggregate([...kROWS].reverse());

            expect(reversed).toEqual(forward);
            expect(Object.keys(reversed.totals.location)).toEqual(["Lobby", "Vault"]);
        });

        // Scenario: Zero rows
        it("should report every known label at zero for no rows", () => {
            expect(aggregator.empty()).toEqual({
                total        : 0,
                labels       : { access_denied: 0, unclassified: 0 },
                distributions: { location: {}, actor: {}, hour: {} },
                totals       : { location: {}, actor: {}, hour: {} },
                anomalies    : [],
            });
        });

        // Scenario: Label outside the known set
        it("should sort unknown labels in with the known ones", () => {
            const snapshot = aggregator.aggregate([
                classified(accessRow(0, "2024-03-01T08:00", "Lobby", "u1", "GRANT"), "tailgating"),
            ]);

            expect(Object.keys(snapshot.labels)).toEqual(["access_denied", "tailgating", "unclassified"]);
            expect(snapshot.labels.tailgating).toBe(1);
        });

        // Scenario: Cell values that collide with object built-ins
        it("should count a __proto__ value like any other bucket", () => {
            const snapshot = aggregator.aggregate([
                classified(accessRow(0, "2024-03-01T08:00", "Lobby", "__proto__", "DENY"), "access_denied"),
                classified(accessRow(1, "2024-03-01T09:00", "Lobby", "u2", "GRANT"), "unclassified"),
            ]);

            for (const dimension of ["location", "actor", "hour"]) {
                const sum = Object.values(snapshot.totals[dimension]).reduce((acc, count) => acc + count, 0);
                expect(sum).toBe(snapshot.total);
            }
            expect(Object.entries(snapshot.totals.actor)).toEqual([["__proto__", 1], ["u2", 1]]);
            expect(Object.entries(snapshot.distributions.actor.access_denied)).toEqual([["__proto__", 1]]);
        });

        // Scenario: Label that collides with object built-ins
        it("should keep a __proto__ label in the label counts", () => {
            const snapshot = aggregator.aggregate([
                classified(accessRow(0, "2024-03-01T08:00", "Lobby", "u1", "GRANT"), "__proto__"),
            ]);

            expect(Object.entries(snapshot.labels)).toEqual([["__proto__", 1], ["access_denied", 0], ["unclassified", 0]]);
            expect(Object.keys(snapshot.distributions.location)).toEqual(["__proto__"]);
        });

        // Scenario: Snapshot cannot be changed
        it("should freeze the snapshot", () => {
            const snapshot = aggregator.aggregate(kROWS);

            expect(Object.isFrozen(snapshot)).toBe(true);
            expect(Object.isFrozen(snapshot.labels)).toBe(true);
            expect(Object.isFrozen(snapshot.totals.location)).toBe(true);
        });
    });

    describe("merge", () => {
        // Scenario: Two halves sum to the whole
        it("should equal aggregating all rows at once", () => {
            const merged = aggregator.merge(
                aggregator.aggregate(kROWS.slice(0, 2)),
                aggregator.aggregate(kROWS.slice(2))
            );

            expect(merged).toEqual(aggregator.aggregate(kROWS));
        });

        // Scenario: Threshold reached only after merging
        it("should recompute anomalies from merged counts", () => {
            const a = aggregator.aggregate([kROWS[0]]);
            const b = aggregator.aggregate([kROWS[1]]);

            expect(a.anomalies).toEqual([]);
            expect(aggregator.merge(a, b).anomalies).toHaveLength(1);
        });
    });

    describe("anomalies", () => {
        // Scenario: Bucket at the threshold is flagged
        it("should flag buckets reaching the threshold", () => {
            expect(aggregator.aggregate(kROWS).anomalies).toEqual([{
                ruleId   : "repeat-denials",
                label    : "access_denied",
                dimension: "actor",
                bucket   : "u1",
                count    : 2,
                threshold: 2,
            }]);
        });

        // Scenario: Missing values are counted but never flagged
        it("should count missing values under (none) and not flag them", () => {
            const doorAggregator = new Aggregator({
                schema,
                labels    : kLABELS,
                dimensions: [{ field: "location" }],
                anomalies : [{ id: "door", label: "access_denied", dimension: "location", threshold: 1 }],
                logger,
            });

            const snapshot = doorAggregator.aggregate([
                classified(createRow(0, { actor: "u1", outcome: "DENY" }), "access_denied"),
                classified(createRow(1, { actor: "u2", outcome: "DENY" }), "access_denied"),
                classified(createRow(2, { location: "Vault", actor: "u3", outcome: "DENY" }), "access_denied"),
            ]);

            expect(snapshot.totals.location).toEqual({ "(none)": 2, Vault: 1 });
            expect(snapshot.anomalies.map((flag) => [flag.bucket, flag.count])).toEqual([["Vault", 1]]);
            expect(doorAggregator.topBuckets(snapshot, "location", 5)).toEqual([{ bucket: "Vault", count: 1 }]);
        });
    });

    describe("topBuckets", () => {
        // Scenario: Busiest buckets, ties by name
        it("should order by count then bucket", () => {
            const snapshot = aggregator.aggregate(kROWS);

            expect(aggregator.topBuckets(snapshot, "location", 1)).toEqual([{ bucket: "Lobby", count: 3 }]);
            expect(aggregator.topBuckets(snapshot, "actor", 5)).toEqual([
                { bucket: "u1", count: 2 },
                { bucket: "u2", count: 1 },
                { bucket: "u3", count: 1 },
            ]);
            expect(aggregator.topBuckets(snapshot, "location", 5, "unclassified")).toEqual([
                { bucket: "Lobby", count: 1 },
                { bucket: "Vault", count: 1 },
            ]);
            expect(aggregator.topBuckets(snapshot, "floor", 5)).toEqual([]);
        });
    });

    describe("settings", () => {
        // Scenario: Default dimensions from groupable fields
        it("should default to groupable fields, timestamps by hour", () => {
            const defaults = new Aggregator({ schema, labels: kLABELS, logger });

            expect(defaults.dimensions).toEqual([
                { name: "timestamp", field: "timestamp", bucket: "hour" },
                { name: "location", field: "location", bucket: "value" },
                { name: "actor", field: "actor", bucket: "value" },
                { name: "outcome", field: "outcome", bucket: "value" },
            ]);
        });

        // Scenario: Every invalid setting reported together
        it("should list every invalid dimension and anomaly rule", () => {
            const issues = issuesOf(() => new Aggregator({
                schema,
                labels    : kLABELS,
                dimensions: [
                    { field: "location" },
                    { field: "location" },
                    { field: "colour" },
                    { field: "timestamp" },
                    { name: "door-hour", field: "location", bucket: "hour" },
                ],
                anomalies: [
                    { id: "a", label: "nope", dimension: "hour-x", threshold: 0 },
                    { id: "a", label: "access_denied", dimension: "door-hour", threshold: 2 },
                ],
                logger,
            }));

            expect(issues).toEqual([
                "Dimension 'location' is defined more than once",
                "Dimension 'colour' reads unknown field 'colour'",
                "Dimension 'timestamp' on timestamp field 'timestamp' needs an hour, weekday or date bucket",
                "Dimension 'door-hour' uses bucket 'hour' but 'location' is not a timestamp",
                "Anomaly rule 'a' watches unknown label 'nope'",
                "Anomaly rule 'a' groups by unknown dimension 'hour-x'",
                "Anomaly rule 'a' needs a threshold of at least 1",
                "Anomaly rule id 'a' is used more than once",
                "Anomaly rule 'a' must group by a value dimension, 'door-hour' is bucketed by hour",
            ]);
        });
    });
});

describe("bucketFor", () => {
    // Scenario: Time buckets are UTC
    it("should bucket timestamps by kind", () => {
        const friday = new Date("2024-03-01T08:05:00Z");

        expect(bucketFor(friday, "value")).toBe("2024-03-01T08:05:00.000Z");
        expect(bucketFor(friday, "hour")).toBe("08");
        expect(bucketFor(friday, "weekday")).toBe("Fri");
        expect(bucketFor(friday, "date")).toBe("2024-03-01");
    });

    // Scenario: Plain and missing values
    it("should stringify plain values and mark missing ones", () => {
        expect(bucketFor(3, "value")).toBe("3");
        expect(bucketFor(undefined, "value")).toBe("(none)");
    });
});
