/**
 * @fileoverview Aggregator
 *
 * Folds classified rows into a StatsSnapshot in a single pass: counts per
 * label, and per configured dimension the bucket counts for each label and
 * across all labels. Anomaly rules then flag buckets whose count for a label
 * reaches a threshold.
 *
 * Counting is order-independent and additive: `merge(aggregate(a),
 * aggregate(b))` equals `aggregate([...a, ...b])`. Aggregating the same rows
 * twice counts them twice, so each batch is aggregated once.
 *
 * @module @access-insights/pipeline/aggregation/Aggregator
 */

import type { FieldValue } from "../contracts/CanonicalField.js";
import type { ClassifiedRow } from "../contracts/ClassificationRule.js";
import { ConfigurationError } from "../contracts/ConfigurationError.js";
import type { PipelineLogger } from "../contracts/PipelineLogger.js";
import { consoleLogger } from "../contracts/PipelineLogger.js";
import type {
    AnomalyFlag,
    AnomalyRule,
    BucketKind,
    Dimension,
    Distribution,
    StatsSnapshot,
} from "../contracts/StatsSnapshot.js";
import { MISSING_BUCKET } from "../contracts/StatsSnapshot.js";
import type { SchemaRegistry } from "../schema/SchemaRegistry.js";

/**
 * Aggregator configuration.
 */
export interface AggregatorConfig {
    readonly schema: SchemaRegistry;

    /** Known labels, reported even when no row carries them */
    readonly labels: readonly string[];

    /**
     * Dimensions to count. Defaults to every groupable field, bucketed by
     * value, or by hour for timestamp fields.
     */
    readonly dimensions?: readonly Dimension[];

    readonly anomalies?: readonly AnomalyRule[];

    readonly logger?: PipelineLogger;
}

/**
 * A dimension with its defaults filled in.
 */
export interface ResolvedDimension {
    readonly name: string;
    readonly field: string;
    readonly bucket: BucketKind;
}

export interface BucketCount {
    readonly bucket: string;
    readonly count: number;
}

const kBUCKET_KINDS: readonly BucketKind[] = ["value", "hour", "weekday", "date"];
const kWEEKDAYS = ["Sun", "Mon", "Tue", "Wed", "Thu", "Fri", "Sat"] as const;

type CountMap = Map<string, number>;

/**
 * Mutable running totals, turned into a frozen snapshot at the end.
 */
interface Counters {
    total: number;
    readonly labels: CountMap;
    readonly distributions: Map<string, Map<string, CountMap>>;
    readonly totals: Map<string, CountMap>;
}

/**
 * Aggregator
 *
 * @example
 * ```typescript
 * const aggregator = new Aggregator({
 *     schema,
 *     labels    : ruleSet.labels,
 *     dimensions: [{ field: "location" }, { name: "hour", field: "timestamp", bucket: "hour" }],
 *     anomalies : [{ id: "repeat-denials", label: "access_denied", dimension: "actor", threshold: 3 }],
 * });
 *
 * const snapshot = aggregator.aggregate(classified);
 * snapshot.labels;                  // { access_denied: 4, unclassified: 116 }
 * snapshot.totals.hour["08"];       // 31
 * ```
 */
export class Aggregator {
    readonly labels: readonly string[];
    readonly dimensions: readonly ResolvedDimension[];
    readonly anomalies: readonly AnomalyRule[];

    private readonly schema: SchemaRegistry;
    private readonly logger: PipelineLogger;

    /**
     * @throws ConfigurationError listing every invalid dimension and anomaly rule
     */
    constructor(config: AggregatorConfig) {
        this.schema     = config.schema;
        this.logger     = config.logger ?? consoleLogger;
        this.labels     = Object.freeze([...new Set(config.labels)]);
        this.dimensions = Object.freeze(
            (config.dimensions ?? this.defaultDimensions()).map((dimension) => this.resolve(dimension))
        );
        this.anomalies  = Object.freeze(
            [...(config.anomalies ?? [])].sort((a, b) => compareText(a.id, b.id))
        );

        const issues = this.validate();
        if (issues.length > 0) {
            throw new ConfigurationError("Invalid aggregation settings", issues);
        }
    }

    /**
     * Count classified rows into a new snapshot.
     */
    aggregate(rows: readonly ClassifiedRow[]): StatsSnapshot {
        const counters = this.createCounters();

        for (const row of rows) {
            counters.total += 1;
            increment(counters.labels, row.label, 1);

            for (const dimension of this.dimensions) {
                const bucket = bucketFor(row.values[dimension.field], dimension.bucket);
                increment(getOrCreate(counters.totals, dimension.name), bucket, 1);

                const byLabel = getOrCreate(counters.distributions, dimension.name);
                increment(getOrCreate(byLabel, row.label), bucket, 1);
            }
        }

        this.logger.debug("Rows aggregated", { total: counters.total, dimensions: this.dimensions.length });

        return this.build(counters);
    }

    /**
     * A snapshot of zero rows: every known label at 0.
     */
    empty(): StatsSnapshot {
        return this.aggregate([]);
    }

    /**
     * Sum two snapshots produced by this aggregator. Anomalies are
     * recomputed from the summed counts.
     */
    merge(a: StatsSnapshot, b: StatsSnapshot): StatsSnapshot {
        const counters = this.createCounters();
        absorb(counters, a);
        absorb(counters, b);
        return this.build(counters);
    }

    /**
     * Busiest buckets of a dimension, most rows first, ties by bucket.
     * The `(none)` bucket is left out.
     *
     * @param label - Count only rows with this label; all rows when omitted
     */
    topBuckets(snapshot: StatsSnapshot, dimension: string, n: number, label?: string): BucketCount[] {
        const distribution = label === undefined
            ? snapshot.totals[dimension]
            : snapshot.distributions[dimension]?.[label];

        return Object.entries(distribution ?? {})
            .filter(([bucket]) => bucket !== MISSING_BUCKET)
            .map(([bucket, count]) => ({ bucket, count }))
            .sort((x, y) => y.count - x.count || compareText(x.bucket, y.bucket))
            .slice(0, Math.max(0, n));
    }

    private createCounters(): Counters {
        return {
            total        : 0,
            labels       : new Map(this.labels.map((label) => [label, 0])),
            distributions: new Map(),
            totals       : new Map(),
        };
    }

    private build(counters: Counters): StatsSnapshot {
        const distributions: Record<string, Readonly<Record<string, Distribution>>> = Object.fromEntries(
            this.dimensions.map((dimension): [string, Readonly<Record<string, Distribution>>] => [
                dimension.name,
                Object.freeze(Object.fromEntries(
                    sortedEntries(counters.distributions.get(dimension.name))
                        .map(([label, buckets]): [string, Distribution] => [label, toDistribution(buckets)]),
                )),
            ]),
        );
        const totals: Record<string, Distribution> = Object.fromEntries(
            this.dimensions.map((dimension): [string, Distribution] => [
                dimension.name,
                toDistribution(counters.totals.get(dimension.name)),
            ]),
        );

        // Known labels are seeded at zero in the counters
        const labels: Record<string, number> = Object.fromEntries(sortedEntries(counters.labels));

        return Object.freeze({
            total        : counters.total,
            labels       : Object.freeze(labels),
            distributions: Object.freeze(distributions),
            totals       : Object.freeze(totals),
            anomalies    : Object.freeze(this.detectAnomalies(distributions)),
        });
    }

    private detectAnomalies(
        distributions: Readonly<Record<string, Readonly<Record<string, Distribution>>>>
    ): AnomalyFlag[] {
        const flags: AnomalyFlag[] = [];

        for (const rule of this.anomalies) {
            const distribution = distributions[rule.dimension]?.[rule.label] ?? {};
            const hits = Object.entries(distribution)
                .filter(([bucket, count]) => bucket !== MISSING_BUCKET && count >= rule.threshold)
                .sort(([bucketA, countA], [bucketB, countB]) => countB - countA || compareText(bucketA, bucketB));

            for (const [bucket, count] of hits) {
                flags.push(Object.freeze({
                    ruleId   : rule.id,
                    label    : rule.label,
                    dimension: rule.dimension,
                    bucket,
                    count,
                    threshold: rule.threshold,
                }));
            }
        }

        return flags;
    }

    private defaultDimensions(): Dimension[] {
        return this.schema.groupableFields().map((field) => ({
            field : field.name,
            bucket: field.type === "timestamp" ? "hour" : "value",
        }));
    }

    private resolve(dimension: Dimension): ResolvedDimension {
        return Object.freeze({
            name  : dimension.name ?? dimension.field,
            field : dimension.field,
            bucket: dimension.bucket ?? "value",
        });
    }

    private validate(): string[] {
        const issues: string[] = [];
        const names = new Set<string>();

        for (const dimension of this.dimensions) {
            if (names.has(dimension.name)) {
                issues.push(`Dimension '${dimension.name}' is defined more than once`);
            }
            names.add(dimension.name);

            if (!kBUCKET_KINDS.includes(dimension.bucket)) {
                issues.push(`Dimension '${dimension.name}' has unknown bucket '${String(dimension.bucket)}'`);
                continue;
            }

            const field = this.schema.get(dimension.field);
            if (!field) {
                issues.push(`Dimension '${dimension.name}' reads unknown field '${dimension.field}'`);
                continue;
            }

            const timeBucket = dimension.bucket !== "value";
            if (field.type === "timestamp" && !timeBucket) {
                issues.push(`Dimension '${dimension.name}' on timestamp field '${field.name}' needs an hour, weekday or date bucket`);
            }
            if (field.type !== "timestamp" && timeBucket) {
                issues.push(`Dimension '${dimension.name}' uses bucket '${dimension.bucket}' but '${field.name}' is not a timestamp`);
            }
        }

        const ids = new Set<string>();
        const dimensionsByName = new Map(this.dimensions.map((dimension) => [dimension.name, dimension]));

        for (const rule of this.anomalies) {
            if (ids.has(rule.id)) {
                issues.push(`Anomaly rule id '${rule.id}' is used more than once`);
            }
            ids.add(rule.id);

            if (!this.labels.includes(rule.label)) {
                issues.push(`Anomaly rule '${rule.id}' watches unknown label '${rule.label}'`);
            }

            const dimension = dimensionsByName.get(rule.dimension);
            if (!dimension) {
                issues.push(`Anomaly rule '${rule.id}' groups by unknown dimension '${rule.dimension}'`);
            }
            else if (dimension.bucket !== "value") {
                issues.push(`Anomaly rule '${rule.id}' must group by a value dimension, '${rule.dimension}' is bucketed by ${dimension.bucket}`);
            }

            if (!Number.isInteger(rule.threshold) || rule.threshold < 1) {
                issues.push(`Anomaly rule '${rule.id}' needs a threshold of at least 1`);
            }
        }

        return issues;
    }
}

/**
 * Bucket key of a value. Time buckets are UTC.
 */
export function bucketFor(value: FieldValue | undefined, kind: BucketKind): string {
    if (value === undefined) {
        return MISSING_BUCKET;
    }

    if (!(value instanceof Date)) {
        return String(value);
    }

    switch (kind) {
        case "value":
            return value.toISOString();
        case "hour":
            return String(value.getUTCHours()).padStart(2, "0");
        case "weekday":
            return kWEEKDAYS[value.getUTCDay()];
        case "date":
            return value.toISOString().slice(0, 10);
    }
}

function absorb(counters: Counters, snapshot: StatsSnapshot): void {
    counters.total += snapshot.total;

    for (const [label, count] of Object.entries(snapshot.labels)) {
        increment(counters.labels, label, count);
    }

    for (const [dimension, byLabel] of Object.entries(snapshot.distributions)) {
        const target = getOrCreate(counters.distributions, dimension);
        for (const [label, distribution] of Object.entries(byLabel)) {
            addDistribution(getOrCreate(target, label), distribution);
        }
    }

    for (const [dimension, distribution] of Object.entries(snapshot.totals)) {
        addDistribution(getOrCreate(counters.totals, dimension), distribution);
    }
}

function addDistribution(target: CountMap, distribution: Distribution): void {
    for (const [bucket, count] of Object.entries(distribution)) {
        increment(target, bucket, count);
    }
}

function increment(counts: CountMap, key: string, by: number): void {
    counts.set(key, (counts.get(key) ?? 0) + by);
}

function getOrCreate<V>(map: Map<string, Map<string, V>>, key: string): Map<string, V> {
    let inner = map.get(key);
    if (!inner) {
        inner = new Map();
        map.set(key, inner);
    }
    return inner;
}

function sortedEntries<V>(map: Map<string, V> | undefined): [string, V][] {
    return [...(map ?? new Map<string, V>())].sort(([a], [b]) => compareText(a, b));
}

function toDistribution(counts: CountMap | undefined): Distribution {
    return Object.freeze(Object.fromEntries(sortedEntries(counts)));
}

function compareText(a: string, b: string): number {
    return a < b ? -1 : a > b ? 1 : 0;
}
