/**
 * @fileoverview Pipeline Orchestrator
 *
 * Runs one upload through the pipeline and returns its BatchResult.
 *
 * Pipeline flow:
 * 1. received   - bytes accepted, header read
 * 2. mapped     - mapping chosen (given or suggested) and validated
 * 3. parsed     - rows coerced; bad rows collected as ParseErrors
 * 4. classified - every parsed row labelled
 * 5. aggregated - snapshot computed
 * 6. complete
 *
 * A mapping with an unrecoverable issue moves the batch from `mapped` to
 * `failed`; nothing is parsed. Row errors never fail a batch.
 *
 * Design principles:
 * - Stateless: nothing is kept between runs
 * - Observable: every state change is emitted as `batch:<state>`
 * - Shared configuration: schema, rules and aggregation settings are built
 *   once and read by every run
 *
 * @module @access-insights/pipeline/engine/PipelineOrchestrator
 */

import { Aggregator } from "../aggregation/Aggregator.js";
import type {
    BatchResult,
    BatchState,
    BatchSummary,
    CompletedBatch,
    FailedBatch,
} from "../contracts/BatchResult.js";
import type { ColumnMapping } from "../contracts/ColumnMapping.js";
import { isFatalMappingIssue } from "../contracts/ColumnMapping.js";
import { ConfigurationError } from "../contracts/ConfigurationError.js";
import type { EventBus } from "../contracts/EventBus.js";
import { createEvent } from "../contracts/EventBus.js";
import type { PipelineLogger } from "../contracts/PipelineLogger.js";
import { consoleLogger, createScopedLogger } from "../contracts/PipelineLogger.js";
import type { AnomalyRule, Dimension } from "../contracts/StatsSnapshot.js";
import { Classifier } from "../classification/Classifier.js";
import type { RuleSet } from "../classification/RuleSet.js";
import { InMemoryEventBus } from "../impl/InMemoryEventBus.js";
import type { CsvReadOptions } from "../ingestion/csvReader.js";
import { IngestionParser } from "../ingestion/IngestionParser.js";
import { ColumnMapper } from "../mapping/ColumnMapper.js";
import type { SchemaRegistry } from "../schema/SchemaRegistry.js";

/**
 * Orchestrator configuration.
 */
export interface OrchestratorConfig {
    readonly schema: SchemaRegistry;
    readonly ruleSet: RuleSet;

    /** Aggregation dimensions (default: groupable fields) */
    readonly dimensions?: readonly Dimension[];

    readonly anomalies?: readonly AnomalyRule[];

    /** Upload decoding options */
    readonly csv?: CsvReadOptions;

    /** Lowest score a suggested mapping pair may have (default 0.6) */
    readonly minMappingScore?: number;

    /** Custom EventBus (default: InMemoryEventBus) */
    readonly eventBus?: EventBus;

    readonly logger?: PipelineLogger;
}

/**
 * Per-run options.
 */
export interface RunOptions {
    /** Mapping to use; the mapper's suggestion when omitted */
    readonly mapping?: ColumnMapping;

    /** Batch id (default: generated) */
    readonly batchId?: string;
}

/**
 * Generate a unique batch id.
 */
function generateBatchId(): string {
    const timestamp = Date.now().toString(36);
    const random = Math.random().toString(36).substring(2, 8);
    return `batch_${timestamp}_${random}`;
}

/**
 * PipelineOrchestrator
 *
 * @example
 * ```typescript
 * const orchestrator = new PipelineOrchestrator({ schema, ruleSet });
 *
 * orchestrator.eventBus.subscribe("batch:complete", (event) => {
 *     console.log("Done:", event.batchId, event.data);
 * });
 *
 * const result = orchestrator.run(readFileSync("badge-log.csv"));
 * if (result.status === "failed") {
 *     console.error(result.configurationError.message);
 * }
 * ```
 */
export class PipelineOrchestrator {
    /** Public access to the event bus for external subscriptions */
    public readonly eventBus: EventBus;

    public readonly mapper: ColumnMapper;
    public readonly aggregator: Aggregator;

    private readonly schema: SchemaRegistry;
    private readonly ruleSet: RuleSet;
    private readonly csv: CsvReadOptions;
    private readonly logger: PipelineLogger;

    /**
     * @throws ConfigurationError when the aggregation settings are invalid
     */
    constructor(config: OrchestratorConfig) {
        this.schema   = config.schema;
        this.ruleSet  = config.ruleSet;
        this.csv      = config.csv ?? {};
        this.logger   = config.logger ?? consoleLogger;
        this.eventBus = config.eventBus ?? new InMemoryEventBus(this.logger);

        this.mapper = new ColumnMapper(this.schema, {
            ...(config.minMappingScore !== undefined && { minScore: config.minMappingScore }),
        });
        this.aggregator = new Aggregator({
            schema    : this.schema,
            labels    : this.ruleSet.labels,
            dimensions: config.dimensions,
            anomalies : config.anomalies,
            logger    : createScopedLogger(this.logger, "aggregator"),
        });
    }

    /**
     * Run one upload through the pipeline.
     *
     * @param rawBytes - Upload contents
     * @param options - Mapping and batch id
     * @returns Complete or failed batch; never throws for data problems
     */
    run(rawBytes: Uint8Array, options: RunOptions = {}): BatchResult {
        const batchId = options.batchId ?? generateBatchId();
        const logger = createScopedLogger(this.logger, "batch", { batchId });
        const transitions: BatchState[] = [];

        const enter = (state: BatchState, data: Record<string, unknown>): void => {
            transitions.push(state);
            logger.debug(`State ${state}`, data);
            this.eventBus.emit(createEvent(`batch:${state}`, data, batchId));
        };

        const parser = new IngestionParser(this.schema, { ...this.csv, logger });
        const source = parser.open(rawBytes);
        enter("received", { bytes: rawBytes.length, columns: source.columns.length });

        const mapping = options.mapping ?? this.mapper.suggest(source.columns);
        const issues = this.mapper.validate(mapping, source.columns);
        enter("mapped", {
            mapping,
            suggested: options.mapping === undefined,
            issues   : issues.length,
        });

        const fatal = issues.filter(isFatalMappingIssue);
        if (fatal.length > 0) {
            const configurationError = new ConfigurationError("Column mapping cannot be used", fatal);
            logger.warn("Batch failed", { error: configurationError.message });
            enter("failed", { issues: fatal.map((issue) => issue.message) });

            const failedBatch: FailedBatch = {
                batchId,
                status     : "failed",
                state      : "failed",
                transitions: Object.freeze(transitions),
                columns    : source.columns,
                mapping,
                rows       : Object.freeze([]),
                classified : Object.freeze([]),
                snapshot   : this.aggregator.empty(),
                errors     : Object.freeze([]),
                summary    : Object.freeze({ totalRows: 0, parsedRows: 0, rejectedRows: 0, errorCount: 0 }),
                configurationError,
            };
            return Object.freeze(failedBatch);
        }

        for (const issue of issues) {
            logger.info("Mapping note", { kind: issue.kind, message: issue.message });
        }

        const parsed = parser.collect(source, mapping);
        enter("parsed", {
            totalRows   : parsed.totalRows,
            parsedRows  : parsed.rows.length,
            rejectedRows: parsed.rejectedRows,
        });

        const classifier = new Classifier(this.ruleSet, { logger: createScopedLogger(logger, "classifier") });
        const classified = classifier.classify(parsed.rows);
        enter("classified", { rows: classified.length });

        const snapshot = this.aggregator.aggregate(classified);
        enter("aggregated", { total: snapshot.total, anomalies: snapshot.anomalies.length });

        const summary: BatchSummary = Object.freeze({
            totalRows   : parsed.totalRows,
            parsedRows  : parsed.rows.length,
            rejectedRows: parsed.rejectedRows,
            errorCount  : parsed.errors.length,
        });
        enter("complete", { ...summary });

        logger.info("Batch complete", { ...summary });

        const completedBatch: CompletedBatch = {
            batchId,
            status     : "complete",
            state      : "complete",
            transitions: Object.freeze(transitions),
            columns    : parsed.columns,
            mapping,
            rows       : parsed.rows,
            classified,
            snapshot,
            errors     : parsed.errors,
            summary,
            configurationError: null,
        };
        return Object.freeze(completedBatch);
    }
}
