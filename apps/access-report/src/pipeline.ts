/**
 * @fileoverview Pipeline wiring
 *
 * Builds the schema, rule set and orchestrator from a configuration file
 * plus an optional directory of user rules.
 *
 * Rule order:
 * 1. Rules from the configuration file
 * 2. User rules (./user/rules), in file-name order
 *
 * @module pipeline
 */

import {
    PipelineOrchestrator,
    RuleLoader,
    RuleSet,
    SchemaRegistry,
    consoleLogger,
    createRuleFromDefinition,
    type EventBus,
    type PipelineLogger,
} from "@access-insights/pipeline";
import { loadPipelineConfig, type PipelineConfig } from "./config/index.js";

export interface PipelineOptions {
    /** Path to pipeline.yml */
    configPath: string;

    /** Directory of user rule files; skipped when absent */
    rulesDir?: string;

    eventBus?: EventBus;
    logger?: PipelineLogger;
}

export interface Pipeline {
    readonly config: PipelineConfig;
    readonly schema: SchemaRegistry;
    readonly ruleSet: RuleSet;
    readonly orchestrator: PipelineOrchestrator;
}

/**
 * Build a ready-to-run pipeline.
 *
 * @throws ConfigurationError for an invalid configuration file or rule
 */
export async function createPipeline(options: PipelineOptions): Promise<Pipeline> {
    const logger = options.logger ?? consoleLogger;
    const config = loadPipelineConfig(options.configPath);
    const schema = new SchemaRegistry(config.fields);

    const rules = config.rules.map((definition) => createRuleFromDefinition(definition, schema));
    logger.info("Configured rules loaded", { rules: rules.length });

    if (options.rulesDir) {
        const loader = new RuleLoader(schema, { logger });
        rules.push(...(await loader.loadFromDirectory(options.rulesDir)));
    }

    const ruleSet = RuleSet.create(schema, rules, { logger });

    const orchestrator = new PipelineOrchestrator({
        schema,
        ruleSet,
        dimensions: config.dimensions,
        anomalies : config.anomalies,
        csv       : config.csv,
        logger,
        ...(config.minMappingScore !== undefined && { minMappingScore: config.minMappingScore }),
        ...(options.eventBus && { eventBus: options.eventBus }),
    });

    return { config, schema, ruleSet, orchestrator };
}
